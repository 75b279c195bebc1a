import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  asError,
  errorCode,
  errorMessage,
  isMissingPathError,
} from './errors';

describe('error helpers', () => {
  const missingPath = path.join(os.tmpdir(), 'docqa-missing', 'nothing.txt');

  async function readMissing(): Promise<unknown> {
    try {
      await fs.readFile(missingPath);
    } catch (error) {
      return error;
    }
    throw new Error('expected the read to fail');
  }

  it('recognises a missing path from a failed fs call', async () => {
    const error = await readMissing();

    expect(errorCode(error)).toBe('ENOENT');
    expect(isMissingPathError(error)).toBe(true);
  });

  it('keeps the message and cause of fs errors', async () => {
    const error = await readMissing();

    expect(asError(error)).toBe(error);
    expect(errorMessage(error)).toContain('ENOENT');
  });

  it('handles values that are not errors', () => {
    expect(asError('boom')).toBeUndefined();
    expect(errorMessage('boom')).toBe('boom');
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(isMissingPathError(new Error('EACCES'))).toBe(false);
  });
});
