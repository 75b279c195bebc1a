import * as fs from 'fs/promises';
import * as path from 'path';
import {
  createTempDir,
  createTestConfig,
  removeTempDir,
  writeFixture,
} from '../../test/fixtures/test-config';
import { DocumentLoaderService } from './document-loader.service';
import { RecursiveChunkerService } from './chunking/recursive-chunker.service';
import { ReaderRegistry } from './readers/reader.registry';
import { TextReader } from './readers/text.reader';
import { PdfReader } from './readers/pdf.reader';
import { DocxReader } from './readers/docx.reader';
import {
  CorruptedFileError,
  FileNotFoundError,
  UnsupportedFileTypeError,
} from './errors/ingestion-errors';
import { FileFormat } from './types/ingestion.types';

const mockUnreadableDirectories = new Set<string>();

jest.mock('fs/promises', () => {
  const actual =
    jest.requireActual<typeof import('fs/promises')>('fs/promises');
  return {
    ...actual,
    readdir: (directory: string, options: { withFileTypes: true }) =>
      mockUnreadableDirectories.has(directory)
        ? Promise.reject(
            Object.assign(
              new Error(`EACCES: permission denied, scandir '${directory}'`),
              { code: 'EACCES' },
            ),
          )
        : actual.readdir(directory, options),
  };
});

describe('DocumentLoaderService', () => {
  let directory: string;
  let pdfReader: PdfReader;
  let loader: DocumentLoaderService;

  beforeEach(async () => {
    directory = await createTempDir();
    pdfReader = new PdfReader();
    loader = new DocumentLoaderService(
      new ReaderRegistry(new TextReader(), pdfReader, new DocxReader()),
      new RecursiveChunkerService(createTestConfig()),
    );

    await writeFixture(directory, 'a.txt', 'Alpha file');
    await writeFixture(directory, 'guide.md', '# Guide\n\nWelcome to the team.');
    await writeFixture(directory, 'image.png', 'not a document');
    await writeFixture(directory, 'notes/b.txt', 'Second file');
  });

  afterEach(async () => {
    mockUnreadableDirectories.clear();
    await removeTempDir(directory);
  });

  it('scans directories recursively in sorted order', async () => {
    const { documents, failures } = await loader.load(directory);

    expect(failures).toEqual([]);
    expect(documents.map((d) => d.sourceFile)).toEqual([
      path.join(directory, 'a.txt'),
      path.join(directory, 'guide.md'),
      path.join(directory, 'notes', 'b.txt'),
    ]);
    expect(documents[1]).toEqual({
      sourceFile: path.join(directory, 'guide.md'),
      fileName: 'guide.md',
      fileType: '.md',
      format: FileFormat.MARKDOWN,
      text: '# Guide\n\nWelcome to the team.',
    });
  });

  it('removes the BOM and normalises line endings', async () => {
    const filePath = await writeFixture(
      directory,
      'windows.txt',
      '\uFEFFline one\r\nline two\r\n',
    );

    const { documents } = await loader.load(filePath);

    expect(documents[0].text).toBe('line one\nline two\n');
  });

  it('records failing files and keeps loading the rest', async () => {
    const brokenPdf = await writeFixture(directory, 'broken.pdf', 'garbage');
    jest
      .spyOn(pdfReader, 'read')
      .mockRejectedValue(new CorruptedFileError(brokenPdf, 'bad xref table'));

    const { documents, failures } = await loader.load(directory);

    expect(documents).toHaveLength(3);
    expect(failures).toEqual([
      {
        sourceFile: brokenPdf,
        reason: 'File is corrupted or invalid: bad xref table',
      },
    ]);
  });

  it('records an unreadable subdirectory and loads the rest', async () => {
    const notes = path.join(directory, 'notes');
    mockUnreadableDirectories.add(notes);

    const { documents, failures } = await loader.load(directory);

    expect(documents.map((d) => d.fileName)).toEqual(['a.txt', 'guide.md']);
    expect(failures).toEqual([
      {
        sourceFile: notes,
        reason: `EACCES: permission denied, scandir '${notes}'`,
      },
    ]);
  });

  it('follows symlinked files and records broken links', async () => {
    await fs.symlink(
      path.join(directory, 'a.txt'),
      path.join(directory, 'linked.txt'),
    );
    await fs.symlink(
      path.join(directory, 'gone.md'),
      path.join(directory, 'dangling.md'),
    );

    const { documents, failures } = await loader.load(directory);

    expect(documents.map((d) => d.sourceFile)).toEqual([
      path.join(directory, 'a.txt'),
      path.join(directory, 'guide.md'),
      path.join(directory, 'linked.txt'),
      path.join(directory, 'notes', 'b.txt'),
    ]);
    expect(documents[2].text).toBe('Alpha file');
    expect(failures).toHaveLength(1);
    expect(failures[0].sourceFile).toBe(path.join(directory, 'dangling.md'));
    expect(failures[0].reason).toContain('ENOENT');
  });

  it('returns an empty result for a missing directory', async () => {
    await expect(loader.load(path.join(directory, 'missing'))).resolves.toEqual(
      { documents: [], failures: [] },
    );
  });

  it('raises for a missing file', async () => {
    await expect(
      loader.load(path.join(directory, 'missing.md')),
    ).rejects.toThrow(FileNotFoundError);
  });

  it('raises for an explicitly requested unsupported file', async () => {
    await expect(
      loader.load(path.join(directory, 'image.png')),
    ).rejects.toThrow(UnsupportedFileTypeError);
  });

  it('splits loaded documents and reports statistics', async () => {
    const { chunks } = await loader.loadAndSplit(directory);

    expect(chunks.map((c) => c.content)).toEqual([
      'Alpha file',
      '# Guide\n\nWelcome to the team.',
      'Second file',
    ]);
    expect(loader.getDocumentStats(chunks)).toEqual({
      totalChunks: 3,
      totalCharacters: 50,
      fileTypes: { '.txt': 2, '.md': 1 },
      uniqueFiles: 3,
      sourceFiles: [
        path.join(directory, 'a.txt'),
        path.join(directory, 'guide.md'),
        path.join(directory, 'notes', 'b.txt'),
      ],
    });
  });
});
