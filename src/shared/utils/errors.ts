import { types } from 'util';

/**
 * Narrow an unknown throw to an Error. Errors raised by Node's own modules can
 * come from another realm (Jest runs tests in a vm context), so `instanceof`
 * alone misses them.
 */
export function asError(error: unknown): Error | undefined {
  return error instanceof Error || types.isNativeError(error)
    ? error
    : undefined;
}

export function errorMessage(error: unknown): string {
  return asError(error)?.message ?? String(error);
}

/**
 * The errno code of a failed system call, e.g. "ENOENT"
 */
export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    return error.code;
  }
  return undefined;
}

export function isMissingPathError(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}
