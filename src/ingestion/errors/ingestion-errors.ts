/**
 * Ingestion Error Definitions
 */

export enum IngestionErrorType {
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  CORRUPTED_FILE = 'CORRUPTED_FILE',
  ENCODING_ERROR = 'ENCODING_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
}

/**
 * Base ingestion error class
 */
export class IngestionError extends Error {
  constructor(
    public readonly type: IngestionErrorType,
    public readonly filePath: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'IngestionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnsupportedFileTypeError extends IngestionError {
  constructor(filePath: string, extension: string) {
    super(
      IngestionErrorType.UNSUPPORTED_FORMAT,
      filePath,
      `Unsupported file type: ${extension || '(none)'}. Please use PDF, DOCX, TXT or MD files.`,
    );
    this.name = 'UnsupportedFileTypeError';
  }
}

export class CorruptedFileError extends IngestionError {
  constructor(filePath: string, message: string, originalError?: Error) {
    super(
      IngestionErrorType.CORRUPTED_FILE,
      filePath,
      `File is corrupted or invalid: ${message}`,
      originalError,
    );
    this.name = 'CorruptedFileError';
  }
}

export class EncodingError extends IngestionError {
  constructor(filePath: string, encoding: string, originalError?: Error) {
    super(
      IngestionErrorType.ENCODING_ERROR,
      filePath,
      `Failed to decode file with encoding: ${encoding}`,
      originalError,
    );
    this.name = 'EncodingError';
  }
}

export class FileNotFoundError extends IngestionError {
  constructor(filePath: string) {
    super(
      IngestionErrorType.FILE_NOT_FOUND,
      filePath,
      `File or directory not found: ${filePath}`,
    );
    this.name = 'FileNotFoundError';
  }
}
