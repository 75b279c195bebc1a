import type { FileFormat } from '../types/ingestion.types';

/**
 * Extracts the plain text of one file
 */
export interface DocumentReader {
  readonly format: FileFormat;
  read(filePath: string): Promise<string>;
}

/**
 * BOM removal and line ending normalisation shared by every reader
 */
export function normalizeText(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}
