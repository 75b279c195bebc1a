/**
 * Reader Registry
 * Resolves the extension table once, at construction
 */

import { Injectable } from '@nestjs/common';
import {
  EXTENSION_TO_FORMAT,
  FileFormat,
} from '../types/ingestion.types';
import type { DocumentReader } from './document-reader.interface';
import { TextReader } from './text.reader';
import { PdfReader } from './pdf.reader';
import { DocxReader } from './docx.reader';

@Injectable()
export class ReaderRegistry {
  private readonly readers: ReadonlyMap<string, DocumentReader>;

  constructor(
    textReader: TextReader,
    pdfReader: PdfReader,
    docxReader: DocxReader,
  ) {
    const byFormat: Record<FileFormat, DocumentReader> = {
      [FileFormat.TEXT]: textReader,
      [FileFormat.MARKDOWN]: textReader,
      [FileFormat.PDF]: pdfReader,
      [FileFormat.DOCX]: docxReader,
    };

    this.readers = new Map(
      Object.entries(EXTENSION_TO_FORMAT).map(([extension, format]) => [
        extension,
        byFormat[format],
      ]),
    );
  }

  /**
   * @param extension - Lower-case extension including the dot
   */
  resolve(extension: string): DocumentReader | undefined {
    return this.readers.get(extension);
  }

  isSupported(extension: string): boolean {
    return this.readers.has(extension);
  }
}
