/**
 * DOCX Reader
 * LangChain DocxLoader (mammoth raw text extraction)
 */

import { Injectable, Logger } from '@nestjs/common';
import { DocxLoader } from '@langchain/community/document_loaders/fs/docx';
import { FileFormat } from '../types/ingestion.types';
import { CorruptedFileError } from '../errors/ingestion-errors';
import { type DocumentReader, normalizeText } from './document-reader.interface';
import { asError, errorMessage } from '../../shared/utils/errors';

@Injectable()
export class DocxReader implements DocumentReader {
  private readonly logger = new Logger(DocxReader.name);

  readonly format = FileFormat.DOCX;

  /**
   * @throws CorruptedFileError if the archive is not a readable DOCX
   */
  async read(filePath: string): Promise<string> {
    const startTime = Date.now();

    try {
      const loader = new DocxLoader(filePath);
      const documents = await loader.load();
      const content = documents.map((doc) => doc.pageContent).join('\n\n');

      this.logger.debug(
        `DOCX read - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
      );

      return normalizeText(content);
    } catch (error) {
      throw new CorruptedFileError(
        filePath,
        errorMessage(error),
        asError(error),
      );
    }
  }
}
