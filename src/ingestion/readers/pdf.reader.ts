/**
 * PDF Reader
 * LangChain PDFLoader, one document per file
 */

import { Injectable, Logger } from '@nestjs/common';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { FileFormat } from '../types/ingestion.types';
import { CorruptedFileError } from '../errors/ingestion-errors';
import { type DocumentReader, normalizeText } from './document-reader.interface';
import { asError, errorMessage } from '../../shared/utils/errors';

@Injectable()
export class PdfReader implements DocumentReader {
  private readonly logger = new Logger(PdfReader.name);

  readonly format = FileFormat.PDF;

  /**
   * @throws CorruptedFileError if the PDF cannot be parsed
   */
  async read(filePath: string): Promise<string> {
    const startTime = Date.now();

    try {
      const loader = new PDFLoader(filePath, {
        splitPages: false,
        parsedItemSeparator: '',
      });
      const documents = await loader.load();
      const content = documents.map((doc) => doc.pageContent).join('\n\n');

      this.logger.debug(
        `PDF read - Duration: ${Date.now() - startTime}ms, Characters: ${content.length}, File: ${filePath}`,
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
