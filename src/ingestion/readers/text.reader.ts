/**
 * Text Reader
 * Plain text and Markdown through LangChain TextLoader, with encoding
 * detection when the bytes are not valid UTF-8
 */

import { Injectable, Logger } from '@nestjs/common';
import { TextLoader } from '@langchain/classic/document_loaders/fs/text';
import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';
import * as fs from 'fs/promises';
import { FileFormat } from '../types/ingestion.types';
import { CorruptedFileError, EncodingError } from '../errors/ingestion-errors';
import { type DocumentReader, normalizeText } from './document-reader.interface';
import { asError, errorMessage } from '../../shared/utils/errors';

const REPLACEMENT_CHARACTER = '\uFFFD';

@Injectable()
export class TextReader implements DocumentReader {
  private readonly logger = new Logger(TextReader.name);

  readonly format = FileFormat.TEXT;

  /**
   * @throws EncodingError if the detected encoding cannot decode the file
   * @throws CorruptedFileError if the file cannot be read
   */
  async read(filePath: string): Promise<string> {
    const startTime = Date.now();

    try {
      // Try with LangChain TextLoader first (utf-8)
      try {
        const loader = new TextLoader(filePath);
        const documents = await loader.load();
        const content = documents.map((doc) => doc.pageContent).join('');

        if (!content.includes(REPLACEMENT_CHARACTER)) {
          this.logger.debug(
            `Text read (utf-8) - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
          );
          return normalizeText(content);
        }

        this.logger.log(`Invalid UTF-8 in ${filePath}, trying encoding detection`);
      } catch (defaultError) {
        this.logger.log(
          `Default encoding failed, trying encoding detection: ${errorMessage(defaultError)}`,
        );
      }

      // Fallback: encoding detection
      const content = await this.readWithEncodingDetection(filePath);

      this.logger.debug(
        `Text read (detected encoding) - Duration: ${Date.now() - startTime}ms, File: ${filePath}`,
      );

      return normalizeText(content);
    } catch (error) {
      if (error instanceof EncodingError) {
        throw error;
      }

      throw new CorruptedFileError(
        filePath,
        'Failed to read text file',
        asError(error),
      );
    }
  }

  private async readWithEncodingDetection(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath);
    const encoding = chardet.detect(buffer) ?? 'utf-8';

    this.logger.log(`Detected encoding: ${encoding} for file: ${filePath}`);

    if (!iconv.encodingExists(encoding)) {
      throw new EncodingError(filePath, encoding);
    }

    try {
      return iconv.decode(buffer, encoding);
    } catch (error) {
      throw new EncodingError(
        filePath,
        encoding,
        asError(error),
      );
    }
  }
}
