/**
 * Document Loader Service
 * Reads files or directory trees into SourceDocuments and splits them into
 * chunks. A failing file in a scan is recorded and skipped.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  EXTENSION_TO_FORMAT,
  type DocumentChunk,
  type DocumentStats,
  type LoadAndSplitResult,
  type LoadFailure,
  type LoadResult,
  type SourceDocument,
} from './types/ingestion.types';
import {
  FileNotFoundError,
  UnsupportedFileTypeError,
} from './errors/ingestion-errors';
import { ReaderRegistry } from './readers/reader.registry';
import { RecursiveChunkerService } from './chunking/recursive-chunker.service';
import {
  asError,
  errorMessage,
  isMissingPathError,
} from '../shared/utils/errors';

@Injectable()
export class DocumentLoaderService {
  private readonly logger = new Logger(DocumentLoaderService.name);

  constructor(
    private readonly readers: ReaderRegistry,
    private readonly chunker: RecursiveChunkerService,
  ) {}

  /**
   * Load a single file or every supported file under a directory
   *
   * @throws FileNotFoundError if an explicitly named file does not exist
   * @throws UnsupportedFileTypeError if an explicitly named file has an unsupported extension
   */
  async load(target: string): Promise<LoadResult> {
    const stats = await fs.stat(target).catch((error: unknown) => {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    });

    if (!stats) {
      if (path.extname(target)) {
        throw new FileNotFoundError(target);
      }

      this.logger.warn(`Documents directory not found: ${target}`);
      return { documents: [], failures: [] };
    }

    if (stats.isFile()) {
      const document = await this.loadFile(target);
      return { documents: [document], failures: [] };
    }

    return this.loadDirectory(target);
  }

  async loadAndSplit(target: string): Promise<LoadAndSplitResult> {
    const { documents, failures } = await this.load(target);
    const chunks = this.splitDocuments(documents);

    this.logger.log(
      `Split ${documents.length} documents into ${chunks.length} chunks`,
    );

    return { documents, chunks, failures };
  }

  splitDocuments(documents: SourceDocument[]): DocumentChunk[] {
    return documents.flatMap((document) =>
      this.chunker.splitDocument(document),
    );
  }

  getDocumentStats(chunks: DocumentChunk[]): DocumentStats {
    const fileTypes: Record<string, number> = {};
    const sourceFiles = new Set<string>();
    let totalCharacters = 0;

    for (const chunk of chunks) {
      totalCharacters += chunk.content.length;
      fileTypes[chunk.metadata.fileType] =
        (fileTypes[chunk.metadata.fileType] ?? 0) + 1;
      sourceFiles.add(chunk.metadata.sourceFile);
    }

    return {
      totalChunks: chunks.length,
      totalCharacters,
      fileTypes,
      uniqueFiles: sourceFiles.size,
      sourceFiles: Array.from(sourceFiles),
    };
  }

  private async loadFile(filePath: string): Promise<SourceDocument> {
    const fileType = path.extname(filePath).toLowerCase();
    const reader = this.readers.resolve(fileType);
    const format = EXTENSION_TO_FORMAT[fileType];

    if (!reader || !format) {
      throw new UnsupportedFileTypeError(filePath, fileType);
    }

    const text = await reader.read(filePath);

    this.logger.log(`Loaded ${filePath} (${text.length} characters)`);

    return {
      sourceFile: filePath,
      fileName: path.basename(filePath),
      fileType,
      format,
      text,
    };
  }

  private async loadDirectory(directory: string): Promise<LoadResult> {
    const failures: LoadFailure[] = [];
    const files = await this.collectFiles(directory, failures);
    const documents: SourceDocument[] = [];

    for (const file of files) {
      try {
        documents.push(await this.loadFile(file));
      } catch (error) {
        this.logger.error(
          `Failed to load ${file}: ${errorMessage(error)}`,
          asError(error)?.stack,
        );
        failures.push({ sourceFile: file, reason: errorMessage(error) });
      }
    }

    this.logger.log(
      `Loaded ${documents.length} documents from ${directory} (${failures.length} failed)`,
    );

    return { documents, failures };
  }

  /**
   * Supported files under a directory, recursively, in sorted order. A
   * directory that cannot be read is recorded and the scan moves on.
   * Symlinked files are followed; symlinked directories are not.
   */
  private async collectFiles(
    directory: string,
    failures: LoadFailure[],
  ): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      this.logger.error(
        `Failed to read directory ${directory}: ${errorMessage(error)}`,
        asError(error)?.stack,
      );
      failures.push({ sourceFile: directory, reason: errorMessage(error) });
      return [];
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        files.push(...(await this.collectFiles(fullPath, failures)));
        continue;
      }

      if (!this.readers.isSupported(path.extname(entry.name).toLowerCase())) {
        continue;
      }

      if (entry.isFile()) {
        files.push(fullPath);
      } else if (entry.isSymbolicLink()) {
        try {
          const target = await fs.stat(fullPath);
          if (target.isFile()) {
            files.push(fullPath);
          }
        } catch (error) {
          this.logger.warn(
            `Skipping broken link ${fullPath}: ${errorMessage(error)}`,
          );
          failures.push({ sourceFile: fullPath, reason: errorMessage(error) });
        }
      }
    }

    return files;
  }
}
