/**
 * Knowledge Base Service
 * Owns ingestion into the shared vector store and the readiness of the index.
 * One instance per process; every session reads through it.
 */

import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as path from 'path';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { DocumentLoaderService } from '../ingestion/document-loader.service';
import type { DocumentChunk } from '../ingestion/types/ingestion.types';
import { EmbeddingService } from '../embedding/embedding.service';
import {
  VECTOR_STORE,
  type VectorStore,
} from '../vector-store/vector-store.types';
import { asError, errorMessage } from '../shared/utils/errors';
import {
  IndexState,
  type AddDocumentResult,
  type LoadDocumentsResult,
  type RemoveDocumentResult,
} from './knowledge-base.types';

@Injectable()
export class KnowledgeBaseService implements OnModuleInit {
  private readonly logger = new Logger(KnowledgeBaseService.name);
  private indexState = IndexState.UNINITIALIZED;

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
    @Inject(VECTOR_STORE) private readonly vectorStore: VectorStore,
    private readonly loader: DocumentLoaderService,
    private readonly embeddingService: EmbeddingService,
  ) {}

  async onModuleInit(): Promise<void> {
    const count = await this.vectorStore.count();
    if (count > 0) {
      this.markReady();
    }

    this.logger.log(
      `Knowledge base state: ${this.indexState} (${count} records)`,
    );
  }

  get state(): IndexState {
    return this.indexState;
  }

  isReady(): boolean {
    return this.indexState === IndexState.READY;
  }

  get store(): VectorStore {
    return this.vectorStore;
  }

  /**
   * Load, split, embed and index every supported file under a path
   */
  async loadDocuments(
    target: string = this.config.documentsDirectory,
  ): Promise<LoadDocumentsResult> {
    this.logger.log(`Loading documents from ${target}`);

    try {
      const { chunks, failures } = await this.loader.loadAndSplit(target);

      if (chunks.length === 0) {
        this.logger.warn(`No documents found in ${target}`);
        return { status: 'warning', message: 'No documents found', failures };
      }

      await this.index(chunks);
      const stats = this.loader.getDocumentStats(chunks);

      return {
        status: 'success',
        message: `Loaded ${stats.uniqueFiles} documents (${stats.totalChunks} chunks)`,
        stats,
        failures,
      };
    } catch (error) {
      this.logger.error(
        `Failed to load documents from ${target}: ${errorMessage(error)}`,
        asError(error)?.stack,
      );
      return {
        status: 'error',
        message: `Failed to load documents: ${errorMessage(error)}`,
        failures: [],
      };
    }
  }

  /**
   * Index one more file. Re-adding a file duplicates its chunks.
   */
  async addDocument(filePath: string): Promise<AddDocumentResult> {
    try {
      const { chunks } = await this.loader.loadAndSplit(filePath);

      if (chunks.length === 0) {
        return {
          status: 'warning',
          message: `No content found in ${path.basename(filePath)}`,
          chunkCount: 0,
        };
      }

      await this.index(chunks);

      return {
        status: 'success',
        message: `Added ${path.basename(filePath)} (${chunks.length} chunks)`,
        chunkCount: chunks.length,
      };
    } catch (error) {
      this.logger.error(
        `Failed to add ${filePath}: ${errorMessage(error)}`,
        asError(error)?.stack,
      );
      return {
        status: 'error',
        message: `Failed to process document: ${errorMessage(error)}`,
        chunkCount: 0,
      };
    }
  }

  /**
   * Remove every chunk of a source file. Readiness is kept even when the
   * index becomes empty.
   */
  async removeDocument(sourceFile: string): Promise<RemoveDocumentResult> {
    try {
      const result = await this.vectorStore.deleteBySource(sourceFile);

      if (!result.supported) {
        this.logger.warn(
          `Vector store doesn't support easy document deletion: ${sourceFile}`,
        );
        return {
          status: 'warning',
          message: "Vector store doesn't support easy document deletion",
          deletedCount: 0,
        };
      }

      return {
        status: 'success',
        message: `Removed ${result.deletedCount} chunks of ${sourceFile}`,
        deletedCount: result.deletedCount,
      };
    } catch (error) {
      this.logger.error(
        `Failed to remove ${sourceFile}: ${errorMessage(error)}`,
        asError(error)?.stack,
      );
      return {
        status: 'error',
        message: `Failed to remove document: ${errorMessage(error)}`,
        deletedCount: 0,
      };
    }
  }

  private async index(chunks: DocumentChunk[]): Promise<void> {
    const vectors = await this.embeddingService.embedBatch(
      chunks.map((chunk) => chunk.content),
    );

    await this.vectorStore.add(
      chunks.map((chunk, i) => ({ chunk, vector: vectors[i] })),
    );

    this.markReady();
  }

  private markReady(): void {
    if (this.indexState !== IndexState.READY) {
      this.indexState = IndexState.READY;
      this.logger.log('Knowledge base is ready');
    }
  }
}
