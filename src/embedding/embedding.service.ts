/**
 * Embedding Service
 * Adapter over the configured LangChain Embeddings with batching and a
 * per-call timeout
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { EMBEDDINGS } from '../providers/provider.tokens';
import { asError, errorMessage } from '../shared/utils/errors';
import { withTimeout } from '../shared/utils/timeout';
import { EmbeddingError } from './embedding.errors';

@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(EMBEDDINGS) private readonly embeddings: Embeddings,
    @Inject(ASSISTANT_CONFIG) config: AssistantConfig,
  ) {
    this.batchSize = config.embedding.batchSize;
    this.timeoutMs = config.embedding.timeoutMs;

    this.logger.log(
      `Initialized with batch size: ${this.batchSize}, timeout: ${this.timeoutMs}ms`,
    );
  }

  /**
   * Embed a query
   * @throws EmbeddingError
   */
  async embed(text: string): Promise<number[]> {
    try {
      const vector = await withTimeout(
        this.embeddings.embedQuery(text),
        this.timeoutMs,
        'Query embedding',
      );
      this.assertVector(vector);
      return vector;
    } catch (error) {
      throw this.toEmbeddingError('Failed to embed query', error);
    }
  }

  /**
   * Embed passages in batches of EMBEDDING_BATCH_SIZE. Every vector of the
   * result has the same dimension.
   * @throws EmbeddingError
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const vectors: number[][] = [];
    const batchCount = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const batchNumber = i / this.batchSize + 1;

      try {
        const result = await withTimeout(
          this.embeddings.embedDocuments(batch),
          this.timeoutMs,
          `Embedding batch ${batchNumber}/${batchCount}`,
        );

        if (result.length !== batch.length) {
          throw new EmbeddingError(
            `Embedding service returned ${result.length} vectors for ${batch.length} texts`,
          );
        }

        result.forEach((vector) => this.assertVector(vector));
        vectors.push(...result);
      } catch (error) {
        throw this.toEmbeddingError(
          `Failed to embed batch ${batchNumber}/${batchCount}`,
          error,
        );
      }
    }

    const dimension = vectors[0].length;
    if (vectors.some((vector) => vector.length !== dimension)) {
      throw new EmbeddingError(
        'Embedding service returned vectors of mixed dimensions',
      );
    }

    this.logger.log(
      `Embedded ${texts.length} texts in ${batchCount} batches (${Date.now() - startTime}ms)`,
    );

    return vectors;
  }

  private assertVector(vector: number[]): void {
    if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
      throw new EmbeddingError('Embedding service returned an invalid vector');
    }
  }

  private toEmbeddingError(context: string, error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    this.logger.error(`${context}: ${errorMessage(error)}`);

    return new EmbeddingError(
      `${context}: ${errorMessage(error)}`,
      asError(error),
    );
  }
}
