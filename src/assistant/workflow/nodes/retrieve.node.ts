/**
 * Retrieve Node
 * Embeds the question, searches the index and applies the optional
 * similarity cutoff
 */

import { Logger } from '@nestjs/common';
import type { EmbeddingService } from '../../../embedding/embedding.service';
import type { VectorStore } from '../../../vector-store/vector-store.types';
import { errorMessage } from '../../../shared/utils/errors';
import type { AskStateType } from '../ask-state';

const logger = new Logger('RetrieveNode');

/**
 * @param similarityThreshold - Minimum score to keep; null keeps everything
 */
export function createRetrieveNode(
  embeddingService: EmbeddingService,
  vectorStore: VectorStore,
  similarityThreshold: number | null,
) {
  return async (state: AskStateType): Promise<Partial<AskStateType>> => {
    const startTime = Date.now();

    try {
      const vector = await embeddingService.embed(state.question);
      const retrieved = await vectorStore.similaritySearchWithScore(
        vector,
        state.k,
      );

      const context =
        similarityThreshold === null
          ? retrieved
          : retrieved.filter((result) => result.score >= similarityThreshold);

      logger.log(
        `[Retrieve] retrieved=${retrieved.length} kept=${context.length} threshold=${similarityThreshold ?? 'none'} duration=${Date.now() - startTime}ms`,
      );

      return {
        retrieved,
        context,
        outcome: context.length === 0 ? 'no_context' : 'pending',
        metrics: {
          ...state.metrics,
          retrievalDuration: Date.now() - startTime,
          retrievedCount: retrieved.length,
          filteredCount: retrieved.length - context.length,
        },
      };
    } catch (error) {
      logger.error(`[Retrieve] failed: ${errorMessage(error)}`);

      return {
        outcome: 'failed',
        error: errorMessage(error),
        metrics: {
          ...state.metrics,
          retrievalDuration: Date.now() - startTime,
        },
      };
    }
  };
}
