import type { DocumentChunk } from '../ingestion/types/ingestion.types';
import { InvalidSearchParameterError } from './vector-store.errors';
import type {
  DeleteResult,
  EmbeddedChunk,
  ScoredChunk,
  VectorStore,
  VectorStoreDescription,
} from './vector-store.types';

export abstract class BaseVectorStore implements VectorStore {
  abstract initialize(): Promise<void>;
  abstract add(records: EmbeddedChunk[]): Promise<number>;
  abstract similaritySearchWithScore(
    vector: number[],
    k: number,
  ): Promise<ScoredChunk[]>;
  abstract deleteBySource(sourceFile: string): Promise<DeleteResult>;
  abstract count(): Promise<number>;
  abstract describe(): VectorStoreDescription;

  async similaritySearch(
    vector: number[],
    k: number,
  ): Promise<DocumentChunk[]> {
    const results = await this.similaritySearchWithScore(vector, k);
    return results.map((result) => result.chunk);
  }

  /**
   * @throws InvalidSearchParameterError unless k is a positive integer
   */
  protected validateK(k: number): void {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidSearchParameterError('k', k);
    }
  }
}
