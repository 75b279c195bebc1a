/**
 * Vector Store Types
 */

import type { VectorStoreType } from '../config/assistant.config';
import type { DocumentChunk } from '../ingestion/types/ingestion.types';

export const VECTOR_STORE = 'VECTOR_STORE';

export interface EmbeddedChunk {
  chunk: DocumentChunk;
  vector: number[];
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  /** Cosine similarity, higher is more relevant */
  score: number;
}

export interface DeleteResult {
  /** False when the backend cannot delete; nothing was removed */
  supported: boolean;
  deletedCount: number;
}

export interface VectorStoreDescription {
  type: VectorStoreType;
  location: string;
  dimension: number | null;
}

/**
 * Append-only similarity index over embedded chunks
 */
export interface VectorStore {
  initialize(): Promise<void>;
  /** Resolves once the records are durable */
  add(records: EmbeddedChunk[]): Promise<number>;
  similaritySearch(vector: number[], k: number): Promise<DocumentChunk[]>;
  /** Most relevant first */
  similaritySearchWithScore(vector: number[], k: number): Promise<ScoredChunk[]>;
  deleteBySource(sourceFile: string): Promise<DeleteResult>;
  count(): Promise<number>;
  describe(): VectorStoreDescription;
}
