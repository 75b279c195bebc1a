/**
 * Assistant result types
 */

import type { ChunkMetadata } from '../ingestion/types/ingestion.types';
import type { OperationStatus } from '../knowledge-base/knowledge-base.types';

export const NO_DOCUMENTS_MESSAGE =
  'No documents loaded. Please load documents first.';
export const NO_DOCUMENTS_ANSWER =
  "I don't have any documents to search through. Please load some documentation first.";
export const ERROR_ANSWER =
  'Sorry, I encountered an error while processing your question.';
export const NO_CONTEXT_MESSAGE = 'No relevant documents found for the question.';
export const NO_CONTEXT_ANSWER =
  "I couldn't find anything in the loaded documents that answers this question.";

export interface SourceAttribution {
  chunkIndex: number;
  /** Preview of the passage, truncated to SOURCE_PREVIEW_LENGTH */
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface AnswerResult {
  readonly status: OperationStatus;
  readonly question: string;
  readonly answer: string;
  readonly message?: string;
  readonly sources: readonly SourceAttribution[];
  readonly sourceCount: number;
}

export interface AskOptions {
  includeSources?: boolean;
}

export interface SearchHit {
  content: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface ConversationTurn {
  question: string;
  answer: string;
  askedAt: Date;
}
