/**
 * Ask Workflow State Definition
 */

import { Annotation } from '@langchain/langgraph';
import type { ScoredChunk } from '../../vector-store/vector-store.types';

/**
 * pending: still running; answered: model replied; no_context: nothing
 * relevant was retrieved; failed: a stage raised
 */
export type AskOutcome = 'pending' | 'answered' | 'no_context' | 'failed';

export interface AskMetrics {
  startTime: number;
  retrievalDuration?: number;
  generationDuration?: number;
  retrievedCount?: number;
  filteredCount?: number;
}

export const AskState = Annotation.Root({
  // Input
  question: Annotation<string>,
  k: Annotation<number>,

  // Retrieval
  retrieved: Annotation<ScoredChunk[]>,
  /** Passages that reach the prompt, most relevant first */
  context: Annotation<ScoredChunk[]>,

  // Generation
  answer: Annotation<string | null>,

  outcome: Annotation<AskOutcome>,
  error: Annotation<string | null>,
  metrics: Annotation<AskMetrics>,
});

export type AskStateType = typeof AskState.State;

export function createInitialState(question: string, k: number): AskStateType {
  return {
    question,
    k,
    retrieved: [],
    context: [],
    answer: null,
    outcome: 'pending',
    error: null,
    metrics: { startTime: Date.now() },
  };
}
