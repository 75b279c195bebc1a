/**
 * Question answering prompts
 */

import {
  ChatPromptTemplate,
  MessagesPlaceholder,
  PromptTemplate,
} from '@langchain/core/prompts';
import type { ScoredChunk } from '../../vector-store/vector-store.types';

export const QA_TEMPLATE = `You are a helpful assistant that answers questions about team documentation. Use the following pieces of context to answer the question at the end. If you don't know the answer based on the context, just say that you don't know, don't try to make up an answer.

Context:
{context}

Question: {question}

Answer: `;

export const qaPrompt = PromptTemplate.fromTemplate(QA_TEMPLATE);

/**
 * Passage contents in the given order, separated by blank lines
 */
export function buildContextBlock(passages: ScoredChunk[]): string {
  return passages.map((passage) => passage.chunk.content).join('\n\n');
}

export const CHAT_SYSTEM_MESSAGE =
  'You are a helpful assistant for a team documentation service. Continue the conversation using the earlier turns for context. If you are not sure about something, say so.';

export const chatPrompt = ChatPromptTemplate.fromMessages([
  ['system', CHAT_SYSTEM_MESSAGE],
  new MessagesPlaceholder('history'),
  ['human', '{message}'],
]);
