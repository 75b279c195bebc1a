/**
 * Retrieval Orchestrator
 * One per session. Turns questions into AnswerResults over the shared
 * knowledge base and keeps the session's conversation.
 */

import { Logger } from '@nestjs/common';
import type { AssistantConfig } from '../config/assistant.config';
import type { KnowledgeBaseService } from '../knowledge-base/knowledge-base.service';
import type {
  AddDocumentResult,
  LoadDocumentsResult,
  RemoveDocumentResult,
} from '../knowledge-base/knowledge-base.types';
import type { EmbeddingService } from '../embedding/embedding.service';
import { InvalidSearchParameterError } from '../vector-store/vector-store.errors';
import type { ScoredChunk } from '../vector-store/vector-store.types';
import { errorMessage } from '../shared/utils/errors';
import type { AskWorkflowService } from './workflow/ask-workflow.service';
import type { AskStateType } from './workflow/ask-state';
import type { ConversationChainService } from './chains/conversation-chain.service';
import { ConversationMemory } from './memory/conversation-memory';
import {
  ERROR_ANSWER,
  NO_CONTEXT_ANSWER,
  NO_CONTEXT_MESSAGE,
  NO_DOCUMENTS_ANSWER,
  NO_DOCUMENTS_MESSAGE,
  type AnswerResult,
  type AskOptions,
  type ConversationTurn,
  type SearchHit,
  type SourceAttribution,
} from './assistant.types';

export interface OrchestratorDependencies {
  config: AssistantConfig;
  knowledgeBase: KnowledgeBaseService;
  embeddingService: EmbeddingService;
  askWorkflow: AskWorkflowService;
  conversationChain: ConversationChainService;
}

export interface SystemInfo {
  sessionId: string;
  state: string;
  hasDocuments: boolean;
  documentCount: number;
  vectorStore: {
    type: string;
    location: string;
    dimension: number | null;
  };
  documentsDirectory: string;
  llm: {
    provider: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  embedding: {
    provider: string;
    model: string;
  };
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  similarityThreshold: number | null;
  conversationLength: number;
}

export class RetrievalOrchestrator {
  private readonly logger: Logger;
  private readonly memory: ConversationMemory;

  constructor(
    readonly sessionId: string,
    private readonly deps: OrchestratorDependencies,
  ) {
    this.logger = new Logger(`${RetrievalOrchestrator.name}:${sessionId}`);
    this.memory = new ConversationMemory(deps.config.conversation.maxTurns);
  }

  async ask(
    question: string,
    { includeSources = true }: AskOptions = {},
  ): Promise<AnswerResult> {
    if (!this.deps.knowledgeBase.isReady()) {
      return {
        status: 'error',
        question,
        answer: NO_DOCUMENTS_ANSWER,
        message: NO_DOCUMENTS_MESSAGE,
        sources: [],
        sourceCount: 0,
      };
    }

    let state: AskStateType;
    try {
      state = await this.deps.askWorkflow.execute(
        question,
        this.deps.config.retrieval.k,
      );
    } catch (error) {
      return this.errorResult(question, error);
    }

    const sources = includeSources ? this.toSources(state.context) : [];

    switch (state.outcome) {
      case 'answered': {
        const answer = state.answer ?? '';
        this.memory.add(question, answer);
        return {
          status: 'success',
          question,
          answer,
          sources,
          sourceCount: state.context.length,
        };
      }

      case 'no_context':
        return {
          status: 'warning',
          question,
          answer: NO_CONTEXT_ANSWER,
          message: NO_CONTEXT_MESSAGE,
          sources: [],
          sourceCount: 0,
        };

      case 'failed':
      case 'pending':
        return this.errorResult(
          question,
          state.error ?? 'Answer generation did not complete',
        );
    }
  }

  /**
   * Read-only similarity search; never touches the conversation
   *
   * @throws InvalidSearchParameterError unless k is a positive integer
   */
  async search(
    query: string,
    k: number = this.deps.config.retrieval.k,
  ): Promise<SearchHit[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidSearchParameterError('k', k);
    }

    try {
      const vector = await this.deps.embeddingService.embed(query);
      const results =
        await this.deps.knowledgeBase.store.similaritySearchWithScore(
          vector,
          k,
        );

      return results.map(({ chunk, score }) => ({
        content: chunk.content,
        metadata: { ...chunk.metadata },
        score,
      }));
    } catch (error) {
      this.logger.error(`Search failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Multi-turn chat over the remembered turns, without retrieval
   */
  async chat(message: string): Promise<AnswerResult> {
    try {
      const answer = await this.deps.conversationChain.reply(
        this.memory.toMessages(),
        message,
      );
      this.memory.add(message, answer);

      return {
        status: 'success',
        question: message,
        answer,
        sources: [],
        sourceCount: 0,
      };
    } catch (error) {
      return this.errorResult(message, error);
    }
  }

  loadDocuments(target?: string): Promise<LoadDocumentsResult> {
    return this.deps.knowledgeBase.loadDocuments(target);
  }

  addDocument(filePath: string): Promise<AddDocumentResult> {
    return this.deps.knowledgeBase.addDocument(filePath);
  }

  removeDocument(sourceFile: string): Promise<RemoveDocumentResult> {
    return this.deps.knowledgeBase.removeDocument(sourceFile);
  }

  /**
   * Forget the conversation. The index stays ready.
   */
  resetConversation(): void {
    this.memory.clear();
    this.logger.log('Conversation reset');
  }

  getConversationHistory(): ConversationTurn[] {
    return this.memory.getTurns();
  }

  async getSystemInfo(): Promise<SystemInfo> {
    const { config, knowledgeBase } = this.deps;
    const documentCount = await knowledgeBase.store.count();

    return {
      sessionId: this.sessionId,
      state: knowledgeBase.state,
      hasDocuments: knowledgeBase.isReady(),
      documentCount,
      vectorStore: knowledgeBase.store.describe(),
      documentsDirectory: config.documentsDirectory,
      llm: {
        provider: config.generation.provider,
        model: config.generation.model,
        temperature: config.generation.temperature,
        maxTokens: config.generation.maxTokens,
      },
      embedding: {
        provider: config.embedding.provider,
        model: config.embedding.model,
      },
      chunkSize: config.chunking.chunkSize,
      chunkOverlap: config.chunking.chunkOverlap,
      retrievalK: config.retrieval.k,
      similarityThreshold: config.retrieval.similarityThreshold,
      conversationLength: this.memory.length,
    };
  }

  private toSources(passages: ScoredChunk[]): SourceAttribution[] {
    const previewLength = this.deps.config.retrieval.sourcePreviewLength;

    return passages.slice(0, this.deps.config.retrieval.k).map(
      ({ chunk, score }) => ({
        chunkIndex: chunk.metadata.chunkIndex,
        content:
          chunk.content.length > previewLength
            ? `${chunk.content.slice(0, previewLength)}...`
            : chunk.content,
        metadata: { ...chunk.metadata },
        score,
      }),
    );
  }

  private errorResult(question: string, error: unknown): AnswerResult {
    const message = errorMessage(error);
    this.logger.error(`Failed to answer "${question}": ${message}`);

    return {
      status: 'error',
      question,
      answer: ERROR_ANSWER,
      message,
      sources: [],
      sourceCount: 0,
    };
  }
}
