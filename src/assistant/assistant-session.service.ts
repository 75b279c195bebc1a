/**
 * Assistant Session Service
 * Hands out one RetrievalOrchestrator per session id. At most
 * `conversation.maxSessions` are kept; the least recently used goes first.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { EmbeddingService } from '../embedding/embedding.service';
import { KnowledgeBaseService } from '../knowledge-base/knowledge-base.service';
import { ConversationChainService } from './chains/conversation-chain.service';
import { RetrievalOrchestrator } from './retrieval-orchestrator';
import { AskWorkflowService } from './workflow/ask-workflow.service';

export const DEFAULT_SESSION_ID = 'default';

@Injectable()
export class AssistantSessionService {
  private readonly logger = new Logger(AssistantSessionService.name);
  // Iteration order is recency order: oldest first
  private readonly sessions = new Map<string, RetrievalOrchestrator>();

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
    private readonly knowledgeBase: KnowledgeBaseService,
    private readonly embeddingService: EmbeddingService,
    private readonly askWorkflow: AskWorkflowService,
    private readonly conversationChain: ConversationChainService,
  ) {}

  getOrCreate(sessionId: string = DEFAULT_SESSION_ID): RetrievalOrchestrator {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }

    const orchestrator = new RetrievalOrchestrator(sessionId, {
      config: this.config,
      knowledgeBase: this.knowledgeBase,
      embeddingService: this.embeddingService,
      askWorkflow: this.askWorkflow,
      conversationChain: this.conversationChain,
    });
    this.sessions.set(sessionId, orchestrator);
    this.logger.log(`Created session ${sessionId}`);

    this.evictExcess();
    return orchestrator;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  private evictExcess(): void {
    const { maxSessions } = this.config.conversation;

    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= maxSessions) {
        break;
      }
      this.sessions.delete(sessionId);
      this.logger.log(`Evicted idle session ${sessionId}`);
    }
  }
}
