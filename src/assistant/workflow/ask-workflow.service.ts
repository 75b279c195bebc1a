/**
 * Ask Workflow Service
 * LangGraph pipeline from question to grounded answer:
 * retrieve -> (generate | END)
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { END, START, StateGraph } from '@langchain/langgraph';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../../config/assistant.config';
import { EmbeddingService } from '../../embedding/embedding.service';
import { KnowledgeBaseService } from '../../knowledge-base/knowledge-base.service';
import { CHAT_MODEL } from '../../providers/provider.tokens';
import { AskState, type AskStateType, createInitialState } from './ask-state';
import { createRetrieveNode } from './nodes/retrieve.node';
import { createGenerateNode } from './nodes/generate.node';

@Injectable()
export class AskWorkflowService {
  private readonly logger = new Logger(AskWorkflowService.name);
  private readonly workflow;

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
    @Inject(CHAT_MODEL) private readonly chatModel: BaseChatModel,
    private readonly embeddingService: EmbeddingService,
    private readonly knowledgeBase: KnowledgeBaseService,
  ) {
    this.workflow = this.buildWorkflow();
    this.logger.log('Ask workflow initialized');
  }

  /**
   * Run the pipeline. Stage failures are reported in the returned state.
   */
  async execute(question: string, k: number): Promise<AskStateType> {
    const result = await this.workflow.invoke(createInitialState(question, k));

    this.logger.log(
      `Ask workflow finished: outcome=${result.outcome} passages=${result.context.length} duration=${Date.now() - result.metrics.startTime}ms`,
    );

    return result;
  }

  private buildWorkflow() {
    return new StateGraph(AskState)
      .addNode(
        'retrieve',
        createRetrieveNode(
          this.embeddingService,
          this.knowledgeBase.store,
          this.config.retrieval.similarityThreshold,
        ),
      )
      .addNode(
        'generate',
        createGenerateNode(this.chatModel, this.config.generation.timeoutMs),
      )
      .addEdge(START, 'retrieve')
      .addConditionalEdges(
        'retrieve',
        (state: AskStateType) =>
          state.outcome === 'pending' ? 'generate' : 'done',
        {
          generate: 'generate',
          done: END,
        },
      )
      .addEdge('generate', END)
      .compile();
  }
}
