/**
 * Conversation Chain
 * Multi-turn chat over the remembered turns, without retrieval
 */

import { Inject, Injectable } from '@nestjs/common';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { BaseMessage } from '@langchain/core/messages';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../../config/assistant.config';
import { CHAT_MODEL } from '../../providers/provider.tokens';
import { TimeoutError, withTimeout } from '../../shared/utils/timeout';
import { GenerationTimeoutError } from '../assistant.errors';
import { chatPrompt } from '../prompts/qa.prompt';

@Injectable()
export class ConversationChainService {
  private readonly chain;
  private readonly timeoutMs: number;

  constructor(
    @Inject(CHAT_MODEL) chatModel: BaseChatModel,
    @Inject(ASSISTANT_CONFIG) config: AssistantConfig,
  ) {
    this.chain = chatPrompt.pipe(chatModel).pipe(new StringOutputParser());
    this.timeoutMs = config.generation.timeoutMs;
  }

  /**
   * @throws GenerationTimeoutError when the model does not answer in time
   */
  async reply(history: BaseMessage[], message: string): Promise<string> {
    try {
      const answer = await withTimeout(
        this.chain.invoke({ history, message }),
        this.timeoutMs,
        'Answer generation',
      );
      return answer.trim();
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new GenerationTimeoutError(this.timeoutMs);
      }
      throw error;
    }
  }
}
