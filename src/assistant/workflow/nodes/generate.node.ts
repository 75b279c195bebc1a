/**
 * Generate Node
 * One non-streaming model call over the fixed prompt
 */

import { Logger } from '@nestjs/common';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { buildContextBlock, qaPrompt } from '../../prompts/qa.prompt';
import { GenerationTimeoutError } from '../../assistant.errors';
import { errorMessage } from '../../../shared/utils/errors';
import { TimeoutError, withTimeout } from '../../../shared/utils/timeout';
import type { AskStateType } from '../ask-state';

const logger = new Logger('GenerateNode');

export function createGenerateNode(model: BaseChatModel, timeoutMs: number) {
  const chain = qaPrompt.pipe(model).pipe(new StringOutputParser());

  return async (state: AskStateType): Promise<Partial<AskStateType>> => {
    const startTime = Date.now();

    try {
      const answer = await withTimeout(
        chain.invoke({
          context: buildContextBlock(state.context),
          question: state.question,
        }),
        timeoutMs,
        'Answer generation',
      ).catch((error: unknown) => {
        throw error instanceof TimeoutError
          ? new GenerationTimeoutError(timeoutMs)
          : error;
      });

      logger.log(
        `[Generate] passages=${state.context.length} duration=${Date.now() - startTime}ms`,
      );

      return {
        answer: answer.trim(),
        outcome: 'answered',
        metrics: {
          ...state.metrics,
          generationDuration: Date.now() - startTime,
        },
      };
    } catch (error) {
      logger.error(`[Generate] failed: ${errorMessage(error)}`);

      return {
        outcome: 'failed',
        error: errorMessage(error),
        metrics: {
          ...state.metrics,
          generationDuration: Date.now() - startTime,
        },
      };
    }
  };
}
