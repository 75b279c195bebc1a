/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { ConfigurationError } from '../config/configuration.error';
import type { ChatModelSettings } from './types';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
  ) {}

  /**
   * Create the chat model of the configured LLM_PROVIDER
   */
  createChatModel(): BaseChatModel {
    const { provider, model, temperature, maxTokens } = this.config.generation;
    const resolved: ChatModelSettings = {
      model,
      temperature,
      maxTokens,
      // Failures surface to the caller as an error result
      maxRetries: 0,
    };

    this.logger.log(
      `Creating chat model for provider: ${provider}/${resolved.model}`,
    );

    switch (provider) {
      case 'openai':
        return this.createOpenAIModel(resolved);

      case 'google':
        return this.createGoogleModel(resolved);

      case 'anthropic':
        return this.createAnthropicModel(resolved) as unknown as BaseChatModel;

      case 'ollama':
        return this.createOllamaModel(resolved);
    }
  }

  private createOpenAIModel(options: ChatModelSettings): ChatOpenAI {
    const { openaiApiKey, openaiBaseUrl } = this.config.credentials;
    if (!openaiApiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY is required for OpenAI provider',
        ['OPENAI_API_KEY'],
      );
    }

    return new ChatOpenAI({
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      apiKey: openaiApiKey,
      configuration: {
        baseURL: openaiBaseUrl || 'https://api.openai.com/v1',
      },
    });
  }

  private createGoogleModel(
    options: ChatModelSettings,
  ): ChatGoogleGenerativeAI {
    const { googleApiKey } = this.config.credentials;
    if (!googleApiKey) {
      throw new ConfigurationError(
        'GOOGLE_API_KEY is required for Google provider',
        ['GOOGLE_API_KEY'],
      );
    }

    return new ChatGoogleGenerativeAI({
      model: options.model,
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      apiKey: googleApiKey,
    });
  }

  private createAnthropicModel(
    options: ChatModelSettings,
  ): ChatAnthropic {
    const { anthropicApiKey } = this.config.credentials;
    if (!anthropicApiKey) {
      throw new ConfigurationError(
        'ANTHROPIC_API_KEY is required for Anthropic provider',
        ['ANTHROPIC_API_KEY'],
      );
    }

    return new ChatAnthropic({
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      apiKey: anthropicApiKey,
    });
  }

  private createOllamaModel(options: ChatModelSettings): ChatOllama {
    return new ChatOllama({
      model: options.model,
      temperature: options.temperature,
      numPredict: options.maxTokens,
      maxRetries: options.maxRetries,
      baseUrl: this.config.credentials.ollamaBaseUrl,
    });
  }
}
