/**
 * Embedding Provider Factory
 * Multi-provider support: OpenAI, Google, Ollama
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { ConfigurationError } from '../config/configuration.error';

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
  ) {}

  /**
   * Create the embedding model selected by EMBEDDING_PROVIDER
   */
  createEmbeddingModel(): Embeddings {
    const { provider, model } = this.config.embedding;

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'openai':
        return this.createOpenAIEmbeddings(model);
      case 'google':
        return this.createGoogleEmbeddings(model);
      case 'ollama':
        return this.createOllamaEmbeddings(model);
    }
  }

  private createOpenAIEmbeddings(model: string): OpenAIEmbeddings {
    const { openaiApiKey, openaiBaseUrl } = this.config.credentials;
    if (!openaiApiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY is required for OpenAI embeddings',
        ['OPENAI_API_KEY'],
      );
    }

    return new OpenAIEmbeddings({
      model,
      apiKey: openaiApiKey,
      maxRetries: 0,
      configuration: openaiBaseUrl ? { baseURL: openaiBaseUrl } : undefined,
    });
  }

  private createGoogleEmbeddings(model: string): GoogleGenerativeAIEmbeddings {
    const { googleApiKey } = this.config.credentials;
    if (!googleApiKey) {
      throw new ConfigurationError(
        'GOOGLE_API_KEY is required for Google embeddings',
        ['GOOGLE_API_KEY'],
      );
    }

    return new GoogleGenerativeAIEmbeddings({
      model,
      apiKey: googleApiKey,
      maxRetries: 0,
    });
  }

  private createOllamaEmbeddings(model: string): OllamaEmbeddings {
    return new OllamaEmbeddings({
      model,
      baseUrl: this.config.credentials.ollamaBaseUrl,
      maxRetries: 0,
    });
  }
}
