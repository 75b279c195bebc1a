import { Module } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { LLMProviderFactory } from './llm-provider.factory';
import { CHAT_MODEL, EMBEDDINGS } from './provider.tokens';

/**
 * Builds the configured embedding and chat models once per process
 */
@Module({
  providers: [
    EmbeddingProviderFactory,
    LLMProviderFactory,
    {
      provide: EMBEDDINGS,
      inject: [EmbeddingProviderFactory],
      useFactory: (factory: EmbeddingProviderFactory): Embeddings =>
        factory.createEmbeddingModel(),
    },
    {
      provide: CHAT_MODEL,
      inject: [LLMProviderFactory],
      useFactory: (factory: LLMProviderFactory): BaseChatModel =>
        factory.createChatModel(),
    },
  ],
  exports: [EMBEDDINGS, CHAT_MODEL],
})
export class ProvidersModule {}
