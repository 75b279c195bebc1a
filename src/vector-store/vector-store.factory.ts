/**
 * Vector Store Factory
 * Selects the backend named by VECTOR_DB_TYPE. Unknown types fail fast.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import {
  ASSISTANT_CONFIG,
  type AssistantConfig,
} from '../config/assistant.config';
import { ConfigurationError } from '../config/configuration.error';
import { LocalVectorStore } from './backends/local-vector.store';
import { QdrantVectorStore } from './backends/qdrant-vector.store';
import type { VectorStore } from './vector-store.types';

@Injectable()
export class VectorStoreFactory {
  private readonly logger = new Logger(VectorStoreFactory.name);

  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
  ) {}

  create(): VectorStore {
    const { vectorStore } = this.config;

    this.logger.log(`Creating vector store: ${vectorStore.type}`);

    switch (vectorStore.type) {
      case 'local':
        return new LocalVectorStore(vectorStore.directory);

      case 'qdrant':
        return new QdrantVectorStore(
          new QdrantClient({
            url: vectorStore.qdrantUrl,
            apiKey: vectorStore.qdrantApiKey,
          }),
          vectorStore.collectionName,
          vectorStore.qdrantUrl,
        );

      default: {
        const unsupported: never = vectorStore.type;
        throw new ConfigurationError(
          `Unsupported vector database type: ${String(unsupported)}`,
          ['VECTOR_DB_TYPE'],
        );
      }
    }
  }
}
