/**
 * Assistant Configuration
 * Built once at startup and injected under ASSISTANT_CONFIG. Components never
 * read the environment themselves.
 */

import {
  type EmbeddingProvider,
  type LLMProvider,
  type ProviderCredentials,
  isEmbeddingProvider,
  isLLMProvider,
} from '../providers/types';
import { ConfigurationError } from './configuration.error';

export const ASSISTANT_CONFIG = 'ASSISTANT_CONFIG';

export type VectorStoreType = 'local' | 'qdrant';

export const VECTOR_STORE_TYPES: readonly VectorStoreType[] = [
  'local',
  'qdrant',
];

export interface ChunkingConfig {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
}

export interface RetrievalConfig {
  readonly k: number;
  /** Minimum cosine similarity for a passage to reach the prompt; null disables the cutoff */
  readonly similarityThreshold: number | null;
  readonly sourcePreviewLength: number;
}

export interface GenerationConfig {
  readonly provider: LLMProvider;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly timeoutMs: number;
}

export interface EmbeddingConfig {
  readonly provider: EmbeddingProvider;
  readonly model: string;
  readonly batchSize: number;
  readonly timeoutMs: number;
}

export interface VectorStoreConfig {
  readonly type: VectorStoreType;
  readonly directory: string;
  readonly qdrantUrl: string;
  readonly qdrantApiKey?: string;
  readonly collectionName: string;
}

export interface ConversationConfig {
  /** Oldest turns are evicted past this size; null keeps every turn */
  readonly maxTurns: number | null;
  /** Least recently used sessions are dropped past this count */
  readonly maxSessions: number;
}

export interface AssistantConfig {
  readonly documentsDirectory: string;
  readonly chunking: ChunkingConfig;
  readonly retrieval: RetrievalConfig;
  readonly generation: GenerationConfig;
  readonly embedding: EmbeddingConfig;
  readonly vectorStore: VectorStoreConfig;
  readonly conversation: ConversationConfig;
  readonly credentials: ProviderCredentials;
}

export type EnvReader = (key: string) => string | undefined;

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-3-5-haiku-20241022',
  ollama: 'gemma3:1b',
};

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
  ollama: 'bge-m3',
};

const PROVIDER_SECRETS: Record<LLMProvider, string | null> = {
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
};

function isVectorStoreType(value: string): value is VectorStoreType {
  return VECTOR_STORE_TYPES.some((type) => type === value);
}

/**
 * Build and validate the assistant configuration
 *
 * @param read - Lookup for raw variables (ConfigService in the app, a record in tests)
 * @throws ConfigurationError on missing secrets, malformed values or an
 * overlap that is not smaller than the chunk size
 */
export function buildAssistantConfig(read: EnvReader): AssistantConfig {
  const text = (key: string): string | undefined => {
    const raw = read(key)?.trim();
    return raw ? raw : undefined;
  };

  const integer = (key: string, defaultValue: number, min: number): number => {
    const raw = text(key);
    if (raw === undefined) {
      return defaultValue;
    }

    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new ConfigurationError(
        `${key} must be an integer >= ${min}, got "${raw}"`,
        [key],
      );
    }
    return parsed;
  };

  const decimal = (
    key: string,
    min: number,
    max: number,
  ): number | undefined => {
    const raw = text(key);
    if (raw === undefined) {
      return undefined;
    }

    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min || parsed > max) {
      throw new ConfigurationError(
        `${key} must be a number between ${min} and ${max}, got "${raw}"`,
        [key],
      );
    }
    return parsed;
  };

  // Chunking
  const chunkSize = integer('CHUNK_SIZE', 1000, 1);
  const chunkOverlap = integer('CHUNK_OVERLAP', 200, 0);

  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CHUNK_SIZE (${chunkSize})`,
      ['CHUNK_OVERLAP', 'CHUNK_SIZE'],
    );
  }

  // Providers
  const llmProviderValue = text('LLM_PROVIDER') ?? 'openai';
  if (!isLLMProvider(llmProviderValue)) {
    throw new ConfigurationError(
      `Unsupported LLM_PROVIDER: ${llmProviderValue}`,
      ['LLM_PROVIDER'],
    );
  }

  const embeddingProviderValue = text('EMBEDDING_PROVIDER') ?? 'openai';
  if (!isEmbeddingProvider(embeddingProviderValue)) {
    throw new ConfigurationError(
      `Unsupported EMBEDDING_PROVIDER: ${embeddingProviderValue}`,
      ['EMBEDDING_PROVIDER'],
    );
  }

  const credentials: ProviderCredentials = {
    openaiApiKey: text('OPENAI_API_KEY'),
    openaiBaseUrl: text('OPENAI_BASE_URL'),
    googleApiKey: text('GOOGLE_API_KEY'),
    anthropicApiKey: text('ANTHROPIC_API_KEY'),
    ollamaBaseUrl: text('OLLAMA_BASE_URL') ?? 'http://localhost:11434',
  };

  const requiredSecrets = new Set<string>();
  for (const provider of [llmProviderValue, embeddingProviderValue]) {
    const secret = PROVIDER_SECRETS[provider];
    if (secret && !text(secret)) {
      requiredSecrets.add(secret);
    }
  }

  if (requiredSecrets.size > 0) {
    const missing = Array.from(requiredSecrets);
    throw new ConfigurationError(
      `${missing.join(', ')} environment variable is required`,
      missing,
    );
  }

  // Vector store
  const vectorStoreType = text('VECTOR_DB_TYPE') ?? 'local';
  if (!isVectorStoreType(vectorStoreType)) {
    throw new ConfigurationError(
      `Unsupported vector database type: ${vectorStoreType}. Expected one of: ${VECTOR_STORE_TYPES.join(', ')}`,
      ['VECTOR_DB_TYPE'],
    );
  }

  const maxTurns = text('CONVERSATION_MAX_TURNS');

  return {
    documentsDirectory: text('DOCS_DIRECTORY') ?? './documents',
    chunking: { chunkSize, chunkOverlap },
    retrieval: {
      k: integer('RETRIEVAL_K', 4, 1),
      similarityThreshold: decimal('SIMILARITY_THRESHOLD', -1, 1) ?? null,
      sourcePreviewLength: integer('SOURCE_PREVIEW_LENGTH', 200, 1),
    },
    generation: {
      provider: llmProviderValue,
      model: text('LLM_MODEL') ?? DEFAULT_CHAT_MODELS[llmProviderValue],
      temperature: decimal('TEMPERATURE', 0, 2) ?? 0.7,
      maxTokens: integer('MAX_TOKENS', 1000, 1),
      timeoutMs: integer('GENERATION_TIMEOUT_MS', 60000, 1),
    },
    embedding: {
      provider: embeddingProviderValue,
      model:
        text('EMBEDDING_MODEL') ??
        DEFAULT_EMBEDDING_MODELS[embeddingProviderValue],
      batchSize: integer('EMBEDDING_BATCH_SIZE', 64, 1),
      timeoutMs: integer('EMBEDDING_TIMEOUT_MS', 60000, 1),
    },
    vectorStore: {
      type: vectorStoreType,
      directory: text('VECTOR_DB_DIRECTORY') ?? './vector_db',
      qdrantUrl: text('QDRANT_URL') ?? 'http://localhost:6333',
      qdrantApiKey: text('QDRANT_API_KEY'),
      collectionName: text('QDRANT_COLLECTION') ?? 'documents',
    },
    conversation: {
      maxTurns:
        maxTurns === undefined
          ? null
          : integer('CONVERSATION_MAX_TURNS', 0, 1),
      maxSessions: integer('MAX_SESSIONS', 1000, 1),
    },
    credentials,
  };
}
