/**
 * Provider Types and Configurations
 */

/**
 * Embedding Provider Type
 */
export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

/**
 * LLM Provider Type
 */
export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = [
  'openai',
  'google',
  'ollama',
];

export const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

/**
 * Provider credentials and endpoints shared by chat and embedding models
 */
export interface ProviderCredentials {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  googleApiKey?: string;
  anthropicApiKey?: string;
  ollamaBaseUrl: string;
}

/**
 * Settings every chat model is built with
 */
export interface ChatModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
}

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

export function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return EMBEDDING_PROVIDERS.some((provider) => provider === value);
}
