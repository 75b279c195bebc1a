/**
 * Environment validation
 * Type and range checks for the raw environment, run by ConfigModule before
 * anything else is constructed. Cross-field rules live in assistant.config.ts.
 */

import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { EMBEDDING_PROVIDERS, LLM_PROVIDERS } from '../providers/types';
import { VECTOR_STORE_TYPES } from './assistant.config';
import { ConfigurationError } from './configuration.error';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  declare CHUNK_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  declare CHUNK_OVERLAP?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare RETRIEVAL_K?: number;

  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  declare SIMILARITY_THRESHOLD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare SOURCE_PREVIEW_LENGTH?: number;

  @IsOptional()
  @IsIn(VECTOR_STORE_TYPES)
  declare VECTOR_DB_TYPE?: string;

  @IsOptional()
  @IsString()
  declare VECTOR_DB_DIRECTORY?: string;

  @IsOptional()
  @IsIn(LLM_PROVIDERS)
  declare LLM_PROVIDER?: string;

  @IsOptional()
  @IsIn(EMBEDDING_PROVIDERS)
  declare EMBEDDING_PROVIDER?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  declare TEMPERATURE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare MAX_TOKENS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare GENERATION_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare EMBEDDING_BATCH_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare EMBEDDING_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare CONVERSATION_MAX_TURNS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  declare MAX_SESSIONS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  declare PORT?: number;
}

/**
 * ConfigModule `validate` hook. Returns the raw record untouched so that
 * ConfigService keeps serving the original strings.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const candidate = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(candidate);

  if (errors.length > 0) {
    const details = errors.map(
      (error) =>
        `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
    );

    throw new ConfigurationError(
      `Invalid environment configuration - ${details.join('; ')}`,
      errors.map((error) => error.property),
    );
  }

  return config;
}
