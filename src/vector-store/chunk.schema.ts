import { z } from 'zod';
import { FileFormat } from '../ingestion/types/ingestion.types';

export const chunkMetadataSchema = z.object({
  sourceFile: z.string(),
  fileName: z.string(),
  fileType: z.string(),
  format: z.nativeEnum(FileFormat),
  chunkIndex: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
});

export const chunkPayloadSchema = z.object({
  content: z.string(),
  metadata: chunkMetadataSchema,
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;
