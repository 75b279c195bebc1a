/**
 * Recursive Chunker
 * Splits text into windows of at most `maxSize` characters, cutting at the
 * largest boundary that fits. Adjacent chunks share exactly `overlap`
 * characters so the input can be rebuilt from the chunks.
 */

import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ASSISTANT_CONFIG, type AssistantConfig } from '../../config/assistant.config';
import type {
  DocumentChunk,
  SourceDocument,
  TextSegment,
} from '../types/ingestion.types';

/**
 * Boundary groups, largest unit first. Within a group the latest match wins.
 */
export const BOUNDARY_GROUPS: readonly (readonly string[])[] = [
  ['\n\n'],
  ['\n'],
  ['. ', '! ', '? '],
  [' ', '\t'],
];

export class InvalidChunkingParametersError extends Error {
  constructor(
    public readonly maxSize: number,
    public readonly overlap: number,
  ) {
    super(
      `Invalid chunking parameters: maxSize=${maxSize}, overlap=${overlap}. ` +
        'maxSize must be a positive integer and overlap an integer in [0, maxSize)',
    );
    this.name = 'InvalidChunkingParametersError';
    Error.captureStackTrace(this, this.constructor);
  }
}

function validateParameters(maxSize: number, overlap: number): void {
  if (
    !Number.isInteger(maxSize) ||
    !Number.isInteger(overlap) ||
    maxSize < 1 ||
    overlap < 0 ||
    overlap >= maxSize
  ) {
    throw new InvalidChunkingParametersError(maxSize, overlap);
  }
}

/**
 * End offset of the latest boundary in (minEnd, limit], or -1
 */
function findBoundary(
  text: string,
  separators: readonly string[],
  minEnd: number,
  limit: number,
): number {
  let best = -1;

  for (const separator of separators) {
    const index = text.lastIndexOf(separator, limit - separator.length);
    if (index < 0) {
      continue;
    }

    const end = index + separator.length;
    if (end > minEnd && end > best) {
      best = end;
    }
  }

  return best;
}

function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return (
    before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff
  );
}

export function splitText(
  text: string,
  maxSize: number,
  overlap: number,
): TextSegment[] {
  validateParameters(maxSize, overlap);

  const segments: TextSegment[] = [];
  let start = 0;

  while (start < text.length) {
    if (text.length - start <= maxSize) {
      segments.push({
        index: segments.length,
        content: text.slice(start),
        startOffset: start,
        endOffset: text.length,
      });
      break;
    }

    const limit = start + maxSize;
    // The next window must start after this one
    const minEnd = start + overlap;

    let end = -1;
    for (const group of BOUNDARY_GROUPS) {
      end = findBoundary(text, group, minEnd, limit);
      if (end > 0) {
        break;
      }
    }

    if (end < 0) {
      end = limit;
      // Step back rather than cut a surrogate pair here or at the next start
      if (
        (splitsSurrogatePair(text, end) ||
          splitsSurrogatePair(text, end - overlap)) &&
        end - 1 > minEnd
      ) {
        end -= 1;
      }
    }

    segments.push({
      index: segments.length,
      content: text.slice(start, end),
      startOffset: start,
      endOffset: end,
    });

    start = end - overlap;
  }

  return segments;
}

@Injectable()
export class RecursiveChunkerService {
  constructor(
    @Inject(ASSISTANT_CONFIG) private readonly config: AssistantConfig,
  ) {}

  /**
   * @param maxSize - Defaults to CHUNK_SIZE
   * @param overlap - Defaults to CHUNK_OVERLAP
   * @throws InvalidChunkingParametersError
   */
  split(text: string, maxSize?: number, overlap?: number): TextSegment[] {
    return splitText(
      text,
      maxSize ?? this.config.chunking.chunkSize,
      overlap ?? this.config.chunking.chunkOverlap,
    );
  }

  splitDocument(document: SourceDocument): DocumentChunk[] {
    return this.split(document.text).map((segment) => ({
      id: uuidv4(),
      content: segment.content,
      metadata: {
        sourceFile: document.sourceFile,
        fileName: document.fileName,
        fileType: document.fileType,
        format: document.format,
        chunkIndex: segment.index,
        startOffset: segment.startOffset,
        endOffset: segment.endOffset,
      },
    }));
  }
}
