/**
 * Ingestion Types
 */

/**
 * Supported source formats
 */
export enum FileFormat {
  TEXT = 'TEXT',
  MARKDOWN = 'MARKDOWN',
  PDF = 'PDF',
  DOCX = 'DOCX',
}

/**
 * Extension to format mapping. Keys are lower-case and include the dot.
 */
export const EXTENSION_TO_FORMAT: Record<string, FileFormat> = {
  '.txt': FileFormat.TEXT,
  '.md': FileFormat.MARKDOWN,
  '.markdown': FileFormat.MARKDOWN,
  '.pdf': FileFormat.PDF,
  '.docx': FileFormat.DOCX,
};

/**
 * Provenance attached to every loaded document
 */
export interface SourceMetadata {
  /** Path the document was read from */
  sourceFile: string;
  fileName: string;
  /** Extension including the dot, e.g. ".md" */
  fileType: string;
  format: FileFormat;
}

export interface SourceDocument extends SourceMetadata {
  text: string;
}

/**
 * A contiguous piece of a text: `text.slice(startOffset, endOffset) === content`
 */
export interface TextSegment {
  index: number;
  content: string;
  startOffset: number;
  endOffset: number;
}

export interface ChunkMetadata extends SourceMetadata {
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
}

export interface DocumentChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface LoadFailure {
  sourceFile: string;
  reason: string;
}

export interface LoadResult {
  documents: SourceDocument[];
  failures: LoadFailure[];
}

export interface LoadAndSplitResult extends LoadResult {
  chunks: DocumentChunk[];
}

export interface DocumentStats {
  totalChunks: number;
  totalCharacters: number;
  /** Chunk count per file extension */
  fileTypes: Record<string, number>;
  uniqueFiles: number;
  sourceFiles: string[];
}
