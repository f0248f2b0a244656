/**
 * Chunking Types
 * Strategy kinds, chunker configuration and the immutable document/chunk values
 */

export enum ChunkingStrategy {
  RECURSIVE = 'recursive',
  SEMANTIC = 'semantic',
  MARKDOWN = 'markdown',
  PARAGRAPH = 'paragraph',
  SENTENCE = 'sentence',
  SLIDING_WINDOW = 'sliding_window',
}

export const CHUNKING_STRATEGIES: readonly ChunkingStrategy[] =
  Object.values(ChunkingStrategy);

/** Strategy request accepted from callers; `auto` defers to the selector */
export type StrategyRequest = ChunkingStrategy | 'auto';

export interface ChunkerConfig {
  /** Target chunk size in characters */
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  /** Trailing chunks shorter than this are merged into their predecessor when they fit */
  readonly minChunkSize: number;
  readonly maxChunkSize: number;
  /** Recursive split separators in priority order */
  readonly separators: readonly string[];
  readonly keepSeparator: boolean;
}

export type MetadataValue = string | number | boolean;

export type DocumentMetadata = Readonly<Record<string, MetadataValue>>;

export interface SourceDocument {
  readonly id: string;
  readonly content: string;
  readonly source: string;
  readonly metadata: DocumentMetadata;
}

export interface Chunk {
  /** First 16 hex chars of sha256("<documentId>:<content>") */
  readonly id: string;
  readonly documentId: string;
  readonly source: string;
  readonly content: string;
  readonly chunkIndex: number;
  readonly totalChunks: number;
  readonly tokenCount: number;
  readonly charCount: number;
  /** Producing strategy, or `recursive_fallback` when the requested one failed */
  readonly strategy: string;
  readonly metadata: DocumentMetadata;
}

export interface ChunkingResult {
  readonly spans: readonly string[];
  readonly strategy: string;
  readonly fallbackUsed: boolean;
}
