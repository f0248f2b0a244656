import type { Chunk, ChunkingStrategy } from '../types';

export interface ChunkStatistics {
  totalChunks: number;
  totalTokens: number;
  averageChunkChars: number;
  durationMs: number;
}

export interface ChunkOutputDto {
  documentId: string;
  chunks: Chunk[];
  /** Strategy chosen for the document before any fallback */
  selectedStrategy: ChunkingStrategy;
  /** Label recorded on each chunk */
  strategy: string;
  fallbackUsed: boolean;
  statistics: ChunkStatistics;
}
