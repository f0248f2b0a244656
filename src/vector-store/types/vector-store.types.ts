import type { DocumentMetadata, MetadataValue } from '../../chunking/types';

/** Equality filter; keys name payload fields or document metadata keys */
export type MetadataFilter = Readonly<Record<string, MetadataValue>>;

export interface SearchResult {
  readonly chunkId: string;
  readonly documentId: string;
  readonly source: string;
  readonly content: string;
  readonly metadata: DocumentMetadata;
  readonly chunkIndex: number;
  readonly strategy: string;
  /** Higher is more similar */
  readonly score: number;
  /** Lower is more similar, derived from the metric */
  readonly distance: number;
  /** 1-based, best first */
  readonly rank: number;
}

export interface StoredChunk {
  readonly chunkId: string;
  readonly documentId: string;
  readonly source: string;
  readonly content: string;
  readonly chunkIndex: number;
  readonly totalChunks: number;
  readonly strategy: string;
  readonly metadata: DocumentMetadata;
}

export interface StoreStats {
  totalChunks: number;
  collectionName: string;
  embeddingModel: string;
  dimensions: number;
  metric: string;
  note?: string;
}

export interface CollectionOptions {
  collectionName: string;
  /** Qdrant URL the collection lives behind */
  persistLocation: string;
  embeddingDimension: number;
}
