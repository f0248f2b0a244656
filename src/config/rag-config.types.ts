import type { ChunkerConfig } from '../chunking/types/chunk.types';
import type { EmbeddingProvider } from '../embedding/types';

export type SimilarityMetric = 'cosine' | 'dot' | 'euclid';

export interface VectorStoreConfig {
  url: string;
  apiKey?: string;
  collectionName: string;
  /** Overrides the embedding provider's known dimension when set */
  dimensions?: number;
  metric: SimilarityMetric;
  upsertBatchSize: number;
}

export interface RetrievalConfig {
  topK: number;
  rerankEnabled: boolean;
  rerankContentPrefix: number;
  queryExpansionEnabled: boolean;
  maxSearchQueries: number;
  answerContextDocs: number;
  answerContextChars: number;
}

export interface TimeoutConfig {
  embeddingMs: number;
  /** Every Qdrant call */
  storeMs: number;
  rerankMs: number;
  llmMs: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  /** EMBEDDING_MODEL_<PROVIDER>; the provider default applies when unset */
  model?: string;
  batchSize: number;
}

export interface RagConfig {
  chunking: ChunkerConfig;
  vectorStore: VectorStoreConfig;
  embedding: EmbeddingConfig;
  retrieval: RetrievalConfig;
  timeouts: TimeoutConfig;
}
