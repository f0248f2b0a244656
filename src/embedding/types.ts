export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'google'] as const;

export type EmbeddingProvider = (typeof EMBEDDING_PROVIDERS)[number];

export interface EmbeddingProviderConfig {
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
  baseURL?: string;
}
