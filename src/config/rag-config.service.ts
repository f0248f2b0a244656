import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../shared/errors/configuration.error';
import { RAG_ENV_KEYS, RagEnv, ragEnvSchema } from './rag-config.schema';
import type {
  EmbeddingConfig,
  RagConfig,
  RetrievalConfig,
  TimeoutConfig,
  VectorStoreConfig,
} from './rag-config.types';
import type { ChunkerConfig } from '../chunking/types/chunk.types';

/**
 * Typed view over process configuration, validated once at startup and
 * handed to every component through dependency injection.
 */
@Injectable()
export class RagConfigService implements RagConfig {
  private readonly logger = new Logger(RagConfigService.name);

  readonly chunking: ChunkerConfig;
  readonly vectorStore: VectorStoreConfig;
  readonly embedding: EmbeddingConfig;
  readonly retrieval: RetrievalConfig;
  readonly timeouts: TimeoutConfig;

  constructor(private readonly configService: ConfigService) {
    const env = this.parseEnv();

    this.chunking = Object.freeze({
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      minChunkSize: env.MIN_CHUNK_SIZE,
      maxChunkSize: env.MAX_CHUNK_SIZE,
      separators: Object.freeze([...env.CHUNK_SEPARATORS]),
      keepSeparator: env.CHUNK_KEEP_SEPARATOR,
    });

    this.vectorStore = Object.freeze({
      url: env.QDRANT_URL,
      apiKey: env.QDRANT_API_KEY,
      collectionName: env.COLLECTION_NAME,
      dimensions: env.EMBEDDING_DIMENSIONS,
      metric: env.SIMILARITY_METRIC,
      upsertBatchSize: env.UPSERT_BATCH_SIZE,
    });

    const embeddingModels = {
      ollama: env.EMBEDDING_MODEL_OLLAMA,
      openai: env.EMBEDDING_MODEL_OPENAI,
      google: env.EMBEDDING_MODEL_GOOGLE,
    };
    this.embedding = Object.freeze({
      provider: env.EMBEDDING_PROVIDER,
      model: embeddingModels[env.EMBEDDING_PROVIDER],
      batchSize: env.EMBEDDING_BATCH_SIZE,
    });

    this.retrieval = Object.freeze({
      topK: env.RETRIEVAL_TOP_K,
      rerankEnabled: env.RERANK_ENABLED,
      rerankContentPrefix: env.RERANK_CONTENT_PREFIX,
      queryExpansionEnabled: env.QUERY_EXPANSION_ENABLED,
      maxSearchQueries: env.MAX_SEARCH_QUERIES,
      answerContextDocs: env.ANSWER_CONTEXT_DOCS,
      answerContextChars: env.ANSWER_CONTEXT_CHARS,
    });

    this.timeouts = Object.freeze({
      embeddingMs: env.EMBEDDING_TIMEOUT_MS,
      storeMs: env.STORE_TIMEOUT_MS,
      rerankMs: env.RERANK_TIMEOUT_MS,
      llmMs: env.LLM_TIMEOUT_MS,
    });

    this.logger.log(
      `[Config] embedding=${this.embedding.provider} collection=${this.vectorStore.collectionName} metric=${this.vectorStore.metric} chunkSize=${this.chunking.chunkSize} overlap=${this.chunking.chunkOverlap} topK=${this.retrieval.topK} rerank=${this.retrieval.rerankEnabled}`,
    );
  }

  private parseEnv(): RagEnv {
    const raw: Record<string, unknown> = {};
    for (const key of RAG_ENV_KEYS) {
      const value = this.configService.get<unknown>(key);
      // Blank entries in .env mean "use the default"
      if (value !== undefined && value !== '') {
        raw[key] = value;
      }
    }

    const parsed = ragEnvSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      );
    }
    return parsed.data;
  }
}
