import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Embeddings } from '@langchain/core/embeddings';
import { RagConfigService } from '../config/rag-config.service';
import { EmbeddingProviderFactory } from './embedding-provider.factory';
import { EMBEDDINGS_MODEL } from './embedding.constants';
import { EmbeddingError } from './errors/embedding-errors';
import { withTimeout } from '../shared/utils/with-timeout';
import { TimeoutError } from '../shared/errors/timeout.error';

/**
 * Embedding Service
 * Batched, time-bounded calls to the embedding provider with dimension checks
 */
@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);

  readonly dimensions: number;
  readonly modelName: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(EMBEDDINGS_MODEL) private readonly model: Embeddings,
    providerFactory: EmbeddingProviderFactory,
    ragConfig: RagConfigService,
  ) {
    const providerConfig = providerFactory.getProviderConfig();
    this.dimensions =
      ragConfig.vectorStore.dimensions ?? providerConfig.dimensions;
    this.modelName = `${providerConfig.provider}/${providerConfig.model}`;
    this.batchSize = ragConfig.embedding.batchSize;
    this.timeoutMs = ragConfig.timeouts.embeddingMs;

    this.logger.log(
      `Initialized with model: ${this.modelName}, dimensions: ${this.dimensions}, batch size: ${this.batchSize}, timeout: ${this.timeoutMs}ms`,
    );
  }

  /**
   * Embed texts in order. Either every text gets a vector or the call fails.
   * @throws EmbeddingError
   */
  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const batchVectors = await this.call(
        () => this.model.embedDocuments(batch),
        'embedDocuments',
      );

      if (batchVectors.length !== batch.length) {
        throw new EmbeddingError(
          `Provider returned ${batchVectors.length} vectors for ${batch.length} texts`,
          'EMBEDDING_FAILED',
        );
      }
      batchVectors.forEach((vector) => this.assertDimensions(vector));
      vectors.push(...batchVectors);
    }

    this.logger.debug(
      `[Embed] texts=${texts.length} batches=${Math.ceil(texts.length / this.batchSize)} status=success`,
    );
    return vectors;
  }

  /** @throws EmbeddingError */
  async embedQuery(text: string): Promise<number[]> {
    const vector = await this.call(
      () => this.model.embedQuery(text),
      'embedQuery',
    );
    this.assertDimensions(vector);
    return vector;
  }

  private async call<T>(
    operation: () => Promise<T>,
    label: string,
  ): Promise<T> {
    try {
      return await withTimeout(operation(), this.timeoutMs, label);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new EmbeddingError(error.message, 'EMBEDDING_TIMEOUT', error);
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new EmbeddingError(
        `${label} failed: ${cause.message}`,
        'EMBEDDING_FAILED',
        cause,
      );
    }
  }

  private assertDimensions(vector: number[]): void {
    if (vector.length !== this.dimensions) {
      throw new EmbeddingError(
        `Expected ${this.dimensions}-dimensional vectors, provider returned ${vector.length}`,
        'EMBEDDING_DIMENSION_MISMATCH',
      );
    }
  }
}
