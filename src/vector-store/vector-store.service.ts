import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { RagConfigService } from '../config/rag-config.service';
import type { SimilarityMetric } from '../config/rag-config.types';
import { EmbeddingService } from '../embedding/embedding.service';
import { EmbeddingError } from '../embedding/errors/embedding-errors';
import type { Chunk } from '../chunking/types';
import {
  Outcome,
  SoftOutcome,
  degraded,
  failed,
  ok,
} from '../shared/types/outcome';
import { withTimeout } from '../shared/utils/with-timeout';
import { errorMessage } from '../shared/utils/error-message';
import { QDRANT_CLIENT } from './vector-store.constants';
import {
  CollectionMismatchError,
  StoreUnavailableError,
} from './errors/vector-store-errors';
import type {
  CollectionOptions,
  MetadataFilter,
  SearchResult,
  StoreStats,
  StoredChunk,
} from './types/vector-store.types';
import { WriteQueue } from './utils/write-queue';
import { toPointId } from './utils/point-id';
import { QDRANT_DISTANCE, toScoreDistance } from './utils/similarity';
import {
  ChunkPayload,
  TOP_LEVEL_FILTER_KEYS,
  parseChunkPayload,
  toChunkPayload,
} from './utils/chunk-payload';

interface QdrantFilter {
  must?: Array<{ key: string; match: { value: string | number | boolean } }>;
}

interface PayloadPoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
}

interface ScoredPayloadPoint extends PayloadPoint {
  score: number;
}

/**
 * Vector Store Manager
 * Owns one Qdrant collection: embeds and upserts chunks, answers similarity
 * queries and reports on the collection. Writes are serialized; reads are not.
 */
@Injectable()
export class VectorStoreService implements OnModuleInit {
  private readonly logger = new Logger(VectorStoreService.name);
  private readonly writes = new WriteQueue();

  private readonly collectionName: string;
  private readonly metric: SimilarityMetric;
  private readonly upsertBatchSize: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(QDRANT_CLIENT) private readonly client: QdrantClient,
    private readonly embedding: EmbeddingService,
    private readonly ragConfig: RagConfigService,
  ) {
    this.collectionName = ragConfig.vectorStore.collectionName;
    this.metric = ragConfig.vectorStore.metric;
    this.upsertBatchSize = ragConfig.vectorStore.upsertBatchSize;
    this.timeoutMs = ragConfig.timeouts.storeMs;
  }

  get options(): CollectionOptions {
    return {
      collectionName: this.collectionName,
      persistLocation: this.ragConfig.vectorStore.url,
      embeddingDimension: this.embedding.dimensions,
    };
  }

  async onModuleInit(): Promise<void> {
    await this.initialize();
  }

  /**
   * Open the configured collection, creating it when missing. Existing data is
   * never dropped.
   * @throws CollectionMismatchError when the stored vector size differs
   * @throws StoreUnavailableError when Qdrant cannot be reached
   */
  async initialize(): Promise<CollectionOptions> {
    const { collectionName, persistLocation, embeddingDimension } = this.options;

    try {
      const created = await this.ensureCollection();
      this.logger.log(
        `[VectorStore] collection=${collectionName} location=${persistLocation} dimensions=${embeddingDimension} metric=${this.metric} status=${created ? 'created' : 'opened'}`,
      );
      return this.options;
    } catch (error) {
      this.logger.error(
        `[VectorStore] collection=${collectionName} status=init_failed reason="${errorMessage(error)}"`,
      );
      if (error instanceof CollectionMismatchError) {
        throw error;
      }
      throw new StoreUnavailableError('initialize', toError(error));
    }
  }

  /**
   * Embed every chunk, then upsert them all. Nothing is written when
   * embedding fails.
   */
  async add(
    chunks: readonly Chunk[],
  ): Promise<Outcome<number, EmbeddingError | StoreUnavailableError>> {
    if (chunks.length === 0) {
      return ok(0);
    }

    let vectors: number[][];
    try {
      vectors = await this.embedding.embedDocuments(
        chunks.map((chunk) => chunk.content),
      );
    } catch (error) {
      const embeddingError =
        error instanceof EmbeddingError
          ? error
          : new EmbeddingError(errorMessage(error), 'EMBEDDING_FAILED');
      this.logger.error(
        `[VectorStore] op=add chunks=${chunks.length} status=embedding_failed code=${embeddingError.code} reason="${embeddingError.message}"`,
      );
      return failed(embeddingError);
    }

    const insertedAt = Date.now();
    const points = chunks.map((chunk, i) => ({
      id: toPointId(chunk.id),
      vector: vectors[i],
      payload: toChunkPayload(chunk, insertedAt, i),
    }));

    try {
      await this.writes.run(async () => {
        for (let i = 0; i < points.length; i += this.upsertBatchSize) {
          await this.bounded(
            this.client.upsert(this.collectionName, {
              wait: true,
              points: points.slice(i, i + this.upsertBatchSize),
            }),
            'upsert',
          );
        }
      });
    } catch (error) {
      const unavailable = new StoreUnavailableError('upsert', toError(error));
      this.logger.error(`[VectorStore] op=add status=failed reason="${unavailable.message}"`);
      return failed(unavailable);
    }

    this.logger.log(
      `[VectorStore] op=add collection=${this.collectionName} chunks=${chunks.length} status=success`,
    );
    return ok(chunks.length);
  }

  /**
   * The `k` nearest chunks, best first. An empty collection is an `ok` empty
   * list; an unreachable store or embedder is a `degraded` empty list.
   */
  async search(
    query: string,
    k: number = this.ragConfig.retrieval.topK,
    filter?: MetadataFilter,
  ): Promise<SoftOutcome<SearchResult[]>> {
    if (k <= 0) {
      return ok([]);
    }

    let vector: number[];
    try {
      vector = await this.embedding.embedQuery(query);
    } catch (error) {
      return this.degradedSearch('embed_query', error);
    }

    try {
      const response = await this.bounded(
        this.client.query(this.collectionName, {
          query: vector,
          limit: k,
          filter: buildFilter(filter),
          with_payload: true,
        }),
        'query',
      );

      const results = this.toSearchResults(response.points);
      this.logger.debug(
        `[VectorStore] op=search k=${k} results=${results.length} status=success`,
      );
      return ok(results);
    } catch (error) {
      return this.degradedSearch('query', error);
    }
  }

  async stats(): Promise<SoftOutcome<StoreStats>> {
    const base = {
      collectionName: this.collectionName,
      embeddingModel: this.embedding.modelName,
      dimensions: this.embedding.dimensions,
      metric: this.metric,
    };

    try {
      const { count } = await this.bounded(
        this.client.count(this.collectionName, { exact: true }),
        'count',
      );
      return ok({ ...base, totalChunks: count });
    } catch (error) {
      const unavailable = new StoreUnavailableError('stats', toError(error));
      this.logger.warn(`[VectorStore] op=stats status=degraded reason="${unavailable.message}"`);
      return degraded(
        { ...base, totalChunks: 0, note: unavailable.message },
        unavailable.message,
      );
    }
  }

  /** Drop every chunk and recreate the empty collection. Idempotent. */
  async clear(): Promise<Outcome<void, StoreUnavailableError>> {
    try {
      await this.writes.run(async () => {
        await this.bounded(
          this.client.deleteCollection(this.collectionName),
          'delete_collection',
        );
        await this.ensureCollection();
      });
    } catch (error) {
      const unavailable = new StoreUnavailableError('clear', toError(error));
      this.logger.error(`[VectorStore] op=clear status=failed reason="${unavailable.message}"`);
      return failed(unavailable);
    }

    this.logger.log(`[VectorStore] op=clear collection=${this.collectionName} status=success`);
    return ok(undefined);
  }

  /** Remove chunks by id; unknown ids are ignored */
  async delete(
    chunkIds: readonly string[],
  ): Promise<Outcome<number, StoreUnavailableError>> {
    if (chunkIds.length === 0) {
      return ok(0);
    }

    try {
      await this.writes.run(() =>
        this.bounded(
          this.client.delete(this.collectionName, {
            wait: true,
            points: chunkIds.map(toPointId),
          }),
          'delete',
        ),
      );
    } catch (error) {
      const unavailable = new StoreUnavailableError('delete', toError(error));
      this.logger.error(`[VectorStore] op=delete status=failed reason="${unavailable.message}"`);
      return failed(unavailable);
    }

    this.logger.log(`[VectorStore] op=delete ids=${chunkIds.length} status=success`);
    return ok(chunkIds.length);
  }

  /** Stored chunks in insertion order */
  async list(limit: number): Promise<SoftOutcome<StoredChunk[]>> {
    try {
      const response = await this.bounded(
        this.client.scroll(this.collectionName, {
          limit,
          with_payload: true,
          with_vector: false,
        }),
        'scroll',
      );

      const chunks = this.parsePoints(response.points)
        .sort(byInsertion)
        .map(({ payload }) => toStoredChunk(payload));
      return ok(chunks);
    } catch (error) {
      const unavailable = new StoreUnavailableError('list', toError(error));
      this.logger.warn(`[VectorStore] op=list status=degraded reason="${unavailable.message}"`);
      return degraded([], unavailable.message);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.bounded(this.client.getCollections(), 'health');
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Create the collection only when Qdrant reports it missing; lookup errors
   * propagate.
   * @returns true when the collection had to be created
   */
  private async ensureCollection(): Promise<boolean> {
    const expectedSize = this.embedding.dimensions;
    const { exists } = await this.bounded(
      this.client.collectionExists(this.collectionName),
      'collection_exists',
    );

    if (!exists) {
      await this.bounded(
        this.client.createCollection(this.collectionName, {
          vectors: { size: expectedSize, distance: QDRANT_DISTANCE[this.metric] },
        }),
        'create_collection',
      );
      await this.bounded(
        this.client.createPayloadIndex(this.collectionName, {
          field_name: 'documentId',
          field_schema: 'keyword',
          wait: true,
        }),
        'create_payload_index',
      );
      return true;
    }

    const info = await this.bounded(
      this.client.getCollection(this.collectionName),
      'get_collection',
    );
    const actualSize = vectorSize(info.config.params.vectors);
    if (actualSize !== expectedSize) {
      throw new CollectionMismatchError(
        this.collectionName,
        expectedSize,
        actualSize,
      );
    }
    return false;
  }

  private toSearchResults(points: ScoredPayloadPoint[]): SearchResult[] {
    return this.parsePoints(points)
      .map(({ point, payload }) => ({
        payload,
        ...toScoreDistance(this.metric, point.score),
      }))
      .sort((a, b) => b.score - a.score || byInsertion(a, b))
      .map(({ payload, score, distance }, i) => ({
        chunkId: payload.chunkId,
        documentId: payload.documentId,
        source: payload.source,
        content: payload.content,
        metadata: payload.metadata,
        chunkIndex: payload.chunkIndex,
        strategy: payload.strategy,
        score,
        distance,
        rank: i + 1,
      }));
  }

  private parsePoints<P extends PayloadPoint>(
    points: P[],
  ): Array<{ point: P; payload: ChunkPayload }> {
    const parsed: Array<{ point: P; payload: ChunkPayload }> = [];
    for (const point of points) {
      const payload = parseChunkPayload(point.payload);
      if (payload) {
        parsed.push({ point, payload });
      } else {
        this.logger.warn(`Skipping point ${point.id} with a malformed payload`);
      }
    }
    return parsed;
  }

  private degradedSearch(
    operation: string,
    error: unknown,
  ): SoftOutcome<SearchResult[]> {
    const unavailable = new StoreUnavailableError(operation, toError(error));
    this.logger.warn(`[VectorStore] op=search status=degraded reason="${unavailable.message}"`);
    return degraded([], unavailable.message);
  }

  private bounded<T>(promise: Promise<T>, operation: string): Promise<T> {
    return withTimeout(promise, this.timeoutMs, `qdrant ${operation}`);
  }
}

function buildFilter(filter?: MetadataFilter): QdrantFilter | undefined {
  const entries = Object.entries(filter ?? {});
  if (entries.length === 0) {
    return undefined;
  }

  return {
    must: entries.map(([key, value]) => ({
      key: TOP_LEVEL_FILTER_KEYS.has(key) ? key : `metadata.${key}`,
      match: { value },
    })),
  };
}

function byInsertion(
  a: { payload: ChunkPayload },
  b: { payload: ChunkPayload },
): number {
  return (
    a.payload.insertedAt - b.payload.insertedAt ||
    a.payload.batchOffset - b.payload.batchOffset
  );
}

function toStoredChunk(payload: ChunkPayload): StoredChunk {
  return {
    chunkId: payload.chunkId,
    documentId: payload.documentId,
    source: payload.source,
    content: payload.content,
    chunkIndex: payload.chunkIndex,
    totalChunks: payload.totalChunks,
    strategy: payload.strategy,
    metadata: payload.metadata,
  };
}

function vectorSize(vectors: unknown): number | undefined {
  if (
    typeof vectors === 'object' &&
    vectors !== null &&
    'size' in vectors &&
    typeof vectors.size === 'number'
  ) {
    return vectors.size;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
