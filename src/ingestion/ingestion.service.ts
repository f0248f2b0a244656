import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { RagConfigService } from '../config/rag-config.service';
import { ChunkStage } from '../chunking/chunk.stage';
import { InvalidChunkerConfigError } from '../chunking/errors';
import {
  ChunkIdGeneratorService,
  TextChunkerService,
} from '../chunking/services';
import type {
  ChunkerConfig,
  DocumentMetadata,
  SourceDocument,
} from '../chunking/types';
import { VectorStoreService } from '../vector-store/vector-store.service';
import { errorMessage } from '../shared/utils/error-message';
import { DocumentLoaderService } from './services/document-loader.service';
import { DocumentLoadError } from './errors/ingestion-errors';
import type {
  IngestDocumentInput,
  IngestOptions,
  IngestionFailure,
  IngestionReport,
  LoadedDirectory,
} from './types';

export const DEFAULT_TEXT_SOURCE = 'user_input';

const TYPE_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.md': 'markdown',
  '.json': 'json',
  '.pdf': 'pdf',
  '.txt': 'text',
};

/**
 * Ingestion Service
 * document -> chunk -> embed + store. Ingestion only adds: chunks are removed
 * through an explicit clear or delete by id.
 * Documents are processed one at a time; a failing document is reported and
 * the batch continues.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly chunkStage: ChunkStage,
    private readonly chunker: TextChunkerService,
    private readonly idGenerator: ChunkIdGeneratorService,
    private readonly vectorStore: VectorStoreService,
    private readonly loader: DocumentLoaderService,
    private readonly ragConfig: RagConfigService,
  ) {}

  /**
   * @throws BadRequestException when the chunking overrides are inconsistent
   */
  async ingest(
    documents: readonly IngestDocumentInput[],
    options: IngestOptions = {},
  ): Promise<IngestionReport> {
    const startTime = Date.now();
    const overrides = this.resolveOverrides(options);

    let documentsProcessed = 0;
    let chunksStored = 0;
    const failures: IngestionFailure[] = [];

    for (const input of documents) {
      try {
        chunksStored += await this.ingestOne(input, options.strategy, overrides);
        documentsProcessed++;
      } catch (error) {
        const reason = errorMessage(error);
        this.logger.error(
          `[Ingest] source=${input.source} status=failed reason="${reason}"`,
        );
        failures.push({ source: input.source, reason });
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `[Ingest] documents=${documents.length} processed=${documentsProcessed} failed=${failures.length} chunks=${chunksStored} duration=${durationMs}ms`,
    );

    return {
      documentsProcessed,
      documentsFailed: failures.length,
      chunksStored,
      failures,
      durationMs,
    };
  }

  async ingestText(
    text: string,
    source: string = DEFAULT_TEXT_SOURCE,
    options: IngestOptions = {},
  ): Promise<IngestionReport> {
    return this.ingest(
      [{ content: text, source, metadata: { type: 'text', source } }],
      options,
    );
  }

  /**
   * @param recursive - walk nested directories (default)
   * @throws BadRequestException when the directory cannot be read
   */
  async ingestDirectory(
    directory: string,
    options: IngestOptions = {},
    recursive = true,
  ): Promise<IngestionReport> {
    let loaded: LoadedDirectory;
    try {
      loaded = await this.loader.loadDirectory(directory, recursive);
    } catch (error) {
      if (error instanceof DocumentLoadError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const report = await this.ingest(loaded.documents, options);
    return { ...report, filesSkipped: loaded.skipped };
  }

  private async ingestOne(
    input: IngestDocumentInput,
    strategy: string | undefined,
    overrides: Partial<ChunkerConfig>,
  ): Promise<number> {
    if (input.content.trim().length === 0) {
      throw new Error('document has no content');
    }

    const document = this.toSourceDocument(input);
    const { chunks } = await this.chunkStage.execute({
      document,
      strategy,
      overrides,
    });

    const added = await this.vectorStore.add(chunks);
    if (added.status === 'failed') {
      throw added.error;
    }
    return added.value;
  }

  private toSourceDocument(input: IngestDocumentInput): SourceDocument {
    const extension = path.extname(input.source).toLowerCase();
    const inferred: Record<string, string> = {
      type: TYPE_BY_EXTENSION[extension] ?? 'text',
    };
    if (extension) {
      inferred.filename = path.basename(input.source);
    }

    const metadata: DocumentMetadata = Object.freeze({
      ...inferred,
      ...input.metadata,
      ingestedAt: new Date().toISOString(),
    });

    return Object.freeze({
      id: input.id ?? this.idGenerator.generateDocumentId(input.source),
      content: input.content,
      source: input.source,
      metadata,
    });
  }

  /** Per-request size overrides, widened so min/max still bracket the size */
  private resolveOverrides(options: IngestOptions): Partial<ChunkerConfig> {
    const base = this.ragConfig.chunking;
    const overrides: {
      chunkSize?: number;
      chunkOverlap?: number;
      minChunkSize?: number;
      maxChunkSize?: number;
    } = {};

    if (options.chunkSize !== undefined) {
      overrides.chunkSize = options.chunkSize;
      overrides.minChunkSize = Math.min(base.minChunkSize, options.chunkSize);
      overrides.maxChunkSize = Math.max(base.maxChunkSize, options.chunkSize);
    }
    if (options.chunkOverlap !== undefined) {
      overrides.chunkOverlap = options.chunkOverlap;
    }

    try {
      this.chunker.resolveConfig(overrides);
    } catch (error) {
      if (error instanceof InvalidChunkerConfigError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
    return overrides;
  }
}
