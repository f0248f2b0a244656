import { Injectable, Logger } from '@nestjs/common';
import { Chunk, ChunkingResult, SourceDocument } from '../types';
import { ChunkIdGeneratorService } from './chunk-id-generator.service';
import { TokenCounterService } from './token-counter.service';

/**
 * Chunk Identity & Metadata Builder
 * Turns ordered spans into frozen Chunk values carrying the document's metadata.
 */
@Injectable()
export class ChunkBuilderService {
  private readonly logger = new Logger(ChunkBuilderService.name);

  constructor(
    private readonly idGenerator: ChunkIdGeneratorService,
    private readonly tokenCounter: TokenCounterService,
  ) {}

  build(
    document: SourceDocument,
    result: ChunkingResult,
    maxChunkSize?: number,
  ): Chunk[] {
    const totalChunks = result.spans.length;

    return result.spans.map((content, chunkIndex) => {
      if (maxChunkSize !== undefined && content.length > maxChunkSize) {
        this.logger.warn(
          `Chunk ${chunkIndex} of ${document.id} has ${content.length} chars (max ${maxChunkSize}), kept as an atomic unit`,
        );
      }

      return Object.freeze({
        id: this.idGenerator.generateChunkId(document.id, content),
        documentId: document.id,
        source: document.source,
        content,
        chunkIndex,
        totalChunks,
        tokenCount: this.tokenCounter.countTokens(content),
        charCount: content.length,
        strategy: result.strategy,
        metadata: document.metadata,
      });
    });
  }
}
