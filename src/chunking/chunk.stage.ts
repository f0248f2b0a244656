import { Injectable, Logger } from '@nestjs/common';
import { ChunkInputDto, ChunkOutputDto } from './dto';
import {
  ChunkBuilderService,
  StrategySelectorService,
  TextChunkerService,
} from './services';

/**
 * Chunk Stage - Main Orchestrator
 * Selects a strategy, splits the document and builds identified chunks
 */
@Injectable()
export class ChunkStage {
  private readonly logger = new Logger(ChunkStage.name);

  constructor(
    private readonly selector: StrategySelectorService,
    private readonly chunker: TextChunkerService,
    private readonly builder: ChunkBuilderService,
  ) {}

  async execute(input: ChunkInputDto): Promise<ChunkOutputDto> {
    const startTime = Date.now();
    const { document } = input;

    const config = this.chunker.resolveConfig(input.overrides);
    const selectedStrategy = this.selector.resolve(
      input.strategy,
      document.content,
    );

    const result = await this.chunker.chunk(
      document.content,
      selectedStrategy,
      input.overrides,
    );
    const chunks = this.builder.build(document, result, config.maxChunkSize);

    const totalTokens = chunks.reduce((sum, chunk) => sum + chunk.tokenCount, 0);
    const totalChars = chunks.reduce((sum, chunk) => sum + chunk.charCount, 0);
    const durationMs = Date.now() - startTime;

    this.logger.log(
      `[Chunk] document=${document.id} strategy=${result.strategy} chunks=${chunks.length} tokens=${totalTokens} duration=${durationMs}ms status=success`,
    );

    return {
      documentId: document.id,
      chunks,
      selectedStrategy,
      strategy: result.strategy,
      fallbackUsed: result.fallbackUsed,
      statistics: {
        totalChunks: chunks.length,
        totalTokens,
        averageChunkChars: Math.round(totalChars / chunks.length),
        durationMs,
      },
    };
  }
}
