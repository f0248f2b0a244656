import { Injectable, Logger } from '@nestjs/common';
import { RagConfigService } from '../../config/rag-config.service';
import {
  ChunkerConfig,
  ChunkingResult,
  ChunkingStrategy,
} from '../types';
import { ChunkingFailure, InvalidChunkerConfigError } from '../errors';
import { validateChunkerConfig } from './chunker-config';
import { recursiveChunks } from '../strategies/recursive.strategy';
import {
  paragraphChunks,
  semanticChunks,
  sentenceChunks,
} from '../strategies/paragraph.strategy';
import { markdownChunks } from '../strategies/markdown.strategy';
import { slidingWindowChunks } from '../strategies/sliding-window.strategy';

export const RECURSIVE_FALLBACK = `${ChunkingStrategy.RECURSIVE}_fallback`;

/**
 * Chunking Engine
 * Dispatches to one of the six algorithms and guarantees a non-empty result.
 */
@Injectable()
export class TextChunkerService {
  private readonly logger = new Logger(TextChunkerService.name);

  constructor(private readonly ragConfig: RagConfigService) {}

  /**
   * Merge per-call overrides into the configured defaults.
   * @throws InvalidChunkerConfigError when the merged values are inconsistent
   */
  resolveConfig(overrides: Partial<ChunkerConfig> = {}): ChunkerConfig {
    const config: ChunkerConfig = { ...this.ragConfig.chunking, ...overrides };
    const issues = validateChunkerConfig(config);
    if (issues.length > 0) {
      throw new InvalidChunkerConfigError(issues);
    }
    return config;
  }

  async chunk(
    text: string,
    strategy: ChunkingStrategy,
    overrides?: Partial<ChunkerConfig>,
  ): Promise<ChunkingResult> {
    const config = this.resolveConfig(overrides);

    // Covers empty input too: it comes back as a single empty chunk
    if (text.length <= config.chunkSize) {
      return { spans: [text], strategy, fallbackUsed: false };
    }

    try {
      const spans = await this.runStrategy(strategy, text, config);
      return { spans: orWhole(spans, text), strategy, fallbackUsed: false };
    } catch (error) {
      const failure = new ChunkingFailure(
        strategy,
        error instanceof Error ? error : undefined,
      );
      this.logger.warn(
        `[Chunking] strategy=${strategy} status=fallback code=${failure.code} reason="${failure.message}"`,
      );
      return {
        spans: await this.fallback(strategy, text, config),
        strategy: RECURSIVE_FALLBACK,
        fallbackUsed: true,
      };
    }
  }

  private async runStrategy(
    strategy: ChunkingStrategy,
    text: string,
    config: ChunkerConfig,
  ): Promise<string[]> {
    switch (strategy) {
      case ChunkingStrategy.RECURSIVE:
        return recursiveChunks(text, config);
      case ChunkingStrategy.SEMANTIC:
        return semanticChunks(text, config);
      case ChunkingStrategy.MARKDOWN:
        return markdownChunks(text, config);
      case ChunkingStrategy.PARAGRAPH:
        return paragraphChunks(text, config);
      case ChunkingStrategy.SENTENCE:
        return sentenceChunks(text, config);
      case ChunkingStrategy.SLIDING_WINDOW:
        return slidingWindowChunks(text, config);
      default: {
        const unhandled: never = strategy;
        throw new ChunkingFailure(String(unhandled));
      }
    }
  }

  private async fallback(
    failed: ChunkingStrategy,
    text: string,
    config: ChunkerConfig,
  ): Promise<string[]> {
    if (failed === ChunkingStrategy.RECURSIVE) {
      return [text];
    }

    try {
      return orWhole(await recursiveChunks(text, config), text);
    } catch (error) {
      this.logger.error(
        `[Chunking] strategy=${ChunkingStrategy.RECURSIVE} status=failed reason="${error instanceof Error ? error.message : String(error)}", keeping text whole`,
      );
      return [text];
    }
  }
}

function orWhole(spans: string[], text: string): string[] {
  return spans.length > 0 ? spans : [text];
}
