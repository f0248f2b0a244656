import { Injectable, Logger } from '@nestjs/common';
import { CHUNKING_STRATEGIES, ChunkingStrategy } from '../types';
import { PARAGRAPH_BREAK } from '../strategies/accumulate';

const MARKDOWN_HEADING = /^#{1,6}\s/m;
const CODE_FENCE = '```';
const INDENTED_LINE = '    ';
const SENTENCE_TERMINATOR = /[.!?]+\s/;

const MAX_INDENTED_LINES = 5;
const MIN_PARAGRAPHS = 3;
const MIN_SENTENCES = 10;
const SENTENCE_TEXT_LIMIT = 5000;
const LONG_TEXT_THRESHOLD = 10000;

export function parseStrategy(value: string): ChunkingStrategy | undefined {
  return CHUNKING_STRATEGIES.find((strategy) => strategy === value);
}

/**
 * Strategy Selector
 * Picks a chunking strategy from the surface structure of the text
 */
@Injectable()
export class StrategySelectorService {
  private readonly logger = new Logger(StrategySelectorService.name);

  /**
   * First matching rule wins: headings, code, paragraphs, short sentence-rich
   * text, very long text, then semantic.
   */
  select(text: string): ChunkingStrategy {
    if (MARKDOWN_HEADING.test(text)) {
      return ChunkingStrategy.MARKDOWN;
    }

    const indentedLines = text
      .split('\n')
      .filter((line) => line.startsWith(INDENTED_LINE)).length;
    if (text.includes(CODE_FENCE) || indentedLines > MAX_INDENTED_LINES) {
      return ChunkingStrategy.RECURSIVE;
    }

    if (text.split(PARAGRAPH_BREAK).length > MIN_PARAGRAPHS) {
      return ChunkingStrategy.PARAGRAPH;
    }

    if (
      text.split(SENTENCE_TERMINATOR).length > MIN_SENTENCES &&
      text.length < SENTENCE_TEXT_LIMIT
    ) {
      return ChunkingStrategy.SENTENCE;
    }

    if (text.length > LONG_TEXT_THRESHOLD) {
      return ChunkingStrategy.SLIDING_WINDOW;
    }

    return ChunkingStrategy.SEMANTIC;
  }

  /**
   * Resolve a caller's request: `auto` (or nothing) selects from the text,
   * known names pass through, anything else degrades to recursive.
   */
  resolve(requested: string | undefined, text: string): ChunkingStrategy {
    if (requested === undefined || requested === 'auto') {
      const selected = this.select(text);
      this.logger.debug(
        `[StrategySelector] requested=auto selected=${selected} length=${text.length}`,
      );
      return selected;
    }

    const strategy = parseStrategy(requested);
    if (strategy === undefined) {
      this.logger.warn(
        `[StrategySelector] requested=${requested} status=unknown fallback=${ChunkingStrategy.RECURSIVE}`,
      );
      return ChunkingStrategy.RECURSIVE;
    }

    return strategy;
  }
}
