import type { ChunkerConfig } from '../types';
import {
  PARAGRAPH_BREAK,
  SENTENCE_BREAK,
  accumulate,
  splitUnits,
} from './accumulate';
import { recursiveChunks } from './recursive.strategy';

const PARAGRAPH_JOINER = '\n\n';
const SENTENCE_JOINER = ' ';

/** Paragraph packing; oversized paragraphs go through the recursive splitter */
export function semanticChunks(
  text: string,
  config: ChunkerConfig,
): Promise<string[]> {
  return accumulate(
    splitUnits(text, PARAGRAPH_BREAK),
    PARAGRAPH_JOINER,
    config,
    (paragraph) => recursiveChunks(paragraph, config),
  );
}

/** Paragraph packing; oversized paragraphs are kept whole */
export function paragraphChunks(
  text: string,
  config: ChunkerConfig,
): Promise<string[]> {
  return accumulate(splitUnits(text, PARAGRAPH_BREAK), PARAGRAPH_JOINER, config);
}

export function sentenceChunks(
  text: string,
  config: ChunkerConfig,
): Promise<string[]> {
  return accumulate(splitUnits(text, SENTENCE_BREAK), SENTENCE_JOINER, config);
}
