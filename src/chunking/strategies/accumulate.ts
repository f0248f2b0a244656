import type { ChunkerConfig } from '../types';

export const PARAGRAPH_BREAK = /\n\s*\n/;
export const SENTENCE_BREAK = /(?<=[.!?])\s+/;

export function splitUnits(text: string, boundary: RegExp): string[] {
  return text
    .split(boundary)
    .map((unit) => unit.trim())
    .filter((unit) => unit.length > 0);
}

/**
 * Greedily packs units into chunks of at most `chunkSize` characters
 * (joiners included). A unit that alone exceeds the size is kept whole unless
 * `splitOversized` is given, in which case it is split and emitted on its own.
 * A short tail left by an overlapping split stays separate, since merging it
 * would repeat the text it shares with its predecessor.
 */
export async function accumulate(
  units: readonly string[],
  joiner: string,
  config: ChunkerConfig,
  splitOversized?: (unit: string) => Promise<string[]>,
): Promise<string[]> {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;
  let splitTail = false;

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current.join(joiner));
      current = [];
      currentLength = 0;
      splitTail = false;
    }
  };

  for (const unit of units) {
    if (splitOversized && unit.length > config.chunkSize) {
      flush();
      chunks.push(...(await splitOversized(unit)));
      splitTail = true;
      continue;
    }

    const projected =
      current.length === 0
        ? unit.length
        : currentLength + joiner.length + unit.length;

    if (current.length > 0 && projected > config.chunkSize) {
      flush();
      current.push(unit);
      currentLength = unit.length;
    } else {
      current.push(unit);
      currentLength = projected;
    }
  }
  flush();

  if (splitTail && config.chunkOverlap > 0) {
    return chunks;
  }
  return mergeShortTail(chunks, joiner, config);
}

function mergeShortTail(
  chunks: string[],
  joiner: string,
  config: ChunkerConfig,
): string[] {
  if (chunks.length < 2) {
    return chunks;
  }

  const last = chunks[chunks.length - 1];
  if (last.length >= config.minChunkSize) {
    return chunks;
  }

  const merged = chunks[chunks.length - 2] + joiner + last;
  if (merged.length > config.maxChunkSize) {
    return chunks;
  }

  return [...chunks.slice(0, -2), merged];
}
