import type { ChunkerConfig } from '../types';

/** Share of the window, counted back from its end, searched for a word break */
const BREAK_SEARCH_RATIO = 0.1;

export function slidingWindowChunks(
  text: string,
  config: ChunkerConfig,
): string[] {
  const { chunkSize, chunkOverlap } = config;
  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      const searchFrom = end - Math.floor(chunkSize * BREAK_SEARCH_RATIO);
      const breakPoint = lastWhitespace(text, searchFrom, end);
      if (breakPoint > start) {
        end = breakPoint;
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }

    let next = end - chunkOverlap;
    // A break point pulled back into the overlap must not stall the window
    if (next <= start) {
      next = end;
    }
    start = next;
  }

  return chunks;
}

/** Index of the last whitespace character in [from, to), or -1 */
function lastWhitespace(text: string, from: number, to: number): number {
  for (let i = to - 1; i >= from; i--) {
    if (/\s/.test(text[i])) {
      return i;
    }
  }
  return -1;
}
