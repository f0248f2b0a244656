import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { ChunkerConfig } from '../types';

/**
 * Separator-priority splitting: any span still over the target size is split
 * again with the next separator until it fits or none remain.
 */
export async function recursiveChunks(
  text: string,
  config: ChunkerConfig,
): Promise<string[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    separators: [...config.separators],
    keepSeparator: config.keepSeparator,
  });

  return splitter.splitText(text);
}
