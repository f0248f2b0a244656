import type { ChunkerConfig } from '../types';
import { recursiveChunks } from './recursive.strategy';

const SECTION_HEADING = /^#{1,3}\s/;
const CODE_FENCE = /^\s*(```|~~~)/;

/**
 * Splits at `#`, `##` and `###` headings (outside fenced code), keeping each
 * heading with the section it opens.
 */
export function splitMarkdownSections(text: string): string[] {
  const sections: string[][] = [];
  let current: string[] = [];
  let inFence = false;

  for (const line of text.split('\n')) {
    if (CODE_FENCE.test(line)) {
      inFence = !inFence;
    }

    const opensSection = !inFence && SECTION_HEADING.test(line);
    const hasContent = current.some((existing) => existing.trim().length > 0);

    if (opensSection && hasContent) {
      sections.push(current);
      current = [];
    }
    current.push(line);
  }
  sections.push(current);

  return sections
    .map((lines) => lines.join('\n').trim())
    .filter((section) => section.length > 0);
}

export async function markdownChunks(
  text: string,
  config: ChunkerConfig,
): Promise<string[]> {
  const chunks: string[] = [];

  for (const section of splitMarkdownSections(text)) {
    if (section.length > config.chunkSize) {
      chunks.push(...(await recursiveChunks(section, config)));
    } else {
      chunks.push(section);
    }
  }

  return chunks;
}
