import type { ChunkerConfig } from '../types';

/** Returns one message per violated rule; empty when the config is usable */
export function validateChunkerConfig(config: ChunkerConfig): string[] {
  const issues: string[] = [];

  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    issues.push('chunkSize must be a positive integer');
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    issues.push('chunkOverlap must be a non-negative integer');
  }
  if (config.chunkOverlap >= config.chunkSize) {
    issues.push('chunkOverlap must be smaller than chunkSize');
  }
  if (config.minChunkSize > config.chunkSize) {
    issues.push('minChunkSize must not exceed chunkSize');
  }
  if (config.chunkSize > config.maxChunkSize) {
    issues.push('maxChunkSize must be at least chunkSize');
  }

  return issues;
}
