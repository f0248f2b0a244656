import { z } from 'zod';
import type { Chunk } from '../../chunking/types';

const metadataValue = z.union([z.string(), z.number(), z.boolean()]);

export const chunkPayloadSchema = z.object({
  chunkId: z.string(),
  documentId: z.string(),
  source: z.string(),
  content: z.string(),
  chunkIndex: z.number().int(),
  totalChunks: z.number().int(),
  tokenCount: z.number().int(),
  charCount: z.number().int(),
  strategy: z.string(),
  metadata: z.record(metadataValue),
  insertedAt: z.number(),
  batchOffset: z.number().int(),
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;

/** Payload fields that filters address directly instead of under `metadata.` */
export const TOP_LEVEL_FILTER_KEYS: ReadonlySet<string> = new Set([
  'chunkId',
  'documentId',
  'source',
  'strategy',
]);

export function toChunkPayload(
  chunk: Chunk,
  insertedAt: number,
  batchOffset: number,
): ChunkPayload {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    source: chunk.source,
    content: chunk.content,
    chunkIndex: chunk.chunkIndex,
    totalChunks: chunk.totalChunks,
    tokenCount: chunk.tokenCount,
    charCount: chunk.charCount,
    strategy: chunk.strategy,
    metadata: { ...chunk.metadata },
    insertedAt,
    batchOffset,
  };
}

export function parseChunkPayload(payload: unknown): ChunkPayload | null {
  const parsed = chunkPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
}
