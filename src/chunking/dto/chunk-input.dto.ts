import type { ChunkerConfig, SourceDocument } from '../types';

export interface ChunkInputDto {
  document: SourceDocument;
  /** Strategy name or `auto`; unknown names fall back to recursive */
  strategy?: string;
  overrides?: Partial<ChunkerConfig>;
}
