import type { DocumentMetadata } from '../../chunking/types';

export interface IngestDocumentInput {
  /** Defaults to an id derived from `source` */
  id?: string;
  content: string;
  source: string;
  metadata?: DocumentMetadata;
}

export interface IngestOptions {
  /** Strategy name, or `auto` (default) to let the selector pick per document */
  strategy?: string;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface IngestionFailure {
  source: string;
  reason: string;
}

export interface IngestionReport {
  documentsProcessed: number;
  documentsFailed: number;
  chunksStored: number;
  failures: IngestionFailure[];
  /** Directory ingestion only: files with no loader or no content */
  filesSkipped?: string[];
  durationMs: number;
}

export interface LoadedDirectory {
  documents: IngestDocumentInput[];
  skipped: string[];
}
