import { metadataRecordSchema } from '../../shared/validation/metadata-record.schema';
import type { IngestDocumentInput, IngestOptions } from '../types';
import type { DocumentDto, IngestOptionsDto } from './ingest-request.dto';

/** Undefined when the metadata holds anything but scalar values */
export function toDocumentInput(
  document: DocumentDto,
): IngestDocumentInput | undefined {
  if (document.metadata === undefined) {
    return { id: document.id, content: document.content, source: document.source };
  }

  const metadata = metadataRecordSchema.safeParse(document.metadata);
  if (!metadata.success) {
    return undefined;
  }
  return {
    id: document.id,
    content: document.content,
    source: document.source,
    metadata: metadata.data,
  };
}

export function invalidMetadataMessage(index: number): string {
  return `documents.${index}.metadata must map keys to strings, numbers or booleans`;
}

export function toIngestOptions(body: IngestOptionsDto): IngestOptions {
  return {
    strategy: body.strategy,
    chunkSize: body.chunkSize,
    chunkOverlap: body.chunkOverlap,
  };
}
