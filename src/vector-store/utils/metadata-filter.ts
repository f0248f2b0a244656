import { metadataRecordSchema } from '../../shared/validation/metadata-record.schema';
import type { MetadataFilter } from '../types/vector-store.types';

/** Validate a caller-supplied filter; a missing filter stays missing */
export function parseMetadataFilter(
  raw: unknown,
): { filter?: MetadataFilter; error?: string } {
  if (raw === undefined || raw === null) {
    return {};
  }
  const parsed = metadataRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      error: 'filter must map keys to strings, numbers or booleans',
    };
  }
  return { filter: parsed.data };
}
