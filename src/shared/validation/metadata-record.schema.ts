import { z } from 'zod';

/** Flat map of scalar values, the shape of document metadata and filters */
export const metadataRecordSchema = z.record(
  z.union([z.string(), z.number(), z.boolean()]),
);
