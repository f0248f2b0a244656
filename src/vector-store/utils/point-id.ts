import { v5 as uuidv5 } from 'uuid';
import { POINT_ID_NAMESPACE } from '../vector-store.constants';

/** Qdrant only accepts UUIDs or integers as point ids */
export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}
