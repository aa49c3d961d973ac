import { createHash } from 'node:crypto';

/**
 * Maps a document id to the UUID-shaped Qdrant point id.
 *
 * md5 is used only as a stable 128-bit hash. Two chunks sharing an id map to
 * the same point and overwrite each other.
 */
export function toPointId(documentId: string): string {
  const hex = createHash('md5').update(String(documentId)).digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
