export type MetadataValue = string | number | boolean;

/** Equality conditions on stored metadata; every key must match. */
export type MetadataFilter = Record<string, MetadataValue>;

export interface Document {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  embedding?: number[];
  score?: number;
}

/** A stored chunk as returned by listing, without vector or score. */
export interface StoredChunk {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
}
