// ============================================
// Retrieval Types: vector search contracts
// ============================================

/**
 * Chunk metadata as stored beside each embedding.
 * Indexed policy chunks carry doc_id, chunk_index, filename, type, category
 * and collection.
 */
export type ChunkMetadata = Record<string, string | number | boolean | null>;

/**
 * A similarity-search hit. Similarity is in [0, 1], higher is closer.
 */
export interface RetrievedChunk {
  id: string;
  content: string;
  similarity: number;
  metadata: ChunkMetadata;
}

/**
 * Nearest-neighbour search over a named collection.
 * Results are ordered best-first.
 */
export interface VectorSearch {
  search(collection: string, query: string, topK: number): Promise<RetrievedChunk[]>;
}

export interface Embedder {
  embedQuery(text: string): Promise<number[]>;
  embedChunks(texts: string[]): Promise<number[][]>;
}

/** Read a string metadata field, ignoring other value types. */
export function metadataString(metadata: ChunkMetadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
