// ============================================
// Policy Indexer: chunk, embed and store policy documents
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { logger } from "../lib/logger.js";
import { indexingError } from "../lib/errors.js";
import type { PolicyDocument } from "../policies/library.js";
import type { ChunkMetadata, Embedder } from "../retrieval/types.js";
import { chunkDocument, type ChunkOptions } from "./chunker.js";

export const POLICY_CHUNKS_TABLE = "policy_chunks";

// Rows per insert and per embedding request
const BATCH_SIZE = 50;

export interface PolicyChunkRow {
  id: string;
  collection: string;
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface IndexResult {
  collection: string;
  documentsProcessed: number;
  chunksCreated: number;
}

export interface CollectionInfo {
  name: string;
  count: number;
}

/**
 * Rows for one document, without embeddings. Metadata carries the chunk
 * position plus the document's tags.
 */
export function buildChunkRows(
  collection: string,
  doc: PolicyDocument,
  options?: ChunkOptions
): Array<Omit<PolicyChunkRow, "embedding">> {
  return chunkDocument(doc.id, doc.content, options).map((chunk) => ({
    id: chunk.id,
    collection,
    content: chunk.content,
    metadata: {
      doc_id: doc.id,
      chunk_index: chunk.index,
      filename: doc.filename,
      type: "policy",
      category: doc.id,
      collection,
    },
  }));
}

export class PolicyIndexer {
  constructor(
    private readonly client: SupabaseClient,
    private readonly embedder: Embedder,
    private readonly table = POLICY_CHUNKS_TABLE
  ) {}

  async indexDocuments(collection: string, docs: PolicyDocument[]): Promise<IndexResult> {
    let chunksCreated = 0;

    for (const doc of docs) {
      const rows = buildChunkRows(collection, doc);

      for (let i = 0; i < rows.length; i += BATCH_SIZE) {
        const batch = rows.slice(i, i + BATCH_SIZE);
        const embeddings = await this.embedder.embedChunks(batch.map((r) => r.content));
        if (embeddings.length !== batch.length) {
          throw indexingError(
            `Expected ${batch.length} embeddings for ${doc.id}, got ${embeddings.length}`
          );
        }

        const withEmbeddings: PolicyChunkRow[] = [];
        batch.forEach((row, j) => {
          const embedding = embeddings[j];
          if (embedding) withEmbeddings.push({ ...row, embedding });
        });

        const { error } = await this.client.from(this.table).upsert(withEmbeddings);
        if (error) {
          logger.error("Chunk insert failed", {
            stage: "indexer",
            docId: doc.id,
            error: error.message,
          });
          throw indexingError(`Failed to store chunks for ${doc.id}: ${error.message}`);
        }
      }

      chunksCreated += rows.length;
      logger.info("Indexed policy document", {
        stage: "indexer",
        docId: doc.id,
        chunks: rows.length,
      });
    }

    return { collection, documentsProcessed: docs.length, chunksCreated };
  }

  async clearCollection(collection: string): Promise<void> {
    const { error } = await this.client.from(this.table).delete().eq("collection", collection);
    if (error) {
      throw indexingError(`Failed to clear collection ${collection}: ${error.message}`);
    }
    logger.info("Cleared collection", { stage: "indexer", collection });
  }

  async getCollectionInfo(collection: string): Promise<CollectionInfo> {
    const { count, error } = await this.client
      .from(this.table)
      .select("id", { count: "exact", head: true })
      .eq("collection", collection);

    if (error) {
      throw indexingError(`Failed to read collection ${collection}: ${error.message}`);
    }
    return { name: collection, count: count ?? 0 };
  }
}
