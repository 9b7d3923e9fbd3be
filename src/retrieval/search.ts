// ============================================
// Vector Search: policy chunks via the match_policy_chunks RPC
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { retrievalError } from "../lib/errors.js";
import type { Embedder, RetrievedChunk, VectorSearch } from "./types.js";

const matchRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  content: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).nullable(),
  similarity: z.number(),
});

/**
 * Clamp a similarity into [0, 1]. The RPC returns 1 - cosine distance,
 * which goes negative for opposed vectors.
 */
export function normalizeSimilarity(similarity: number): number {
  if (Number.isNaN(similarity)) return 0;
  return Math.min(1, Math.max(0, similarity));
}

export class SupabaseVectorSearch implements VectorSearch {
  constructor(
    private readonly client: SupabaseClient,
    private readonly embedder: Embedder
  ) {}

  async search(collection: string, query: string, topK: number): Promise<RetrievedChunk[]> {
    logger.info("Searching policy chunks", {
      stage: "retrieval",
      collection,
      query: query.slice(0, 80),
      topK,
    });

    const queryEmbedding = await this.embedder.embedQuery(query);

    const { data, error } = await this.client.rpc("match_policy_chunks", {
      query_embedding: queryEmbedding,
      match_count: topK,
      collection_name: collection,
    });

    if (error) {
      logger.error("Semantic search failed", {
        stage: "retrieval",
        collection,
        error: error.message,
      });
      throw retrievalError(`Semantic search failed: ${error.message}`);
    }

    const hits = z
      .array(matchRowSchema)
      .parse(data ?? [])
      .map((row) => ({
        id: row.id,
        content: row.content,
        similarity: normalizeSimilarity(row.similarity),
        metadata: row.metadata ?? {},
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);

    logger.info("Policy search complete", {
      stage: "retrieval",
      collection,
      hitCount: hits.length,
      topSimilarity: hits[0]?.similarity.toFixed(3),
    });

    return hits;
  }
}
