// ============================================
// Embeddings: OpenAI embedding generation
// Pin versions for retrieval determinism.
// ============================================

import type OpenAI from "openai";
import { logger } from "../lib/logger.js";
import type { Embedder } from "./types.js";

/**
 * Embedding model version.
 * PINNED for retrieval determinism - bump carefully.
 */
export const EMBEDDING_MODEL = "text-embedding-3-small";
export const EMBEDDING_DIMENSIONS = 1536;

const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbedder implements Embedder {
  constructor(private readonly client: OpenAI) {}

  /**
   * Generate embedding for a query string.
   */
  async embedQuery(text: string): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create({
        model: EMBEDDING_MODEL,
        input: text.slice(0, MAX_INPUT_CHARS),
        dimensions: EMBEDDING_DIMENSIONS,
      });
      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error("No embedding returned from OpenAI");
      }
      return embedding;
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        textPreview: text.slice(0, 50),
        error: err,
      });
      throw err;
    }
  }

  /**
   * Generate embeddings for multiple strings in batch.
   */
  async embedChunks(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create({
        model: EMBEDDING_MODEL,
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
        dimensions: EMBEDDING_DIMENSIONS,
      });
      return response.data.map((d) => d.embedding);
    } catch (err) {
      logger.error("Batch embedding generation failed", {
        stage: "retrieval",
        textCount: texts.length,
        error: err,
      });
      throw err;
    }
  }
}
