// ============================================
// Policy Indexer Tests: rows, upserts, collection info
// ============================================

import { describe, it, expect } from "vitest";
import { PolicyIndexer, buildChunkRows } from "../src/indexer/policyIndexer.js";
import { isErrorCode } from "../src/lib/errors.js";
import type { PolicyDocument } from "../src/policies/library.js";
import type { Embedder } from "../src/retrieval/types.js";
import { createStubSupabase } from "./fakes/stubSupabase.js";

const REFUND: PolicyDocument = {
  id: "refund_policy",
  filename: "refund_policy.md",
  content: "Refunds are issued within 30 days.",
};

const SHIPPING: PolicyDocument = {
  id: "shipping_policy",
  filename: "shipping_policy.md",
  content: "Orders ship in 2 business days.",
};

const embedder: Embedder = {
  embedQuery: async () => [0.5],
  embedChunks: async (texts) => texts.map(() => [0.5]),
};

describe("buildChunkRows", () => {
  it("tags each chunk with its document and collection", () => {
    expect(buildChunkRows("policies_faqs", REFUND)).toEqual([
      {
        id: "refund_policy_chunk_0",
        collection: "policies_faqs",
        content: "Refunds are issued within 30 days.",
        metadata: {
          doc_id: "refund_policy",
          chunk_index: 0,
          filename: "refund_policy.md",
          type: "policy",
          category: "refund_policy",
          collection: "policies_faqs",
        },
      },
    ]);
  });
});

describe("PolicyIndexer", () => {
  it("upserts embedded chunks for every document", async () => {
    const { client, requests } = createStubSupabase(() => ({ status: 201 }));
    const indexer = new PolicyIndexer(client, embedder);

    const result = await indexer.indexDocuments("policies_faqs", [REFUND, SHIPPING]);

    expect(result).toEqual({ collection: "policies_faqs", documentsProcessed: 2, chunksCreated: 2 });
    expect(requests.map((r) => r.method)).toEqual(["POST", "POST"]);
    expect(requests[0]?.url.pathname).toBe("/rest/v1/policy_chunks");
    expect(requests[1]?.body).toEqual([
      {
        id: "shipping_policy_chunk_0",
        collection: "policies_faqs",
        content: "Orders ship in 2 business days.",
        embedding: [0.5],
        metadata: {
          doc_id: "shipping_policy",
          chunk_index: 0,
          filename: "shipping_policy.md",
          type: "policy",
          category: "shipping_policy",
          collection: "policies_faqs",
        },
      },
    ]);
  });

  it("fails with an indexing error when the insert is rejected", async () => {
    const { client } = createStubSupabase(() => ({
      status: 400,
      body: { message: "boom", code: "XX000", details: null, hint: null },
    }));

    const error = await new PolicyIndexer(client, embedder)
      .indexDocuments("policies_faqs", [REFUND])
      .catch((err: unknown) => err);

    expect(isErrorCode(error, "INDEXING_FAILED")).toBe(true);
    expect(error).toHaveProperty("message", "Failed to store chunks for refund_policy: boom");
  });

  it("refuses to store chunks when the embedder returns too few vectors", async () => {
    const { client, requests } = createStubSupabase(() => ({ status: 201 }));
    const shortEmbedder: Embedder = {
      embedQuery: async () => [0.5],
      embedChunks: async () => [],
    };

    const error = await new PolicyIndexer(client, shortEmbedder)
      .indexDocuments("policies_faqs", [REFUND])
      .catch((err: unknown) => err);

    expect(isErrorCode(error, "INDEXING_FAILED")).toBe(true);
    expect(error).toHaveProperty("message", "Expected 1 embeddings for refund_policy, got 0");
    expect(requests).toHaveLength(0);
  });

  it("deletes a collection's rows", async () => {
    const { client, requests } = createStubSupabase(() => ({ status: 200 }));

    await new PolicyIndexer(client, embedder).clearCollection("policies_faqs");

    expect(requests[0]?.method).toBe("DELETE");
    expect(requests[0]?.url.searchParams.get("collection")).toBe("eq.policies_faqs");
  });

  it("counts a collection's rows", async () => {
    const { client, requests } = createStubSupabase(() => ({
      status: 200,
      headers: { "Content-Range": "0-11/12" },
    }));

    const info = await new PolicyIndexer(client, embedder).getCollectionInfo("policies_faqs");

    expect(info).toEqual({ name: "policies_faqs", count: 12 });
    expect(requests[0]?.method).toBe("HEAD");
  });
});
