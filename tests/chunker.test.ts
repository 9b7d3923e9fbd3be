// ============================================
// Chunker Tests: recursive splitting and chunk ids
// ============================================

import { describe, it, expect } from "vitest";
import { splitText, chunkDocument, CHUNK_SIZE, CHUNK_OVERLAP } from "../src/indexer/chunker.js";

describe("splitText", () => {
  it("uses 1000-character chunks with 200 characters of overlap by default", () => {
    expect(CHUNK_SIZE).toBe(1000);
    expect(CHUNK_OVERLAP).toBe(200);
  });

  it("keeps short text as a single chunk", () => {
    expect(splitText("Returns are accepted within 30 days.")).toEqual([
      "Returns are accepted within 30 days.",
    ]);
  });

  it("keeps paragraphs together while they fit", () => {
    expect(splitText("Hello\n\nWorld")).toEqual(["Hello\n\nWorld"]);
  });

  it("splits on words and carries an overlap into the next chunk", () => {
    expect(splitText("aaaa bbbb cccc", { chunkSize: 10, chunkOverlap: 5 })).toEqual([
      "aaaa bbbb",
      "bbbb cccc",
    ]);
  });

  it("falls back to characters when no separator is present", () => {
    expect(splitText("abcdefghij", { chunkSize: 4, chunkOverlap: 1 })).toEqual([
      "abcd",
      "defg",
      "ghij",
    ]);
  });

  it("returns nothing for blank text", () => {
    expect(splitText("   \n\n  ")).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => splitText("text", { chunkSize: 10, chunkOverlap: 10 })).toThrow(RangeError);
  });
});

describe("chunkDocument", () => {
  it("numbers chunks from zero under the document id", () => {
    const chunks = chunkDocument("refund_policy", "aaaa bbbb cccc", { chunkSize: 10, chunkOverlap: 5 });

    expect(chunks).toEqual([
      { id: "refund_policy_chunk_0", index: 0, content: "aaaa bbbb" },
      { id: "refund_policy_chunk_1", index: 1, content: "bbbb cccc" },
    ]);
  });
});
