#!/usr/bin/env npx tsx
// ============================================
// Policy Indexer Script: chunk and embed policy documents
// ============================================
// Usage: npm run index:policies -- [--clear] [--dir policies] [--collection policies_faqs]
//
// Prerequisites:
// - supabase/schema.sql applied
// - SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, OPENAI_API_KEY set

import "dotenv/config";
import path from "path";
import OpenAI from "openai";
import { config } from "../src/config/env.js";
import { supabase } from "../src/db/supabase.js";
import { FilePolicyLibrary } from "../src/policies/library.js";
import { OpenAIEmbedder } from "../src/retrieval/embeddings.js";
import { PolicyIndexer } from "../src/indexer/policyIndexer.js";

function log(emoji: string, message: string) {
  console.log(`${emoji} ${message}`);
}

function readFlag(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  return i >= 0 ? args[i + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const dir = path.resolve(readFlag(args, "--dir") ?? config.policies.docsDir);
  const collection = readFlag(args, "--collection") ?? config.policies.collection;

  const library = new FilePolicyLibrary(dir);
  const indexer = new PolicyIndexer(
    supabase,
    new OpenAIEmbedder(new OpenAI({ apiKey: config.openai.apiKey }))
  );

  if (args.includes("--clear")) {
    log("🧹", `Clearing collection ${collection}...`);
    await indexer.clearCollection(collection);
  }

  const docs = await library.listDocuments();
  if (docs.length === 0) {
    log("⚠️", `No .md or .txt documents found in ${dir}`);
    process.exit(1);
  }

  log("🔄", `Indexing ${docs.length} documents into ${collection}...`);
  const result = await indexer.indexDocuments(collection, docs);
  const info = await indexer.getCollectionInfo(collection);

  console.log("\n========================================");
  console.log("Results:");
  console.log("========================================");
  console.log(`  Collection:       ${result.collection}`);
  console.log(`  Documents:        ${result.documentsProcessed}`);
  console.log(`  Chunks Created:   ${result.chunksCreated}`);
  console.log(`  Chunks Stored:    ${info.count}`);

  console.log("\n✅ Indexing complete");
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
