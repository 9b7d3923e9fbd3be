#!/usr/bin/env npx tsx
// ============================================
// Ask Script: run sample questions through both paths
// ============================================
// Usage: npm run ask -- ["question"] [--route]
//
// Without a question, runs the built-in samples. --route uses the
// orchestrator path instead of the chatbot path.

import "dotenv/config";
import { getProductionContainer } from "../src/app/container.production.js";

const SAMPLE_QUESTIONS = [
  "What is the refund policy?",
  "How long does shipping take?",
  "What is customer Ema Johnson's profile?",
  "Show support tickets for John Smith",
  "Tell me about Sarah Chen's recent orders and our return process",
];

async function main() {
  const args = process.argv.slice(2);
  const useRoute = args.includes("--route");
  const questions = args.filter((a) => a !== "--route");
  const container = getProductionContainer();

  for (const question of questions.length > 0 ? questions : SAMPLE_QUESTIONS) {
    console.log("\n========================================");
    console.log(`Q: ${question}`);
    console.log("========================================");

    if (useRoute) {
      console.log(await container.orchestrator.process(question));
      continue;
    }

    const result = await container.chatbot.answer(question);
    console.log(result.answer);
    if (result.sources.length > 0) {
      console.log("\nSources:");
      for (const source of result.sources) {
        console.log(`  [${source.id}] ${source.label} (${source.relevance}, ${source.type})`);
      }
    }
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
