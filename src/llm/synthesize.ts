// ============================================
// LLM Synthesis: Generate answers from a context pack
// ============================================

import { CHATBOT_SYSTEM_PROMPT, NO_CONTEXT_MESSAGE, buildUserMessage } from "./prompts.js";
import type { TextGenerator } from "./client.js";
import { formatContext } from "../evidence/buildContextPack.js";
import { logger } from "../lib/logger.js";
import type { ChatbotAnswer, ContextPack } from "../evidence/types.js";

// "[Source 2]", "(source: refund_policy)" and the whitespace before them
const CITATION_MARKER = /\s*[[(]source\s+[^\])]*[\])]/gi;

/**
 * Remove inline source markers the model copies from the prompt.
 * Citations travel in the structured `sources` list instead.
 */
export function stripCitationMarkers(text: string): string {
  return text.replace(CITATION_MARKER, "").trim();
}

/**
 * Answer a question from its context pack.
 *
 * An empty pack short-circuits to the fixed no-context message without
 * calling the model. Generation failures propagate to the caller.
 */
export async function synthesizeAnswer(
  generator: TextGenerator,
  question: string,
  pack: ContextPack
): Promise<ChatbotAnswer> {
  if (pack.blocks.length === 0) {
    logger.info("No context found, skipping generation", { stage: "llm" });
    return { answer: NO_CONTEXT_MESSAGE, sources: [], hasContext: false, query: question };
  }

  const userMessage = buildUserMessage(question, formatContext(pack.blocks));

  logger.info("Starting synthesis", {
    stage: "llm",
    blockCount: pack.blocks.length,
    contextLength: userMessage.length,
  });

  const raw = await generator.generate(CHATBOT_SYSTEM_PROMPT, userMessage);

  return {
    answer: stripCitationMarkers(raw),
    sources: pack.sources,
    hasContext: true,
    query: question,
  };
}
