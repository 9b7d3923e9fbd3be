// ============================================
// Pipeline: Chatbot path (context aggregation + synthesis)
// ============================================

import crypto from "crypto";
import { buildContextPack, DEFAULT_CONTEXT_RESULTS } from "../evidence/buildContextPack.js";
import { synthesizeAnswer } from "../llm/synthesize.js";
import { createRequestLogger } from "../lib/logger.js";
import { settle } from "../lib/settle.js";
import type { TextGenerator } from "../llm/client.js";
import type { CustomerRecord, CustomerStore } from "../customers/types.js";
import type { VectorSearch } from "../retrieval/types.js";
import type { ChatbotAnswer } from "../evidence/types.js";

/**
 * Pipeline configuration.
 */
export const PIPELINE_VERSION = "pipeline.v1.0";

export interface ChatbotDeps {
  store: CustomerStore;
  search: VectorSearch;
  generator: TextGenerator;
  collection: string;
  contextResults?: number;
}

/**
 * Answers a question from customer records and policy documents together.
 *
 * Flow:
 * 1. Snapshot known customers
 * 2. Gate and gather context (customer first, then policy)
 * 3. Synthesize, or return the no-context message
 */
export class Chatbot {
  constructor(private readonly deps: ChatbotDeps) {}

  async answer(question: string, requestId = crypto.randomUUID().slice(0, 8)): Promise<ChatbotAnswer> {
    const log = createRequestLogger(requestId, "chatbot");
    const startTime = Date.now();

    log.info("Pipeline started", { questionPreview: question.slice(0, 80) });

    const knownCustomers = await this.loadKnownCustomers(requestId);

    const pack = await buildContextPack(question, knownCustomers, {
      store: this.deps.store,
      search: this.deps.search,
      collection: this.deps.collection,
      nResults: this.deps.contextResults ?? DEFAULT_CONTEXT_RESULTS,
    });

    const result = await synthesizeAnswer(this.deps.generator, question, pack);

    log.info("Pipeline complete", {
      hasContext: result.hasContext,
      sourceCount: result.sources.length,
      latencyMs: Date.now() - startTime,
    });

    return result;
  }

  /**
   * Every customer, used to spot full names in the question.
   * An unreachable store yields an empty snapshot.
   */
  private async loadKnownCustomers(requestId: string): Promise<CustomerRecord[]> {
    const snapshot = await settle(this.deps.store.searchCustomers(""));
    if (snapshot.ok) return snapshot.value;

    createRequestLogger(requestId, "customer").warn("Known-customer snapshot failed", {
      reason: snapshot.reason,
    });
    return [];
  }
}
