// ============================================
// Policy Agent: canonical documents or similarity search
// ============================================

import { isErrorCode } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { settle } from "../lib/settle.js";
import { POLICY_AGENT_PROMPT, NO_POLICY_MATCH_MESSAGE, buildUserMessage } from "../llm/prompts.js";
import { stripCitationMarkers } from "../llm/synthesize.js";
import type { TextGenerator } from "../llm/client.js";
import { formatPolicyTitle, type PolicyId, type PolicyLibrary } from "../policies/library.js";
import type { RetrievedChunk, VectorSearch } from "../retrieval/types.js";
import { formatContext, policySource } from "../evidence/buildContextPack.js";
import type { ContextBlock } from "../evidence/types.js";
import type {
  Agent,
  AgentErrorResult,
  PolicyAnswerResult,
  PolicySummaryResult,
} from "./types.js";

/**
 * Trigger keyword → canonical policy. Checked in this order; first hit wins.
 */
export const POLICY_SHORTCUTS: ReadonlyArray<readonly [keyword: string, policyId: PolicyId]> = [
  ["refund", "refund_policy"],
  ["warranty", "warranty_policy"],
  ["shipping", "shipping_policy"],
  ["privacy", "privacy_policy"],
  ["terms", "terms_of_service"],
];

export const POLICY_SEARCH_TOP_K = 3;

export type PolicyAgentResult = PolicySummaryResult | PolicyAnswerResult | AgentErrorResult;

export interface PolicyAgentDeps {
  library: PolicyLibrary;
  search: VectorSearch;
  generator: TextGenerator;
  collection: string;
}

/**
 * Canonical policy for the first shortcut keyword in the question, if any.
 */
export function matchPolicyShortcut(question: string): PolicyId | null {
  const normalizedQuestion = question.toLowerCase();
  const hit = POLICY_SHORTCUTS.find(([keyword]) => normalizedQuestion.includes(keyword));
  return hit ? hit[1] : null;
}

export class PolicyAgent implements Agent<PolicyAgentResult> {
  readonly name = "PolicyAgent";

  constructor(private readonly deps: PolicyAgentDeps) {}

  async answer(question: string): Promise<PolicyAgentResult> {
    const policyId = matchPolicyShortcut(question);
    if (policyId) {
      return this.summarize(policyId);
    }
    return this.searchAndAnswer(question);
  }

  private async summarize(policyId: PolicyId): Promise<PolicySummaryResult | AgentErrorResult> {
    try {
      const content = await this.deps.library.getFullText(policyId);

      logger.info("Policy shortcut matched", { stage: "policy", policyId });

      return {
        kind: "policy_summary",
        agent: this.name,
        policyId,
        title: formatPolicyTitle(policyId),
        content,
      };
    } catch (err) {
      if (!isErrorCode(err, "POLICY_NOT_FOUND")) throw err;
      return { kind: "error", agent: this.name, message: err.message };
    }
  }

  private async searchAndAnswer(question: string): Promise<PolicyAnswerResult | AgentErrorResult> {
    const searched = await settle(
      this.deps.search.search(this.deps.collection, question, POLICY_SEARCH_TOP_K)
    );

    if (!searched.ok) {
      logger.error("Policy search failed", { stage: "policy", reason: searched.reason });
      return {
        kind: "error",
        agent: this.name,
        message: `Policy search failed: ${searched.reason}`,
      };
    }

    const hits = searched.value;
    if (hits.length === 0) {
      return {
        kind: "policy_answer",
        agent: this.name,
        question,
        answer: NO_POLICY_MATCH_MESSAGE,
        sources: [],
        hits: [],
        hasContext: false,
        generated: false,
      };
    }

    const sources = hits.map((hit, i) => policySource(hit, i + 1));
    const answer = await this.generateAnswer(question, hits);

    return {
      kind: "policy_answer",
      agent: this.name,
      question,
      answer,
      sources,
      hits,
      hasContext: true,
      generated: true,
    };
  }

  /**
   * One model call over the numbered hits. Failures propagate to the caller.
   */
  private async generateAnswer(question: string, hits: RetrievedChunk[]): Promise<string> {
    const blocks: ContextBlock[] = hits.map((hit, i) => ({
      sourceId: i + 1,
      origin: "policy",
      text: hit.content,
    }));
    const userMessage = buildUserMessage(question, formatContext(blocks));

    const raw = await this.deps.generator.generate(POLICY_AGENT_PROMPT, userMessage);
    return stripCitationMarkers(raw);
  }
}
