// ============================================
// Agent Types: structured results of the orchestrator path
// ============================================

import type { ProfileLookup, TicketLookup } from "../customers/lookup.js";
import type { SourceRef } from "../evidence/types.js";
import type { RetrievedChunk } from "../retrieval/types.js";

export type AgentName = "PolicyAgent" | "CustomerAgent";

/**
 * Full text of a canonical policy, returned by the keyword shortcut.
 */
export type PolicySummaryResult = {
  kind: "policy_summary";
  agent: "PolicyAgent";
  policyId: string;
  title: string;
  content: string;
};

/**
 * Answer built from a similarity search over the policy collection.
 * `generated` is false only for the fixed no-match answer.
 */
export type PolicyAnswerResult = {
  kind: "policy_answer";
  agent: "PolicyAgent";
  question: string;
  answer: string;
  sources: SourceRef[];
  hits: RetrievedChunk[];
  hasContext: boolean;
  generated: boolean;
};

/**
 * Only the facets that were fetched are present.
 */
export type CustomerFacets = {
  profile?: ProfileLookup;
  tickets?: TicketLookup;
};

export type CustomerDataResult = {
  kind: "customer_data";
  agent: "CustomerAgent";
  question: string;
  customerName: string;
  data: CustomerFacets;
};

export type AgentErrorResult = {
  kind: "error";
  agent: AgentName;
  message: string;
};

export type AgentResult =
  | PolicySummaryResult
  | PolicyAnswerResult
  | CustomerDataResult
  | AgentErrorResult;

/**
 * Agents never throw for expected failures; they return an `error` result.
 */
export interface Agent<R extends AgentResult = AgentResult> {
  readonly name: AgentName;
  answer(question: string): Promise<R>;
}
