// ============================================
// Router: Agent selector (never answers questions)
// ============================================

import { type RouteDecision, AMBIGUOUS_DEFAULT_TARGET } from "./types.js";
import { classifyQuestion } from "./heuristics.js";
import { logger } from "../lib/logger.js";

/**
 * Pick the agent for the orchestrator path.
 *
 * Policy-only questions go to the policy agent, any customer vocabulary to
 * the customer agent, and ambiguous questions to the policy agent first.
 * Known customer names are not consulted here.
 */
export function routeQuestion(question: string): RouteDecision {
  const classification = classifyQuestion(question);

  const decision: RouteDecision =
    classification.category === "ambiguous"
      ? { target: AMBIGUOUS_DEFAULT_TARGET, classification, defaulted: true }
      : { target: classification.category, classification, defaulted: false };

  logger.info("Routing decision", {
    stage: "router",
    questionPreview: question.slice(0, 80),
    category: classification.category,
    target: decision.target,
    defaulted: decision.defaulted,
    policyTerms: classification.evidence.policyTerms,
    customerTerms: classification.evidence.customerTerms,
  });

  return decision;
}
