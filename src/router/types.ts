// ============================================
// Router Types: question classification contracts
// ============================================

/**
 * Current router version.
 * Bump when classification vocabularies change.
 */
export const ROUTER_VERSION = "router.v1.0";

/**
 * Three-way classification of a question.
 */
export type QueryCategory = "policy" | "customer" | "ambiguous";

/**
 * Raw matches that produced a classification.
 */
export type ClassificationEvidence = {
  policyTerms: string[];
  customerTerms: string[];
  customerNames: string[];
};

export type Classification = {
  category: QueryCategory;
  evidence: ClassificationEvidence;
};

/**
 * Agent selected by the orchestrator path.
 */
export type AgentTarget = "policy" | "customer";

export type RouteDecision = {
  target: AgentTarget;
  classification: Classification;

  /** True when the question was ambiguous and the default target was used */
  defaulted: boolean;
};

// ============================================
// Vocabularies
// ============================================

/**
 * Policy vocabulary. Substring matches on the lower-cased question.
 */
export const POLICY_TERMS = [
  "policy",
  "refund",
  "warranty",
  "shipping",
  "privacy",
  "terms",
  "guarantee",
  "coverage",
] as const;

/**
 * Customer vocabulary. Substring matches on the lower-cased question.
 */
export const CUSTOMER_TERMS = [
  "customer",
  "profile",
  "support ticket",
  "issue",
  "complaint",
  "order",
  "account",
] as const;

/**
 * Tokens after which a customer name usually follows.
 * Never returned as a name themselves.
 */
export const NAME_KEYWORDS = ["customer", "for", "profile", "tickets", "about"] as const;

/**
 * Orchestrator target for ambiguous questions: the policy agent is tried first.
 */
export const AMBIGUOUS_DEFAULT_TARGET: AgentTarget = "policy";
