// ============================================
// Evidence Types: context assembled for answer synthesis
// ============================================

/**
 * Current context-assembly version.
 * Bump when block formatting or gating vocabularies change.
 */
export const CONTEXT_VERSION = "context.v1.0";

export type SourceType = "customer_data" | "document" | (string & {});

/**
 * A citation shown to the user next to an answer.
 * Relevance is a whole percentage string, e.g. "87%".
 */
export type SourceRef = {
  id: number;
  label: string;
  relevance: string;
  type: SourceType;
};

/**
 * One numbered block of prompt context.
 */
export type ContextBlock = {
  sourceId: number;
  origin: "customer" | "policy";
  text: string;
};

export type ContextGates = {
  customer: boolean;
  policy: boolean;

  /** Customer gate forced on because neither vocabulary matched */
  defaulted: boolean;
};

/**
 * Everything the synthesizer needs: blocks in encounter order
 * (customer first), their citations, and which gates fired.
 */
export type ContextPack = {
  blocks: ContextBlock[];
  sources: SourceRef[];
  gates: ContextGates;
  matchedCustomerNames: string[];
};

export function createEmptyContextPack(gates: ContextGates): ContextPack {
  return {
    blocks: [],
    sources: [],
    gates,
    matchedCustomerNames: [],
  };
}

/**
 * Final result of the chatbot path.
 */
export type ChatbotAnswer = {
  answer: string;
  sources: SourceRef[];
  hasContext: boolean;
  query: string;
};
