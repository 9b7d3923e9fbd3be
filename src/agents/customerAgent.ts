// ============================================
// Customer Agent: profile and ticket lookups by extracted name
// ============================================

import { getCustomerProfile, getCustomerTickets } from "../customers/lookup.js";
import type { CustomerStore } from "../customers/types.js";
import { logger } from "../lib/logger.js";
import { extractCustomerName, matchTerms } from "../router/heuristics.js";
import type { Agent, AgentErrorResult, CustomerDataResult, CustomerFacets } from "./types.js";

export const PROFILE_FACET_TERMS = ["profile", "customer info", "account", "details"] as const;
export const TICKET_FACET_TERMS = ["ticket", "support", "issue", "complaint", "history"] as const;

export const NAME_NOT_FOUND_MESSAGE =
  "Could not identify customer name in question. Please specify the customer name.";

export type CustomerAgentResult = CustomerDataResult | AgentErrorResult;

/**
 * Which facets a question asks for. Neither group matching means both.
 */
export function selectFacets(question: string): { profile: boolean; tickets: boolean } {
  const normalizedQuestion = question.toLowerCase();
  const profile = matchTerms(normalizedQuestion, PROFILE_FACET_TERMS).length > 0;
  const tickets = matchTerms(normalizedQuestion, TICKET_FACET_TERMS).length > 0;

  if (!profile && !tickets) {
    return { profile: true, tickets: true };
  }
  return { profile, tickets };
}

export class CustomerAgent implements Agent<CustomerAgentResult> {
  readonly name = "CustomerAgent";

  constructor(private readonly store: CustomerStore) {}

  async answer(question: string): Promise<CustomerAgentResult> {
    const customerName = extractCustomerName(question);
    if (!customerName) {
      logger.info("No customer name in question", { stage: "extract" });
      return { kind: "error", agent: this.name, message: NAME_NOT_FOUND_MESSAGE };
    }

    const facets = selectFacets(question);

    logger.info("Customer query", {
      stage: "customer",
      customerName,
      profile: facets.profile,
      tickets: facets.tickets,
    });

    const data: CustomerFacets = {};
    try {
      if (facets.profile) {
        data.profile = await getCustomerProfile(this.store, customerName);
      }
      if (facets.tickets) {
        data.tickets = await getCustomerTickets(this.store, customerName);
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error("Customer lookup failed", { stage: "customer", customerName, error: err });
      return { kind: "error", agent: this.name, message: `Customer lookup failed: ${reason}` };
    }

    return { kind: "customer_data", agent: this.name, question, customerName, data };
  }
}
