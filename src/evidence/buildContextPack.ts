// ============================================
// Build Context Pack: Customer records + policy chunks
// ============================================

import { logger } from "../lib/logger.js";
import { settle, type Settled } from "../lib/settle.js";
import { matchTerms } from "../router/heuristics.js";
import { metadataString, type RetrievedChunk, type VectorSearch } from "../retrieval/types.js";
import type { CustomerRecord, CustomerStore, SupportTicket } from "../customers/types.js";
import {
  type ContextBlock,
  type ContextGates,
  type ContextPack,
  type SourceRef,
  createEmptyContextPack,
} from "./types.js";

// ============================================
// Configuration
// ============================================

/**
 * Gate for customer context. Broader than the classifier's vocabulary.
 */
export const CUSTOMER_CONTEXT_TERMS = [
  "customer",
  "profile",
  "order",
  "ticket",
  "support",
  "history",
  "past",
  "recent",
  "account",
  "contact",
  "invoice",
  "purchase",
  "transaction",
] as const;

/**
 * Gate for policy context. Includes generic words ("how", "what is") so
 * most questions pull some policy text.
 */
export const POLICY_CONTEXT_TERMS = [
  "policy",
  "faq",
  "return",
  "refund",
  "shipping",
  "payment",
  "exchange",
  "warranty",
  "guarantee",
  "rules",
  "guidelines",
  "terms",
  "condition",
  "process",
  "procedure",
  "how",
  "what is",
  "explain",
] as const;

export const CUSTOMER_DB_HEADER = "=== CUSTOMER DATABASE RESULTS ===";
export const CUSTOMER_DB_LABEL = "customer_database";
export const DEFAULT_CONTEXT_RESULTS = 5;

const MAX_CONTEXT_TICKETS = 3;
const DOCUMENT_EXTENSION = /\.(txt|pdf|md)$/;

export interface ContextSources {
  store: CustomerStore;
  search: VectorSearch;
  collection: string;
  /** Policy hits to include, default 5 */
  nResults?: number;
}

// ============================================
// Gating
// ============================================

/**
 * Decide which sources to consult. When neither vocabulary matches, the
 * question is treated as a customer-data question.
 */
export function evaluateGates(
  question: string,
  knownCustomerNames: readonly string[]
): { gates: ContextGates; mentionedNames: string[] } {
  const normalizedQuestion = question.toLowerCase();

  const mentionedNames = knownCustomerNames.filter((name) => {
    const normalizedName = name.trim().toLowerCase();
    return normalizedName.length > 0 && normalizedQuestion.includes(normalizedName);
  });

  const customerGate =
    mentionedNames.length > 0 ||
    matchTerms(normalizedQuestion, CUSTOMER_CONTEXT_TERMS).length > 0;
  const policyGate = matchTerms(normalizedQuestion, POLICY_CONTEXT_TERMS).length > 0;
  const defaulted = !customerGate && !policyGate;

  return {
    gates: { customer: customerGate || defaulted, policy: policyGate, defaulted },
    mentionedNames,
  };
}

// ============================================
// Main
// ============================================

/**
 * Gather customer and policy context for one question.
 *
 * Customer blocks come first, then policy hits, numbered in that order.
 * Customer lookups are best-effort; a failed policy search rejects.
 */
export async function buildContextPack(
  question: string,
  knownCustomers: readonly CustomerRecord[],
  sources: ContextSources
): Promise<ContextPack> {
  const { gates, mentionedNames } = evaluateGates(
    question,
    knownCustomers.map((c) => c.name)
  );
  const pack = createEmptyContextPack(gates);
  pack.matchedCustomerNames = mentionedNames;

  logger.info("Building context pack", {
    stage: "context",
    customerGate: gates.customer,
    policyGate: gates.policy,
    defaulted: gates.defaulted,
    mentionedNames,
  });

  if (gates.customer) {
    const customerBlock = await gatherCustomerContext(question, mentionedNames, sources.store);
    if (customerBlock) {
      appendBlock(pack, "customer", customerBlock, {
        label: CUSTOMER_DB_LABEL,
        relevance: "100%",
        type: "customer_data",
      });
    }
  }

  if (gates.policy) {
    const hits = await sources.search.search(
      sources.collection,
      question,
      sources.nResults ?? DEFAULT_CONTEXT_RESULTS
    );

    for (const hit of hits) {
      const { label, relevance, type } = policySource(hit);
      appendBlock(pack, "policy", hit.content, { label, relevance, type });
    }
  }

  logger.info("Context pack built", {
    stage: "context",
    blockCount: pack.blocks.length,
    sources: pack.sources.map((s) => s.label),
  });

  return pack;
}

function appendBlock(
  pack: ContextPack,
  origin: ContextBlock["origin"],
  text: string,
  source: Omit<SourceRef, "id">
): void {
  const sourceId = pack.blocks.length + 1;
  pack.blocks.push({ sourceId, origin, text });
  pack.sources.push({ id: sourceId, ...source });
}

/**
 * Render blocks as numbered "[Source N]" sections for the prompt.
 */
export function formatContext(blocks: readonly ContextBlock[]): string {
  return blocks.map((b) => `[Source ${b.sourceId}]\n${b.text}`).join("\n\n");
}

// ============================================
// Policy citations
// ============================================

export function formatRelevance(similarity: number): string {
  return `${Math.round(similarity * 100)}%`;
}

export function sourceLabel(filename: string | undefined): string {
  return (filename ?? "document").replace(DOCUMENT_EXTENSION, "");
}

/**
 * Citation for a policy hit: filename without extension, rounded similarity.
 */
export function policySource(hit: RetrievedChunk, id = 0): SourceRef {
  return {
    id,
    label: sourceLabel(metadataString(hit.metadata, "filename")),
    relevance: formatRelevance(hit.similarity),
    type: metadataString(hit.metadata, "type") ?? "document",
  };
}

// ============================================
// Customer context
// ============================================

/**
 * Search by each mentioned full name until one returns customers, or by the
 * raw question when no known name was mentioned.
 */
async function findContextCustomers(
  question: string,
  mentionedNames: readonly string[],
  store: CustomerStore
): Promise<CustomerRecord[]> {
  if (mentionedNames.length === 0) {
    return store.searchCustomers(question);
  }

  for (const name of mentionedNames) {
    const customers = await store.searchCustomers(name);
    if (customers.length > 0) return customers;
  }

  return [];
}

async function gatherCustomerContext(
  question: string,
  mentionedNames: readonly string[],
  store: CustomerStore
): Promise<string | null> {
  const found = await settle(findContextCustomers(question, mentionedNames, store));
  if (!found.ok) {
    logger.warn("Customer search failed, continuing without customer context", {
      stage: "context",
      reason: found.reason,
    });
    return null;
  }

  if (found.value.length === 0) return null;

  let text = `${CUSTOMER_DB_HEADER}\n`;

  for (const customer of found.value) {
    const profile = await settle(store.getCustomer(customer.id));
    const tickets = await settle(store.findTickets(customer.id));

    logSubFetchFailure("profile", customer, profile);
    logSubFetchFailure("tickets", customer, tickets);

    text += formatCustomerSection(customer.name, profile, tickets);
  }

  return text.trim();
}

/**
 * Profile fields plus up to three most recent tickets. Sections whose fetch
 * failed are left out.
 */
export function formatCustomerSection(
  customerName: string,
  profile: Settled<CustomerRecord | null>,
  tickets: Settled<SupportTicket[]>
): string {
  let section: string;

  if (profile.ok && profile.value) {
    const p = profile.value;
    section =
      `\nCustomer: ${customerName}` +
      `\nEmail: ${p.email || "N/A"}` +
      `\nPhone: ${p.phone ?? "N/A"}` +
      `\nAddress: ${p.address ?? "N/A"}` +
      `\nAccount Status: ${p.accountStatus ?? "N/A"}`;
  } else {
    section = `\nCustomer: ${customerName}`;
  }

  if (tickets.ok && tickets.value.length > 0) {
    section += `\n\nSupport Tickets (${tickets.value.length}):\n`;
    for (const ticket of tickets.value.slice(0, MAX_CONTEXT_TICKETS)) {
      section += `  - ${ticket.title || "N/A"}: ${ticket.status || "N/A"}\n`;
    }
  }

  return `${section}\n`;
}

function logSubFetchFailure<T>(facet: string, customer: CustomerRecord, result: Settled<T>): void {
  if (result.ok) return;
  logger.warn("Customer sub-fetch failed, section omitted", {
    stage: "context",
    facet,
    customerId: customer.id,
    reason: result.reason,
  });
}
