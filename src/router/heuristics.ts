// ============================================
// Router Heuristics: Deterministic classification + name extraction
// ============================================

import {
  type Classification,
  type QueryCategory,
  POLICY_TERMS,
  CUSTOMER_TERMS,
  NAME_KEYWORDS,
} from "./types.js";

/**
 * Vocabulary terms contained in an already lower-cased question.
 */
export function matchTerms(normalizedQuestion: string, terms: readonly string[]): string[] {
  return terms.filter((term) => normalizedQuestion.includes(term));
}

/**
 * Classify a question as policy, customer or ambiguous.
 *
 * Customer wins when both vocabularies match: customer data is the more
 * specific answer. Known customer names count as customer evidence.
 * Never throws; the empty string is ambiguous.
 */
export function classifyQuestion(
  question: string,
  knownCustomerNames: readonly string[] = []
): Classification {
  const normalizedQuestion = question.toLowerCase();

  const policyTerms = matchTerms(normalizedQuestion, POLICY_TERMS);
  const customerTerms = matchTerms(normalizedQuestion, CUSTOMER_TERMS);
  const customerNames = knownCustomerNames.filter((name) => {
    const normalizedName = name.trim().toLowerCase();
    return normalizedName.length > 0 && normalizedQuestion.includes(normalizedName);
  });

  const isCustomer = customerNames.length > 0 || customerTerms.length > 0;
  const isPolicy = policyTerms.length > 0;

  let category: QueryCategory;
  if (isCustomer) {
    category = "customer";
  } else if (isPolicy) {
    category = "policy";
  } else {
    category = "ambiguous";
  }

  return {
    category,
    evidence: { policyTerms, customerTerms, customerNames },
  };
}

// ============================================
// Customer name extraction
// ============================================

// Double-quoted spans may contain apostrophes ("Sean O'Brien"). A quote
// glued to a word character (possessive, contraction) opens nothing.
const QUOTED_SPAN = /(?<!\w)"([^"]+)"(?!\w)|(?<!\w)'([^']+)'(?!\w)/;

const TRAILING_NOISE = /(?:['’]s|[,.?!;:])+$/;

const UPPERCASE_START = /^\p{Lu}/u;

/**
 * Drop a trailing possessive and punctuation: "Chen's," → "Chen".
 */
export function stripToken(token: string): string {
  return token.replace(TRAILING_NOISE, "");
}

function isNameKeyword(token: string): boolean {
  return (NAME_KEYWORDS as readonly string[]).includes(token.toLowerCase());
}

function startsUppercase(token: string): boolean {
  return UPPERCASE_START.test(token);
}

/**
 * Best-effort customer name from free text. Not a named-entity recognizer.
 *
 * Tiers, first hit wins:
 * 1. a quoted span, verbatim
 * 2. the token after "customer", "for", "profile", "tickets" or "about",
 *    joined with a capitalized surname when one follows
 * 3. the first two capitalized tokens
 */
export function extractCustomerName(question: string): string | null {
  const quoted = QUOTED_SPAN.exec(question);
  if (quoted) {
    const span = quoted[1] ?? quoted[2];
    if (span) return span;
  }

  const tokens = question.split(/\s+/).filter(Boolean);

  const adjacent = extractKeywordAdjacent(tokens);
  if (adjacent) return adjacent;

  const capitalized = tokens
    .filter(startsUppercase)
    .map(stripToken)
    .filter((token) => token.length > 0 && !isNameKeyword(token));

  if (capitalized.length > 0) {
    return capitalized.slice(0, 2).join(" ");
  }

  return null;
}

function extractKeywordAdjacent(tokens: string[]): string | null {
  for (let i = 0; i < tokens.length - 1; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];
    if (token === undefined || next === undefined || !isNameKeyword(token)) continue;

    const candidate = stripToken(next);
    if (!candidate || isNameKeyword(candidate)) continue;

    // "about Sarah Chen's" → "Sarah Chen"; "about Sarah's" ends the name
    const following = tokens[i + 2];
    if (following !== undefined && candidate === next && startsUppercase(candidate)) {
      const surname = stripToken(following);
      if (surname && startsUppercase(surname) && !isNameKeyword(surname)) {
        return `${candidate} ${surname}`;
      }
    }

    return candidate;
  }

  return null;
}
