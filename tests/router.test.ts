// ============================================
// Router Tests: classification, name extraction, agent selection
// ============================================

import { describe, it, expect } from "vitest";
import { classifyQuestion, extractCustomerName, stripToken } from "../src/router/heuristics.js";
import { routeQuestion } from "../src/router/routeQuestion.js";

describe("classifyQuestion", () => {
  it("classifies policy-only vocabulary as policy", () => {
    const result = classifyQuestion("What is your refund policy?");
    expect(result.category).toBe("policy");
    expect(result.evidence.policyTerms).toEqual(["policy", "refund"]);
    expect(result.evidence.customerTerms).toEqual([]);
  });

  it("classifies customer vocabulary as customer", () => {
    const result = classifyQuestion("Show me the order history");
    expect(result.category).toBe("customer");
    expect(result.evidence.customerTerms).toEqual(["order"]);
  });

  it("lets customer win when both vocabularies match", () => {
    const result = classifyQuestion("Does the warranty cover my order?");
    expect(result.category).toBe("customer");
    expect(result.evidence.policyTerms).toEqual(["warranty"]);
    expect(result.evidence.customerTerms).toEqual(["order"]);
  });

  it("treats a known customer name as customer evidence", () => {
    const result = classifyQuestion("How is sarah chen doing?", ["Sarah Chen", "John Smith"]);
    expect(result.category).toBe("customer");
    expect(result.evidence.customerNames).toEqual(["Sarah Chen"]);
  });

  it("classifies a possessive mention of a known customer as customer", () => {
    const result = classifyQuestion("Tell me about Sarah Chen's orders", ["Sarah Chen"]);
    expect(result.category).toBe("customer");
    expect(result.evidence.customerNames).toEqual(["Sarah Chen"]);
  });

  it("ignores blank known names", () => {
    expect(classifyQuestion("hello there", ["", "  "]).category).toBe("ambiguous");
  });

  it("is ambiguous when nothing matches, including the empty string", () => {
    expect(classifyQuestion("hello there").category).toBe("ambiguous");
    expect(classifyQuestion("").category).toBe("ambiguous");
  });

  it("matches multi-word terms as substrings", () => {
    const result = classifyQuestion("Open a support ticket please");
    expect(result.evidence.customerTerms).toEqual(["support ticket"]);
  });
});

describe("extractCustomerName", () => {
  it("returns a double-quoted span verbatim", () => {
    expect(extractCustomerName('Show tickets for "Lisa Anderson" please')).toBe("Lisa Anderson");
  });

  it("returns a single-quoted span verbatim", () => {
    expect(extractCustomerName("show 'Ema Johnson' tickets")).toBe("Ema Johnson");
  });

  it("prefers a quoted span over a keyword-adjacent token", () => {
    expect(extractCustomerName("profile for 'Sarah Chen'")).toBe("Sarah Chen");
  });

  it("does not treat a possessive apostrophe as a quote", () => {
    expect(extractCustomerName("What is customer Ema Johnson's profile?")).toBe("Ema Johnson");
  });

  it("joins a capitalized surname after the keyword-adjacent token", () => {
    expect(extractCustomerName("Tell me about Sarah Chen's orders")).toBe("Sarah Chen");
  });

  it("stops at a possessive first name", () => {
    expect(extractCustomerName("what about sarah's account?")).toBe("sarah");
  });

  it("skips keywords that follow keywords", () => {
    expect(extractCustomerName("Show me the profile for john")).toBe("john");
  });

  it("falls back to the first two capitalized tokens", () => {
    expect(extractCustomerName("did Michael Davis call?")).toBe("Michael Davis");
  });

  it("returns null without quotes, keywords or capitals", () => {
    expect(extractCustomerName("is there anything new")).toBeNull();
    expect(extractCustomerName("tickets for customer")).toBeNull();
    expect(extractCustomerName("")).toBeNull();
  });
});

describe("stripToken", () => {
  it("removes possessives and trailing punctuation", () => {
    expect(stripToken("Chen's,")).toBe("Chen");
    expect(stripToken("Smith?")).toBe("Smith");
    expect(stripToken("Ema")).toBe("Ema");
  });
});

describe("routeQuestion", () => {
  it("sends policy-only questions to the policy agent", () => {
    const decision = routeQuestion("Tell me about shipping");
    expect(decision.target).toBe("policy");
    expect(decision.defaulted).toBe(false);
  });

  it("sends any customer vocabulary to the customer agent", () => {
    const decision = routeQuestion("Refund status for customer Ema");
    expect(decision.target).toBe("customer");
    expect(decision.classification.category).toBe("customer");
  });

  it("defaults ambiguous questions to the policy agent", () => {
    const decision = routeQuestion("hello");
    expect(decision.target).toBe("policy");
    expect(decision.defaulted).toBe(true);
    expect(decision.classification.category).toBe("ambiguous");
  });
});
