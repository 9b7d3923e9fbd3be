// ============================================
// Policy Agent Tests
// ============================================

import { describe, it, expect, beforeEach } from "vitest";
import { PolicyAgent, matchPolicyShortcut } from "../src/agents/policyAgent.js";
import { NO_POLICY_MATCH_MESSAGE, POLICY_AGENT_PROMPT } from "../src/llm/prompts.js";
import { FakePolicyLibrary } from "./fakes/FakePolicyLibrary.js";
import { FakeTextGenerator } from "./fakes/FakeTextGenerator.js";
import { FakeVectorSearch, policyHit } from "./fakes/FakeVectorSearch.js";

const LIBRARY_DOCS = {
  refund_policy: "Refunds are issued within 30 days.",
  warranty_policy: "Electronics carry a 1-year warranty.",
  shipping_policy: "Standard shipping takes 5-7 days.",
};

function createAgent(search = new FakeVectorSearch(), generator = new FakeTextGenerator()) {
  const library = new FakePolicyLibrary(LIBRARY_DOCS);
  const agent = new PolicyAgent({ library, search, generator, collection: "policies_faqs" });
  return { agent, library, search, generator };
}

describe("matchPolicyShortcut", () => {
  it("uses the fixed table order, not the order of words in the question", () => {
    expect(matchPolicyShortcut("Is shipping free, and what about warranty?")).toBe("warranty_policy");
  });

  it("matches case-insensitively", () => {
    expect(matchPolicyShortcut("TERMS please")).toBe("terms_of_service");
  });

  it("does not treat 'return' as a refund trigger", () => {
    expect(matchPolicyShortcut("What is your return policy?")).toBeNull();
  });
});

describe("PolicyAgent", () => {
  it("returns the canonical document for a shortcut keyword", async () => {
    const { agent, search } = createAgent();

    const result = await agent.answer("How do refunds work?");

    expect(result).toEqual({
      kind: "policy_summary",
      agent: "PolicyAgent",
      policyId: "refund_policy",
      title: "Refund Policy",
      content: "Refunds are issued within 30 days.",
    });
    expect(search.calls).toHaveLength(0);
  });

  it("turns a missing canonical document into an error result", async () => {
    const { agent } = createAgent();

    const result = await agent.answer("Explain your privacy rules");

    expect(result).toEqual({
      kind: "error",
      agent: "PolicyAgent",
      message: "Policy 'privacy_policy' not found",
    });
  });

  describe("similarity search", () => {
    let search: FakeVectorSearch;
    let generator: FakeTextGenerator;

    beforeEach(() => {
      search = new FakeVectorSearch([
        policyHit("refund_policy_chunk_0", "Returns are accepted within 30 days.", 0.92, "refund_policy.md"),
        policyHit("terms_of_service_chunk_1", "Prices may change.", 0.41, "terms_of_service.md"),
      ]);
      generator = new FakeTextGenerator("Returns are accepted within 30 days [Source 1].");
    });

    it("searches the top 3 and returns a generated answer with sources", async () => {
      const { agent } = createAgent(search, generator);

      const result = await agent.answer("What is your return policy?");

      expect(search.calls).toEqual([
        { collection: "policies_faqs", query: "What is your return policy?", topK: 3 },
      ]);
      expect(generator.calls).toHaveLength(1);
      expect(generator.calls[0]?.systemPrompt).toBe(POLICY_AGENT_PROMPT);
      expect(result).toMatchObject({
        kind: "policy_answer",
        answer: "Returns are accepted within 30 days.",
        hasContext: true,
        generated: true,
        sources: [
          { id: 1, label: "refund_policy", relevance: "92%", type: "policy" },
          { id: 2, label: "terms_of_service", relevance: "41%", type: "policy" },
        ],
      });
    });

    it("surfaces a failed model call instead of answering with a raw chunk", async () => {
      generator.failWith(new Error("model unavailable"));
      const { agent } = createAgent(search, generator);

      await expect(agent.answer("What is your return policy?")).rejects.toThrow("model unavailable");
    });
  });

  it("returns a no-match answer without calling the generator when nothing is found", async () => {
    const { agent, generator } = createAgent();

    const result = await agent.answer("What is your return policy?");

    expect(result).toEqual({
      kind: "policy_answer",
      agent: "PolicyAgent",
      question: "What is your return policy?",
      answer: NO_POLICY_MATCH_MESSAGE,
      sources: [],
      hits: [],
      hasContext: false,
      generated: false,
    });
    expect(generator.calls).toHaveLength(0);
  });

  it("reports a failed search as an error result", async () => {
    const search = new FakeVectorSearch().failWith(new Error("vector store down"));
    const { agent } = createAgent(search);

    const result = await agent.answer("What is your return policy?");

    expect(result).toEqual({
      kind: "error",
      agent: "PolicyAgent",
      message: "Policy search failed: vector store down",
    });
  });
});
