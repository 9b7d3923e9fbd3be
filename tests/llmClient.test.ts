// ============================================
// LLM Client Tests
// ============================================

import { describe, it, expect } from "vitest";
import { OpenAIGenerator } from "../src/llm/client.js";
import { isErrorCode } from "../src/lib/errors.js";

describe("OpenAIGenerator", () => {
  it("refuses to start without an API key", () => {
    let caught: unknown;
    try {
      new OpenAIGenerator({ apiKey: "  " });
    } catch (err) {
      caught = err;
    }

    expect(isErrorCode(caught, "CONFIG_ERROR")).toBe(true);
  });

  it("builds with a key", () => {
    expect(new OpenAIGenerator({ apiKey: "test-secret" })).toBeInstanceOf(OpenAIGenerator);
  });
});
