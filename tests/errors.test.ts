// ============================================
// Error Helper Tests
// ============================================

import { describe, it, expect } from "vitest";
import {
  SupportDeskError,
  getUserMessage,
  isErrorCode,
  policyNotFound,
  recordStoreError,
  wrapError,
} from "../src/lib/errors.js";

describe("wrapError", () => {
  it("passes SupportDeskError through unchanged", () => {
    const original = recordStoreError("db down");
    expect(wrapError(original)).toBe(original);
  });

  it("wraps plain errors as UNKNOWN_ERROR with the request id", () => {
    const wrapped = wrapError(new Error("socket hang up"), "req-1");

    expect(wrapped).toBeInstanceOf(SupportDeskError);
    expect(wrapped.code).toBe("UNKNOWN_ERROR");
    expect(wrapped.message).toBe("socket hang up");
    expect(wrapped.requestId).toBe("req-1");
  });

  it("stringifies non-error values", () => {
    expect(wrapError("bad").message).toBe("bad");
  });
});

describe("isErrorCode", () => {
  it("matches only the given code", () => {
    const err = policyNotFound("refund_policy");

    expect(isErrorCode(err, "POLICY_NOT_FOUND")).toBe(true);
    expect(isErrorCode(err, "RETRIEVAL_FAILED")).toBe(false);
    expect(isErrorCode(new Error("x"), "POLICY_NOT_FOUND")).toBe(false);
  });
});

describe("getUserMessage", () => {
  it("hides internal detail behind a per-code message", () => {
    expect(getUserMessage(recordStoreError("connection refused on 10.0.0.3"))).toBe(
      "I couldn't reach the customer database. Please try again."
    );
    expect(getUserMessage(wrapError(new Error("x")))).toBe("Something went wrong. Please try again.");
  });
});

describe("toJSON", () => {
  it("serialises code, message and context", () => {
    expect(policyNotFound("warranty_policy").toJSON()).toEqual({
      code: "POLICY_NOT_FOUND",
      message: "Policy 'warranty_policy' not found",
      requestId: undefined,
      context: { policyId: "warranty_policy" },
    });
  });
});
