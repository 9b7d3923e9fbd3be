// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "POLICY_NOT_FOUND"
  | "RETRIEVAL_FAILED"
  | "RECORD_STORE_FAILED"
  | "GENERATION_FAILED"
  | "INDEXING_FAILED"
  | "CONFIG_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class SupportDeskError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "SupportDeskError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** True when err is a SupportDeskError carrying the given code */
export function isErrorCode(err: unknown, code: ErrorCode): err is SupportDeskError {
  return err instanceof SupportDeskError && err.code === code;
}

/** A canonical policy document does not exist */
export function policyNotFound(policyId: string): SupportDeskError {
  return new SupportDeskError({
    code: "POLICY_NOT_FOUND",
    message: `Policy '${policyId}' not found`,
    context: { policyId },
  });
}

/** Create a retrieval error */
export function retrievalError(message: string, cause?: unknown): SupportDeskError {
  return new SupportDeskError({
    code: "RETRIEVAL_FAILED",
    message,
    cause,
  });
}

/** Create a record store error */
export function recordStoreError(message: string, cause?: unknown): SupportDeskError {
  return new SupportDeskError({
    code: "RECORD_STORE_FAILED",
    message,
    cause,
  });
}

/** Create a generation error */
export function generationError(message: string, cause?: unknown): SupportDeskError {
  return new SupportDeskError({
    code: "GENERATION_FAILED",
    message,
    cause,
  });
}

/** Create a configuration error */
export function configError(message: string): SupportDeskError {
  return new SupportDeskError({
    code: "CONFIG_ERROR",
    message,
  });
}

/** Create an indexing error */
export function indexingError(message: string, cause?: unknown): SupportDeskError {
  return new SupportDeskError({
    code: "INDEXING_FAILED",
    message,
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): SupportDeskError {
  if (err instanceof SupportDeskError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new SupportDeskError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "POLICY_NOT_FOUND":
      return "I couldn't find that policy document.";
    case "RETRIEVAL_FAILED":
      return "I couldn't search the policy documents. Please try again.";
    case "RECORD_STORE_FAILED":
      return "I couldn't reach the customer database. Please try again.";
    case "GENERATION_FAILED":
      return "I found some information but couldn't generate an answer. Please try again.";
    default:
      return "Something went wrong. Please try again.";
  }
}
