// ============================================
// API Middleware: Auth, Rate Limiting, Validation
// ============================================

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import type { ApiKeyEntry } from "../config/env.js";

// ============================================
// Types
// ============================================

export interface AuthenticatedRequest extends Request {
  apiKeyId?: string;
  apiKeyName?: string;
  requestId?: string;
}

// ============================================
// API Key Authentication
// ============================================

/**
 * Secret from a "Bearer <api-key>" header, or null when malformed.
 */
export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const parts = header.split(" ");
  if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) return null;
  return parts[1];
}

/**
 * Match a provided key against configured keys with timing-safe comparison.
 */
export function findApiKey(
  keys: readonly ApiKeyEntry[],
  providedKey: string
): { id: string; name: string } | null {
  const providedBuffer = Buffer.from(providedKey);

  for (const key of keys) {
    const storedBuffer = Buffer.from(key.secret);

    // timingSafeEqual requires equal lengths
    if (
      providedBuffer.length === storedBuffer.length &&
      crypto.timingSafeEqual(providedBuffer, storedBuffer)
    ) {
      return { id: key.id, name: key.name };
    }
  }

  return null;
}

export function authenticateApiKey(
  keys: readonly ApiKeyEntry[]
): (req: AuthenticatedRequest, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const providedKey = parseBearerToken(req.headers.authorization);

    if (!providedKey) {
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "Missing or malformed Authorization header. Use: Bearer <api-key>",
      });
      return;
    }

    const validKey = findApiKey(keys, providedKey);
    if (!validKey) {
      const userAgent = req.headers["user-agent"];
      logger.warn("Invalid API key attempt", {
        stage: "api",
        requestId: req.requestId,
        ip: req.ip ?? "unknown",
        userAgent: userAgent ? userAgent.slice(0, 100) : "unknown",
      });

      res.status(401).json({ error: "UNAUTHORIZED", message: "Invalid API key" });
      return;
    }

    req.apiKeyId = validKey.id;
    req.apiKeyName = validKey.name;
    next();
  };
}

// ============================================
// Rate Limiting
// ============================================

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export type RateLimitVerdict = {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAt: number;
};

/**
 * Fixed-window counter per identifier, in memory.
 */
export class RateLimiter {
  private readonly entries = new Map<string, RateLimitEntry>();

  constructor(
    private readonly windowMs: number,
    private readonly maxRequests: number
  ) {}

  hit(identifier: string, now = Date.now()): RateLimitVerdict {
    let entry = this.entries.get(identifier);

    if (!entry || entry.resetAt <= now) {
      entry = { count: 1, resetAt: now + this.windowMs };
      this.entries.set(identifier, entry);
    } else {
      entry.count++;
    }

    return {
      allowed: entry.count <= this.maxRequests,
      limit: this.maxRequests,
      remaining: Math.max(0, this.maxRequests - entry.count),
      resetAt: entry.resetAt,
    };
  }

  /** Drop expired windows. */
  sweep(now = Date.now()): void {
    for (const [key, entry] of this.entries) {
      if (entry.resetAt <= now) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Rate limiting middleware, keyed by API key id or client IP.
 */
export function rateLimit(options: {
  windowMs: number;
  maxRequests: number;
}): (req: AuthenticatedRequest, res: Response, next: NextFunction) => void {
  const limiter = new RateLimiter(options.windowMs, options.maxRequests);

  // Must not keep the process alive on its own
  setInterval(() => limiter.sweep(), options.windowMs).unref();

  return (req, res, next) => {
    const identifier = req.apiKeyId ?? req.ip ?? "unknown";
    const now = Date.now();
    const verdict = limiter.hit(identifier, now);

    res.setHeader("X-RateLimit-Limit", verdict.limit);
    res.setHeader("X-RateLimit-Remaining", verdict.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(verdict.resetAt / 1000));

    if (!verdict.allowed) {
      logger.warn("Rate limit exceeded", {
        stage: "api",
        requestId: req.requestId,
        identifier,
        limit: verdict.limit,
      });

      res.status(429).json({
        error: "RATE_LIMIT_EXCEEDED",
        message: "Too many requests. Please try again later.",
        retryAfter: Math.ceil((verdict.resetAt - now) / 1000),
      });
      return;
    }

    next();
  };
}

// ============================================
// Input Validation
// ============================================

const questionField = z
  .string()
  .trim()
  .min(1, "Question cannot be empty")
  .max(2000, "Question cannot exceed 2000 characters");

/**
 * Body of POST /api/v1/ask (chatbot path).
 */
export const askRequestSchema = z.object({
  question: questionField,
  options: z
    .object({
      includeSources: z.boolean().optional(),
    })
    .optional(),
});

export type AskRequest = z.infer<typeof askRequestSchema>;

/**
 * Body of POST /api/v1/route (orchestrator path).
 */
export const routeRequestSchema = z.object({
  question: questionField,
});

export type RouteRequest = z.infer<typeof routeRequestSchema>;

export type ValidationIssue = { field: string; message: string };

export function describeIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validation middleware factory. Replaces the body with the parsed value.
 */
export function validateBody<T>(
  schema: z.ZodType<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      res.status(400).json({
        error: "VALIDATION_ERROR",
        message: "Invalid request body",
        details: describeIssues(result.error),
      });
      return;
    }

    req.body = result.data;
    next();
  };
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Use the caller's X-Request-Id when given, otherwise a short random id.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const provided = Array.isArray(header) ? header[0] : header;
  return provided?.trim() || crypto.randomUUID().slice(0, 8);
}

export function addRequestId(req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.headers["x-request-id"]);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// CORS Configuration
// ============================================

export function isOriginAllowed(allowedOrigins: readonly string[], origin: string | undefined): boolean {
  if (!origin) return false;
  return allowedOrigins.includes("*") || allowedOrigins.includes(origin);
}

export function corsMiddleware(
  allowedOrigins: readonly string[]
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    const origin = req.headers.origin;
    if (origin && isOriginAllowed(allowedOrigins, origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
    }

    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, X-Request-Id");
    res.setHeader("Access-Control-Max-Age", "86400");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}
