// ============================================
// API Module: Public REST API
// ============================================

import express, { type Router } from "express";
import { logger } from "../lib/logger.js";
import type { Container } from "../app/container.js";
import type { ApiKeyEntry } from "../config/env.js";
import {
  addRequestId,
  askRequestSchema,
  authenticateApiKey,
  corsMiddleware,
  rateLimit,
  routeRequestSchema,
  validateBody,
} from "./middleware.js";
import { createAskHandler, createRouteHandler, handleHealthCheck } from "./handler.js";

export interface ApiOptions {
  keys: readonly ApiKeyEntry[];
  allowedOrigins: readonly string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

/**
 * Mount under "/api". Health is public; ask and route need an API key and
 * answer 503 when no keys are configured.
 */
export function createApiRouter(container: Container, options: ApiOptions): Router {
  const router = express.Router();

  router.use(corsMiddleware(options.allowedOrigins));
  router.use(addRequestId);

  router.get("/v1/health", handleHealthCheck);

  if (options.keys.length > 0) {
    const auth = authenticateApiKey(options.keys);
    const limiter = rateLimit({
      windowMs: options.rateLimitWindowMs,
      maxRequests: options.rateLimitMaxRequests,
    });
    const body = express.json({ limit: "100kb" });

    router.post("/v1/ask", body, auth, limiter, validateBody(askRequestSchema), createAskHandler(container));
    router.post("/v1/route", body, auth, limiter, validateBody(routeRequestSchema), createRouteHandler(container));

    logger.info("API routes enabled", {
      stage: "startup",
      keyCount: options.keys.length,
      rateLimitWindow: options.rateLimitWindowMs,
      rateLimitMax: options.rateLimitMaxRequests,
    });
  } else {
    router.post(["/v1/ask", "/v1/route"], (_req, res) => {
      res.status(503).json({
        error: "API_NOT_CONFIGURED",
        message: "The API is not configured. Please set API_KEYS environment variable.",
      });
    });

    logger.info("API routes disabled (no API keys configured)", { stage: "startup" });
  }

  return router;
}

export {
  authenticateApiKey,
  rateLimit,
  validateBody,
  askRequestSchema,
  routeRequestSchema,
  addRequestId,
  corsMiddleware,
  type AuthenticatedRequest,
  type AskRequest,
  type RouteRequest,
} from "./middleware.js";

export {
  runAsk,
  runRoute,
  healthStatus,
  type AskResponse,
  type RouteResponse,
  type ApiErrorResponse,
  type HealthResponse,
} from "./handler.js";
