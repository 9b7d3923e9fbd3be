// ============================================
// API Handler: /api/v1 endpoints
// ============================================

import type { Response } from "express";
import crypto from "crypto";
import { PIPELINE_VERSION } from "../app/pipeline.js";
import { formatAgentResult } from "../render/formatAgentResult.js";
import { createRequestLogger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import type { Container } from "../app/container.js";
import type { AgentName } from "../agents/types.js";
import { CONTEXT_VERSION, type SourceRef } from "../evidence/types.js";
import { ROUTER_VERSION, type AgentTarget } from "../router/types.js";
import type { AskRequest, AuthenticatedRequest, RouteRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface AskResponse {
  requestId: string;
  answer: string;
  hasContext: boolean;
  sources?: SourceRef[];
  metadata: {
    latencyMs: number;
    pipelineVersion: string;
    contextVersion: string;
  };
}

export interface RouteResponse {
  requestId: string;
  target: AgentTarget;
  agent: AgentName;
  kind: string;
  response: string;
  metadata: {
    latencyMs: number;
    defaulted: boolean;
    routerVersion: string;
  };
}

export interface ApiErrorResponse {
  error: string;
  message: string;
  requestId?: string;
}

export type ApiResult<T> = { status: number; body: T | ApiErrorResponse };

// ============================================
// Handlers (framework-free)
// ============================================

/**
 * Chatbot path: customer records and policy documents together.
 */
export async function runAsk(
  container: Container,
  body: AskRequest,
  requestId: string
): Promise<ApiResult<AskResponse>> {
  const log = createRequestLogger(requestId, "api");
  const startTime = Date.now();

  try {
    const result = await container.chatbot.answer(body.question, requestId);

    const response: AskResponse = {
      requestId,
      answer: result.answer,
      hasContext: result.hasContext,
      metadata: {
        latencyMs: Date.now() - startTime,
        pipelineVersion: PIPELINE_VERSION,
        contextVersion: CONTEXT_VERSION,
      },
    };
    if (body.options?.includeSources !== false) {
      response.sources = result.sources;
    }

    log.info("Ask request completed", {
      hasContext: result.hasContext,
      latencyMs: response.metadata.latencyMs,
    });

    return { status: 200, body: response };
  } catch (err) {
    return failure(err, requestId, "Ask request failed");
  }
}

/**
 * Orchestrator path: one agent, formatted result.
 */
export async function runRoute(
  container: Container,
  body: RouteRequest,
  requestId: string
): Promise<ApiResult<RouteResponse>> {
  const log = createRequestLogger(requestId, "api");
  const startTime = Date.now();

  try {
    const { decision, result } = await container.orchestrator.dispatch(body.question, requestId);

    const response: RouteResponse = {
      requestId,
      target: decision.target,
      agent: result.agent,
      kind: result.kind,
      response: formatAgentResult(result),
      metadata: {
        latencyMs: Date.now() - startTime,
        defaulted: decision.defaulted,
        routerVersion: ROUTER_VERSION,
      },
    };

    log.info("Route request completed", {
      target: decision.target,
      kind: result.kind,
      latencyMs: response.metadata.latencyMs,
    });

    return { status: 200, body: response };
  } catch (err) {
    return failure(err, requestId, "Route request failed");
  }
}

function failure(err: unknown, requestId: string, message: string): ApiResult<never> {
  const appError = wrapError(err, requestId);

  createRequestLogger(requestId, "api").error(message, {
    error: err,
    errorCode: appError.code,
  });

  // Internal details stay in the logs
  return {
    status: 500,
    body: { error: "INTERNAL_ERROR", message: getUserMessage(appError), requestId },
  };
}

// ============================================
// Express adapters
// ============================================

function requestIdOf(req: AuthenticatedRequest): string {
  return req.requestId ?? crypto.randomUUID().slice(0, 8);
}

export function createAskHandler(
  container: Container
): (req: AuthenticatedRequest & { body: AskRequest }, res: Response) => Promise<void> {
  return async (req, res) => {
    const { status, body } = await runAsk(container, req.body, requestIdOf(req));
    res.status(status).json(body);
  };
}

export function createRouteHandler(
  container: Container
): (req: AuthenticatedRequest & { body: RouteRequest }, res: Response) => Promise<void> {
  return async (req, res) => {
    const { status, body } = await runRoute(container, req.body, requestIdOf(req));
    res.status(status).json(body);
  };
}

// ============================================
// Health Check Response
// ============================================

export interface HealthResponse {
  status: "ok";
  version: string;
  timestamp: string;
}

export function healthStatus(now = new Date()): HealthResponse {
  return { status: "ok", version: PIPELINE_VERSION, timestamp: now.toISOString() };
}

export function handleHealthCheck(_req: AuthenticatedRequest, res: Response): void {
  res.status(200).json(healthStatus());
}
