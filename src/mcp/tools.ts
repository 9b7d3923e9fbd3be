// ============================================
// MCP Tools: definitions and dispatch
// ============================================

import { z } from "zod";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { getCustomerProfile, getCustomerTickets } from "../customers/lookup.js";
import { formatAgentResult } from "../render/formatAgentResult.js";
import { PIPELINE_VERSION } from "../app/pipeline.js";
import { logger } from "../lib/logger.js";
import { describeIssues } from "../api/middleware.js";
import type { Container } from "../app/container.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

// ============================================
// Tool Definitions
// ============================================

function stringInput(field: string, description: string): Tool["inputSchema"] {
  return {
    type: "object" as const,
    properties: { [field]: { type: "string", description } },
    required: [field],
  };
}

export const TOOLS: Tool[] = [
  {
    name: "health",
    description: "Health check for the support assistant.",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: "query_policy",
    description: `Answer a question about company policies.

Returns a canonical policy document when the question names refund, warranty,
shipping, privacy or terms; otherwise a cited answer from policy search.`,
    inputSchema: stringInput("question", "Question about company policies"),
  },
  {
    name: "query_customer",
    description:
      "Answer a question about one customer (e.g. \"What is Ema Johnson's profile?\"). Returns profile and/or support tickets.",
    inputSchema: stringInput("question", "Question naming a customer"),
  },
  {
    name: "get_customer_info",
    description: "Customer profile and orders by (partial) name.",
    inputSchema: stringInput("customer_name", "Name of the customer"),
  },
  {
    name: "get_customer_tickets",
    description: "Support ticket history by (partial) customer name.",
    inputSchema: stringInput("customer_name", "Name of the customer"),
  },
  {
    name: "search_customer_database",
    description: "Search customers by name, email or phone.",
    inputSchema: stringInput("query", "Search term (name, email or phone)"),
  },
  {
    name: "get_policy_document",
    description: `Full text of a policy document.

Available policies: refund_policy, warranty_policy, shipping_policy,
privacy_policy, terms_of_service.`,
    inputSchema: stringInput("policy_name", "Policy identifier, without extension"),
  },
  {
    name: "smart_query",
    description:
      "Route a question to the policy or customer agent automatically and return the formatted response.",
    inputSchema: stringInput("question", "Any question about policies or customers"),
  },
  {
    name: "ask_assistant",
    description:
      "Answer from customer records and policy documents together, with sources.",
    inputSchema: stringInput("question", "Any support question"),
  },
];

// ============================================
// Argument schemas
// ============================================

const questionArgs = z.object({ question: z.string().trim().min(1).max(2000) });
const customerArgs = z.object({ customer_name: z.string().trim().min(1) });
const searchArgs = z.object({ query: z.string() });
const policyArgs = z.object({ policy_name: z.string().trim().min(1) });

// ============================================
// Dispatch
// ============================================

function jsonResult(payload: Record<string, unknown>, isError = false): ToolResult {
  const result: ToolResult = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) result.isError = true;
  return result;
}

function parseArgs<T>(
  schema: z.ZodType<T>,
  args: unknown
): { ok: true; value: T } | { ok: false; result: ToolResult } {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) return { ok: true, value: parsed.data };
  return {
    ok: false,
    result: jsonResult({ error: "Invalid arguments", details: describeIssues(parsed.error) }, true),
  };
}

/**
 * Build the tool dispatcher over a container. Failures come back as
 * `{ error }` JSON with `isError`, never as exceptions.
 */
export function createToolHandler(
  container: Container,
  clock: () => Date = () => new Date()
): (name: string, args: unknown) => Promise<ToolResult> {
  const timestamp = () => clock().toISOString();

  async function run(name: string, args: unknown): Promise<ToolResult> {
    switch (name) {
      case "health":
        return jsonResult({
          status: "healthy",
          service: "support-desk-assistant",
          version: PIPELINE_VERSION,
          timestamp: timestamp(),
        });

      case "query_policy": {
        const parsed = parseArgs(questionArgs, args);
        if (!parsed.ok) return parsed.result;
        const result = await container.policyAgent.answer(parsed.value.question);
        return jsonResult({ ...result, timestamp: timestamp() }, result.kind === "error");
      }

      case "query_customer": {
        const parsed = parseArgs(questionArgs, args);
        if (!parsed.ok) return parsed.result;
        const result = await container.customerAgent.answer(parsed.value.question);
        return jsonResult({ ...result, timestamp: timestamp() }, result.kind === "error");
      }

      case "get_customer_info": {
        const parsed = parseArgs(customerArgs, args);
        if (!parsed.ok) return parsed.result;
        const customer = parsed.value.customer_name;
        const profile = await getCustomerProfile(container.store, customer);
        return jsonResult({ customer, profile, timestamp: timestamp() });
      }

      case "get_customer_tickets": {
        const parsed = parseArgs(customerArgs, args);
        if (!parsed.ok) return parsed.result;
        const customer = parsed.value.customer_name;
        const tickets = await getCustomerTickets(container.store, customer);
        return jsonResult({ customer, tickets, timestamp: timestamp() });
      }

      case "search_customer_database": {
        const parsed = parseArgs(searchArgs, args);
        if (!parsed.ok) return parsed.result;
        const results = await container.store.searchCustomers(parsed.value.query);
        return jsonResult({
          query: parsed.value.query,
          resultsCount: results.length,
          results,
          timestamp: timestamp(),
        });
      }

      case "get_policy_document": {
        const parsed = parseArgs(policyArgs, args);
        if (!parsed.ok) return parsed.result;
        const policy = parsed.value.policy_name;
        const content = await container.library.getFullText(policy);
        return jsonResult({ policy, content, timestamp: timestamp() });
      }

      case "smart_query": {
        const parsed = parseArgs(questionArgs, args);
        if (!parsed.ok) return parsed.result;
        const { question } = parsed.value;
        const { decision, result } = await container.orchestrator.dispatch(question);
        return jsonResult({
          question,
          agentUsed: result.agent,
          response: formatAgentResult(result),
          metadata: { kind: result.kind, target: decision.target, timestamp: timestamp() },
        });
      }

      case "ask_assistant": {
        const parsed = parseArgs(questionArgs, args);
        if (!parsed.ok) return parsed.result;
        const answer = await container.chatbot.answer(parsed.value.question);
        return jsonResult({ ...answer, timestamp: timestamp() });
      }

      default:
        return jsonResult({ error: `Unknown tool: ${name}` }, true);
    }
  }

  return async (name, args) => {
    try {
      return await run(name, args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error("Tool call failed", { stage: "mcp", tool: name, error: err });
      return jsonResult({ error: message, tool: name, timestamp: timestamp() }, true);
    }
  };
}
