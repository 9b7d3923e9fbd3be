// ============================================
// Orchestrator: route a question to one agent and format its result
// ============================================

import { routeQuestion } from "../router/routeQuestion.js";
import type { RouteDecision } from "../router/types.js";
import { formatAgentResult } from "../render/formatAgentResult.js";
import { createRequestLogger } from "../lib/logger.js";
import type { Agent, AgentResult } from "./types.js";
import type { PolicyAgentResult } from "./policyAgent.js";
import type { CustomerAgentResult } from "./customerAgent.js";

export type RoutedResult = {
  decision: RouteDecision;
  result: AgentResult;
};

/**
 * Keyword routing over the two agents. Each instance owns its agents.
 */
export class Orchestrator {
  constructor(
    private readonly policyAgent: Agent<PolicyAgentResult>,
    private readonly customerAgent: Agent<CustomerAgentResult>
  ) {}

  /**
   * Route and run, keeping the routing decision alongside the result.
   */
  async dispatch(question: string, requestId = "local"): Promise<RoutedResult> {
    const log = createRequestLogger(requestId, "orchestrator");
    const decision = routeQuestion(question);
    const agent = decision.target === "customer" ? this.customerAgent : this.policyAgent;

    const startTime = Date.now();
    const result = await agent.answer(question);

    log.info("Agent finished", {
      agent: agent.name,
      kind: result.kind,
      latencyMs: Date.now() - startTime,
    });

    return { decision, result };
  }

  async route(question: string): Promise<AgentResult> {
    const { result } = await this.dispatch(question);
    return result;
  }

  async process(question: string): Promise<string> {
    return formatAgentResult(await this.route(question));
  }
}
