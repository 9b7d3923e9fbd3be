// ============================================
// Container: dependency wiring
// Collaborators are passed in; tests hand over fakes.
// ============================================

import { Chatbot } from "./pipeline.js";
import { PolicyAgent } from "../agents/policyAgent.js";
import { CustomerAgent } from "../agents/customerAgent.js";
import { Orchestrator } from "../agents/orchestrator.js";
import { DEFAULT_CONTEXT_RESULTS } from "../evidence/buildContextPack.js";
import type { CustomerStore } from "../customers/types.js";
import type { PolicyLibrary } from "../policies/library.js";
import type { VectorSearch } from "../retrieval/types.js";
import type { TextGenerator } from "../llm/client.js";

export interface ContainerDeps {
  store: CustomerStore;
  search: VectorSearch;
  library: PolicyLibrary;
  generator: TextGenerator;
  collection: string;
  contextResults?: number;
}

export interface Container {
  chatbot: Chatbot;
  orchestrator: Orchestrator;
  policyAgent: PolicyAgent;
  customerAgent: CustomerAgent;
  store: CustomerStore;
  library: PolicyLibrary;
  search: VectorSearch;
  collection: string;
}

export function createContainer(deps: ContainerDeps): Container {
  const policyAgent = new PolicyAgent({
    library: deps.library,
    search: deps.search,
    generator: deps.generator,
    collection: deps.collection,
  });
  const customerAgent = new CustomerAgent(deps.store);
  const orchestrator = new Orchestrator(policyAgent, customerAgent);
  const chatbot = new Chatbot({
    store: deps.store,
    search: deps.search,
    generator: deps.generator,
    collection: deps.collection,
    contextResults: deps.contextResults ?? DEFAULT_CONTEXT_RESULTS,
  });

  return {
    chatbot,
    orchestrator,
    policyAgent,
    customerAgent,
    store: deps.store,
    library: deps.library,
    search: deps.search,
    collection: deps.collection,
  };
}
