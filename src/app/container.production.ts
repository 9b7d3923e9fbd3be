// ============================================
// Production container: Supabase + OpenAI from validated config
// ============================================

import path from "path";
import OpenAI from "openai";
import { createContainer, type Container } from "./container.js";
import { config } from "../config/env.js";
import { supabase } from "../db/supabase.js";
import { SupabaseCustomerStore } from "../customers/supabaseStore.js";
import { SupabaseVectorSearch } from "../retrieval/search.js";
import { OpenAIEmbedder } from "../retrieval/embeddings.js";
import { OpenAIGenerator } from "../llm/client.js";
import { FilePolicyLibrary } from "../policies/library.js";

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const openai = new OpenAI({ apiKey: config.openai.apiKey });

  cached = createContainer({
    store: new SupabaseCustomerStore(supabase),
    search: new SupabaseVectorSearch(supabase, new OpenAIEmbedder(openai)),
    library: new FilePolicyLibrary(path.resolve(config.policies.docsDir)),
    generator: new OpenAIGenerator({
      apiKey: config.openai.apiKey,
      model: config.openai.chatModel,
      temperature: config.openai.temperature,
      client: openai,
    }),
    collection: config.policies.collection,
    contextResults: config.policies.contextResults,
  });

  return cached;
}
