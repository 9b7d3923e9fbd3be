import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z.object({
  // Server
  PORT: z.string().default("3000").transform(Number),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Supabase (customer records + policy vectors)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // OpenAI (generation + embeddings)
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  CHAT_MODEL: z.string().default("gpt-4o-mini"),
  CHAT_TEMPERATURE: z.string().default("0.7").transform(Number),

  // Policy documents
  POLICY_COLLECTION: z.string().default("policies_faqs"),
  POLICY_DOCS_DIR: z.string().default("policies"),
  CONTEXT_RESULTS: z.string().default("5").transform(Number),

  // API Configuration (optional - only needed if exposing the REST API)
  API_KEYS: z.string().optional(), // Comma-separated: "id1:name1:secret1,id2:name2:secret2"
  API_RATE_LIMIT_WINDOW_MS: z.string().default("60000").transform(Number), // 1 minute default
  API_RATE_LIMIT_MAX_REQUESTS: z.string().default("20").transform(Number), // 20 req/min default
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Returns the issues instead of exiting so
 * callers other than startup can inspect them.
 */
export function parseEnv(
  source: Record<string, string | undefined>
): { ok: true; env: Env } | { ok: false; issues: string[] } {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }

  return { ok: true, env: result.data };
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.ok) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.issues) {
      console.error(`   ${issue}`);
    }
    process.exit(1);
  }

  return result.env;
}

// Validate on module load
export const env = validateEnv();

export interface ApiKeyEntry {
  id: string;
  name: string;
  secret: string;
}

/**
 * Parse API keys from environment variable.
 * Format: "id1:name1:secret1,id2:name2:secret2"
 */
export function parseApiKeys(keysStr: string | undefined): ApiKeyEntry[] {
  if (!keysStr) return [];

  return keysStr
    .split(",")
    .map((keyStr) => {
      const [id, name, secret] = keyStr.trim().split(":");
      if (!id || !name || !secret) return null;
      return { id, name, secret };
    })
    .filter((k): k is ApiKeyEntry => k !== null);
}

/**
 * Parse allowed origins from environment variable.
 */
export function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr.split(",").map((o) => o.trim()).filter(Boolean);
}

// Derived config for convenience
export const config = {
  port: env.PORT,

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    chatModel: env.CHAT_MODEL,
    temperature: env.CHAT_TEMPERATURE,
  },

  policies: {
    collection: env.POLICY_COLLECTION,
    docsDir: env.POLICY_DOCS_DIR,
    contextResults: env.CONTEXT_RESULTS,
  },

  api: {
    keys: parseApiKeys(env.API_KEYS),
    rateLimitWindowMs: env.API_RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests: env.API_RATE_LIMIT_MAX_REQUESTS,
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),
  },
} as const;
