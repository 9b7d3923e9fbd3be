// ============================================
// LLM Client: OpenAI chat completion wrapper
// ============================================

import OpenAI from "openai";
import { configError, generationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

/**
 * LLM model configuration.
 * Pin versions for reproducibility.
 */
export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0.7;

/**
 * Single-shot text generation. One call, no streaming, no retries.
 */
export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Pre-built client; defaults to one created from apiKey */
  client?: OpenAI;
}

export class OpenAIGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIGeneratorOptions) {
    if (!options.apiKey.trim()) {
      throw configError("OPENAI_API_KEY not set. Set it in .env or the environment.");
    }

    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_CHAT_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async generate(systemPrompt: string, userPrompt: string): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });

      return response.choices[0]?.message?.content ?? "";
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        error: err,
      });
      throw generationError("LLM completion failed", err);
    }
  }
}
