// ============================================
// LLM Client — OpenAI-compatible API wrapper
// Talks to Ollama's /v1 endpoint by default.
// ============================================

import OpenAI from "openai";
import { config } from "../config/env.js";
import { generationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { GenerationOptions, GenerationService } from "../types/index.js";

/** Slice of the SDK the embedding client calls; an `OpenAI` instance satisfies it */
export interface EmbeddingsApi {
  embeddings: {
    create(body: { model: string; input: string }): PromiseLike<{ data: Array<{ embedding: number[] }> }>;
  };
}

/** Slice of the SDK the generation client calls */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: "user"; content: string }>;
        temperature: number;
        top_p: number;
        stream: false;
      }): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/**
 * Shared SDK client. Timeouts and retries are the SDK's job;
 * the chat pipeline never retries on its own.
 */
export function createOpenAIClient(): OpenAI {
  return new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseUrl,
    timeout: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
  });
}

/**
 * Generation service over chat completions.
 * A reply without text counts as a failure.
 */
export class GenerationClient implements GenerationService {
  constructor(
    private readonly openai: ChatCompletionsApi,
    private readonly model: string
  ) {}

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: options.temperature,
        top_p: options.topP,
        stream: false,
      });
      content = response.choices[0]?.message.content;
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        error: err,
      });
      throw generationError("Model call failed", undefined, err);
    }

    const text = content?.trim() ?? "";
    if (!text) {
      logger.warn("LLM completion returned no text", { stage: "llm", model: this.model });
      throw generationError("Model returned an empty response");
    }

    return text;
  }
}

// ============================================
// Health probes
// ============================================

export interface ProbeResult {
  ok: boolean;
  detail: string;
}

export interface ModelHealth {
  embedding: ProbeResult;
  chat: ProbeResult;
}

async function probe(name: string, call: () => PromiseLike<unknown>): Promise<ProbeResult> {
  try {
    await call();
    return { ok: true, detail: "ok" };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.warn("Model health probe failed", { stage: "health", probe: name, detail });
    return { ok: false, detail };
  }
}

/**
 * Send one tiny request to each model. Failures are reported, never thrown.
 */
export async function checkModelHealth(
  openai: EmbeddingsApi & ChatCompletionsApi,
  models: { embedding: string; chat: string }
): Promise<ModelHealth> {
  const [embedding, chat] = await Promise.all([
    probe("embedding", () => openai.embeddings.create({ model: models.embedding, input: "ping" })),
    probe("chat", () =>
      openai.chat.completions.create({
        model: models.chat,
        messages: [{ role: "user", content: "ping" }],
        temperature: 0,
        top_p: 1,
        stream: false,
      })
    ),
  ]);

  return { embedding, chat };
}
