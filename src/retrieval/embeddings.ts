// ============================================
// Embeddings — query/chunk vectors via the OpenAI-compatible API
// Pin the model for retrieval determinism.
// ============================================

import { LRUCache } from "lru-cache";
import { inputError, retrievalError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { cleanText } from "../lib/normalize.js";
import { normalizeEmbedding } from "../lib/vector.js";
import type { EmbeddingsApi } from "../llm/client.js";
import type { EmbeddingService } from "../types/index.js";

export interface EmbeddingClientOptions {
  model: string;
  /** Expected vector length; anything else is rejected */
  dimensions: number;
  /** Max cached query vectors (least recently used evicted) */
  cacheSize: number;
}

/**
 * Embedding service returning unit-length vectors.
 * Repeated texts are served from an LRU cache keyed by the cleaned text.
 */
export class EmbeddingClient implements EmbeddingService {
  private readonly cache: LRUCache<string, readonly number[]>;

  constructor(
    private readonly openai: EmbeddingsApi,
    private readonly options: EmbeddingClientOptions
  ) {
    this.cache = new LRUCache<string, readonly number[]>({ max: options.cacheSize });
  }

  async embed(text: string): Promise<number[]> {
    const cleaned = cleanText(text);
    if (!cleaned) {
      throw inputError("Input text must contain readable characters");
    }

    const cached = this.cache.get(cleaned);
    if (cached) {
      return [...cached];
    }

    const raw = await this.requestEmbedding(cleaned);
    const normalized = normalizeEmbedding(raw, this.options.dimensions);
    this.cache.set(cleaned, normalized);
    return [...normalized];
  }

  /** Number of cached vectors */
  get cacheSize(): number {
    return this.cache.size;
  }

  private async requestEmbedding(text: string): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create({
        model: this.options.model,
        input: text.slice(0, 8000), // Truncate to model limit
      });
      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw retrievalError("No embedding returned by the model");
      }
      return embedding;
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        model: this.options.model,
        textPreview: text.slice(0, 50),
        error: err,
      });
      throw err;
    }
  }
}
