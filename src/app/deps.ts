// ============================================
// App Context — wires config into the pipeline
// ============================================

import { config } from "../config/env.js";
import { SupabaseConversationStore } from "../db/conversationStore.js";
import { SupabaseKnowledgeStore } from "../db/knowledgeStore.js";
import { MAX_HISTORY_TURNS } from "../llm/buildPrompt.js";
import { checkModelHealth, createOpenAIClient, GenerationClient, type ModelHealth } from "../llm/client.js";
import { EmbeddingClient } from "../retrieval/embeddings.js";
import { DEFAULT_RETRIEVAL_OPTIONS } from "../retrieval/retrieve.js";
import type { PipelineDeps, PipelineSettings } from "./types.js";

export interface AppContext {
  deps: PipelineDeps;
  settings: PipelineSettings;
  /** Probe the embedding and chat models */
  checkModels: () => Promise<ModelHealth>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createAppContext(): AppContext {
  const openai = createOpenAIClient();

  const deps: PipelineDeps = {
    embeddings: new EmbeddingClient(openai, {
      model: config.llm.embeddingModel,
      dimensions: config.llm.embeddingDimensions,
      cacheSize: config.rag.embeddingCacheSize,
    }),
    generation: new GenerationClient(openai, config.llm.chatModel),
    knowledge: new SupabaseKnowledgeStore(),
    conversations: new SupabaseConversationStore(),
    sleep,
  };

  const settings: PipelineSettings = {
    business: config.business,
    temperature: config.llm.temperature,
    topP: config.llm.topP,
    delays: config.delays,
    historyTurns: MAX_HISTORY_TURNS,
    retrieval: {
      ...DEFAULT_RETRIEVAL_OPTIONS,
      minSimilarity: config.rag.minSimilarity,
    },
  };

  const checkModels = () =>
    checkModelHealth(openai, { embedding: config.llm.embeddingModel, chat: config.llm.chatModel });

  return { deps, settings, checkModels };
}
