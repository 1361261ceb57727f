// ============================================
// Core domain types + collaborator contracts
// ============================================

import type { Result } from "../lib/errors.js";

export type Role = "user" | "assistant";

/** One stored message of a conversation */
export interface ConversationTurn {
  role: Role;
  content: string;
  createdAt: string;
}

/** A chunk returned by vector search */
export interface EvidenceChunk {
  text: string;
  /** Relative document path, e.g. "cursos/estructuras.md" */
  source: string | null;
  /** max(0, 1 - cosine distance), in [0, 1] */
  similarity: number;
}

/** A chunk fetched directly by path */
export interface StoredDocument {
  text: string;
  source: string | null;
}

/** Output of one retrieval call; never persisted */
export interface RetrievalResult {
  contextChunks: string[];
  sourceFilters: string[];
  bestSimilarity: number;
  counts: {
    similar: number;
    keyword: number;
    used: number;
  };
}

// ============================================
// Collaborators
// ============================================

/** Text → unit-length vector of fixed dimension */
export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

export interface GenerationOptions {
  temperature: number;
  topP: number;
}

/** Prompt → generated text */
export interface GenerationService {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export interface KnowledgeStore {
  /** Ordered by descending similarity */
  searchSimilar(queryEmbedding: number[], topK: number, sourcePrefixes?: string[]): Promise<EvidenceChunk[]>;
  /** Substring match over the normalized text column */
  findByKeywords(keywords: string[], maxResults: number): Promise<string[]>;
  getByPaths(paths: string[]): Promise<StoredDocument[]>;
}

export interface ConversationStore {
  /** Idempotent; called once at service startup */
  ensureSchema(): Promise<Result>;
  ensureConversation(conversationId: string): Promise<Result>;
  /** Oldest → newest */
  getRecent(conversationId: string, limit: number): Promise<ConversationTurn[]>;
  saveTurn(conversationId: string, role: Role, content: string, ip?: string): Promise<Result>;
}
