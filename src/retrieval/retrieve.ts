// ============================================
// Retrieval — hybrid context assembly
// embed → filtered vector search → threshold → rank/dedup
// → optional course overview → validated keyword fallback
// ============================================

import { logger } from "../lib/logger.js";
import { normalizeForMatch } from "../lib/normalize.js";
import { dotProduct } from "../lib/vector.js";
import { inferSourceFilters } from "../router/topics.js";
import { dedupKey, selectContextChunks } from "./rank.js";
import type { EmbeddingService, KnowledgeStore, RetrievalResult } from "../types/index.js";

export interface RetrievalInput {
  message: string;
  keywords: string[];
  /** Normalized message; derived from `message` when omitted */
  normalizedMessage?: string;
  courseIntent: boolean;
}

export interface RetrievalDeps {
  embeddings: EmbeddingService;
  knowledge: KnowledgeStore;
}

export interface RetrievalOptions {
  /** Chunks below this similarity never reach ranking */
  minSimilarity: number;
  /** Vector search top-k */
  searchTopK: number;
  /** Cap on chunks handed to the prompt */
  maxChunks: number;
  /** Candidates per keyword search */
  keywordCandidates: number;
  /** Document prepended for course questions */
  courseOverviewPath: string;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  minSimilarity: 0.6,
  searchTopK: 8,
  maxChunks: 5,
  keywordCandidates: 2,
  courseOverviewPath: "overview_cursos.md",
};

/**
 * Build the evidence context for one message.
 *
 * Fails only when embedding the query or the vector search fails;
 * the overview fetch and keyword fallback degrade to "nothing found".
 * A source filter that matches nothing is accepted as is (no unfiltered retry).
 */
export async function retrieveContext(
  input: RetrievalInput,
  deps: RetrievalDeps,
  options: RetrievalOptions = DEFAULT_RETRIEVAL_OPTIONS
): Promise<RetrievalResult> {
  const startTime = Date.now();
  const { minSimilarity, maxChunks } = options;

  const queryEmbedding = await deps.embeddings.embed(input.message);

  const normalized = input.normalizedMessage ?? normalizeForMatch(input.message);
  const sourceFilters = inferSourceFilters(normalized);

  const similar = await deps.knowledge.searchSimilar(
    queryEmbedding,
    options.searchTopK,
    sourceFilters.length > 0 ? sourceFilters : undefined
  );

  const valid = similar.filter((chunk) => chunk.similarity >= minSimilarity);
  const bestSimilarity = valid.reduce((best, chunk) => Math.max(best, chunk.similarity), 0);
  const ranked = selectContextChunks(valid, maxChunks);

  const contextChunks: string[] = [];
  const seenTexts = new Set<string>();

  const append = (text: string): boolean => {
    const trimmed = text.trim();
    const key = dedupKey(trimmed);
    if (!key || seenTexts.has(key) || contextChunks.length >= maxChunks) return false;
    contextChunks.push(trimmed);
    seenTexts.add(key);
    return true;
  };

  if (input.courseIntent) {
    const overview = await fetchCourseOverview(deps.knowledge, options.courseOverviewPath);
    if (overview) append(overview);
  }

  for (const text of ranked) {
    if (contextChunks.length >= maxChunks) break;
    append(text);
  }

  let keywordCount = 0;
  if (contextChunks.length < maxChunks && input.keywords.length > 0) {
    const validated = await validateKeywordChunks(
      queryEmbedding,
      input.keywords,
      seenTexts,
      maxChunks - contextChunks.length,
      deps,
      options
    );
    for (const text of validated) {
      if (append(text)) keywordCount++;
    }
  }

  const result: RetrievalResult = {
    contextChunks,
    sourceFilters,
    bestSimilarity,
    counts: {
      similar: valid.length,
      keyword: keywordCount,
      used: contextChunks.length,
    },
  };

  logger.info("Context retrieved", {
    stage: "retrieval",
    filters: sourceFilters.length > 0 ? sourceFilters.join(",") : "all",
    retrieved: similar.length,
    aboveThreshold: valid.length,
    keywordChunks: keywordCount,
    used: contextChunks.length,
    bestSimilarity: Number(bestSimilarity.toFixed(3)),
    threshold: minSimilarity,
    latencyMs: Date.now() - startTime,
  });

  return result;
}

/**
 * First non-empty chunk of the course overview document, or null.
 */
async function fetchCourseOverview(knowledge: KnowledgeStore, path: string): Promise<string | null> {
  try {
    const docs = await knowledge.getByPaths([path]);
    const first = docs.find((doc) => doc.text.trim().length > 0);
    return first ? first.text.trim() : null;
  } catch (err) {
    logger.warn("Course overview fetch failed", { stage: "retrieval", path, error: err });
    return null;
  }
}

/**
 * Keyword-matched candidates that are also semantically close to the query.
 * Each candidate is re-embedded and kept only when its dot product with
 * the (unit) query vector reaches the similarity threshold.
 * Texts already in `seenTexts` are skipped without embedding.
 */
async function validateKeywordChunks(
  queryEmbedding: number[],
  keywords: string[],
  seenTexts: ReadonlySet<string>,
  slots: number,
  deps: RetrievalDeps,
  options: RetrievalOptions
): Promise<string[]> {
  let candidates: string[];
  try {
    candidates = await deps.knowledge.findByKeywords(keywords, options.keywordCandidates);
  } catch (err) {
    logger.warn("Keyword search failed", { stage: "retrieval", keywords, error: err });
    return [];
  }

  const validated: string[] = [];
  const validatedKeys = new Set<string>();

  for (const candidate of candidates) {
    if (validated.length >= slots) break;

    const text = candidate.trim();
    const key = dedupKey(text);
    if (!key || seenTexts.has(key) || validatedKeys.has(key)) continue;

    let similarity: number;
    try {
      similarity = dotProduct(queryEmbedding, await deps.embeddings.embed(text));
    } catch (err) {
      logger.warn("Embedding keyword candidate failed", { stage: "retrieval", error: err });
      continue;
    }

    logger.debug("Keyword candidate scored", {
      stage: "retrieval",
      similarity: Number(similarity.toFixed(3)),
      kept: similarity >= options.minSimilarity,
    });

    if (similarity >= options.minSimilarity) {
      validated.push(text);
      validatedKeys.add(key);
    }
  }

  return validated;
}
