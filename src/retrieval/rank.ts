// ============================================
// Rank — source priority, dedup, truncation
// ============================================

import { posix } from "path";
import { normalizeForMatch } from "../lib/normalize.js";
import type { EvidenceChunk } from "../types/index.js";

/**
 * Lower sorts first.
 * 0: routing.md
 * 1: summaries and FAQ files (*_summary.md, faq.md, faq_*.md)
 * 2: everything else
 * 3: chunks without a source
 */
export function chunkPriority(source: string | null): number {
  if (!source) return 3;

  const basename = posix.basename(source).toLowerCase();
  if (basename === "routing.md") return 0;
  if (basename.endsWith("_summary.md") || basename === "faq.md") return 1;
  if (basename.startsWith("faq_") && basename.endsWith(".md")) return 1;
  return 2;
}

/** Comparison key used for every text-level dedup */
export function dedupKey(text: string): string {
  return normalizeForMatch(text.trim());
}

/**
 * Sort by (priority, -similarity) and take up to `limit` chunks,
 * skipping any whose source or normalized text was already taken.
 * Returns trimmed chunk texts.
 */
export function selectContextChunks(chunks: readonly EvidenceChunk[], limit: number): string[] {
  const ranked = chunks
    .filter((chunk) => chunk.text.trim().length > 0)
    .map((chunk, index) => ({ chunk, index, priority: chunkPriority(chunk.source) }))
    .sort(
      (a, b) =>
        a.priority - b.priority ||
        b.chunk.similarity - a.chunk.similarity ||
        a.index - b.index
    );

  const selected: string[] = [];
  const seenSources = new Set<string>();
  const seenTexts = new Set<string>();

  for (const { chunk } of ranked) {
    if (selected.length >= limit) break;

    const text = chunk.text.trim();
    const source = chunk.source ?? "";
    const key = dedupKey(text);
    if (!key || seenSources.has(source) || seenTexts.has(key)) continue;

    selected.push(text);
    seenSources.add(source);
    seenTexts.add(key);
  }

  return selected;
}
