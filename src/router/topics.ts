// ============================================
// Topic-Intent Detector — advisory source filters
// ============================================

import { normalizeForMatch } from "../lib/normalize.js";
import { COURSE_INTENT_KEYWORDS, SOURCE_INTENT_KEYWORDS } from "./types.js";

// Keywords go through the same normalizer as messages ("sap2000" -> "sap20")
const SOURCE_TRIGGERS: ReadonlyArray<readonly [string, readonly string[]]> = Object.freeze(
  Object.entries(SOURCE_INTENT_KEYWORDS).map(
    ([prefix, keywords]) => [prefix, Object.freeze(keywords.map(normalizeForMatch))] as const
  )
);

const COURSE_TRIGGERS: readonly string[] = Object.freeze(COURSE_INTENT_KEYWORDS.map(normalizeForMatch));

/**
 * Source prefixes whose keywords appear in the normalized message,
 * in declaration order. Empty means "search everything".
 */
export function inferSourceFilters(normalizedMessage: string): string[] {
  const filters: string[] = [];
  for (const [prefix, keywords] of SOURCE_TRIGGERS) {
    if (keywords.some((keyword) => normalizedMessage.includes(keyword))) {
      filters.push(prefix);
    }
  }
  return filters;
}

export function isCourseRequest(normalizedMessage: string): boolean {
  return COURSE_TRIGGERS.some((keyword) => normalizedMessage.includes(keyword));
}
