import { QUESTION_WORDS } from "../router/types.js";

// ============================================
// Keyword extraction for the keyword fallback search
// ============================================

const TOKEN = /[\p{L}\p{N}]+/gu;
const MIN_KEYWORD_LENGTH = 5;
const MIN_ACRONYM_LENGTH = 3;

function stripDiacritics(token: string): string {
  return token.normalize("NFD").replace(/\p{Mn}/gu, "");
}

/** Fully upper-case with at least one cased letter ("CYPE", "SAP2000") */
function isAcronym(token: string): boolean {
  return /\p{Lu}/u.test(token) && token === token.toUpperCase();
}

/**
 * Extract content keywords from a message.
 * Keeps tokens of 5+ characters, or upper-case tokens of 3+ (acronyms);
 * interrogatives are dropped. First-occurrence order, no duplicates.
 *
 * e.g. "¿Qué cursos ofrecen sobre CYPE?" -> ["cursos", "ofrecen", "sobre", "cype"]
 */
export function extractKeywords(message: string): string[] {
  const keywords: string[] = [];
  const seen = new Set<string>();

  for (const token of message.match(TOKEN) ?? []) {
    const lowered = token.toLowerCase();
    if (QUESTION_WORDS.has(stripDiacritics(lowered))) continue;

    const keep =
      lowered.length >= MIN_KEYWORD_LENGTH ||
      (isAcronym(token) && lowered.length >= MIN_ACRONYM_LENGTH);

    if (keep && !seen.has(lowered)) {
      seen.add(lowered);
      keywords.push(lowered);
    }
  }

  return keywords;
}
