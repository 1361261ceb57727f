// ============================================
// Text normalization
// Loose comparison keys for intent lookup and chunk dedup
// ============================================

const COMBINING_MARKS = /\p{Mn}/gu;
const NON_WORD = /[^\p{L}\p{N}_\s]/gu;
const REPEATED_CHAR = /(.)\1+/gu;
const WHITESPACE = /\s+/g;
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Canonical form for loose matching: accents stripped, lowercase,
 * punctuation removed, elongations collapsed ("Holaaaa!!" -> "hola").
 *
 * Collapsing applies to every repeated character, so legitimate doubles
 * are folded too ("correo" -> "coreo"). Anything compared against a
 * normalized message must go through this function as well.
 */
export function normalizeForMatch(text: string): string {
  if (!text) return "";
  return text
    .normalize("NFD")
    .replace(COMBINING_MARKS, "")
    .toLowerCase()
    .replace(NON_WORD, " ")
    .replace(REPEATED_CHAR, "$1")
    .replace(WHITESPACE, " ")
    .trim();
}

/** Unicode-composed, control characters and whitespace runs folded to single spaces. */
export function cleanText(text: string): string {
  if (!text) return "";
  return text
    .normalize("NFC")
    .replace(CONTROL_CHARS, " ")
    .replace(WHITESPACE, " ")
    .trim();
}

/** Keep the first `limit` characters, counted as code points. */
export function truncateHead(text: string, limit: number): string {
  if (limit <= 0) return "";
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(0, limit).join("");
}

/** Keep the last `limit` characters, counted as code points. */
export function truncateTail(text: string, limit: number): string {
  if (limit <= 0) return "";
  const chars = Array.from(text);
  return chars.length <= limit ? text : chars.slice(chars.length - limit).join("");
}
