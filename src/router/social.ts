// ============================================
// Social/Courtesy Classifier — greetings, thanks, acknowledgements
// ============================================

import { normalizeForMatch } from "../lib/normalize.js";
import { getSocialTable, type SocialTable } from "./socialTable.js";
import type { SocialReply } from "./types.js";

/**
 * Pick a canned reply for small talk, or null when the message
 * needs a real answer.
 *
 * 1. Exact lookup of the normalized message.
 * 2. Courtesy patterns, but only for messages with no question mark
 *    and no informative marker ("gracias, cuánto cuesta el curso?"
 *    must still reach retrieval).
 */
export function classifySocial(message: string, table: SocialTable = getSocialTable()): SocialReply | null {
  const normalized = normalizeForMatch(message);
  if (!normalized) return null;

  const reply = table.phrases.get(normalized) ?? matchCourtesyPattern(message, normalized, table);
  if (!reply) return null;

  return {
    reply,
    isGreeting: table.greetingKeywords.has(normalized),
  };
}

function matchCourtesyPattern(message: string, normalized: string, table: SocialTable): string | null {
  if (message.includes("?") || message.includes("¿")) {
    return null;
  }

  if (table.informativeMarkers.some((marker) => normalized.includes(marker))) {
    return null;
  }

  for (const pattern of table.courtesyPatterns) {
    if (pattern.keywords.every((keyword) => normalized.includes(keyword))) {
      return pattern.reply;
    }
  }

  return null;
}
