// ============================================
// Intent Router — ordered transition table
// ============================================

import { inputError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { normalizeForMatch } from "../lib/normalize.js";
import { looksLikeContact } from "./contact.js";
import { classifySocial } from "./social.js";
import { getSocialTable, type SocialTable } from "./socialTable.js";
import { isCourseRequest } from "./topics.js";
import { ROUTER_VERSION, type Intent, type IntentKind } from "./types.js";

export type IntentRule = {
  name: string;
  match: (message: string, normalized: string, table: SocialTable) => Intent | null;
};

/**
 * Evaluated top to bottom; the first rule that matches decides.
 * The last rule always matches.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    name: "contact_share",
    match: (message) => (looksLikeContact(message) ? { kind: "contact_share" } : null),
  },
  {
    name: "social",
    match: (message, _normalized, table) => {
      const social = classifySocial(message, table);
      if (!social) return null;
      return social.isGreeting
        ? { kind: "greeting", reply: social.reply }
        : { kind: "courtesy", reply: social.reply };
    },
  },
  {
    name: "information_request",
    match: (_message, normalized) => ({
      kind: "information_request",
      normalized,
      courseIntent: isCourseRequest(normalized),
    }),
  },
];

/**
 * Classify a trimmed, non-empty message.
 * Throws INVALID_INPUT for empty input.
 */
export function classifyIntent(message: string, table: SocialTable = getSocialTable()): Intent {
  const trimmed = message.trim();
  if (!trimmed) {
    throw inputError("Message must not be empty");
  }

  const normalized = normalizeForMatch(trimmed);

  for (const rule of INTENT_RULES) {
    const intent = rule.match(trimmed, normalized, table);
    if (intent) {
      logger.debug("Intent classified", {
        stage: "router",
        rule: rule.name,
        kind: intent.kind,
        routerVersion: ROUTER_VERSION,
      });
      return intent;
    }
  }

  // Unreachable while information_request closes the table
  return { kind: "information_request", normalized, courseIntent: isCourseRequest(normalized) };
}

/** Whether an intent short-circuits before retrieval */
export function isShortCircuit(kind: IntentKind): boolean {
  return kind !== "information_request";
}
