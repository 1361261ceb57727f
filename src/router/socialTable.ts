// ============================================
// Social Table — canned replies loaded once at startup
// ============================================

import { z } from "zod";
import { normalizeForMatch } from "../lib/normalize.js";
// Emitted beside the build output by tsc, so the path holds under src/ and dist/
import socialData from "../../data/social.json" with { type: "json" };

const socialFileSchema = z.object({
  phrases: z.record(z.string().min(1), z.string().min(1)),
  courtesyPatterns: z.array(
    z.object({
      keywords: z.array(z.string()).min(1),
      reply: z.string().min(1),
    })
  ),
  greetingKeywords: z.array(z.string().min(1)),
  informativeMarkers: z.array(z.string().min(1)),
});

export type SocialTable = {
  /** normalized phrase → reply */
  readonly phrases: ReadonlyMap<string, string>;
  /** Ordered; first full match wins */
  readonly courtesyPatterns: ReadonlyArray<{ readonly keywords: readonly string[]; readonly reply: string }>;
  readonly greetingKeywords: ReadonlySet<string>;
  readonly informativeMarkers: readonly string[];
};

/**
 * Build the lookup table from raw JSON.
 * Every key and keyword is normalized the same way incoming messages are,
 * so spelling variants that normalize alike collapse into one entry
 * (the first one listed wins).
 */
export function buildSocialTable(raw: unknown): SocialTable {
  const parsed = socialFileSchema.parse(raw);

  const phrases = new Map<string, string>();
  for (const [phrase, reply] of Object.entries(parsed.phrases)) {
    const key = normalizeForMatch(phrase);
    if (key && !phrases.has(key)) {
      phrases.set(key, reply);
    }
  }

  const courtesyPatterns = parsed.courtesyPatterns
    .map((pattern) => ({
      keywords: Object.freeze(pattern.keywords.map(normalizeForMatch).filter(Boolean)),
      reply: pattern.reply,
    }))
    // A pattern whose keywords all normalize away (emoji only) would match anything
    .filter((pattern) => pattern.keywords.length > 0);

  return Object.freeze({
    phrases,
    courtesyPatterns: Object.freeze(courtesyPatterns),
    greetingKeywords: new Set(parsed.greetingKeywords.map(normalizeForMatch)),
    informativeMarkers: Object.freeze(parsed.informativeMarkers.map(normalizeForMatch)),
  });
}

let defaultTable: SocialTable | null = null;

/** Table from data/social.json, built on first use */
export function getSocialTable(): SocialTable {
  if (!defaultTable) {
    defaultTable = buildSocialTable(socialData);
  }
  return defaultTable;
}
