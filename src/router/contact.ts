// ============================================
// Contact-Info Detector
// Trigger for the acknowledgement path, not a validator.
// ============================================

const MIN_PHONE_DIGITS = 6;
const DIGIT = /\p{Nd}/gu;

/**
 * True when the message carries an email-looking token
 * (one whitespace-delimited token with both "@" and ".")
 * or at least six digits overall.
 */
export function looksLikeContact(message: string): boolean {
  const tokens = message.replace(/[,;]/g, " ").split(/\s+/);
  const hasEmail = tokens.some((token) => token.includes("@") && token.includes("."));
  if (hasEmail) return true;

  const digitCount = message.match(DIGIT)?.length ?? 0;
  return digitCount >= MIN_PHONE_DIGITS;
}
