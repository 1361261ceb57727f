// ============================================
// Prompt Assembly — history, evidence, question
// ============================================

import { truncateHead, truncateTail } from "../lib/normalize.js";
import { RESPONSE_MARKER } from "./prompts.js";
import type { ConversationTurn } from "../types/index.js";

export const MAX_HISTORY_TURNS = 4;
export const MAX_HISTORY_CHARS = 800;
export const MAX_CONTEXT_CHARS = 2200;

export interface FormattedHistory {
  /** Rendered recent turns; empty when there is no history */
  historyText: string;
  /** Most recent assistant message in the supplied history */
  lastAssistantReply: string | null;
}

/**
 * Render the last few turns as "User: …" / "Assistant: …" lines.
 * Over budget, the oldest characters are cut so the latest exchange survives.
 */
export function formatHistory(
  turns: readonly ConversationTurn[],
  maxTurns: number = MAX_HISTORY_TURNS,
  maxChars: number = MAX_HISTORY_CHARS
): FormattedHistory {
  const lines = turns
    .slice(-maxTurns)
    .map((turn) => `${turn.role === "user" ? "User" : "Assistant"}: ${turn.content.trim()}`);

  let lastAssistantReply: string | null = null;
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn?.role === "assistant") {
      lastAssistantReply = turn.content;
      break;
    }
  }

  return {
    historyText: truncateTail(lines.join("\n"), maxChars),
    lastAssistantReply,
  };
}

/** Join evidence chunks and keep the head within budget. */
export function buildContextText(chunks: readonly string[], maxChars: number = MAX_CONTEXT_CHARS): string {
  return truncateHead(chunks.join("\n\n"), maxChars);
}

export interface PromptParts {
  systemInstructions: string;
  courseInstruction?: string | null;
  previousAnswerBlock: string;
  historyText: string;
  contextText: string;
  userMessage: string;
}

/**
 * Sections, in order, separated by a blank line; empty ones are left out:
 * system instructions, course guidance, previous-answer block, history,
 * evidence context, question, response marker.
 */
export function buildPrompt(parts: PromptParts): string {
  const sections = [
    parts.systemInstructions,
    parts.courseInstruction ?? "",
    parts.previousAnswerBlock,
    parts.historyText ? `Conversacion hasta ahora:\n${parts.historyText}` : "",
    parts.contextText ? `CONTEXTO:\n${parts.contextText}` : "",
    `NUEVA PREGUNTA DEL USUARIO:\n${parts.userMessage}`,
    RESPONSE_MARKER,
  ];

  return sections.filter((section) => section.length > 0).join("\n\n").trim();
}
