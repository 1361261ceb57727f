// ============================================
// Pipeline — one chat message, start to reply
//
// START → ContactAck | SocialShortCircuit | Retrieve → Respond
// ============================================

import crypto from "crypto";
import {
  ChatbotError,
  generationError,
  persistenceError,
  retrievalError,
  type Result,
} from "../lib/errors.js";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import { buildContextText, buildPrompt, formatHistory } from "../llm/buildPrompt.js";
import {
  appendContactPrompt,
  buildPreviousAnswerBlock,
  buildSystemInstructions,
  CONTACT_ACK,
  COURSE_RESPONSE_GUIDELINES,
  getInsufficientInfoMessage,
} from "../llm/prompts.js";
import { extractKeywords } from "../retrieval/keywords.js";
import { retrieveContext } from "../retrieval/retrieve.js";
import { classifyIntent, isShortCircuit } from "../router/classifyIntent.js";
import type { Intent } from "../router/types.js";
import type { ConversationTurn } from "../types/index.js";
import type { ChatInput, ChatResult, PipelineDeps, PipelineSettings } from "./types.js";

export const PIPELINE_VERSION = "pipeline.v2.0";

type InformationRequest = Extract<Intent, { kind: "information_request" }>;

/**
 * Handle one chat message.
 *
 * Throws INVALID_INPUT for an empty message (nothing persisted),
 * RETRIEVAL_FAILED / GENERATION_FAILED when the answer path fails
 * (nothing persisted). Persistence problems are logged, never thrown.
 */
export async function handleChatMessage(
  input: ChatInput,
  deps: PipelineDeps,
  settings: PipelineSettings
): Promise<ChatResult> {
  const requestId = input.requestId ?? crypto.randomUUID().slice(0, 8);
  const userMessage = input.message.trim();

  const intent = classifyIntent(userMessage, deps.socialTable);

  const conversationId = input.conversationId || crypto.randomUUID();
  const log = createRequestLogger(requestId, "pipeline", conversationId);
  const startTime = Date.now();

  log.info("Chat message received", {
    intent: intent.kind,
    shortCircuit: isShortCircuit(intent.kind),
    question: userMessage.slice(0, 100),
  });

  await persist(log, "ensure conversation", () => deps.conversations.ensureConversation(conversationId));

  const response = await respond(intent, userMessage, conversationId, requestId, deps, settings, log);

  await persistExchange(log, deps, conversationId, userMessage, response, input.ip);

  log.info("Chat message answered", {
    intent: intent.kind,
    latencyMs: Date.now() - startTime,
  });

  return { response, conversationId, intent: intent.kind };
}

/** Reply text for the branch selected by the intent */
async function respond(
  intent: Intent,
  userMessage: string,
  conversationId: string,
  requestId: string,
  deps: PipelineDeps,
  settings: PipelineSettings,
  log: RequestLogger
): Promise<string> {
  switch (intent.kind) {
    case "contact_share": {
      const response = appendContactPrompt(CONTACT_ACK);
      await deps.sleep(settings.delays.contactAckMs);
      return response;
    }

    case "greeting":
    case "courtesy": {
      await deps.sleep(settings.delays.socialReplyMs);
      return intent.kind === "greeting" ? intent.reply : appendContactPrompt(intent.reply);
    }

    case "information_request":
      return answerFromKnowledge(userMessage, intent, conversationId, requestId, deps, settings, log);
  }
}

/**
 * Retrieve → (fallback | prompt + generate) → contact suffix.
 */
async function answerFromKnowledge(
  userMessage: string,
  intent: InformationRequest,
  conversationId: string,
  requestId: string,
  deps: PipelineDeps,
  settings: PipelineSettings,
  log: RequestLogger
): Promise<string> {
  const history = await loadHistory(deps, conversationId, settings.historyTurns, log);
  const { historyText, lastAssistantReply } = formatHistory(history);
  const keywords = extractKeywords(userMessage);

  const retrievalLog = log.withStage("retrieval");
  let contextChunks: string[];
  try {
    const result = await retrieveContext(
      {
        message: userMessage,
        keywords,
        normalizedMessage: intent.normalized,
        courseIntent: intent.courseIntent,
      },
      deps,
      settings.retrieval
    );
    contextChunks = result.contextChunks;

    retrievalLog.info("Retrieval complete", {
      filters: result.sourceFilters,
      keywords,
      counts: result.counts,
      bestSimilarity: result.bestSimilarity,
    });
  } catch (err) {
    retrievalLog.error("Retrieval failed", { error: err });
    if (err instanceof ChatbotError && err.code === "INVALID_INPUT") {
      throw err;
    }
    throw retrievalError("Knowledge base search failed", requestId, err);
  }

  if (contextChunks.length === 0) {
    log.warn("No context above threshold, skipping generation");
    return appendContactPrompt(getInsufficientInfoMessage(settings.business));
  }

  const prompt = buildPrompt({
    systemInstructions: buildSystemInstructions(settings.business),
    courseInstruction: intent.courseIntent ? COURSE_RESPONSE_GUIDELINES : null,
    previousAnswerBlock: buildPreviousAnswerBlock(lastAssistantReply),
    historyText,
    contextText: buildContextText(contextChunks),
    userMessage,
  });

  const llmLog = log.withStage("llm");
  let answer: string;
  try {
    answer = await deps.generation.generate(prompt, {
      temperature: settings.temperature,
      topP: settings.topP,
    });
  } catch (err) {
    llmLog.error("Generation failed", { error: err, promptLength: prompt.length });
    throw generationError("Answer generation failed", requestId, err);
  }

  if (!answer.trim()) {
    llmLog.error("Generation returned empty text");
    throw generationError("Answer generation returned no text", requestId);
  }

  return appendContactPrompt(answer);
}

/** Recent turns, oldest first; empty when the store cannot be read */
async function loadHistory(
  deps: PipelineDeps,
  conversationId: string,
  limit: number,
  log: RequestLogger
): Promise<ConversationTurn[]> {
  try {
    return await deps.conversations.getRecent(conversationId, limit);
  } catch (err) {
    log.withStage("db").warn("History load failed, continuing without history", { error: err });
    return [];
  }
}

/**
 * Save the user turn, then the assistant turn.
 * The assistant turn is skipped when the user turn could not be stored.
 */
async function persistExchange(
  log: RequestLogger,
  deps: PipelineDeps,
  conversationId: string,
  userMessage: string,
  response: string,
  ip?: string
): Promise<void> {
  const userSaved = await persist(log, "save user turn", () =>
    deps.conversations.saveTurn(conversationId, "user", userMessage, ip)
  );
  if (!userSaved.ok) return;

  await persist(log, "save assistant turn", () =>
    deps.conversations.saveTurn(conversationId, "assistant", response, ip)
  );
}

/** Run a store write; failures (returned or thrown) are logged and turned into a Result */
async function persist(log: RequestLogger, operation: string, write: () => Promise<Result>): Promise<Result> {
  let outcome: Result;
  try {
    outcome = await write();
  } catch (err) {
    outcome = { ok: false, error: persistenceError(`${operation} threw`, err) };
  }

  if (!outcome.ok) {
    log.withStage("db").error("Persistence failed", { operation, error: outcome.error });
  }
  return outcome;
}
