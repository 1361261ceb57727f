// ============================================
// API Handler — /chat and /health endpoints
// ============================================

import type { Request, Response } from "express";
import { PIPELINE_VERSION } from "../app/pipeline.js";
import type { ChatInput, ChatResult } from "../app/types.js";
import { getUserMessage, httpStatusFor, wrapError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ModelHealth } from "../llm/client.js";
import { chatRequestSchema, requestIdOf, validateBody, type ValidationIssue } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface ChatResponse {
  response: string;
  conversation_id: string;
}

export interface ApiErrorResponse {
  error: string;
  detail: string;
  requestId?: string;
  details?: ValidationIssue[];
}

export interface ApiReply {
  status: number;
  body: ChatResponse | ApiErrorResponse;
}

/** Runs one chat message; the pipeline bound to its deps in production */
export type ChatRunner = (input: ChatInput) => Promise<ChatResult>;

// ============================================
// Handler
// ============================================

/**
 * Validate the body, run the message and map the outcome to an HTTP reply.
 * Errors never leak internals: the client gets the code and a Spanish detail.
 */
export async function processChatRequest(body: unknown, requestId: string, run: ChatRunner): Promise<ApiReply> {
  const parsed = validateBody(chatRequestSchema, body);
  if (!parsed.success) {
    logger.warn("Invalid chat request body", { stage: "api", requestId, issues: parsed.issues });
    return {
      status: 400,
      body: {
        error: "API_VALIDATION_ERROR",
        detail: "La solicitud no es valida.",
        requestId,
        details: parsed.issues,
      },
    };
  }

  const startTime = Date.now();
  const { message, conversation_id, ip } = parsed.data;

  try {
    const result = await run({
      message,
      conversationId: conversation_id,
      ip,
      requestId,
    });

    logger.info("API request completed", {
      stage: "api",
      requestId,
      conversationId: result.conversationId,
      intent: result.intent,
      latencyMs: Date.now() - startTime,
    });

    return {
      status: 200,
      body: { response: result.response, conversation_id: result.conversationId },
    };
  } catch (err) {
    const appError = wrapError(err, requestId);
    const status = httpStatusFor(appError);

    logger.error("API request failed", {
      stage: "api",
      requestId,
      status,
      error: err,
    });

    return {
      status,
      body: {
        error: appError.code,
        detail: getUserMessage(appError),
        requestId,
      },
    };
  }
}

/**
 * Express handler for POST /chat.
 */
export function createChatHandler(run: ChatRunner): (req: Request, res: Response) => Promise<void> {
  return async (req, res) => {
    const reply = await processChatRequest(req.body, requestIdOf(res), run);
    res.status(reply.status).json(reply.body);
  };
}

// ============================================
// Health Check Response
// ============================================

export interface HealthResponse {
  status: "ok";
  version: string;
  timestamp: string;
  models: ModelHealth;
}

export function buildHealthResponse(models: ModelHealth, now: Date = new Date()): HealthResponse {
  return {
    status: "ok",
    version: PIPELINE_VERSION,
    timestamp: now.toISOString(),
    models,
  };
}

/**
 * Express handler for GET /health. The service answers "ok" while the
 * model probes report their own state.
 */
export function createHealthHandler(
  checkModels: () => Promise<ModelHealth>
): (req: Request, res: Response) => Promise<void> {
  return async (_req, res) => {
    res.status(200).json(buildHealthResponse(await checkModels()));
  };
}
