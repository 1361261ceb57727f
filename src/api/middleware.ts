// ============================================
// API Middleware — Request IDs, CORS, Validation
// ============================================

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { config } from "../config/env.js";

// ============================================
// Input Validation
// ============================================

/**
 * Request body schema for POST /chat.
 * An empty message passes here and is rejected by the pipeline as INVALID_INPUT.
 */
export const chatRequestSchema = z.object({
  message: z.string().max(4000, "Message cannot exceed 4000 characters"),
  conversation_id: z.string().max(200).optional(),
  ip: z.string().max(100).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ValidationIssue {
  field: string;
  message: string;
}

export type ValidationOutcome<T> = { success: true; data: T } | { success: false; issues: ValidationIssue[] };

/**
 * Parse a request body against a schema, flattening issues for the client.
 */
export function validateBody<T>(schema: z.ZodSchema<T>, body: unknown): ValidationOutcome<T> {
  const result = schema.safeParse(body);

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      })),
    };
  }

  return { success: true, data: result.data };
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 * Stored in res.locals.requestId and echoed as X-Request-Id.
 */
export function addRequestId(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header ? header.slice(0, 64) : crypto.randomUUID().slice(0, 8);
  res.locals["requestId"] = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

/** Request id set by addRequestId, or a fresh one */
export function requestIdOf(res: Response): string {
  const value: unknown = res.locals["requestId"];
  return typeof value === "string" ? value : crypto.randomUUID().slice(0, 8);
}

// ============================================
// CORS Configuration
// ============================================

/**
 * True when the origin is on the allow-list ("*" allows all).
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: readonly string[]): boolean {
  if (!origin) return false;
  return allowedOrigins.includes("*") || allowedOrigins.includes(origin);
}

/**
 * CORS middleware with configurable origins.
 */
export function corsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const origin = req.headers.origin;

  if (origin && isOriginAllowed(origin, config.api.allowedOrigins)) {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Vary", "Origin");
  }

  res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
  res.setHeader("Access-Control-Max-Age", "86400"); // 24 hours

  // Handle preflight
  if (req.method === "OPTIONS") {
    res.status(204).end();
    return;
  }

  next();
}
