// ============================================
// API Tests — request validation and error mapping
// ============================================

import { describe, it, expect, vi } from "vitest";
import { buildHealthResponse, processChatRequest, type ChatRunner } from "../src/api/handler.js";
import { isOriginAllowed } from "../src/api/middleware.js";
import { generationError, inputError } from "../src/lib/errors.js";

describe("processChatRequest", () => {
  it("maps a handled message to response and conversation_id", async () => {
    const run = vi.fn<ChatRunner>().mockResolvedValue({
      response: "Hola, ¿cómo estás?",
      conversationId: "conv-1",
      intent: "greeting",
    });

    const reply = await processChatRequest({ message: "Hola", conversation_id: "conv-1" }, "req-1", run);

    expect(reply).toEqual({
      status: 200,
      body: { response: "Hola, ¿cómo estás?", conversation_id: "conv-1" },
    });
    expect(run).toHaveBeenCalledWith({
      message: "Hola",
      conversationId: "conv-1",
      ip: undefined,
      requestId: "req-1",
    });
  });

  it("rejects a body without a message", async () => {
    const run = vi.fn<ChatRunner>();

    const reply = await processChatRequest({ conversation_id: "conv-1" }, "req-1", run);

    expect(reply.status).toBe(400);
    expect(reply.body).toMatchObject({
      error: "API_VALIDATION_ERROR",
      details: [{ field: "message" }],
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("returns 400 for an empty message", async () => {
    const run = vi.fn<ChatRunner>().mockRejectedValue(inputError("Message must not be empty"));

    const reply = await processChatRequest({ message: "" }, "req-1", run);

    expect(reply).toEqual({
      status: 400,
      body: { error: "INVALID_INPUT", detail: "El mensaje no puede estar vacio.", requestId: "req-1" },
    });
  });

  it("returns 500 with a Spanish detail for service failures", async () => {
    const run = vi.fn<ChatRunner>().mockRejectedValue(generationError("Answer generation failed"));

    const reply = await processChatRequest({ message: "¿Precio?" }, "req-1", run);

    expect(reply).toEqual({
      status: 500,
      body: {
        error: "GENERATION_FAILED",
        detail: "Hubo un problema al generar la respuesta. Por favor, intentalo de nuevo.",
        requestId: "req-1",
      },
    });
  });

  it("hides unexpected errors behind a generic detail", async () => {
    const run = vi.fn<ChatRunner>().mockRejectedValue(new Error("secret stack detail"));

    const reply = await processChatRequest({ message: "¿Precio?" }, "req-1", run);

    expect(reply).toEqual({
      status: 500,
      body: { error: "UNKNOWN_ERROR", detail: "Algo salio mal. Por favor, intentalo de nuevo.", requestId: "req-1" },
    });
  });
});

describe("buildHealthResponse", () => {
  it("reports the pipeline version and model probes", () => {
    const models = {
      embedding: { ok: true, detail: "ok" },
      chat: { ok: false, detail: "model not found" },
    };

    expect(buildHealthResponse(models, new Date("2026-01-01T00:00:00.000Z"))).toEqual({
      status: "ok",
      version: "pipeline.v2.0",
      timestamp: "2026-01-01T00:00:00.000Z",
      models,
    });
  });
});

describe("isOriginAllowed", () => {
  it("accepts listed origins and the wildcard", () => {
    expect(isOriginAllowed("https://academia.example", ["https://academia.example"])).toBe(true);
    expect(isOriginAllowed("https://otro.example", ["*"])).toBe(true);
  });

  it("rejects unlisted or missing origins", () => {
    expect(isOriginAllowed("https://otro.example", ["https://academia.example"])).toBe(false);
    expect(isOriginAllowed(undefined, ["*"])).toBe(false);
  });
});
