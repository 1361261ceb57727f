// ============================================
// Pipeline Tests — one message through every branch
// ============================================

import { describe, it, expect, vi, beforeEach } from "vitest";
import { handleChatMessage } from "../src/app/pipeline.js";
import type { PipelineDeps, PipelineSettings } from "../src/app/types.js";
import { OK, persistenceError } from "../src/lib/errors.js";
import { CONTACT_ACK, CONTACT_PROMPT, getInsufficientInfoMessage } from "../src/llm/prompts.js";
import { DEFAULT_RETRIEVAL_OPTIONS } from "../src/retrieval/retrieve.js";
import type {
  ConversationStore,
  EmbeddingService,
  GenerationService,
  KnowledgeStore,
} from "../src/types/index.js";

// ============================================
// Fakes
// ============================================

const SETTINGS: PipelineSettings = {
  business: {
    name: "Academia Demo",
    website: "https://academia.example",
    contactEmail: "info@academia.example",
    contactPhone: "+000 000 0000",
  },
  temperature: 0,
  topP: 1,
  delays: { contactAckMs: 1500, socialReplyMs: 7000 },
  historyTurns: 4,
  retrieval: DEFAULT_RETRIEVAL_OPTIONS,
};

const REVIT_CHUNK = {
  text: "El curso de Revit dura 8 semanas.",
  source: "cursos/revit.md",
  similarity: 0.82,
};

function createFakes() {
  const embed = vi.fn<EmbeddingService["embed"]>().mockResolvedValue([1, 0]);
  const generate = vi.fn<GenerationService["generate"]>().mockResolvedValue("Dura 8 semanas");
  const searchSimilar = vi.fn<KnowledgeStore["searchSimilar"]>().mockResolvedValue([REVIT_CHUNK]);
  const findByKeywords = vi.fn<KnowledgeStore["findByKeywords"]>().mockResolvedValue([]);
  const getByPaths = vi.fn<KnowledgeStore["getByPaths"]>().mockResolvedValue([]);
  const ensureSchema = vi.fn<ConversationStore["ensureSchema"]>().mockResolvedValue(OK);
  const ensureConversation = vi.fn<ConversationStore["ensureConversation"]>().mockResolvedValue(OK);
  const getRecent = vi.fn<ConversationStore["getRecent"]>().mockResolvedValue([]);
  const saveTurn = vi.fn<ConversationStore["saveTurn"]>().mockResolvedValue(OK);
  const sleep = vi.fn<PipelineDeps["sleep"]>().mockResolvedValue(undefined);

  const deps: PipelineDeps = {
    embeddings: { embed },
    generation: { generate },
    knowledge: { searchSimilar, findByKeywords, getByPaths },
    conversations: { ensureSchema, ensureConversation, getRecent, saveTurn },
    sleep,
  };

  return { deps, embed, generate, searchSimilar, getByPaths, ensureConversation, getRecent, saveTurn, sleep };
}

describe("handleChatMessage", () => {
  let fakes: ReturnType<typeof createFakes>;

  beforeEach(() => {
    fakes = createFakes();
  });

  // ============================================
  // Short-circuit branches
  // ============================================

  it("answers a greeting without retrieval or suffix", async () => {
    const result = await handleChatMessage({ message: "Hola", conversationId: "conv-1" }, fakes.deps, SETTINGS);

    expect(result).toEqual({ response: "Hola, ¿cómo estás?", conversationId: "conv-1", intent: "greeting" });
    expect(fakes.sleep).toHaveBeenCalledWith(7000);
    expect(fakes.embed).not.toHaveBeenCalled();
    expect(fakes.saveTurn).toHaveBeenNthCalledWith(1, "conv-1", "user", "Hola", undefined);
    expect(fakes.saveTurn).toHaveBeenNthCalledWith(2, "conv-1", "assistant", "Hola, ¿cómo estás?", undefined);
  });

  it("appends the contact suffix to courtesy replies", async () => {
    const result = await handleChatMessage({ message: "Gracias", conversationId: "conv-1" }, fakes.deps, SETTINGS);

    expect(result.response).toBe(`¡Con gusto! Si necesitas algo más, aquí estaré. ${CONTACT_PROMPT}`);
    expect(result.intent).toBe("courtesy");
    expect(fakes.sleep).toHaveBeenCalledWith(7000);
  });

  it("acknowledges shared contact details", async () => {
    const result = await handleChatMessage(
      { message: "Mi correo es ana@example.com", conversationId: "conv-1", ip: "203.0.113.7" },
      fakes.deps,
      SETTINGS
    );

    expect(result.response).toBe(`${CONTACT_ACK} ${CONTACT_PROMPT}`);
    expect(result.intent).toBe("contact_share");
    expect(fakes.sleep).toHaveBeenCalledWith(1500);
    expect(fakes.embed).not.toHaveBeenCalled();
    expect(fakes.saveTurn).toHaveBeenCalledWith("conv-1", "user", "Mi correo es ana@example.com", "203.0.113.7");
  });

  it("prefers contact details over course keywords", async () => {
    const result = await handleChatMessage(
      { message: "quiero el curso de instalaciones, mi correo es x@y.com", conversationId: "conv-1" },
      fakes.deps,
      SETTINGS
    );

    expect(result.response).toBe(`${CONTACT_ACK} ${CONTACT_PROMPT}`);
    expect(fakes.embed).not.toHaveBeenCalled();
    expect(fakes.searchSimilar).not.toHaveBeenCalled();
  });

  // ============================================
  // Answer branch
  // ============================================

  it("generates an answer from retrieved context", async () => {
    const result = await handleChatMessage(
      { message: "¿Cuánto dura el curso de Revit?", conversationId: "conv-1" },
      fakes.deps,
      SETTINGS
    );

    expect(result.response).toBe(`Dura 8 semanas. ${CONTACT_PROMPT}`);
    expect(result.intent).toBe("information_request");
    expect(fakes.sleep).not.toHaveBeenCalled();
    expect(fakes.getByPaths).toHaveBeenCalledWith(["overview_cursos.md"]);

    const [prompt, options] = fakes.generate.mock.calls[0] ?? [];
    expect(options).toEqual({ temperature: 0, topP: 1 });
    expect(prompt).toContain("CONTEXTO:\nEl curso de Revit dura 8 semanas.");
    expect(prompt).toContain("NUEVA PREGUNTA DEL USUARIO:\n¿Cuánto dura el curso de Revit?");
    expect(prompt?.endsWith("RESPUESTA:")).toBe(true);
  });

  it("puts recent history and the last reply in the prompt", async () => {
    fakes.getRecent.mockResolvedValue([
      { role: "user", content: "¿Precio del curso?", createdAt: "2026-01-01T00:00:00Z" },
      { role: "assistant", content: "Cuesta 100 USD.", createdAt: "2026-01-01T00:00:01Z" },
    ]);

    await handleChatMessage({ message: "No entendí", conversationId: "conv-1" }, fakes.deps, SETTINGS);

    expect(fakes.getRecent).toHaveBeenCalledWith("conv-1", 4);
    const prompt = fakes.generate.mock.calls[0]?.[0];
    expect(prompt).toContain("Conversacion hasta ahora:\nUser: ¿Precio del curso?\nAssistant: Cuesta 100 USD.");
    expect(prompt).toContain('Tu respuesta anterior fue:\n"""\nCuesta 100 USD.\n"""');
  });

  it("answers without history when it cannot be loaded", async () => {
    fakes.getRecent.mockRejectedValue(new Error("relation does not exist"));

    const result = await handleChatMessage(
      { message: "¿Cuánto dura el curso de Revit?", conversationId: "conv-1" },
      fakes.deps,
      SETTINGS
    );

    expect(result.response).toBe(`Dura 8 semanas. ${CONTACT_PROMPT}`);
    expect(fakes.generate.mock.calls[0]?.[0]).not.toContain("Conversacion hasta ahora:");
  });

  it("falls back without calling the model when nothing is relevant", async () => {
    fakes.searchSimilar.mockResolvedValue([]);

    const result = await handleChatMessage(
      { message: "¿Tienen cursos de robótica?", conversationId: "conv-1" },
      fakes.deps,
      SETTINGS
    );

    expect(result.response).toBe(`${getInsufficientInfoMessage(SETTINGS.business)} ${CONTACT_PROMPT}`);
    expect(fakes.generate).not.toHaveBeenCalled();
    expect(fakes.saveTurn).toHaveBeenCalledTimes(2);
  });

  it("creates a conversation id when none is given", async () => {
    const result = await handleChatMessage({ message: "Hola" }, fakes.deps, SETTINGS);

    expect(result.conversationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(fakes.ensureConversation).toHaveBeenCalledWith(result.conversationId);
  });

  // ============================================
  // Failures
  // ============================================

  it("rejects an empty message before touching any store", async () => {
    await expect(handleChatMessage({ message: "  " }, fakes.deps, SETTINGS)).rejects.toMatchObject({
      code: "INVALID_INPUT",
    });
    expect(fakes.ensureConversation).not.toHaveBeenCalled();
    expect(fakes.saveTurn).not.toHaveBeenCalled();
  });

  it("persists nothing when retrieval fails", async () => {
    fakes.embed.mockRejectedValue(new Error("connection refused"));

    await expect(
      handleChatMessage({ message: "¿Cuánto dura el curso de Revit?", conversationId: "conv-1" }, fakes.deps, SETTINGS)
    ).rejects.toMatchObject({ code: "RETRIEVAL_FAILED" });
    expect(fakes.saveTurn).not.toHaveBeenCalled();
  });

  it("persists nothing when generation fails", async () => {
    fakes.generate.mockRejectedValue(new Error("model not found"));

    await expect(
      handleChatMessage({ message: "¿Cuánto dura el curso de Revit?", conversationId: "conv-1" }, fakes.deps, SETTINGS)
    ).rejects.toMatchObject({ code: "GENERATION_FAILED" });
    expect(fakes.saveTurn).not.toHaveBeenCalled();
  });

  it("treats a blank generation as a failure", async () => {
    fakes.generate.mockResolvedValue("   ");

    await expect(
      handleChatMessage({ message: "¿Cuánto dura el curso de Revit?", conversationId: "conv-1" }, fakes.deps, SETTINGS)
    ).rejects.toMatchObject({ code: "GENERATION_FAILED" });
  });

  it("still replies when the user turn cannot be saved", async () => {
    fakes.saveTurn.mockResolvedValue({ ok: false, error: persistenceError("insert failed") });

    const result = await handleChatMessage({ message: "Hola", conversationId: "conv-1" }, fakes.deps, SETTINGS);

    expect(result.response).toBe("Hola, ¿cómo estás?");
    // assistant turn is skipped once the user turn is lost
    expect(fakes.saveTurn).toHaveBeenCalledTimes(1);
  });

  it("still replies when the store throws", async () => {
    fakes.ensureConversation.mockRejectedValue(new Error("network down"));
    fakes.saveTurn.mockRejectedValue(new Error("network down"));

    const result = await handleChatMessage({ message: "Gracias", conversationId: "conv-1" }, fakes.deps, SETTINGS);

    expect(result.intent).toBe("courtesy");
  });
});
