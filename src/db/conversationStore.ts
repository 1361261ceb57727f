// ============================================
// Conversation Store — chat history persistence
// ============================================

import { z } from "zod";
import { supabase } from "./supabase.js";
import { OK, persistenceError, type Result } from "../lib/errors.js";
import type { ConversationStore, ConversationTurn, Role } from "../types/index.js";

const turnRowSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  created_at: z.string(),
});

/**
 * Supabase-backed store over `chat_messages` and `chatbot_conversations`.
 * Writes report a Result; only reads throw.
 */
export class SupabaseConversationStore implements ConversationStore {
  async ensureSchema(): Promise<Result> {
    const { error } = await supabase.rpc("ensure_chat_schema");
    if (error) {
      return { ok: false, error: persistenceError("Schema check failed", error) };
    }
    return OK;
  }

  async ensureConversation(conversationId: string): Promise<Result> {
    const { error } = await supabase
      .from("chatbot_conversations")
      .upsert(
        { conversation_id: conversationId, status: "pending" },
        { onConflict: "conversation_id", ignoreDuplicates: true }
      );

    if (error) {
      return { ok: false, error: persistenceError("Conversation upsert failed", error, { conversationId }) };
    }
    return OK;
  }

  async getRecent(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    const { data, error } = await supabase
      .from("chat_messages")
      .select("role, content, created_at")
      .eq("conversation_id", conversationId)
      .order("created_at", { ascending: false })
      .limit(limit);

    if (error) {
      throw persistenceError("History query failed", error, { conversationId });
    }

    return z
      .array(turnRowSchema)
      .parse(data ?? [])
      .reverse()
      .map((row) => ({ role: row.role, content: row.content, createdAt: row.created_at }));
  }

  async saveTurn(conversationId: string, role: Role, content: string, ip?: string): Promise<Result> {
    const { error } = await supabase.from("chat_messages").insert({
      conversation_id: conversationId,
      role,
      content,
      ip: ip ?? null,
      status: "pending",
    });

    if (error) {
      return { ok: false, error: persistenceError("Message insert failed", error, { conversationId, role }) };
    }
    return OK;
  }
}
