// ============================================
// Knowledge Store — document chunks + pgvector search
// ============================================

import { z } from "zod";
import { supabase } from "./supabase.js";
import { retrievalError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { EvidenceChunk, KnowledgeStore, StoredDocument } from "../types/index.js";

const matchRowSchema = z.object({
  text: z.string(),
  source: z.string().nullable(),
  cosine_distance: z.number(),
});

const documentRowSchema = z.object({
  text: z.string(),
  source: z.string().nullable(),
});

const textRowSchema = z.object({ text: z.string() });

/** Cosine distance → similarity in [0, 1] */
export function distanceToSimilarity(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance));
}

/** "faq" -> "faq/" so prefixes never match sibling folders ("faqs/") */
export function normalizePrefix(prefix: string): string {
  return prefix.endsWith("/") ? prefix : `${prefix}/`;
}

/** Letters, digits and spaces only; keeps PostgREST filter syntax intact */
function sanitizeKeyword(keyword: string): string {
  return keyword.toLowerCase().replace(/[^\p{L}\p{N} ]/gu, "").trim();
}

/**
 * Supabase-backed store over the `documents` table.
 * Similarity search goes through the `match_documents` RPC (see supabase/schema.sql).
 */
export class SupabaseKnowledgeStore implements KnowledgeStore {
  async searchSimilar(queryEmbedding: number[], topK: number, sourcePrefixes?: string[]): Promise<EvidenceChunk[]> {
    const prefixes = sourcePrefixes?.map(normalizePrefix) ?? [];

    const { data, error } = await supabase.rpc("match_documents", {
      query_embedding: queryEmbedding,
      match_count: topK,
      source_prefixes: prefixes.length > 0 ? prefixes : null,
    });

    if (error) {
      logger.error("match_documents RPC failed", {
        stage: "retrieval",
        errorMessage: error.message,
        errorCode: error.code,
      });
      throw retrievalError("Vector search failed", undefined, error);
    }

    const rows = z.array(matchRowSchema).parse(data ?? []);

    return rows.map((row) => ({
      text: row.text,
      source: row.source,
      similarity: distanceToSimilarity(row.cosine_distance),
    }));
  }

  async findByKeywords(keywords: string[], maxResults: number): Promise<string[]> {
    const terms = [...new Set(keywords.map(sanitizeKeyword).filter(Boolean))];
    if (terms.length === 0) return [];

    const { data, error } = await supabase
      .from("documents")
      .select("text")
      .or(terms.map((term) => `normalized_text.ilike.%${term}%`).join(","))
      .limit(maxResults);

    if (error) {
      throw retrievalError("Keyword search failed", undefined, error);
    }

    const texts: string[] = [];
    for (const row of z.array(textRowSchema).parse(data ?? [])) {
      if (!texts.includes(row.text)) texts.push(row.text);
    }
    return texts;
  }

  async getByPaths(paths: string[]): Promise<StoredDocument[]> {
    if (paths.length === 0) return [];

    const { data, error } = await supabase
      .from("documents")
      .select("text, source")
      .in("filepath", paths)
      .order("created_at", { ascending: false });

    if (error) {
      throw retrievalError("Fetch by path failed", undefined, error);
    }

    return z.array(documentRowSchema).parse(data ?? []);
  }
}
