import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const numberFromEnv = (fallback: string) => z.string().default(fallback).transform(Number).pipe(z.number().finite());

const envSchema = z.object({
  // Server
  PORT: numberFromEnv("3000"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  API_ALLOWED_ORIGINS: z.string().default(""), // Comma-separated origins, or "*" for all

  // Model endpoint (OpenAI-compatible; Ollama serves one under /v1)
  LLM_BASE_URL: z.string().url("LLM_BASE_URL must be a valid URL").default("http://localhost:11434/v1"),
  LLM_API_KEY: z.string().min(1).default("ollama"),
  CHAT_MODEL: z.string().min(1).default("llama3"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
  EMBEDDING_DIMENSIONS: numberFromEnv("768").pipe(z.number().int().positive()),
  LLM_TEMPERATURE: numberFromEnv("0"),
  LLM_TOP_P: numberFromEnv("1"),
  LLM_TIMEOUT_MS: numberFromEnv("300000"),
  LLM_MAX_RETRIES: numberFromEnv("2").pipe(z.number().int().min(0)),

  // Retrieval
  RAG_MIN_SIMILARITY: numberFromEnv("0.6").pipe(z.number().min(0).max(1)),
  EMBEDDING_CACHE_SIZE: numberFromEnv("256").pipe(z.number().int().positive()),

  // Short-circuit pacing
  CONTACT_ACK_DELAY_MS: numberFromEnv("1500").pipe(z.number().min(0)),
  SOCIAL_REPLY_DELAY_MS: numberFromEnv("7000").pipe(z.number().min(0)),

  // Supabase
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // Business identity used in prompts and fallback text
  BUSINESS_NAME: z.string().min(1).default("nuestra empresa"),
  BUSINESS_WEBSITE: z.string().min(1).default("nuestro sitio web"),
  CONTACT_EMAIL: z.string().min(1).default("nuestro correo de contacto"),
  CONTACT_PHONE: z.string().min(1).default("nuestro teléfono de contacto"),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

/**
 * Parse allowed origins from environment variable.
 */
function parseAllowedOrigins(originsStr: string): string[] {
  if (!originsStr) return [];
  return originsStr.split(",").map((o) => o.trim()).filter(Boolean);
}

// Derived config for convenience
export const config = {
  port: env.PORT,
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",

  llm: {
    baseUrl: env.LLM_BASE_URL,
    apiKey: env.LLM_API_KEY,
    chatModel: env.CHAT_MODEL,
    embeddingModel: env.EMBEDDING_MODEL,
    embeddingDimensions: env.EMBEDDING_DIMENSIONS,
    temperature: env.LLM_TEMPERATURE,
    topP: env.LLM_TOP_P,
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxRetries: env.LLM_MAX_RETRIES,
  },

  rag: {
    minSimilarity: env.RAG_MIN_SIMILARITY,
    embeddingCacheSize: env.EMBEDDING_CACHE_SIZE,
  },

  delays: {
    contactAckMs: env.CONTACT_ACK_DELAY_MS,
    socialReplyMs: env.SOCIAL_REPLY_DELAY_MS,
  },

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  },

  business: {
    name: env.BUSINESS_NAME,
    website: env.BUSINESS_WEBSITE,
    contactEmail: env.CONTACT_EMAIL,
    contactPhone: env.CONTACT_PHONE,
  },

  api: {
    allowedOrigins: parseAllowedOrigins(env.API_ALLOWED_ORIGINS),
  },
} as const;

export type AppConfig = typeof config;
