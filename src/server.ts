// ============================================
// Chat Server — HTTP shell around the pipeline
// Single entrypoint
// ============================================

import "dotenv/config";
import express from "express";
import { config } from "./config/env.js";
import { logger } from "./lib/logger.js";
import { createAppContext } from "./app/deps.js";
import { handleChatMessage, PIPELINE_VERSION } from "./app/pipeline.js";
import { addRequestId, corsMiddleware, createChatHandler, createHealthHandler } from "./api/index.js";

const { deps, settings, checkModels } = createAppContext();

const app = express();
app.disable("x-powered-by");

// ============================================
// Routes
// ============================================

app.use(corsMiddleware);
app.use(addRequestId);

app.get("/health", createHealthHandler(checkModels));

app.post(
  "/chat",
  express.json({ limit: "100kb" }),
  createChatHandler((input) => handleChatMessage(input, deps, settings))
);

// ============================================
// Startup
// ============================================

async function start(): Promise<void> {
  logger.info("Starting chat server", {
    stage: "startup",
    port: config.port,
    version: PIPELINE_VERSION,
    chatModel: config.llm.chatModel,
    embeddingModel: config.llm.embeddingModel,
  });

  // Once per process, not per message
  const schema = await deps.conversations.ensureSchema();
  if (!schema.ok) {
    logger.error("Chat schema check failed, history may not persist", {
      stage: "startup",
      error: schema.error,
    });
  }

  app.listen(config.port, () => {
    logger.info("Server listening", {
      stage: "startup",
      port: config.port,
    });
  });
}

start().catch((err: unknown) => {
  logger.error("Server failed to start", { stage: "startup", error: err });
  process.exit(1);
});
