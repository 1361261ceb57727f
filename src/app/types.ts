// ============================================
// Application Types — chat pipeline IO contracts
// ============================================

import type { BusinessProfile } from "../llm/prompts.js";
import type { RetrievalOptions } from "../retrieval/retrieve.js";
import type { SocialTable } from "../router/socialTable.js";
import type { IntentKind } from "../router/types.js";
import type {
  ConversationStore,
  EmbeddingService,
  GenerationService,
  KnowledgeStore,
} from "../types/index.js";

/**
 * One incoming chat message.
 */
export type ChatInput = {
  /** Raw user text */
  message: string;

  /** Existing conversation; a fresh id is generated when absent */
  conversationId?: string;

  /** Client IP, stored with each turn */
  ip?: string;

  /** Correlation id for logs */
  requestId?: string;
};

/**
 * Reply for a successfully handled message.
 */
export type ChatResult = {
  response: string;
  conversationId: string;

  /** Which branch produced the reply */
  intent: IntentKind;
};

/**
 * Collaborators the pipeline talks to.
 */
export type PipelineDeps = {
  embeddings: EmbeddingService;
  generation: GenerationService;
  knowledge: KnowledgeStore;
  conversations: ConversationStore;

  /** Scheduling wait used for reply pacing */
  sleep: (ms: number) => Promise<void>;

  /** Canned replies; defaults to data/social.json */
  socialTable?: SocialTable;
};

/**
 * Tunables, filled from config in production.
 */
export type PipelineSettings = {
  business: BusinessProfile;
  temperature: number;
  topP: number;
  delays: {
    contactAckMs: number;
    socialReplyMs: number;
  };
  /** Turns loaded from the history store */
  historyTurns: number;
  retrieval: RetrievalOptions;
};
