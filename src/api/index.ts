// ============================================
// API Module — Public REST API for the chat widget
// ============================================

export {
  validateBody,
  chatRequestSchema,
  addRequestId,
  requestIdOf,
  corsMiddleware,
  isOriginAllowed,
  type ChatRequest,
  type ValidationIssue,
  type ValidationOutcome,
} from "./middleware.js";

export {
  processChatRequest,
  createChatHandler,
  createHealthHandler,
  buildHealthResponse,
  type ChatRunner,
  type ChatResponse,
  type ApiErrorResponse,
  type ApiReply,
  type HealthResponse,
} from "./handler.js";
