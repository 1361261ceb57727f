// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "INVALID_INPUT"
  | "RETRIEVAL_FAILED"
  | "GENERATION_FAILED"
  | "PERSISTENCE_FAILED"
  | "INVALID_EMBEDDING"
  | "API_VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class ChatbotError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "ChatbotError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** Outcome of a side effect whose failure must not reach the caller */
export type Result = { ok: true } | { ok: false; error: ChatbotError };

export const OK: Result = { ok: true };

/** Empty or unreadable user input */
export function inputError(message: string, requestId?: string): ChatbotError {
  return new ChatbotError({ code: "INVALID_INPUT", message, requestId });
}

/** Embedding or vector search failure */
export function retrievalError(message: string, requestId?: string, cause?: unknown): ChatbotError {
  return new ChatbotError({ code: "RETRIEVAL_FAILED", message, requestId, cause });
}

/** Model call failed or produced no text */
export function generationError(message: string, requestId?: string, cause?: unknown): ChatbotError {
  return new ChatbotError({ code: "GENERATION_FAILED", message, requestId, cause });
}

export function persistenceError(message: string, cause?: unknown, context?: Record<string, unknown>): ChatbotError {
  return new ChatbotError({ code: "PERSISTENCE_FAILED", message, cause, context });
}

/** Vector of the wrong shape; never recovered by padding or truncating */
export function embeddingError(message: string, context?: Record<string, unknown>): ChatbotError {
  return new ChatbotError({ code: "INVALID_EMBEDDING", message, context });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): ChatbotError {
  if (err instanceof ChatbotError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ChatbotError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-facing messages (the assistant talks to customers in Spanish) */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "INVALID_INPUT":
      return "El mensaje no puede estar vacio.";
    case "RETRIEVAL_FAILED":
    case "INVALID_EMBEDDING":
      return "Lo siento, hubo un problema buscando en nuestra base de conocimiento. Intenta nuevamente.";
    case "GENERATION_FAILED":
      return "Hubo un problema al generar la respuesta. Por favor, intentalo de nuevo.";
    case "API_VALIDATION_ERROR":
      return "La solicitud no es valida.";
    default:
      return "Algo salio mal. Por favor, intentalo de nuevo.";
  }
}

/** HTTP status for an error surfaced by the API layer */
export function httpStatusFor(error: AppError): number {
  switch (error.code) {
    case "INVALID_INPUT":
    case "API_VALIDATION_ERROR":
      return 400;
    default:
      return 500;
  }
}
