// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "CONFIG_ERROR"
  | "HANDLER_UNAVAILABLE"
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "INDEX_INVALID"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR"
  // API-specific error codes
  | "API_VALIDATION_ERROR"
  | "API_INTERNAL_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class AssistantError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "AssistantError";
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

/** True when `err` is an AssistantError carrying `code` */
export function hasCode(err: unknown, code: ErrorCode): err is AssistantError {
  return err instanceof AssistantError && err.code === code;
}

/**
 * Malformed rule table, missing handler or invalid env.
 * Only raised while starting up, never while answering a query.
 */
export function configurationError(message: string, context?: Record<string, unknown>): AssistantError {
  return new AssistantError({
    code: "CONFIG_ERROR",
    message,
    context,
  });
}

/** External handler failed or timed out */
export function handlerUnavailable(intent: string, cause?: unknown): AssistantError {
  return new AssistantError({
    code: "HANDLER_UNAVAILABLE",
    message: `Handler for "${intent}" is unavailable`,
    cause,
    context: { intent },
  });
}

/** Create an embedding backend error */
export function embeddingUnavailable(message: string, cause?: unknown): AssistantError {
  return new AssistantError({
    code: "EMBEDDING_UNAVAILABLE",
    message,
    cause,
  });
}

/** Create a generation backend error */
export function generationUnavailable(message: string, cause?: unknown): AssistantError {
  return new AssistantError({
    code: "GENERATION_UNAVAILABLE",
    message,
    cause,
  });
}

/** Corpus snapshot or chunk set that cannot be served */
export function indexInvalid(message: string, context?: Record<string, unknown>): AssistantError {
  return new AssistantError({
    code: "INDEX_INVALID",
    message,
    context,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): AssistantError {
  if (err instanceof AssistantError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new AssistantError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "HANDLER_UNAVAILABLE":
      return "I couldn't reach the data service for that request. Please try again shortly.";
    case "GENERATION_UNAVAILABLE":
      return "I'm having trouble processing your query. The AI service may be unavailable.";
    case "EMBEDDING_UNAVAILABLE":
    case "INDEX_INVALID":
      return "I couldn't search the knowledge base. Please try again.";
    case "API_VALIDATION_ERROR":
      return "Invalid request parameters.";
    case "API_INTERNAL_ERROR":
      return "An internal error occurred. Please try again.";
    default:
      return "Something went wrong. Please try again.";
  }
}
