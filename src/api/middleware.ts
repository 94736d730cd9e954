// ============================================
// API Middleware — request ids and body validation
// ============================================

import crypto from "crypto";
import type { ErrorRequestHandler, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { logger } from "../lib/logger.js";

// ============================================
// Types
// ============================================

export interface TracedRequest extends Request {
  requestId?: string;
}

// ============================================
// Input Validation
// ============================================

/**
 * Request body schema for /api/v1/query.
 */
export const queryRequestSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, "Question cannot be empty")
    .max(2000, "Question cannot exceed 2000 characters"),
  userId: z.string().min(1).max(128).default("anonymous"),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

/**
 * Validation middleware factory.
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const errors = result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }));

      res.status(400).json({
        error: "API_VALIDATION_ERROR",
        message: "Invalid request body",
        details: errors,
      });
      return;
    }

    // Replace body with validated/transformed data
    req.body = result.data;
    next();
  };
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: TracedRequest, res: Response, next: NextFunction): void {
  const header = req.headers["x-request-id"];
  const requestId = typeof header === "string" && header.length > 0 ? header : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

// ============================================
// Body Parse Errors
// ============================================

/**
 * JSON replies for errors raised before a handler runs (malformed or
 * oversized bodies from express.json). Everything else is a 500.
 */
export const handleBodyErrors: ErrorRequestHandler = (
  err: unknown,
  req: TracedRequest,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status =
    typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;

  if (status >= 400 && status < 500) {
    res.status(status).json({
      error: "API_VALIDATION_ERROR",
      message: status === 413 ? "Request body is too large" : "Request body is not valid JSON",
      requestId: req.requestId,
    });
    return;
  }

  logger.error("Unhandled API error", { stage: "api", requestId: req.requestId, error: err });
  res.status(500).json({
    error: "API_INTERNAL_ERROR",
    message: "An internal error occurred. Please try again.",
    requestId: req.requestId,
  });
};
