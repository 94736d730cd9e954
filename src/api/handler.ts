// ============================================
// API Handler — /api/v1/query endpoint
// ============================================

import type { Request, Response } from "express";
import type { Orchestrator } from "../app/orchestrator.js";
import { PIPELINE_VERSION } from "../app/orchestrator.js";
import type { FinalAnswer } from "../app/types.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { RetrievalEngine } from "../retrieval/retrieve.js";
import { ROUTER_VERSION } from "../router/types.js";
import { queryRequestSchema, type TracedRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export type QueryResponse = FinalAnswer;

export interface ApiErrorResponse {
  error: string;
  message: string;
  requestId?: string;
  details?: unknown;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  corpus: string;
  routerVersion: string;
  pipelineVersion: string;
  timestamp: string;
}

// ============================================
// Handlers
// ============================================

/**
 * Express handlers over one Orchestrator.
 * Bodies arrive already validated by validateBody(queryRequestSchema).
 */
export function createQueryHandlers(orchestrator: Orchestrator, retrieval: RetrievalEngine) {
  async function handleQueryRequest(req: TracedRequest, res: Response): Promise<void> {
    const startTime = Date.now();

    try {
      const { question, userId } = queryRequestSchema.parse(req.body);
      const answer = await orchestrator.handleQuery(question, userId);

      logger.info("API request completed", {
        stage: "api",
        requestId: req.requestId,
        answerRequestId: answer.requestId,
        intent: answer.intent,
        fallbackUsed: answer.fallbackUsed,
        latencyMs: Date.now() - startTime,
      });

      const response: QueryResponse = answer;
      res.status(200).json(response);
    } catch (err) {
      const appError = wrapError(err, req.requestId);

      logger.error("API request failed", {
        stage: "api",
        requestId: req.requestId,
        error: err,
        errorCode: appError.code,
      });

      const errorResponse: ApiErrorResponse = {
        error: "API_INTERNAL_ERROR",
        message: getUserMessage({ code: "API_INTERNAL_ERROR", message: appError.message }),
        requestId: req.requestId,
      };

      res.status(500).json(errorResponse);
    }
  }

  function handleHealthCheck(_req: Request, res: Response): void {
    const corpus = retrieval.corpusKind;
    const response: HealthResponse = {
      status: corpus === "semantic" ? "ok" : "degraded",
      corpus,
      routerVersion: ROUTER_VERSION,
      pipelineVersion: PIPELINE_VERSION,
      timestamp: new Date().toISOString(),
    };

    res.status(200).json(response);
  }

  return { handleQueryRequest, handleHealthCheck };
}
