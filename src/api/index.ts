// ============================================
// API Module — REST surface for handleQuery
// ============================================

import express, { type Router } from "express";
import type { Assistant } from "../app/bootstrap.js";
import { createQueryHandlers } from "./handler.js";
import { addRequestId, handleBodyErrors, queryRequestSchema, validateBody } from "./middleware.js";

export {
  validateBody,
  queryRequestSchema,
  addRequestId,
  handleBodyErrors,
  type TracedRequest,
  type QueryRequest,
} from "./middleware.js";

export {
  createQueryHandlers,
  type QueryResponse,
  type ApiErrorResponse,
  type HealthResponse,
} from "./handler.js";

/** /api/v1 routes */
export function createApiRouter(assistant: Assistant): Router {
  const { handleQueryRequest, handleHealthCheck } = createQueryHandlers(assistant.orchestrator, assistant.retrieval);
  const router = express.Router();

  router.use(addRequestId);
  router.use(express.json({ limit: "16kb" }));
  router.get("/health", handleHealthCheck);
  router.post("/query", validateBody(queryRequestSchema), handleQueryRequest);
  router.use(handleBodyErrors);

  return router;
}
