// ============================================
// Orchestrator — route, dispatch or retrieve, respond
// ============================================

import crypto from "crypto";
import { respond, selectState, type FallbackTier, type HandlerOutcome, type StrategyInput } from "../answer/strategy.js";
import type { HandlerRegistry, HandlerResult } from "../handlers/types.js";
import { configurationError, getUserMessage, wrapError } from "../lib/errors.js";
import type { HandlerCache } from "../lib/handlerCache.js";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import type { GenerationBackend } from "../llm/client.js";
import type { ActionDetector } from "../llm/extractAction.js";
import type { RetrievalEngine } from "../retrieval/retrieve.js";
import { UNMATCHED, isMatched, type IntentRouter, type RouteDecision } from "../router/types.js";
import { createQuery, type Query, type RetrievalResult } from "../types/index.js";
import type { AnswerSource, FinalAnswer } from "./types.js";

/**
 * Pipeline version.
 * Bump when the answer flow changes.
 */
export const PIPELINE_VERSION = "pipeline.v1.0";

export interface OrchestratorDeps {
  router: IntentRouter;
  handlers: HandlerRegistry;
  retrieval: RetrievalEngine;
  generator: GenerationBackend;
  cache: HandlerCache<HandlerResult>;
  /** Chunks passed to the grounded state */
  topK: number;
  /** Consulted for unmatched queries when set */
  actionDetector?: ActionDetector | null;
}

/**
 * Single entry point for answering a query.
 *
 * Flow:
 * 1. Route (rule table)
 * 2. Matched → handler through the cache
 * 3. Unmatched → model-assisted action detection (optional), then retrieval
 * 4. Strategy → answer text with fallbacks
 */
export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {
    const missing = deps.router.rules
      .map((r) => r.intent)
      .filter((intent) => !deps.handlers.has(intent));

    if (missing.length > 0) {
      throw configurationError(`No handler registered for: ${missing.join(", ")}`, { missing });
    }
    if (!Number.isInteger(deps.topK) || deps.topK <= 0) {
      throw configurationError(`topK must be a positive integer, got ${deps.topK}`);
    }
  }

  /** Never rejects; internal failures become a user-facing message */
  async handleQuery(text: string, userId: string): Promise<FinalAnswer> {
    const requestId = crypto.randomUUID().slice(0, 8);
    const startTime = Date.now();
    const log = createRequestLogger(requestId, "pipeline", { userId });

    log.info("Query received", {
      question: text.slice(0, 80),
    });

    try {
      const answer = await this.answer(createQuery(text, userId), requestId, log);
      const latencyMs = Date.now() - startTime;

      log.info("Query answered", {
        intent: answer.intent,
        state: answer.state,
        fallbacks: answer.fallbacks,
        cacheHit: answer.cacheHit,
        latencyMs,
      });

      return { ...answer, latencyMs };
    } catch (err) {
      const appError = wrapError(err, requestId);
      log.error("Pipeline failed", { error: err, errorCode: appError.code });

      return {
        requestId,
        text: getUserMessage(appError),
        intent: UNMATCHED,
        state: "ungrounded",
        fallbackUsed: true,
        fallbacks: [],
        source: "retrieval",
        cacheHit: false,
        sources: [],
        latencyMs: Date.now() - startTime,
      };
    }
  }

  private async answer(
    query: Query,
    requestId: string,
    log: RequestLogger
  ): Promise<Omit<FinalAnswer, "latencyMs">> {
    let route = this.deps.router.route(query);

    log.withStage("router").info("Routing complete", {
      intent: route.intent,
      rank: route.rank,
      rejected: route.rejected,
    });

    if (!isMatched(route) && this.deps.actionDetector) {
      const detected = await this.deps.actionDetector.detect(query, log.withStage("llm"));
      if (detected) route = detected;
    }

    const fallbacks: FallbackTier[] = [];
    let input: StrategyInput;
    let retrieval: RetrievalResult | null = null;
    let cacheHit = false;

    if (isMatched(route)) {
      const dispatch = await this.dispatch(query, route, log.withStage("handler"));
      cacheHit = dispatch.cacheHit;
      input = { state: "direct", query, intent: route.intent, handler: dispatch.outcome };
    } else {
      retrieval = await this.deps.retrieval.retrieve(query.raw, this.deps.topK, log.withStage("retrieval"));
      if (retrieval.strategy === "lexical") fallbacks.push("lexical_retrieval");

      input =
        selectState(route, retrieval) === "grounded"
          ? { state: "grounded", query, retrieval }
          : { state: "ungrounded", query };
    }

    const outcome = await respond(input, this.deps.generator, log.withStage("strategy"));
    fallbacks.push(...outcome.fallbacks);

    const source: AnswerSource = isMatched(route) ? route.source : "retrieval";
    const sources =
      outcome.state === "grounded" && retrieval
        ? [...new Set(retrieval.matches.map((m) => m.chunk.documentId))]
        : [];

    return {
      requestId,
      text: outcome.text,
      intent: route.intent,
      state: outcome.state,
      fallbackUsed: fallbacks.length > 0,
      fallbacks,
      source,
      cacheHit,
      sources,
    };
  }

  /** Handler call through the cache; failures are reported, not thrown */
  private async dispatch(
    query: Query,
    route: RouteDecision,
    log: RequestLogger
  ): Promise<{ outcome: HandlerOutcome; cacheHit: boolean }> {
    const handler = this.deps.handlers.get(route.intent);
    if (!handler) {
      // Only model-detected intents can get here; the registry covers every rule.
      log.warn("No handler for intent", { intent: route.intent });
      return { outcome: { ok: false, error: new Error(`No handler for ${route.intent}`) }, cacheHit: false };
    }

    // Rule and model params for the same text may differ; keep them apart.
    const key = `${route.source}:${query.normalized}`;

    try {
      const { value, hit } = await this.deps.cache.getOrLoad(key, () => handler.execute(route.params));
      log.info(hit ? "Handler result from cache" : "Handler result fetched", { intent: route.intent });
      return { outcome: { ok: true, result: value }, cacheHit: hit };
    } catch (err) {
      log.warn("Handler unavailable", {
        intent: route.intent,
        errorMessage: err instanceof Error ? err.message : String(err),
      });
      return { outcome: { ok: false, error: err }, cacheHit: false };
    }
  }
}
