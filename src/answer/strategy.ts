// ============================================
// Response Strategy Selector
// direct → handler data, grounded → retrieved chunks, ungrounded → model alone
// ============================================

import type { HandlerResult } from "../handlers/types.js";
import type { RequestLogger } from "../lib/logger.js";
import { MAX_TOKENS, type GenerationBackend } from "../llm/client.js";
import { buildDataSummaryPrompt, buildGroundedPrompt, buildUngroundedPrompt } from "../llm/prompts.js";
import { isMatched, type RouteDecision } from "../router/types.js";
import type { Query, RetrievalResult } from "../types/index.js";
import {
  NO_INFORMATION_MESSAGE,
  handlerUnavailableAnswer,
  templateAnswer,
  verbatimChunkAnswer,
} from "./templates.js";

export type ResponseState = "direct" | "grounded" | "ungrounded";

/** Degraded paths a single answer can take */
export type FallbackTier =
  | "lexical_retrieval"
  | "template"
  | "verbatim_chunk"
  | "no_information"
  | "handler_unavailable";

/** Outcome of the handler call in the direct state */
export type HandlerOutcome =
  | { ok: true; result: HandlerResult }
  | { ok: false; error: unknown };

export type StrategyInput =
  | { state: "direct"; query: Query; intent: string; handler: HandlerOutcome }
  | { state: "grounded"; query: Query; retrieval: RetrievalResult }
  | { state: "ungrounded"; query: Query };

export interface StrategyOutcome {
  text: string;
  state: ResponseState;
  fallbacks: FallbackTier[];
}

/** Separator between chunks in the grounded context */
export const CONTEXT_SEPARATOR = "\n\n---\n\n";

export function selectState(route: RouteDecision, retrieval: RetrievalResult | null): ResponseState {
  if (isMatched(route)) return "direct";
  if (retrieval && retrieval.matches.length > 0) return "grounded";
  return "ungrounded";
}

/** Generated text, or null when the backend failed or said nothing */
async function tryGenerate(
  generator: GenerationBackend,
  request: Parameters<GenerationBackend["generate"]>[0],
  log?: RequestLogger
): Promise<string | null> {
  try {
    const text = (await generator.generate(request)).trim();
    if (text.length === 0) {
      log?.warn("Generation returned empty text");
      return null;
    }
    return text;
  } catch (err) {
    log?.warn("Generation failed, using fallback", {
      errorMessage: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Produce the answer text for a state.
 * Never rejects: every generation failure maps to that state's fallback.
 */
export async function respond(
  input: StrategyInput,
  generator: GenerationBackend,
  log?: RequestLogger
): Promise<StrategyOutcome> {
  switch (input.state) {
    case "direct": {
      if (!input.handler.ok) {
        return {
          text: handlerUnavailableAnswer(input.intent),
          state: "direct",
          fallbacks: ["handler_unavailable"],
        };
      }

      const result = input.handler.result;
      const text = await tryGenerate(
        generator,
        {
          prompt: buildDataSummaryPrompt(input.query.raw, result),
          mode: "text",
          maxTokens: MAX_TOKENS.summary,
        },
        log
      );

      return text !== null
        ? { text, state: "direct", fallbacks: [] }
        : { text: templateAnswer(result, input.query.raw), state: "direct", fallbacks: ["template"] };
    }

    case "grounded": {
      const [top] = input.retrieval.matches;
      if (!top) {
        return respond({ state: "ungrounded", query: input.query }, generator, log);
      }

      const context = input.retrieval.matches.map((m) => m.chunk.text).join(CONTEXT_SEPARATOR);
      const text = await tryGenerate(
        generator,
        { prompt: buildGroundedPrompt(input.query.raw), context, mode: "text" },
        log
      );

      return text !== null
        ? { text, state: "grounded", fallbacks: [] }
        : { text: verbatimChunkAnswer(top.chunk.text), state: "grounded", fallbacks: ["verbatim_chunk"] };
    }

    case "ungrounded": {
      const text = await tryGenerate(
        generator,
        { prompt: buildUngroundedPrompt(input.query.raw), mode: "text" },
        log
      );

      return text !== null
        ? { text, state: "ungrounded", fallbacks: [] }
        : { text: NO_INFORMATION_MESSAGE, state: "ungrounded", fallbacks: ["no_information"] };
    }
  }
}
