// ============================================
// Application Types — query in, answer out
// ============================================

import type { FallbackTier, ResponseState } from "../answer/strategy.js";

/**
 * How the answer's intent was reached.
 * "retrieval" means no intent: the knowledge base path answered.
 */
export type AnswerSource = "rules" | "model" | "retrieval";

/**
 * Final answer for one query.
 */
export type FinalAnswer = {
  /** Short id shared by every log line of this query */
  requestId: string;

  text: string;

  /** Dispatched intent, or "unmatched" */
  intent: string;

  state: ResponseState;

  /** True when any fallback tier was taken */
  fallbackUsed: boolean;

  /** Every fallback tier taken, in order */
  fallbacks: FallbackTier[];

  source: AnswerSource;

  /** Handler result came from the cache */
  cacheHit: boolean;

  /** Document ids of the chunks passed as context, best first, deduplicated */
  sources: string[];

  latencyMs: number;
};
