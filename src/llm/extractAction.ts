// ============================================
// Model-assisted action detection
// Asks the generation backend (JSON mode) whether an unmatched query
// still maps to a known intent.
// ============================================

import { z } from "zod";
import type { RequestLogger } from "../lib/logger.js";
import type { DetectionRule, RouteDecision } from "../router/types.js";
import type { Query } from "../types/index.js";
import { MAX_TOKENS, parseJsonResponse, type GenerationBackend } from "./client.js";
import { buildActionPrompt } from "./prompts.js";

/** Action name the model uses for "no action" */
export const NO_ACTION = "none";

const actionSchema = z.object({
  action: z.string().min(1),
  parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

export interface ActionDetector {
  detect(query: Query, log?: RequestLogger): Promise<RouteDecision | null>;
}

/**
 * Returns a decision with source "model" for a recognised action,
 * otherwise null. Backend failures also yield null.
 */
export class ModelActionDetector implements ActionDetector {
  private readonly intents: ReadonlySet<string>;

  constructor(
    private readonly generator: GenerationBackend,
    private readonly rules: readonly DetectionRule[]
  ) {
    this.intents = new Set(rules.map((r) => r.intent));
  }

  async detect(query: Query, log?: RequestLogger): Promise<RouteDecision | null> {
    let response: string;
    try {
      response = await this.generator.generate({
        prompt: buildActionPrompt(query.raw, this.rules),
        mode: "json",
        maxTokens: MAX_TOKENS.json,
      });
    } catch (err) {
      log?.warn("Action detection unavailable", {
        errorMessage: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    const parsed = actionSchema.safeParse(parseJsonResponse(response));
    if (!parsed.success) {
      log?.debug("Action detection returned no usable JSON");
      return null;
    }

    const { action, parameters } = parsed.data;
    if (action === NO_ACTION) return null;

    if (!this.intents.has(action)) {
      log?.warn("Model proposed an unknown action", { action });
      return null;
    }

    log?.info("Action detected by model", { action });

    return {
      intent: action,
      params: Object.freeze({ ...parameters }),
      rank: null,
      source: "model",
    };
  }
}
