// ============================================
// Router — Deterministic first-match rule interpreter
// ============================================

import { z } from "zod";
import { configurationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Query } from "../types/index.js";
import { describePredicateProblems, evaluatePredicate } from "./predicates.js";
import {
  type DetectionRule,
  type IntentRouter,
  type RouteDecision,
  type RulePredicate,
  UNMATCHED,
} from "./types.js";

const ruleSchema = z.object({
  rank: z.number().int().positive(),
  intent: z
    .string()
    .trim()
    .min(1, "intent is required")
    .refine((intent) => intent !== UNMATCHED, `"${UNMATCHED}" is reserved`),
  description: z.string(),
  predicate: z.custom<RulePredicate>(
    (value) => typeof value === "object" && value !== null && "kind" in value,
    "predicate is required"
  ),
  extract: z.custom<DetectionRule["extract"]>((value) => typeof value === "function", "extract must be a function"),
});

/**
 * Validate a rule table and return its rules in evaluation order.
 * Throws CONFIG_ERROR listing every problem found.
 */
export function validateRuleTable(rules: readonly DetectionRule[]): DetectionRule[] {
  const problems: string[] = [];
  const seenRanks = new Map<number, string>();

  if (rules.length === 0) {
    problems.push("rule table is empty");
  }

  rules.forEach((rule, i) => {
    const label = `rules[${i}]`;
    const parsed = ruleSchema.safeParse(rule);

    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        problems.push(`${label}.${issue.path.join(".")}: ${issue.message}`);
      }
      return;
    }

    const owner = seenRanks.get(rule.rank);
    if (owner !== undefined) {
      problems.push(`${label}: rank ${rule.rank} already used by "${owner}"`);
    } else {
      seenRanks.set(rule.rank, rule.intent);
    }

    for (const problem of describePredicateProblems(rule.predicate)) {
      problems.push(`${label} (${rule.intent}): ${problem}`);
    }
  });

  if (problems.length > 0) {
    throw configurationError(`Invalid rule table:\n   ${problems.join("\n   ")}`, { problems });
  }

  return [...rules].sort((a, b) => a.rank - b.rank);
}

function unmatched(rejected?: RouteDecision["rejected"]): RouteDecision {
  return rejected
    ? { intent: UNMATCHED, params: {}, rank: null, source: "rules", rejected }
    : { intent: UNMATCHED, params: {}, rank: null, source: "rules" };
}

/**
 * Build a router over a rule table.
 *
 * The router is a PURE FUNCTION of query text and the table:
 * - It never calls the network or the corpus
 * - The first rule (lowest rank) whose predicate matches wins
 * - No lower-priority rule is evaluated after a match
 */
export function createIntentRouter(rules: readonly DetectionRule[]): IntentRouter {
  const ordered = Object.freeze(validateRuleTable(rules).map((rule) => Object.freeze({ ...rule })));

  logger.info("Rule table loaded", {
    stage: "router",
    ruleCount: ordered.length,
    order: ordered.map((r) => r.intent),
  });

  return {
    rules: ordered,

    route(query: Query): RouteDecision {
      for (const rule of ordered) {
        if (!evaluatePredicate(rule.predicate, query.normalized)) continue;

        const params = rule.extract(query);

        if (params === null) {
          logger.debug("Rule matched but rejected parameters", {
            stage: "router",
            intent: rule.intent,
            rank: rule.rank,
          });
          return unmatched({
            intent: rule.intent,
            rank: rule.rank,
            reason: "parameters out of range",
          });
        }

        logger.debug("Rule matched", {
          stage: "router",
          intent: rule.intent,
          rank: rule.rank,
        });

        return {
          intent: rule.intent,
          params: Object.freeze({ ...params }),
          rank: rule.rank,
          source: "rules",
        };
      }

      return unmatched();
    },
  };
}
