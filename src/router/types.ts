// ============================================
// Router Types — Rule table and decision contracts
// ============================================

import type { Query } from "../types/index.js";

/**
 * Current router version.
 * Bump when the default rule table changes.
 */
export const ROUTER_VERSION = "router.v1.0";

/** Intent tag for queries no rule claims */
export const UNMATCHED = "unmatched";

/** Extracted parameter values */
export type ParamValue = string | number | boolean;
export type RouteParams = Record<string, ParamValue>;

/**
 * Keyword predicate.
 * Matches when at least one `include` keyword is present, every
 * `requireAlso` group has at least one keyword present, and no
 * `exclude` keyword is present.
 */
export type KeywordPredicate = {
  kind: "keywords";
  include: readonly string[];
  requireAlso?: readonly (readonly string[])[];
  exclude?: readonly string[];
};

/** Matches when at least one pattern matches and no `exclude` keyword is present */
export type PatternPredicate = {
  kind: "pattern";
  patterns: readonly RegExp[];
  exclude?: readonly string[];
};

/** Matches when at least one nested predicate matches and no `exclude` keyword is present */
export type AnyOfPredicate = {
  kind: "anyOf";
  of: readonly RulePredicate[];
  exclude?: readonly string[];
};

export type RulePredicate = KeywordPredicate | PatternPredicate | AnyOfPredicate;

/**
 * Parameter extractor.
 * Returns null when the values found in the query are out of bounds —
 * the rule then rejects the query instead of dispatching it.
 */
export type ParamExtractor = (query: Query) => RouteParams | null;

/** One row of the rule table */
export type DetectionRule = {
  /** Lower rank = higher priority. Unique within a table. */
  rank: number;
  intent: string;
  /** Short description, also shown to the model for action detection */
  description: string;
  predicate: RulePredicate;
  extract: ParamExtractor;
};

/** Why a matching rule declined to dispatch */
export type RuleRejection = {
  intent: string;
  rank: number;
  reason: string;
};

/**
 * Router output.
 * Fresh per query; never cached across queries.
 */
export type RouteDecision = {
  /** Rule intent, or "unmatched" */
  intent: string;
  params: Readonly<RouteParams>;
  /** Rank of the originating rule, null when no rule dispatched */
  rank: number | null;
  /** "model" when the intent came from model-assisted action detection */
  source: "rules" | "model";
  rejected?: RuleRejection;
};

/** Deterministic router over a validated rule table */
export interface IntentRouter {
  route(query: Query): RouteDecision;
  /** Rules in evaluation order */
  readonly rules: readonly DetectionRule[];
}

export function isMatched(decision: RouteDecision): boolean {
  return decision.intent !== UNMATCHED;
}
