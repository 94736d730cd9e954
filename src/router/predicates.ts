// ============================================
// Predicate interpreter — one evaluator for every rule
// ============================================

import type { RulePredicate } from "./types.js";

const keywordCache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Whole-phrase keyword test.
 * The keyword may not touch a letter or digit on either side,
 * so "emi" does not fire on "premium".
 */
export function containsKeyword(text: string, keyword: string): boolean {
  let regex = keywordCache.get(keyword);
  if (!regex) {
    regex = new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9])`);
    keywordCache.set(keyword, regex);
  }
  return regex.test(text);
}

/** Keywords from `keywords` present in `text` */
export function matchedKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => containsKeyword(text, keyword));
}

function containsAny(text: string, keywords: readonly string[] | undefined): boolean {
  return keywords !== undefined && keywords.some((keyword) => containsKeyword(text, keyword));
}

/**
 * Evaluate a predicate against normalized query text.
 * Pure: looks at nothing but the text and the predicate.
 */
export function evaluatePredicate(predicate: RulePredicate, text: string): boolean {
  if (containsAny(text, predicate.exclude)) {
    return false;
  }

  switch (predicate.kind) {
    case "keywords":
      return (
        containsAny(text, predicate.include) &&
        (predicate.requireAlso ?? []).every((group) => containsAny(text, group))
      );
    case "pattern":
      return predicate.patterns.some((pattern) => {
        // Global/sticky regexes carry lastIndex between calls
        pattern.lastIndex = 0;
        return pattern.test(text);
      });
    case "anyOf":
      return predicate.of.some((nested) => evaluatePredicate(nested, text));
  }
}

/**
 * Structural problems with a predicate, empty when it is usable.
 */
export function describePredicateProblems(predicate: RulePredicate, path = "predicate"): string[] {
  const problems: string[] = [];

  if (predicate.exclude?.some((k) => k.trim().length === 0)) {
    problems.push(`${path}.exclude contains an empty keyword`);
  }

  switch (predicate.kind) {
    case "keywords":
      if (predicate.include.length === 0) {
        problems.push(`${path}.include is empty`);
      }
      if (predicate.include.some((k) => k.trim().length === 0)) {
        problems.push(`${path}.include contains an empty keyword`);
      }
      predicate.requireAlso?.forEach((group, i) => {
        if (group.length === 0) problems.push(`${path}.requireAlso[${i}] is empty`);
      });
      break;
    case "pattern":
      if (predicate.patterns.length === 0) {
        problems.push(`${path}.patterns is empty`);
      }
      break;
    case "anyOf":
      if (predicate.of.length === 0) {
        problems.push(`${path}.of is empty`);
      }
      predicate.of.forEach((nested, i) => {
        problems.push(...describePredicateProblems(nested, `${path}.of[${i}]`));
      });
      break;
  }

  return problems;
}
