// ============================================
// Rule Table Tests — validation and first-match order
// ============================================

import { describe, it, expect, vi } from "vitest";
import { AssistantError } from "../src/lib/errors.js";
import { createIntentRouter, validateRuleTable } from "../src/router/routeQuery.js";
import type { DetectionRule } from "../src/router/types.js";
import { createQuery } from "../src/types/index.js";

function rule(overrides: Partial<DetectionRule>): DetectionRule {
  return {
    rank: 1,
    intent: "stock_price",
    description: "test rule",
    predicate: { kind: "keywords", include: ["price"] },
    extract: () => ({}),
    ...overrides,
  };
}

function configProblems(rules: DetectionRule[]): string[] {
  try {
    validateRuleTable(rules);
  } catch (err) {
    if (err instanceof AssistantError && err.code === "CONFIG_ERROR") {
      const problems = err.context?.["problems"];
      return Array.isArray(problems) ? problems.map(String) : [];
    }
    throw err;
  }
  return [];
}

describe("validateRuleTable", () => {
  it("rejects an empty table", () => {
    expect(configProblems([])).toEqual(["rule table is empty"]);
  });

  it("rejects duplicate ranks", () => {
    expect(configProblems([rule({ rank: 2, intent: "a" }), rule({ rank: 2, intent: "b" })])).toEqual([
      'rules[1]: rank 2 already used by "a"',
    ]);
  });

  it("rejects the reserved unmatched intent", () => {
    expect(configProblems([rule({ intent: "unmatched" })])).toEqual(['rules[0].intent: "unmatched" is reserved']);
  });

  it("rejects a non-positive rank", () => {
    expect(configProblems([rule({ rank: 0 })])).toHaveLength(1);
  });

  it("rejects an empty keyword list", () => {
    expect(configProblems([rule({ predicate: { kind: "keywords", include: [] } })])).toEqual([
      "rules[0] (stock_price): predicate.include is empty",
    ]);
  });

  it("returns rules sorted by rank", () => {
    const sorted = validateRuleTable([rule({ rank: 5, intent: "b" }), rule({ rank: 1, intent: "a" })]);
    expect(sorted.map((r) => r.intent)).toEqual(["a", "b"]);
  });
});

describe("createIntentRouter", () => {
  it("throws a configuration error for an invalid table", () => {
    expect(() => createIntentRouter([])).toThrow(AssistantError);
  });

  it("stops at the first matching rule", () => {
    const lower = vi.fn().mockReturnValue({ from: "lower" });
    const router = createIntentRouter([
      rule({ rank: 10, intent: "lower", predicate: { kind: "keywords", include: ["price"] }, extract: lower }),
      rule({ rank: 3, intent: "higher", predicate: { kind: "keywords", include: ["price"] }, extract: () => ({ from: "higher" }) }),
    ]);

    const decision = router.route(createQuery("Price?", "u"));

    expect(decision).toEqual({ intent: "higher", params: { from: "higher" }, rank: 3, source: "rules" });
    expect(lower).not.toHaveBeenCalled();
  });

  it("does not fall through to lower rules when the extractor rejects", () => {
    const lower = vi.fn().mockReturnValue({});
    const router = createIntentRouter([
      rule({ rank: 1, intent: "strict", extract: () => null }),
      rule({ rank: 2, intent: "loose", extract: lower }),
    ]);

    const decision = router.route(createQuery("price", "u"));

    expect(decision.intent).toBe("unmatched");
    expect(decision.rejected).toEqual({ intent: "strict", rank: 1, reason: "parameters out of range" });
    expect(lower).not.toHaveBeenCalled();
  });
});

describe("two-rule metric/price table", () => {
  const router = createIntentRouter([
    rule({
      rank: 1,
      intent: "metric",
      predicate: { kind: "keywords", include: ["p/e", "dividend yield"] },
    }),
    rule({
      rank: 2,
      intent: "price",
      predicate: { kind: "keywords", include: ["price", "stock"], exclude: ["fund", "nav"] },
    }),
  ]);

  it("routes a P/E question to the metric rule", () => {
    expect(router.route(createQuery("p/e ratio of TCS", "user-1"))).toEqual({
      intent: "metric",
      params: {},
      rank: 1,
      source: "rules",
    });
  });

  it("routes a stock price question to the price rule", () => {
    expect(router.route(createQuery("price of TCS stock", "user-1"))).toEqual({
      intent: "price",
      params: {},
      rank: 2,
      source: "rules",
    });
  });

  it("leaves a fund NAV question unmatched", () => {
    expect(router.route(createQuery("nav of XYZ fund", "user-1"))).toEqual({
      intent: "unmatched",
      params: {},
      rank: null,
      source: "rules",
    });
  });
});
