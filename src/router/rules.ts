// ============================================
// Default rule table — finance intents in priority order
// ============================================

import {
  extractEmi,
  extractFundCategory,
  extractPortfolio,
  extractRetirement,
  extractSip,
  extractStockMetric,
  passQuery,
} from "./extractors.js";
import type { DetectionRule } from "./types.js";

/**
 * Phrasing that asks what something *is*.
 * Calculator rules exclude it so "what is SIP" reaches the knowledge corpus
 * instead of running a calculation with default numbers.
 */
export const KNOWLEDGE_QUESTION_SIGNALS = [
  "what is",
  "what are",
  "what's",
  "explain",
  "define",
  "meaning",
  "difference",
  "tell me about",
  "how does",
] as const;

const FUND_VOCABULARY = ["mutual fund", "mutual funds", "fund", "funds"] as const;

/**
 * Order matters: the first matching rule wins.
 * Stock metrics MUST come before stock price, and the price rule
 * excludes metric/fund vocabulary so the more specific rules stay reachable.
 */
export const DEFAULT_RULES: readonly DetectionRule[] = [
  {
    rank: 1,
    intent: "stock_metric",
    description: "P/E ratio or dividend yield of a listed company",
    predicate: {
      kind: "pattern",
      patterns: [
        /\bp\/e\s+(?:ratio\s+)?of\b/,
        /\bpe\s+(?:ratio\s+)?of\b/,
        /\bp\s+e\s+(?:ratio\s+)?of\b/,
        /\bdividend\s+yield\s+of\b/,
        /\byield\s+of\b/,
        /\bp\/e\s+ratio\b/,
        /\bpe\s+ratio\b/,
        /\bdividend\s+yield\b/,
        /\bprice\s+to\s+earnings\b/,
      ],
      exclude: [...FUND_VOCABULARY, "best", "top"],
    },
    extract: extractStockMetric,
  },
  {
    rank: 2,
    intent: "stock_price",
    description: "Live price of a listed stock",
    predicate: {
      kind: "keywords",
      include: ["stock", "stocks", "price", "prices", "share", "shares", "trading", "quote", "market cap"],
      exclude: [
        ...FUND_VOCABULARY,
        "nav",
        "sip",
        "emi",
        "portfolio",
        "best",
        "top",
        "etf",
        "etfs",
        "bees",
        "index fund",
        "p/e",
        "pe ratio",
        "dividend yield",
      ],
    },
    extract: passQuery,
  },
  {
    rank: 3,
    intent: "etf_price",
    description: "Price of an exchange traded fund",
    predicate: {
      kind: "keywords",
      include: ["etf", "etfs", "bees", "index fund", "index funds"],
    },
    extract: passQuery,
  },
  {
    rank: 4,
    intent: "mutual_fund_nav",
    description: "Current NAV of a specific mutual fund",
    predicate: {
      kind: "anyOf",
      of: [
        { kind: "keywords", include: ["nav"] },
        { kind: "keywords", include: ["mutual fund", "mutual funds"], requireAlso: [["price", "prices"]] },
      ],
      exclude: ["best", "top", "good", "recommend"],
    },
    extract: passQuery,
  },
  {
    rank: 5,
    intent: "fund_category",
    description: "Top mutual funds in a category (large cap, ELSS, debt, ...)",
    predicate: {
      kind: "keywords",
      include: ["best", "top", "good", "show", "recommend"],
      requireAlso: [
        [
          "large cap",
          "largecap",
          "mid cap",
          "midcap",
          "small cap",
          "smallcap",
          "elss",
          "tax saver",
          "equity",
          "debt",
          "hybrid",
          "balanced",
          "mutual fund",
          "mutual funds",
        ],
      ],
    },
    extract: extractFundCategory,
  },
  {
    rank: 6,
    intent: "sip_calculator",
    description: "Maturity value of a monthly SIP",
    predicate: {
      kind: "keywords",
      include: ["sip", "sips"],
      exclude: KNOWLEDGE_QUESTION_SIGNALS,
    },
    extract: extractSip,
  },
  {
    rank: 7,
    intent: "emi_calculator",
    description: "Monthly EMI for a loan",
    predicate: {
      kind: "keywords",
      include: ["emi", "emis", "loan", "loans"],
      exclude: KNOWLEDGE_QUESTION_SIGNALS,
    },
    extract: extractEmi,
  },
  {
    rank: 8,
    intent: "retirement_planner",
    description: "Retirement corpus and the SIP needed to reach it",
    predicate: {
      kind: "keywords",
      include: ["retirement", "retire", "retiring", "corpus"],
      exclude: KNOWLEDGE_QUESTION_SIGNALS,
    },
    extract: extractRetirement,
  },
  {
    rank: 9,
    intent: "portfolio_builder",
    description: "Asset allocation for an amount to invest",
    predicate: {
      kind: "anyOf",
      of: [
        { kind: "keywords", include: ["portfolio"] },
        {
          kind: "keywords",
          include: ["invest", "investing", "investment"],
          requireAlso: [["i have", "create", "suggest", "build"]],
        },
      ],
      exclude: KNOWLEDGE_QUESTION_SIGNALS,
    },
    extract: extractPortfolio,
  },
];
