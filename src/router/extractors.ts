// ============================================
// Parameter extractors for the finance rules
// Deterministic: regexes over normalized text only
// ============================================

import {
  AGE_LIMITS,
  EMI_LIMITS,
  EXPENSE_LIMITS,
  FUND_CATEGORY_LIMIT,
  INVESTMENT_LIMITS,
  SIP_LIMITS,
} from "../config/limits.js";
import { containsKeyword } from "./predicates.js";
import type { ParamExtractor } from "./types.js";

const UNIT_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  lakh: 100_000,
  lakhs: 100_000,
  cr: 10_000_000,
  crore: 10_000_000,
  crores: 10_000_000,
};

const AMOUNT_PATTERN = /(\d+(?:\.\d+)?)\s*(lakhs?|crores?|cr|k)?\b/g;
const NOT_AN_AMOUNT = /^\s*(?:%|years?\b|yrs?\b|y\b|months?\b)/;

/** Drop thousands separators so "10,000" reads as one number */
function stripSeparators(text: string): string {
  return text.replace(/(\d),(?=\d)/g, "$1");
}

/** "30" + "lakh" → 3000000 */
export function applyUnit(value: string, unit: string | undefined): number {
  const multiplier = unit ? UNIT_MULTIPLIERS[unit] ?? 1 : 1;
  return Math.round(Number(value) * multiplier);
}

/**
 * First money amount in the text.
 * Skips numbers that are percentages or durations ("8%", "20 years").
 */
export function findAmount(text: string): number | null {
  const cleaned = stripSeparators(text);

  for (const match of cleaned.matchAll(AMOUNT_PATTERN)) {
    const [whole, value, unit] = match;
    if (value === undefined) continue;
    const rest = cleaned.slice((match.index ?? 0) + whole.length);
    if (!unit && NOT_AN_AMOUNT.test(rest)) continue;
    return applyUnit(value, unit);
  }

  return null;
}

/** Amount written with a unit ("10k", "2 lakh"), ignoring bare numbers */
function findUnitAmount(text: string): number | null {
  const match = stripSeparators(text).match(/(\d+(?:\.\d+)?)\s*(lakhs?|crores?|cr|k)\b/);
  if (!match?.[1]) return null;
  return applyUnit(match[1], match[2]);
}

/** Bare 3–9 digit number ("5000") */
function findPlainAmount(text: string): number | null {
  const match = stripSeparators(text).match(/(?<![\d.])(\d{3,9})(?![\d.])/);
  return match?.[1] ? Number(match[1]) : null;
}

export function findYears(text: string): number | null {
  const match = text.match(/(\d{1,2})\s*(?:years?|yrs?|y)\b/);
  return match?.[1] ? Number(match[1]) : null;
}

export function findPercent(text: string): number | null {
  const match = text.match(/(\d+(?:\.\d+)?)\s*%/);
  return match?.[1] ? Number(match[1]) : null;
}

function within(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

// ============================================
// Market data rules — pass the query through
// ============================================

export const passQuery: ParamExtractor = (query) => ({ query: query.raw.trim() });

export const extractStockMetric: ParamExtractor = (query) => {
  const text = query.normalized;
  const isYield = containsKeyword(text, "dividend yield") || /\byield\s+of\b/.test(text);
  return {
    query: query.raw.trim(),
    metric: isYield ? "dividend_yield" : "pe_ratio",
  };
};

const FUND_CATEGORIES: ReadonlyArray<{ category: string; keywords: readonly string[] }> = [
  { category: "large cap", keywords: ["large cap", "largecap"] },
  { category: "mid cap", keywords: ["mid cap", "midcap"] },
  { category: "small cap", keywords: ["small cap", "smallcap"] },
  { category: "elss", keywords: ["elss", "tax saver"] },
  { category: "debt", keywords: ["debt", "bond", "bonds"] },
  { category: "hybrid", keywords: ["hybrid", "balanced"] },
];

export const extractFundCategory: ParamExtractor = (query) => {
  const found = FUND_CATEGORIES.find(({ keywords }) =>
    keywords.some((keyword) => containsKeyword(query.normalized, keyword))
  );
  return {
    category: found?.category ?? "equity",
    limit: FUND_CATEGORY_LIMIT,
  };
};

// ============================================
// Calculator rules
// ============================================

export const extractSip: ParamExtractor = (query) => {
  const text = query.normalized;
  const monthlyAmount = findUnitAmount(text) ?? findPlainAmount(text) ?? SIP_LIMITS.defaultAmount;
  const years = findYears(text) ?? SIP_LIMITS.defaultYears;
  const percent = findPercent(text);

  if (!within(monthlyAmount, SIP_LIMITS.minAmount, SIP_LIMITS.maxAmount)) return null;
  if (!within(years, SIP_LIMITS.minYears, SIP_LIMITS.maxYears)) return null;
  if (percent !== null && !within(percent, SIP_LIMITS.minReturnPercent, SIP_LIMITS.maxReturnPercent)) return null;

  return {
    monthlyAmount,
    years,
    expectedReturn: percent !== null ? percent / 100 : SIP_LIMITS.defaultReturn,
  };
};

export const extractEmi: ParamExtractor = (query) => {
  const text = query.normalized;
  const loanAmount = findAmount(text);
  if (loanAmount === null) return null;

  const interestRate = findPercent(text) ?? EMI_LIMITS.defaultInterest;
  const tenureYears = findYears(text) ?? EMI_LIMITS.defaultTenure;

  if (!within(loanAmount, EMI_LIMITS.minLoan, EMI_LIMITS.maxLoan)) return null;
  if (!within(interestRate, EMI_LIMITS.minInterest, EMI_LIMITS.maxInterest)) return null;
  if (!within(tenureYears, EMI_LIMITS.minTenure, EMI_LIMITS.maxTenure)) return null;

  return { loanAmount, interestRate, tenureYears };
};

function findAge(text: string): number | null {
  const match = text.match(/(?:\bage|\bi am|\bi'm)\s*(\d{1,2})\b/);
  return match?.[1] ? Number(match[1]) : null;
}

export const extractRetirement: ParamExtractor = (query) => {
  const text = stripSeparators(query.normalized);
  const currentAge = findAge(text) ?? AGE_LIMITS.defaultAge;

  const retireMatch = text.match(/(?:retire\s*at|retirement\s*age(?:\s*of)?)\s*(\d{2})\b/);
  const retirementAge = retireMatch?.[1] ? Number(retireMatch[1]) : AGE_LIMITS.defaultRetirementAge;

  const expenseMatch = text.match(/(?:expenses?|spend|need)\s*(?:of\s*)?(\d+(?:\.\d+)?)\s*(lakhs?|crores?|cr|k)?\b/);
  const monthlyExpense = expenseMatch?.[1]
    ? applyUnit(expenseMatch[1], expenseMatch[2])
    : EXPENSE_LIMITS.defaultMonthly;

  if (!within(currentAge, AGE_LIMITS.minAge, AGE_LIMITS.maxAge)) return null;
  if (!within(retirementAge, AGE_LIMITS.minRetirementAge, AGE_LIMITS.maxRetirementAge)) return null;
  if (retirementAge <= currentAge) return null;
  if (!within(monthlyExpense, EXPENSE_LIMITS.minMonthly, EXPENSE_LIMITS.maxMonthly)) return null;

  return { currentAge, retirementAge, monthlyExpense };
};

const RISK_APPETITES = ["conservative", "moderate", "aggressive"] as const;

export const extractPortfolio: ParamExtractor = (query) => {
  const text = query.normalized;
  const investmentAmount = findAmount(text.replace(/(?:\bage|\bi am|\bi'm)\s*\d{1,2}\b/g, "")) ??
    INVESTMENT_LIMITS.defaultAmount;
  const age = findAge(text) ?? AGE_LIMITS.defaultAge;
  const riskAppetite = RISK_APPETITES.find((risk) => containsKeyword(text, risk)) ??
    INVESTMENT_LIMITS.defaultRiskAppetite;

  if (!within(investmentAmount, INVESTMENT_LIMITS.min, INVESTMENT_LIMITS.max)) return null;
  if (!within(age, AGE_LIMITS.minAge, AGE_LIMITS.maxAge)) return null;

  return { investmentAmount, age, riskAppetite };
};
