// ============================================
// Deterministic answers — used when generation is unavailable
// ============================================

import type { HandlerResult, HandlerValue } from "../handlers/types.js";

const numberFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 2 });

export const NO_INFORMATION_MESSAGE =
  "I don't have information on that yet. Try asking about stock prices, mutual funds, SIP, EMI or retirement planning.";

export const DEFAULT_HEADLINE = "Here's the information you requested.";

export function formatNumber(n: number): string {
  return numberFormat.format(n);
}

function rupees(n: number): string {
  return `₹${formatNumber(n)}`;
}

/** "monthly_emi" → "Monthly emi", "loanAmount" → "Loan amount" */
export function humanizeKey(key: string): string {
  const words = key
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/[_-]+/g, " ")
    .trim()
    .toLowerCase();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

function formatValue(value: string | number | boolean | null): string {
  if (value === null) return "n/a";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "boolean") return value ? "yes" : "no";
  return value;
}

export type TemplateField = { label: string; value: string };

/**
 * Every leaf of a handler result as a labelled line.
 * Nested keys are joined with " › ", array items are numbered from 1.
 */
export function flattenResult(result: HandlerResult): TemplateField[] {
  const fields: TemplateField[] = [];

  const visit = (value: HandlerValue, path: string[]): void => {
    if (Array.isArray(value)) {
      if (value.length === 0) {
        fields.push({ label: path.join(" › "), value: "none" });
        return;
      }
      value.forEach((item, i) => visit(item, [...path, String(i + 1)]));
      return;
    }

    if (value !== null && typeof value === "object") {
      const entries = Object.entries(value);
      if (entries.length === 0) {
        fields.push({ label: path.join(" › "), value: "none" });
        return;
      }
      for (const [key, child] of entries) {
        visit(child, [...path, humanizeKey(key)]);
      }
      return;
    }

    fields.push({ label: path.join(" › "), value: formatValue(value) });
  };

  for (const [key, value] of Object.entries(result)) {
    visit(value, [humanizeKey(key)]);
  }

  return fields;
}

function num(result: HandlerResult, key: string): number | null {
  const value = result[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function str(result: HandlerResult, key: string): string | null {
  const value = result[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

/**
 * One-line summary picked from the fields a result carries.
 * Unrecognised shapes get DEFAULT_HEADLINE.
 */
export function headline(result: HandlerResult, query: string): string {
  const name = str(result, "company") ?? str(result, "name") ?? query;

  const price = num(result, "price");
  if (price !== null) {
    const change = num(result, "change_percent");
    const changeText = change === null ? "" : ` (${change >= 0 ? "+" : ""}${change.toFixed(2)}% today)`;
    return `${name} is trading at ${rupees(price)}${changeText}.`;
  }

  const dividendYield = num(result, "dividend_yield");
  if (dividendYield !== null) {
    return `${name} has a dividend yield of ${formatNumber(dividendYield)}%.`;
  }

  const pe = num(result, "pe_ratio");
  if (pe !== null) {
    return `${name} has a P/E ratio of ${formatNumber(pe)}.`;
  }

  const maturity = num(result, "maturity_amount");
  if (maturity !== null) {
    return `Your SIP could grow to ${rupees(maturity)}.`;
  }

  const emi = num(result, "monthly_emi");
  if (emi !== null) {
    return `Your monthly EMI would be ${rupees(emi)}.`;
  }

  const corpus = num(result, "corpus_needed");
  if (corpus !== null) {
    return `You need a retirement corpus of ${rupees(corpus)}.`;
  }

  const nav = num(result, "nav");
  if (nav !== null) {
    return `${name} has a current NAV of ${rupees(nav)}.`;
  }

  const funds = result["funds"];
  if (Array.isArray(funds) && funds.length > 0) {
    const category = str(result, "category");
    return `Here are ${funds.length} top ${category ? `${category} ` : ""}funds.`;
  }

  return DEFAULT_HEADLINE;
}

/**
 * Direct-state fallback: headline plus every field of the result.
 */
export function templateAnswer(result: HandlerResult, query: string): string {
  const lines = flattenResult(result).map((f) => `• ${f.label}: ${f.value}`);
  const head = headline(result, query);
  return lines.length > 0 ? `${head}\n\n${lines.join("\n")}` : head;
}

/** Fixed apology when the handler behind `intent` failed */
export function handlerUnavailableAnswer(intent: string): string {
  return `I couldn't fetch the data for your ${humanizeKey(intent).toLowerCase()} request right now. Please try again shortly.`;
}

/** Grounded-state fallback: the top chunk, unmodified */
export function verbatimChunkAnswer(text: string): string {
  return text;
}
