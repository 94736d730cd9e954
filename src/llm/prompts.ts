// ============================================
// LLM Prompts — conversation, summaries, action detection
// ============================================

import type { DetectionRule } from "../router/types.js";

/** System prompt for conversational answers (direct, grounded, ungrounded) */
export const CHAT_SYSTEM_PROMPT = `You are FinChat, a financial assistant for Indian retail investors.

Provide clear, accurate financial information. Consider risk tolerance and time horizon.

Guidelines:
- Be concise (2-4 sentences)
- Use Indian context (₹, lakhs, crores)
- Use only the numbers given to you; never invent figures
- For tax questions, suggest consulting a chartered accountant

Topics: stocks, mutual funds, SIP, EMI, retirement, tax saving, portfolio.`;

/** System prompt for JSON mode */
export const JSON_SYSTEM_PROMPT = `You convert finance questions into a single JSON object.
Output JSON only, on one line, with no markdown.`;

/**
 * Prompt asking for a natural-language summary of a handler result.
 * The serialized data is capped so small models keep the question in view.
 */
export function buildDataSummaryPrompt(query: string, data: unknown): string {
  return `Summarize for: "${query}"

Data: ${JSON.stringify(data, null, 2).slice(0, 1000)}

Requirements:
- Use the exact asset name from the question
- Include the key figures
- 2-3 sentences
- Use ₹ for currency

Summary:`;
}

/** Question answered from retrieved knowledge-base text (passed as context) */
export function buildGroundedPrompt(query: string): string {
  return `Answer the question using the context above. If the context does not cover it, say so briefly.

Question: ${query}`;
}

/** Question answered without any knowledge-base text */
export function buildUngroundedPrompt(query: string): string {
  return `Question: ${query}`;
}

/**
 * Prompt listing every routable intent for model-assisted action detection.
 * Knowledge questions must come back as action "none".
 */
export function buildActionPrompt(query: string, rules: readonly DetectionRule[]): string {
  const actions = rules.map((r) => `- ${r.intent}: ${r.description}`).join("\n");

  return `Decide whether the question asks for one of these actions:
${actions}

Reply with {"action":"<action>","parameters":{...}}.
Copy names exactly as written in the question; don't normalize tickers.
For knowledge questions (what is, explain) or anything else, reply {"action":"none","parameters":{}}.

Question: ${query}`;
}
