// ============================================
// LLM Client — generation backend contract + OpenAI implementation
// ============================================

import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions.js";
import { generationUnavailable } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { CHAT_SYSTEM_PROMPT, JSON_SYSTEM_PROMPT } from "./prompts.js";

export type GenerationMode = "text" | "json";

export interface GenerationRequest {
  prompt: string;
  /** Supporting text placed before the prompt */
  context?: string;
  /** "json" asks for a single JSON object (machine-parsable extraction) */
  mode?: GenerationMode;
  maxTokens?: number;
}

/**
 * Generation capability.
 * Implementations reject with GENERATION_UNAVAILABLE on any failure,
 * timeouts included.
 */
export interface GenerationBackend {
  generate(request: GenerationRequest): Promise<string>;
}

/** Token budgets per use */
export const MAX_TOKENS = {
  json: 300,
  summary: 200,
  conversation: 500,
} as const;

const TEMPERATURE: Record<GenerationMode, number> = {
  json: 0.3,
  text: 0.4,
};

/** Context is trimmed so small local models stay inside their window */
export const MAX_CONTEXT_CHARS = 2000;

/** The part of the OpenAI client the backend calls */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class OpenAIGenerationBackend implements GenerationBackend {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    const mode = request.mode ?? "text";
    const maxTokens = request.maxTokens ?? (mode === "json" ? MAX_TOKENS.json : MAX_TOKENS.conversation);

    const userMessage = request.context
      ? `Context:\n${request.context.slice(0, MAX_CONTEXT_CHARS)}\n\n${request.prompt}`
      : request.prompt;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: mode === "json" ? JSON_SYSTEM_PROMPT : CHAT_SYSTEM_PROMPT },
          { role: "user", content: userMessage },
        ],
        temperature: TEMPERATURE[mode],
        max_tokens: maxTokens,
        ...(mode === "json" && { response_format: { type: "json_object" as const } }),
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        mode,
        error: err,
      });
      throw generationUnavailable("Generation backend unavailable", err);
    }

    const text = content?.trim() ?? "";
    if (text.length === 0) {
      throw generationUnavailable("Generation backend returned no content");
    }

    logger.debug("LLM response", {
      stage: "llm",
      model: this.model,
      mode,
      chars: text.length,
    });

    return text;
  }
}

/**
 * Parse JSON from an LLM response.
 * Accepts bare JSON, fenced ```json blocks, or the first {...} in the text.
 * Returns null when none of them parse; callers validate the shape.
 */
export function parseJsonResponse(response: string): unknown {
  const candidates: string[] = [response.trim()];

  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) candidates.push(fenced[1].trim());

  const braced = response.match(/\{[\s\S]*\}/);
  if (braced) candidates.push(braced[0]);

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      // try the next shape
    }
  }

  logger.warn("Failed to parse LLM JSON response", {
    stage: "llm",
    responsePreview: response.slice(0, 100),
  });
  return null;
}
