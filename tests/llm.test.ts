// ============================================
// LLM client and action detection tests
// ============================================

import { describe, it, expect, vi } from "vitest";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions.js";
import {
  MAX_CONTEXT_CHARS,
  OpenAIGenerationBackend,
  parseJsonResponse,
} from "../src/llm/client.js";
import { ModelActionDetector } from "../src/llm/extractAction.js";
import { CHAT_SYSTEM_PROMPT, JSON_SYSTEM_PROMPT } from "../src/llm/prompts.js";
import { DEFAULT_RULES } from "../src/router/rules.js";
import { createQuery } from "../src/types/index.js";
import { FailingGenerator, ScriptedGenerator } from "./helpers/fakes.js";

function fakeClient(reply: string | null | Error) {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => {
    if (reply instanceof Error) throw reply;
    return { choices: [{ message: { content: reply } }] };
  });
  return { client: { chat: { completions: { create } } }, create };
}

describe("parseJsonResponse", () => {
  it("parses bare JSON", () => {
    expect(parseJsonResponse('{"action":"none"}')).toEqual({ action: "none" });
  });

  it("parses a fenced block", () => {
    expect(parseJsonResponse('```json\n{"action":"none"}\n```')).toEqual({ action: "none" });
  });

  it("parses the first object inside prose", () => {
    expect(parseJsonResponse('Sure! {"action":"none"} Hope that helps.')).toEqual({ action: "none" });
  });

  it("returns null for text without JSON", () => {
    expect(parseJsonResponse("I cannot help with that")).toBeNull();
  });
});

describe("OpenAIGenerationBackend", () => {
  it("sends context before the prompt in text mode", async () => {
    const { client, create } = fakeClient("  The answer.  ");
    const backend = new OpenAIGenerationBackend(client, "test-model");

    const text = await backend.generate({ prompt: "Question: x", context: "ctx" });

    expect(text).toBe("The answer.");
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: CHAT_SYSTEM_PROMPT },
        { role: "user", content: "Context:\nctx\n\nQuestion: x" },
      ],
      temperature: 0.4,
      max_tokens: 500,
    });
  });

  it("asks for a JSON object in json mode", async () => {
    const { client, create } = fakeClient('{"action":"none"}');
    const backend = new OpenAIGenerationBackend(client, "test-model");

    await backend.generate({ prompt: "p", mode: "json" });

    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: JSON_SYSTEM_PROMPT },
        { role: "user", content: "p" },
      ],
      temperature: 0.3,
      max_tokens: 300,
      response_format: { type: "json_object" },
    });
  });

  it("truncates long context", async () => {
    const { client, create } = fakeClient("ok");
    const backend = new OpenAIGenerationBackend(client, "test-model");

    await backend.generate({ prompt: "p", context: "a".repeat(MAX_CONTEXT_CHARS + 500), maxTokens: 50 });

    const body = create.mock.calls[0]?.[0];
    expect(body?.messages[1]).toEqual({ role: "user", content: `Context:\n${"a".repeat(MAX_CONTEXT_CHARS)}\n\np` });
    expect(body?.max_tokens).toBe(50);
  });

  it("rejects with GENERATION_UNAVAILABLE when the call fails", async () => {
    const { client } = fakeClient(new Error("connect ECONNREFUSED"));
    const backend = new OpenAIGenerationBackend(client, "test-model");

    await expect(backend.generate({ prompt: "p" })).rejects.toMatchObject({ code: "GENERATION_UNAVAILABLE" });
  });

  it.each([null, "   "])("rejects when the content is %j", async (content) => {
    const { client } = fakeClient(content);
    const backend = new OpenAIGenerationBackend(client, "test-model");

    await expect(backend.generate({ prompt: "p" })).rejects.toMatchObject({ code: "GENERATION_UNAVAILABLE" });
  });
});

describe("ModelActionDetector", () => {
  const query = createQuery("put 2000 monthly into a plan", "user-1");

  it("returns a model decision for a known action", async () => {
    const generator = new ScriptedGenerator(
      () => '```json\n{"action":"sip_calculator","parameters":{"monthlyAmount":2000,"years":10}}\n```'
    );
    const decision = await new ModelActionDetector(generator, DEFAULT_RULES).detect(query);

    expect(decision).toEqual({
      intent: "sip_calculator",
      params: { monthlyAmount: 2000, years: 10 },
      rank: null,
      source: "model",
    });
    expect(decision && Object.isFrozen(decision.params)).toBe(true);
  });

  it("asks in json mode with every intent listed", async () => {
    const generator = new ScriptedGenerator(() => '{"action":"none"}');
    await new ModelActionDetector(generator, DEFAULT_RULES).detect(query);

    const [request] = generator.requests;
    expect(request?.mode).toBe("json");
    expect(request?.maxTokens).toBe(300);
    expect(request?.prompt).toContain("- sip_calculator: Maturity value of a monthly SIP");
    expect(request?.prompt).toContain("Question: put 2000 monthly into a plan");
  });

  it.each([
    ['{"action":"none","parameters":{}}', "no action"],
    ['{"action":"crypto_price","parameters":{}}', "an unknown action"],
    ['{"action":"sip_calculator","parameters":{"plan":{"years":10}}}', "nested parameters"],
    ["I am not sure", "text without JSON"],
  ])("returns null for %s (%s)", async (reply) => {
    const generator = new ScriptedGenerator(() => reply);
    expect(await new ModelActionDetector(generator, DEFAULT_RULES).detect(query)).toBeNull();
  });

  it("returns null when generation fails", async () => {
    expect(await new ModelActionDetector(new FailingGenerator(), DEFAULT_RULES).detect(query)).toBeNull();
  });
});
