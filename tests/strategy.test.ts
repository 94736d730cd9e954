// ============================================
// Strategy Tests — states and fallback tiers
// ============================================

import { describe, it, expect } from "vitest";
import { CONTEXT_SEPARATOR, respond, selectState } from "../src/answer/strategy.js";
import { NO_INFORMATION_MESSAGE, handlerUnavailableAnswer, templateAnswer } from "../src/answer/templates.js";
import { handlerUnavailable } from "../src/lib/errors.js";
import type { RouteDecision } from "../src/router/types.js";
import { createQuery, type RetrievalResult } from "../src/types/index.js";
import { FailingGenerator, ScriptedGenerator } from "./helpers/fakes.js";

const matched: RouteDecision = { intent: "emi_calculator", params: {}, rank: 7, source: "rules" };
const unmatched: RouteDecision = { intent: "unmatched", params: {}, rank: null, source: "rules" };

const retrieval: RetrievalResult = {
  strategy: "semantic",
  matches: [
    { chunk: { documentId: "sip.md", sequence: 0, text: "A SIP invests monthly." }, score: 0.9 },
    { chunk: { documentId: "sip.md", sequence: 1, text: "Step-up SIPs grow yearly." }, score: 0.5 },
  ],
};

const EMI_RESULT = { monthly_emi: 25093, loan_amount: 3000000 };

describe("selectState", () => {
  it("is direct for a matched route", () => {
    expect(selectState(matched, null)).toBe("direct");
  });

  it("is grounded when retrieval found chunks", () => {
    expect(selectState(unmatched, retrieval)).toBe("grounded");
  });

  it("is ungrounded when retrieval found nothing", () => {
    expect(selectState(unmatched, { matches: [], strategy: "none" })).toBe("ungrounded");
    expect(selectState(unmatched, null)).toBe("ungrounded");
  });
});

describe("respond — direct", () => {
  const query = createQuery("emi for 30 lakh", "u");

  it("summarizes the handler result with the generator", async () => {
    const generator = new ScriptedGenerator(() => "  Your EMI is ₹25,093.  ");
    const outcome = await respond(
      { state: "direct", query, intent: "emi_calculator", handler: { ok: true, result: EMI_RESULT } },
      generator
    );

    expect(outcome).toEqual({ text: "Your EMI is ₹25,093.", state: "direct", fallbacks: [] });
    expect(generator.requests[0]?.mode).toBe("text");
    expect(generator.requests[0]?.maxTokens).toBe(200);
    expect(generator.requests[0]?.prompt).toContain('"monthly_emi": 25093');
  });

  it("uses the template when generation fails", async () => {
    const outcome = await respond(
      { state: "direct", query, intent: "emi_calculator", handler: { ok: true, result: EMI_RESULT } },
      new FailingGenerator()
    );

    expect(outcome).toEqual({
      text: templateAnswer(EMI_RESULT, "emi for 30 lakh"),
      state: "direct",
      fallbacks: ["template"],
    });
  });

  it("uses the template when generation returns blank text", async () => {
    const outcome = await respond(
      { state: "direct", query, intent: "emi_calculator", handler: { ok: true, result: EMI_RESULT } },
      new ScriptedGenerator(() => "   ")
    );

    expect(outcome.fallbacks).toEqual(["template"]);
  });

  it("apologises without generating when the handler failed", async () => {
    const generator = new ScriptedGenerator();
    const outcome = await respond(
      {
        state: "direct",
        query,
        intent: "emi_calculator",
        handler: { ok: false, error: handlerUnavailable("emi_calculator") },
      },
      generator
    );

    expect(outcome).toEqual({
      text: handlerUnavailableAnswer("emi_calculator"),
      state: "direct",
      fallbacks: ["handler_unavailable"],
    });
    expect(generator.requests).toEqual([]);
  });
});

describe("respond — grounded", () => {
  const query = createQuery("What is a SIP?", "u");

  it("passes every retrieved chunk as context", async () => {
    const generator = new ScriptedGenerator();
    const outcome = await respond({ state: "grounded", query, retrieval }, generator);

    expect(outcome).toEqual({ text: "generated answer", state: "grounded", fallbacks: [] });
    expect(generator.requests[0]?.context).toBe(
      `A SIP invests monthly.${CONTEXT_SEPARATOR}Step-up SIPs grow yearly.`
    );
    expect(generator.requests[0]?.prompt).toContain("Question: What is a SIP?");
  });

  it("returns the top chunk verbatim when generation fails", async () => {
    const outcome = await respond({ state: "grounded", query, retrieval }, new FailingGenerator());

    expect(outcome).toEqual({ text: "A SIP invests monthly.", state: "grounded", fallbacks: ["verbatim_chunk"] });
  });
});

describe("respond — ungrounded", () => {
  const query = createQuery("Who won the match?", "u");

  it("answers from the generator alone", async () => {
    const generator = new ScriptedGenerator();
    const outcome = await respond({ state: "ungrounded", query }, generator);

    expect(outcome).toEqual({ text: "generated answer", state: "ungrounded", fallbacks: [] });
    expect(generator.requests[0]?.context).toBeUndefined();
  });

  it("returns the no-information message when generation fails", async () => {
    const outcome = await respond({ state: "ungrounded", query }, new FailingGenerator());

    expect(outcome).toEqual({ text: NO_INFORMATION_MESSAGE, state: "ungrounded", fallbacks: ["no_information"] });
  });
});
