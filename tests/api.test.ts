// ============================================
// API tests — express app on an ephemeral local port
// ============================================

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import type { Server } from "http";
import { createApiRouter } from "../src/api/index.js";
import { createAssistant } from "../src/app/bootstrap.js";
import { PIPELINE_VERSION } from "../src/app/orchestrator.js";
import { buildConfig, loadEnv } from "../src/config/env.js";
import { staticSource } from "../src/indexer/documentSource.js";
import { DEFAULT_RULES } from "../src/router/rules.js";
import { ROUTER_VERSION } from "../src/router/types.js";
import { KeywordEmbedder, ScriptedGenerator, fakeHandler } from "./helpers/fakes.js";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const config = buildConfig(loadEnv({ INDEX_PATH: "data/does-not-exist/index.json" }));
  const assistant = await createAssistant(config, {
    embedder: new KeywordEmbedder(),
    generator: new ScriptedGenerator(),
    handlers: new Map(DEFAULT_RULES.map((r) => [r.intent, fakeHandler({ monthly_emi: 25093 })])),
    documents: staticSource([{ id: "sip.md", text: "A SIP invests a fixed amount every month." }]),
  });

  const app = express();
  app.use("/api/v1", createApiRouter(assistant));

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}/api/v1`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function postQuery(body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${baseUrl}/query`, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

describe("POST /api/v1/query", () => {
  it("answers a matched query", async () => {
    const res = await postQuery({ question: "emi for 30 lakh", userId: "user-1" });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      text: "generated answer",
      intent: "emi_calculator",
      state: "direct",
      source: "rules",
      fallbackUsed: false,
    });
  });

  it("answers a knowledge question from the corpus", async () => {
    const res = await postQuery({ question: "What is a SIP?" });
    const body: unknown = await res.json();

    expect(body).toMatchObject({ state: "grounded", sources: ["sip.md"] });
  });

  it("rejects an empty question", async () => {
    const res = await postQuery({ question: "   " });
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toEqual({
      error: "API_VALIDATION_ERROR",
      message: "Invalid request body",
      details: [{ field: "question", message: "Question cannot be empty" }],
    });
  });

  it("answers a malformed body with a JSON error", async () => {
    const res = await fetch(`${baseUrl}/query`, {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Request-Id": "req-9" },
      body: '{"question": "What is a SIP?"',
    });
    const body: unknown = await res.json();

    expect(res.status).toBe(400);
    expect(body).toEqual({
      error: "API_VALIDATION_ERROR",
      message: "Request body is not valid JSON",
      requestId: "req-9",
    });
  });

  it("echoes the caller's request id", async () => {
    const res = await postQuery({ question: "What is a SIP?" }, { "X-Request-Id": "req-123" });
    expect(res.headers.get("x-request-id")).toBe("req-123");
  });
});

describe("GET /api/v1/health", () => {
  it("reports the corpus and versions", async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      corpus: "semantic",
      routerVersion: ROUTER_VERSION,
      pipelineVersion: PIPELINE_VERSION,
    });
  });
});
