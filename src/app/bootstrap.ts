// ============================================
// Bootstrap — build the Orchestrator from config
// ============================================

import OpenAI from "openai";
import type { AppConfig } from "../config/env.js";
import { createHttpHandlers } from "../handlers/httpHandler.js";
import type { HandlerRegistry, HandlerResult } from "../handlers/types.js";
import { CorpusIndex } from "../indexer/corpusIndex.js";
import { directorySource, type DocumentSource } from "../indexer/documentSource.js";
import { chunkDocuments } from "../indexer/chunker.js";
import { loadIndex } from "../indexer/store.js";
import { hasCode } from "../lib/errors.js";
import { HandlerCache } from "../lib/handlerCache.js";
import { logger } from "../lib/logger.js";
import { OpenAIGenerationBackend, type GenerationBackend } from "../llm/client.js";
import { ModelActionDetector } from "../llm/extractAction.js";
import { OpenAIEmbeddingBackend, type EmbeddingBackend } from "../retrieval/embeddings.js";
import { RetrievalEngine, type Corpus } from "../retrieval/retrieve.js";
import { createIntentRouter } from "../router/routeQuery.js";
import { DEFAULT_RULES } from "../router/rules.js";
import type { DetectionRule } from "../router/types.js";
import { Orchestrator } from "./orchestrator.js";

/** Overrides for tests and scripts; anything omitted is built from config */
export interface AssistantOverrides {
  rules?: readonly DetectionRule[];
  handlers?: HandlerRegistry;
  embedder?: EmbeddingBackend | null;
  generator?: GenerationBackend;
  documents?: DocumentSource;
  now?: () => number;
}

export interface Assistant {
  orchestrator: Orchestrator;
  retrieval: RetrievalEngine;
  /** Rebuild the corpus from the document source and swap it in */
  reloadCorpus(): Promise<Corpus["kind"] | "none">;
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL,
    timeout: config.llm.timeoutMs,
    maxRetries: 1,
  });
}

/**
 * Build a corpus from documents.
 * When embedding fails the chunks are still served, ranked lexically.
 */
export async function buildCorpus(
  source: DocumentSource,
  embedder: EmbeddingBackend | null,
  config: AppConfig
): Promise<Corpus> {
  const documents = await source.load();
  const options = { chunkSize: config.corpus.chunkSize, chunkOverlap: config.corpus.chunkOverlap };

  if (embedder) {
    try {
      return { kind: "semantic", index: await CorpusIndex.build(documents, embedder, options) };
    } catch (err) {
      if (!hasCode(err, "EMBEDDING_UNAVAILABLE")) throw err;
      logger.warn("Embedding unavailable at build time, serving lexical corpus", {
        stage: "index",
        errorMessage: err.message,
      });
    }
  }

  return { kind: "lexical", chunks: chunkDocuments(documents, options) };
}

/**
 * Snapshot at INDEX_PATH when present, otherwise built from DOCS_DIR.
 * An unreadable snapshot is logged and rebuilt rather than failing startup.
 */
async function loadCorpus(
  source: DocumentSource,
  embedder: EmbeddingBackend | null,
  config: AppConfig
): Promise<Corpus> {
  try {
    const index = await loadIndex(config.corpus.indexPath);
    if (index) return { kind: "semantic", index };
  } catch (err) {
    if (!hasCode(err, "INDEX_INVALID")) throw err;
    logger.warn("Index snapshot unusable, rebuilding from documents", {
      stage: "index",
      errorMessage: err.message,
    });
  }

  return buildCorpus(source, embedder, config);
}

/**
 * Wire every component. Throws CONFIG_ERROR for an invalid rule table
 * or a rule intent without a handler.
 */
export async function createAssistant(config: AppConfig, overrides: AssistantOverrides = {}): Promise<Assistant> {
  const router = createIntentRouter(overrides.rules ?? DEFAULT_RULES);

  let client: OpenAI | null = null;
  const openai = (): OpenAI => {
    if (!client) client = createOpenAIClient(config);
    return client;
  };

  const embedder =
    overrides.embedder !== undefined
      ? overrides.embedder
      : new OpenAIEmbeddingBackend(openai(), config.llm.embeddingModel);
  const generator = overrides.generator ?? new OpenAIGenerationBackend(openai(), config.llm.generationModel);

  const handlers =
    overrides.handlers ??
    createHttpHandlers(
      router.rules.map((r) => r.intent),
      { baseUrl: config.handlers.baseUrl, timeoutMs: config.handlers.timeoutMs }
    );

  const retrieval = new RetrievalEngine(embedder, null);

  // Handler coverage is checked before the corpus loads.
  const orchestrator = new Orchestrator({
    router,
    handlers,
    retrieval,
    generator,
    cache: new HandlerCache<HandlerResult>({ ttlMs: config.handlers.cacheTtlMs, now: overrides.now }),
    topK: config.corpus.topK,
    actionDetector: config.llm.actionDetection ? new ModelActionDetector(generator, router.rules) : null,
  });

  const documents = overrides.documents ?? directorySource(config.corpus.docsDir);
  retrieval.swapCorpus(await loadCorpus(documents, embedder, config));

  logger.info("Assistant ready", {
    stage: "startup",
    rules: router.rules.length,
    handlers: handlers.size,
    corpus: retrieval.corpusKind,
    actionDetection: config.llm.actionDetection,
  });

  return {
    orchestrator,
    retrieval,
    async reloadCorpus() {
      retrieval.swapCorpus(await buildCorpus(documents, embedder, config));
      return retrieval.corpusKind;
    },
  };
}
