// ============================================
// Public API
// ============================================

export { createAssistant, buildCorpus, createOpenAIClient, type Assistant, type AssistantOverrides } from "./app/bootstrap.js";
export { Orchestrator, PIPELINE_VERSION, type OrchestratorDeps } from "./app/orchestrator.js";
export type { FinalAnswer, AnswerSource } from "./app/types.js";

export { createIntentRouter, validateRuleTable } from "./router/routeQuery.js";
export { DEFAULT_RULES, KNOWLEDGE_QUESTION_SIGNALS } from "./router/rules.js";
export { evaluatePredicate, containsKeyword } from "./router/predicates.js";
export * from "./router/types.js";

export { CorpusIndex, INDEX_SNAPSHOT_VERSION, type IndexSnapshot, type BuildOptions } from "./indexer/corpusIndex.js";
export { splitText, chunkDocuments } from "./indexer/chunker.js";
export { saveIndex, loadIndex } from "./indexer/store.js";
export { directorySource, staticSource, type DocumentSource } from "./indexer/documentSource.js";

export { RetrievalEngine, type Corpus } from "./retrieval/retrieve.js";
export { LexicalIndex } from "./retrieval/lexicalSearch.js";
export { cosineSimilarity } from "./retrieval/similarity.js";
export { OpenAIEmbeddingBackend, type EmbeddingBackend } from "./retrieval/embeddings.js";

export { respond, selectState, type ResponseState, type FallbackTier, type StrategyInput, type StrategyOutcome } from "./answer/strategy.js";
export { templateAnswer, handlerUnavailableAnswer, NO_INFORMATION_MESSAGE } from "./answer/templates.js";

export { OpenAIGenerationBackend, type GenerationBackend, type GenerationRequest } from "./llm/client.js";
export { ModelActionDetector, type ActionDetector } from "./llm/extractAction.js";

export { HttpHandler, createHttpHandlers } from "./handlers/httpHandler.js";
export type { ExternalHandler, HandlerRegistry, HandlerResult, HandlerValue } from "./handlers/types.js";
export { HandlerCache } from "./lib/handlerCache.js";

export { AssistantError, type ErrorCode } from "./lib/errors.js";
export { getConfig, loadEnv, buildConfig, type AppConfig } from "./config/env.js";

export * from "./types/index.js";
