// ============================================
// Embeddings — backend contract + OpenAI implementation
// ============================================

import type OpenAI from "openai";
import { embeddingUnavailable } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Embedding } from "../types/index.js";

/**
 * Embedding capability.
 * Implementations reject with EMBEDDING_UNAVAILABLE when the model
 * cannot be reached.
 */
export interface EmbeddingBackend {
  embed(text: string): Promise<Embedding>;
  /** Optional batch form used when building the index */
  embedBatch?(texts: string[]): Promise<Embedding[]>;
}

/** Input limit per text */
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbeddingBackend implements EmbeddingBackend {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async embed(text: string): Promise<Embedding> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw embeddingUnavailable("No embedding returned");
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
      });

      if (response.data.length !== texts.length) {
        throw new Error(`Expected ${texts.length} embeddings, got ${response.data.length}`);
      }

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        model: this.model,
        textCount: texts.length,
        error: err,
      });
      throw embeddingUnavailable("Embedding backend unavailable", err);
    }
  }
}
