// ============================================
// Corpus Index — immutable chunk embeddings, brute-force cosine search
// ============================================

import { embeddingUnavailable, indexInvalid } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { EmbeddingBackend } from "../retrieval/embeddings.js";
import { compareChunkOrder, cosineSimilarity, topK } from "../retrieval/similarity.js";
import type {
  ChunkingOptions,
  DocumentChunk,
  Embedding,
  RetrievedChunk,
  SourceDocument,
  TextChunk,
} from "../types/index.js";
import { chunkDocuments } from "./chunker.js";

export const INDEX_SNAPSHOT_VERSION = 1;

/** Serialized form written to disk */
export interface IndexSnapshot {
  version: typeof INDEX_SNAPSHOT_VERSION;
  dimensions: number;
  builtAt: string;
  chunks: Array<{
    documentId: string;
    sequence: number;
    text: string;
    embedding: number[];
  }>;
}

export interface BuildOptions extends ChunkingOptions {
  /** Texts per embedding request */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 64;

/**
 * Embed chunks in batches, falling back to one call per chunk when
 * the backend has no batch form.
 */
async function embedAll(chunks: TextChunk[], embedder: EmbeddingBackend, batchSize: number): Promise<Embedding[]> {
  const vectors: Embedding[] = [];

  for (let i = 0; i < chunks.length; i += batchSize) {
    const texts = chunks.slice(i, i + batchSize).map((c) => c.text);
    if (embedder.embedBatch) {
      vectors.push(...(await embedder.embedBatch(texts)));
    } else {
      for (const text of texts) {
        vectors.push(await embedder.embed(text));
      }
    }
  }

  return vectors;
}

/**
 * Read-only after construction; safe to share between concurrent queries.
 * Rebuilding produces a new instance: swap the reference, never mutate.
 */
export class CorpusIndex {
  private readonly entries: readonly DocumentChunk[];

  private constructor(entries: DocumentChunk[], readonly dimensions: number) {
    this.entries = Object.freeze(
      [...entries].sort(compareChunkOrder).map((entry) =>
        Object.freeze({ ...entry, embedding: Object.freeze([...entry.embedding]) })
      )
    );
  }

  /** Assemble an index from embedded chunks, checking they share one dimensionality */
  static fromChunks(chunks: DocumentChunk[]): CorpusIndex {
    const first = chunks[0];
    const dimensions = first ? first.embedding.length : 0;

    if (first && dimensions === 0) {
      throw indexInvalid("Chunk embeddings are empty");
    }

    const seen = new Set<string>();
    for (const chunk of chunks) {
      if (chunk.embedding.length !== dimensions) {
        throw indexInvalid("Chunk embeddings have mixed dimensions", {
          documentId: chunk.documentId,
          sequence: chunk.sequence,
          expected: dimensions,
          actual: chunk.embedding.length,
        });
      }
      const key = `${chunk.documentId}#${chunk.sequence}`;
      if (seen.has(key)) {
        throw indexInvalid(`Duplicate chunk ${key}`);
      }
      seen.add(key);
    }

    return new CorpusIndex(chunks, dimensions);
  }

  /**
   * Chunk and embed a document set.
   * Rejects with EMBEDDING_UNAVAILABLE if the backend fails; callers
   * decide whether to serve a lexical-only corpus instead.
   */
  static async build(
    documents: readonly SourceDocument[],
    embedder: EmbeddingBackend,
    options: BuildOptions
  ): Promise<CorpusIndex> {
    const startTime = Date.now();
    const textChunks = chunkDocuments(documents, options);
    const vectors = await embedAll(textChunks, embedder, options.batchSize ?? DEFAULT_BATCH_SIZE);

    if (vectors.length !== textChunks.length) {
      throw embeddingUnavailable(`Expected ${textChunks.length} embeddings, got ${vectors.length}`);
    }

    const chunks: DocumentChunk[] = textChunks.map((chunk, i) => ({
      ...chunk,
      embedding: vectors[i] ?? [],
    }));

    const index = CorpusIndex.fromChunks(chunks);

    logger.info("Corpus index built", {
      stage: "index",
      documents: documents.length,
      chunks: index.size,
      dimensions: index.dimensions,
      durationMs: Date.now() - startTime,
    });

    return index;
  }

  static fromSnapshot(snapshot: IndexSnapshot): CorpusIndex {
    const index = CorpusIndex.fromChunks(snapshot.chunks);
    if (index.size > 0 && index.dimensions !== snapshot.dimensions) {
      throw indexInvalid("Snapshot dimensions do not match its chunks", {
        declared: snapshot.dimensions,
        actual: index.dimensions,
      });
    }
    return index;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Chunks in corpus order */
  chunks(): readonly DocumentChunk[] {
    return this.entries;
  }

  /**
   * k nearest chunks by cosine similarity.
   * A query vector of the wrong dimension means the embedding backend
   * changed under us; treat it as the backend being unavailable.
   */
  search(queryEmbedding: Embedding, k: number): RetrievedChunk[] {
    if (k <= 0 || this.entries.length === 0) return [];

    if (queryEmbedding.length !== this.dimensions) {
      throw embeddingUnavailable(
        `Query embedding has ${queryEmbedding.length} dimensions, index has ${this.dimensions}`
      );
    }

    const scored = this.entries.map((entry) => ({
      chunk: entry,
      score: cosineSimilarity(queryEmbedding, entry.embedding),
    }));

    return topK(scored, k);
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: INDEX_SNAPSHOT_VERSION,
      dimensions: this.dimensions,
      builtAt: new Date().toISOString(),
      chunks: this.entries.map((entry) => ({
        documentId: entry.documentId,
        sequence: entry.sequence,
        text: entry.text,
        embedding: [...entry.embedding],
      })),
    };
  }
}
