import type { CorpusIndex } from "../indexer/corpusIndex.js";
import { logger, type RequestLogger } from "../lib/logger.js";
import { emptyRetrieval, type RetrievalResult, type TextChunk } from "../types/index.js";
import type { EmbeddingBackend } from "./embeddings.js";
import { LexicalIndex } from "./lexicalSearch.js";

/**
 * What the engine can search.
 * "lexical" is a corpus whose chunks could not be embedded at build time.
 */
export type Corpus =
  | { kind: "semantic"; index: CorpusIndex }
  | { kind: "lexical"; chunks: readonly TextChunk[] };

/** Corpus plus its token index, swapped as one reference */
type ServingCorpus = {
  corpus: Corpus;
  lexical: LexicalIndex;
};

function prepare(corpus: Corpus | null): ServingCorpus | null {
  if (!corpus) return null;
  const chunks = corpus.kind === "semantic" ? corpus.index.chunks() : corpus.chunks;
  return { corpus, lexical: new LexicalIndex(chunks) };
}

/**
 * Retrieval Engine — semantic search with a lexical fallback.
 *
 * retrieve() never rejects:
 * - embedding failure → lexical overlap ranking
 * - no corpus / empty corpus → empty result ("no grounding available")
 */
export class RetrievalEngine {
  private serving: ServingCorpus | null;

  constructor(
    private readonly embedder: EmbeddingBackend | null,
    corpus: Corpus | null
  ) {
    this.serving = prepare(corpus);
  }

  /**
   * Replace the corpus. Queries already running keep the instance they
   * started with; later queries see the new one.
   */
  swapCorpus(next: Corpus | null): void {
    this.serving = prepare(next);
    logger.info("Corpus swapped", {
      stage: "retrieval",
      kind: next?.kind ?? "none",
      chunks: this.serving?.lexical.size ?? 0,
    });
  }

  get corpusKind(): Corpus["kind"] | "none" {
    return this.serving?.corpus.kind ?? "none";
  }

  async retrieve(query: string, k: number, log?: RequestLogger): Promise<RetrievalResult> {
    const serving = this.serving;

    if (!serving || serving.lexical.size === 0) {
      log?.info("No corpus available, skipping retrieval");
      return emptyRetrieval();
    }

    const { corpus, lexical } = serving;

    if (corpus.kind === "semantic" && this.embedder) {
      try {
        const queryEmbedding = await this.embedder.embed(query);
        const matches = corpus.index.search(queryEmbedding, k);

        log?.info("Semantic search complete", {
          found: matches.length,
          topScore: matches[0]?.score.toFixed(3),
        });

        return { matches, strategy: "semantic" };
      } catch (err) {
        log?.warn("Semantic search unavailable, falling back to lexical", {
          errorMessage: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const matches = lexical.search(query, k);

    log?.info("Lexical search complete", {
      found: matches.length,
      topScore: matches[0]?.score,
    });

    return { matches, strategy: "lexical" };
  }
}
