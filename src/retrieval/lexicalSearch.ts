import type { RetrievedChunk, TextChunk } from "../types/index.js";
import { topK } from "./similarity.js";

// ============================================
// Lexical search
// Keyword-overlap ranking used when embeddings are unavailable
// ============================================

/** Distinct lower-cased alphanumeric tokens */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z0-9]+/g) ?? []);
}

/** Number of distinct query tokens present in the chunk */
export function overlapScore(queryTokens: Set<string>, chunkTokens: Set<string>): number {
  let shared = 0;
  for (const token of queryTokens) {
    if (chunkTokens.has(token)) shared++;
  }
  return shared;
}

/**
 * Pre-tokenized chunk set.
 * Built once per corpus so each query only tokenizes itself.
 */
export class LexicalIndex {
  private readonly entries: ReadonlyArray<{ chunk: TextChunk; tokens: Set<string> }>;

  constructor(chunks: readonly TextChunk[]) {
    this.entries = chunks.map((chunk) => ({ chunk, tokens: tokenize(chunk.text) }));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Top k chunks by shared-token count.
   * Chunks sharing no token are left out; ties follow corpus order.
   */
  search(query: string, k: number): RetrievedChunk[] {
    const queryTokens = tokenize(query);
    if (queryTokens.size === 0 || k <= 0) return [];

    const scored: RetrievedChunk[] = [];
    for (const { chunk, tokens } of this.entries) {
      const score = overlapScore(queryTokens, tokens);
      if (score > 0) scored.push({ chunk, score });
    }

    return topK(scored, k);
  }
}
