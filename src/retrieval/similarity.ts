import type { Embedding, RetrievedChunk, TextChunk } from "../types/index.js";

/**
 * Cosine similarity in [-1, 1].
 * Zero vectors have no direction; they score 0 against everything.
 */
export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new RangeError(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Clamp float drift
  return Math.max(-1, Math.min(1, score));
}

/** Corpus order: document id, then sequence within the document */
export function compareChunkOrder(a: TextChunk, b: TextChunk): number {
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

/** Descending score, ties broken by corpus order */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  return compareChunkOrder(a.chunk, b.chunk);
}

/** Top k by score with the deterministic tie-break; never longer than k */
export function topK(scored: RetrievedChunk[], k: number): RetrievedChunk[] {
  if (k <= 0) return [];
  return [...scored].sort(compareRetrieved).slice(0, k);
}
