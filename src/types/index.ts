// ============================================
// Core domain types
// ============================================

/** A user query, normalized once on entry */
export interface Query {
  readonly raw: string;
  /** Lower-cased, trimmed, whitespace runs collapsed */
  readonly normalized: string;
  readonly userId: string;
}

/** Normalize query text for matching and cache keys */
export function normalizeQueryText(text: string): string {
  return text.toLowerCase().trim().replace(/\s+/g, " ");
}

export function createQuery(text: string, userId: string): Query {
  return Object.freeze({
    raw: text,
    normalized: normalizeQueryText(text),
    userId,
  });
}

/** A document as supplied by a DocumentSource */
export interface SourceDocument {
  id: string;
  text: string;
}

/** A chunk of a source document, before embedding */
export interface TextChunk {
  readonly documentId: string;
  /** Position of the chunk within its document, from 0 */
  readonly sequence: number;
  readonly text: string;
}

export type Embedding = readonly number[];

/** A chunk owned by the corpus index */
export interface DocumentChunk extends TextChunk {
  readonly embedding: Embedding;
}

/** A scored chunk in a retrieval result */
export interface RetrievedChunk {
  chunk: TextChunk;
  score: number;
}

/** Which path produced a retrieval result */
export type RetrievalStrategy = "semantic" | "lexical" | "none";

/** Result of retrieval. `matches` is sorted by descending score, ties by chunk order */
export interface RetrievalResult {
  matches: RetrievedChunk[];
  strategy: RetrievalStrategy;
}

/** No grounding available; a valid result, not an error */
export function emptyRetrieval(): RetrievalResult {
  return { matches: [], strategy: "none" };
}

/** Chunking settings shared by the indexer and the build script */
export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
}
