import type { ChunkingOptions, SourceDocument, TextChunk } from "../types/index.js";

/** Split points, coarsest first. "" means a hard character split. */
const SEPARATORS = ["\n\n", "\n", ". ", " ", ""] as const;

/**
 * Split a document into chunks of at most `chunkSize` characters.
 * Each chunk starts with up to `chunkOverlap` characters carried over
 * from the end of the previous one.
 */
export function splitText(text: string, options: ChunkingOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  if (chunkSize <= 0 || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(`Invalid chunking options: size=${chunkSize}, overlap=${chunkOverlap}`);
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) return [];

  return splitRecursive(trimmed, SEPARATORS, options)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

function splitRecursive(text: string, separators: readonly string[], options: ChunkingOptions): string[] {
  if (text.length <= options.chunkSize) return [text];

  const [separator, ...finer] = separators;
  if (separator === undefined || separator === "") {
    return hardSplit(text, options);
  }
  if (!text.includes(separator)) {
    return splitRecursive(text, finer, options);
  }

  const pieces: string[] = [];
  for (const part of text.split(separator)) {
    if (part.trim().length === 0) continue;
    if (part.length <= options.chunkSize) {
      pieces.push(part);
    } else {
      pieces.push(...splitRecursive(part, finer, options));
    }
  }

  return mergePieces(pieces, separator, options);
}

/**
 * Greedily pack pieces into chunks, keeping a tail of the previous
 * chunk (at most `chunkOverlap` characters) at the start of the next.
 */
function mergePieces(pieces: string[], separator: string, options: ChunkingOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const chunks: string[] = [];
  let window: string[] = [];

  const joinedLength = (parts: string[]): number =>
    parts.reduce((sum, p) => sum + p.length, 0) + separator.length * Math.max(0, parts.length - 1);

  for (const piece of pieces) {
    if (window.length > 0 && joinedLength([...window, piece]) > chunkSize) {
      chunks.push(window.join(separator));

      while (
        window.length > 0 &&
        (joinedLength(window) > chunkOverlap || joinedLength([...window, piece]) > chunkSize)
      ) {
        window = window.slice(1);
      }
    }
    window.push(piece);
  }

  if (window.length > 0) {
    chunks.push(window.join(separator));
  }

  return chunks;
}

function hardSplit(text: string, options: ChunkingOptions): string[] {
  const step = options.chunkSize - options.chunkOverlap;
  const parts: string[] = [];
  for (let start = 0; start < text.length; start += step) {
    parts.push(text.slice(start, start + options.chunkSize));
    if (start + options.chunkSize >= text.length) break;
  }
  return parts;
}

/**
 * Chunk every document, numbering chunks per document from 0.
 * Documents with no text produce no chunks.
 */
export function chunkDocuments(documents: readonly SourceDocument[], options: ChunkingOptions): TextChunk[] {
  const chunks: TextChunk[] = [];

  for (const doc of documents) {
    splitText(doc.text, options).forEach((text, sequence) => {
      chunks.push({ documentId: doc.id, sequence, text });
    });
  }

  return chunks;
}
