// ============================================
// Chunker Tests — Document Chunking Logic
// ============================================

import { describe, it, expect } from "vitest";
import { chunkDocuments, splitText } from "../src/indexer/chunker.js";

// ============================================
// splitText()
// ============================================

describe("splitText", () => {
  it("returns a short text as a single chunk", () => {
    expect(splitText("  SIP basics  ", { chunkSize: 100, chunkOverlap: 10 })).toEqual(["SIP basics"]);
  });

  it("returns nothing for blank text", () => {
    expect(splitText(" \n\n ", { chunkSize: 100, chunkOverlap: 10 })).toEqual([]);
  });

  it("overlaps consecutive chunks on word boundaries", () => {
    expect(splitText("aaa bbb ccc ddd", { chunkSize: 7, chunkOverlap: 3 })).toEqual([
      "aaa bbb",
      "bbb ccc",
      "ccc ddd",
    ]);
  });

  it("prefers paragraph boundaries", () => {
    const text = "First paragraph here.\n\nSecond paragraph here.";
    expect(splitText(text, { chunkSize: 25, chunkOverlap: 0 })).toEqual([
      "First paragraph here.",
      "Second paragraph here.",
    ]);
  });

  it("hard-splits text with no separators", () => {
    expect(splitText("abcdefghij", { chunkSize: 4, chunkOverlap: 1 })).toEqual(["abcd", "defg", "ghij"]);
  });

  it("never produces a chunk longer than chunkSize", () => {
    const text = "Equity funds invest in shares. ".repeat(40);
    const chunks = splitText(text, { chunkSize: 80, chunkOverlap: 20 });
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(80);
    }
  });

  it("rejects an overlap that is not smaller than the size", () => {
    expect(() => splitText("text", { chunkSize: 10, chunkOverlap: 10 })).toThrow(RangeError);
  });
});

// ============================================
// chunkDocuments()
// ============================================

describe("chunkDocuments", () => {
  it("numbers chunks per document from 0", () => {
    const chunks = chunkDocuments(
      [
        { id: "a.md", text: "aaa bbb ccc ddd" },
        { id: "empty.md", text: "   " },
        { id: "b.md", text: "short" },
      ],
      { chunkSize: 7, chunkOverlap: 3 }
    );

    expect(chunks).toEqual([
      { documentId: "a.md", sequence: 0, text: "aaa bbb" },
      { documentId: "a.md", sequence: 1, text: "bbb ccc" },
      { documentId: "a.md", sequence: 2, text: "ccc ddd" },
      { documentId: "b.md", sequence: 0, text: "short" },
    ]);
  });
});
