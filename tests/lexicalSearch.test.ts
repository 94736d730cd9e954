// ============================================
// Lexical Search Tests — keyword-overlap fallback
// ============================================

import { describe, it, expect } from "vitest";
import { LexicalIndex, overlapScore, tokenize } from "../src/retrieval/lexicalSearch.js";
import type { TextChunk } from "../src/types/index.js";

const CHUNKS: TextChunk[] = [
  { documentId: "emi.md", sequence: 0, text: "An EMI repays a loan every month." },
  { documentId: "sip.md", sequence: 0, text: "A SIP invests a fixed amount every month in a mutual fund." },
  { documentId: "tax.md", sequence: 0, text: "Section 80C allows a deduction of 1.5 lakh." },
];

describe("tokenize", () => {
  it("lower-cases and splits on non-alphanumerics", () => {
    expect([...tokenize("SIP, EMI & 80C!")]).toEqual(["sip", "emi", "80c"]);
  });
});

describe("overlapScore", () => {
  it("counts distinct shared tokens", () => {
    expect(overlapScore(tokenize("sip sip month"), tokenize("monthly sip"))).toBe(1);
  });
});

describe("LexicalIndex.search", () => {
  const index = new LexicalIndex(CHUNKS);

  it("ranks the chunk sharing the most tokens first", () => {
    const matches = index.search("how does a SIP in a mutual fund work", 3);

    expect(matches.map((m) => m.chunk.documentId)).toEqual(["sip.md", "emi.md", "tax.md"]);
    expect(matches.map((m) => m.score)).toEqual([5, 1, 1]);
  });

  it("drops chunks sharing no token", () => {
    expect(index.search("80c deduction", 3).map((m) => m.chunk.documentId)).toEqual(["tax.md"]);
  });

  it("returns nothing for a query with no tokens", () => {
    expect(index.search("?!", 3)).toEqual([]);
  });

  it("respects k", () => {
    expect(index.search("every month", 1)).toHaveLength(1);
  });
});
