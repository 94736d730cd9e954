// ============================================
// Retrieval Engine Tests — semantic, lexical fallback, empty corpus
// ============================================

import { describe, it, expect } from "vitest";
import { CorpusIndex } from "../src/indexer/corpusIndex.js";
import { chunkDocuments } from "../src/indexer/chunker.js";
import { RetrievalEngine } from "../src/retrieval/retrieve.js";
import { FailingEmbedder, KeywordEmbedder } from "./helpers/fakes.js";

const OPTIONS = { chunkSize: 400, chunkOverlap: 50 };

const DOCS = [
  { id: "emi.md", text: "An EMI repays a loan every month." },
  { id: "sip.md", text: "A SIP invests a fixed amount every month in a mutual fund." },
];

async function semanticCorpus() {
  return { kind: "semantic" as const, index: await CorpusIndex.build(DOCS, new KeywordEmbedder(), OPTIONS) };
}

describe("RetrievalEngine", () => {
  it("uses semantic search when embeddings work", async () => {
    const engine = new RetrievalEngine(new KeywordEmbedder(), await semanticCorpus());
    const result = await engine.retrieve("explain sip", 1);

    expect(result.strategy).toBe("semantic");
    expect(result.matches.map((m) => m.chunk.documentId)).toEqual(["sip.md"]);
  });

  it("falls back to lexical ranking when query embedding fails", async () => {
    const engine = new RetrievalEngine(new FailingEmbedder(), await semanticCorpus());
    const result = await engine.retrieve("how does a sip in a mutual fund work", 2);

    expect(result.strategy).toBe("lexical");
    expect(result.matches.map((m) => m.chunk.documentId)).toEqual(["sip.md", "emi.md"]);
  });

  it("serves a lexical-only corpus without calling the embedder", async () => {
    const embedder = new KeywordEmbedder();
    const engine = new RetrievalEngine(embedder, { kind: "lexical", chunks: chunkDocuments(DOCS, OPTIONS) });
    const result = await engine.retrieve("loan", 3);

    expect(result.strategy).toBe("lexical");
    expect(result.matches.map((m) => m.chunk.documentId)).toEqual(["emi.md"]);
    expect(embedder.embedCalls).toEqual([]);
  });

  it("returns an empty result without a corpus", async () => {
    const engine = new RetrievalEngine(new KeywordEmbedder(), null);
    expect(await engine.retrieve("sip", 3)).toEqual({ matches: [], strategy: "none" });
    expect(engine.corpusKind).toBe("none");
  });

  it("returns an empty result for an empty corpus", async () => {
    const engine = new RetrievalEngine(new KeywordEmbedder(), { kind: "lexical", chunks: [] });
    expect(await engine.retrieve("sip", 3)).toEqual({ matches: [], strategy: "none" });
  });

  it("serves the new corpus after a swap", async () => {
    const engine = new RetrievalEngine(new KeywordEmbedder(), null);
    engine.swapCorpus(await semanticCorpus());

    expect(engine.corpusKind).toBe("semantic");
    expect((await engine.retrieve("emi", 1)).matches[0]?.chunk.documentId).toBe("emi.md");
  });
});
