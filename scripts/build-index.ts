#!/usr/bin/env npx tsx
// ============================================
// Index Build Script — embed the knowledge base and save a snapshot
// ============================================
// Usage: npm run index:build -- [--docs <dir>] [--out <file>]
//
// Prerequisites:
// - OPENAI_API_KEY (or OPENAI_BASE_URL pointing at a local OpenAI-compatible server)

import "dotenv/config";
import { createOpenAIClient } from "../src/app/bootstrap.js";
import { getConfig } from "../src/config/env.js";
import { CorpusIndex } from "../src/indexer/corpusIndex.js";
import { directorySource } from "../src/indexer/documentSource.js";
import { saveIndex } from "../src/indexer/store.js";
import { OpenAIEmbeddingBackend } from "../src/retrieval/embeddings.js";

function log(emoji: string, message: string) {
  console.log(`${emoji} ${message}`);
}

async function main() {
  const args = process.argv.slice(2);
  const config = getConfig();

  let docsDir = config.corpus.docsDir;
  let outPath = config.corpus.indexPath;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === "--docs" && value) {
      docsDir = value;
      i++;
    } else if (arg === "--out" && value) {
      outPath = value;
      i++;
    } else if (arg === "--help") {
      console.log(`
Usage: npm run index:build -- [options]

Options:
  --docs <dir>    Knowledge base directory (default: DOCS_DIR, ${config.corpus.docsDir})
  --out <file>    Snapshot path (default: INDEX_PATH, ${config.corpus.indexPath})
`);
      process.exit(0);
    }
  }

  console.log("\n========================================");
  console.log("FinChat Knowledge Base Indexer");
  console.log("========================================\n");

  const documents = await directorySource(docsDir).load();
  if (documents.length === 0) {
    log("⚠️", `No .md/.txt documents found in ${docsDir}`);
    process.exit(0);
  }
  log("📄", `Loaded ${documents.length} documents from ${docsDir}`);

  const embedder = new OpenAIEmbeddingBackend(createOpenAIClient(config), config.llm.embeddingModel);

  log("🔄", `Embedding with ${config.llm.embeddingModel}...`);
  const index = await CorpusIndex.build(documents, embedder, {
    chunkSize: config.corpus.chunkSize,
    chunkOverlap: config.corpus.chunkOverlap,
  });

  await saveIndex(index, outPath);

  console.log("\n========================================");
  log("✅", `Indexed ${index.size} chunks (${index.dimensions} dimensions)`);
  log("💾", `Snapshot written to ${outPath}`);
  console.log("========================================\n");
}

main().catch((err: unknown) => {
  console.error("❌ Index build failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
