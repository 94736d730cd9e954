import fs from "fs/promises";
import path from "path";
import { logger } from "../lib/logger.js";
import type { SourceDocument } from "../types/index.js";

/** Supplies the corpus at build time only */
export interface DocumentSource {
  load(): Promise<SourceDocument[]>;
}

const DOC_EXTENSIONS = /\.(md|mdx|txt)$/i;

/**
 * Every .md/.mdx/.txt file directly under `dir`, sorted by name.
 * The document id is the file name. A missing directory is an empty corpus.
 */
export function directorySource(dir: string): DocumentSource {
  return {
    async load(): Promise<SourceDocument[]> {
      let names: string[];
      try {
        names = await fs.readdir(dir);
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
          logger.warn("Docs directory not found, corpus is empty", { stage: "index", dir });
          return [];
        }
        throw err;
      }

      const documents: SourceDocument[] = [];
      for (const name of names.filter((n) => DOC_EXTENSIONS.test(n)).sort()) {
        const text = await fs.readFile(path.join(dir, name), "utf-8");
        documents.push({ id: name, text });
      }

      logger.info("Loaded documents", {
        stage: "index",
        dir,
        documentCount: documents.length,
      });

      return documents;
    },
  };
}

/** In-memory source, for tests and scripts that already hold the text */
export function staticSource(documents: SourceDocument[]): DocumentSource {
  return {
    async load() {
      return documents.map((d) => ({ ...d }));
    },
  };
}
