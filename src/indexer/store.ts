// ============================================
// Index store — JSON snapshot on disk
// ============================================

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { indexInvalid } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { CorpusIndex, INDEX_SNAPSHOT_VERSION } from "./corpusIndex.js";

const snapshotSchema = z.object({
  version: z.literal(INDEX_SNAPSHOT_VERSION),
  dimensions: z.number().int().nonnegative(),
  builtAt: z.string(),
  chunks: z.array(
    z.object({
      documentId: z.string().min(1),
      sequence: z.number().int().nonnegative(),
      text: z.string(),
      embedding: z.array(z.number()),
    })
  ),
});

/**
 * Write the index next to a temp file, then rename over the target
 * so readers never see a half-written snapshot.
 */
export async function saveIndex(index: CorpusIndex, filePath: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tmpPath, JSON.stringify(index.toSnapshot()), "utf-8");
  await fs.rename(tmpPath, filePath);

  logger.info("Index snapshot saved", {
    stage: "index",
    path: filePath,
    chunks: index.size,
  });
}

/**
 * Load a snapshot. Returns null when the file does not exist;
 * throws INDEX_INVALID when it exists but cannot be used.
 */
export async function loadIndex(filePath: string): Promise<CorpusIndex | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw indexInvalid(`Index snapshot is not valid JSON: ${filePath}`, {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw indexInvalid(`Index snapshot has an unexpected shape: ${filePath}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  const index = CorpusIndex.fromSnapshot(parsed.data);

  logger.info("Index snapshot loaded", {
    stage: "index",
    path: filePath,
    chunks: index.size,
    dimensions: index.dimensions,
    builtAt: parsed.data.builtAt,
  });

  return index;
}
