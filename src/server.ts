import "dotenv/config";
import express from "express";
import { createApiRouter } from "./api/index.js";
import { createAssistant } from "./app/bootstrap.js";
import { getConfig } from "./config/env.js";
import { hasCode } from "./lib/errors.js";
import { logger } from "./lib/logger.js";

// ============================================
// Startup
// ============================================

async function main(): Promise<void> {
  const config = getConfig();

  logger.info("Starting FinChat router", {
    stage: "startup",
    port: config.port,
    generationModel: config.llm.generationModel,
    embeddingModel: config.llm.embeddingModel,
  });

  const assistant = await createAssistant(config);

  const app = express();

  // Health check
  app.get("/healthz", (_req, res) => res.status(200).send("ok"));

  app.use("/api/v1", createApiRouter(assistant));

  app.listen(config.port, () => {
    logger.info("Server listening", {
      stage: "startup",
      port: config.port,
    });
  });
}

main().catch((err: unknown) => {
  if (hasCode(err, "CONFIG_ERROR")) {
    logger.error("Invalid configuration", { stage: "config", error: err, context: err.context });
  } else {
    logger.error("Startup failed", { stage: "startup", error: err });
  }
  process.exit(1);
});
