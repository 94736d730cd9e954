import { z } from "zod";
import { configurationError } from "../lib/errors.js";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const envSchema = z
  .object({
    // Server
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

    // Generation + embeddings (OpenAI or any OpenAI-compatible server)
    OPENAI_API_KEY: z.string().min(1).default("lm-studio"),
    OPENAI_BASE_URL: z.string().url("OPENAI_BASE_URL must be a valid URL").optional(),
    GENERATION_MODEL: z.string().min(1).default("gpt-4o-mini"),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    LLM_ACTION_DETECTION: z
      .string()
      .default("false")
      .transform((v) => v === "true" || v === "1"),

    // Corpus
    DOCS_DIR: z.string().min(1).default("data/knowledge"),
    INDEX_PATH: z.string().min(1).default("data/index.json"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(400),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
    RAG_TOP_K: z.coerce.number().int().positive().default(3),

    // External handlers
    HANDLER_BASE_URL: z.string().url("HANDLER_BASE_URL must be a valid URL").default("http://127.0.0.1:8100"),
    HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
    HANDLER_CACHE_TTL_MS: z.coerce.number().int().positive().default(300000), // 5 minutes, market data goes stale fast
  })
  .superRefine((value, ctx) => {
    if (value.CHUNK_OVERLAP >= value.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map.
 * Throws a CONFIG_ERROR listing every invalid variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw configurationError(`Invalid environment configuration:\n   ${issues.join("\n   ")}`, { issues });
  }

  return result.data;
}

export type AppConfig = ReturnType<typeof buildConfig>;

// Derived config for convenience
export function buildConfig(env: Env) {
  return {
    port: env.PORT,
    isDev: env.NODE_ENV === "development",
    isProd: env.NODE_ENV === "production",

    llm: {
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      generationModel: env.GENERATION_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      actionDetection: env.LLM_ACTION_DETECTION,
    },

    corpus: {
      docsDir: env.DOCS_DIR,
      indexPath: env.INDEX_PATH,
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      topK: env.RAG_TOP_K,
    },

    handlers: {
      baseUrl: env.HANDLER_BASE_URL,
      timeoutMs: env.HANDLER_TIMEOUT_MS,
      cacheTtlMs: env.HANDLER_CACHE_TTL_MS,
    },
  } as const;
}

let cached: AppConfig | undefined;

/** Process-wide config, validated on first use */
export function getConfig(): AppConfig {
  if (!cached) {
    cached = buildConfig(loadEnv(process.env));
  }
  return cached;
}
