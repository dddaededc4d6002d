/**
 * Centralized configuration for the schema Q&A service.
 *
 * Reads environment variables (a `.env` file is loaded first when present),
 * validates them with zod and returns a typed, frozen config object. Any
 * missing or malformed value raises a ConfigurationError naming the offending
 * variables, which the bootstrap treats as fatal.
 */
import dotenv from "dotenv";
import { z } from "zod";

import { ConfigurationError } from "@typesLocal/AppError";

dotenv.config();

export const DEFAULT_LOCAL_EMBEDDING_MODEL = "Xenova/all-MiniLM-L6-v2";
export const DEFAULT_OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    HOST: z.string().trim().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is required"),
    OPENAI_API_URL: z.string().trim().url("OPENAI_API_URL must be a URL"),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(800),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
    LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),

    EMBEDDING_PROVIDER: z.enum(["local", "openai"]).default("local"),
    EMBEDDING_MODEL: optionalString,
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),
    EMBEDDING_BATCH_WINDOW_MS: z.coerce.number().int().min(0).default(0),
    OPENAI_EMBEDDING_API_KEY: optionalString,
    OPENAI_EMBEDDING_BASE_URL: optionalString,
    TRANSFORMERS_CACHE: optionalString,

    VECTOR_DB_PATH: z.string().trim().min(1).default("runtime_assets/vecdb.sqlite"),
    VECTOR_COLLECTION: z.string().trim().min(1).default("schema_tables"),
    RAG_TOP_K: z.coerce.number().int().positive().default(20),
    SYSTEM_PROMPT: optionalString,

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    LOG_FILE: z.string().trim().default("logs/app.log"),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDING_PROVIDER === "openai" && !env.OPENAI_EMBEDDING_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_EMBEDDING_API_KEY"],
        message: "OPENAI_EMBEDDING_API_KEY is required when EMBEDDING_PROVIDER=openai",
      });
    }
  });

export type EmbeddingProviderName = "local" | "openai";

export interface AppConfig {
  env: string;
  host: string;
  port: number;
  llm: {
    apiKey: string;
    apiUrl: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number | undefined;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    dimension: number;
    batchWindowMs: number;
    openaiApiKey: string | undefined;
    openaiBaseUrl: string | undefined;
    cacheDir: string | undefined;
  };
  index: {
    path: string;
    collection: string;
  };
  rag: {
    topK: number;
    systemPrompt: string | undefined;
  };
  observability: {
    logLevel: "debug" | "info" | "warn" | "error" | "silent";
    logFile: string | undefined;
  };
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const fields = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration: ${fields.join("; ")}`,
      { metadata: { issues: parsed.error.issues } }
    );
  }

  const env = parsed.data;

  return Object.freeze({
    env: env.NODE_ENV,
    host: env.HOST,
    port: env.PORT,
    llm: {
      apiKey: env.OPENAI_API_KEY,
      apiUrl: env.OPENAI_API_URL,
      maxTokens: env.LLM_MAX_TOKENS,
      temperature: env.LLM_TEMPERATURE,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxRetries: env.LLM_MAX_RETRIES,
      retryBaseDelayMs: env.LLM_RETRY_BASE_DELAY_MS,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      model:
        env.EMBEDDING_MODEL ??
        (env.EMBEDDING_PROVIDER === "openai"
          ? DEFAULT_OPENAI_EMBEDDING_MODEL
          : DEFAULT_LOCAL_EMBEDDING_MODEL),
      dimension: env.EMBEDDING_DIMENSION,
      batchWindowMs: env.EMBEDDING_BATCH_WINDOW_MS,
      openaiApiKey: env.OPENAI_EMBEDDING_API_KEY,
      openaiBaseUrl: env.OPENAI_EMBEDDING_BASE_URL,
      cacheDir: env.TRANSFORMERS_CACHE,
    },
    index: {
      path: env.VECTOR_DB_PATH,
      collection: env.VECTOR_COLLECTION,
    },
    rag: {
      topK: env.RAG_TOP_K,
      systemPrompt: env.SYSTEM_PROMPT,
    },
    observability: {
      logLevel: env.LOG_LEVEL,
      logFile: env.LOG_FILE.length > 0 ? env.LOG_FILE : undefined,
    },
  });
}
