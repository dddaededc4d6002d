import { describe, expect, it } from "vitest";

import { ConfigurationError } from "@typesLocal/AppError";

import {
  DEFAULT_LOCAL_EMBEDDING_MODEL,
  DEFAULT_OPENAI_EMBEDDING_MODEL,
  loadConfig,
} from "./index";

const REQUIRED = {
  OPENAI_API_KEY: "test-secret",
  OPENAI_API_URL: "http://llm.test/v1/chat/completions",
};

describe("loadConfig", () => {
  it("applies defaults when only the LLM endpoint is set", () => {
    const config = loadConfig(REQUIRED);

    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(3000);
    expect(config.llm).toEqual({
      apiKey: "test-secret",
      apiUrl: "http://llm.test/v1/chat/completions",
      maxTokens: 800,
      temperature: 0.5,
      timeoutMs: undefined,
      maxRetries: 2,
      retryBaseDelayMs: 200,
    });
    expect(config.embedding).toMatchObject({
      provider: "local",
      model: DEFAULT_LOCAL_EMBEDDING_MODEL,
      dimension: 384,
      batchWindowMs: 0,
    });
    expect(config.index).toEqual({
      path: "runtime_assets/vecdb.sqlite",
      collection: "schema_tables",
    });
    expect(config.rag).toEqual({ topK: 20, systemPrompt: undefined });
    expect(config.observability).toEqual({ logLevel: "info", logFile: "logs/app.log" });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({
      ...REQUIRED,
      PORT: "8081",
      RAG_TOP_K: "5",
      LLM_TEMPERATURE: "0",
      LLM_TIMEOUT_MS: "15000",
      EMBEDDING_DIMENSION: "768",
    });

    expect(config.port).toBe(8081);
    expect(config.rag.topK).toBe(5);
    expect(config.llm.temperature).toBe(0);
    expect(config.llm.timeoutMs).toBe(15000);
    expect(config.embedding.dimension).toBe(768);
  });

  it("disables the log file when LOG_FILE is empty", () => {
    expect(loadConfig({ ...REQUIRED, LOG_FILE: "" }).observability.logFile).toBeUndefined();
  });

  it("treats blank optional strings as unset", () => {
    const config = loadConfig({ ...REQUIRED, SYSTEM_PROMPT: "  ", EMBEDDING_MODEL: "" });

    expect(config.rag.systemPrompt).toBeUndefined();
    expect(config.embedding.model).toBe(DEFAULT_LOCAL_EMBEDDING_MODEL);
  });

  it("picks the OpenAI embedding model for the openai provider", () => {
    const config = loadConfig({
      ...REQUIRED,
      EMBEDDING_PROVIDER: "openai",
      OPENAI_EMBEDDING_API_KEY: "test-secret",
    });

    expect(config.embedding.provider).toBe("openai");
    expect(config.embedding.model).toBe(DEFAULT_OPENAI_EMBEDDING_MODEL);
    expect(config.embedding.openaiApiKey).toBe("test-secret");
  });

  it("requires an embedding key for the openai provider", () => {
    expect(() => loadConfig({ ...REQUIRED, EMBEDDING_PROVIDER: "openai" })).toThrow(
      "Invalid configuration: OPENAI_EMBEDDING_API_KEY: OPENAI_EMBEDDING_API_KEY is required when EMBEDDING_PROVIDER=openai"
    );
  });

  it("names every missing LLM setting", () => {
    const error = (() => {
      try {
        loadConfig({});
        return undefined;
      } catch (e: unknown) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      message: "Invalid configuration: OPENAI_API_KEY: Required; OPENAI_API_URL: Required",
    });
  });

  it("rejects a malformed endpoint URL", () => {
    expect(() => loadConfig({ ...REQUIRED, OPENAI_API_URL: "not a url" })).toThrow(
      "Invalid configuration: OPENAI_API_URL: OPENAI_API_URL must be a URL"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...REQUIRED, LOG_LEVEL: "verbose" })).toThrow(ConfigurationError);
  });
});
