/**
 * Application entry point for the schema Q&A service.
 *
 * Loads configuration, opens the vector index once (the process refuses to
 * serve without it), warms the embedding model, wires the query pipeline and
 * starts the Express server.
 */
import { QueryPipeline } from "@app/query/QueryPipeline";
import { loadConfig } from "@config/index";
import { PromptBuilder } from "@domain/rag/promptBuilder";
import { createHttpApp } from "@interfaces/http/createHttpApp";
import { EmbeddingClient } from "@infrastructure/llm/EmbeddingClient";
import {
  createEmbeddingModel,
  verifyEmbeddingDimension,
} from "@infrastructure/llm/EmbeddingProvider";
import { LLMClient } from "@infrastructure/llm/LLMClient";
import { configureLogger, logger } from "@infrastructure/logging/Logger";
import { VectorIndexHandle } from "@infrastructure/vector/VectorIndexHandle";
import { describeError, isAppError } from "@typesLocal/AppError";
import { DEFAULT_RETRY_POLICY } from "@utils/retry";

async function main(): Promise<void> {
  const config = loadConfig();

  configureLogger({
    level: config.observability.logLevel,
    file: config.observability.logFile,
  });
  logger.log("info", "Starting server...", { env: config.env });

  const index = await VectorIndexHandle.createOrOpen({
    path: config.index.path,
    collectionName: config.index.collection,
    dimension: config.embedding.dimension,
  });

  const embeddingModel = createEmbeddingModel(config.embedding);
  await embeddingModel.init?.();
  await verifyEmbeddingDimension(embeddingModel, index.dimension);

  const pipeline = new QueryPipeline(
    {
      embedder: new EmbeddingClient(embeddingModel, {
        batchWindowMs: config.embedding.batchWindowMs,
      }),
      index,
      llm: new LLMClient({
        apiUrl: config.llm.apiUrl,
        apiKey: config.llm.apiKey,
        timeoutMs: config.llm.timeoutMs,
        retry: {
          ...DEFAULT_RETRY_POLICY,
          maxRetries: config.llm.maxRetries,
          baseDelayMs: config.llm.retryBaseDelayMs,
        },
      }),
      promptBuilder: new PromptBuilder(config.rag.systemPrompt),
    },
    {
      topK: config.rag.topK,
      maxTokens: config.llm.maxTokens,
      temperature: config.llm.temperature,
    }
  );

  const app = createHttpApp({ pipeline, index });

  const server = app.listen(config.port, config.host, () => {
    logger.log("info", "Server listening", {
      url: `http://${config.host}:${config.port}`,
      collection: config.index.collection,
      embeddingModel: embeddingModel.name,
    });
  });

  const shutdown = (signal: string): void => {
    logger.log("info", "Shutting down", { signal });
    server.close(() => {
      index.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.log("error", "Failed to close vector index", describeError(error));
          process.exit(1);
        }
      );
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.log("error", "Startup failed", {
    type: isAppError(error) ? error.type : undefined,
    ...describeError(error),
  });
  process.exit(1);
});
