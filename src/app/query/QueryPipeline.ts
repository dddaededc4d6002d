/**
 * Schema question answering pipeline.
 *
 * One run per request, strictly sequential:
 *   embedding -> normalizing -> retrieving -> promptBuilding -> generating
 *
 * The first failing stage aborts the run with that stage's typed error;
 * there is no fallback answer without retrieval. The vector index is the
 * only state shared between runs and is locked by the index itself for the
 * retrieval stage only.
 */
import { PromptBuilder } from "@domain/rag/promptBuilder";
import { normalize } from "@domain/rag/vectorOps";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  AppError,
  describeError,
  EmbeddingError,
  LLMError,
  StorageError,
  ValidationError,
} from "@typesLocal/AppError";

import type {
  Embedder,
  LLMPort,
  RetrievedRow,
  VectorIndex,
} from "@domain/rag/ports";

export type PipelineStage =
  | "embedding"
  | "normalizing"
  | "retrieving"
  | "promptBuilding"
  | "generating";

export interface QueryPipelineDeps {
  embedder: Embedder;
  index: VectorIndex;
  llm: LLMPort;
  promptBuilder?: PromptBuilder;
}

export interface QueryPipelineOptions {
  topK: number;
  maxTokens: number;
  temperature: number;
}

/** Generation settings for schema Q&A answers. */
export const SCHEMA_QA_DEFAULTS: QueryPipelineOptions = {
  topK: 20,
  maxTokens: 800,
  temperature: 0.5,
};

export interface QueryAnswer {
  answer: string;
  rows: RetrievedRow[];
}

export class QueryPipeline {
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly llm: LLMPort;
  private readonly promptBuilder: PromptBuilder;
  private readonly options: QueryPipelineOptions;

  constructor(
    deps: QueryPipelineDeps,
    options: Partial<QueryPipelineOptions> = {}
  ) {
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.llm = deps.llm;
    this.promptBuilder = deps.promptBuilder ?? new PromptBuilder();
    this.options = { ...SCHEMA_QA_DEFAULTS, ...options };
  }

  /** Answers `query` and returns only the generated text. */
  async answer(query: string): Promise<string> {
    const result = await this.run(query);
    return result.answer;
  }

  async run(query: string): Promise<QueryAnswer> {
    if (query.trim().length === 0) {
      throw new ValidationError("Query must not be empty");
    }

    const startedAt = Date.now();
    let stage: PipelineStage = "embedding";

    try {
      const [embedding] = await this.embedder.embed([query]);
      if (!embedding) {
        throw new EmbeddingError("Embedding model returned no vector for the query");
      }

      stage = "normalizing";
      const key = normalize(embedding);

      stage = "retrieving";
      const rows = await this.index.findSimilar(key, this.options.topK);

      stage = "promptBuilding";
      const messages = this.promptBuilder.build(
        rows.map((row) => row.content),
        query
      );

      stage = "generating";
      const answer = await this.llm.send(messages, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
      });

      logEvent("QUERY_SUCCESS", {
        durationMs: Date.now() - startedAt,
        queryLength: query.length,
        rowsRetrieved: rows.length,
        answerLength: answer.length,
      });

      return { answer, rows };
    } catch (error: unknown) {
      const failure = asStageError(stage, error);

      logEvent("QUERY_FAILURE", {
        durationMs: Date.now() - startedAt,
        stage,
        type: failure.type,
        message: failure.message,
      });

      throw failure;
    }
  }
}

function asStageError(stage: PipelineStage, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = `${stage} failed: ${describeError(error).message}`;
  switch (stage) {
    case "embedding":
      return new EmbeddingError(message, { cause: error });
    case "retrieving":
      return new StorageError(message, { cause: error });
    case "generating":
      return new LLMError(message, { cause: error });
    default:
      return new AppError(message, "AppError", { cause: error });
  }
}
