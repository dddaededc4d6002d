/**
 * Embedding model backends.
 *
 * - LocalEmbeddingModel runs a sentence-transformer in process through
 *   @xenova/transformers (default: all-MiniLM-L6-v2, 384 dimensions).
 * - OpenAIEmbeddingModel calls the OpenAI embeddings API with the configured
 *   output dimension.
 *
 * Both return raw (unnormalized) vectors; normalization happens in the query
 * pipeline.
 */
import fs from "fs/promises";
import path from "path";

import OpenAI from "openai";
import { z } from "zod";

import type { AppConfig } from "@config/index";
import type { EmbeddingModel, EmbeddingVector } from "@domain/rag/ports";
import { logger } from "@infrastructure/logging/Logger";
import { ConfigurationError } from "@typesLocal/AppError";
import type { FeatureExtractionPipeline } from "@xenova/transformers";

const VectorBatchSchema = z.array(z.array(z.number()));

export class LocalEmbeddingModel implements EmbeddingModel {
  private extractor: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  constructor(
    public readonly name: string,
    private readonly cacheDir?: string
  ) {}

  /** Loads the model once; concurrent callers share the same load. */
  async init(): Promise<void> {
    await this.load();
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    const extractor = await this.load();
    const output = await extractor(texts, { pooling: "mean", normalize: false });
    return VectorBatchSchema.parse(output.tolist());
  }

  private load(): Promise<FeatureExtractionPipeline> {
    if (this.extractor) {
      return Promise.resolve(this.extractor);
    }
    if (!this.loading) {
      this.loading = this.createExtractor().then(
        (extractor) => {
          this.extractor = extractor;
          return extractor;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async createExtractor(): Promise<FeatureExtractionPipeline> {
    const { env, pipeline } = await import("@xenova/transformers");

    const dir =
      this.cacheDir?.trim() || path.resolve(process.cwd(), ".cache/transformers");
    await fs.mkdir(dir, { recursive: true });
    env.useBrowserCache = false;
    env.allowLocalModels = true;
    env.cacheDir = dir;

    logger.log("info", "Loading embedding model", { model: this.name, cacheDir: dir });
    const extractor = await pipeline("feature-extraction", this.name);
    logger.log("info", "Embedding model ready", { model: this.name });

    return extractor;
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  baseUrl?: string;
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  private readonly client: OpenAI;

  constructor(
    public readonly name: string,
    private readonly dimension: number,
    options: OpenAIEmbeddingOptions
  ) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    const response = await this.client.embeddings.create({
      model: this.name,
      input: texts,
      dimensions: this.dimension,
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

export function createEmbeddingModel(
  settings: AppConfig["embedding"]
): EmbeddingModel {
  if (settings.provider === "openai") {
    return new OpenAIEmbeddingModel(settings.model, settings.dimension, {
      apiKey: settings.openaiApiKey ?? "",
      baseUrl: settings.openaiBaseUrl,
    });
  }

  return new LocalEmbeddingModel(settings.model, settings.cacheDir);
}

/**
 * Embeds a sample text once and checks the vector length against the index.
 * Run at startup: a model that disagrees with the collection would otherwise
 * fail every request at retrieval.
 */
export async function verifyEmbeddingDimension(
  model: EmbeddingModel,
  expected: number
): Promise<void> {
  const [sample] = await model.embed(["dimension check"]);

  if (!sample) {
    throw new ConfigurationError(
      `Embedding model "${model.name}" returned no vector for a sample text`
    );
  }

  if (sample.length !== expected) {
    throw new ConfigurationError(
      `Embedding model "${model.name}" produces ${sample.length}-dimensional vectors, but the index expects ${expected}`,
      { metadata: { model: model.name, produced: sample.length, expected } }
    );
  }
}
