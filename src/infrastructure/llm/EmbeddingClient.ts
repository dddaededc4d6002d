import type {
  Embedder,
  EmbeddingModel,
  EmbeddingVector,
} from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { describeError, EmbeddingError } from "@typesLocal/AppError";

export interface EmbeddingClientOptions {
  /**
   * When positive, concurrent embed() calls made within this many
   * milliseconds are sent to the model as one batch.
   */
  batchWindowMs?: number;
}

interface PendingEmbedding {
  texts: string[];
  resolve: (vectors: EmbeddingVector[]) => void;
  reject: (error: unknown) => void;
}

/**
 * Text-to-vector client in front of an EmbeddingModel.
 *
 * Returns exactly one vector per input, in input order, or fails with an
 * EmbeddingError. Vector length is not checked here; the index rejects a
 * query whose dimension does not match its collection.
 */
export class EmbeddingClient implements Embedder {
  private pending: PendingEmbedding[] = [];
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly model: EmbeddingModel,
    private readonly options: EmbeddingClientOptions = {}
  ) {}

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) {
      return [];
    }

    const empty = texts.findIndex((text) => text.trim().length === 0);
    if (empty !== -1) {
      throw new EmbeddingError(`Cannot embed empty text at position ${empty}`);
    }

    const windowMs = this.options.batchWindowMs ?? 0;
    if (windowMs <= 0) {
      return this.embedBatch(texts);
    }

    return new Promise<EmbeddingVector[]>((resolve, reject) => {
      this.pending.push({ texts, resolve, reject });
      if (!this.flushTimer) {
        this.flushTimer = setTimeout(() => this.flush(), windowMs);
      }
    });
  }

  private flush(): void {
    this.flushTimer = null;
    const batch = this.pending;
    this.pending = [];

    void this.embedBatch(batch.flatMap((request) => request.texts)).then(
      (vectors) => {
        let offset = 0;
        for (const request of batch) {
          request.resolve(vectors.slice(offset, offset + request.texts.length));
          offset += request.texts.length;
        }
      },
      (error: unknown) => {
        for (const request of batch) {
          request.reject(error);
        }
      }
    );
  }

  private async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const startedAt = Date.now();
    let vectors: EmbeddingVector[];

    try {
      vectors = await this.model.embed(texts);
    } catch (error: unknown) {
      const caught = describeError(error);

      logEvent("EMBEDDING_FAILURE", {
        model: this.model.name,
        durationMs: Date.now() - startedAt,
        batchSize: texts.length,
        message: caught.message,
        name: caught.name,
      });

      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(
        `Embedding model "${this.model.name}" failed: ${caught.message}`,
        { cause: error }
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding model "${this.model.name}" returned ${vectors.length} vectors for ${texts.length} inputs`
      );
    }

    logEvent("EMBEDDING_SUCCESS", {
      model: this.model.name,
      durationMs: Date.now() - startedAt,
      batchSize: texts.length,
      vectorLength: vectors[0]?.length ?? 0,
    });

    return vectors;
  }
}
