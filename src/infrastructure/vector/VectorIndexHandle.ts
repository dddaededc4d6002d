/**
 * Process-wide handle on the schema vector index.
 *
 * Created once at startup and injected into the request layer. Every search
 * holds the shared side of the handle's lock for the duration of the lookup
 * only; the exclusive side is reserved for writers such as a future
 * re-indexing job. Embedding and LLM calls never run under this lock.
 */
import { SqliteVectorCollection } from "@infrastructure/database/SqliteVectorCollection";
import { logEvent } from "@infrastructure/logging/Logger";
import { describeError, StorageError } from "@typesLocal/AppError";
import { ReadWriteLock } from "@utils/rwLock";

import type {
  NormalizedVector,
  RetrievedRow,
  VectorCollection,
  VectorIndex,
} from "@domain/rag/ports";

export interface VectorIndexOptions {
  path: string;
  collectionName: string;
  dimension: number;
}

export interface VectorIndexDescription {
  collection: string;
  dimension: number;
  rows: number;
}

export class VectorIndexHandle implements VectorIndex {
  private readonly lock = new ReadWriteLock();

  constructor(private readonly collection: VectorCollection) {}

  static async createOrOpen(
    options: VectorIndexOptions
  ): Promise<VectorIndexHandle> {
    const startedAt = Date.now();
    const collection = SqliteVectorCollection.createOrOpen(
      options.path,
      options.collectionName,
      options.dimension
    );
    const handle = new VectorIndexHandle(collection);

    logEvent("INDEX_OPENED", {
      path: options.path,
      collection: options.collectionName,
      dimension: options.dimension,
      rows: collection.count(),
      durationMs: Date.now() - startedAt,
    });

    return handle;
  }

  get dimension(): number {
    return this.collection.dimension;
  }

  /**
   * Returns up to `k` rows ranked by similarity to `query`, most similar
   * first. Rows with equal scores keep their insertion order.
   */
  async findSimilar(query: NormalizedVector, k: number): Promise<RetrievedRow[]> {
    const startedAt = Date.now();

    const rows = await this.lock.withRead(() => {
      try {
        return this.collection.findNearest(query, k);
      } catch (error: unknown) {
        throw toStorageError(error, "Similarity search failed");
      }
    });

    logEvent("INDEX_SEARCH", {
      collection: this.collection.name,
      k,
      returned: rows.length,
      durationMs: Date.now() - startedAt,
    });

    return rows;
  }

  /**
   * Runs `fn` with exclusive access to the collection. Waits for in-flight
   * searches to finish; searches issued meanwhile wait until `fn` settles.
   */
  async withExclusive<T>(
    fn: (collection: VectorCollection) => T | Promise<T>
  ): Promise<T> {
    return this.lock.withWrite(() => fn(this.collection));
  }

  async describe(): Promise<VectorIndexDescription> {
    return this.lock.withRead(() => ({
      collection: this.collection.name,
      dimension: this.collection.dimension,
      rows: this.collection.count(),
    }));
  }

  async close(): Promise<void> {
    await this.lock.withWrite(() => this.collection.close());
  }
}

function toStorageError(error: unknown, context: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`${context}: ${describeError(error).message}`, {
    cause: error,
  });
}
