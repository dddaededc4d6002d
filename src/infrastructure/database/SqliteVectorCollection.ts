import { dot } from "@domain/rag/vectorOps";
import { openDatabase } from "@infrastructure/database/db";
import type { SqliteDatabase } from "@infrastructure/database/db";
import { describeError, StorageError } from "@typesLocal/AppError";

import type {
  NewRow,
  RetrievedRow,
  VectorCollection,
} from "@domain/rag/ports";

interface CollectionRow {
  dimension: number;
}

interface StoredRow {
  id: number;
  content: string;
  embedding: Buffer;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS collections (
    name TEXT PRIMARY KEY,
    dimension INTEGER NOT NULL CHECK (dimension > 0)
  );

  CREATE TABLE IF NOT EXISTS vectors (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    collection TEXT NOT NULL REFERENCES collections(name),
    content TEXT NOT NULL,
    embedding BLOB NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_vectors_collection ON vectors(collection, id);
`;

export function encodeEmbedding(embedding: readonly number[]): Buffer {
  const floats = Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

export function decodeEmbedding(blob: Uint8Array): Float32Array {
  // Copy into a fresh, 4-byte aligned buffer before viewing it as floats.
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4));
}

/**
 * A named collection of (content, embedding) rows in a SQLite file.
 *
 * Search is exhaustive: every row of the collection is scored by dot product
 * against the query and the best `limit` rows are returned, ties kept in
 * insertion order. Embeddings are stored as float32 BLOBs.
 */
export class SqliteVectorCollection implements VectorCollection {
  private constructor(
    private readonly db: SqliteDatabase,
    public readonly name: string,
    public readonly dimension: number
  ) {}

  /**
   * Opens `name` inside the database at `filePath`, creating the file, the
   * schema and the collection as needed. An existing collection must have
   * been created with the same dimension.
   */
  static createOrOpen(
    filePath: string,
    name: string,
    dimension: number
  ): SqliteVectorCollection {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new StorageError(`Invalid collection dimension: ${dimension}`);
    }

    const db = openDatabase(filePath);

    try {
      db.exec(SCHEMA);

      const existing = db
        .prepare<[string], CollectionRow>(
          "SELECT dimension FROM collections WHERE name = ?"
        )
        .get(name);

      if (existing && existing.dimension !== dimension) {
        throw new StorageError(
          `Collection "${name}" has dimension ${existing.dimension}, expected ${dimension}`,
          { metadata: { collection: name, stored: existing.dimension, expected: dimension } }
        );
      }

      if (!existing) {
        db.prepare<[string, number]>(
          "INSERT INTO collections (name, dimension) VALUES (?, ?)"
        ).run(name, dimension);
      }
    } catch (error: unknown) {
      db.close();
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(
        `Cannot open collection "${name}": ${describeError(error).message}`,
        { cause: error }
      );
    }

    return new SqliteVectorCollection(db, name, dimension);
  }

  findNearest(query: readonly number[], limit: number): RetrievedRow[] {
    this.assertOpen();

    if (query.length !== this.dimension) {
      throw new StorageError(
        `Query vector has dimension ${query.length}, collection "${this.name}" expects ${this.dimension}`,
        { metadata: { collection: this.name, received: query.length, expected: this.dimension } }
      );
    }

    if (limit <= 0) {
      return [];
    }

    const rows = this.db
      .prepare<[string], StoredRow>(
        "SELECT id, content, embedding FROM vectors WHERE collection = ? ORDER BY id ASC"
      )
      .all(this.name);

    const scored: RetrievedRow[] = rows.map((row) => {
      const embedding = decodeEmbedding(row.embedding);
      if (embedding.length !== this.dimension || row.embedding.byteLength % 4 !== 0) {
        throw new StorageError(
          `Row ${row.id} in collection "${this.name}" has a ${row.embedding.byteLength}-byte embedding, expected ${this.dimension * 4}`,
          { metadata: { collection: this.name, rowId: row.id } }
        );
      }
      return {
        id: row.id,
        content: row.content,
        score: dot(query, embedding),
      };
    });

    // Array.prototype.sort is stable, so equal scores stay in id order.
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, limit);
  }

  add(rows: readonly NewRow[]): number {
    this.assertOpen();

    for (const row of rows) {
      if (row.embedding.length !== this.dimension) {
        throw new StorageError(
          `Row embedding has dimension ${row.embedding.length}, collection "${this.name}" expects ${this.dimension}`
        );
      }
    }

    const insert = this.db.prepare<[string, string, Buffer]>(
      "INSERT INTO vectors (collection, content, embedding) VALUES (?, ?, ?)"
    );
    const insertAll = this.db.transaction((batch: readonly NewRow[]) => {
      for (const row of batch) {
        insert.run(this.name, row.content, encodeEmbedding(row.embedding));
      }
      return batch.length;
    });

    return insertAll(rows);
  }

  count(): number {
    this.assertOpen();
    const row = this.db
      .prepare<[string], { total: number }>(
        "SELECT COUNT(*) AS total FROM vectors WHERE collection = ?"
      )
      .get(this.name);
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private assertOpen(): void {
    if (!this.db.open) {
      throw new StorageError(`Collection "${this.name}" is closed`);
    }
  }
}
