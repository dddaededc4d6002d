/**
 * SQLite connection management for the vector index.
 *
 * One better-sqlite3 connection is opened per index file at startup and
 * shared for the process lifetime. WAL mode lets a future writer append rows
 * without blocking readers at the file level.
 */
import Database from "better-sqlite3";

import { logger } from "@infrastructure/logging/Logger";
import { describeError, StorageError } from "@typesLocal/AppError";

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ":memory:";

export function openDatabase(filePath: string): SqliteDatabase {
  let db: SqliteDatabase;

  try {
    db = new Database(filePath);
  } catch (error: unknown) {
    throw new StorageError(
      `Cannot open vector index at "${filePath}": ${describeError(error).message}`,
      { cause: error, metadata: { path: filePath } }
    );
  }

  if (filePath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }

  logger.log("debug", "SQLite database opened", { path: filePath });

  return db;
}
