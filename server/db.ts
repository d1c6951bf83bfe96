import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import path from "path";
import * as schema from "@shared/schema";
import { getConfig } from "./config";
import { log } from "./log";
import { DatabaseUnavailableError } from "./errors";

export type MavenDb = BetterSQLite3Database<typeof schema>;

export interface DbTuning {
  cachePages: number;
  mmapBytes: number;
}

export interface DbHandle {
  sqlite: Database.Database;
  db: MavenDb;
}

// Reference:
// - https://phiresky.github.io/blog/2020/sqlite-performance-tuning/
// - https://www.sqlite.org/pragma.html
function tuningPragmas(tuning: DbTuning): string[] {
  return [
    "query_only = 1",
    "synchronous = NORMAL",
    `cache_size = ${tuning.cachePages}`,
    "journal_size_limit = 33554432", // 32 MB
    `mmap_size = ${tuning.mmapBytes}`,
    "temp_store = MEMORY",
  ];
}

function openReadOnly(filePath: string): Database.Database {
  try {
    return new Database(filePath, { readonly: true, fileMustExist: true });
  } catch (err) {
    throw new DatabaseUnavailableError(err);
  }
}

export function openDatabase(filePath: string, tuning: DbTuning): DbHandle {
  const sqlite = openReadOnly(filePath);
  try {
    for (const pragma of tuningPragmas(tuning)) {
      sqlite.pragma(pragma);
    }
    // Reading the schema fails on a file that is not SQLite; a partial copy has no gav table.
    const table = sqlite
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'gav'")
      .get();
    if (!table) throw new Error(`${filePath} has no gav table`);
  } catch (err) {
    sqlite.close();
    throw new DatabaseUnavailableError(err);
  }

  return { sqlite, db: drizzle(sqlite, { schema }) };
}

let shared: DbHandle | null = null;

/**
 * Process-wide read-only connection, opened on first use.
 * A failed open is not remembered, so the next call tries again.
 */
export function getDb(): MavenDb {
  if (!shared) {
    const config = getConfig();
    const filePath = path.resolve(config.MAVENDB_PATH);
    shared = openDatabase(filePath, {
      cachePages: config.SQLITE_CACHE_PAGES,
      mmapBytes: config.SQLITE_MMAP_BYTES,
    });
    log(`opened ${filePath} (read-only)`, "db");
  }
  return shared.db;
}

export function closeDatabase(): void {
  if (shared) {
    shared.sqlite.close();
    shared = null;
    log("database closed", "db");
  }
}
