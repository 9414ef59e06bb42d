import { readFileSync } from "node:fs";

import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import * as tables from "./tables.js";

export type AppDatabase = BetterSQLite3Database<typeof tables>;

export interface DatabaseHandle {
  db: AppDatabase;
  close: () => void;
}

const schemaSql = readFileSync(new URL("../../db/schema.sql", import.meta.url), "utf8");

/**
 * Opens the SQLite database at `url` (a file path or `:memory:`) and makes
 * sure every table exists.
 */
export function openDatabase(url: string): DatabaseHandle {
  const sqlite = new Database(url);
  sqlite.pragma("foreign_keys = ON");
  if (url !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  sqlite.exec(schemaSql);

  return {
    db: drizzle(sqlite, { schema: tables }),
    close: () => sqlite.close()
  };
}
