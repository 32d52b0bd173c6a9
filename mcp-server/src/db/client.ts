import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

// drizzle-kit is not part of the runtime; the tables are created on open
const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS users (
  user_id TEXT PRIMARY KEY,
  is_authenticated INTEGER NOT NULL DEFAULT 0,
  first_auth_date TEXT,
  last_active TEXT,
  reminder_schedule TEXT,
  timezone TEXT NOT NULL DEFAULT '${schema.DEFAULT_TIMEZONE}'
);

CREATE TABLE IF NOT EXISTS entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL REFERENCES users(user_id),
  date TEXT NOT NULL,
  content TEXT NOT NULL,
  attitude TEXT NOT NULL,
  form TEXT NOT NULL,
  body TEXT NOT NULL,
  response TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS refusals (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL REFERENCES users(user_id),
  date TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entries_user_date ON entries(user_id, date);
CREATE INDEX IF NOT EXISTS idx_refusals_user_date ON refusals(user_id, date);
`;

export type PracticeDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  db: PracticeDatabase;
  close: () => void;
};

/** Opens (and creates, if needed) the SQLite file. `:memory:` gives a throwaway database. */
export function openDatabase(filename: string): DatabaseHandle {
  if (filename !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }
  const sqlite = new Database(filename);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(SCHEMA_DDL);
  console.log(`[db] opened ${filename === ":memory:" ? "in-memory database" : filename}`);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
