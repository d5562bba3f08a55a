// src/config/sqlite.ts
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from '../db/schema';

export type PasteDatabase = BetterSQLite3Database<typeof schema>;

export interface SqliteConnection {
  db: PasteDatabase;
  close: () => void;
}

const SCHEMA_PATH = path.join(__dirname, '..', 'db', 'schema.sql');

/**
 * Opens (or creates) the SQLite database and applies the schema.
 * `:memory:` gives a throwaway database.
 */
const openSqlite = (filename: string): SqliteConnection => {
  const sqlite = new Database(filename);
  if (filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.exec(fs.readFileSync(SCHEMA_PATH, 'utf8'));

  console.log(`SQLite ready: ${filename}`);
  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
};

export default openSqlite;
