import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import * as schema from './schema';

export type JournalDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Open (or create) the journal database and make sure its tables exist.
 * Pass ':memory:' for a throwaway database.
 */
export function createDatabase(dbPath: string): { db: JournalDatabase; close: () => void } {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  sqlite.exec(schema.CREATE_TABLES_SQL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

export { schema };
