import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import * as path from 'path';

export const IN_MEMORY = ':memory:';

/**
 * Open a SQLite database, creating its directory when needed
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  return db;
}
