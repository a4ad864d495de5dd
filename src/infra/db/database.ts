import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { migrate } from './migrate.js';

export const IN_MEMORY = ':memory:';

/**
 * Open the SQLite file (creating its directory if needed) and bring the schema up to date.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  const applied = migrate(db);
  console.log(
    `Database ready at ${path}` +
      (applied.length > 0 ? ` (${applied.length} migration(s) applied)` : '')
  );

  return db;
}

/**
 * Liveness probe for the health endpoint. Throws if the database cannot answer.
 */
export function pingDatabase(db: Database.Database): void {
  db.prepare('SELECT 1').get();
}
