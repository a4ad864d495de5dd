import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_users',
    sql: `
      CREATE TABLE users (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('standard', 'admin')),
        created_at TEXT NOT NULL
      )
    `,
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `);
}

function getAppliedMigrations(db: Database.Database): Set<number> {
  const rows = db
    .prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version')
    .all();
  return new Set(rows.map((row) => row.version));
}

function applyMigration(db: Database.Database, migration: Migration): void {
  const record = db.prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)');

  db.transaction(() => {
    db.exec(migration.sql);
    record.run(migration.version, new Date().toISOString());
  })();

  console.log(`✓ Applied migration ${migration.version}: ${migration.name}`);
}

/**
 * Apply every pending migration, in version order. Returns the versions applied.
 */
export function migrate(
  db: Database.Database,
  migrations: readonly Migration[] = MIGRATIONS
): number[] {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);

  const pending = [...migrations]
    .filter((m) => !applied.has(m.version))
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    applyMigration(db, migration);
  }

  return pending.map((m) => m.version);
}
