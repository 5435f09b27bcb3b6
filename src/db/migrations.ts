/**
 * SQLite schema migration system.
 *
 * Migrations are numbered sequentially and tracked in a `schema_migrations` table.
 * Each migration runs inside a transaction. Once applied, a migration is never re-run.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

/**
 * All migrations in order. Append new migrations to the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: `
      CREATE TABLE sessions (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        config TEXT NOT NULL DEFAULT '{}',
        working_dir TEXT NOT NULL,
        lifecycle TEXT NOT NULL DEFAULT 'CREATED'
          CHECK (lifecycle IN ('CREATED', 'LAUNCHED', 'STARTED', 'ENDED', 'DELETED')),
        default_turn_duration_ms INTEGER NOT NULL,
        max_extensions_per_turn INTEGER,
        initial_bank_ms INTEGER NOT NULL DEFAULT 0,
        per_turn_bank_bonus_ms INTEGER NOT NULL DEFAULT 0,
        process_pid INTEGER,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE timers (
        session_id TEXT PRIMARY KEY REFERENCES sessions(id) ON DELETE CASCADE,
        remaining_ms INTEGER NOT NULL CHECK (remaining_ms >= 0),
        running INTEGER NOT NULL DEFAULT 0,
        paused_at INTEGER,
        last_tick INTEGER NOT NULL,
        deadline_raised INTEGER NOT NULL DEFAULT 0,
        warning_raised INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE player_banks (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        player TEXT NOT NULL,
        balance_ms INTEGER NOT NULL CHECK (balance_ms >= 0),
        extensions_used_this_turn INTEGER NOT NULL DEFAULT 0,
        max_extensions_per_turn INTEGER,
        PRIMARY KEY (session_id, player)
      );

      CREATE TABLE turn_records (
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        turn_number INTEGER NOT NULL CHECK (turn_number >= 1),
        phase TEXT NOT NULL,
        trigger TEXT NOT NULL,
        failed INTEGER NOT NULL DEFAULT 0,
        failure TEXT,
        baseline_engine_turn INTEGER,
        engine_turn INTEGER,
        pre_backup_ref TEXT,
        post_backup_ref TEXT,
        started_at INTEGER NOT NULL,
        completed_at INTEGER,
        PRIMARY KEY (session_id, turn_number)
      );

      -- Snapshots outlive the turn records they were taken for (rollback truncates records)
      CREATE TABLE backup_snapshots (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
        turn_number INTEGER NOT NULL,
        phase TEXT NOT NULL CHECK (phase IN ('pre', 'post')),
        location_ref TEXT NOT NULL,
        checksum TEXT NOT NULL,
        file_count INTEGER NOT NULL,
        written_at INTEGER NOT NULL
      );

      CREATE INDEX idx_sessions_lifecycle ON sessions(lifecycle);
      CREATE INDEX idx_timers_running ON timers(running);
      CREATE INDEX idx_snapshots_session_turn ON backup_snapshots(session_id, turn_number, phase);
    `,
  },
];

/**
 * Ensure the schema_migrations tracking table exists.
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get the current schema version (highest applied migration).
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/**
 * Run all pending migrations. Each migration runs in its own transaction.
 * Returns the number of migrations applied.
 */
export function migrate(db: Database.Database): number {
  ensureMigrationsTable(db);

  const currentVersion = getCurrentVersion(db);
  const pending = migrations.filter((m) => m.version > currentVersion);

  if (pending.length === 0) return 0;

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  );

  for (const migration of pending) {
    const run = db.transaction(() => {
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
    });
    run();
  }

  return pending.length;
}
