import type Database from 'better-sqlite3';

/**
 * Migration system using user_version pragma; no migration table needed.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // Migration 001: v0 → v1, session ledger
  (db) => {
    db.exec(`
      CREATE TABLE sessions (
        id INTEGER PRIMARY KEY,
        experiment TEXT NOT NULL,
        ppid TEXT NOT NULL,
        session_num INTEGER NOT NULL,
        directory TEXT NOT NULL,
        trials_completed INTEGER NOT NULL DEFAULT 0,
        started_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        ended_at DATETIME
      );

      CREATE INDEX idx_sessions_identity ON sessions(experiment, ppid, session_num);
    `);
  },
];

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = db.pragma('user_version', { simple: true }) as number;

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}

export function schemaVersion(): number {
  return migrations.length;
}
