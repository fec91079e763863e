import type Database from 'better-sqlite3';
import type { SessionRecord } from '../types.js';

/**
 * Ledger operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

export function recordSessionStart(
  db: Database.Database,
  experiment: string,
  ppid: string,
  sessionNum: number,
  directory: string,
): SessionRecord {
  const result = db.prepare(`
    INSERT INTO sessions (experiment, ppid, session_num, directory) VALUES (?, ?, ?, ?)
  `).run(experiment, ppid, sessionNum, directory);
  return getSessionRecord(db, Number(result.lastInsertRowid))!;
}

export function recordTrialCompleted(db: Database.Database, id: number): void {
  db.prepare(`
    UPDATE sessions SET trials_completed = trials_completed + 1 WHERE id = ?
  `).run(id);
}

export function recordSessionEnd(db: Database.Database, id: number): void {
  db.prepare(`
    UPDATE sessions SET ended_at = CURRENT_TIMESTAMP WHERE id = ?
  `).run(id);
}

export function getSessionRecord(db: Database.Database, id: number): SessionRecord | null {
  return (db.prepare('SELECT * FROM sessions WHERE id = ?').get(id) as SessionRecord | undefined) ?? null;
}

export function listSessions(db: Database.Database, experiment?: string): SessionRecord[] {
  if (experiment) {
    return db.prepare(`
      SELECT * FROM sessions WHERE experiment = ? ORDER BY id
    `).all(experiment) as SessionRecord[];
  }
  return db.prepare('SELECT * FROM sessions ORDER BY id').all() as SessionRecord[];
}

/** Sessions that began but never reached end(), e.g. after a crash. */
export function getOpenSessions(db: Database.Database): SessionRecord[] {
  return db.prepare(`
    SELECT * FROM sessions WHERE ended_at IS NULL ORDER BY id
  `).all() as SessionRecord[];
}

export function countSessionsFor(db: Database.Database, experiment: string, ppid: string): number {
  const row = db.prepare(`
    SELECT COUNT(*) as count FROM sessions WHERE experiment = ? AND ppid = ?
  `).get(experiment, ppid) as { count: number };
  return row.count;
}
