import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { runMigrations } from './migrations.js';

export const PROJECT_DIR = '.trialkit';

/**
 * Walk up from startDir looking for a directory containing `.trialkit/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();
  const root = path.parse(dir).root;

  while (true) {
    if (fs.existsSync(path.join(dir, PROJECT_DIR))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir || parent === root) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Open .trialkit/trialkit.db under the given project root with WAL mode.
 * Runs migrations before returning.
 */
export function openDbAt(projectRoot: string): Database.Database {
  const dir = path.join(projectRoot, PROJECT_DIR);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(path.join(dir, 'trialkit.db'));
  db.pragma('journal_mode = WAL');
  runMigrations(db);
  return db;
}

/**
 * Open a fresh in-memory database for testing.
 */
export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  runMigrations(db);
  return db;
}
