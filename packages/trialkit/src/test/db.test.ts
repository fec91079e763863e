import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { openTestDb, openDbAt, findProjectRoot, PROJECT_DIR } from '../db/connection.js';
import { schemaVersion } from '../db/migrations.js';
import {
  recordSessionStart,
  recordTrialCompleted,
  recordSessionEnd,
  getSessionRecord,
  listSessions,
  getOpenSessions,
  countSessionsFor,
} from '../db/queries.js';
import { attachLedger } from '../ledger.js';
import { Session } from '../session/session.js';
import { MemoryHandler } from '../handlers/memory.js';
import type Database from 'better-sqlite3';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

describe('Migrations', () => {
  it('creates the sessions table', () => {
    const tables = db.prepare(`
      SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'
    `).all() as Array<{ name: string }>;
    assert.deepEqual(tables.map(t => t.name), ['sessions']);
  });

  it('sets user_version to the latest schema', () => {
    assert.equal(db.pragma('user_version', { simple: true }), schemaVersion());
  });
});

describe('Session ledger queries', () => {
  it('records a session start with defaults', () => {
    const rec = recordSessionStart(db, 'exp', 'P01', 1, 'exp/P01/S001');
    assert.equal(rec.experiment, 'exp');
    assert.equal(rec.session_num, 1);
    assert.equal(rec.trials_completed, 0);
    assert.equal(rec.ended_at, null);
    assert.equal(typeof rec.started_at, 'string');
  });

  it('counts trials and marks the end', () => {
    const rec = recordSessionStart(db, 'exp', 'P01', 1, 'exp/P01/S001');
    recordTrialCompleted(db, rec.id);
    recordTrialCompleted(db, rec.id);
    recordSessionEnd(db, rec.id);
    const after = getSessionRecord(db, rec.id);
    assert.equal(after?.trials_completed, 2);
    assert.notEqual(after?.ended_at, null);
  });

  it('returns null for an unknown id', () => {
    assert.equal(getSessionRecord(db, 99), null);
  });

  it('lists, filters and counts', () => {
    const a = recordSessionStart(db, 'exp', 'P01', 1, 'exp/P01/S001');
    recordSessionStart(db, 'exp', 'P01', 2, 'exp/P01/S002');
    recordSessionStart(db, 'other', 'P02', 1, 'other/P02/S001');
    recordSessionEnd(db, a.id);

    assert.equal(listSessions(db).length, 3);
    assert.deepEqual(listSessions(db, 'exp').map(r => r.session_num), [1, 2]);
    assert.deepEqual(getOpenSessions(db).map(r => r.directory), ['exp/P01/S002', 'other/P02/S001']);
    assert.equal(countSessionsFor(db, 'exp', 'P01'), 2);
    assert.equal(countSessionsFor(db, 'exp', 'P02'), 0);
  });
});

describe('attachLedger()', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialkit-ledger-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('follows a session from begin to end', async () => {
    const session = new Session({ dataHandlers: [new MemoryHandler()] });
    attachLedger(session, db);
    session.createBlock(3);
    session.begin('exp', 'P07', tmpDir, 2);
    session.beginNextTrial().end();
    session.beginNextTrial().end();

    const open = getOpenSessions(db);
    assert.equal(open.length, 1);
    assert.equal(open[0].directory, 'exp/P07/S002');
    assert.equal(open[0].trials_completed, 2);

    await session.end();
    assert.equal(getOpenSessions(db).length, 0);
    assert.equal(listSessions(db)[0].trials_completed, 2);
  });

  it('stops recording once detached', async () => {
    const session = new Session({ dataHandlers: [new MemoryHandler()] });
    const detach = attachLedger(session, db);
    detach();
    session.begin('exp', 'P01', tmpDir);
    await session.end();
    assert.equal(listSessions(db).length, 0);
  });
});

describe('Project root', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialkit-root-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('findProjectRoot walks up to the directory holding the project folder', () => {
    fs.mkdirSync(path.join(tmpDir, PROJECT_DIR));
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    assert.equal(findProjectRoot(nested), tmpDir);
  });

  it('openDbAt creates the database file', () => {
    const fileDb = openDbAt(tmpDir);
    fileDb.close();
    assert.equal(fs.existsSync(path.join(tmpDir, PROJECT_DIR, 'trialkit.db')), true);
  });
});
