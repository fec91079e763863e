import type Database from 'better-sqlite3';
import type { Session } from './session/session.js';
import { recordSessionStart, recordTrialCompleted, recordSessionEnd } from './db/queries.js';

/**
 * Record a session's lifecycle in the ledger: a row on begin, a count per
 * completed trial, and `ended_at` once every write has drained.
 * Returns a function that detaches the listeners.
 */
export function attachLedger(session: Session, db: Database.Database): () => void {
  let recordId: number | null = null;

  const detach = [
    session.onSessionBegin.add(s => {
      recordId = recordSessionStart(db, s.experimentName, s.ppid, s.number, s.directory).id;
    }),
    session.onTrialEnd.add(() => {
      if (recordId !== null) recordTrialCompleted(db, recordId);
    }),
    session.onSessionEnd.add(() => {
      if (recordId !== null) recordSessionEnd(db, recordId);
      recordId = null;
    }),
  ];

  return () => {
    for (const off of detach) off();
  };
}
