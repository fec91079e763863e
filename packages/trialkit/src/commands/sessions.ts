import { findProjectRoot, openDbAt } from '../db/connection.js';
import { listSessions, getOpenSessions } from '../db/queries.js';
import { getFlagValue } from '../config.js';
import * as fmt from '../output/format.js';

export async function sessions(args: string[], isJson: boolean): Promise<void> {
  const root = findProjectRoot();
  if (!root) throw new Error('Not in a trialkit project. Run `trialkit init` first.');

  const db = openDbAt(root);
  try {
    const experiment = getFlagValue(args, '--experiment');
    let records = args.includes('--open') ? getOpenSessions(db) : listSessions(db, experiment);
    if (experiment) records = records.filter(r => r.experiment === experiment);

    if (isJson) {
      console.log(JSON.stringify(records, null, 2));
      return;
    }

    fmt.header('Sessions');
    if (records.length === 0) {
      console.log('  No sessions recorded.\n');
      return;
    }
    const rows = records.map(r => [
      String(r.id),
      r.experiment,
      r.ppid,
      String(r.session_num),
      String(r.trials_completed),
      fmt.sessionStateColor(r.ended_at),
      r.started_at,
    ]);
    console.log(fmt.table(['ID', 'Experiment', 'PPID', 'Session', 'Trials', 'State', 'Started'], rows));
    console.log();

    const open = records.filter(r => r.ended_at === null).length;
    if (open > 0) {
      fmt.warn(`${open} session(s) never ended. Their trial_results may be missing.`);
    }
  } finally {
    db.close();
  }
}
