import * as fs from 'node:fs';
import * as path from 'node:path';
import { findProjectRoot, openDbAt, PROJECT_DIR } from '../db/connection.js';
import { countSessionsFor } from '../db/queries.js';
import { sessionExists, sessionPaths } from '../session/paths.js';
import { loadConfig, getFlagValue, getIntFlag, positionalArgs } from '../config.js';
import * as fmt from '../output/format.js';

export interface CheckResult {
  experiment: string;
  ppid: string;
  sessionNumber: number;
  path: string;
  exists: boolean;
  /** Lowest session number with no folder on disk. */
  nextFree: number;
  /** Sessions the ledger has recorded for this participant. */
  recorded: number;
}

export function nextFreeSessionNumber(basePath: string, experiment: string, ppid: string): number {
  let n = 1;
  while (sessionExists(experiment, ppid, basePath, n)) n++;
  return n;
}

export function checkSession(
  root: string,
  experiment: string,
  ppid: string,
  sessionNumber: number,
  basePath?: string,
): CheckResult {
  const base = path.resolve(root, basePath ?? loadConfig(root).output.base_path);
  return {
    experiment,
    ppid,
    sessionNumber,
    path: sessionPaths(base, experiment, ppid, sessionNumber).fullPath,
    exists: sessionExists(experiment, ppid, base, sessionNumber),
    nextFree: nextFreeSessionNumber(base, experiment, ppid),
    recorded: recordedSessions(root, experiment, ppid),
  };
}

/** Ledger count, or 0 outside a project. Never creates the ledger. */
function recordedSessions(root: string, experiment: string, ppid: string): number {
  if (!fs.existsSync(path.join(root, PROJECT_DIR))) return 0;
  const db = openDbAt(root);
  try {
    return countSessionsFor(db, experiment, ppid);
  } finally {
    db.close();
  }
}

export async function check(args: string[], isJson: boolean): Promise<void> {
  const [experiment, ppid] = positionalArgs(args, ['--base', '--session']);
  if (!experiment || !ppid) {
    throw new Error('Usage: trialkit check <experiment> <ppid> [--base DIR] [--session N]');
  }
  const root = findProjectRoot() ?? process.cwd();
  const result = checkSession(root, experiment, ppid, getIntFlag(args, '--session', 1), getFlagValue(args, '--base'));

  if (isJson) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  fmt.header(`${experiment} / ${ppid}`);
  if (result.exists) {
    fmt.warn(`Session ${result.sessionNumber} already exists at ${result.path}. Running it again will overwrite its files.`);
  } else {
    fmt.success(`Session ${result.sessionNumber} is free: ${result.path}`);
  }
  console.log(`  Next free session: ${result.nextFree}`);
  console.log(`  Recorded in ledger: ${result.recorded}`);
}
