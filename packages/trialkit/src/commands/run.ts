import * as path from 'node:path';
import * as readline from 'node:readline/promises';
import { mkdirSafe } from '@trialkit/shared';
import { Session } from '../session/session.js';
import type { Trial } from '../session/trial.js';
import { FileSaver } from '../handlers/file-saver.js';
import type { DataHandler } from '../handlers/types.js';
import { ProcessTracker } from '../trackers/process.js';
import type { Tracker } from '../trackers/tracker.js';
import { findProjectRoot, openDbAt } from '../db/connection.js';
import { attachLedger } from '../ledger.js';
import {
  loadConfig,
  sessionOptionsFromConfig,
  getFlagValue,
  getIntFlag,
  positionalArgs,
} from '../config.js';
import { loadProtocol, applyProtocol, protocolSettings } from '../protocol.js';
import { formatValue } from '../table.js';
import type { SettingsDict } from '../types.js';
import * as fmt from '../output/format.js';

const VALUE_FLAGS = ['--ppid', '--base', '--session', '--detail'];

/** Columns the interactive task fills on every trial. */
export const RESPONSE_HEADERS = ['response', 'response_time'];

export type Ask = (prompt: string, signal: AbortSignal) => Promise<string>;

export interface RunOptions {
  root: string;
  protocolPath: string;
  ppid: string;
  /** Explicit base path; must exist. Defaults to the configured one, created on demand. */
  basePath?: string;
  sessionNumber?: number;
  participantDetails?: SettingsDict;
  ask: Ask;
  signal?: AbortSignal;
  /** Replaces the default FileSaver. */
  dataHandlers?: DataHandler[];
}

export interface RunSummary {
  experiment: string;
  fullPath: string;
  trialsCompleted: number;
  interrupted: boolean;
}

function trackersFromNames(names: readonly string[]): Tracker[] {
  return names.map(name => {
    switch (name) {
      case 'process':
        return new ProcessTracker();
      default:
        throw new Error(`Unknown tracker "${name}" in config. Available: process`);
    }
  });
}

/** `--detail key=value`, repeatable. */
export function parseDetails(args: string[]): SettingsDict {
  const details: SettingsDict = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] !== '--detail' || i + 1 >= args.length) continue;
    const pair = args[i + 1];
    const eq = pair.indexOf('=');
    if (eq < 1) throw new Error(`--detail expects key=value, got "${pair}"`);
    details[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return details;
}

/** What the participant sees for a trial: its `prompt` setting, else `word`. */
export function promptFor(trial: Trial, total: number): string {
  const stimulus = trial.settings.getValueOr('prompt', trial.settings.getValueOr('word', ''));
  const label = `Trial ${trial.number}/${total} (block ${trial.block.number})`;
  const text = formatValue(stimulus);
  return text ? `${label} ${text}\n> ` : `${label}\n> `;
}

/**
 * Run a protocol as an interactive session. One answer per trial; trackers
 * are sampled on the configured interval while a trial is open. The session
 * is always ended, so results written so far are flushed even on abort.
 */
export async function runProtocol(options: RunOptions): Promise<RunSummary> {
  const config = loadConfig(options.root);
  const { protocol, warnings } = loadProtocol(options.protocolPath);
  for (const w of warnings) fmt.warn(w);

  let basePath: string;
  if (options.basePath) {
    basePath = path.resolve(options.root, options.basePath);
  } else {
    basePath = path.resolve(options.root, config.output.base_path);
    mkdirSafe(basePath);
  }

  const trackers = trackersFromNames(config.tracking.trackers);
  const session = new Session({
    ...sessionOptionsFromConfig(config),
    customHeaders: RESPONSE_HEADERS,
    trackedObjects: trackers,
    dataHandlers: options.dataHandlers ?? [
      new FileSaver({ storeAbsolutePaths: config.output.store_absolute_paths }),
    ],
  });
  const signal = options.signal ?? new AbortController().signal;

  let trialsCompleted = 0;
  let interrupted = false;
  session.onTrialEnd.add(() => { trialsCompleted++; });

  const db = openDbAt(options.root);
  const detach = attachLedger(session, db);
  try {
    applyProtocol(session, protocol);
    session.begin(
      protocol.experiment,
      options.ppid,
      basePath,
      options.sessionNumber ?? 1,
      options.participantDetails ?? {},
      protocolSettings(protocol),
    );
    const fullPath = session.fullPath;
    const total = session.trials.length;

    const sampler = setInterval(() => {
      for (const tracker of trackers) tracker.recordRow(session.time);
    }, config.tracking.sample_interval_ms);

    try {
      let trial = signal.aborted ? null : session.beginNextTrialSafe();
      while (trial) {
        const shownAt = session.time;
        let answer: string;
        try {
          answer = await options.ask(promptFor(trial, total), signal);
        } catch (err: unknown) {
          if (!signal.aborted) throw err;
          interrupted = true;
          break;
        }
        trial.result?.set('response', answer.trim());
        trial.result?.set('response_time', session.time - shownAt);
        trial.end();
        trial = signal.aborted || !session.hasInitialised ? null : session.beginNextTrialSafe();
      }
      if (signal.aborted) interrupted = true;
    } finally {
      clearInterval(sampler);
      await session.end();
    }

    return { experiment: protocol.experiment, fullPath, trialsCompleted, interrupted };
  } finally {
    detach();
    db.close();
  }
}

export async function run(args: string[]): Promise<void> {
  const [protocolPath] = positionalArgs(args, VALUE_FLAGS);
  const ppid = getFlagValue(args, '--ppid');
  if (!protocolPath || !ppid) {
    throw new Error('Usage: trialkit run <protocol.json> --ppid ID [--base DIR] [--session N] [--detail key=value]');
  }

  const root = findProjectRoot() ?? process.cwd();
  const controller = new AbortController();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    fmt.warn('Interrupt received. Ending session...');
    controller.abort();
  });
  rl.on('close', () => controller.abort());

  try {
    const summary = await runProtocol({
      root,
      protocolPath: path.resolve(protocolPath),
      ppid,
      basePath: getFlagValue(args, '--base'),
      sessionNumber: getIntFlag(args, '--session', 1),
      participantDetails: parseDetails(args),
      ask: (prompt, signal) => rl.question(prompt, { signal }),
      signal: controller.signal,
    });

    const what = `${summary.trialsCompleted} trial(s) of ${summary.experiment}`;
    if (summary.interrupted) {
      fmt.warn(`Session interrupted after ${what}. Saved to ${summary.fullPath}`);
    } else {
      fmt.success(`Session complete: ${what} saved to ${summary.fullPath}`);
    }
  } finally {
    rl.close();
  }
}
