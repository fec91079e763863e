import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { performance } from 'node:perf_hooks';
import type { DataHandler, HandlerContext } from '../handlers/types.js';
import type { Tracker } from '../trackers/tracker.js';
import type { DataType, JsonSerializable, ResultValue, SettingsDict } from '../types.js';
import type { SettingsParent } from '../settings.js';
import { Settings } from '../settings.js';
import { Block } from './block.js';
import type { Trial } from './trial.js';
import { DataTable } from '../table.js';
import { buildResultsTable } from '../results.js';
import { EventList } from '../events.js';
import { PersistenceWorker } from '../persistence/worker.js';
import { TrialStatus, SessionPhase } from '../state/types.js';
import { sessionTransition } from '../state/machine.js';
import { sessionPaths, sessionExists } from './paths.js';
import type { SessionPaths } from './paths.js';
import {
  NoSuchBlockError,
  NoSuchTrialError,
  PathNotFoundError,
  UninitializedUseError,
} from '../errors.js';
import * as fmt from '../output/format.js';

/** Columns every trial row starts with, in this order. */
export const BASE_HEADERS: readonly string[] = [
  'directory',
  'experiment',
  'ppid',
  'session_num',
  'trial_num',
  'block_num',
  'trial_num_in_block',
  'start_time',
  'end_time',
];

export interface SessionOptions {
  /** Accept result columns that were not declared up front. Default false. */
  adHocHeaderAdd?: boolean;
  /** End the session as soon as the last trial ends. Default false. */
  endAfterLastTrial?: boolean;
  /** Queue a settings.json snapshot on begin. Default true. */
  copySessionSettings?: boolean;
  /** Queue a participant_details table on begin. Default true. */
  copyParticipantDetails?: boolean;
  customHeaders?: string[];
  settingsToLog?: string[];
  trackedObjects?: Tracker[];
  dataHandlers?: DataHandler[];
  /** Seconds, monotonic. Defaults to performance.now() / 1000. */
  clock?: () => number;
  worker?: PersistenceWorker;
}

/**
 * A single run of an experiment for one participant. Owns the blocks, the
 * root settings, the position counters and the write queue.
 *
 * Lifecycle: inert → begin() → trials → end() → inert again (reusable).
 */
export class Session implements SettingsParent {
  adHocHeaderAdd: boolean;
  endAfterLastTrial: boolean;
  copySessionSettings: boolean;
  copyParticipantDetails: boolean;

  /** Dependent variables to be recorded in each trial's results. */
  customHeaders: string[];
  /** Settings (independent variables) copied into each trial's results. */
  settingsToLog: string[];
  trackedObjects: Tracker[];
  dataHandlers: DataHandler[];

  readonly onSessionBegin = new EventList<Session>();
  readonly onTrialBegin = new EventList<Trial>();
  readonly onTrialEnd = new EventList<Trial>();
  /** Raised during end(), after the results are queued and before the drain. */
  readonly onPreSessionEnd = new EventList<Session>();
  /** Raised once every queued write has finished. Safe to exit after this. */
  readonly onSessionEnd = new EventList<Session>();

  experimentName = '';
  ppid = '';
  /** Session number for this participant. */
  number = 0;
  /** Currently active trial number; 0 before the first trial begins. */
  currentTrialNum = 0;
  /** Currently active block number; 0 before the first trial begins. */
  currentBlockNum = 0;
  participantDetails: SettingsDict = {};

  private _settings: Settings = Settings.empty();
  private _blocks: Block[] = [];
  private _basePath: string | null = null;
  private phase = SessionPhase.INERT;
  private endPromise: Promise<void> | null = null;
  private readonly clock: () => number;
  private readonly worker: PersistenceWorker;

  constructor(options: SessionOptions = {}) {
    this.adHocHeaderAdd = options.adHocHeaderAdd ?? false;
    this.endAfterLastTrial = options.endAfterLastTrial ?? false;
    this.copySessionSettings = options.copySessionSettings ?? true;
    this.copyParticipantDetails = options.copyParticipantDetails ?? true;
    this.customHeaders = [...(options.customHeaders ?? [])];
    this.settingsToLog = [...(options.settingsToLog ?? [])];
    this.trackedObjects = [...(options.trackedObjects ?? [])];
    this.dataHandlers = [...(options.dataHandlers ?? [])];
    this.clock = options.clock ?? (() => performance.now() / 1000);
    this.worker = options.worker ?? new PersistenceWorker();
  }

  // ── State ──────────────────────────────────────────────────

  get hasInitialised(): boolean {
    return this.phase === SessionPhase.INITIALISED;
  }

  /** True while end() is flushing. */
  get isEnding(): boolean {
    return this.phase === SessionPhase.ENDING;
  }

  get settings(): Settings {
    return this._settings;
  }

  get blocks(): readonly Block[] {
    return this._blocks;
  }

  /** Every trial, block order then trial order. */
  get trials(): Trial[] {
    return this._blocks.flatMap(b => b.trials);
  }

  get time(): number {
    return this.clock();
  }

  get inTrial(): boolean {
    return this.currentTrialNum !== 0 && this.currentTrial.status === TrialStatus.IN_PROGRESS;
  }

  get activeDataHandlers(): DataHandler[] {
    return this.dataHandlers.filter(h => h.active);
  }

  /** One location column per tracker per active handler. */
  get trackingHeaders(): string[] {
    const handlerCount = this.activeDataHandlers.length;
    const headers: string[] = [];
    for (const tracker of this.trackedObjects) {
      for (let i = 0; i < handlerCount; i++) {
        headers.push(`${tracker.dataName}_location_${i}`);
      }
    }
    return headers;
  }

  /** Declared columns of a trial's result row. */
  get headers(): string[] {
    return [...BASE_HEADERS, ...this.settingsToLog, ...this.customHeaders, ...this.trackingHeaders];
  }

  // ── Paths ──────────────────────────────────────────────────

  get basePath(): string {
    if (this._basePath === null) {
      throw new UninitializedUseError('Session has no base path until it has begun');
    }
    return this._basePath;
  }

  get paths(): SessionPaths {
    return sessionPaths(this.basePath, this.experimentName, this.ppid, this.number);
  }

  get experimentPath(): string { return this.paths.experimentPath; }
  get participantPath(): string { return this.paths.participantPath; }
  get fullPath(): string { return this.paths.fullPath; }
  get folderName(): string { return this.paths.folderName; }

  /** `experiment/ppid/S###`, the value of each row's directory column. */
  get directory(): string {
    return this.paths.relativePath;
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /**
   * Initialise the session. Fails when `basePath` is not an existing directory; an existing
   * session folder is only a warning (its files may be overwritten).
   */
  begin(
    experimentName: string,
    ppid: string,
    basePath: string,
    sessionNumber = 1,
    participantDetails: SettingsDict = {},
    settings: Settings = Settings.empty(),
  ): void {
    const resolved = path.resolve(basePath);
    if (!fs.statSync(resolved, { throwIfNoEntry: false })?.isDirectory()) {
      throw new PathNotFoundError(resolved, `Initialising session failed, cannot find ${resolved}`);
    }
    this.phase = sessionTransition(this.phase, SessionPhase.INITIALISED);

    this.experimentName = experimentName;
    this.ppid = ppid;
    this.number = sessionNumber;
    this._basePath = resolved;
    this.participantDetails = { ...participantDetails };
    this._settings = settings;
    this.currentTrialNum = 0;
    this.currentBlockNum = 0;

    if (sessionExists(experimentName, ppid, resolved, sessionNumber)) {
      fmt.warn(`Session already exists! Continuing will overwrite: ${this.fullPath}`);
    }

    if (!this.worker.isActive) this.worker.begin();
    const context: HandlerContext = {
      experiment: experimentName,
      ppid,
      sessionNumber,
      basePath: resolved,
      worker: this.worker,
    };
    for (const handler of this.activeDataHandlers) {
      handler.setUpForSession(context);
    }

    this.onSessionBegin.invoke(this);

    if (this.copySessionSettings) {
      this.writeDictToSessionFolder(structuredClone(settings.baseDict), 'settings');
    }
    if (this.copyParticipantDetails && Object.keys(this.participantDetails).length > 0) {
      const keys = Object.keys(this.participantDetails);
      const table = new DataTable(keys);
      table.addCompleteRow(keys.map((k): [string, ResultValue] => [k, this.participantDetails[k]]));
      this.saveDataTable(table, 'participant_details', 'session_info');
    }
  }

  /**
   * End the session: close any open trial, queue the results table, run the
   * clean-up listeners, then wait for every queued write. The session is reset
   * and reusable afterwards, even when a write failed (the failure is thrown
   * as a PersistenceError once the reset is done). If the open trial cannot
   * end, the results are still saved and its error is thrown after the reset.
   *
   * A no-op when the session has not begun. Calls made while ending share
   * the same promise.
   */
  end(): Promise<void> {
    if (this.endPromise) return this.endPromise;
    if (this.phase !== SessionPhase.INITIALISED) return Promise.resolve();

    this.endPromise = this.runEnd().finally(() => {
      this.endPromise = null;
    });
    return this.endPromise;
  }

  private async runEnd(): Promise<void> {
    this.phase = sessionTransition(this.phase, SessionPhase.ENDING);
    let trialError: unknown = null;
    try {
      try {
        if (this.currentTrialNum !== 0 && this.currentTrial.status === TrialStatus.IN_PROGRESS) {
          try {
            this.currentTrial.end();
          } catch (err) {
            // the rows already collected are still saved; rethrown below
            trialError = err;
          }
        }
        this.saveResults();
        for (const handler of this.activeDataHandlers) handler.cleanUp?.();
        this.onPreSessionEnd.invoke(this);
      } finally {
        // nothing can stop jobs that are already queued
        await this.worker.end();
      }
      if (trialError !== null) throw trialError;
      this.onSessionEnd.invoke(this);
    } finally {
      this.reset();
    }
    fmt.info('Ended session.');
  }

  private reset(): void {
    this.currentTrialNum = 0;
    this.currentBlockNum = 0;
    this._blocks = [];
    this.phase = sessionTransition(this.phase, SessionPhase.INERT);
  }

  /**
   * Called by Trial.end() after the onTrialEnd listeners, so they still write
   * into the results before an automatic end queues them.
   * @internal
   */
  afterTrialEnd(trial: Trial): void {
    if (!this.endAfterLastTrial || this.phase !== SessionPhase.INITIALISED) return;
    if (trial !== this.lastTrial) return;
    // the promise is kept in endPromise; awaiting session.end() surfaces a failure
    this.end().catch((err: unknown) => {
      const msg = err instanceof Error ? err.message : String(err);
      fmt.error(`Session ended after the last trial with an error: ${msg}`);
    });
  }

  /** Ends the session if the supplied trial is the last trial. */
  async endIfLastTrial(trial: Trial): Promise<boolean> {
    if (trial !== this.lastTrial) return false;
    await this.end();
    return true;
  }

  // ── Blocks & trials ────────────────────────────────────────

  /**
   * Create a block and append it to the session. Without an argument the
   * block is empty; otherwise the count must be a positive integer.
   */
  createBlock(numberOfTrials?: number): Block {
    if (numberOfTrials !== undefined && (!Number.isInteger(numberOfTrials) || numberOfTrials < 1)) {
      throw new RangeError(`Invalid number of trials supplied: ${numberOfTrials}`);
    }
    const block = new Block(numberOfTrials ?? 0, this);
    this._blocks.push(block);
    return block;
  }

  /**
   * Currently active trial (or the most recent one between trials), or the
   * trial with the given 1-based number.
   */
  getTrial(trialNumber?: number): Trial {
    if (trialNumber === undefined) {
      if (this.currentTrialNum === 0) {
        throw new NoSuchTrialError(
          'There is no trial zero. If you are at the start of the experiment please use nextTrial to get the first trial'
        );
      }
      trialNumber = this.currentTrialNum;
    }
    const trial = Number.isInteger(trialNumber) ? this.trials[trialNumber - 1] : undefined;
    if (!trial) throw new NoSuchTrialError(`There is no trial ${trialNumber}`);
    return trial;
  }

  get currentTrial(): Trial {
    return this.getTrial();
  }

  get nextTrial(): Trial {
    const trial = this.trials[this.currentTrialNum];
    if (!trial) throw new NoSuchTrialError('There is no next trial. Reached the end of trial list.');
    return trial;
  }

  get prevTrial(): Trial {
    const idx = this.currentTrialNum - 2;
    const trial = idx >= 0 ? this.trials[idx] : undefined;
    if (!trial) throw new NoSuchTrialError('There is no previous trial. Probably, currently at the start of session.');
    return trial;
  }

  get firstTrial(): Trial {
    if (this._blocks.length === 0) {
      throw new NoSuchTrialError('There is no first trial because no blocks have been created!');
    }
    const first = this._blocks[0];
    if (first.trials.length === 0) {
      throw new NoSuchTrialError('There is no first trial. No trials exist in the first block.');
    }
    return first.trials[0];
  }

  get lastTrial(): Trial {
    if (this._blocks.length === 0) {
      throw new NoSuchTrialError('There is no last trial because no blocks have been created!');
    }
    const last = this._blocks[this._blocks.length - 1];
    if (last.trials.length === 0) {
      throw new NoSuchTrialError('There is no last trial. No trials exist in the last block.');
    }
    return last.trials[last.trials.length - 1];
  }

  getBlock(blockNumber?: number): Block {
    const num = blockNumber ?? this.currentBlockNum;
    if (num === 0 && blockNumber === undefined) {
      throw new NoSuchBlockError('There is no current block before the first trial begins');
    }
    const block = Number.isInteger(num) ? this._blocks[num - 1] : undefined;
    if (!block) throw new NoSuchBlockError(`There is no block ${num}`);
    return block;
  }

  get currentBlock(): Block {
    return this.getBlock();
  }

  beginNextTrial(): Trial {
    const trial = this.nextTrial;
    trial.begin();
    return trial;
  }

  /** Begins the next trial if there is one; returns null at the end of the list. */
  beginNextTrialSafe(): Trial | null {
    if (this.currentTrialNum >= this.trials.length) return null;
    return this.beginNextTrial();
  }

  endCurrentTrial(): void {
    this.currentTrial.end();
  }

  // ── Persistence ────────────────────────────────────────────

  /** Session-level table save through every active handler. Returns the locations. */
  saveDataTable(table: DataTable, dataName: string, dataType: DataType = 'session_info'): string[] {
    this.requireInitialised('save a table');
    return this.activeDataHandlers.map(h =>
      h.handleDataTable(table.clone(), this.experimentName, this.ppid, this.number, dataName, dataType)
    );
  }

  /** Write a string-keyed object to `<objectName>.json` in the session folder. */
  writeDictToSessionFolder(dict: JsonSerializable, objectName: string): string[] {
    this.requireInitialised('write dictionary');
    return this.activeDataHandlers.map(h =>
      h.handleJson(structuredClone(dict), this.experimentName, this.ppid, this.number, objectName, 'session_info')
    );
  }

  /** Queue a copy of an existing file into the session folder. */
  copyFileToSessionFolder(filePath: string): string {
    this.requireInitialised('copy a file');
    const target = path.join(this.fullPath, path.basename(filePath));
    this.worker.submit(async () => {
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.copyFile(filePath, target);
    });
    return target;
  }

  /** Read a JSON settings file into a parentless Settings node. */
  async readSettingsFile(filePath: string): Promise<Settings> {
    const text = await fsp.readFile(filePath, 'utf-8');
    return Settings.fromJson(text);
  }

  private saveResults(): void {
    const table = buildResultsTable(this.trials);
    this.saveDataTable(table, 'trial_results', 'trial_results');
  }

  private requireInitialised(action: string): void {
    if (this.phase === SessionPhase.INERT) {
      throw new UninitializedUseError(`Can't ${action} before session has initialised!`);
    }
  }
}
