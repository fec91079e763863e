import type { Block } from './block.js';
import type { Session } from './session.js';
import type { DataHandler } from '../handlers/types.js';
import type { DataType, JsonSerializable } from '../types.js';
import type { SettingsParent } from '../settings.js';
import type { SettingValue } from '../types.js';
import { Settings } from '../settings.js';
import { ResultsDictionary } from '../results.js';
import { DataTable } from '../table.js';
import { TrialStatus } from '../state/types.js';
import { transition } from '../state/machine.js';
import { InvalidTransitionError, UninitializedUseError } from '../errors.js';

type HandlerCall = (handler: DataHandler, fileName: string) => string;

/**
 * The base unit of an experiment: one attempt at a task. Create trials
 * through `session.createBlock(n)`; a trial never moves between blocks.
 */
export class Trial implements SettingsParent {
  readonly block: Block;
  readonly session: Session;
  /** Trial settings. These override block settings when set. */
  readonly settings: Settings;

  private _status = TrialStatus.NOT_DONE;
  private _result: ResultsDictionary | null = null;
  private _startTime: number | null = null;
  private _endTime: number | null = null;

  constructor(block: Block) {
    this.block = block;
    this.session = block.session;
    this.settings = Settings.empty(block);
  }

  get status(): TrialStatus {
    return this._status;
  }

  /** Null until the trial begins. */
  get result(): ResultsDictionary | null {
    return this._result;
  }

  get startTime(): number | null {
    return this._startTime;
  }

  get endTime(): number | null {
    return this._endTime;
  }

  /** 1-based position across all blocks, derived on every access. */
  get number(): number {
    return this.session.trials.indexOf(this) + 1;
  }

  /** 1-based position within this trial's block. */
  get numberInBlock(): number {
    return this.block.trials.indexOf(this) + 1;
  }

  /**
   * Begin the trial: move the session's position counters here, start the
   * clock, seed a fresh result row and arm every tracker.
   */
  begin(): void {
    const session = this.session;
    if (!session.hasInitialised) {
      throw new UninitializedUseError('Cannot begin a trial before the session has begun');
    }
    const next = transition(this._status, TrialStatus.IN_PROGRESS);
    if (session.inTrial) {
      throw new InvalidTransitionError(
        `Cannot begin trial ${this.number} while trial ${session.currentTrialNum} is in progress`
      );
    }

    const trialNum = this.number;
    const blockNum = this.block.number;
    session.currentTrialNum = trialNum;
    session.currentBlockNum = blockNum;

    this._status = next;
    this._startTime = session.time;
    this._endTime = null;

    const result = new ResultsDictionary(session.headers, session.adHocHeaderAdd);
    result.set('directory', session.directory);
    result.set('experiment', session.experimentName);
    result.set('ppid', session.ppid);
    result.set('session_num', session.number);
    result.set('trial_num', trialNum);
    result.set('block_num', blockNum);
    result.set('trial_num_in_block', this.numberInBlock);
    result.set('start_time', this._startTime);
    this._result = result;

    for (const tracker of session.trackedObjects) {
      tracker.startRecording();
    }
    session.onTrialBegin.invoke(this);
  }

  /**
   * End the trial: stop the clock, hand every tracker's data to the storage
   * handlers, log the declared settings and mark the trial done. Listeners
   * of onTrialEnd see the trial as DONE.
   */
  end(): void {
    const next = transition(this._status, TrialStatus.DONE);
    const result = this.requireResult();
    const session = this.session;
    // resolved first so a missing setting leaves the trial untouched
    const logged = session.settingsToLog.map((key): [string, SettingValue] => [key, this.settings.getValue(key)]);

    this._endTime = session.time;
    result.set('end_time', this._endTime);

    for (const tracker of session.trackedObjects) {
      tracker.stopRecording();
      this.saveDataTable(tracker.getDataCopy(), tracker.dataName, 'trackers');
    }

    for (const [key, value] of logged) {
      result.set(key, value);
    }

    this._status = next;
    session.onTrialEnd.invoke(this);
    session.afterTrialEnd(this);
  }

  /**
   * Save a table to every active handler. One `<dataName>_location_<i>`
   * column per handler records where it went.
   */
  saveDataTable(table: DataTable, dataName: string, dataType: DataType = 'other'): string[] {
    return this.fanOut(dataName, (h, fileName) =>
      h.handleDataTable(table.clone(), this.session.experimentName, this.session.ppid, this.session.number, fileName, dataType)
    );
  }

  saveJson(obj: JsonSerializable, dataName: string, dataType: DataType = 'other'): string[] {
    return this.fanOut(dataName, (h, fileName) =>
      h.handleJson(structuredClone(obj), this.session.experimentName, this.session.ppid, this.session.number, fileName, dataType)
    );
  }

  saveText(text: string, dataName: string, dataType: DataType = 'other'): string[] {
    return this.fanOut(dataName, (h, fileName) =>
      h.handleText(text, this.session.experimentName, this.session.ppid, this.session.number, fileName, dataType)
    );
  }

  saveBytes(bytes: Uint8Array, dataName: string, dataType: DataType = 'other'): string[] {
    return this.fanOut(dataName, (h, fileName) =>
      h.handleBytes(bytes.slice(), this.session.experimentName, this.session.ppid, this.session.number, fileName, dataType)
    );
  }

  private fanOut(dataName: string, call: HandlerCall): string[] {
    const result = this.requireResult();
    const fileName = `${dataName}_T${String(this.number).padStart(3, '0')}`;
    const locations: string[] = [];
    this.session.activeDataHandlers.forEach((handler, i) => {
      const location = call(handler, fileName).replace(/\\/g, '/');
      result.set(`${dataName}_location_${i}`, location);
      locations.push(location);
    });
    return locations;
  }

  private requireResult(): ResultsDictionary {
    if (!this._result) {
      throw new UninitializedUseError(`Trial ${this.number} has no results yet. Begin the trial first.`);
    }
    return this._result;
  }
}
