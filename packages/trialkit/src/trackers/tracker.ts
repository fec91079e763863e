import type { ResultValue } from '../types.js';
import { DataTable } from '../table.js';
import { SchemaViolationError } from '../errors.js';

/**
 * Continuous per-tick sampler. Subclasses supply the values for one tick;
 * the host calls `recordRow(time)` once per tick and the tracker keeps the
 * rows while it is armed.
 */
export abstract class Tracker {
  readonly objectName: string;
  /** Kind of measurement, e.g. "movement" or "memory". */
  readonly measurementDescriptor: string;
  readonly customHeader: readonly string[];

  private recording = false;
  private readonly data: DataTable;

  constructor(objectName: string, measurementDescriptor: string, customHeader: readonly string[]) {
    if (measurementDescriptor.length === 0) {
      throw new SchemaViolationError(`No measurement descriptor has been specified for the tracker on ${objectName}`);
    }
    this.objectName = objectName.replace(/ /g, '_').toLowerCase();
    this.measurementDescriptor = measurementDescriptor;
    this.customHeader = [...customHeader];
    this.data = new DataTable(this.header);
  }

  get header(): string[] {
    return ['time', ...this.customHeader];
  }

  /** Logical name used for saved files and the location columns. */
  get dataName(): string {
    return `${this.objectName}_${this.measurementDescriptor}`;
  }

  get isRecording(): boolean {
    return this.recording;
  }

  get rowCount(): number {
    return this.data.rowCount;
  }

  /** Clears the buffer and arms recording. Snapshot anything you need first. */
  startRecording(): void {
    this.data.clear();
    this.recording = true;
  }

  pauseRecording(): void {
    this.recording = false;
  }

  /** Re-arms after a pause without clearing. */
  resumeRecording(): void {
    this.recording = true;
  }

  stopRecording(): void {
    this.recording = false;
  }

  /**
   * One sampling tick. No-op unless armed. A value vector whose width does not
   * match `customHeader` is a configuration error and throws immediately.
   */
  recordRow(time: number): void {
    if (!this.recording) return;
    const values = this.getCurrentValues();
    if (values.length !== this.customHeader.length) {
      throw new SchemaViolationError(
        `getCurrentValues provided ${values.length} values but expected the same as the number of headers! ${this.customHeader.length}`
      );
    }
    this.data.addValues([time, ...values]);
  }

  /** Read-only snapshot of the buffered rows. */
  getDataCopy(): DataTable {
    return this.data.clone();
  }

  /** Acquire the values for this tick, one per custom header. */
  protected abstract getCurrentValues(): ResultValue[];
}
