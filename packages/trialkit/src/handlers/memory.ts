import type { DataHandler, HandlerContext } from './types.js';
import type { DataTable } from '../table.js';
import type { DataType, JsonSerializable } from '../types.js';
import { sessionNumToName } from '../session/paths.js';
import { UninitializedUseError } from '../errors.js';

export type StoredPayload =
  | { kind: 'table'; lines: string[] }
  | { kind: 'json'; value: JsonSerializable }
  | { kind: 'text'; value: string }
  | { kind: 'bytes'; value: Uint8Array };

export interface StoredItem {
  location: string;
  dataName: string;
  dataType: DataType;
  payload: StoredPayload;
}

/**
 * Keeps every payload in memory. Items appear in `items` when the worker runs
 * the job, so they reflect write order rather than call order.
 */
export class MemoryHandler implements DataHandler {
  readonly name: string;
  active = true;
  readonly items: StoredItem[] = [];
  private context: HandlerContext | null = null;

  constructor(name = 'memory') {
    this.name = name;
  }

  setUpForSession(context: HandlerContext): void {
    this.context = context;
  }

  /** Latest item stored under a data name, if any. */
  find(dataName: string): StoredItem | undefined {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i].dataName === dataName) return this.items[i];
    }
    return undefined;
  }

  handleDataTable(
    table: DataTable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.store(experiment, ppid, sessionNumber, dataName, dataType, { kind: 'table', lines: table.getCsvLines() });
  }

  handleJson(
    obj: JsonSerializable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.store(experiment, ppid, sessionNumber, dataName, dataType, { kind: 'json', value: structuredClone(obj) });
  }

  handleText(
    text: string,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.store(experiment, ppid, sessionNumber, dataName, dataType, { kind: 'text', value: text });
  }

  handleBytes(
    bytes: Uint8Array,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.store(experiment, ppid, sessionNumber, dataName, dataType, { kind: 'bytes', value: bytes.slice() });
  }

  private store(
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
    payload: StoredPayload,
  ): string {
    if (!this.context) {
      throw new UninitializedUseError(`Handler "${this.name}" has not been set up for a session`);
    }
    const location = `${this.name}://${experiment}/${ppid}/${sessionNumToName(sessionNumber)}/${dataName}`;
    this.context.worker.submit(() => {
      this.items.push({ location, dataName, dataType, payload });
    });
    return location;
  }
}
