import type { DataTable } from '../table.js';
import type { DataType, JsonSerializable } from '../types.js';
import type { PersistenceWorker } from '../persistence/worker.js';

/** Handed to every active handler when a session begins. */
export interface HandlerContext {
  experiment: string;
  ppid: string;
  sessionNumber: number;
  /** Absolute base folder the session was begun with. */
  basePath: string;
  /** The session's write queue. Handlers queue their writes here. */
  worker: PersistenceWorker;
}

/**
 * A storage backend. Each handle* call receives a snapshot the caller no
 * longer touches, queues the write and returns the location it will land at.
 * The handler is the only authority on durability and format.
 */
export interface DataHandler {
  readonly name: string;
  /** Inactive handlers are skipped by the fan-out. */
  active: boolean;

  setUpForSession(context: HandlerContext): void;

  handleDataTable(
    table: DataTable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string;

  handleJson(
    obj: JsonSerializable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string;

  handleText(
    text: string,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string;

  handleBytes(
    bytes: Uint8Array,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string;

  /** Called from the session's pre-end clean-up, before the drain. */
  cleanUp?(): void;
}
