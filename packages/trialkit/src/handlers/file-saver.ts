import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import type { DataHandler, HandlerContext } from './types.js';
import type { DataTable } from '../table.js';
import type { DataType, JsonSerializable } from '../types.js';
import { sessionPaths } from '../session/paths.js';
import { UninitializedUseError } from '../errors.js';

export interface FileSaverOptions {
  /** Return absolute paths instead of paths relative to the session folder. */
  storeAbsolutePaths?: boolean;
  /** Write somewhere other than the session's base path. */
  storagePath?: string;
}

// trial_results and session_info land in the session folder itself
const SUBFOLDERS: Record<DataType, string | null> = {
  trial_results: null,
  session_info: null,
  trackers: 'trackers',
  other: 'other',
};

/**
 * Writes to local files under `<base>/<experiment>/<ppid>/S###/`.
 * Tables become .csv, objects .json, text .txt and bytes .bin. Every write
 * goes through the session's persistence worker.
 */
export class FileSaver implements DataHandler {
  readonly name = 'file';
  active = true;
  readonly storeAbsolutePaths: boolean;
  private readonly storagePath: string | null;
  private context: HandlerContext | null = null;

  constructor(options: FileSaverOptions = {}) {
    this.storeAbsolutePaths = options.storeAbsolutePaths ?? false;
    this.storagePath = options.storagePath ? path.resolve(options.storagePath) : null;
  }

  setUpForSession(context: HandlerContext): void {
    this.context = context;
  }

  handleDataTable(
    table: DataTable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    const lines = table.getCsvLines();
    return this.write(experiment, ppid, sessionNumber, dataName, dataType, 'csv', lines.join('\n') + '\n');
  }

  handleJson(
    obj: JsonSerializable,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    const text = JSON.stringify(obj, null, 2);
    return this.write(experiment, ppid, sessionNumber, dataName, dataType, 'json', text);
  }

  handleText(
    text: string,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.write(experiment, ppid, sessionNumber, dataName, dataType, 'txt', text);
  }

  handleBytes(
    bytes: Uint8Array,
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
  ): string {
    return this.write(experiment, ppid, sessionNumber, dataName, dataType, 'bin', bytes.slice());
  }

  /** Absolute target for a payload; exposed so callers can predict locations. */
  targetPath(
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
    ext: string,
  ): string {
    const ctx = this.requireContext();
    const base = this.storagePath ?? ctx.basePath;
    const { fullPath } = sessionPaths(base, experiment, ppid, sessionNumber);
    const sub = SUBFOLDERS[dataType];
    const dir = sub ? path.join(fullPath, sub) : fullPath;
    return path.join(dir, `${dataName}.${ext}`);
  }

  private write(
    experiment: string,
    ppid: string,
    sessionNumber: number,
    dataName: string,
    dataType: DataType,
    ext: string,
    contents: string | Uint8Array,
  ): string {
    const ctx = this.requireContext();
    const target = this.targetPath(experiment, ppid, sessionNumber, dataName, dataType, ext);

    ctx.worker.submit(async () => {
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.writeFile(target, contents);
    });

    if (this.storeAbsolutePaths) return target;
    const sessionDir = sessionPaths(this.storagePath ?? ctx.basePath, experiment, ppid, sessionNumber).fullPath;
    return path.relative(sessionDir, target);
  }

  private requireContext(): HandlerContext {
    if (!this.context) {
      throw new UninitializedUseError('FileSaver has not been set up for a session');
    }
    return this.context;
  }
}
