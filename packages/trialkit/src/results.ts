import type { ResultValue } from './types.js';
import { SchemaViolationError } from './errors.js';
import { DataTable } from './table.js';
import type { DataRow } from './table.js';

/**
 * Ordered column → value record for one trial.
 *
 * Pre-seeded with the declared headers (empty values). In strict mode
 * (`adHocHeaderAdd` false) writing an undeclared column throws at the call
 * site; in lenient mode it is appended and picked up by the results table.
 */
export class ResultsDictionary {
  private readonly values = new Map<string, ResultValue>();
  readonly adHocHeaderAdd: boolean;

  constructor(initialHeaders: readonly string[], adHocHeaderAdd: boolean) {
    this.adHocHeaderAdd = adHocHeaderAdd;
    for (const h of initialHeaders) this.values.set(h, undefined);
  }

  get keys(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): ResultValue {
    return this.values.get(key);
  }

  set(key: string, value: ResultValue): void {
    if (!this.values.has(key) && !this.adHocHeaderAdd) {
      throw new SchemaViolationError(
        `Result "${key}" is not a declared header. Add it to customHeaders or enable adHocHeaderAdd.`
      );
    }
    this.values.set(key, value);
  }

  entries(): Array<[string, ResultValue]> {
    return [...this.values.entries()];
  }

  toRecord(): Record<string, ResultValue> {
    return Object.fromEntries(this.values);
  }
}

/** Anything that may carry a result row, i.e. a trial. */
export interface HasResult {
  readonly result: ResultsDictionary | null;
}

/**
 * Reconcile heterogeneous result rows into one table.
 *
 * Pass 1 collects the union of every row's keys in first-appearance order;
 * pass 2 emits one row per item that has a result, leaving absent columns
 * empty. Items without a result (never begun) contribute nothing.
 */
export function buildResultsTable(items: Iterable<HasResult>): DataTable {
  const rows: ResultsDictionary[] = [];
  for (const item of items) {
    if (item.result) rows.push(item.result);
  }

  const headers = new Set<string>();
  for (const r of rows) {
    for (const key of r.keys) headers.add(key);
  }

  const table = new DataTable([...headers]);
  for (const r of rows) {
    const row: DataRow = [];
    for (const h of headers) {
      row.push([h, r.has(h) ? r.get(h) : '']);
    }
    table.addCompleteRow(row);
  }
  return table;
}
