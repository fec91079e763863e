import type { ResultValue } from './types.js';
import { SchemaViolationError } from './errors.js';

/** One complete row as (column, value) pairs. Order is free; the table re-orders. */
export type DataRow = Array<[string, ResultValue]>;

/**
 * Rectangular, header-driven table. Every stored row has exactly one value
 * per header, so every CSV line has the same field count.
 */
export class DataTable {
  readonly headers: readonly string[];
  private readonly rows: ResultValue[][] = [];
  private readonly index: Map<string, number>;

  constructor(headers: readonly string[]) {
    this.index = new Map();
    headers.forEach((h, i) => {
      if (this.index.has(h)) {
        throw new SchemaViolationError(`Duplicate column "${h}" in table header`);
      }
      this.index.set(h, i);
    });
    this.headers = [...headers];
  }

  get rowCount(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.index.has(name);
  }

  /**
   * Add a row that names every column exactly once.
   * Missing, extra or repeated columns are a schema violation.
   */
  addCompleteRow(row: DataRow): void {
    if (row.length !== this.headers.length) {
      throw new SchemaViolationError(
        `Row has ${row.length} value(s) but the table has ${this.headers.length} column(s)`
      );
    }
    const values: ResultValue[] = new Array(this.headers.length);
    const seen = new Set<string>();
    for (const [column, value] of row) {
      const idx = this.index.get(column);
      if (idx === undefined) {
        throw new SchemaViolationError(`Column "${column}" is not in the table header`);
      }
      if (seen.has(column)) {
        throw new SchemaViolationError(`Column "${column}" appears twice in one row`);
      }
      seen.add(column);
      values[idx] = value;
    }
    this.rows.push(values);
  }

  /** Add a row given positionally, in header order. */
  addValues(values: readonly ResultValue[]): void {
    if (values.length !== this.headers.length) {
      throw new SchemaViolationError(
        `Row has ${values.length} value(s) but the table has ${this.headers.length} column(s)`
      );
    }
    this.rows.push([...values]);
  }

  getRow(i: number): Record<string, ResultValue> {
    const values = this.rows[i];
    if (!values) throw new RangeError(`Row ${i} out of range (0..${this.rows.length - 1})`);
    const record: Record<string, ResultValue> = {};
    this.headers.forEach((h, j) => { record[h] = values[j]; });
    return record;
  }

  getColumn(name: string): ResultValue[] {
    const idx = this.index.get(name);
    if (idx === undefined) throw new SchemaViolationError(`Column "${name}" is not in the table header`);
    return this.rows.map(r => r[idx]);
  }

  toRecords(): Array<Record<string, ResultValue>> {
    return this.rows.map((_, i) => this.getRow(i));
  }

  clear(): void {
    this.rows.length = 0;
  }

  /** Deep copy, which is what queued write jobs hold on to. */
  clone(): DataTable {
    const copy = new DataTable(this.headers);
    for (const row of this.rows) copy.rows.push(structuredClone(row));
    return copy;
  }

  /**
   * Header line, then one line per row. Fields are comma delimited; commas and
   * line breaks inside values are replaced with `_`, never quoted.
   */
  getCsvLines(): string[] {
    return [
      this.headers.map(csvField).join(','),
      ...this.rows.map(row => row.map(csvField).join(',')),
    ];
  }
}

/** Text form of a result value. null and undefined become an empty string. */
export function formatValue(value: ResultValue): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/** One CSV field: no delimiter and no line break survives. */
export function csvField(value: ResultValue): string {
  return formatValue(value).replace(/[,\r\n]/g, '_');
}
