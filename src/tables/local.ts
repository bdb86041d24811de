import type { Row, Scalar } from "../types/table.js";
import { MissingColumnError } from "../utils/errors.js";

/**
 * Column names in first-seen order across all rows
 */
export function inferColumns(rows: Iterable<Row>): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    Object.keys(row).forEach(key => columns.add(key));
  }
  return [...columns];
}

/**
 * A fully materialized in-memory table. Size and column access never
 * trigger computation.
 */
export class LocalTable {
  readonly kind = "local" as const;
  readonly columns: readonly string[];
  private readonly rows: readonly Readonly<Row>[];

  constructor(readonly name: string, rows: readonly Row[], columns?: readonly string[]) {
    this.rows = rows.map(row => Object.freeze({ ...row }));
    this.columns = columns ?? inferColumns(rows);
  }

  get size(): number {
    return this.rows.length;
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  requireColumns(names: readonly string[]): void {
    for (const name of names) {
      if (!this.hasColumn(name)) {
        throw new MissingColumnError(name, this.columns);
      }
    }
  }

  /**
   * Values of one column in row order; missing cells read as null
   */
  column(name: string): Scalar[] {
    this.requireColumns([name]);
    return this.rows.map(row => row[name] ?? null);
  }

  /**
   * Row-aligned value arrays for several columns
   */
  columnsOf(names: readonly string[]): Scalar[][] {
    return names.map(name => this.column(name));
  }

  toRows(): Row[] {
    return this.rows.map(row => ({ ...row }));
  }
}
