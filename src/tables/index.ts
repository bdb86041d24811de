import type { Row, TableKind } from "../types/table.js";
import { DistributedTable, partitionRows } from "./distributed.js";
import { inferColumns, LocalTable } from "./local.js";

export { LocalTable, inferColumns } from "./local.js";
export { DistributedTable, encodeKey, groupKey, partitionRows } from "./distributed.js";
export type { Partition } from "./distributed.js";
export { Column, col, lit, allOf, anyOf, toTimestamp } from "./expressions.js";

/**
 * A named table on one of the two execution backends
 */
export type Table = LocalTable | DistributedTable;

export const DEFAULT_PARTITIONS = 4;

export function isTable(value: unknown): value is Table {
  return value instanceof LocalTable || value instanceof DistributedTable;
}

export interface TableOptions {
  /** Column names; inferred from the rows when omitted */
  columns?: readonly string[];
}

export interface DistributedTableOptions extends TableOptions {
  partitions?: number;
}

export function createLocalTable(name: string, rows: readonly Row[], options: TableOptions = {}): LocalTable {
  return new LocalTable(name, rows, options.columns);
}

export function createDistributedTable(
  name: string,
  rows: readonly Row[],
  options: DistributedTableOptions = {}
): DistributedTable {
  const partitions = partitionRows(
    rows.map(row => Object.freeze({ ...row })),
    options.partitions ?? DEFAULT_PARTITIONS
  );
  return new DistributedTable(
    name,
    options.columns ?? inferColumns(rows),
    partitions.length,
    () => partitions
  );
}

/**
 * Build a table of the given kind from rows
 */
export function createTable(
  kind: TableKind,
  name: string,
  rows: readonly Row[],
  options: DistributedTableOptions = {}
): Table {
  return kind === "local"
    ? createLocalTable(name, rows, options)
    : createDistributedTable(name, rows, options);
}

/**
 * Materialize a table in process; distributed tables run a collect job
 */
export function toLocalTable(table: Table): LocalTable {
  if (table.kind === "local") return table;
  return new LocalTable(table.name, table.collect(), table.columns);
}

/**
 * Spread a table over partitions; distributed tables are returned as is
 */
export function toDistributedTable(table: Table, partitions: number = DEFAULT_PARTITIONS): DistributedTable {
  if (table.kind === "distributed") return table;
  return createDistributedTable(table.name, table.toRows(), { partitions, columns: table.columns });
}
