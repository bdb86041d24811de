import type { Row, Scalar } from "../types/table.js";
import { MetricEvaluationError, MissingColumnError } from "../utils/errors.js";
import { quantileSorted } from "../utils/functions.js";
import { isNullish, isValidNumber } from "../utils/typeguards.js";
import { Column } from "./expressions.js";

export type Partition = readonly Readonly<Row>[];

type PlanStep =
  | { type: "filter"; predicate: Column }
  | { type: "withColumn"; name: string; expr: Column }
  | { type: "select"; columns: readonly string[] };

/**
 * Shared by a table and everything derived from it
 */
interface ExecutionContext {
  jobs: number;
}

/**
 * Stable key for a tuple of cells; null, missing and NaN share one key.
 * Cells are tagged with their type so `Infinity`, `"1"` and `1` stay apart.
 */
export function encodeKey(values: readonly (Scalar | undefined)[]): string {
  return JSON.stringify(values.map(value => (isNullish(value) ? null : [typeof value, String(value)])));
}

export function groupKey(row: Readonly<Row>, columns: readonly string[]): string {
  return encodeKey(columns.map(column => row[column]));
}

function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (hash * 31 + text.charCodeAt(i)) | 0;
  }
  return Math.abs(hash);
}

/**
 * Split rows into `count` contiguous partitions of near-equal size
 */
export function partitionRows(rows: readonly Row[], count: number): Row[][] {
  const partitions: Row[][] = Array.from({ length: Math.max(1, count) }, () => []);
  const chunk = Math.ceil(rows.length / partitions.length);
  rows.forEach((row, index) => {
    partitions[chunk > 0 ? Math.floor(index / chunk) : 0]?.push(row);
  });
  return partitions;
}

/**
 * A partitioned table with deferred computation. Transformations only extend
 * the plan; `count`, `collect`, `max` and `quantile` run a job over every
 * partition and return the result to the caller.
 */
export class DistributedTable {
  readonly kind = "distributed" as const;

  constructor(
    readonly name: string,
    readonly columns: readonly string[],
    readonly numPartitions: number,
    private readonly source: () => Partition[],
    private readonly plan: readonly PlanStep[] = [],
    private readonly execution: ExecutionContext = { jobs: 0 }
  ) {}

  /** Number of jobs run by this table and the tables derived from it */
  get jobCount(): number {
    return this.execution.jobs;
  }

  private derive(columns: readonly string[], step: PlanStep): DistributedTable {
    return new DistributedTable(
      this.name,
      columns,
      this.numPartitions,
      this.source,
      [...this.plan, step],
      this.execution
    );
  }

  requireColumns(names: readonly string[]): void {
    for (const name of names) {
      if (!this.columns.includes(name)) {
        throw new MissingColumnError(name, this.columns);
      }
    }
  }

  filter(predicate: Column): DistributedTable {
    this.requireColumns(predicate.references);
    return this.derive(this.columns, { type: "filter", predicate });
  }

  withColumn(name: string, expr: Column): DistributedTable {
    this.requireColumns(expr.references);
    const columns = this.columns.includes(name) ? this.columns : [...this.columns, name];
    return this.derive(columns, { type: "withColumn", name, expr });
  }

  select(...columns: string[]): DistributedTable {
    this.requireColumns(columns);
    return this.derive(columns, { type: "select", columns });
  }

  groupBy(...columns: string[]): { count: () => DistributedTable } {
    this.requireColumns(columns);
    return {
      count: () => new DistributedTable(
        this.name,
        [...columns, "count"],
        this.numPartitions,
        () => this.shuffleCounts(columns),
        [],
        this.execution
      ),
    };
  }

  /**
   * Hash-partition rows by key and count each key, one output row per key
   */
  private shuffleCounts(columns: readonly string[]): Partition[] {
    const buckets: Array<Map<string, Row>> = Array.from({ length: this.numPartitions }, () => new Map());
    for (const partition of this.computePartitions()) {
      for (const row of partition) {
        const key = groupKey(row, columns);
        const bucket = buckets[hashString(key) % buckets.length];
        if (!bucket) continue;
        const existing = bucket.get(key);
        if (existing) {
          existing.count = (isValidNumber(existing.count) ? existing.count : 0) + 1;
        } else {
          const grouped: Row = {};
          columns.forEach(column => {
            grouped[column] = row[column] ?? null;
          });
          grouped.count = 1;
          bucket.set(key, grouped);
        }
      }
    }
    return buckets.map(bucket => [...bucket.values()]);
  }

  private computePartitions(): Partition[] {
    return this.source().map(partition => this.runPlan(partition));
  }

  private runPlan(partition: Partition): Partition {
    let rows: Partition = partition;
    for (const step of this.plan) {
      switch (step.type) {
        case "filter":
          rows = rows.filter(row => step.predicate.evaluate(row) === true);
          break;
        case "withColumn":
          rows = rows.map(row => ({ ...row, [step.name]: step.expr.evaluate(row) }));
          break;
        case "select":
          rows = rows.map(row => {
            const selected: Row = {};
            step.columns.forEach(column => {
              selected[column] = row[column] ?? null;
            });
            return selected;
          });
          break;
      }
    }
    return rows;
  }

  /**
   * Run a job: evaluate the plan on every partition and fold the partial
   * results
   */
  private runJob<T, R>(perPartition: (rows: Partition) => T, combine: (partials: T[]) => R): R {
    this.execution.jobs += 1;
    return combine(this.computePartitions().map(perPartition));
  }

  count(): number {
    return this.runJob(rows => rows.length, partials => partials.reduce((a, b) => a + b, 0));
  }

  collect(): Row[] {
    return this.runJob(rows => rows.map(row => ({ ...row })), partials => partials.flat());
  }

  /**
   * Largest non-null value of a numeric column, `null` when there is none
   */
  max(column: string): number | null {
    this.requireColumns([column]);
    const partialMax = (rows: Partition): number | null => {
      let best: number | null = null;
      for (const row of rows) {
        const value: Scalar = row[column] ?? null;
        if (isNullish(value)) continue;
        if (!isValidNumber(value)) {
          throw new MetricEvaluationError(`Cannot take max of non-numeric column '${column}'`);
        }
        if (best === null || value > best) best = value;
      }
      return best;
    };
    return this.runJob(partialMax, partials =>
      partials.reduce<number | null>((acc, value) => {
        if (value === null) return acc;
        return acc === null || value > acc ? value : acc;
      }, null)
    );
  }

  /**
   * Exact quantiles of a numeric column with linear interpolation; null cells
   * are skipped and an empty column gives `null` for every probability
   */
  quantile(column: string, probabilities: readonly number[]): Array<number | null> {
    this.requireColumns([column]);
    const values = this.runJob(
      rows => rows.map(row => row[column] ?? null).filter(value => !isNullish(value)),
      partials => partials.flat()
    );
    const numbers = values.map(value => {
      if (!isValidNumber(value)) {
        throw new MetricEvaluationError(`Cannot compute quantiles of non-numeric column '${column}'`);
      }
      return value;
    });
    numbers.sort((a, b) => a - b);
    return probabilities.map(q => quantileSorted(numbers, q));
  }
}
