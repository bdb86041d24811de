import { divide, equals, lessThan } from "../tables/expressions.js";
import { encodeKey } from "../tables/distributed.js";
import type { LocalTable } from "../tables/local.js";
import type { EvaluationContext, MetricOfKind, MetricResult, Metric } from "../types/metric.js";
import type { Scalar } from "../types/table.js";
import { parseDate } from "../utils/dates.js";
import { MetricEvaluationError } from "../utils/errors.js";
import { quantileSorted } from "../utils/functions.js";
import { isNullish, isValidNumber } from "../utils/typeguards.js";
import { boundProbabilities, countResult, dateLagResult } from "./results.js";

function countWhere(values: readonly Scalar[], predicate: (value: Scalar) => boolean | null): number {
  return values.reduce<number>((count, value) => count + (predicate(value) === true ? 1 : 0), 0);
}

/**
 * Row-aligned cells of several columns, one tuple per row
 */
function tuples(table: LocalTable, columns: readonly string[]): Scalar[][] {
  const values = table.columnsOf(columns);
  return Array.from({ length: table.size }, (_, row) => values.map(column => column[row] ?? null));
}

function nullCount(table: LocalTable, metric: MetricOfKind<"null-count">): MetricResult {
  const rows = tuples(table, metric.columns);
  const flagged = rows.filter(cells =>
    metric.aggregation === "any" ? cells.some(isNullish) : cells.every(isNullish)
  );
  return countResult(table.size, flagged.length);
}

function duplicateCount(table: LocalTable, metric: MetricOfKind<"duplicate-count">): MetricResult {
  const keys = tuples(table, metric.columns).map(encodeKey);
  const occurrences = new Map<string, number>();
  keys.forEach(key => occurrences.set(key, (occurrences.get(key) ?? 0) + 1));
  const duplicates = keys.filter(key => (occurrences.get(key) ?? 0) > 1).length;
  return countResult(table.size, duplicates);
}

/**
 * Count rows matching `predicate` among rows with no null in `columns`
 */
function countComplete(
  table: LocalTable,
  columns: readonly string[],
  predicate: (cells: Scalar[]) => boolean | null
): MetricResult {
  const complete = tuples(table, columns).filter(cells => !cells.some(isNullish));
  return countResult(complete.length, complete.filter(cells => predicate(cells) === true).length);
}

function confidenceBound(table: LocalTable, metric: MetricOfKind<"confidence-bound">): MetricResult {
  const values = table.column(metric.column).filter(value => !isNullish(value));
  const numbers = values.map(value => {
    if (!isValidNumber(value)) {
      throw new MetricEvaluationError(`Cannot compute quantiles of non-numeric column '${metric.column}'`);
    }
    return value;
  });
  numbers.sort((a, b) => a - b);
  const [lower, upper] = boundProbabilities(metric.conf);
  return { lcb: quantileSorted(numbers, lower), ucb: quantileSorted(numbers, upper) };
}

function dateLag(table: LocalTable, metric: MetricOfKind<"date-lag">, context: EvaluationContext): MetricResult {
  let lastDay: number | null = null;
  for (const value of table.column(metric.column)) {
    const time = parseDate(value, metric.format)?.getTime();
    if (time !== undefined && (lastDay === null || time > lastDay)) {
      lastDay = time;
    }
  }
  return dateLagResult(lastDay, context.now(), metric.format);
}

/**
 * Evaluate a metric against a materialized table
 */
export function evaluateLocal(metric: Metric, table: LocalTable, context: EvaluationContext): MetricResult {
  switch (metric.kind) {
    case "total-count":
      return { total: table.size };

    case "zero-count":
      return countResult(table.size, countWhere(table.column(metric.column), value => equals(value, 0)));

    case "null-count":
      return nullCount(table, metric);

    case "duplicate-count":
      return duplicateCount(table, metric);

    case "exact-value-count":
      return countResult(
        table.size,
        countWhere(table.column(metric.column), value => equals(value, metric.value))
      );

    case "below-threshold-count":
      return countResult(
        table.size,
        countWhere(table.column(metric.column), value => lessThan(value, metric.value, metric.strict))
      );

    case "column-below-column-count":
      return countComplete(table, [metric.columnX, metric.columnY], ([x, y]) =>
        lessThan(x ?? null, y ?? null, metric.strict)
      );

    case "ratio-below-threshold-count":
      return countComplete(table, [metric.columnX, metric.columnY, metric.columnZ], ([x, y, z]) =>
        lessThan(divide(x ?? null, y ?? null), z ?? null, metric.strict)
      );

    case "confidence-bound":
      return confidenceBound(table, metric);

    case "date-lag":
      return dateLag(table, metric, context);
  }
}
