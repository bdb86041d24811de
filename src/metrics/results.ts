import type { CountResult, MetricResult } from "../types/metric.js";
import { daysBetween, formatDate } from "../utils/dates.js";
import { MetricEvaluationError } from "../utils/errors.js";

export function countResult(total: number, count: number): CountResult {
  if (total === 0) {
    throw new MetricEvaluationError(
      "Cannot compute delta: no rows to count",
      ["Check that the table is not empty and that the compared columns are not all null"]
    );
  }
  return { total, count, delta: count / total };
}

/**
 * Probabilities of the lower and upper bound of a two-sided interval
 */
export function boundProbabilities(conf: number): [number, number] {
  const tail = (1 - conf) / 2;
  return [tail, 1 - tail];
}

export function dateLagResult(lastDay: number | null, now: Date, format: string): MetricResult {
  const last = lastDay === null ? null : new Date(lastDay);
  return {
    today: formatDate(now, format),
    last_day: last ? formatDate(last, format) : null,
    lag: last ? daysBetween(last, now) : null,
  };
}
