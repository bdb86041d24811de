import type { DistributedTable } from "../tables/distributed.js";
import { allOf, anyOf, col, lit, toTimestamp } from "../tables/expressions.js";
import type { Column } from "../tables/expressions.js";
import type { EvaluationContext, MetricOfKind, MetricResult, Metric } from "../types/metric.js";
import { isValidNumber } from "../utils/typeguards.js";
import { boundProbabilities, countResult, dateLagResult } from "./results.js";

const NULL_CONDITION = "null_condition";
const PARSED_DATE = "parsed_date";

function compare(left: Column, right: Column, strict: boolean): Column {
  return strict ? left.lt(right) : left.le(right);
}

function nullCount(df: DistributedTable, metric: MetricOfKind<"null-count">): MetricResult {
  const checks = metric.columns.map(column => col(column).isNull());
  const condition = metric.aggregation === "any" ? anyOf(checks) : allOf(checks);
  const n = df.count();
  const k = df.withColumn(NULL_CONDITION, condition).filter(col(NULL_CONDITION)).count();
  return countResult(n, k);
}

function duplicateCount(df: DistributedTable, metric: MetricOfKind<"duplicate-count">): MetricResult {
  const n = df.count();
  const repeated = df.groupBy(...metric.columns).count().filter(lit(1).lt(col("count")));
  const k = repeated
    .collect()
    .reduce((sum, group) => sum + (isValidNumber(group.count) ? group.count : 0), 0);
  return countResult(n, k);
}

/**
 * Drop rows with a null in any of `columns`, then count rows matching `condition`
 */
function countComplete(df: DistributedTable, columns: readonly string[], condition: Column): MetricResult {
  const complete = df.filter(allOf(columns.map(column => col(column).isNotNull())));
  const n = complete.count();
  const k = complete.filter(condition).count();
  return countResult(n, k);
}

function dateLag(df: DistributedTable, metric: MetricOfKind<"date-lag">, context: EvaluationContext): MetricResult {
  const lastDay = df
    .withColumn(PARSED_DATE, toTimestamp(col(metric.column), metric.format))
    .max(PARSED_DATE);
  return dateLagResult(lastDay, context.now(), metric.format);
}

/**
 * Evaluate a metric against a partitioned table. Every count below is a
 * separate job.
 */
export function evaluateDistributed(metric: Metric, df: DistributedTable, context: EvaluationContext): MetricResult {
  switch (metric.kind) {
    case "total-count":
      return { total: df.count() };

    case "zero-count": {
      const matching = df.filter(col(metric.column).eq(0));
      return countResult(df.count(), matching.count());
    }

    case "null-count":
      return nullCount(df, metric);

    case "duplicate-count":
      return duplicateCount(df, metric);

    case "exact-value-count": {
      const matching = df.filter(col(metric.column).eq(metric.value));
      return countResult(df.count(), matching.count());
    }

    case "below-threshold-count": {
      const matching = df.filter(compare(col(metric.column), lit(metric.value), metric.strict));
      return countResult(df.count(), matching.count());
    }

    case "column-below-column-count":
      return countComplete(
        df,
        [metric.columnX, metric.columnY],
        compare(col(metric.columnX), col(metric.columnY), metric.strict)
      );

    case "ratio-below-threshold-count":
      return countComplete(
        df,
        [metric.columnX, metric.columnY, metric.columnZ],
        compare(col(metric.columnX).div(col(metric.columnY)), col(metric.columnZ), metric.strict)
      );

    case "confidence-bound": {
      const [lcb = null, ucb = null] = df.quantile(metric.column, boundProbabilities(metric.conf));
      return { lcb, ucb };
    }

    case "date-lag":
      return dateLag(df, metric, context);
  }
}
