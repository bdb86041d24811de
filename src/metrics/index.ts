import type { Table } from "../tables/index.js";
import { MetricSchema } from "../types/metric.js";
import type { EvaluationContext, Metric, MetricInput, MetricResult } from "../types/metric.js";
import { DataQualityError, UnsupportedTableKindError } from "../utils/errors.js";
import { hasProperty, hasPropertyOfType, isValidString } from "../utils/typeguards.js";
import { evaluateDistributed } from "./distributed.js";
import { evaluateLocal } from "./local.js";

export { describeMetric, describeLimits } from "./describe.js";
export { METRIC_CATALOG } from "./catalog.js";
export type { MetricCatalogEntry, MetricParameterInfo } from "./catalog.js";

export const defaultContext = (): EvaluationContext => ({ now: () => new Date() });

/**
 * Validate metric parameters, apply defaults and freeze the result
 */
export function defineMetric(input: MetricInput): Metric {
  const parsed = MetricSchema.safeParse(input);
  if (!parsed.success) {
    throw DataQualityError.createValidationError(
      parsed.error.errors.map(err => `${err.path.join(".") || "metric"}: ${err.message}`).join(", "),
      { metric: hasPropertyOfType(input, "kind", isValidString) ? input.kind : undefined }
    );
  }
  return Object.freeze(parsed.data);
}

function describeKind(table: unknown): string {
  if (hasPropertyOfType(table, "kind", isValidString)) return table.kind;
  return table === null ? "null" : typeof table;
}

/**
 * Evaluate a metric against a table, choosing the strategy from the table's
 * kind
 *
 * @throws UnsupportedTableKindError when the value is not a known table
 */
export function evaluateMetric(
  metric: Metric,
  table: Table,
  context: EvaluationContext = defaultContext()
): MetricResult {
  const candidate: unknown = table;
  if (!hasProperty(candidate, "kind")) {
    throw new UnsupportedTableKindError(describeKind(candidate));
  }
  switch (table.kind) {
    case "local":
      return evaluateLocal(metric, table, context);
    case "distributed":
      return evaluateDistributed(metric, table, context);
    default: {
      const unknownTable: unknown = table;
      throw new UnsupportedTableKindError(describeKind(unknownTable));
    }
  }
}
