import type { Metric } from "../types/metric.js";
import type { LimitSpec } from "../types/report.js";
import { formatValue } from "../utils/functions.js";

function formatParameter(key: string, value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(item => String(item)).join(", ")}]`;
  // Literal values are quoted so "5" and 5 read differently
  if (key === "value" && typeof value === "string") return JSON.stringify(value);
  return String(value);
}

/**
 * Human-readable form of a metric, e.g. `zero-count(column=x)`
 */
export function describeMetric(metric: Metric): string {
  const parameters = Object.entries(metric)
    .filter(([key]) => key !== "kind")
    .map(([key, value]) => `${key}=${formatParameter(key, value)}`);
  return `${metric.kind}(${parameters.join(", ")})`;
}

/**
 * Human-readable form of a limit spec, e.g. `{delta: [0.5, 1]}`
 */
export function describeLimits(limits: LimitSpec): string {
  const ranges = Object.entries(limits)
    .map(([key, [lower, upper]]) => `${key}: [${formatValue(lower)}, ${formatValue(upper)}]`);
  return `{${ranges.join(", ")}}`;
}
