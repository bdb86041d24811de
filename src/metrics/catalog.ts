import type { MetricKind } from "../types/metric.js";

export interface MetricParameterInfo {
  name: string;
  type: string;
  required: boolean;
  default?: string | number | boolean;
}

export interface MetricCatalogEntry {
  kind: MetricKind;
  summary: string;
  parameters: MetricParameterInfo[];
  resultKeys: string[];
}

const COUNT_KEYS = ["total", "count", "delta"];

const column: MetricParameterInfo = { name: "column", type: "string", required: true };
const strict: MetricParameterInfo = { name: "strict", type: "boolean", required: false, default: false };

/**
 * What each metric kind computes, what it takes and what it returns
 */
export const METRIC_CATALOG: readonly MetricCatalogEntry[] = [
  {
    kind: "total-count",
    summary: "Number of rows in the table",
    parameters: [],
    resultKeys: ["total"],
  },
  {
    kind: "zero-count",
    summary: "Rows where the column equals 0",
    parameters: [column],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "null-count",
    summary: "Rows where any (or all) of the columns are null",
    parameters: [
      { name: "columns", type: "string[]", required: true },
      { name: "aggregation", type: "\"any\" | \"all\"", required: false, default: "any" },
    ],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "duplicate-count",
    summary: "Rows whose values in the columns also appear in another row",
    parameters: [{ name: "columns", type: "string[]", required: true }],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "exact-value-count",
    summary: "Rows where the column equals a literal value",
    parameters: [column, { name: "value", type: "string | number | boolean", required: true }],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "below-threshold-count",
    summary: "Rows where the column is below a threshold",
    parameters: [column, { name: "value", type: "number", required: true }, strict],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "column-below-column-count",
    summary: "Rows where columnX is below columnY, ignoring rows with nulls in either",
    parameters: [
      { name: "columnX", type: "string", required: true },
      { name: "columnY", type: "string", required: true },
      strict,
    ],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "ratio-below-threshold-count",
    summary: "Rows where columnX / columnY is below columnZ, ignoring rows with nulls in any of them",
    parameters: [
      { name: "columnX", type: "string", required: true },
      { name: "columnY", type: "string", required: true },
      { name: "columnZ", type: "string", required: true },
      strict,
    ],
    resultKeys: COUNT_KEYS,
  },
  {
    kind: "confidence-bound",
    summary: "Lower and upper quantiles of a two-sided interval at the given confidence",
    parameters: [column, { name: "conf", type: "number", required: false, default: 0.95 }],
    resultKeys: ["lcb", "ucb"],
  },
  {
    kind: "date-lag",
    summary: "Days between the latest date in the column and today",
    parameters: [column, { name: "format", type: "string", required: false, default: "%Y-%m-%d" }],
    resultKeys: ["today", "last_day", "lag"],
  },
];
