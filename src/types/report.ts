import { z } from "zod";
import type { Metric, MetricResult } from "./metric.js";
import { TABLE_KINDS } from "./table.js";
import type { TableKind } from "./table.js";

/**
 * Inclusive `[lower, upper]` range for one result key
 */
export const LimitRangeSchema = z.tuple([z.number(), z.number()])
  .refine(([lower, upper]) => lower <= upper, {
    message: "Lower limit must not exceed upper limit",
  });

export const LimitSpecSchema = z.record(LimitRangeSchema);

export type LimitRange = readonly [lower: number, upper: number];

export type LimitSpec = Readonly<Record<string, LimitRange>>;

export interface CheckEntry {
  /** Name the table is registered under */
  table: string;
  metric: Metric;
  limits: LimitSpec;
}

/** `.` passed, `F` failed, `E` errored */
export type CheckStatus = "." | "F" | "E";

/** Backends a report can force every check onto */
export const ENGINES = TABLE_KINDS;

export type Engine = TableKind;

export interface LedgerRow {
  tableName: string;
  /** Metric description */
  metric: string;
  /** Limits description */
  limits: string;
  /** Metric result, `null` when the check errored */
  values: MetricResult | null;
  status: CheckStatus;
  /** Error message, empty unless the check errored */
  error: string;
}

export interface ReportSummary {
  title: string;
  ledger: LedgerRow[];
  passed: number;
  failed: number;
  errors: number;
  total: number;
  passedPct: number;
  failedPct: number;
  errorsPct: number;
}
