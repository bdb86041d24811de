import { z } from "zod";

const columnName = z.string().min(1).trim();
const strict = z.boolean().default(false).describe("Use < instead of <=");

export const TotalCountSchema = z.object({
  kind: z.literal("total-count"),
}).strict();

export const ZeroCountSchema = z.object({
  kind: z.literal("zero-count"),
  column: columnName,
}).strict();

export const NullCountSchema = z.object({
  kind: z.literal("null-count"),
  columns: z.array(columnName).min(1, "At least one column is required").readonly(),
  aggregation: z.enum(["any", "all"]).default("any")
    .describe("Flag a row when any (or all) of the columns are null"),
}).strict();

export const DuplicateCountSchema = z.object({
  kind: z.literal("duplicate-count"),
  columns: z.array(columnName).min(1, "At least one column is required").readonly(),
}).strict();

export const ExactValueCountSchema = z.object({
  kind: z.literal("exact-value-count"),
  column: columnName,
  value: z.union([z.string(), z.number(), z.boolean()]),
}).strict();

export const BelowThresholdCountSchema = z.object({
  kind: z.literal("below-threshold-count"),
  column: columnName,
  value: z.number(),
  strict,
}).strict();

export const ColumnBelowColumnCountSchema = z.object({
  kind: z.literal("column-below-column-count"),
  columnX: columnName,
  columnY: columnName,
  strict,
}).strict();

export const RatioBelowThresholdCountSchema = z.object({
  kind: z.literal("ratio-below-threshold-count"),
  columnX: columnName.describe("Numerator column"),
  columnY: columnName.describe("Denominator column"),
  columnZ: columnName.describe("Threshold column"),
  strict,
}).strict();

export const ConfidenceBoundSchema = z.object({
  kind: z.literal("confidence-bound"),
  column: columnName,
  conf: z.number().gt(0).lt(1).default(0.95).describe("Confidence level of the two-sided interval"),
}).strict();

export const DateLagSchema = z.object({
  kind: z.literal("date-lag"),
  column: columnName,
  format: z.string().min(1).default("%Y-%m-%d")
    .describe("Date format using %Y, %m, %d, %H, %M, %S directives"),
}).strict();

/**
 * Every metric the engine knows, discriminated on `kind`
 */
export const MetricSchema = z.discriminatedUnion("kind", [
  TotalCountSchema,
  ZeroCountSchema,
  NullCountSchema,
  DuplicateCountSchema,
  ExactValueCountSchema,
  BelowThresholdCountSchema,
  ColumnBelowColumnCountSchema,
  RatioBelowThresholdCountSchema,
  ConfidenceBoundSchema,
  DateLagSchema,
]);

/** A validated metric with defaults applied */
export type Metric = Readonly<z.output<typeof MetricSchema>>;

/** Metric parameters as a caller writes them, defaults optional */
export type MetricInput = z.input<typeof MetricSchema>;

export type MetricKind = Metric["kind"];

export type MetricOfKind<K extends MetricKind> = Extract<Metric, { kind: K }>;

export type MetricValue = number | string | null;

/**
 * Named values produced by one metric evaluation
 */
export type MetricResult = Record<string, MetricValue>;

export interface CountResult {
  total: number;
  count: number;
  delta: number;
  [key: string]: MetricValue;
}

/**
 * Values the evaluation needs from outside the table
 */
export interface EvaluationContext {
  /** Clock used by date-lag */
  now: () => Date;
}
