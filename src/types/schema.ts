import { z } from "zod";
import { MetricSchema } from "./metric.js";
import { LimitSpecSchema } from "./report.js";
import { RowSchema, TableKindSchema } from "./table.js";

/**
 * One checklist entry as it arrives over the wire
 */
export const CheckEntrySchema = z.object({
  table: z.string().min(1).trim().describe("Name of the table in 'tables'"),
  metric: MetricSchema.describe("Metric to evaluate, discriminated by 'kind'"),
  limits: LimitSpecSchema.default({})
    .describe("Inclusive [lower, upper] range per result key, e.g. { \"delta\": [0, 0.05] }"),
});

export const RunReportSchema = z.object({
  tables: z.record(z.array(RowSchema))
    .describe("Rows of every table the checklist refers to, keyed by table name"),
  checklist: z.array(CheckEntrySchema).min(1, "At least one check is required")
    .describe("Checks to run, in order"),
  engine: TableKindSchema.optional()
    .describe("Backend to run on: 'local' (in memory) or 'distributed' (partitioned, deferred)"),
  partitions: z.number().int().positive().optional()
    .describe("Partition count for the distributed engine"),
  title: z.string().min(1).optional().describe("Report title"),
}).describe("Run a data-quality checklist against inline tables and return the report");

export const EvaluateMetricSchema = z.object({
  rows: z.array(RowSchema).describe("Table rows"),
  metric: MetricSchema.describe("Metric to evaluate, discriminated by 'kind'"),
  engine: TableKindSchema.optional()
    .describe("Backend to run on: 'local' (in memory) or 'distributed' (partitioned, deferred)"),
  partitions: z.number().int().positive().optional()
    .describe("Partition count for the distributed engine"),
}).describe("Evaluate a single metric against inline rows");

export const ListMetricsSchema = z.object({
  kind: z.string().trim().optional().describe("Only describe this metric kind"),
}).describe("List the metric kinds with their parameters and result keys");

export const ChecklistGuidanceSchema = z.object({
  table: z.string().optional(),
  columns: z.string().optional(),
});
