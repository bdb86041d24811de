import { z } from "zod";

/**
 * A single cell value. Dates travel as strings and are parsed by the metrics
 * that need them.
 */
export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type Scalar = z.infer<typeof ScalarSchema>;

/**
 * One table row, keyed by column name
 */
export const RowSchema = z.record(ScalarSchema);

export type Row = z.infer<typeof RowSchema>;

/**
 * Execution backends a table can live on
 */
export const TABLE_KINDS = ["local", "distributed"] as const;

export const TableKindSchema = z.enum(TABLE_KINDS);

export type TableKind = z.infer<typeof TableKindSchema>;
