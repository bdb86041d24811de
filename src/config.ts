import { z } from "zod";
import { TableKindSchema } from "./types/table.js";

export const ConfigSchema = z.object({
  defaultEngine: TableKindSchema.default("local"),
  defaultPartitions: z.coerce.number().int().positive().default(4),
  maxColumnWidth: z.coerce.number().int().min(10).default(40),
  maxRowsPerTable: z.coerce.number().int().positive().default(100_000),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Read configuration from DQ_* environment variables. Unset variables take
 * their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse({
      defaultEngine: env.DQ_DEFAULT_ENGINE || undefined,
      defaultPartitions: env.DQ_DEFAULT_PARTITIONS || undefined,
      maxColumnWidth: env.DQ_MAX_COLUMN_WIDTH || undefined,
      maxRowsPerTable: env.DQ_MAX_ROWS_PER_TABLE || undefined,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(i => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new Error(
        `Configuration error:\n${issues}\n\nSupported environment variables:\n` +
        `- DQ_DEFAULT_ENGINE=local (or 'distributed')\n` +
        `- DQ_DEFAULT_PARTITIONS=4 (partitions for distributed tables)\n` +
        `- DQ_MAX_COLUMN_WIDTH=40 (widest ledger cell in rendered reports, at least 10)\n` +
        `- DQ_MAX_ROWS_PER_TABLE=100000 (largest table a tool call may send)`
      );
    }
    throw error;
  }
}
