import { z } from "zod";
import type { Config } from "../config.js";
import { Report } from "../report/index.js";
import { createTable } from "../tables/index.js";
import type { Table } from "../tables/index.js";
import { RunReportSchema } from "../types/schema.js";
import type { Row } from "../types/table.js";
import { DataQualityError } from "../utils/errors.js";
import { handleToolError } from "../utils/tool-error.js";
import type { ToolResponse } from "../utils/tool-error.js";

const description = `Runs a data-quality checklist against tables passed inline and returns the report.
Each check names a table, a metric (see list_metrics for the kinds and their parameters) and limits: an inclusive [lower, upper] range per result key, e.g. { "delta": [0, 0.01] }.
A check passes (.) when every limited key is within range, fails (F) otherwise, and errors (E) when the table is missing or the metric cannot be computed.
The response holds the rendered report followed by the same report as JSON.
`

/**
 * Refuse tables larger than the configured limit
 */
export function checkTableSizes(tables: Record<string, Row[]>, maxRows: number): void {
  for (const [name, rows] of Object.entries(tables)) {
    if (rows.length > maxRows) {
      throw new DataQualityError(
        `Table '${name}' has ${rows.length} rows; at most ${maxRows} are accepted`,
        ["Send a sample of the table", "Raise DQ_MAX_ROWS_PER_TABLE on the server"]
      );
    }
  }
}

/**
 * Creates the tool that fits a data-quality report
 *
 * @param config - Server configuration supplying the default engine and limits
 */
export function createRunReportTool(config: Config) {
  return {
    name: "run_dq_report",
    description,
    schema: RunReportSchema.shape,
    handler: async (params: z.infer<typeof RunReportSchema>): Promise<ToolResponse> => {
      try {
        checkTableSizes(params.tables, config.maxRowsPerTable);

        const engine = params.engine ?? config.defaultEngine;
        const partitions = params.partitions ?? config.defaultPartitions;
        const tables: Record<string, Table> = {};
        for (const [name, rows] of Object.entries(params.tables)) {
          tables[name] = createTable(engine, name, rows, { partitions });
        }

        const report = new Report(params.checklist, {
          title: params.title,
          maxColumnWidth: config.maxColumnWidth,
        });
        const summary = report.fit(tables);

        return {
          content: [
            { type: "text", text: report.render() },
            { type: "text", text: JSON.stringify({ engine, ...summary }, null, 2) },
          ],
        };
      } catch (error) {
        return handleToolError(error, "run_dq_report");
      }
    }
  };
}
