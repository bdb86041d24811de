import { z } from "zod";
import type { Config } from "../config.js";
import { describeMetric, evaluateMetric } from "../metrics/index.js";
import { createTable } from "../tables/index.js";
import { EvaluateMetricSchema } from "../types/schema.js";
import { handleToolError } from "../utils/tool-error.js";
import type { ToolResponse } from "../utils/tool-error.js";
import { checkTableSizes } from "./run-report.js";

const description = `Evaluates one data-quality metric against rows passed inline and returns its raw result, without limits.
Use this to explore a table before choosing limits for run_dq_report.`

/**
 * Creates the tool that evaluates a single metric
 */
export function createEvaluateMetricTool(config: Config) {
  return {
    name: "evaluate_metric",
    description,
    schema: EvaluateMetricSchema.shape,
    handler: async (params: z.infer<typeof EvaluateMetricSchema>): Promise<ToolResponse> => {
      try {
        checkTableSizes({ rows: params.rows }, config.maxRowsPerTable);

        const engine = params.engine ?? config.defaultEngine;
        const table = createTable(engine, "rows", params.rows, {
          partitions: params.partitions ?? config.defaultPartitions,
        });
        const result = evaluateMetric(params.metric, table);

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify({ metric: describeMetric(params.metric), engine, result }, null, 2),
            },
          ],
        };
      } catch (error) {
        return handleToolError(error, "evaluate_metric");
      }
    }
  };
}
