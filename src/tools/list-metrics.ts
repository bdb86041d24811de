import { z } from "zod";
import { METRIC_CATALOG } from "../metrics/index.js";
import { ListMetricsSchema } from "../types/schema.js";
import { DataQualityError } from "../utils/errors.js";
import { handleToolError } from "../utils/tool-error.js";
import type { ToolResponse } from "../utils/tool-error.js";

/**
 * Creates the tool that lists the metric catalog
 */
export function createListMetricsTool() {
  return {
    name: "list_metrics",
    description: "Lists the data-quality metric kinds, their parameters and the result keys limits can refer to.",
    schema: ListMetricsSchema.shape,
    handler: async (params: z.infer<typeof ListMetricsSchema>): Promise<ToolResponse> => {
      try {
        const metrics = params.kind
          ? METRIC_CATALOG.filter(entry => entry.kind === params.kind)
          : METRIC_CATALOG;

        if (metrics.length === 0) {
          throw new DataQualityError(
            `Unknown metric kind: ${params.kind}`,
            [`Known kinds: ${METRIC_CATALOG.map(entry => entry.kind).join(", ")}`]
          );
        }

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(metrics, null, 2),
            },
          ],
        };
      } catch (error) {
        return handleToolError(error, "list_metrics");
      }
    }
  };
}
