import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { Config } from "../config.js";
import type { ToolResponse } from "../utils/tool-error.js";
import { createEvaluateMetricTool } from "./evaluate-metric.js";
import { createListMetricsTool } from "./list-metrics.js";
import { createRunReportTool } from "./run-report.js";

export interface ToolDefinition<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  schema: Shape;
  handler: (params: z.objectOutputType<Shape, z.ZodTypeAny>) => Promise<ToolResponse>;
}

function registerTool<Shape extends z.ZodRawShape>(server: McpServer, tool: ToolDefinition<Shape>) {
  server.tool(tool.name, tool.description, tool.schema, async args => {
    try {
      return await tool.handler(args);
    } catch (error) {
      // Format errors to match the SDK's expected format
      return {
        content: [
          {
            type: "text",
            text: error instanceof Error ? error.message : String(error),
          },
        ],
        isError: true,
      };
    }
  });
}

/**
 * Register all tools with the MCP server
 *
 * @param server - The MCP server instance
 * @param config - Server configuration
 */
export function registerTools(server: McpServer, config: Config) {
  // Report tools
  registerTool(server, createRunReportTool(config));
  registerTool(server, createEvaluateMetricTool(config));

  // Catalog tools
  registerTool(server, createListMetricsTool());
}
