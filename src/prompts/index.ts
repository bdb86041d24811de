import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { METRIC_CATALOG } from "../metrics/index.js";
import { ChecklistGuidanceSchema } from "../types/schema.js";

export const CHECKLIST_GUIDANCE_PROMPT = "dq-checklist-guidance";

type PromptResponse = {
  messages: Array<{ role: "user"; content: { type: "text"; text: string } }>;
};

/**
 * Markdown list of every metric kind with its parameters and result keys
 */
export function getChecklistGuidance(): string {
  const metrics = METRIC_CATALOG.map(entry => {
    const parameters = entry.parameters.length > 0
      ? entry.parameters
          .map(p => `${p.name}: ${p.type}${p.required ? "" : ` = ${JSON.stringify(p.default)}`}`)
          .join(", ")
      : "no parameters";
    return `- \`${entry.kind}\` (${parameters}): ${entry.summary}. Result keys: ${entry.resultKeys.join(", ")}.`;
  });

  return [
    "A checklist is an ordered list of checks. Each check is { table, metric, limits }:",
    "- `table` names one of the tables passed to run_dq_report.",
    "- `metric` is an object with a `kind` and that kind's parameters.",
    "- `limits` maps result keys to an inclusive [lower, upper] range. A key missing from the result fails the check.",
    "",
    "Metric kinds:",
    ...metrics,
    "",
    "Prefer limits on `delta` (share of matching rows) over `count` so checks hold as tables grow.",
  ].join("\n");
}

/**
 * Handler for the dq-checklist-guidance prompt
 */
export function handleChecklistGuidance(args: z.infer<typeof ChecklistGuidanceSchema>): PromptResponse {
  const table = args.table ? `the table '${args.table}'` : "my tables";
  const columns = args.columns ? ` Its columns are: ${args.columns}.` : "";

  return {
    messages: [
      {
        role: "user",
        content: {
          type: "text",
          text: `I need a data-quality checklist for ${table}.${columns} Please propose checks following these guidelines:\n\n${getChecklistGuidance()}`
        }
      }
    ]
  };
}

/**
 * Register prompt capabilities with the MCP server
 *
 * @param server - The MCP server instance
 */
export function registerPrompts(server: McpServer) {
  server.prompt(
    CHECKLIST_GUIDANCE_PROMPT,
    "Guidance for writing a data-quality checklist for run_dq_report",
    ChecklistGuidanceSchema.shape,
    args => handleChecklistGuidance(args)
  );
}
