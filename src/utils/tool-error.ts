import { DataQualityError } from "./errors.js";
import { z } from "zod";

/**
 * Response shape every tool returns to the MCP client
 */
export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Handles errors from tool execution and returns a formatted error response
 */
export function handleToolError(
  error: unknown,
  toolName: string,
  options: {
    suppressConsole?: boolean;
  } = {}
): ToolResponse {
  let errorMessage = "Unknown error occurred";

  if (error instanceof DataQualityError) {
    errorMessage = error.getFormattedMessage();
  } else if (error instanceof z.ZodError) {
    // For Zod validation errors, create a validation error with context
    const validationError = DataQualityError.createValidationError(
      error.errors.map(err => `${err.path.join(".")}: ${err.message}`).join(", "),
      { tool: toolName }
    );
    errorMessage = validationError.getFormattedMessage();
  } else if (error instanceof Error) {
    errorMessage = error.message;
  }

  // Log the error to stderr for debugging, unless suppressed
  if (!options.suppressConsole) {
    console.error(`Tool '${toolName}' failed:`, error);
  }

  return {
    content: [
      {
        type: "text",
        text: `Failed to execute tool '${toolName}': ${errorMessage}`,
      },
    ],
    isError: true,
  };
}
