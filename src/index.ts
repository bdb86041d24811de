#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import process from "node:process";
import { registerTools } from "./tools/index.js";
import { registerPrompts } from "./prompts/index.js";

function checkNodeVersion() {
  const requiredMajorVersion = 20;
  const nodeVersion: string = process.versions.node;
  const majorVersion = nodeVersion.split('.')[0];
  const currentMajorVersion = parseInt(majorVersion ?? "", 10);

  if (isNaN(currentMajorVersion)) {
    console.error(`Error: Unable to parse Node.js version '${nodeVersion}'. Node.js version ${requiredMajorVersion} or higher is required.`);
    process.exit(1);
  }

  if (currentMajorVersion < requiredMajorVersion) {
    console.error(
      `Error: Node.js version ${requiredMajorVersion} or higher is required. Current version: ${nodeVersion}`
    );
    process.exit(1);
  }
}

/**
 * Main function to run the data-quality MCP server
 */
async function main() {
  try {
    checkNodeVersion();
    console.error("Loading configuration from environment variables...");
    const config = loadConfig();
    console.error(
      `Default engine: ${config.defaultEngine}, partitions: ${config.defaultPartitions}, ` +
      `max rows per table: ${config.maxRowsPerTable}`
    );

    const server = new McpServer(
      { name: "dq-report", version: "0.1.0" },
      { capabilities: { tools: {}, prompts: {} } }
    );

    console.error("Registering tools and prompts...");
    registerTools(server, config);
    registerPrompts(server);

    const transport = new StdioServerTransport();

    // Retry the initial connection a few times before giving up
    let connected = false;
    const maxRetries = 3;
    let retries = 0;

    while (!connected && retries < maxRetries) {
      try {
        await server.connect(transport);
        connected = true;
        console.error("DQ report MCP server running on stdio");
      } catch (error) {
        retries++;
        console.error(`Connection attempt ${retries} failed: ${error instanceof Error ? error.message : String(error)}`);

        if (retries < maxRetries) {
          console.error(`Retrying in 1 second...`);
          await new Promise(resolve => setTimeout(resolve, 1000));
        } else {
          console.error(`Max retries (${maxRetries}) reached. Giving up.`);
          process.exit(1);
        }
      }
    }
  } catch (error) {
    console.error("Failed to start MCP server:", error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Run main with proper error handling
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
  });
}
