#!/usr/bin/env node
/**
 * gitfile-state MCP server
 *
 * Exposes per-file git state (index snapshot, single-line blame, hunk
 * staging and rename tracking) over the Model Context Protocol on stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("gitfile-state MCP server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
