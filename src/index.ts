#!/usr/bin/env node

/**
 * MCP server exposing the merge and file-commit reports over stdio.
 * stdout belongs to the protocol; all logging goes to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig, type AppConfig } from "./config.js";
import { GitHistoryReader } from "./git/git-history-reader.js";
import { RunLogger } from "./logging/run-logger.js";
import { registerReportTools } from "./tools/report.js";
import { NAME, VERSION } from "./version.js";

function createServer(logger: RunLogger, config: AppConfig): McpServer {
  const server = new McpServer({ name: NAME, version: VERSION });

  registerReportTools(server, {
    createSource: (repoPath) => new GitHistoryReader(repoPath, config.git, logger),
    logger,
  });

  return server;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new RunLogger({ debug: config.debug, logDir: config.logDir });
  const server = createServer(logger, config);
  await server.connect(new StdioServerTransport());
  logger.info("Server", `${NAME} ${VERSION} listening on stdio`);
}

main().catch((error: unknown) => {
  console.error("[Server] Fatal error:", error);
  process.exit(1);
});
