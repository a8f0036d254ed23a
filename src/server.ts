#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { AppConfig, loadConfig } from "./config/env.js";
import { createServices } from "./services/createServices.js";
import { QueryService } from "./services/queryService.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { registerIndexInfoTool } from "./tools/indexInfo.js";
import { registerSearchDocumentsTool } from "./tools/searchDocuments.js";
import { stderrLogger } from "./utils/logger.js";

const SERVER_NAME = "doc-vector-qa";
const SERVER_VERSION = "0.1.0";

async function main() {
  const config = loadConfig();
  const { queryService } = createServices(config, stderrLogger);

  const server = createAppServer(config, queryService);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  stderrLogger.info(`${SERVER_NAME} MCP server ready on stdio (data dir: ${config.dataDir})`);

  const shutdown = () => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("Failed to close MCP server:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function createAppServer(config: AppConfig, queryService: QueryService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerSearchDocumentsTool(server, queryService);
  registerAskQuestionTool(server, queryService);
  registerIndexInfoTool(server, config.dataDir);

  return server;
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
