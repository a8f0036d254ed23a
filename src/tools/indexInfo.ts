import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getIndexStorageInfo } from "../infra/store/indexFiles.js";

export function registerIndexInfoTool(server: McpServer, dataDir: string) {
  server.registerTool(
    "index_info",
    {
      title: "Index Info",
      description: "Reports the persisted index files, document count and vector dimension.",
      inputSchema: {},
    },
    async () => {
      const info = await getIndexStorageInfo(dataDir);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(info, null, 2),
          },
        ],
      };
    },
  );
}
