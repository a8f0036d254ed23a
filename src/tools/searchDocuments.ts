import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { QueryService } from "../services/queryService.js";

export function registerSearchDocumentsTool(server: McpServer, queryService: QueryService) {
  server.registerTool(
    "search_documents",
    {
      title: "Search Documents",
      description:
        "Returns the indexed documents nearest to the query, with squared L2 distances and the current text prefix.",
      inputSchema: {
        query: z.string().min(1).describe("Free-text query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
      },
    },
    async ({ query, top_k }) => {
      const contexts = await queryService.retrieveContexts(query, top_k);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                query,
                hits: contexts.map((context) => ({
                  path: context.path,
                  distance: Number(context.distance.toFixed(4)),
                  snippet: context.text.slice(0, 240),
                })),
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
