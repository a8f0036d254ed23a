import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DEFAULT_QUESTION } from "../pipelines/context.js";
import { QueryService } from "../services/queryService.js";

export function registerAskQuestionTool(server: McpServer, queryService: QueryService) {
  server.registerTool(
    "ask_question",
    {
      title: "Ask Question",
      description:
        "Answers a question with the local chat model, grounded in the nearest indexed documents.",
      inputSchema: {
        question: z
          .string()
          .optional()
          .describe(`Question for the indexed docs (defaults to "${DEFAULT_QUESTION}")`),
      },
    },
    async ({ question }) => {
      const startedAt = Date.now();
      const result = await queryService.ask(question || DEFAULT_QUESTION);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                answer: result.answer,
                contexts: result.contexts,
                latency_ms: Date.now() - startedAt,
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
