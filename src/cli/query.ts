#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { resolveQuestion } from "../pipelines/context.js";
import { createServices } from "../services/createServices.js";

async function main() {
  const config = loadConfig();
  const { queryService } = createServices(config);

  const result = await queryService.ask(resolveQuestion(process.argv.slice(2)));
  console.log(result.answer);
}

main().catch((error) => {
  console.error("Query failed:", error);
  process.exit(1);
});
