#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { createServices } from "../services/createServices.js";

async function main() {
  const config = loadConfig();
  const { ingestService } = createServices(config);

  const root = process.argv[2] ?? config.docsRoot;
  const result = await ingestService.ingest(root);

  if (!result.written) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Ingest failed:", error);
  process.exit(1);
});
