#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { getIndexStorageInfo } from "../infra/store/indexFiles.js";
import { createOllamaClient } from "../services/createServices.js";

async function main() {
  const config = loadConfig();
  const ollama = createOllamaClient(config);

  const service = await ollama.checkStatus();
  const storage = await getIndexStorageInfo(config.dataDir);

  console.log("Service status");
  console.log("==============");
  console.log(`ollama: ${config.ollamaBaseUrl} ${service.ok ? "RUNNING" : "UNREACHABLE"}`);
  if (service.version) {
    console.log(`version: ${service.version}`);
  }
  console.log(`embedding_model: ${config.ollamaEmbeddingModel}`);
  console.log(`chat_model: ${config.ollamaChatModel}`);
  console.log("");
  console.log("Index");
  console.log("=====");
  console.log(`index: ${storage.indexPath} (${storage.index_size_bytes} bytes)`);
  console.log(`metadata: ${storage.metadataPath} (${storage.metadata_size_bytes} bytes)`);
  if (storage.exists) {
    console.log(`documents: ${storage.document_count}`);
    console.log(`dimension: ${storage.dimension}`);
  } else {
    console.log("documents: none (run ingest first)");
  }

  if (!service.ok || !storage.exists) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Status check failed:", error);
  process.exit(1);
});
