import { AppConfig } from "../config/env.js";
import { OllamaClient } from "../infra/ai/ollamaClient.js";
import { consoleLogger, Logger } from "../utils/logger.js";
import { IngestService } from "./ingestService.js";
import { QueryService } from "./queryService.js";

export interface AppServices {
  ollama: OllamaClient;
  ingestService: IngestService;
  queryService: QueryService;
}

export function createOllamaClient(config: AppConfig): OllamaClient {
  return new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    embeddingModel: config.ollamaEmbeddingModel,
    chatModel: config.ollamaChatModel,
    timeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
  });
}

export function createServices(config: AppConfig, logger: Logger = consoleLogger): AppServices {
  const ollama = createOllamaClient(config);

  return {
    ollama,
    ingestService: new IngestService(ollama, {
      dataDir: config.dataDir,
      prefixBytes: config.prefixBytes,
      embeddingServiceUrl: config.ollamaBaseUrl,
      logger,
    }),
    queryService: new QueryService(ollama, ollama, {
      dataDir: config.dataDir,
      prefixBytes: config.prefixBytes,
      topK: config.topK,
      queryLogPath: config.queryLogPath,
    }),
  };
}
