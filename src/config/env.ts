import { z } from "zod";

const envSchema = z.object({
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
  OLLAMA_CHAT_MODEL: z.string().min(1).default("qwen2.5:7b-instruct"),
  OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  OLLAMA_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  OLLAMA_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  DOCS_ROOT: z.string().min(1).default("."),
  DATA_DIR: z.string().min(1).default("data"),
  PREFIX_BYTES: z.coerce.number().int().positive().default(800),
  TOP_K: z.coerce.number().int().positive().default(3),
  QUERY_LOG_PATH: z.string().optional(),
});

export interface AppConfig {
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  ollamaChatModel: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  docsRoot: string;
  dataDir: string;
  prefixBytes: number;
  topK: number;
  queryLogPath: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    requestTimeoutMs: parsed.OLLAMA_TIMEOUT_MS,
    maxRetries: parsed.OLLAMA_MAX_RETRIES,
    retryBaseDelayMs: parsed.OLLAMA_RETRY_BASE_DELAY_MS,
    docsRoot: parsed.DOCS_ROOT,
    dataDir: parsed.DATA_DIR,
    prefixBytes: parsed.PREFIX_BYTES,
    topK: parsed.TOP_K,
    queryLogPath: parsed.QUERY_LOG_PATH?.trim() || null,
  };
}
