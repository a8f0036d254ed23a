import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import {
  isRetryableOllamaError,
  OllamaHttpError,
  OllamaResponseError,
  OllamaTransportError,
} from "./errors.js";
import { ChatClient, EmbeddingClient, ServiceStatus } from "./types.js";

export interface OllamaClientOptions {
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
  /** Extra attempts after a transport error or 5xx response. 0 keeps one request per call. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

const versionResponseSchema = z.object({
  version: z.string(),
});

interface RequestCall {
  method: "GET" | "POST";
  path: string;
  body?: unknown;
}

export class OllamaClient implements EmbeddingClient, ChatClient {
  private readonly baseUrl: string;

  private readonly maxRetries: number;

  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? 0));
    this.retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? 500);
  }

  async embed(text: string): Promise<Float32Array> {
    const data = await this.request(
      {
        method: "POST",
        path: "/api/embeddings",
        body: {
          model: this.options.embeddingModel,
          prompt: text,
          stream: false,
        },
      },
      embeddingsResponseSchema,
    );
    return Float32Array.from(data.embedding);
  }

  async chat(content: string): Promise<string> {
    const data = await this.request(
      {
        method: "POST",
        path: "/api/chat",
        body: {
          model: this.options.chatModel,
          messages: [{ role: "user", content }],
          stream: false,
        },
      },
      chatResponseSchema,
    );
    return data.message.content;
  }

  async checkStatus(): Promise<ServiceStatus> {
    try {
      const data = await this.request(
        { method: "GET", path: "/api/version" },
        versionResponseSchema,
      );
      return { ok: true, version: data.version };
    } catch (error) {
      if (
        error instanceof OllamaTransportError ||
        error instanceof OllamaHttpError ||
        error instanceof OllamaResponseError
      ) {
        return { ok: false, version: null };
      }
      throw error;
    }
  }

  private async request<T>(call: RequestCall, schema: z.ZodType<T>): Promise<T> {
    let attempt = 0;
    while (true) {
      try {
        return await this.requestOnce(call, schema);
      } catch (error) {
        if (attempt >= this.maxRetries || !isRetryableOllamaError(error)) {
          throw error;
        }
        await delay(this.retryBaseDelayMs * 2 ** attempt);
        attempt += 1;
      }
    }
  }

  private async requestOnce<T>(call: RequestCall, schema: z.ZodType<T>): Promise<T> {
    const url = `${this.baseUrl}${call.path}`;

    let response: Response;
    let raw: string;
    try {
      response = await fetch(url, {
        method: call.method,
        headers:
          call.body === undefined ? undefined : { "Content-Type": "application/json" },
        body: call.body === undefined ? undefined : JSON.stringify(call.body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      raw = await response.text();
    } catch (error) {
      throw new OllamaTransportError(url, describeTransportFailure(error, this.options.timeoutMs));
    }

    if (!response.ok) {
      throw new OllamaHttpError(url, response.status, raw);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      throw new OllamaResponseError(url, "body is not valid JSON");
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
      throw new OllamaResponseError(url, `${field}: ${issue?.message ?? "invalid shape"}`);
    }
    return parsed.data;
  }
}

function describeTransportFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `timed out after ${timeoutMs} ms`;
    }
    return error.message;
  }
  return "unknown error";
}
