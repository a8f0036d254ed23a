export interface EmbeddingClient {
  embed(text: string): Promise<Float32Array>;
}

export interface ChatClient {
  chat(content: string): Promise<string>;
}

export interface ServiceStatus {
  ok: boolean;
  version: string | null;
}
