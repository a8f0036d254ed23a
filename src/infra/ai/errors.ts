export class OllamaTransportError extends Error {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Request to ${url} failed: ${reason}`);
    this.name = "OllamaTransportError";
  }
}

export class OllamaHttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Request to ${url} failed (${status}): ${body}`);
    this.name = "OllamaHttpError";
  }
}

export class OllamaResponseError extends Error {
  constructor(
    readonly url: string,
    reason: string,
  ) {
    super(`Unexpected response from ${url}: ${reason}`);
    this.name = "OllamaResponseError";
  }
}

export function isRetryableOllamaError(error: unknown): boolean {
  if (error instanceof OllamaTransportError) {
    return true;
  }
  return error instanceof OllamaHttpError && error.status >= 500;
}
