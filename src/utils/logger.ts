export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  // warnings share stdout with the rest of the run report
  warn: (message) => console.log(message),
  error: (message) => console.error(message),
};

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
export const stderrLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(message),
  error: (message) => console.error(message),
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
