import { afterEach, describe, expect, it, vi } from "vitest";
import { consoleLogger, stderrLogger } from "../src/utils/logger.js";

describe("loggers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints ingest warnings to stdout alongside progress", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    consoleLogger.info("Processed 10 files...");
    consoleLogger.warn("Skipping /docs/a.md: fetch failed");
    consoleLogger.error("Ingest failed");

    expect(log.mock.calls).toEqual([
      ["Processed 10 files..."],
      ["Skipping /docs/a.md: fetch failed"],
    ]);
    expect(error.mock.calls).toEqual([["Ingest failed"]]);
  });

  it("keeps stdout free for the stdio transport", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    stderrLogger.info("ready");
    stderrLogger.warn("slow");

    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([["ready"], ["slow"]]);
  });
});
