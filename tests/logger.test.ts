import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write JSON lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger().info("search:done", { articles: 5 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(spy.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: "info", message: "search:done", data: { articles: 5 } });
    expect(typeof entry.timestamp).toBe("string");
  });

  it("should drop entries below the configured level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger({ level: "warn" });

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("publish:empty");

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
