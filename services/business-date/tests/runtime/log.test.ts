import { describe, expect, it, vi } from "vitest";

import { createLogger, isLogLevel } from "../../src/runtime/log.js";

function createSink() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("createLogger", () => {
  it("prefixes the level and serialises metadata", () => {
    const sink = createSink();
    const logger = createLogger("debug", sink);

    logger.info("schedule built");
    logger.debug("periods", { count: 4 });

    expect(sink.log).toHaveBeenNthCalledWith(1, "[INFO] schedule built", "");
    expect(sink.log).toHaveBeenNthCalledWith(2, "[DEBUG] periods", '{"count":4}');
  });

  it("routes warnings and errors to their console methods", () => {
    const sink = createSink();
    const logger = createLogger("info", sink);

    logger.warn("dates collide");
    logger.error("failed", { code: 1 });

    expect(sink.warn).toHaveBeenCalledWith("[WARN] dates collide", "");
    expect(sink.error).toHaveBeenCalledWith("[ERROR] failed", '{"code":1}');
    expect(sink.log).not.toHaveBeenCalled();
  });

  it("drops messages below the threshold", () => {
    const sink = createSink();
    const logger = createLogger("warn", sink);

    logger.info("hidden");
    logger.debug("hidden");
    expect(sink.log).not.toHaveBeenCalled();

    logger.setLevel("silent");
    logger.error("hidden");
    expect(sink.error).not.toHaveBeenCalled();
    expect(logger.level).toBe("silent");
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
