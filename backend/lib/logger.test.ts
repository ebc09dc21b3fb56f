import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "./logger.js";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

function captureConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("logger", () => {
  it("applies a LOG_LEVEL set after the module was loaded", () => {
    vi.stubEnv("LOG_LEVEL", "error");
    const out = captureConsole();

    logger.info("hidden");
    logger.warn("hidden");
    logger.error("shown");

    expect(out.log).not.toHaveBeenCalled();
    expect(out.warn).not.toHaveBeenCalled();
    expect(out.error).toHaveBeenCalledTimes(1);
  });

  it("writes debug lines with the child context", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const out = captureConsole();

    logger.child({ postId: "p1" }).debug("visible");

    expect(out.log).toHaveBeenCalledTimes(1);
    expect(out.log.mock.calls[0][0]).toMatch(/ DEBUG visible \{"postId":"p1"\}$/);
  });

  it("defaults to warn when running tests", () => {
    vi.stubEnv("LOG_LEVEL", "");
    vi.stubEnv("NODE_ENV", "test");
    const out = captureConsole();

    logger.info("hidden");
    logger.warn("shown");

    expect(out.log).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledTimes(1);
  });
});
