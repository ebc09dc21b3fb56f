import { describe, it, expect } from "vitest";
import { loadEnv } from "./env.js";

describe("loadEnv", () => {
  it("applies defaults", () => {
    const env = loadEnv({});

    expect(env.PORT).toBe(4000);
    expect(env.DEFAULT_POST_FREQUENCY).toBe(3);
    expect(env.PLANNER_DRAFT_ONLY).toBe(false);
    expect(env.DATA_RETENTION_DAYS).toBe(30);
    expect(env.DATABASE_URL).toBeUndefined();
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it("coerces numbers and flags from strings", () => {
    const env = loadEnv({
      PORT: "8080",
      DEFAULT_POST_FREQUENCY: "5",
      PUBLISH_TIMEOUT_MS: "2500",
      PLANNER_DRAFT_ONLY: "1",
      LOG_LEVEL: "error",
    });

    expect(env.PORT).toBe(8080);
    expect(env.DEFAULT_POST_FREQUENCY).toBe(5);
    expect(env.PUBLISH_TIMEOUT_MS).toBe(2500);
    expect(env.PLANNER_DRAFT_ONLY).toBe(true);
    expect(env.LOG_LEVEL).toBe("error");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadEnv({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid environment configuration: LOG_LEVEL: /);
  });

  it("names every invalid variable", () => {
    expect(() => loadEnv({ DEFAULT_POST_FREQUENCY: "9", PLANNER_DRAFT_ONLY: "yes" })).toThrow(
      /^Invalid environment configuration: DEFAULT_POST_FREQUENCY: .+, PLANNER_DRAFT_ONLY: /
    );
  });
});
