import { describe, it, expect, vi, afterEach } from "vitest";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "./errors.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("withTimeout", () => {
  it("resolves with the operation's value when it settles in time", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50, "Quick")).resolves.toBe("ok");
  });

  it("passes through the operation's own rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("nope")), 50, "Failing")).rejects.toThrow("nope");
  });

  it("rejects with TimeoutError once the limit passes", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 200, "Loading post p1");
    const assertion = expect(pending).rejects.toThrow(new TimeoutError("Loading post p1", 200));

    await vi.advanceTimersByTimeAsync(200);
    await assertion;
  });

  it("clears its timer when the operation settles", async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve(1), 1_000, "Quick");
    expect(vi.getTimerCount()).toBe(0);
  });
});
