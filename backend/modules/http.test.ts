import { describe, it, expect, vi } from "vitest";
import { sendError, statusForError, type ErrorResponse } from "./http.js";
import {
  AlreadyInProgressError,
  InvalidInputError,
  NotFoundError,
  SlotTakenError,
  TimeoutError,
} from "../services/planner/errors.js";
import type { Logger } from "../lib/logger.js";

function fakeResponse() {
  const sent: { status?: number; body?: unknown } = {};
  const res: ErrorResponse = {
    status(code: number) {
      sent.status = code;
      return {
        json(body: unknown) {
          sent.body = body;
        },
      };
    },
  };
  return { sent, res };
}

function fakeLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => log,
  };
  return log;
}

describe("statusForError", () => {
  it("maps error kinds to HTTP statuses", () => {
    expect(statusForError(new InvalidInputError(["x"]))).toBe(400);
    expect(statusForError(new NotFoundError("p1"))).toBe(404);
    expect(statusForError(new AlreadyInProgressError("p1"))).toBe(409);
    expect(statusForError(new SlotTakenError("biz-1", "2025-01-06", "09:00"))).toBe(409);
    expect(statusForError(new TimeoutError("Publishing post p1", 10))).toBe(504);
    expect(statusForError(new Error("boom"))).toBe(500);
  });
});

describe("sendError", () => {
  it("serializes planner errors", () => {
    const { sent, res } = fakeResponse();

    sendError(res, new NotFoundError("p1"), fakeLogger());

    expect(sent).toEqual({
      status: 404,
      body: { success: false, error: { kind: "NotFound", message: "Post p1 not found", details: { postId: "p1" } } },
    });
  });

  it("hides unexpected errors and logs them", () => {
    const { sent, res } = fakeResponse();
    const log = fakeLogger();

    sendError(res, new Error("db password leaked"), log);

    expect(sent).toEqual({
      status: 500,
      body: { success: false, error: { kind: "Internal", message: "Internal server error" } },
    });
    expect(log.error).toHaveBeenCalledTimes(1);
  });
});
