import { isPlannerError, type PlannerErrorKind } from "../services/planner/errors.js";
import type { Logger } from "../lib/logger.js";

const STATUS_BY_KIND: Record<PlannerErrorKind, number> = {
  InvalidPreferences: 400,
  InvalidInput: 400,
  InsufficientSlots: 400,
  EmptyCandidates: 400,
  NotFound: 404,
  IllegalTransition: 409,
  AlreadyInProgress: 409,
  ImmutablePost: 409,
  Conflict: 409,
  SlotTaken: 409,
  PublisherError: 502,
  Timeout: 504,
  PlanningAborted: 500,
};

/** The part of an Express response an error is written through. */
export interface ErrorResponse {
  status(code: number): { json(body: unknown): unknown };
}

export function statusForError(error: unknown): number {
  return isPlannerError(error) ? STATUS_BY_KIND[error.kind] : 500;
}

/**
 * Writes `{ success: false, error: { kind, message } }`. Unexpected errors are
 * logged and reported without internals.
 */
export function sendError(res: ErrorResponse, error: unknown, log: Logger): void {
  if (isPlannerError(error)) {
    res.status(statusForError(error)).json({ success: false, error: error.toJSON() });
    return;
  }

  log.error("Unhandled error", {}, error instanceof Error ? error : undefined);
  res.status(500).json({
    success: false,
    error: { kind: "Internal", message: "Internal server error" },
  });
}
