import type { PostEvent, PostState } from "./types.js";

export type PlannerErrorKind =
  | "InvalidPreferences"
  | "InvalidInput"
  | "InsufficientSlots"
  | "EmptyCandidates"
  | "IllegalTransition"
  | "AlreadyInProgress"
  | "ImmutablePost"
  | "PlanningAborted"
  | "Timeout"
  | "NotFound"
  | "Conflict"
  | "SlotTaken"
  | "PublisherError";

export interface PlannerErrorJSON {
  kind: PlannerErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for everything the planner core throws. `kind` is stable and
 * meant for callers; `message` is meant for people.
 */
export class PlannerError extends Error {
  constructor(
    public readonly kind: PlannerErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }

  toJSON(): PlannerErrorJSON {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class InvalidPreferencesError extends PlannerError {
  constructor(public readonly issues: string[]) {
    super("InvalidPreferences", `Invalid planning preferences: ${issues.join("; ")}`, { issues });
  }
}

export class InvalidInputError extends PlannerError {
  constructor(public readonly issues: string[]) {
    super("InvalidInput", `Invalid request: ${issues.join("; ")}`, { issues });
  }
}

export class InsufficientSlotsError extends PlannerError {
  constructor(start: string, end: string) {
    super("InsufficientSlots", `No eligible posting days between ${start} and ${end}`, { start, end });
  }
}

export class EmptyCandidatesError extends PlannerError {
  constructor() {
    super("EmptyCandidates", "No post candidates were provided");
  }
}

export class IllegalTransitionError extends PlannerError {
  constructor(
    public readonly postId: string,
    public readonly from: PostState,
    public readonly event: PostEvent
  ) {
    super("IllegalTransition", `Cannot ${event.replace("_", " ")} post ${postId} while it is ${from}`, {
      postId,
      from,
      event,
    });
  }
}

export class AlreadyInProgressError extends PlannerError {
  constructor(public readonly postId: string) {
    super("AlreadyInProgress", `Post ${postId} is already being published`, { postId });
  }
}

export class ImmutablePostError extends PlannerError {
  constructor(
    public readonly postId: string,
    public readonly state: PostState
  ) {
    super("ImmutablePost", `Post ${postId} is ${state} and can no longer be edited`, { postId, state });
  }
}

export class NotFoundError extends PlannerError {
  constructor(public readonly postId: string) {
    super("NotFound", `Post ${postId} not found`, { postId });
  }
}

export class ConflictError extends PlannerError {
  constructor(
    public readonly postId: string,
    expectedVersion: number,
    actualVersion: number
  ) {
    super("Conflict", `Post ${postId} was modified concurrently`, {
      postId,
      expectedVersion,
      actualVersion,
    });
  }
}

export class SlotTakenError extends PlannerError {
  constructor(
    public readonly businessId: string,
    public readonly date: string,
    public readonly time: string
  ) {
    super("SlotTaken", `${date} ${time} is already taken for business ${businessId}`, { businessId, date, time });
  }
}

export class TimeoutError extends PlannerError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super("Timeout", `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

export class PlanningAbortedError extends PlannerError {
  constructor(
    businessId: string,
    cause: unknown,
    public readonly createdCount: number,
    public readonly rollbackFailures: { postId: string; message: string }[]
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const rollbackNote =
      rollbackFailures.length > 0 ? ` (rollback failed for ${rollbackFailures.length} post(s))` : "";
    super(
      "PlanningAborted",
      `Planning for business ${businessId} was aborted: ${reason}${rollbackNote}`,
      { businessId, createdCount, rollbackFailures },
      { cause }
    );
  }
}

/**
 * Thrown by publisher adapters for rejections they can classify
 * (e.g. `invalid_token`, `rate_limited`, `network`).
 */
export class PublisherError extends PlannerError {
  constructor(
    public readonly publisherKind: string,
    message: string
  ) {
    super("PublisherError", message, { kind: publisherKind });
  }
}

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}
