import { describe, it, expect } from "vitest";
import { allocate, defaultTimeFor } from "./slotAllocator.js";
import { EmptyCandidatesError, InsufficientSlotsError } from "./errors.js";
import type { PostCandidate } from "./types.js";

function candidates(n: number, extra: Partial<PostCandidate> = {}): PostCandidate[] {
  return Array.from({ length: n }, (_, i) => ({ text: `Post ${i + 1}`, hashtags: [], ...extra }));
}

// 2025-01-06 is a Monday
const WEEK = { start: "2025-01-06", end: "2025-01-12" };

describe("allocate", () => {
  it("places posts on the preferred days of a single week", () => {
    const result = allocate(
      candidates(5),
      { frequency: 3, preferredDays: ["monday", "wednesday", "friday"] },
      WEEK
    );

    expect(result.map((a) => [a.date, a.weekday, a.time])).toEqual([
      ["2025-01-06", "monday", "12:00"],
      ["2025-01-08", "wednesday", "12:00"],
      ["2025-01-10", "friday", "12:00"],
    ]);
    expect(result.map((a) => a.candidate.text)).toEqual(["Post 1", "Post 2", "Post 3"]);
  });

  it("spreads posts across the week when no days are preferred", () => {
    const result = allocate(candidates(3), { frequency: 3, preferredDays: [] }, WEEK);
    expect(result.map((a) => a.weekday)).toEqual(["monday", "wednesday", "friday"]);
  });

  it("spreads five posts by index without preferred days", () => {
    const result = allocate(candidates(5), { frequency: 5, preferredDays: [] }, WEEK);
    expect(result.map((a) => a.weekday)).toEqual(["monday", "tuesday", "wednesday", "friday", "saturday"]);
  });

  it("orders a block Monday-first when the window starts mid-week", () => {
    // Wednesday 2025-01-08 .. Tuesday 2025-01-14
    const result = allocate(candidates(3), { frequency: 3, preferredDays: [] }, {
      start: "2025-01-08",
      end: "2025-01-14",
    });
    expect(result.map((a) => a.date)).toEqual(["2025-01-08", "2025-01-10", "2025-01-13"]);
  });

  it("caps the number of posts at frequency times weeks", () => {
    const twoWeeks = { start: "2025-01-06", end: "2025-01-19" };
    const result = allocate(candidates(10), { frequency: 2, preferredDays: ["tuesday", "thursday"] }, twoWeeks);

    expect(result.map((a) => a.date)).toEqual(["2025-01-07", "2025-01-09", "2025-01-14", "2025-01-16"]);
  });

  it("schedules fewer posts than the quota when candidates run out", () => {
    const result = allocate(candidates(1), { frequency: 3, preferredDays: [] }, WEEK);
    expect(result).toHaveLength(1);
    expect(result[0].date).toBe("2025-01-06");
  });

  it("is deterministic for the same inputs", () => {
    const prefs = { frequency: 4, preferredDays: [] };
    const window = { start: "2025-03-03", end: "2025-03-30" };
    expect(allocate(candidates(20), prefs, window)).toEqual(allocate(candidates(20), prefs, window));
  });

  it("never places two posts at the same date and time", () => {
    const oneDay = { start: "2025-01-06", end: "2025-01-06" };
    const result = allocate(candidates(3), { frequency: 3, preferredDays: [] }, oneDay);

    expect(result.map((a) => a.time)).toEqual(["12:00", "09:00", "15:00"]);
  });

  it("skips times already taken by existing posts", () => {
    const occupied = new Map([["2025-01-06", new Set(["12:00", "09:00"])]]);
    const result = allocate(candidates(2), { frequency: 2, preferredDays: ["monday", "tuesday"] }, WEEK, {
      occupied,
    });

    expect(result.map((a) => [a.date, a.time])).toEqual([
      ["2025-01-06", "15:00"],
      ["2025-01-07", "12:00"],
    ]);
  });

  it("honours a suggested time and the post type default", () => {
    const result = allocate(
      [
        { text: "Sale", hashtags: [], postType: "promo" },
        { text: "Hint", hashtags: [], postType: "tip", suggestedTime: "6:30 PM" },
      ],
      { frequency: 2, preferredDays: ["monday", "tuesday"] },
      WEEK
    );

    expect(result.map((a) => a.time)).toEqual(["18:00", "18:30"]);
  });

  it("throws InsufficientSlots when no preferred day falls in the window", () => {
    // Monday .. Tuesday only
    const window = { start: "2025-01-06", end: "2025-01-07" };
    expect(() => allocate(candidates(2), { frequency: 1, preferredDays: ["saturday"] }, window)).toThrow(
      InsufficientSlotsError
    );
  });

  it("throws EmptyCandidates unless an empty plan is allowed", () => {
    const prefs = { frequency: 3, preferredDays: [] };
    expect(() => allocate([], prefs, WEEK)).toThrow(EmptyCandidatesError);
    expect(allocate([], prefs, WEEK, { allowEmpty: true })).toEqual([]);
  });
});

describe("defaultTimeFor", () => {
  it("maps known post types and falls back to noon", () => {
    expect(defaultTimeFor("tip")).toBe("09:00");
    expect(defaultTimeFor(" Engagement ")).toBe("17:00");
    expect(defaultTimeFor("announcement")).toBe("12:00");
    expect(defaultTimeFor(undefined)).toBe("12:00");
  });
});
