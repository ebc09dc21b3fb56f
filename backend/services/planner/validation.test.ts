import { describe, it, expect } from "vitest";
import { InvalidInputError, InvalidPreferencesError } from "./errors.js";
import { parseInput, publishOutcomeSchema, validatePlanningInput, validatePostEdit } from "./validation.js";

const window = { start: "2025-01-06", end: "2025-01-12" };

describe("validatePlanningInput", () => {
  it("normalizes preferred days into weekday order without duplicates", () => {
    const { preferences } = validatePlanningInput(
      {
        businessId: "biz-1",
        preferences: { businessId: "biz-1", frequency: 2, preferredDays: [" Friday", "monday", "FRIDAY"] },
        window,
      },
      3
    );

    expect(preferences.preferredDays).toEqual(["monday", "friday"]);
  });

  it("falls back to the default frequency", () => {
    const { preferences } = validatePlanningInput({ businessId: "biz-1", preferences: { businessId: "biz-1" }, window }, 5);
    expect(preferences.frequency).toBe(5);
  });

  it("collects every issue into one error", () => {
    let caught: unknown;
    try {
      validatePlanningInput(
        {
          businessId: "biz-1",
          preferences: { businessId: "biz-1", frequency: 0, preferredDays: ["funday"] },
          window: { start: "2025-01-12", end: "2025-01-06" },
        },
        3
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidPreferencesError);
    if (!(caught instanceof InvalidPreferencesError)) return;
    expect(caught.issues).toHaveLength(3);
    expect(caught.issues[0]).toMatch(/^preferences\.frequency: /);
    expect(caught.issues[1]).toMatch(/^preferences\.preferredDays\.0: /);
    expect(caught.issues[2]).toBe("window.end: window start must not be after its end");
  });

  it("rejects preferences that belong to another business", () => {
    expect(() =>
      validatePlanningInput({ businessId: "biz-1", preferences: { businessId: "biz-2" }, window }, 3)
    ).toThrow("preferences.businessId: does not match the business being planned");
  });

  it("rejects dates that are not on the calendar", () => {
    expect(() =>
      validatePlanningInput(
        { businessId: "biz-1", preferences: { businessId: "biz-1" }, window: { start: "2025-02-30", end: "2025-03-02" } },
        3
      )
    ).toThrow("window.start: must be a calendar date (YYYY-MM-DD)");
  });
});

describe("validatePostEdit", () => {
  it("normalizes the time of day", () => {
    expect(validatePostEdit({ scheduledTime: "6:15 pm" })).toEqual({ scheduledTime: "18:15" });
  });

  it("rejects unknown fields", () => {
    expect(() => validatePostEdit({ state: "published" })).toThrow(InvalidInputError);
  });

  it("rejects an unreadable time", () => {
    expect(() => validatePostEdit({ scheduledTime: "noon" })).toThrow(
      "Invalid request: scheduledTime: must be a time of day (HH:MM)"
    );
  });
});

describe("publishOutcomeSchema", () => {
  it("accepts both outcome shapes", () => {
    expect(parseInput(publishOutcomeSchema, { status: "published", externalId: "ext-1" })).toEqual({
      status: "published",
      externalId: "ext-1",
    });
    expect(
      parseInput(publishOutcomeSchema, { status: "failed", error: { kind: "network", message: "down" } })
    ).toEqual({ status: "failed", error: { kind: "network", message: "down" } });
  });

  it("rejects an unknown status", () => {
    expect(() => parseInput(publishOutcomeSchema, { status: "maybe" })).toThrow(InvalidInputError);
  });
});
