import { z } from "zod";
import { InvalidInputError, InvalidPreferencesError } from "./errors.js";
import { parseISODate, parseTimeOfDay } from "./dateUtils.js";
import { WEEKDAYS, type BusinessPreferences, type DateRange, type PostEdit } from "./types.js";

export const weekdaySchema = z
  .string()
  .transform((day) => day.trim().toLowerCase())
  .pipe(z.enum(WEEKDAYS));

export const isoDateSchema = z
  .string()
  .refine((value) => parseISODate(value) !== null, { message: "must be a calendar date (YYYY-MM-DD)" });

export const timeOfDaySchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = parseTimeOfDay(value);
    if (!normalized) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a time of day (HH:MM)" });
      return z.NEVER;
    }
    return normalized;
  });

export const dateRangeSchema = z
  .object({
    start: isoDateSchema,
    end: isoDateSchema,
  })
  .refine((range) => range.start <= range.end, {
    message: "window start must not be after its end",
    path: ["end"],
  });

export function preferencesSchema(defaultFrequency: number) {
  return z
    .object({
      businessId: z.string().min(1),
      frequency: z.number().int().min(1).max(7).default(defaultFrequency),
      preferredDays: z.array(weekdaySchema).default([]),
      defaultTone: z.string().optional(),
      defaultPostType: z.string().optional(),
    })
    .transform((prefs) => ({
      ...prefs,
      preferredDays: WEEKDAYS.filter((day) => prefs.preferredDays.includes(day)),
    }))
    .refine((prefs) => prefs.preferredDays.length === 0 || prefs.frequency <= prefs.preferredDays.length, {
      message: "frequency cannot exceed the number of preferred days",
      path: ["frequency"],
    });
}

export const candidateSchema = z.object({
  text: z.string().min(1),
  hashtags: z.array(z.string()).default([]),
  postType: z.string().optional(),
  tone: z.string().optional(),
  callToAction: z.string().optional(),
  suggestedTime: z.string().optional(),
});

export const credentialsSchema = z.object({
  pageId: z.string().min(1),
  accessToken: z.string(),
});

export const postEditSchema = z
  .object({
    text: z.string().min(1).optional(),
    hashtags: z.array(z.string()).optional(),
    callToAction: z.string().optional(),
    tone: z.string().optional(),
    postType: z.string().optional(),
    scheduledDate: isoDateSchema.optional(),
    scheduledTime: timeOfDaySchema.optional(),
  })
  .strict();

export const publishOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("published"),
    externalId: z.string().min(1),
    url: z.string().url().optional(),
  }),
  z.object({
    status: z.literal("failed"),
    error: z.object({ kind: z.string().min(1), message: z.string() }),
  }),
]);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validates raw planning input, throwing InvalidPreferencesError with every
 * issue found.
 */
export function validatePlanningInput(
  input: { businessId: string; preferences: unknown; window: unknown },
  defaultFrequency: number
): { preferences: BusinessPreferences; window: DateRange } {
  const issues: string[] = [];

  const prefs = preferencesSchema(defaultFrequency).safeParse(input.preferences);
  if (!prefs.success) {
    issues.push(...formatIssues(prefs.error).map((issue) => `preferences.${issue}`));
  } else if (prefs.data.businessId !== input.businessId) {
    issues.push("preferences.businessId: does not match the business being planned");
  }

  const window = dateRangeSchema.safeParse(input.window);
  if (!window.success) {
    issues.push(...formatIssues(window.error).map((issue) => `window.${issue}`));
  }

  if (issues.length > 0 || !prefs.success || !window.success) {
    throw new InvalidPreferencesError(issues);
  }

  return { preferences: prefs.data, window: window.data };
}

/** Parses `input` with `schema`, throwing InvalidInputError on failure. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(formatIssues(parsed.error));
  }
  return parsed.data;
}

export function validatePostEdit(input: unknown): PostEdit {
  return parseInput(postEditSchema, input);
}
