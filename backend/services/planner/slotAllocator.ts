import { EmptyCandidatesError, InsufficientSlotsError } from "./errors.js";
import {
  addDays,
  datesInRange,
  minutesToTime,
  parseISODate,
  parseTimeOfDay,
  toISODate,
  weekdayIndex,
  weekdayOf,
  weeksInRange,
} from "./dateUtils.js";
import type { BusinessPreferences, DateRange, PostCandidate, SlotAssignment, Weekday } from "./types.js";

/**
 * Default time of day per post type. Unknown types fall back to noon.
 */
export const DEFAULT_TIME_BY_POST_TYPE: Readonly<Record<string, string>> = {
  tip: "09:00",
  update: "10:00",
  educational: "11:00",
  insight: "15:00",
  engagement: "17:00",
  promo: "18:00",
  promotional: "18:00",
};

export const FALLBACK_TIME = "12:00";

const FALLBACK_LADDER = ["09:00", "12:00", "15:00", "18:00", "20:00"];

const QUARTER_HOURS = Array.from({ length: 96 }, (_, i) => minutesToTime(i * 15));

export interface AllocateOptions {
  /** Return an empty allocation instead of failing when there are no candidates. */
  allowEmpty?: boolean;
  /** Times already taken per date (YYYY-MM-DD) by existing posts. */
  occupied?: ReadonlyMap<string, ReadonlySet<string>>;
}

interface Slot {
  date: Date;
  weekday: Weekday;
}

export function defaultTimeFor(postType: string | undefined) {
  if (!postType) return FALLBACK_TIME;
  return DEFAULT_TIME_BY_POST_TYPE[postType.trim().toLowerCase()] ?? FALLBACK_TIME;
}

function eligibleDates(window: DateRange, preferredDays: readonly Weekday[]): Date[] {
  const dates = datesInRange(window);
  if (preferredDays.length === 0) return dates;
  const allowed = new Set(preferredDays);
  return dates.filter((d) => allowed.has(weekdayOf(d)));
}

/**
 * Picks `quota` slots from one 7-day block. Dates are visited Monday-first;
 * with fewer posts than dates they are spread across the block, otherwise each
 * date takes one post per pass.
 */
function pickFromBlock(blockDates: Date[], quota: number): Slot[] {
  const ordered = [...blockDates].sort((a, b) => weekdayIndex(weekdayOf(a)) - weekdayIndex(weekdayOf(b)));
  const m = ordered.length;
  const picks: Slot[] = [];

  let remaining = quota;
  while (remaining > 0 && m > 0) {
    const q = Math.min(remaining, m);
    for (let k = 0; k < q; k++) {
      const date = ordered[Math.floor((k * m) / q)];
      picks.push({ date, weekday: weekdayOf(date) });
    }
    remaining -= q;
  }

  return picks;
}

function pickTime(candidate: PostCandidate, used: Set<string>) {
  const suggested = candidate.suggestedTime ? parseTimeOfDay(candidate.suggestedTime) : null;
  const preferences = [suggested, defaultTimeFor(candidate.postType), ...FALLBACK_LADDER, ...QUARTER_HOURS];

  for (const time of preferences) {
    if (time && !used.has(time)) return time;
  }
  // A day holds at most 7 posts, far fewer than the quarter-hour grid.
  throw new Error("No free time of day left");
}

/**
 * Maps candidates onto calendar slots for a date window.
 *
 * Takes at most `frequency` posts per 7-day block (blocks start at
 * `window.start`), only on eligible weekdays, and never places two posts at the
 * same date and time, nor on a time listed in `options.occupied`. Pure and
 * deterministic.
 */
export function allocate(
  candidates: readonly PostCandidate[],
  prefs: Pick<BusinessPreferences, "frequency" | "preferredDays">,
  window: DateRange,
  options: AllocateOptions = {}
): SlotAssignment[] {
  const eligible = eligibleDates(window, prefs.preferredDays);
  if (eligible.length === 0) {
    throw new InsufficientSlotsError(window.start, window.end);
  }

  if (candidates.length === 0) {
    if (options.allowEmpty) return [];
    throw new EmptyCandidatesError();
  }

  const total = Math.min(candidates.length, prefs.frequency * weeksInRange(window));
  const start = parseISODate(window.start);
  if (!start) {
    throw new InsufficientSlotsError(window.start, window.end);
  }

  const slots: Slot[] = [];
  for (let block = 0; slots.length < total; block++) {
    const blockStart = toISODate(addDays(start, block * 7));
    const blockEnd = toISODate(addDays(start, block * 7 + 6));
    if (blockStart > window.end) break;

    const blockDates = eligible.filter((d) => {
      const iso = toISODate(d);
      return iso >= blockStart && iso <= blockEnd;
    });
    const quota = Math.min(prefs.frequency, total - slots.length);
    slots.push(...pickFromBlock(blockDates, quota));
  }

  slots.sort((a, b) => a.date.getTime() - b.date.getTime());

  const usedTimes = new Map<string, Set<string>>();
  return slots.map((slot, i) => {
    const candidate = candidates[i];
    const date = toISODate(slot.date);
    const used = usedTimes.get(date) ?? new Set<string>(options.occupied?.get(date));
    usedTimes.set(date, used);

    const time = pickTime(candidate, used);
    used.add(time);

    return { candidate, date, weekday: slot.weekday, time };
  });
}
