import { WEEKDAYS, type DateRange, type Weekday } from "./types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Parses YYYY-MM-DD as a UTC midnight Date; null when malformed or not a real date. */
export function parseISODate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return toISODate(date) === value ? date : null;
}

export function toISODate(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number) {
  const d = new Date(date);
  d.setUTCDate(d.getUTCDate() + days);
  return d;
}

export function weekdayOf(date: Date): Weekday {
  // getUTCDay: Sun=0
  return WEEKDAYS[(date.getUTCDay() + 6) % 7];
}

export function weekdayOfISODate(value: string): Weekday {
  const date = parseISODate(value);
  if (!date) throw new Error(`Not a calendar date: ${value}`);
  return weekdayOf(date);
}

export function weekdayIndex(day: Weekday) {
  return WEEKDAYS.indexOf(day);
}

/** Every date in the range, inclusive. Assumes a validated range. */
export function datesInRange(range: DateRange): Date[] {
  const start = parseISODate(range.start);
  const end = parseISODate(range.end);
  if (!start || !end) return [];

  const out: Date[] = [];
  for (let d = start; d.getTime() <= end.getTime(); d = addDays(d, 1)) {
    out.push(d);
  }
  return out;
}

export function daysInRange(range: DateRange) {
  return datesInRange(range).length;
}

export function weeksInRange(range: DateRange) {
  return Math.ceil(daysInRange(range) / 7);
}

export function isWithinRange(date: string, range: DateRange) {
  return date >= range.start && date <= range.end;
}

const TIME_24H = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const TIME_12H = /^(1[0-2]|0?[1-9]):([0-5]\d)\s*([AaPp][Mm])$/;

/**
 * Normalizes "18:00", "9:30" or "6:00 PM" to "HH:MM". Returns null for
 * anything else.
 */
export function parseTimeOfDay(value: string): string | null {
  const trimmed = value.trim();

  const h24 = TIME_24H.exec(trimmed);
  if (h24) {
    return `${h24[1].padStart(2, "0")}:${h24[2]}`;
  }

  const h12 = TIME_12H.exec(trimmed);
  if (h12) {
    let hours = Number(h12[1]) % 12;
    if (h12[3].toLowerCase() === "pm") hours += 12;
    return `${String(hours).padStart(2, "0")}:${h12[2]}`;
  }

  return null;
}

export function minutesToTime(minutes: number) {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}
