// Calendar-date helpers. Every date in the app is a "YYYY-MM-DD" string with
// no time-of-day or zone; arithmetic runs in UTC so DST never shifts a day.

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_RE = /^(\d{4})-(\d{2})$/;

// ─── Clock ──────────────────────────────────────────────

/** Source of "now". Injected everywhere so tests can pin the date. */
export interface Clock {
  today(): string;
  now(): Date;
}

export const systemClock: Clock = {
  today: () => getToday(),
  now: () => new Date(),
};

/** Clock frozen at a given calendar date (noon local time) */
export function fixedClock(today: string): Clock {
  return {
    today: () => today,
    now: () => new Date(`${today}T12:00:00`),
  };
}

// ─── Formatting & Parsing ───────────────────────────────

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Local calendar date of an instant */
export function formatLocalDate(d: Date): string {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Today's date in the server's local zone */
export function getToday(): string {
  return formatLocalDate(new Date());
}

function toUtc(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

export function isValidDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const d = toUtc(value);
  return (
    !Number.isNaN(d.getTime()) &&
    d.getUTCFullYear() === Number(match[1]) &&
    d.getUTCMonth() + 1 === Number(match[2]) &&
    d.getUTCDate() === Number(match[3])
  );
}

/**
 * Calendar date of a stored value. Plain dates pass through; timestamps are
 * converted to the local date they fall on.
 */
export function toCalendarDate(value: string): string {
  if (isValidDate(value)) return value;
  return formatLocalDate(new Date(value));
}

// ─── Arithmetic ─────────────────────────────────────────

export function addDays(date: string, days: number): string {
  const d = toUtc(date);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/** Whole days from `start` to `end` (negative when end is earlier) */
export function daysBetween(start: string, end: string): number {
  return Math.round((toUtc(end).getTime() - toUtc(start).getTime()) / DAY_MS);
}

/** Every date from start to end inclusive, ascending. Empty if start > end. */
export function eachDay(start: string, end: string): string[] {
  const days: string[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) {
    days.push(d);
  }
  return days;
}

/** First and last day of a "YYYY-MM" month, or null if malformed */
export function monthBounds(month: string): { start: string; end: string } | null {
  const match = MONTH_RE.exec(month);
  if (!match) return null;
  const year = Number(match[1]);
  const monthNum = Number(match[2]);
  if (monthNum < 1 || monthNum > 12) return null;
  const lastDay = new Date(Date.UTC(year, monthNum, 0)).getUTCDate();
  return {
    start: `${pad(year, 4)}-${pad(monthNum)}-01`,
    end: `${pad(year, 4)}-${pad(monthNum)}-${pad(lastDay)}`,
  };
}

export function yearBounds(year: number): { start: string; end: string } {
  return { start: `${pad(year, 4)}-01-01`, end: `${pad(year, 4)}-12-31` };
}
