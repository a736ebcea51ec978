// packages/game-core/src/calendar.ts
//
// Calendar helpers for the daily game.
//
// A "day" is a DateKey: an ISO calendar date ("YYYY-MM-DD") taken in one
// canonical timezone, so every player rolls over to the next challenge at the
// same instant. All arithmetic happens on UTC midnights of those keys, which
// keeps it free of daylight-saving jumps.

export type DateKey = string;

const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** True for a well-formed, real calendar date ("2024-02-30" is rejected). */
export function isDateKey(value: string): value is DateKey {
  const m = DATE_KEY.exec(value);
  if (!m) return false;
  const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const t = new Date(Date.UTC(y, mo - 1, d));
  return (
    t.getUTCFullYear() === y && t.getUTCMonth() === mo - 1 && t.getUTCDate() === d
  );
}

function utcMidnight(date: DateKey): number {
  if (!isDateKey(date)) throw new Error(`Invalid date key: ${date}`);
  const [y, m, d] = date.split('-').map(Number);
  return Date.UTC(y, m - 1, d);
}

/**
 * The calendar day of `instant` as seen in `timeZone`.
 *
 * @example
 *   dateKeyInZone(new Date('2024-03-30T23:30:00Z'), 'Europe/London') // '2024-03-30'
 *   dateKeyInZone(new Date('2024-06-30T23:30:00Z'), 'Europe/London') // '2024-07-01'
 */
export function dateKeyInZone(instant: Date, timeZone: string): DateKey {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/** 1-based ordinal day within the year (1 January → 1). */
export function dayOfYear(date: DateKey): number {
  const t = utcMidnight(date);
  const jan1 = Date.UTC(new Date(t).getUTCFullYear(), 0, 1);
  return Math.round((t - jan1) / MS_PER_DAY) + 1;
}

/** Signed whole days from `from` to `to`. */
export function daysBetween(from: DateKey, to: DateKey): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / MS_PER_DAY);
}

/** `date` moved by `days` (negative goes back). */
export function addDays(date: DateKey, days: number): DateKey {
  return new Date(utcMidnight(date) + days * MS_PER_DAY)
    .toISOString()
    .slice(0, 10);
}

/**
 * Seed for the daily pick: year * 1000 + day of year.
 * 15 January 1985 → 1985015.
 */
export function seedForDate(date: DateKey): number {
  return Number(date.slice(0, 4)) * 1000 + dayOfYear(date);
}

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** "1985-01-15" → "January 15, 1985". */
export function formatLongDate(date: DateKey): string {
  const [y, m, d] = date.split('-').map(Number);
  return `${MONTHS[m - 1]} ${d}, ${y}`;
}
