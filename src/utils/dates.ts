/**
 * Calendar-day helpers. Snapshot dates travel as `YYYY-MM-DD` strings.
 */

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function isDateKey(value: string): boolean {
  if (!DATE_KEY.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Calendar date of `instant` in `timeZone`
 */
export function toDateKey(instant: Date, timeZone = 'UTC'): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).format(instant);
}

export function shiftDateKey(dateKey: string, days: number): string {
  const base = Date.parse(`${dateKey}T00:00:00Z`);
  return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Every date from `start` to `end`, both inclusive
 */
export function eachDateKey(start: string, end: string): string[] {
  const days: string[] = [];
  for (let current = start; current <= end; current = shiftDateKey(current, 1)) {
    days.push(current);
  }
  return days;
}
