export const DAY_MS = 24 * 60 * 60 * 1000;

const CALENDAR_DATE = /^(\d{4}-\d{2}-\d{2})/;

/** YYYY-MM-DD for a date or timestamp string, null when absent or unparseable. */
export function toCalendarDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  const match = CALENDAR_DATE.exec(trimmed);
  if (match && !trimmed.includes("T")) return match[1];
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return match ? match[1] : null;
  return parsed.toISOString().slice(0, 10);
}

/** Canonical UTC ISO-8601 timestamp, null when absent or unparseable. */
export function toIsoTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

export function parseTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = new Date(value).getTime();
  return Number.isNaN(ms) ? null : ms;
}

/** Whole calendar days from `now`'s UTC date to `date`; negative when overdue. */
export function daysUntil(date: string, now: Date): number | null {
  const calendar = toCalendarDate(date);
  if (!calendar) return null;
  const target = Date.parse(`${calendar}T00:00:00.000Z`);
  const today = Date.parse(`${now.toISOString().slice(0, 10)}T00:00:00.000Z`);
  return Math.round((target - today) / DAY_MS);
}

/** Whole days elapsed since `timestamp`, floored. */
export function daysSince(timestamp: string, now: Date): number | null {
  const ms = parseTimestamp(timestamp);
  if (ms === null) return null;
  return Math.floor((now.getTime() - ms) / DAY_MS);
}

export function subtractDays(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}
