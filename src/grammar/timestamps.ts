export const OPEN_START_SENTINEL = "00000000T000000";
export const OPEN_STOP_SENTINEL = "99999999T999999";

// Bounds used for open-ended validity windows.
export const MIN_TIMESTAMP_MS = Date.parse("0001-01-01T00:00:00.000Z");
export const MAX_TIMESTAMP_MS = Date.parse("9999-12-31T23:59:59.999Z");

const DAY_MS = 24 * 60 * 60 * 1000;

export function minTimestamp(): Date {
  return new Date(MIN_TIMESTAMP_MS);
}

export function maxTimestamp(): Date {
  return new Date(MAX_TIMESTAMP_MS);
}

export function isMinTimestamp(value: Date): boolean {
  return value.getTime() === MIN_TIMESTAMP_MS;
}

export function isMaxTimestamp(value: Date): boolean {
  return value.getTime() === MAX_TIMESTAMP_MS;
}

/** ISO text, or "open" for either bound of an open-ended window. */
export function formatValidityInstant(value: Date): string {
  return isMinTimestamp(value) || isMaxTimestamp(value) ? "open" : value.toISOString();
}

function buildUtc(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number
): Date | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  // setUTCFullYear keeps years below 100 literal, Date.UTC would map them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  if (date.getUTCFullYear() !== year) return null;
  if (date.getUTCMonth() !== month - 1) return null;
  if (date.getUTCDate() !== day) return null;
  return date;
}

/** Strict `YYYYMMDDTHHMMSS` (UTC). Returns null for anything else. */
export function parseCompactTimestamp(value: string): Date | null {
  const match = value.match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/);
  if (!match) return null;
  const [, y, mo, d, h, mi, s] = match;
  return buildUtc(Number(y), Number(mo), Number(d), Number(h), Number(mi), Number(s));
}

/** Strict `YYYYMMDD` at midnight UTC. */
export function parseCompactDate(value: string): Date | null {
  const match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!match) return null;
  const [, y, mo, d] = match;
  return buildUtc(Number(y), Number(mo), Number(d), 0, 0, 0);
}

export function parseValidityStart(value: string): Date | null {
  if (value === OPEN_START_SENTINEL) return minTimestamp();
  return parseCompactTimestamp(value);
}

export function parseValidityStop(value: string): Date | null {
  if (value === OPEN_STOP_SENTINEL) return maxTimestamp();
  return parseCompactTimestamp(value);
}

export function addDaysUtc(value: Date, days: number): Date {
  return new Date(value.getTime() + days * DAY_MS);
}

export type DatePathParts = {
  year: string;
  month: string;
  day: string;
};

export function datePathParts(value: Date): DatePathParts {
  return {
    year: String(value.getUTCFullYear()).padStart(4, "0"),
    month: String(value.getUTCMonth() + 1).padStart(2, "0"),
    day: String(value.getUTCDate()).padStart(2, "0"),
  };
}
