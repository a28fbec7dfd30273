// Calendar dates are handled as "YYYY-MM-DD" keys. Arithmetic runs in UTC on
// the key itself so DST transitions never shift a day.

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function isDateKey(value: string): boolean {
  const m = value.match(DATE_KEY_RE);
  if (!m) return false;
  const ms = Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
  return new Date(ms).toISOString().slice(0, 10) === value;
}

/** Parse a key into a UTC-midnight epoch. Returns null for anything that is not a real date. */
export function parseDateKey(value: string): number | null {
  if (!isDateKey(value)) return null;
  return Date.parse(`${value}T00:00:00.000Z`);
}

/** Calendar date of `d` in the host's local zone. */
export function localDateKey(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export function addDays(key: string, days: number): string {
  const base = parseDateKey(key);
  if (base === null) throw new RangeError(`not a calendar date: ${key}`);
  return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
}

/** 0 = Monday ... 6 = Sunday */
export function weekdayIndex(key: string): number {
  const base = parseDateKey(key);
  if (base === null) throw new RangeError(`not a calendar date: ${key}`);
  return (new Date(base).getUTCDay() + 6) % 7;
}

export function mostRecentMonday(key: string): string {
  return addDays(key, -weekdayIndex(key));
}

/** ISO-8601 in the host's local zone with an explicit offset, e.g. 2026-02-01T09:30:00.000+01:00. */
export function toLocalIsoString(d: Date): string {
  const offsetMin = -d.getTimezoneOffset();
  const sign = offsetMin >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMin);
  return (
    `${localDateKey(d)}T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}` +
    `.${pad(d.getMilliseconds(), 3)}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

/**
 * Calendar date of a timestamp, local to the timestamp itself: the date part
 * of an ISO string is taken as written, whatever offset follows it.
 */
export function entryDateKey(timestamp: string): string {
  const head = timestamp.slice(0, 10);
  if (isDateKey(head)) return head;
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    throw new RangeError(`unparseable timestamp: ${timestamp}`);
  }
  return localDateKey(parsed);
}

/** "HH:MM" of a timestamp, local to the timestamp. */
export function entryClock(timestamp: string): string {
  const m = timestamp.match(/^\d{4}-\d{2}-\d{2}[T ](\d{2}):(\d{2})/);
  if (m) return `${m[1]}:${m[2]}`;
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) return "00:00";
  return `${pad(parsed.getHours())}:${pad(parsed.getMinutes())}`;
}
