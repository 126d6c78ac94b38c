/**
 * Calendar helpers for tenant-local dates.
 *
 * Dates are carried as `YYYY-MM-DD` strings and resolved against an IANA
 * timezone with Intl, the same way the slot engine resolves business hours.
 */

const MINUTE_MS = 60_000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function addMinutes(instant: Date, minutes: number): Date {
  return new Date(instant.getTime() + minutes * MINUTE_MS);
}

export function addDays(instant: Date, days: number): Date {
  return addMinutes(instant, days * 24 * 60);
}

export function isValidDateString(date: string): boolean {
  const match = DATE_PATTERN.exec(date);
  if (!match) return false;
  const [, y, m, d] = match.map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;
  const probe = new Date(Date.UTC(y, m - 1, d));
  return probe.getUTCFullYear() === y && probe.getUTCMonth() === m - 1 && probe.getUTCDate() === d;
}

function parseDateString(date: string): [number, number, number] {
  const match = DATE_PATTERN.exec(date);
  if (!match || !isValidDateString(date)) {
    throw new RangeError(`Invalid calendar date: ${date}`);
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
}

// Offset of `timeZone` from UTC at `instant`, in minutes (east positive)
function offsetMinutes(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = Math.floor(instant.getTime() / 1000) * 1000;
  return (asUtc - truncated) / MINUTE_MS;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * The instant at which the wall clock in `timeZone` reads `date hour:minute`.
 * Hours past 23 roll into the following day.
 */
export function zonedDateTime(date: string, hour: number, minute: number, timeZone: string): Date {
  const [y, m, d] = parseDateString(date);
  const wallAsUtc = Date.UTC(y, m - 1, d, hour, minute);
  const first = wallAsUtc - offsetMinutes(new Date(wallAsUtc), timeZone) * MINUTE_MS;
  // Second pass settles instants that straddle a DST change
  const second = wallAsUtc - offsetMinutes(new Date(first), timeZone) * MINUTE_MS;
  return new Date(second);
}

export function toLocalDateString(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

export function formatLocalDateTime(instant: Date, timeZone: string): string {
  const p = zonedParts(instant, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}

export function addDaysToDateString(date: string, days: number): string {
  const [y, m, d] = parseDateString(date);
  const shifted = new Date(Date.UTC(y, m - 1, d + days));
  return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

export function daysBetween(start: string, end: string): number {
  const [ys, ms, ds] = parseDateString(start);
  const [ye, me, de] = parseDateString(end);
  return Math.round((Date.UTC(ye, me - 1, de) - Date.UTC(ys, ms - 1, ds)) / (24 * 60 * MINUTE_MS));
}

export interface DayWindow {
  start: Date;
  end: Date;
}

// Local midnight-to-midnight window containing `instant`
export function localDayWindow(instant: Date, timeZone: string): DayWindow {
  const date = toLocalDateString(instant, timeZone);
  return dayWindowForDate(date, timeZone);
}

export function dayWindowForDate(date: string, timeZone: string): DayWindow {
  return {
    start: zonedDateTime(date, 0, 0, timeZone),
    end: zonedDateTime(addDaysToDateString(date, 1), 0, 0, timeZone),
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
