import { WorkItemError } from './errors';

export interface AuditPeriod {
  start: Date;
  end: Date;
}

/** Smallest instant a JS Date can hold; never inside an audit period. */
export const EARLIEST_INSTANT = new Date(-8.64e15);

// Date, then optionally a time (hours, minutes, seconds, fraction) with an
// optional `Z`, `±hh`, `±hhmm` or `±hh:mm` offset.
const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

export function startOfMonthUtc(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

/**
 * The calendar month before `now`, in UTC. `end` is the last millisecond of
 * that month and both bounds are inclusive.
 */
export function computeAuditPeriod(now: Date): AuditPeriod {
  const currentMonthStart = startOfMonthUtc(now);
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1));
  return { start, end: new Date(currentMonthStart.getTime() - 1) };
}

export function isInPeriod(instant: Date, period: AuditPeriod): boolean {
  const t = instant.getTime();
  return t >= period.start.getTime() && t <= period.end.getTime();
}

/**
 * Reads a joblog timestamp. Absent values map to EARLIEST_INSTANT and ISO
 * strings without an offset are taken as UTC.
 */
export function parseLogTimestamp(value: Date | string | null | undefined): Date {
  if (value === null || value === undefined) {
    return EARLIEST_INSTANT;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new WorkItemError('Ugyldigt tidspunkt i joblog.');
    }
    return value;
  }

  const parsed = parseIsoTimestamp(value.trim());
  if (!parsed) {
    throw new WorkItemError(`Ugyldigt tidspunkt i joblog: "${value}".`);
  }
  return parsed;
}

function offsetMinutes(offset: string | undefined): number | null {
  if (offset === undefined || offset.toUpperCase() === 'Z') {
    return 0;
  }
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return (offset.startsWith('-') ? -1 : 1) * (hours * 60 + minutes);
}

// Fractions past milliseconds are truncated; Date keeps milliseconds.
function parseIsoTimestamp(text: string): Date | null {
  const match = ISO_TIMESTAMP.exec(text);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', offset] = match;
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  const ms = Number(fraction.slice(0, 3).padEnd(3, '0'));
  const shift = offsetMinutes(offset);
  if (h > 23 || mi > 59 || s > 59 || shift === null) {
    return null;
  }

  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return null;
  }
  date.setUTCHours(h, mi, s, ms);
  return new Date(date.getTime() - shift * 60_000);
}
