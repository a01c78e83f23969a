import { InputFormatError, MalformedRecordError } from "../errors";

const MINUTE_MS = 60 * 1000;

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{2}):(\d{2})$/;
const OFFSET_RE = /^(?:Z|([+-])(\d{2}):?(\d{2}))$/;
const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * A half-open interval `[start, end)` in absolute time, plus the wall-clock
 * labels it was built from.
 */
export interface WindowQuery {
  // Calendar date of `start` in the feed's offset (YYYY-MM-DD)
  date: string;
  // Calendar date of `end`; differs from `date` when the window crosses midnight
  endDate: string;
  start: Date;
  end: Date;
  startLabel: string;
  endLabel: string;
}

export interface WindowPair {
  main: WindowQuery;
  before: WindowQuery;
}

/**
 * Parse "Z", "+01:00" or "-0530" into minutes east of UTC.
 */
export function parseUtcOffset(offset: string): number {
  const match = OFFSET_RE.exec(offset.trim());
  if (!match) {
    throw new InputFormatError(`Invalid UTC offset "${offset}", expected Z or ±HH:MM`);
  }
  const [, sign, hours, minutes] = match;
  if (!sign) return 0;

  const total = parseInt(hours, 10) * 60 + parseInt(minutes, 10);
  if (parseInt(minutes, 10) > 59 || total > 14 * 60) {
    throw new InputFormatError(`Invalid UTC offset "${offset}"`);
  }
  return sign === "-" ? -total : total;
}

function isValidDate(year: number, month: number, day: number): boolean {
  const utc = new Date(Date.UTC(year, month - 1, day));
  return (
    utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day
  );
}

/**
 * Combine a YYYY-MM-DD date and HH:MM time, read as wall-clock time at the
 * given offset, into an absolute instant.
 */
export function parseLocalDateTime(date: string, time: string, offsetMinutes: number): Date {
  const dateMatch = DATE_RE.exec(date);
  if (!dateMatch) {
    throw new InputFormatError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  const timeMatch = TIME_RE.exec(time);
  if (!timeMatch) {
    throw new InputFormatError(`Invalid start time "${time}", expected HH:MM`);
  }

  const [year, month, day] = dateMatch.slice(1).map(Number);
  const [hour, minute] = timeMatch.slice(1).map(Number);

  if (!isValidDate(year, month, day)) {
    throw new InputFormatError(`Invalid date "${date}"`);
  }
  if (hour > 23 || minute > 59) {
    throw new InputFormatError(`Invalid start time "${time}"`);
  }

  return new Date(Date.UTC(year, month - 1, day, hour, minute) - offsetMinutes * MINUTE_MS);
}

/**
 * Parse a feed timestamp. Timestamps without an offset are read at
 * `defaultOffsetMinutes`.
 * @throws MalformedRecordError when the value is missing or unreadable
 */
export function parseFeedTimestamp(field: string, value: string | undefined, defaultOffsetMinutes: number): Date {
  const match = value ? TIMESTAMP_RE.exec(value) : null;
  if (!match) {
    throw new MalformedRecordError(field, value);
  }

  const [, y, mo, d, h, mi, s, frac, zone] = match;
  const [year, month, day, hour, minute] = [y, mo, d, h, mi].map(Number);
  const second = s ? Number(s) : 0;
  const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;

  if (!isValidDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    throw new MalformedRecordError(field, value);
  }

  let offset = defaultOffsetMinutes;
  if (zone) {
    try {
      offset = parseUtcOffset(zone);
    } catch {
      throw new MalformedRecordError(field, value);
    }
  }

  return new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis) - offset * MINUTE_MS);
}

function shift(date: Date, offsetMinutes: number): Date {
  return new Date(date.getTime() + offsetMinutes * MINUTE_MS);
}

/** YYYY-MM-DD of an instant, seen at the given offset. */
export function calendarDate(instant: Date, offsetMinutes: number): string {
  return shift(instant, offsetMinutes).toISOString().slice(0, 10);
}

/** HH:MM of an instant, seen at the given offset. */
export function wallClockTime(instant: Date, offsetMinutes: number): string {
  return shift(instant, offsetMinutes).toISOString().slice(11, 16);
}

export function addMinutes(instant: Date, minutes: number): Date {
  return shift(instant, minutes);
}

/**
 * Half-open overlap: touching endpoints do not overlap.
 */
export function timeOverlaps(slotStart: Date, slotEnd: Date, checkStart: Date, checkEnd: Date): boolean {
  return slotStart.getTime() < checkEnd.getTime() && slotEnd.getTime() > checkStart.getTime();
}

export function buildWindow(start: Date, lengthMinutes: number, offsetMinutes: number): WindowQuery {
  const end = addMinutes(start, lengthMinutes);
  return {
    date: calendarDate(start, offsetMinutes),
    endDate: calendarDate(end, offsetMinutes),
    start,
    end,
    startLabel: wallClockTime(start, offsetMinutes),
    endLabel: wallClockTime(end, offsetMinutes),
  };
}

/**
 * The booking window starting at `date startTime` and the window of the same
 * length that ends where it begins.
 */
export function buildWindowPair(
  date: string,
  startTime: string,
  lengthMinutes: number,
  offsetMinutes: number
): WindowPair {
  const start = parseLocalDateTime(date, startTime, offsetMinutes);
  return {
    main: buildWindow(start, lengthMinutes, offsetMinutes),
    before: buildWindow(addMinutes(start, -lengthMinutes), lengthMinutes, offsetMinutes),
  };
}
