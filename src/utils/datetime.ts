/**
 * Date/time parsing against configured formats, and the report timestamp format
 */

import type { DatetimeFormat } from "../types/config.js";

const MS_PER_MINUTE = 60_000;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

/**
 * Compile datetime formats, dropping stateful flags
 */
export function compileDatetimeFormats(formats: DatetimeFormat[]): RegExp[] {
  return formats.map(
    (format) => new RegExp(format.regex, (format.flags ?? "").replace(/[gy]/g, "")),
  );
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function groupNumber(
  groups: Record<string, string | undefined>,
  name: string,
  fallback: number,
): number {
  const raw = groups[name];
  return raw === undefined ? fallback : Number(raw);
}

function offsetMinutes(offset: string | undefined): number {
  if (offset === undefined || offset === "Z") {
    return 0;
  }
  const digits = offset.slice(1).replace(":", "");
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
  return offset.startsWith("-") ? -minutes : minutes;
}

/**
 * Build a UTC instant from calendar components, or null when they do not
 * denote a real date/time. Avoids Date.UTC, which remaps years 0-99.
 */
export function utcInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0,
): Date | null {
  const parts = [year, month, day, hour, minute, second, millisecond];
  if (!parts.every((part) => Number.isInteger(part) && part >= 0)) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);
  return date;
}

export interface ParsedDatetime {
  instant: Date;
  /** Sub-millisecond digits of the fraction (0-999), which Date drops */
  microsecond: number;
}

/**
 * Parse a raw string against compiled formats; the first matching format wins.
 * Timestamps without an offset are read as UTC.
 */
export function parseDatetimeParts(
  text: string,
  formats: RegExp[],
): ParsedDatetime | null {
  const trimmed = text.trim();

  for (const format of formats) {
    const groups = format.exec(trimmed)?.groups;
    if (!groups) continue;

    const fraction = groups.fraction ?? "";
    const millisecond = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
    const microsecond = Number(fraction.slice(3, 6).padEnd(3, "0"));

    const instant = utcInstant(
      groupNumber(groups, "year", NaN),
      groupNumber(groups, "month", NaN),
      groupNumber(groups, "day", NaN),
      groupNumber(groups, "hour", 0),
      groupNumber(groups, "minute", 0),
      groupNumber(groups, "second", 0),
      millisecond,
    );
    if (!instant) continue;

    const shift = offsetMinutes(groups.offset);
    return {
      instant: shift === 0 ? instant : new Date(instant.getTime() - shift * MS_PER_MINUTE),
      microsecond,
    };
  }

  return null;
}

export function parseDatetime(text: string, formats: RegExp[]): Date | null {
  return parseDatetimeParts(text, formats)?.instant ?? null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format as "YYYY-MM-DD HH:MM:SS[.ffffff]" in UTC.
 * The fraction is always written when `alwaysFraction` is set, otherwise only
 * when the instant has a millisecond part.
 */
export function formatTimestamp(date: Date, alwaysFraction = false): string {
  const base =
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

  const ms = date.getUTCMilliseconds();
  if (!alwaysFraction && ms === 0) {
    return base;
  }
  return `${base}.${pad(ms, 3)}000`;
}

/**
 * Inverse of formatTimestamp; returns null for anything else
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction] = match;
  return utcInstant(
    Number(year),
    Number(month),
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0,
  );
}
