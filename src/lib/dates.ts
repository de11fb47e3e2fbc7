/**
 * Feed Recorder: Date Normalization
 *
 * Feeds carry dates in whatever shape their generator felt like:
 * RFC 2822 in RSS, W3C date-times in Atom, and assorted free text
 * elsewhere. Everything is normalized to `YYYY-MM-DDTHH:MM:SS±HH:MM`
 * so that lexical order is chronological order.
 */

import { DATE_FIELDS } from '../types';
import type { RawFeedEntry } from '../types';
import { logger as defaultLogger } from './logger';
import type { Logger } from './logger';

// ============================================================
// FORMATTING
// ============================================================

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Render an instant as ISO-8601 in the given UTC offset, seconds precision.
 */
export function formatIsoTimestamp(epochMs: number, offsetMinutes: number = 0): string {
  const local = new Date(epochMs + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return (
    `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}` +
    `T${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

interface DateParts {
  year: number;
  month: number; // 0-based
  day: number;
  hour: number;
  minute: number;
  second: number;
  offsetMinutes: number;
}

/**
 * Build the timestamp, or undefined when the parts are not a real
 * calendar date (Feb 30, hour 25, ...).
 */
function toTimestamp(parts: DateParts): string | undefined {
  const { year, month, day, hour, minute, second, offsetMinutes } = parts;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const wallClock = new Date(Date.UTC(year, month, day, hour, minute, second));
  wallClock.setUTCFullYear(year); // Date.UTC maps years 0-99 onto 1900-1999

  if (
    wallClock.getUTCFullYear() !== year ||
    wallClock.getUTCMonth() !== month ||
    wallClock.getUTCDate() !== day
  ) {
    return undefined;
  }

  return formatIsoTimestamp(wallClock.getTime() - offsetMinutes * 60_000, offsetMinutes);
}

// ============================================================
// RFC 2822
// ============================================================

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const ZONE_OFFSETS: Record<string, number> = {
  ut: 0,
  utc: 0,
  gmt: 0,
  z: 0,
  est: -300,
  edt: -240,
  cst: -360,
  cdt: -300,
  mst: -420,
  mdt: -360,
  pst: -480,
  pdt: -420,
};

// [Day,] DD Mon YY[YY] [HH:MM[:SS]] [zone]
const RFC2822_PATTERN =
  /^(?:[a-z]+\.?,?\s+)?(\d{1,2})\s+([a-z]+)\.?,?\s+(\d{4}|\d{2})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?(?:\s*([a-z]+|[+-]\d{4}))?$/i;

function parseZone(zone: string | undefined): number | undefined {
  if (!zone) return 0;

  if (zone.startsWith('+') || zone.startsWith('-')) {
    const sign = zone.startsWith('-') ? -1 : 1;
    const hours = parseInt(zone.slice(1, 3), 10);
    const minutes = parseInt(zone.slice(3, 5), 10);
    if (hours > 23 || minutes > 59) return undefined;
    return sign * (hours * 60 + minutes);
  }

  // Unknown zone names are read as UTC
  return ZONE_OFFSETS[zone.toLowerCase()] ?? 0;
}

/**
 * Parse an RFC 2822 date (`Mon, 02 Jan 2006 15:04:05 +0000`), keeping
 * its UTC offset. Two-digit years above 68 are 19xx, the rest 20xx.
 */
export function parseRfc2822Date(value: string): string | undefined {
  const match = RFC2822_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, dayStr, monthName, yearStr, hourStr, minuteStr, secondStr, zone] = match;

  const month = MONTHS[monthName.slice(0, 3).toLowerCase()];
  if (month === undefined) return undefined;

  let year = parseInt(yearStr, 10);
  if (yearStr.length === 2) {
    year += year > 68 ? 1900 : 2000;
  }

  const offsetMinutes = parseZone(zone);
  if (offsetMinutes === undefined) return undefined;

  return toTimestamp({
    year,
    month,
    day: parseInt(dayStr, 10),
    hour: hourStr ? parseInt(hourStr, 10) : 0,
    minute: minuteStr ? parseInt(minuteStr, 10) : 0,
    second: secondStr ? parseInt(secondStr, 10) : 0,
    offsetMinutes,
  });
}

// ============================================================
// LOOSE FORMATS
// ============================================================

// YYYY-MM-DD[THH:MM[:SS[.fff]]][Z|±HH[:MM]]
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[t\s](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?)?\s*(z|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseIsoOffset(zone: string | undefined): number | undefined {
  if (!zone || zone.toLowerCase() === 'z') return 0;

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2, 4), 10) : 0;
  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

function parseIsoDate(value: string): string | undefined {
  const match = ISO_PATTERN.exec(value);
  if (!match) return undefined;

  const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, zone] = match;

  const offsetMinutes = parseIsoOffset(zone);
  if (offsetMinutes === undefined) return undefined;

  return toTimestamp({
    year: parseInt(yearStr, 10),
    month: parseInt(monthStr, 10) - 1,
    day: parseInt(dayStr, 10),
    hour: hourStr ? parseInt(hourStr, 10) : 0,
    minute: minuteStr ? parseInt(minuteStr, 10) : 0,
    second: secondStr ? parseInt(secondStr, 10) : 0,
    offsetMinutes,
  });
}

// The runtime parser accepts almost anything ("1" is a year), so only
// hand it strings that look like a date: a month name or a numeric d/m/y.
function looksLikeDate(value: string): boolean {
  return /\d/.test(value) && (/[a-z]{3}/i.test(value) || /\d{1,4}[-/.]\d{1,2}[-/.]\d{1,4}/.test(value));
}

const ZONE_NAME = /\b(?:gmt|utc|ut|z|[ecmp][sd]t)\b/i;

// A trailing numeric offset after a time or a space
const NUMERIC_OFFSET = /(?:\s|\d{2}:\d{2}(?::\d{2})?)([+-]\d{2}:?\d{2})$/;

/**
 * Parse the formats feeds use besides RFC 2822: ISO-8601 / W3C
 * date-times (offset kept), then free-form dates with named or numeric
 * months, rendered in UTC.
 */
export function parseLooseDate(value: string): string | undefined {
  const trimmed = value.trim();

  const iso = parseIsoDate(trimmed);
  if (iso) return iso;
  if (!looksLikeDate(trimmed)) return undefined;

  const offset = NUMERIC_OFFSET.exec(trimmed);
  if (offset && parseIsoOffset(offset[1]) === undefined) return undefined;

  // Date.parse reads zone-less text in the host's local time
  const hasZone = offset !== null || ZONE_NAME.test(trimmed);
  const epochMs = Date.parse(hasZone ? trimmed : `${trimmed} UTC`);
  if (Number.isNaN(epochMs)) return undefined;

  return formatIsoTimestamp(epochMs, 0);
}

// ============================================================
// ENTRY DATES
// ============================================================

export interface DateNormalizerOptions {
  logger?: Logger;
  /** Clock for the fallback timestamp */
  now?: () => Date;
}

/**
 * Pick the entry's timestamp: the first of published, updated, pubDate
 * and date that is non-empty and parses. Falls back to the current time,
 * with a warning, when none does.
 */
export function normalizeEntryDate(
  entry: RawFeedEntry,
  options: DateNormalizerOptions = {}
): string {
  const log = options.logger ?? defaultLogger;

  for (const field of DATE_FIELDS) {
    const value = entry[field];
    if (typeof value !== 'string' || value.trim() === '') continue;

    const parsed = parseRfc2822Date(value) ?? parseLooseDate(value);
    if (parsed) return parsed;

    log.debug('Failed to parse date', { field, value });
  }

  log.warn('No valid date found for entry', { title: entry.title ?? 'Unknown' });

  const now = options.now ? options.now() : new Date();
  return formatIsoTimestamp(now.getTime(), 0);
}
