/**
 * Expiry of stored reports relative to the report's own timestamp
 */

import { TimestampParseError } from './errors';

const RFC3339_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-](\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses an RFC 3339 timestamp into Unix seconds. Dates that do not exist on
 * the calendar (Feb 30, hour 24) are rejected rather than rolled over.
 */
export function parseRfc3339(value: string): number {
  const match = RFC3339_REGEX.exec(value);
  if (!match) {
    throw new TimestampParseError(value);
  }
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = match[9] === undefined ? 0 : Number(match[9]);
  const offsetMinute = match[10] === undefined ? 0 : Number(match[10]);
  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetHour > 23 ||
    offsetMinute > 59
  ) {
    throw new TimestampParseError(value);
  }
  const ms = Date.parse(value.toUpperCase());
  if (Number.isNaN(ms)) {
    throw new TimestampParseError(value);
  }
  return Math.floor(ms / 1000);
}

/**
 * Seconds left until a report expires: the report timestamp plus its
 * freshness window, measured from `now`. Zero or negative means the report
 * is already stale; the storage layer treats that as "expire immediately".
 *
 * @example
 * expireSeconds('2020-01-01T12:00:00Z', 3 * 3600, new Date('2020-01-01T13:00:00Z')) // 7200
 */
export function expireSeconds(timestamp: string, windowSeconds: number, now: Date = new Date()): number {
  const nowSeconds = Math.floor(now.getTime() / 1000);
  return parseRfc3339(timestamp) + windowSeconds - nowSeconds;
}
