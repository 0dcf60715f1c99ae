/**
 * Parsers for user-supplied filter values (sizes, times, tags).
 *
 * All of them fail with ConfigurationError so that malformed input is
 * rejected before the first remote call.
 */

import { ConfigurationError } from '@shared/errors';

const SIZE_MULTIPLIERS: ReadonlyArray<[suffix: string, multiplier: number]> = [
  ['TB', 1024 ** 4],
  ['GB', 1024 ** 3],
  ['MB', 1024 ** 2],
  ['KB', 1024],
  ['B', 1],
];

const TIME_UNITS_MS: Readonly<Record<string, number>> = {
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000,
};

const DAY_MS = TIME_UNITS_MS.day;

const RELATIVE_TIME = /^(\d+)\s+(minute|hour|day|week)s?\s+ago$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/i;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/**
 * Parses a size such as "1MB", "500kb" or "1.5GB" into bytes (1024 multiples).
 * A bare integer is taken as bytes.
 */
export function parseSize(text: string): number {
  const normalized = text.trim().toUpperCase();
  for (const [suffix, multiplier] of SIZE_MULTIPLIERS) {
    if (normalized.endsWith(suffix)) {
      const amount = normalized.slice(0, -suffix.length).trim();
      if (!/^\d+(\.\d+)?$/.test(amount)) {
        break;
      }
      return Math.trunc(Number(amount) * multiplier);
    }
  }
  if (/^\d+$/.test(normalized)) {
    return Number(normalized);
  }
  throw new ConfigurationError(`Invalid size '${text}'. Expected e.g. 500KB, 1MB, 2GB or a byte count`);
}

/**
 * Parses a time filter into a UTC instant.
 *
 * Accepted forms:
 * - "<n> minute|hour|day|week[s] ago", relative to `now`
 * - "YYYY-MM-DD", midnight UTC
 * - an ISO-8601 date-time with "Z" or an explicit offset
 *
 * A date-time without a zone designator is rejected instead of being read
 * as local time.
 */
export function parseTimeExpression(text: string, now: Date = new Date()): Date {
  const trimmed = text.trim();

  const relative = RELATIVE_TIME.exec(trimmed);
  if (relative) {
    const amount = Number(relative[1]);
    const unit = TIME_UNITS_MS[relative[2].toLowerCase()];
    return new Date(now.getTime() - amount * unit);
  }

  if (DATE_ONLY.test(trimmed)) {
    return validDate(`${trimmed}T00:00:00Z`, text);
  }

  if (DATE_TIME_WITH_ZONE.test(trimmed)) {
    return validDate(trimmed, text);
  }

  if (DATE_TIME.test(trimmed)) {
    throw new ConfigurationError(
      `Time '${text}' has no timezone. Append 'Z' for UTC or an offset such as '+02:00'`
    );
  }

  throw new ConfigurationError(
    `Invalid time '${text}'. Expected e.g. "2 days ago", "2024-01-31" or "2024-01-31T12:00:00Z"`
  );
}

function validDate(iso: string, original: string): Date {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid date '${original}'`);
  }
  return date;
}

export const DEFAULT_LOOKBACK_DAYS = 7;

/**
 * Start of a look-back window of whole days ending at `now`.
 *
 * @throws {ConfigurationError} If days is not a positive integer
 */
export function lookbackStart(days: number, now: Date): Date {
  if (!Number.isInteger(days) || days <= 0) {
    throw new ConfigurationError(`Invalid days ${days}. Expected a positive integer`);
  }
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Parses "Key=Value" (split on the first '='). The value may be empty.
 */
export function parseTagExpression(expression: string): [key: string, value: string] {
  const separator = expression.indexOf('=');
  if (separator <= 0) {
    throw new ConfigurationError(`Malformed tag '${expression}'. Expected format: Key=Value`);
  }
  return [expression.slice(0, separator), expression.slice(separator + 1)];
}

/**
 * Parses repeated "Key=Value" expressions into a tag map. Later keys win.
 */
export function parseTagExpressions(expressions: readonly string[]): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const expression of expressions) {
    const [key, value] = parseTagExpression(expression);
    tags[key] = value;
  }
  return tags;
}

/**
 * Parses a comma-separated field list, dropping blanks.
 */
export function parseFieldList(text: string): string[] {
  return text
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}
