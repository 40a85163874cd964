/**
 * Positional parser for sshd authentication records.
 *
 * A record looks like:
 *   Aug 29 11:01:01 gateway sshd[12345]: Failed password for root from 10.0.0.5 port 22 ssh2
 *
 * The stamp at the start carries no year, the account identifier is the
 * fixed-width field after the service marker, and the outcome is decided by
 * a literal failure marker anywhere in the line.
 */

import type { ParsedAuthLine } from "@/analysis/types";
import {
  ACCOUNT_ID_WIDTH,
  DEFAULT_LOG_YEAR,
  FAILURE_MARKER,
  SERVICE_MARKER,
} from "@/lib/constants";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const STAMP_REGEX = /^([A-Za-z]+)\s+(\d{1,2})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})/;

function monthIndex(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTHS.findIndex(
    (month) => month === lower || (lower.length === 3 && month.startsWith(lower))
  );
  return index === -1 ? null : index;
}

/**
 * Parse a leading `Mon DD HH:MM:SS` stamp into seconds since the Unix epoch (UTC).
 * Returns null if the line does not start with a recognisable stamp.
 */
export function parseTimestamp(line: string, year: number = DEFAULT_LOG_YEAR): number | null {
  const match = line.match(STAMP_REGEX);
  if (!match) return null;

  const month = monthIndex(match[1]);
  if (month === null) return null;

  const [day, hour, minute, second] = match.slice(2, 6).map(Number);
  return Date.UTC(year, month, day, hour, minute, second) / 1000;
}

/**
 * Like parseTimestamp, but never fails: an unparseable stamp maps to the
 * first second of the year so processing can continue.
 */
export function toSeconds(line: string, year: number = DEFAULT_LOG_YEAR): number {
  return parseTimestamp(line, year) ?? Date.UTC(year, 0, 1) / 1000;
}

/**
 * Extract the account identifier following the service marker.
 * Returns null when the marker is absent or nothing follows it.
 */
export function extractAccountId(line: string): string | null {
  const markerAt = line.indexOf(SERVICE_MARKER);
  if (markerAt === -1) return null;

  const start = markerAt + SERVICE_MARKER.length;
  const id = line.slice(start, start + ACCOUNT_ID_WIDTH);
  return id.length > 0 ? id : null;
}

export function isFailedAttempt(line: string): boolean {
  return line.includes(FAILURE_MARKER);
}

export function parseAuthLine(raw: string, year: number = DEFAULT_LOG_YEAR): ParsedAuthLine {
  return {
    raw,
    seconds: toSeconds(raw, year),
    accountId: extractAccountId(raw),
    failed: isFailedAttempt(raw),
  };
}
