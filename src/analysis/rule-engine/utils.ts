import type { LookupSet } from "@/analysis/types";

/**
 * Extract all IPv4 addresses found in a log line.
 */
export function extractAllIps(line: string): string[] {
  const globalRegex = /\b(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})\b/g;
  const ips: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = globalRegex.exec(line)) !== null) {
    ips.push(match[1]);
  }
  return ips;
}

/**
 * Return the first token of the set that occurs anywhere in the line, or null.
 * Empty tokens never match.
 */
export function findSubstringToken(line: string, tokens: LookupSet): string | null {
  for (const token of tokens) {
    if (token.length > 0 && line.includes(token)) return token;
  }
  return null;
}

/**
 * Return the first candidate that is a member of the set, or null.
 */
export function findExactToken(
  candidates: Iterable<string>,
  tokens: LookupSet
): string | null {
  for (const candidate of candidates) {
    if (tokens.has(candidate)) return candidate;
  }
  return null;
}

/**
 * Truncate a line for diagnostics, preserving useful context.
 */
export function truncateLine(line: string, maxLength: number = 200): string {
  if (line.length <= maxLength) return line;
  return line.slice(0, maxLength) + "...";
}
