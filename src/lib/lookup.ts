import { readFile } from "fs/promises";
import type { LookupSet, LookupSets } from "@/analysis/types";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("Lookup");

/**
 * Split whitespace-separated text into a set of distinct tokens.
 */
export function parseLookup(text: string): LookupSet {
  return new Set(text.split(/\s+/).filter((token) => token.length > 0));
}

/**
 * Load a lookup file (allowlist or denylist) into a read-only set.
 * An unreadable file raises a ConfigurationError.
 */
export async function loadLookup(filePath: string): Promise<LookupSet> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Error opening file ${filePath}`, { cause: error });
  }
  const set = parseLookup(text);
  log.debug(`Loaded ${set.size} entries from ${filePath}`);
  return set;
}

export async function loadLookupSets(paths: {
  allowlistPath: string;
  denylistPath: string;
}): Promise<LookupSets> {
  const [allowlist, denylist] = await Promise.all([
    loadLookup(paths.allowlistPath),
    loadLookup(paths.denylistPath),
  ]);
  return { allowlist, denylist };
}
