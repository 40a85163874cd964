import { z } from "zod/v4";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_ALLOWLIST_PATH,
  DEFAULT_DENYLIST_PATH,
  DEFAULT_LOG_YEAR,
  FREQUENCY_MAX_CLOSE_FAILURES,
  FREQUENCY_WINDOW_SECONDS,
} from "./constants";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const configSchema = z.object({
  allowlistPath: z.string().min(1).default(DEFAULT_ALLOWLIST_PATH),
  denylistPath: z.string().min(1).default(DEFAULT_DENYLIST_PATH),
  year: z.coerce.number().int().min(1970).max(9999).default(DEFAULT_LOG_YEAR),
  windowSeconds: z.coerce.number().int().positive().default(FREQUENCY_WINDOW_SECONDS),
  maxCloseFailures: z.coerce.number().int().min(1).default(FREQUENCY_MAX_CLOSE_FAILURES),
  matchMode: z.enum(["substring", "field"]).default("substring"),
  fetchTimeoutMs: z.coerce.number().int().positive().default(30_000),
  fileHeaderBlock: booleanFlag,
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("warn"),
});

export type ScanConfig = z.infer<typeof configSchema>;

/** Environment variable backing each config field. */
const ENV_KEYS: Record<keyof ScanConfig, string> = {
  allowlistPath: "AUTHLOG_ALLOWLIST_PATH",
  denylistPath: "AUTHLOG_DENYLIST_PATH",
  year: "AUTHLOG_YEAR",
  windowSeconds: "AUTHLOG_WINDOW_SECONDS",
  maxCloseFailures: "AUTHLOG_MAX_CLOSE_FAILURES",
  matchMode: "AUTHLOG_MATCH_MODE",
  fetchTimeoutMs: "AUTHLOG_FETCH_TIMEOUT_MS",
  fileHeaderBlock: "AUTHLOG_FILE_HEADER_BLOCK",
  logLevel: "AUTHLOG_LOG_LEVEL",
};

function isConfigField(field: string): field is keyof ScanConfig {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, field);
}

/**
 * Build the scan configuration from environment variables.
 * Empty strings are treated as unset so defaults apply.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim();
    if (value) raw[field] = value;
  }

  const result = z.safeParse(configSchema, raw);
  if (!result.success) {
    const invalid = result.error.issues
      .map((issue) => {
        const field = String(issue.path[0] ?? "");
        const key = isConfigField(field) ? ENV_KEYS[field] : field;
        return `${key}: ${issue.message}`;
      })
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${invalid}`);
  }
  return result.data;
}
