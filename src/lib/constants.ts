export const DEFAULT_ALLOWLIST_PATH = "authorized_users.txt";
export const DEFAULT_DENYLIST_PATH = "banned_ips.txt";

/** sshd stamps carry no year */
export const DEFAULT_LOG_YEAR = 2021;

export const FREQUENCY_WINDOW_SECONDS = 20;
export const FREQUENCY_MAX_CLOSE_FAILURES = 2;

/** Account identifier follows this marker, e.g. `sshd[12345]:` */
export const SERVICE_MARKER = "sshd[";
export const ACCOUNT_ID_WIDTH = 5;

export const FAILURE_MARKER = "Failed";

export const REPORT_REASONS = {
  "banned-ip": "banned IP",
  "frequency-violation": "frequency",
} as const;
