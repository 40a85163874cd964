export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Tagged diagnostics on stderr. Stdout is reserved for the report, so even
 * info and debug go through console.error.
 */
export function createLogger(tag: string) {
  const write = (level: LogLevel, message: string, detail?: unknown) => {
    if (LEVELS[level] > LEVELS[currentLevel]) return;
    const line = `[${tag}] ${message}`;
    if (level === "warn") {
      if (detail === undefined) console.warn(line);
      else console.warn(line, detail);
    } else if (detail === undefined) {
      console.error(line);
    } else {
      console.error(line, detail);
    }
  };

  return {
    error: (message: string, detail?: unknown) => write("error", message, detail),
    warn: (message: string, detail?: unknown) => write("warn", message, detail),
    info: (message: string, detail?: unknown) => write("info", message, detail),
    debug: (message: string, detail?: unknown) => write("debug", message, detail),
  };
}
