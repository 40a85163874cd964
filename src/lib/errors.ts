/** A lookup file or setting is unusable. Fatal before any line is scanned. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The log source could not be opened or failed mid-read. */
export class TransportError extends Error {
  readonly locator: string;

  constructor(locator: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.locator = locator;
  }
}

/** Wrong command-line arguments. Raised before any I/O. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
