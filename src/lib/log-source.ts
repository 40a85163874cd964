import { createReadStream } from "fs";
import { access } from "fs/promises";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { fileURLToPath } from "url";
import { TransportError, UsageError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("Source");

export type LogLocator =
  | { kind: "http"; url: URL }
  | { kind: "file"; path: string }
  | { kind: "stdin" };

export interface LogSource {
  lines: AsyncIterable<string>;
  /** Whether the first lines up to a blank line are a header block to discard */
  hasHeaderBlock: boolean;
}

export interface LogSourceOptions {
  fetchTimeoutMs: number;
  /** File and stdin sources start with a captured header block */
  fileHeaderBlock: boolean;
}

const SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Classify a user-supplied locator: http(s) URL, file URL, `-` for stdin,
 * or a plain filesystem path.
 */
export function resolveLocator(locator: string): LogLocator {
  const trimmed = locator.trim();
  if (!trimmed) throw new UsageError("Log locator is empty");
  if (trimmed === "-") return { kind: "stdin" };
  if (!SCHEME_REGEX.test(trimmed)) return { kind: "file", path: trimmed };

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new UsageError(`Invalid URL: ${trimmed}`);
  }

  switch (url.protocol) {
    case "http:":
    case "https:":
      return { kind: "http", url };
    case "file:":
      return { kind: "file", path: fileURLToPath(url) };
    default:
      throw new UsageError(`Unsupported scheme "${url.protocol}" in ${trimmed}`);
  }
}

/**
 * Open a locator as a stream of lines.
 * Failures to open are raised here, before scanning starts; failures while
 * reading surface from the line iterator. Both are TransportErrors.
 * Pass `resolved` when the locator was already checked with resolveLocator.
 */
export async function openLogSource(
  locator: string,
  options: LogSourceOptions,
  resolved: LogLocator = resolveLocator(locator)
): Promise<LogSource> {

  switch (resolved.kind) {
    case "http":
      return openHttpSource(locator, resolved.url, options.fetchTimeoutMs);
    case "file":
      try {
        await access(resolved.path);
      } catch (error) {
        throw new TransportError(locator, `Cannot open ${resolved.path}`, { cause: error });
      }
      log.debug(`Reading ${resolved.path}`);
      return {
        lines: readStreamLines(locator, createReadStream(resolved.path, { encoding: "utf-8" })),
        hasHeaderBlock: options.fileHeaderBlock,
      };
    case "stdin":
      return {
        lines: readStreamLines(locator, process.stdin),
        hasHeaderBlock: options.fileHeaderBlock,
      };
  }
}

async function openHttpSource(
  locator: string,
  url: URL,
  timeoutMs: number
): Promise<LogSource> {
  log.debug(`Fetching ${url.href}`);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: "text/plain" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new TransportError(locator, `Request to ${url.href} failed`, { cause: error });
  }

  if (!response.ok) {
    throw new TransportError(
      locator,
      `Request to ${url.href} failed with HTTP ${response.status} ${response.statusText}`.trim()
    );
  }

  // fetch has already consumed the HTTP header block
  return { lines: readResponseLines(locator, response), hasHeaderBlock: false };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

async function* readResponseLines(
  locator: string,
  response: Response
): AsyncGenerator<string> {
  if (!response.body) return;

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";
  let finished = false;

  try {
    for (;;) {
      const chunk = await reader.read().catch((error: unknown) => {
        throw new TransportError(locator, `Connection to ${locator} failed mid-read`, {
          cause: error,
        });
      });
      if (chunk.done) break;

      buffered += decoder.decode(chunk.value, { stream: true });
      let newline = buffered.indexOf("\n");
      while (newline !== -1) {
        yield stripCarriageReturn(buffered.slice(0, newline));
        buffered = buffered.slice(newline + 1);
        newline = buffered.indexOf("\n");
      }
    }

    buffered += decoder.decode();
    if (buffered.length > 0) yield stripCarriageReturn(buffered);
    finished = true;
  } finally {
    // Scanning may stop early at an empty line; release the connection
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        log.debug(`Cancelling ${locator} failed`, error);
      });
    }
  }
}

async function* readStreamLines(locator: string, input: Readable): AsyncGenerator<string> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (error) {
    throw new TransportError(locator, `Reading ${locator} failed`, { cause: error });
  } finally {
    rl.close();
  }
}
