import { scanLog } from "@/analysis/rule-engine";
import { loadConfig } from "@/lib/config";
import { ConfigurationError, TransportError, UsageError, errorMessage } from "@/lib/errors";
import { openLogSource, resolveLocator } from "@/lib/log-source";
import { createLogger, setLogLevel } from "@/lib/logger";
import { loadLookupSets } from "@/lib/lookup";
import { createReporter, type ReportSink } from "@/lib/reporter";

const log = createLogger("CLI");

export const USAGE = [
  "Usage: authlog-sentry <log-url-or-path>",
  "  Use - to read stdin. Set AUTHLOG_FILE_HEADER_BLOCK=true when a file or stdin",
  "  holds a captured HTTP response whose header block should be skipped.",
].join("\n");

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: ReportSink;
  stderr: ReportSink;
  env: NodeJS.ProcessEnv;
}

/**
 * Run one scan for the given arguments (without the node/script prefix)
 * and return the process exit code.
 */
export async function main(
  args: string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr, env: process.env }
): Promise<number> {
  if (args.length !== 1) {
    io.stderr.write(
      `${args.length === 0 ? "Log locator not specified." : "Too many arguments."}\n${USAGE}\n`
    );
    return EXIT_USAGE;
  }
  const [locator] = args;

  try {
    // Reject a bad locator before touching the lookup files
    const resolved = resolveLocator(locator);

    const config = loadConfig(io.env);
    setLogLevel(config.logLevel);

    const lookups = await loadLookupSets(config);
    log.info(
      `Loaded ${lookups.allowlist.size} allowlisted accounts and ${lookups.denylist.size} denylisted addresses`
    );

    const source = await openLogSource(locator, config, resolved);
    const reporter = createReporter(io.stdout);

    const result = await scanLog(source.lines, lookups, {
      year: config.year,
      matchMode: config.matchMode,
      policy: {
        windowSeconds: config.windowSeconds,
        maxCloseFailures: config.maxCloseFailures,
      },
      skipHeaderBlock: source.hasHeaderBlock,
      onDetection: (detection) => reporter.detection(detection),
    });

    reporter.summary(result.totalLinesProcessed, result.violationCount);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigurationError || error instanceof TransportError) {
      io.stderr.write(`${error.name}: ${error.message}\n`);
      if (error.cause !== undefined) log.debug("Caused by:", error.cause);
      return EXIT_FAILURE;
    }
    io.stderr.write(`Unexpected error: ${errorMessage(error)}\n`);
    log.debug("Stack:", error);
    return EXIT_FAILURE;
  }
}
