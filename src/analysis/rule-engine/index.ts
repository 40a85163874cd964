import type {
  Detection,
  DetectionContext,
  FrequencyPolicy,
  LookupSets,
  MatchMode,
  ParsedAuthLine,
  RuleOutcome,
  ScanResult,
} from "@/analysis/types";
import { DEFAULT_LOG_YEAR } from "@/lib/constants";
import { createLogger } from "@/lib/logger";
import { FlagRegistry } from "./flag-registry";
import { parseAuthLine } from "./log-parser";
import { DEFAULT_FREQUENCY_POLICY, LoginHistory } from "./login-history";
import { checkAllowlist } from "./rules/allowlist";
import { checkDenylist } from "./rules/denylist";
import { checkFlagged } from "./rules/flagged";
import { checkFrequency } from "./rules/frequency";
import { truncateLine } from "./utils";

const log = createLogger("Scan");

/**
 * Type for a per-line rule function.
 * Returns an outcome when the rule decides the line, null to defer to the
 * next rule. Rules may update the shared context as a side effect.
 */
type LineRule = (line: ParsedAuthLine, context: DetectionContext) => RuleOutcome | null;

/**
 * Rules in precedence order. The first one to return an outcome decides the line.
 */
const LINE_RULES: LineRule[] = [checkAllowlist, checkDenylist, checkFlagged, checkFrequency];

const CLEAR: RuleOutcome = { verdict: "clear", rule: null };

export interface ScanOptions {
  /** Year assumed for log stamps (default 2021) */
  year?: number;
  matchMode?: MatchMode;
  policy?: FrequencyPolicy;
  /** Discard lines up to and including the first empty line (default true) */
  skipHeaderBlock?: boolean;
  /** Called for each reportable detection as soon as it is decided */
  onDetection?: (detection: Detection) => void;
}

export function createDetectionContext(
  lookups: LookupSets,
  options: Pick<ScanOptions, "matchMode" | "policy"> = {}
): DetectionContext {
  return {
    lookups,
    matchMode: options.matchMode ?? "substring",
    history: new LoginHistory(options.policy ?? DEFAULT_FREQUENCY_POLICY),
    flags: new FlagRegistry(),
  };
}

/**
 * Apply the rules to one parsed line in precedence order.
 * A rule that throws is logged and the line is treated as clear.
 */
export function evaluateLine(
  line: ParsedAuthLine,
  lineNumber: number,
  context: DetectionContext
): RuleOutcome {
  for (const rule of LINE_RULES) {
    try {
      const outcome = rule(line, context);
      if (outcome) return outcome;
    } catch (error) {
      log.error(
        `Rule ${rule.name} failed on line ${lineNumber}:`,
        error instanceof Error ? error.message : error
      );
      return CLEAR;
    }
  }
  return CLEAR;
}

/**
 * Scan an authentication log line by line.
 *
 * Lines are consumed strictly in order: each verdict and its state updates
 * complete before the next line is read. Scanning ends at the end of the
 * stream or at the first empty body line.
 */
export async function scanLog(
  lines: AsyncIterable<string> | Iterable<string>,
  lookups: LookupSets,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const context = createDetectionContext(lookups, options);
  const year = options.year ?? DEFAULT_LOG_YEAR;

  let inHeader = options.skipHeaderBlock ?? true;
  let totalLinesProcessed = 0;
  let skippedLineCount = 0;
  const detections: Detection[] = [];

  for await (const rawLine of lines) {
    const raw = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    if (inHeader) {
      if (raw.length === 0) inHeader = false;
      continue;
    }
    if (raw.length === 0) break;

    totalLinesProcessed++;
    const line = parseAuthLine(raw, year);
    if (line.accountId === null) {
      skippedLineCount++;
      log.debug(`No account identifier on line ${totalLinesProcessed}: ${truncateLine(raw)}`);
    }

    const outcome = evaluateLine(line, totalLinesProcessed, context);
    if (outcome.verdict === "clear") continue;

    const detection: Detection = { ...outcome, lineNumber: totalLinesProcessed, line };
    detections.push(detection);
    options.onDetection?.(detection);
  }

  if (inHeader) {
    log.warn("Input ended before the end of the header block; no lines scanned");
  }

  log.info(
    `Processed ${totalLinesProcessed} lines, ${detections.length} detections, ${skippedLineCount} without an account identifier`
  );

  return {
    detections,
    totalLinesProcessed,
    violationCount: detections.length,
    skippedLineCount,
    flaggedAccounts: context.flags.flaggedAccounts(),
  };
}
