import type { DetectionContext, ParsedAuthLine, RuleOutcome } from "@/analysis/types";

/**
 * Once flagged, every later line for the account is reported under the
 * banned-IP category without re-running the frequency check.
 */
export function checkFlagged(
  line: ParsedAuthLine,
  context: DetectionContext
): RuleOutcome | null {
  if (line.accountId === null) return null;
  return context.flags.isFlagged(line.accountId)
    ? { verdict: "banned-ip", rule: "flagged" }
    : null;
}
