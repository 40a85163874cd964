import type { DetectionContext, ParsedAuthLine, RuleOutcome } from "@/analysis/types";
import { extractAllIps, findExactToken, findSubstringToken } from "../utils";

/**
 * Lines mentioning a denylisted address are reported, and the account
 * (when known) is flagged for the rest of the run.
 */
export function checkDenylist(
  line: ParsedAuthLine,
  context: DetectionContext
): RuleOutcome | null {
  const { denylist } = context.lookups;
  const matched =
    context.matchMode === "field"
      ? findExactToken(extractAllIps(line.raw), denylist)
      : findSubstringToken(line.raw, denylist);

  if (matched === null) return null;

  if (line.accountId !== null) context.flags.flag(line.accountId);
  return { verdict: "banned-ip", rule: "denylist" };
}
