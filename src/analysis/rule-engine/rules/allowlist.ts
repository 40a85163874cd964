import type { DetectionContext, ParsedAuthLine, RuleOutcome } from "@/analysis/types";
import { findSubstringToken } from "../utils";

/**
 * Allowlisted accounts are exempt from every other rule.
 *
 * In substring mode any allowlisted token anywhere in the line clears it;
 * in field mode only the parsed account identifier is compared.
 */
export function checkAllowlist(
  line: ParsedAuthLine,
  context: DetectionContext
): RuleOutcome | null {
  const { allowlist } = context.lookups;
  const allowed =
    context.matchMode === "field"
      ? line.accountId !== null && allowlist.has(line.accountId)
      : findSubstringToken(line.raw, allowlist) !== null;

  return allowed ? { verdict: "clear", rule: "allowlist" } : null;
}
