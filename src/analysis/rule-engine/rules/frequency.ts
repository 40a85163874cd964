import type { DetectionContext, ParsedAuthLine, RuleOutcome } from "@/analysis/types";

export function checkFrequency(
  line: ParsedAuthLine,
  context: DetectionContext
): RuleOutcome | null {
  if (line.accountId === null) return null;

  const violated = context.history.record(line.accountId, {
    seconds: line.seconds,
    failed: line.failed,
  });
  if (!violated) return null;

  context.flags.flag(line.accountId);
  return { verdict: "frequency-violation", rule: "frequency" };
}
