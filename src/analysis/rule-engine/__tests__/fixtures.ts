import type { LookupSets } from "@/analysis/types";

/** Build an sshd record for Aug 29 of the default year. */
export function authLine(
  time: string,
  accountId: string,
  opts: { failed?: boolean; ip?: string } = {}
): string {
  const { failed = true, ip = "198.51.100.4" } = opts;
  const outcome = failed ? "Failed password" : "Accepted password";
  return `Aug 29 ${time} gateway sshd[${accountId}]: ${outcome} for root from ${ip} port 22 ssh2`;
}

export function lookups(allow: string[] = [], deny: string[] = []): LookupSets {
  return { allowlist: new Set(allow), denylist: new Set(deny) };
}
