import type { FlagRegistry } from "./rule-engine/flag-registry";
import type { LoginHistory } from "./rule-engine/login-history";

export type Verdict = "clear" | "banned-ip" | "frequency-violation";

export type RuleId = "allowlist" | "denylist" | "flagged" | "frequency";

export type MatchMode = "substring" | "field";

/** Read-only membership set loaded from a lookup file. */
export type LookupSet = ReadonlySet<string>;

export interface LookupSets {
  /** Account identifiers exempted from every rule */
  allowlist: LookupSet;
  /** Network addresses always treated as hostile */
  denylist: LookupSet;
}

export interface ParsedAuthLine {
  raw: string;
  /** Seconds since the Unix epoch (UTC), best effort for malformed stamps */
  seconds: number;
  /** Fixed-width field after the service marker, null when the marker is absent */
  accountId: string | null;
  failed: boolean;
}

export interface HistoryEntry {
  seconds: number;
  failed: boolean;
}

export interface FrequencyPolicy {
  /** Pairs closer than this many seconds count toward a run */
  windowSeconds: number;
  /** A run longer than this many close pairs is a violation */
  maxCloseFailures: number;
}

export interface RuleOutcome {
  verdict: Verdict;
  /** Rule that decided the verdict, null when no rule matched */
  rule: RuleId | null;
}

export interface Detection extends RuleOutcome {
  lineNumber: number;
  line: ParsedAuthLine;
}

export interface ScanResult {
  /** Reportable detections, in line order */
  detections: Detection[];
  totalLinesProcessed: number;
  violationCount: number;
  /** Lines without an account identifier */
  skippedLineCount: number;
  flaggedAccounts: string[];
}

/** State owned by one scan run. */
export interface DetectionContext {
  lookups: LookupSets;
  matchMode: MatchMode;
  history: LoginHistory;
  flags: FlagRegistry;
}
