import type { FrequencyPolicy, HistoryEntry } from "@/analysis/types";
import {
  FREQUENCY_MAX_CLOSE_FAILURES,
  FREQUENCY_WINDOW_SECONDS,
} from "@/lib/constants";

export const DEFAULT_FREQUENCY_POLICY: FrequencyPolicy = {
  windowSeconds: FREQUENCY_WINDOW_SECONDS,
  maxCloseFailures: FREQUENCY_MAX_CLOSE_FAILURES,
};

/**
 * Per-account record of recent login attempts still live in the sliding window.
 *
 * The window is event-relative: a violation fires when failed attempts keep
 * arriving less than `windowSeconds` apart, more than `maxCloseFailures`
 * times in a row. A successful login collapses the account's history to that
 * single entry, which then only anchors the next run and never counts toward it.
 */
export class LoginHistory {
  private readonly entries = new Map<string, HistoryEntry[]>();

  constructor(private readonly policy: FrequencyPolicy = DEFAULT_FREQUENCY_POLICY) {}

  /**
   * Record an attempt for the account and report whether it completes a
   * frequency violation. On a violation the oldest entry is dropped so the
   * same starting point cannot re-trigger on the next line.
   */
  record(accountId: string, entry: HistoryEntry): boolean {
    const history = this.entries.get(accountId);
    if (!history) {
      this.entries.set(accountId, [entry]);
      return false;
    }

    history.push(entry);

    if (!entry.failed) {
      this.entries.set(accountId, [entry]);
      return false;
    }

    if (history.length < 3) return false;

    let closeFailures = 0;
    for (let i = 0; i + 1 < history.length; i++) {
      const older = history[i];
      const newer = history[i + 1];

      if (Math.abs(newer.seconds - older.seconds) >= this.policy.windowSeconds) {
        this.entries.set(accountId, [entry]);
        return false;
      }

      // A retained successful login anchors the run but is not part of it
      if (older.failed && newer.failed) closeFailures++;

      if (closeFailures > this.policy.maxCloseFailures) {
        history.shift();
        return true;
      }
    }

    return false;
  }

  /** Snapshot of the live entries for an account. */
  get(accountId: string): readonly HistoryEntry[] {
    return [...(this.entries.get(accountId) ?? [])];
  }

  has(accountId: string): boolean {
    return this.entries.has(accountId);
  }

  get size(): number {
    return this.entries.size;
  }
}
