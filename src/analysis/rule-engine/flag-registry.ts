/**
 * Accounts that have triggered a detection during this run.
 * Membership is append-only: a flag, once set, is never revoked.
 */
export class FlagRegistry {
  private readonly flags = new Map<string, boolean>();

  /**
   * Whether the account has been flagged. An unseen account is registered
   * as not flagged on first lookup.
   */
  isFlagged(accountId: string): boolean {
    const flagged = this.flags.get(accountId);
    if (flagged === undefined) {
      this.flags.set(accountId, false);
      return false;
    }
    return flagged;
  }

  flag(accountId: string): void {
    this.flags.set(accountId, true);
  }

  /** Whether the account has been looked up or flagged at all. */
  isKnown(accountId: string): boolean {
    return this.flags.has(accountId);
  }

  flaggedAccounts(): string[] {
    return [...this.flags].filter(([, flagged]) => flagged).map(([id]) => id);
  }
}
