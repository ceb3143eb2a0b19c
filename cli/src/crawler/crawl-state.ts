/**
 * Per-run crawl bookkeeping, owned by a single CrawlerEngine.run() call
 */

export class CrawlState {
  private readonly claimed = new Set<string>();
  private readonly claimCounts = new Map<string, number>();
  private readonly pendingRetry = new Map<string, Error>();
  readonly fetched = new Set<string>();
  readonly fromCache = new Set<string>();
  readonly failed = new Map<string, Error>();

  /**
   * Test-and-set: claim a key for this run
   *
   * @returns false when the key is already claimed or in flight
   */
  claim(key: string): boolean {
    if (this.claimed.has(key)) {
      return false;
    }
    this.claimed.add(key);
    this.claimCounts.set(key, (this.claimCounts.get(key) ?? 0) + 1);
    return true;
  }

  /**
   * Release a claim so the key can be processed again
   */
  release(key: string): void {
    this.claimed.delete(key);
  }

  isClaimed(key: string): boolean {
    return this.claimed.has(key);
  }

  /**
   * How often a key was claimed in this run
   */
  timesClaimed(key: string): number {
    return this.claimCounts.get(key) ?? 0;
  }

  claimedKeys(): string[] {
    return [...this.claimed];
  }

  /**
   * Mark a key for the retry pass, keeping the error that caused it
   */
  markForRetry(key: string, error: Error): void {
    this.pendingRetry.set(key, error);
  }

  /**
   * Remove and return every key marked for retry with its last error
   */
  takeRetries(): Map<string, Error> {
    const retries = new Map(this.pendingRetry);
    this.pendingRetry.clear();
    return retries;
  }

  recordFetched(key: string): void {
    this.fetched.add(key);
  }

  recordFromCache(key: string): void {
    this.fromCache.add(key);
  }

  recordFailure(key: string, error: Error): void {
    this.failed.set(key, error);
  }
}
