export type UsageRecord = {
  tokens: number;
  costUsd?: number;
};

export type UsageSnapshot = {
  requests: number;
  totalTokens: number;
  totalCostUsd: number;
};

/**
 * Token and request accounting for whoever issues operations. Create one per
 * run (or per process) and hand it to the operations that should report into it.
 */
export class UsageTracker {
  private requests = 0;
  private totalTokens = 0;
  private totalCostUsd = 0;

  record(usage: UsageRecord): void {
    this.requests += 1;
    this.totalTokens += Math.max(0, usage.tokens);
    this.totalCostUsd += Math.max(0, usage.costUsd ?? 0);
  }

  snapshot(): UsageSnapshot {
    return {
      requests: this.requests,
      totalTokens: this.totalTokens,
      totalCostUsd: this.totalCostUsd,
    };
  }

  reset(): void {
    this.requests = 0;
    this.totalTokens = 0;
    this.totalCostUsd = 0;
  }
}
