/**
 * API performance summary built from per-request timings
 */

import type { ApiTiming } from "@treecrawl/integration-jira";

export interface OperationSummary {
  operation: string;
  calls: number;
  errors: number;
  totalMs: number;
  avgMs: number;
  maxMs: number;
}

export class TimingCollector {
  private readonly timings: ApiTiming[] = [];

  /**
   * Bound so it can be passed directly as the client's onRequest hook
   */
  readonly record = (timing: ApiTiming): void => {
    this.timings.push(timing);
  };

  get count(): number {
    return this.timings.length;
  }

  /**
   * Per-operation totals, slowest total first
   */
  summarize(): OperationSummary[] {
    const byOperation = new Map<string, ApiTiming[]>();
    for (const timing of this.timings) {
      const entries = byOperation.get(timing.operation) ?? [];
      entries.push(timing);
      byOperation.set(timing.operation, entries);
    }

    return [...byOperation.entries()]
      .map(([operation, entries]) => {
        const totalMs = entries.reduce((sum, entry) => sum + entry.durationMs, 0);
        return {
          operation,
          calls: entries.length,
          errors: entries.filter((entry) => entry.status === null || entry.status >= 400)
            .length,
          totalMs,
          avgMs: Math.round(totalMs / entries.length),
          maxMs: Math.max(...entries.map((entry) => entry.durationMs)),
        };
      })
      .sort((a, b) => b.totalMs - a.totalMs);
  }
}
