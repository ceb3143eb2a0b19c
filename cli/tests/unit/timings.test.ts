/**
 * Unit tests for the API performance summary
 */

import { describe, it, expect } from "vitest";
import { TimingCollector } from "../../src/timings.js";

describe("TimingCollector", () => {
  it("should summarize per operation, slowest total first", () => {
    const timings = new TimingCollector();
    const record = timings.record;

    record({ operation: "fetchIssue", durationMs: 100, status: 200 });
    record({ operation: "fetchIssue", durationMs: 300, status: 503 });
    record({ operation: "search", durationMs: 1000, status: 200 });
    record({ operation: "search", durationMs: 50, status: null });

    expect(timings.count).toBe(4);
    expect(timings.summarize()).toEqual([
      { operation: "search", calls: 2, errors: 1, totalMs: 1050, avgMs: 525, maxMs: 1000 },
      { operation: "fetchIssue", calls: 2, errors: 1, totalMs: 400, avgMs: 200, maxMs: 300 },
    ]);
  });

  it("should be empty before any request", () => {
    expect(new TimingCollector().summarize()).toEqual([]);
  });
});
