/**
 * Unit tests for cache freshness classification
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { FreshnessReconciler } from "../../src/freshness.js";
import { FileIssueStore } from "../../src/store/index.js";
import type { IssueStore } from "../../src/types.js";
import { FakeRemote, makeIssue } from "./fixtures.js";

describe("FreshnessReconciler", () => {
  let tempDir: string;
  let store: FileIssueStore;
  let remote: FakeRemote;
  let onLog: ReturnType<typeof vi.fn>;
  let onError: ReturnType<typeof vi.fn>;

  const cache = (key: string, iso: string) => {
    store.upsert(key, makeIssue(key), new Date(iso));
  };

  const reconciler = (options: { maxAgeMs?: number; now?: () => Date } = {}) =>
    new FreshnessReconciler({ store, client: remote, onLog, onError, ...options });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "treecrawl-freshness-test-"));
    store = new FileIssueStore(tempDir);
    remote = new FakeRemote();
    onLog = vi.fn();
    onError = vi.fn();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should classify new, stale and fresh keys", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    cache("PROJ-2", "2024-01-02T00:00:00Z");
    cache("PROJ-3", "2024-01-02T00:00:00Z");
    remote.add(makeIssue("PROJ-1"), new Date("2024-01-02T00:00:00Z"));
    remote.add(makeIssue("PROJ-2"), new Date("2024-01-02T00:00:00Z"));
    remote.add(makeIssue("PROJ-3"), new Date("2024-01-01T00:00:00Z"));

    const result = await reconciler().classify(["PROJ-1", "PROJ-2", "PROJ-3", "PROJ-4"]);

    expect(result).toEqual({
      newKeys: ["PROJ-4"],
      staleKeys: ["PROJ-1"],
      freshKeys: ["PROJ-2", "PROJ-3"],
    });
    expect(onLog).toHaveBeenLastCalledWith("[freshness] 1 new, 1 stale, 2 fresh");
  });

  it("should treat a remote edit within the cached second as stale", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    remote.add(makeIssue("PROJ-1"), new Date("2024-01-01T00:00:00.900Z"));

    const result = await reconciler().classify(["PROJ-1"]);

    expect(result).toEqual({ newKeys: [], staleKeys: ["PROJ-1"], freshKeys: [] });
  });

  it("should keep a key fresh when the remote time equals the cached second", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    remote.add(makeIssue("PROJ-1"), new Date("2024-01-01T00:00:00Z"));

    const result = await reconciler().classify(["PROJ-1"]);

    expect(result.freshKeys).toEqual(["PROJ-1"]);
  });

  it("should only ask the remote about cached keys", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    remote.add(makeIssue("PROJ-1"));

    await reconciler().classify(["PROJ-1", "PROJ-2", "PROJ-1"]);

    expect(remote.timestampCalls).toEqual([["PROJ-1"]]);
  });

  it("should skip the remote when nothing is cached", async () => {
    const result = await reconciler().classify(["PROJ-1", "PROJ-2"]);

    expect(result.newKeys).toEqual(["PROJ-1", "PROJ-2"]);
    expect(remote.timestampCalls).toEqual([]);
  });

  it("should serve keys without a remote timestamp from the cache", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");

    const result = await reconciler().classify(["PROJ-1"]);

    expect(result.freshKeys).toEqual(["PROJ-1"]);
    expect(onLog).toHaveBeenCalledWith(
      "[freshness] PROJ-1: no remote timestamp, serving from cache"
    );
  });

  it("should refetch keys without a remote timestamp once the cache is too old", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    cache("PROJ-2", "2024-01-09T12:00:00Z");

    const result = await reconciler({
      maxAgeMs: 24 * 60 * 60 * 1000,
      now: () => new Date("2024-01-10T00:00:00Z"),
    }).classify(["PROJ-1", "PROJ-2"]);

    expect(result.staleKeys).toEqual(["PROJ-1"]);
    expect(result.freshKeys).toEqual(["PROJ-2"]);
  });

  it("should mark every cached key stale when the timestamp query fails", async () => {
    cache("PROJ-1", "2024-01-01T00:00:00Z");
    cache("PROJ-2", "2024-01-01T00:00:00Z");
    remote.timestampsFail = true;

    const result = await reconciler().classify(["PROJ-1", "PROJ-2", "PROJ-3"]);

    expect(result).toEqual({
      newKeys: ["PROJ-3"],
      staleKeys: ["PROJ-1", "PROJ-2"],
      freshKeys: [],
    });
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it("should treat every key as new when the cache cannot be read", async () => {
    const broken: IssueStore = {
      name: "broken",
      get: () => null,
      batchGet: () => {
        throw new Error("disk gone");
      },
      upsert: () => new Date(),
      tableReady: () => false,
      close: () => {},
    };

    const result = await new FreshnessReconciler({
      store: broken,
      client: remote,
      onLog,
      onError,
    }).classify(["PROJ-1"]);

    expect(result.newKeys).toEqual(["PROJ-1"]);
    expect(onError.mock.calls[0][0].message).toBe(
      "[freshness] Cannot read cache timestamps, treating 1 keys as new: disk gone"
    );
  });
});
