/**
 * Unit tests for CrawlerEngine
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { CrawlerEngine, type CrawlerEngineOptions } from "../../src/crawler/engine.js";
import { CrawlState } from "../../src/crawler/crawl-state.js";
import { RemoteError } from "../../src/errors.js";
import { FailureLog } from "../../src/failure-log.js";
import { FileIssueStore } from "../../src/store/index.js";
import { TreeCrawler } from "../../src/tree.js";
import { FakeRemote, FakeTransformer, link, makeIssue } from "./fixtures.js";

describe("CrawlerEngine", () => {
  let tempDir: string;
  let store: FileIssueStore;
  let remote: FakeRemote;
  let failureLog: FailureLog;
  let onLog: ReturnType<typeof vi.fn>;
  let onError: ReturnType<typeof vi.fn>;

  const createEngine = (options: Partial<CrawlerEngineOptions> = {}) =>
    new CrawlerEngine({
      client: remote,
      transformer: new FakeTransformer(remote),
      store,
      failureLog,
      concurrency: 3,
      onLog,
      onError,
      ...options,
    });

  const sorted = (keys: string[]) => [...keys].sort();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "treecrawl-engine-test-"));
    onLog = vi.fn();
    onError = vi.fn();
    store = new FileIssueStore(path.join(tempDir, "issues"), { onError });
    failureLog = new FailureLog(path.join(tempDir, "failed_issues.log"));
    remote = new FakeRemote();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("full mode", () => {
    beforeEach(() => {
      // Diamond with a cycle back to the root
      remote
        .add(makeIssue("ROOT-1", { type: "Epic", links: [link("A-1"), link("B-1")] }))
        .add(makeIssue("A-1", { links: [link("C-1")] }))
        .add(makeIssue("B-1", { links: [link("C-1"), link("B-1")] }))
        .add(makeIssue("C-1", { links: [link("ROOT-1")] }));
    });

    it("should fetch every reachable key exactly once", async () => {
      const state = new CrawlState();

      const report = await createEngine().run("ROOT-1", "full", { state });

      expect(sorted(report.fetched)).toEqual(["A-1", "B-1", "C-1", "ROOT-1"]);
      expect(report.fromCache).toEqual([]);
      expect(report.failed).toEqual([]);
      expect(report.aborted).toBe(false);
      for (const key of ["ROOT-1", "A-1", "B-1", "C-1"]) {
        expect(remote.fetchCount(key)).toBe(1);
        expect(state.timesClaimed(key)).toBe(1);
      }
    });

    it("should persist what the transformer produced", async () => {
      remote.children.set("ROOT-1", [{ key: "D-1", title: "Found by query", relation: "child" }]);
      remote.add(makeIssue("D-1"));

      await createEngine().run("ROOT-1", "full");

      const root = store.get("ROOT-1")?.issue;
      expect(root?.links.map((ref) => ref.key)).toEqual(["A-1", "B-1", "D-1"]);
      expect(store.get("D-1")?.issue.title).toBe("Title of D-1");
    });

    it("should leave the same cache contents when run twice", async () => {
      const engine = createEngine();
      await engine.run("ROOT-1", "full");
      const first = ["ROOT-1", "A-1", "B-1", "C-1"].map((key) => store.get(key)?.issue);

      const report = await engine.run("ROOT-1", "full");
      const second = ["ROOT-1", "A-1", "B-1", "C-1"].map((key) => store.get(key)?.issue);

      expect(second).toEqual(first);
      expect(sorted(report.fetched)).toEqual(["A-1", "B-1", "C-1", "ROOT-1"]);
    });

    it("should produce a cache the tree builder can read back", async () => {
      await createEngine().run("ROOT-1", "full");

      const graph = new TreeCrawler({
        store,
        hierarchy: { Epic: ["child"], Story: ["child"] },
        onLog,
      }).buildIssueTree("ROOT-1");

      expect(sorted(graph.keys())).toEqual(["A-1", "B-1", "C-1", "ROOT-1"]);
      expect(graph.edgeCount).toBe(6);
    });
  });

  describe("delta mode", () => {
    it("should refetch stale and new keys and serve fresh keys from the cache", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1"), link("B-1"), link("C-1")] }))
        .add(makeIssue("A-1", { title: "New title" }), new Date("2024-01-02T00:00:00Z"))
        .add(makeIssue("B-1"), new Date("2024-01-01T00:00:00Z"))
        .add(makeIssue("C-1"));
      store.upsert("A-1", makeIssue("A-1", { title: "Old title" }), new Date("2024-01-01T00:00:00Z"));
      store.upsert("B-1", makeIssue("B-1"), new Date("2024-01-02T00:00:00Z"));

      const report = await createEngine().run("ROOT-1", "delta");

      expect(sorted(report.fetched)).toEqual(["A-1", "C-1", "ROOT-1"]);
      expect(report.fromCache).toEqual(["B-1"]);
      expect(remote.fetchCount("B-1")).toBe(0);
      const refreshed = store.get("A-1");
      expect(refreshed?.issue.title).toBe("New title");
      expect(refreshed?.modifiedAt.getTime()).toBeGreaterThanOrEqual(
        new Date("2024-01-02T00:00:00Z").getTime()
      );
    });

    it("should always load the root live", async () => {
      remote.add(makeIssue("ROOT-1"), new Date("2024-01-01T00:00:00Z"));
      store.upsert("ROOT-1", makeIssue("ROOT-1"), new Date("2024-06-01T00:00:00Z"));

      const report = await createEngine().run("ROOT-1", "delta");

      expect(report.fetched).toEqual(["ROOT-1"]);
      expect(remote.timestampCalls).toEqual([]);
    });

    it("should expand fresh keys from their cached links", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1")] }))
        .add(makeIssue("A-1"), new Date("2024-01-01T00:00:00Z"))
        .add(makeIssue("B-1"));
      store.upsert("A-1", makeIssue("A-1", { links: [link("B-1")] }), new Date("2024-01-02T00:00:00Z"));

      const report = await createEngine().run("ROOT-1", "delta");

      expect(report.fromCache).toEqual(["A-1"]);
      expect(sorted(report.fetched)).toEqual(["B-1", "ROOT-1"]);
    });

    it("should load live when a fresh key cannot be read from the cache", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1")] }))
        .add(makeIssue("A-1"), new Date("2024-01-01T00:00:00Z"));
      const filePath = path.join(tempDir, "issues", "A-1.json");
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, "{corrupt", "utf8");
      const modified = new Date("2024-01-02T00:00:00Z");
      fs.utimesSync(filePath, modified, modified);

      const report = await createEngine().run("ROOT-1", "delta");

      expect(sorted(report.fetched)).toEqual(["A-1", "ROOT-1"]);
      expect(onLog).toHaveBeenCalledWith("[crawler] A-1 missing from cache, loading live");
      expect(store.get("A-1")?.issue.key).toBe("A-1");
    });

    it("should refetch cached keys when the timestamp query fails", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1")] }))
        .add(makeIssue("A-1"), new Date("2024-01-01T00:00:00Z"));
      store.upsert("A-1", makeIssue("A-1"), new Date("2024-01-02T00:00:00Z"));
      remote.timestampsFail = true;

      const report = await createEngine().run("ROOT-1", "delta");

      expect(sorted(report.fetched)).toEqual(["A-1", "ROOT-1"]);
      expect(report.fromCache).toEqual([]);
    });
  });

  describe("retries", () => {
    beforeEach(() => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1"), link("B-1")] }))
        .add(makeIssue("A-1", { links: [link("D-1")] }))
        .add(makeIssue("B-1"))
        .add(makeIssue("D-1"));
    });

    it("should retry a remote failure once in the second phase", async () => {
      remote.failures.set("A-1", 1);
      const state = new CrawlState();

      const report = await createEngine().run("ROOT-1", "delta", { state });

      expect(report.retried).toEqual(["A-1"]);
      expect(report.failed).toEqual([]);
      expect(sorted(report.fetched)).toEqual(["A-1", "B-1", "D-1", "ROOT-1"]);
      expect(remote.fetchCount("A-1")).toBe(2);
      expect(state.timesClaimed("A-1")).toBe(2);
      expect(onLog).toHaveBeenCalledWith("[crawler] Phase 2: retrying 1 keys");
      expect(failureLog.read()).toEqual([]);
    });

    it("should record keys that fail twice in the failure log", async () => {
      remote.failures.set("B-1", 2);

      const report = await createEngine().run("ROOT-1", "full");

      expect(report.retried).toEqual(["B-1"]);
      expect(report.failed).toEqual(["B-1"]);
      expect(remote.fetchCount("B-1")).toBe(2);
      expect(failureLog.read()).toEqual(["B-1"]);
    });

    it("should not retry errors that are not remote errors", async () => {
      remote.beforeFetch = (key) => {
        if (key === "B-1") {
          throw new Error("unexpected payload");
        }
      };

      const report = await createEngine().run("ROOT-1", "full");

      expect(report.retried).toEqual([]);
      expect(report.failed).toEqual(["B-1"]);
      expect(remote.fetchCount("B-1")).toBe(1);
      expect(onError).toHaveBeenCalledWith(new Error("[crawler] B-1: unexpected payload"));
    });

    it("should report a failing root without throwing", async () => {
      remote.failures.set("ROOT-1", 2);

      const report = await createEngine().run("ROOT-1", "full");

      expect(report.failed).toEqual(["ROOT-1"]);
      expect(report.fetched).toEqual([]);
    });
  });

  describe("cancellation", () => {
    it("should stop scheduling work and release in-flight keys", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1"), link("B-1")] }))
        .add(makeIssue("A-1"))
        .add(makeIssue("B-1"));
      const controller = new AbortController();
      remote.beforeFetch = (key) => {
        if (key === "A-1") {
          controller.abort();
          throw new RemoteError("The operation was aborted", "fetchIssue");
        }
      };
      const state = new CrawlState();

      const report = await createEngine({ concurrency: 1 }).run("ROOT-1", "full", {
        signal: controller.signal,
        state,
      });

      expect(report.aborted).toBe(true);
      expect(report.fetched).toEqual(["ROOT-1"]);
      expect(report.failed).toEqual([]);
      expect(report.retried).toEqual([]);
      expect(state.isClaimed("A-1")).toBe(false);
      expect(remote.fetchCount("B-1")).toBe(0);
      expect(failureLog.read()).toEqual([]);
    });

    it("should log keys that failed before the abort", async () => {
      remote
        .add(makeIssue("ROOT-1", { links: [link("A-1"), link("B-1")] }))
        .add(makeIssue("A-1"))
        .add(makeIssue("B-1"));
      remote.failures.set("A-1", 1);
      const controller = new AbortController();
      remote.beforeFetch = (key) => {
        if (key === "B-1") {
          controller.abort();
          throw new RemoteError("The operation was aborted", "fetchIssue");
        }
      };

      const report = await createEngine({ concurrency: 1 }).run("ROOT-1", "full", {
        signal: controller.signal,
      });

      expect(report.aborted).toBe(true);
      expect(report.retried).toEqual([]);
      expect(report.failed).toEqual(["A-1"]);
      expect(remote.fetchCount("A-1")).toBe(1);
      expect(failureLog.read()).toEqual(["A-1"]);
    });
  });
});
