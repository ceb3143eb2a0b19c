/**
 * CrawlerEngine - incremental hierarchy crawler
 *
 * Walks the live remote link graph from a root key and persists every
 * reachable issue. In delta mode unchanged issues are served from the cache.
 *
 * Phase 1 runs the crawl on a bounded work pool. Keys whose fetch failed
 * with a RemoteError stay claimed until Phase 2 releases them and retries
 * each once as a live load. Keys still failing after that are written to the failure log.
 */

import type {
  CrawlMode,
  Issue,
  RecordTransformer,
  RemoteRecordClient,
} from "@treecrawl/types";
import { isRemoteError } from "../errors.js";
import type { FailureLog } from "../failure-log.js";
import { FreshnessReconciler, type FreshnessResult } from "../freshness.js";
import type { IssueStore, LogOptions } from "../types.js";
import { CrawlState } from "./crawl-state.js";
import { WorkPool } from "./work-pool.js";

export const DEFAULT_CRAWL_CONCURRENCY = 4;

/**
 * How a claimed key is resolved
 */
export type LoadTask = "full_load" | "cache_load";

export interface CrawlerEngineOptions extends LogOptions {
  client: RemoteRecordClient;
  transformer: RecordTransformer;
  store: IssueStore;
  /** Default mode for run() (default: "delta") */
  mode?: CrawlMode;
  /** Concurrent jobs (default: 4) */
  concurrency?: number;
  /** Terminal failures are appended here */
  failureLog?: FailureLog;
  /** Freshness tolerance for keys the remote does not report */
  maxAgeMs?: number | null;
  reconciler?: FreshnessReconciler;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Inspect claims after the run, for tests */
  state?: CrawlState;
}

/**
 * Outcome of one run
 */
export interface CrawlReport {
  rootKey: string;
  mode: CrawlMode;
  /** Loaded from the remote and persisted */
  fetched: string[];
  /** Served from the cache */
  fromCache: string[];
  /** Terminal failures */
  failed: string[];
  /** Keys retried in Phase 2 */
  retried: string[];
  durationMs: number;
  /** Whether the run was cancelled */
  aborted: boolean;
}

interface RunContext {
  state: CrawlState;
  pool: WorkPool;
  signal?: AbortSignal;
}

export class CrawlerEngine {
  private readonly client: RemoteRecordClient;
  private readonly transformer: RecordTransformer;
  private readonly store: IssueStore;
  private readonly mode: CrawlMode;
  private readonly concurrency: number;
  private readonly failureLog?: FailureLog;
  private readonly reconciler: FreshnessReconciler;
  private readonly onLog: (message: string) => void;
  private readonly onError: (error: Error) => void;

  constructor(options: CrawlerEngineOptions) {
    this.client = options.client;
    this.transformer = options.transformer;
    this.store = options.store;
    this.mode = options.mode ?? "delta";
    this.concurrency = options.concurrency ?? DEFAULT_CRAWL_CONCURRENCY;
    this.failureLog = options.failureLog;
    this.onLog = options.onLog ?? console.log;
    this.onError = options.onError ?? console.error;
    this.reconciler =
      options.reconciler ??
      new FreshnessReconciler({
        store: this.store,
        client: this.client,
        maxAgeMs: options.maxAgeMs,
        onLog: this.onLog,
        onError: this.onError,
      });
  }

  /**
   * Crawl everything reachable from `rootKey`
   *
   * The root is always loaded live. Per-key failures never abort the run.
   */
  async run(
    rootKey: string,
    mode: CrawlMode = this.mode,
    options: RunOptions = {}
  ): Promise<CrawlReport> {
    const started = Date.now();
    const { signal } = options;
    const state = options.state ?? new CrawlState();
    const retried: string[] = [];

    this.onLog(`[crawler] Phase 1: ${rootKey} (${mode} mode)`);
    const phase1: RunContext = { state, pool: this.createPool(signal), signal };
    this.submitLoad(phase1, rootKey, "full_load", mode);
    await phase1.pool.drain();

    if (!signal?.aborted) {
      const retryKeys = [...state.takeRetries().keys()];
      if (retryKeys.length > 0) {
        this.onLog(`[crawler] Phase 2: retrying ${retryKeys.length} keys`);
        retried.push(...retryKeys);
        const phase2: RunContext = { state, pool: this.createPool(signal), signal };
        for (const key of retryKeys) {
          state.release(key);
          this.submitLoad(phase2, key, "full_load", "full");
        }
        await phase2.pool.drain();
      }
    }

    // Pending retries are terminal once Phase 2 ran or was skipped by an abort
    for (const [key, error] of state.takeRetries()) {
      state.recordFailure(key, error);
    }

    const failed = [...state.failed.keys()];
    if (failed.length > 0 && this.failureLog) {
      const added = this.failureLog.append(failed);
      this.onLog(
        `[crawler] ${failed.length} keys failed (${added.length} new in ${this.failureLog.filePath})`
      );
    }

    const aborted = signal?.aborted ?? false;
    const report: CrawlReport = {
      rootKey,
      mode,
      fetched: [...state.fetched],
      fromCache: [...state.fromCache],
      failed,
      retried,
      durationMs: Date.now() - started,
      aborted,
    };

    this.onLog(
      `[crawler] ${aborted ? "Aborted" : "Finished"} ${rootKey}: ${report.fetched.length} fetched, ${report.fromCache.length} from cache, ${failed.length} failed in ${report.durationMs} ms`
    );
    return report;
  }

  private createPool(signal?: AbortSignal): WorkPool {
    return new WorkPool(this.concurrency, { signal, onError: this.onError });
  }

  private submitLoad(ctx: RunContext, key: string, task: LoadTask, mode: CrawlMode): void {
    ctx.pool.submit(() => this.load(ctx, key, task, mode));
  }

  private submitExpand(ctx: RunContext, issue: Issue, mode: CrawlMode): void {
    ctx.pool.submit(() => this.expand(ctx, issue, mode));
  }

  /**
   * Claim a key and resolve it from the cache or the remote
   */
  private async load(
    ctx: RunContext,
    key: string,
    task: LoadTask,
    mode: CrawlMode
  ): Promise<void> {
    const { state, signal } = ctx;
    if (!state.claim(key)) {
      return;
    }

    try {
      if (task === "cache_load") {
        const cached = this.store.get(key);
        if (cached) {
          state.recordFromCache(key);
          this.submitExpand(ctx, cached.issue, mode);
          return;
        }
        this.onLog(`[crawler] ${key} missing from cache, loading live`);
      }

      const raw = await this.client.fetchIssue(key, { signal });
      const type = this.transformer.issueType(raw);
      const children = await this.client.findChildren(key, type, { signal });
      const issue = this.transformer.transform(raw, children);
      this.store.upsert(key, issue);
      state.recordFetched(key);
      this.submitExpand(ctx, issue, mode);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      if (signal?.aborted) {
        state.release(key);
        return;
      }
      if (isRemoteError(error)) {
        this.onError(new Error(`[crawler] ${key}: ${error.message}`));
        state.markForRetry(key, error);
        return;
      }
      this.onError(new Error(`[crawler] ${key}: ${cause.message}`));
      state.recordFailure(key, cause);
    }
  }

  /**
   * Schedule loads for the unclaimed keys an issue links to
   */
  private async expand(ctx: RunContext, issue: Issue, mode: CrawlMode): Promise<void> {
    const { state, signal } = ctx;
    const candidates = [
      ...new Set(issue.links.map((link) => link.key).filter((key) => key !== issue.key)),
    ].filter((key) => !state.isClaimed(key));
    if (candidates.length === 0) {
      return;
    }

    if (mode === "full") {
      for (const key of candidates) {
        this.submitLoad(ctx, key, "full_load", mode);
      }
      return;
    }

    let classified: FreshnessResult;
    try {
      classified = await this.reconciler.classify(candidates, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return;
      }
      throw error;
    }

    const { newKeys, staleKeys, freshKeys } = classified;
    for (const key of [...newKeys, ...staleKeys]) {
      this.submitLoad(ctx, key, "full_load", mode);
    }
    for (const key of freshKeys) {
      this.submitLoad(ctx, key, "cache_load", mode);
    }
  }
}
