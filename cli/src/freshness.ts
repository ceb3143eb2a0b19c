/**
 * Freshness reconciliation between the local cache and the remote source
 */

import type { RemoteRecordClient, RequestOptions } from "@treecrawl/types";
import { isRemoteError } from "./errors.js";
import { toEpochSeconds } from "./store/codec.js";
import type { IssueStore, LogOptions } from "./types.js";

/**
 * Classification of a batch of keys
 */
export interface FreshnessResult {
  /** Not cached yet */
  newKeys: string[];
  /** Cached, but changed remotely since */
  staleKeys: string[];
  /** Cached and current */
  freshKeys: string[];
}

export interface FreshnessReconcilerOptions extends LogOptions {
  store: IssueStore;
  client: Pick<RemoteRecordClient, "fetchUpdatedTimestamps">;
  /**
   * Oldest cache age accepted for keys the remote no longer reports.
   * When unset such keys are always served from the cache.
   */
  maxAgeMs?: number | null;
  /** Clock, for tests */
  now?: () => Date;
}

export class FreshnessReconciler {
  private readonly store: IssueStore;
  private readonly client: Pick<RemoteRecordClient, "fetchUpdatedTimestamps">;
  private readonly maxAgeMs: number | null;
  private readonly now: () => Date;
  private readonly onLog: (message: string) => void;
  private readonly onError: (error: Error) => void;

  constructor(options: FreshnessReconcilerOptions) {
    this.store = options.store;
    this.client = options.client;
    this.maxAgeMs = options.maxAgeMs ?? null;
    this.now = options.now ?? (() => new Date());
    this.onLog = options.onLog ?? console.log;
    this.onError = options.onError ?? console.error;
  }

  /**
   * Classify keys as new, stale or fresh
   *
   * A key is stale iff the remote "updated" time is later than the cached
   * modification time, which is kept at whole seconds. A key the
   * remote does not report stays fresh unless its copy exceeds `maxAgeMs`.
   * A failed timestamp query marks every cached key of the batch stale.
   */
  async classify(
    keys: readonly string[],
    options?: RequestOptions
  ): Promise<FreshnessResult> {
    const unique = [...new Set(keys)];
    const result: FreshnessResult = { newKeys: [], staleKeys: [], freshKeys: [] };
    if (unique.length === 0) {
      return result;
    }

    let local: Map<string, Date>;
    try {
      local = this.store.batchGet(unique);
    } catch (error) {
      this.onError(
        new Error(
          `[freshness] Cannot read cache timestamps, treating ${unique.length} keys as new: ${
            error instanceof Error ? error.message : String(error)
          }`
        )
      );
      result.newKeys = unique;
      return result;
    }

    const cached = unique.filter((key) => local.has(key));
    result.newKeys = unique.filter((key) => !local.has(key));
    if (cached.length === 0) {
      return result;
    }

    let remote: Map<string, Date>;
    try {
      remote = await this.client.fetchUpdatedTimestamps(cached, options);
    } catch (error) {
      if (!isRemoteError(error)) {
        throw error;
      }
      this.onError(
        new Error(`[freshness] ${error.message}; refetching ${cached.length} cached keys`)
      );
      result.staleKeys = cached;
      return result;
    }

    const now = this.now().getTime();
    for (const key of cached) {
      const localTime = local.get(key);
      const remoteTime = remote.get(key);
      if (!localTime) {
        continue;
      }

      if (!remoteTime) {
        if (this.maxAgeMs !== null && now - localTime.getTime() > this.maxAgeMs) {
          this.onLog(`[freshness] ${key}: no remote timestamp, cache too old, refetching`);
          result.staleKeys.push(key);
        } else {
          this.onLog(`[freshness] ${key}: no remote timestamp, serving from cache`);
          result.freshKeys.push(key);
        }
        continue;
      }

      if (remoteTime.getTime() > toEpochSeconds(localTime) * 1000) {
        result.staleKeys.push(key);
      } else {
        result.freshKeys.push(key);
      }
    }

    this.onLog(
      `[freshness] ${result.newKeys.length} new, ${result.staleKeys.length} stale, ${result.freshKeys.length} fresh`
    );
    return result;
  }
}
