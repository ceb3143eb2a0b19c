/**
 * Core entity types for treecrawl
 */

export * from "./relations.js";
export * from "./errors.js";

import type { RelationKind } from "./relations.js";

/**
 * Canonical issue record, as persisted in the cache
 */
export interface Issue {
  key: string;
  type: string;
  title: string;
  status: string;
  resolution: string | null;
  points: number;
  description: string;
  acceptance_criteria: string[];
  parent_key: string | null;
  assignee: string | null;
  priority: string | null;
  team: string | null;
  fix_versions: string[];
  components: string[];
  labels: string[];
  links: LinkRef[];
  activities: FieldChange[];
  created_at: string | null;
  resolved_at: string | null;
  closed_at: string | null;
  target_start: string | null;
  target_end: string | null;
}

/**
 * Reference from one issue to another. The target may not be cached yet.
 */
export interface LinkRef {
  key: string;
  relation: RelationKind;
  title: string;
}

/**
 * A single tracked field change from the issue history
 */
export interface FieldChange {
  field_name: string;
  old_value: string | null;
  new_value: string | null;
  actor: string;
  timestamp: string;
}

/**
 * Issue record as returned by the remote API, before transformation.
 * `names` maps raw field ids (e.g. "customfield_10002") to display names.
 */
export interface RawRecord {
  key: string;
  names?: Record<string, string>;
  fields: Record<string, unknown>;
  changelog?: RawChangelog;
}

export interface RawChangelog {
  histories: RawHistory[];
}

export interface RawHistory {
  author?: { displayName?: string };
  created?: string;
  items: RawHistoryItem[];
}

export interface RawHistoryItem {
  field: string;
  /** Jira's `fromString` */
  from: string | null;
  /** Jira's `toString` */
  to: string | null;
}

/**
 * Direct hierarchical child found by a parent-type-specific query
 */
export interface ChildRef {
  key: string;
  title: string;
  relation: RelationKind;
}

/**
 * Options accepted by every remote call
 */
export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Remote source of issue records.
 *
 * Every method rejects with a {@link RemoteError} on transport or HTTP
 * failure. Keys missing from the `fetchUpdatedTimestamps` result are not
 * an error: they are no longer resolvable on the remote.
 */
export interface RemoteRecordClient {
  fetchIssue(key: string, options?: RequestOptions): Promise<RawRecord>;
  findChildren(
    parentKey: string,
    parentType: string,
    options?: RequestOptions
  ): Promise<ChildRef[]>;
  fetchUpdatedTimestamps(
    keys: string[],
    options?: RequestOptions
  ): Promise<Map<string, Date>>;
}

/**
 * Pure mapping from raw remote records to canonical issues
 */
export interface RecordTransformer {
  issueType(raw: RawRecord): string;
  transform(raw: RawRecord, children: ChildRef[]): Issue;
}

/**
 * Crawl mode: "full" always hits the network, "delta" consults cache freshness
 */
export type CrawlMode = "full" | "delta";

/**
 * Per-issue-type list of relation kinds to follow. The keys are the
 * issue types allowed as hierarchy roots.
 */
export type HierarchyConfig = Record<string, RelationKind[]>;

/**
 * treecrawl configuration file ({dataDir}/config.json)
 */
export interface Config {
  jira?: {
    baseUrl?: string;
    requestTimeoutMs?: number;
    parentLinkTypes?: string[];
  };
  crawl?: {
    mode?: CrawlMode;
    concurrency?: number;
    maxAgeMs?: number;
  };
  storage?: {
    backend?: StorageBackend;
    dbPath?: string;
    issuesDir?: string;
  };
  failureLog?: string;
  /** Preset name or explicit type -> relation kinds map */
  hierarchy?: HierarchyPreset | Record<string, string[]>;
}

export type StorageBackend = "sqlite" | "files";

export type HierarchyPreset = "management" | "full";
