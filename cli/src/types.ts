/**
 * Type definitions for the treecrawl CLI
 *
 * Core entity types are imported from @treecrawl/types.
 */

import type { Issue } from "@treecrawl/types";

// Re-export core types from the shared package
export type {
  Issue,
  LinkRef,
  FieldChange,
  RelationKind,
  RawRecord,
  ChildRef,
  RemoteRecordClient,
  RecordTransformer,
  CrawlMode,
  HierarchyConfig,
  StorageBackend,
  Config,
} from "@treecrawl/types";

/**
 * Logging callbacks accepted by long-running components
 */
export interface LogOptions {
  /** Progress messages (default: console.log) */
  onLog?: (message: string) => void;
  /** Non-fatal errors (default: console.error) */
  onError?: (error: Error) => void;
}

/**
 * A cached issue with the modification time of its cache record
 */
export interface StoredIssue {
  issue: Issue;
  modifiedAt: Date;
}

/**
 * Issue cache backend
 *
 * Timestamps are kept at whole-second precision. A corrupt stored payload
 * reads as "not found".
 */
export interface IssueStore {
  /** Backend name for log messages */
  readonly name: string;
  get(key: string): StoredIssue | null;
  /** Modification times only; keys absent from the store are absent from the map */
  batchGet(keys: readonly string[]): Map<string, Date>;
  /**
   * Insert or replace one record
   *
   * @param modifiedAt - Modification time to record (default: now)
   * @returns The modification time actually stored
   */
  upsert(key: string, issue: Issue, modifiedAt?: Date): Date;
  /** Whether the backend can serve reads */
  tableReady(): boolean;
  close(): void;
}
