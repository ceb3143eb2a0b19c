/**
 * Structured cache kept in lockstep with the flat-file cache
 *
 * Reads come from SQLite. Writes go to the file first, then to the row,
 * stamped with the file's own modification time, so that either backend
 * reports the same freshness baseline after a restart.
 */

import type { Issue } from "@treecrawl/types";
import type { IssueStore, StoredIssue } from "../types.js";
import type { FileIssueStore } from "./file-store.js";
import type { SqliteIssueStore } from "./sqlite-store.js";

export class MirroredIssueStore implements IssueStore {
  readonly name = "sqlite+files";

  constructor(
    private readonly table: SqliteIssueStore,
    private readonly files: FileIssueStore
  ) {}

  get(key: string): StoredIssue | null {
    return this.table.get(key);
  }

  batchGet(keys: readonly string[]): Map<string, Date> {
    return this.table.batchGet(keys);
  }

  upsert(key: string, issue: Issue, modifiedAt?: Date): Date {
    const stamped = this.files.upsert(key, issue, modifiedAt);
    return this.table.upsert(key, issue, stamped);
  }

  tableReady(): boolean {
    return this.table.tableReady();
  }

  close(): void {
    this.table.close();
    this.files.close();
  }
}
