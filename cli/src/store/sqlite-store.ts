/**
 * SQLite issue cache
 *
 * Every call opens its own short-lived connection, so concurrent crawl
 * workers never share a handle.
 */

import * as fs from "fs";
import type { Issue } from "@treecrawl/types";
import { ISSUES_TABLE_NAME, UPSERT_ISSUE } from "@treecrawl/types/schema";
import { initDatabase, tableExists, withConnection } from "../db.js";
import { DecodeError, isDecodeError } from "../errors.js";
import type { IssueStore, LogOptions, StoredIssue } from "../types.js";
import { decodeIssue, encodeIssue, fromEpochSeconds, toEpochSeconds } from "./codec.js";

/**
 * SQLite limits the number of bound parameters per statement
 */
const MAX_KEYS_PER_QUERY = 500;

interface IssueRow {
  data: string;
  modified: number;
}

interface TimestampRow {
  key: string;
  modified: number;
}

function isIssueRow(row: unknown): row is IssueRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "data" in row &&
    typeof row.data === "string" &&
    "modified" in row &&
    typeof row.modified === "number"
  );
}

function isTimestampRow(row: unknown): row is TimestampRow {
  return (
    typeof row === "object" &&
    row !== null &&
    "key" in row &&
    typeof row.key === "string" &&
    "modified" in row &&
    typeof row.modified === "number"
  );
}

export class SqliteIssueStore implements IssueStore {
  readonly name = "sqlite";
  private readonly onError: (error: Error) => void;

  constructor(
    readonly dbPath: string,
    options: LogOptions = {}
  ) {
    this.onError = options.onError ?? console.error;
  }

  /**
   * Create the database file, table and index if missing
   */
  initialize(): void {
    const db = initDatabase({ path: this.dbPath });
    db.close();
  }

  get(key: string): StoredIssue | null {
    const row = withConnection(this.dbPath, (db) =>
      db
        .prepare(
          `SELECT data, file_last_modified_timestamp AS modified
           FROM issues WHERE key = ?`
        )
        .get(key)
    );
    if (row === undefined) {
      return null;
    }
    if (!isIssueRow(row)) {
      this.onError(new DecodeError(`Cached row for ${key} is incomplete`, key));
      return null;
    }

    try {
      return { issue: decodeIssue(row.data, key), modifiedAt: fromEpochSeconds(row.modified) };
    } catch (error) {
      if (isDecodeError(error)) {
        this.onError(error);
        return null;
      }
      throw error;
    }
  }

  batchGet(keys: readonly string[]): Map<string, Date> {
    const timestamps = new Map<string, Date>();
    if (keys.length === 0) {
      return timestamps;
    }

    withConnection(this.dbPath, (db) => {
      for (let i = 0; i < keys.length; i += MAX_KEYS_PER_QUERY) {
        const chunk = keys.slice(i, i + MAX_KEYS_PER_QUERY);
        const placeholders = chunk.map(() => "?").join(", ");
        const rows = db
          .prepare(
            `SELECT key, file_last_modified_timestamp AS modified
             FROM issues WHERE key IN (${placeholders})`
          )
          .all(...chunk);
        for (const row of rows) {
          if (isTimestampRow(row)) {
            timestamps.set(row.key, fromEpochSeconds(row.modified));
          }
        }
      }
    });

    return timestamps;
  }

  upsert(key: string, issue: Issue, modifiedAt: Date = new Date()): Date {
    const seconds = toEpochSeconds(modifiedAt);
    withConnection(this.dbPath, (db) => {
      db.prepare(UPSERT_ISSUE).run({ key, data: encodeIssue(issue), modified: seconds });
    });
    return fromEpochSeconds(seconds);
  }

  tableReady(): boolean {
    if (!fs.existsSync(this.dbPath)) {
      return false;
    }
    try {
      return withConnection(this.dbPath, (db) => tableExists(db, ISSUES_TABLE_NAME));
    } catch (error) {
      this.onError(error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  close(): void {}
}
