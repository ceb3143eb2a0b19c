/**
 * Flat-file issue cache: one {key}.json per issue.
 * The file's modification time is the record's freshness baseline.
 */

import * as fs from "fs";
import * as path from "path";
import type { Issue } from "@treecrawl/types";
import { isDecodeError, ValidationError } from "../errors.js";
import type { IssueStore, LogOptions, StoredIssue } from "../types.js";
import {
  decodeIssue,
  encodeIssue,
  fromEpochSeconds,
  isStorableKey,
  toEpochSeconds,
} from "./codec.js";

export class FileIssueStore implements IssueStore {
  readonly name = "files";
  private readonly onError: (error: Error) => void;

  constructor(
    readonly dir: string,
    options: LogOptions = {}
  ) {
    this.onError = options.onError ?? console.error;
  }

  filePath(key: string): string {
    if (!isStorableKey(key)) {
      throw new ValidationError(`Invalid issue key: ${key}`, key);
    }
    return path.join(this.dir, `${key}.json`);
  }

  get(key: string): StoredIssue | null {
    const filePath = this.filePath(key);
    const stats = fs.statSync(filePath, { throwIfNoEntry: false });
    if (!stats) {
      return null;
    }

    try {
      const issue = decodeIssue(fs.readFileSync(filePath, "utf8"), key);
      return { issue, modifiedAt: fromEpochSeconds(Math.floor(stats.mtimeMs / 1000)) };
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
    for (const key of keys) {
      const stats = fs.statSync(this.filePath(key), { throwIfNoEntry: false });
      if (stats) {
        timestamps.set(key, fromEpochSeconds(Math.floor(stats.mtimeMs / 1000)));
      }
    }
    return timestamps;
  }

  /**
   * Write the record to a temp file and rename it over the target
   */
  upsert(key: string, issue: Issue, modifiedAt?: Date): Date {
    const filePath = this.filePath(key);
    const tempPath = `${filePath}.tmp`;

    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(tempPath, encodeIssue(issue), "utf8");
    if (modifiedAt) {
      const seconds = toEpochSeconds(modifiedAt);
      fs.utimesSync(tempPath, seconds, seconds);
    }
    fs.renameSync(tempPath, filePath);

    return fromEpochSeconds(Math.floor(fs.statSync(filePath).mtimeMs / 1000));
  }

  tableReady(): boolean {
    return fs.existsSync(this.dir) && fs.statSync(this.dir).isDirectory();
  }

  close(): void {}
}
