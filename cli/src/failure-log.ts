/**
 * Failure log: newline-delimited keys that could not be loaded
 */

import * as fs from "fs";
import * as path from "path";

const ISSUE_KEY_PATTERN = /[A-Z][A-Z0-9]*-\d+/g;

export class FailureLog {
  constructor(readonly filePath: string) {}

  private lines(): string[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    return fs
      .readFileSync(this.filePath, "utf8")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "");
  }

  /**
   * Issue keys found in the log, in first-seen order without duplicates
   */
  read(): string[] {
    const keys = new Set<string>();
    for (const line of this.lines()) {
      for (const match of line.matchAll(ISSUE_KEY_PATTERN)) {
        keys.add(match[0]);
      }
    }
    return [...keys];
  }

  /**
   * Append keys not already logged
   *
   * @returns The keys actually appended
   */
  append(keys: Iterable<string>): string[] {
    const known = new Set(this.lines());
    const added: string[] = [];
    for (const key of keys) {
      if (!known.has(key)) {
        known.add(key);
        added.push(key);
      }
    }

    if (added.length > 0) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, added.map((key) => `${key}\n`).join(""), "utf8");
    }
    return added;
  }

  /**
   * Replace the log with exactly these keys
   */
  rewrite(keys: Iterable<string>): void {
    const unique = [...new Set(keys)];
    const tempPath = `${this.filePath}.tmp`;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(tempPath, unique.map((key) => `${key}\n`).join(""), "utf8");
    fs.renameSync(tempPath, this.filePath);
  }
}
