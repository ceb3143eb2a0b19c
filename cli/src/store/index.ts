/**
 * Issue cache backends and backend selection
 */

import type { StorageBackend } from "@treecrawl/types";
import type { IssueStore, LogOptions } from "../types.js";
import { FileIssueStore } from "./file-store.js";
import { MirroredIssueStore } from "./mirrored-store.js";
import { SqliteIssueStore } from "./sqlite-store.js";

export { FileIssueStore } from "./file-store.js";
export { SqliteIssueStore } from "./sqlite-store.js";
export { MirroredIssueStore } from "./mirrored-store.js";
export {
  decodeIssue,
  encodeIssue,
  isIssue,
  toEpochSeconds,
  fromEpochSeconds,
} from "./codec.js";

export interface OpenStoreOptions extends LogOptions {
  backend: StorageBackend;
  dbPath: string;
  issuesDir: string;
  /** Create the database when missing (default: true) */
  create?: boolean;
}

export interface OpenedStore {
  store: IssueStore;
  /** Backend actually in use; "files" when SQLite was unavailable */
  backend: StorageBackend;
}

/**
 * Choose the cache backend for this process
 *
 * The SQLite backend (mirrored to files) is used when configured and its
 * table is available; otherwise the flat-file backend.
 */
export function openIssueStore(options: OpenStoreOptions): OpenedStore {
  const onLog = options.onLog ?? console.log;
  const onError = options.onError ?? console.error;
  const files = new FileIssueStore(options.issuesDir, { onError });

  if (options.backend === "files") {
    return { store: files, backend: "files" };
  }

  const table = new SqliteIssueStore(options.dbPath, { onError });
  if (options.create ?? true) {
    try {
      table.initialize();
    } catch (error) {
      onError(
        new Error(
          `Cannot open ${options.dbPath}: ${error instanceof Error ? error.message : String(error)}`
        )
      );
    }
  }

  if (!table.tableReady()) {
    onLog(`[store] SQLite cache unavailable, using files in ${options.issuesDir}`);
    return { store: files, backend: "files" };
  }

  return { store: new MirroredIssueStore(table, files), backend: "sqlite" };
}
