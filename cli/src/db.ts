/**
 * Database initialization and connection management
 */

import Database from "better-sqlite3";
import * as schema from "@treecrawl/types/schema";

export interface DatabaseOptions {
  path: string;
  /** Fail instead of creating a missing database file */
  fileMustExist?: boolean;
  verbose?: boolean;
}

/**
 * Milliseconds a connection waits on a locked database before failing
 */
export const BUSY_TIMEOUT_MS = 5_000;

/**
 * Initialize and configure the SQLite database
 */
export function initDatabase(options: DatabaseOptions): Database.Database {
  const db = openDatabase(options);

  // Create all tables
  for (const table of schema.ALL_TABLES) {
    db.exec(table);
  }

  // Create all indexes
  for (const indexes of schema.ALL_INDEXES) {
    db.exec(indexes);
  }

  return db;
}

/**
 * Open an existing database without touching its schema
 */
export function openDatabase(options: DatabaseOptions): Database.Database {
  const db = new Database(options.path, {
    fileMustExist: options.fileMustExist ?? false,
    timeout: BUSY_TIMEOUT_MS,
    verbose: options.verbose ? console.log : undefined,
  });

  // Apply database configuration
  db.exec(schema.DB_CONFIG);

  return db;
}

/**
 * Run a callback on a short-lived connection that is always closed afterwards
 */
export function withConnection<T>(
  path: string,
  callback: (db: Database.Database) => T
): T {
  const db = openDatabase({ path, fileMustExist: true });
  try {
    return callback(db);
  } finally {
    db.close();
  }
}

/**
 * Whether a table exists in the database
 */
export function tableExists(db: Database.Database, name: string): boolean {
  const row = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(name);
  return row !== undefined;
}
