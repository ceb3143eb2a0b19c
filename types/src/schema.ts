/**
 * SQLite schema for the structured issue cache
 * Shared between the CLI and any other reader of the cache database
 */

/**
 * Database configuration SQL
 */
export const DB_CONFIG = `
-- WAL lets readers run during the crawler's writes
PRAGMA journal_mode=WAL;
PRAGMA synchronous=NORMAL;
PRAGMA temp_store=MEMORY;
`;

export const ISSUES_TABLE_NAME = "issues";

export const ISSUES_TABLE = `
CREATE TABLE IF NOT EXISTS issues (
    key TEXT PRIMARY KEY,
    data TEXT,
    file_last_modified_timestamp INTEGER
);
`;

export const ISSUES_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_issue_key ON issues (key);
`;

export const UPSERT_ISSUE = `
INSERT INTO issues (key, data, file_last_modified_timestamp)
VALUES (@key, @data, @modified)
ON CONFLICT(key) DO UPDATE SET
    data = excluded.data,
    file_last_modified_timestamp = excluded.file_last_modified_timestamp
`;

export const ALL_TABLES = [ISSUES_TABLE];

export const ALL_INDEXES = [ISSUES_INDEXES];
