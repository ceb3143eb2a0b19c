/**
 * Narrowing helpers for untyped Jira JSON
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Read `name` from objects like `{ "name": "Epic" }`
 */
export function nameOf(value: unknown): string | null {
  return isRecord(value) ? asString(value.name) : null;
}

/**
 * Read `displayName` from user objects
 */
export function displayNameOf(value: unknown): string | null {
  return isRecord(value) ? asString(value.displayName) : null;
}

/**
 * Read `fields.summary` from nested issue objects
 */
export function summaryOf(issue: Record<string, unknown>): string {
  return isRecord(issue.fields) ? (asString(issue.fields.summary) ?? "") : "";
}
