/**
 * JQL builders and timestamp parsing for the Jira REST API
 */

import type { RelationKind } from "@treecrawl/types";

/**
 * Maximum number of keys per "issuekey in (...)" query
 */
export const JQL_CHUNK_SIZE = 200;

/**
 * Query used to find the direct hierarchical children of an issue
 */
export interface ChildQuery {
  jql: string;
  relation: RelationKind;
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Build the child query for a parent, selected by the parent's issue type.
 *
 * Epics hold their children through "Epic Link"; portfolio-level types
 * through "Parent Link". Any other type has no hierarchical children.
 */
export function buildChildQuery(
  parentKey: string,
  parentType: string,
  parentLinkTypes: readonly string[]
): ChildQuery | null {
  if (parentType === "Epic") {
    return {
      jql: `"Epic Link" = ${quote(parentKey)} ORDER BY created DESC`,
      relation: "issue_in_epic",
    };
  }
  if (parentLinkTypes.includes(parentType)) {
    return {
      jql: `"Parent Link" = ${quote(parentKey)} ORDER BY created DESC`,
      relation: "child",
    };
  }
  return null;
}

/**
 * Build the "issuekey in (...)" query for one chunk of keys
 */
export function buildKeysQuery(keys: readonly string[]): string {
  return `issuekey in (${keys.map(quote).join(", ")})`;
}

/**
 * Split keys into chunks of at most `size`
 */
export function chunkKeys(keys: readonly string[], size = JQL_CHUNK_SIZE): string[][] {
  const chunks: string[][] = [];
  for (let i = 0; i < keys.length; i += size) {
    chunks.push(keys.slice(i, i + size));
  }
  return chunks;
}

/**
 * Parse a Jira timestamp such as "2024-01-02T10:15:30.000+0100".
 * Jira omits the colon in the zone offset, which Date.parse does not accept
 * on every runtime, so it is inserted first.
 *
 * @returns The parsed date, or null when the value is not a valid timestamp
 */
export function parseJiraTimestamp(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") {
    return null;
  }
  const normalized = value.trim().replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}
