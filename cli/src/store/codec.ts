/**
 * Serialization of cached issues
 */

import { isRelationKind, type Issue } from "@treecrawl/types";
import { DecodeError } from "../errors.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isLinkRef(value: unknown): boolean {
  return (
    isObject(value) &&
    typeof value.key === "string" &&
    typeof value.title === "string" &&
    isRelationKind(value.relation)
  );
}

function isFieldChange(value: unknown): boolean {
  return (
    isObject(value) &&
    typeof value.field_name === "string" &&
    isNullableString(value.old_value) &&
    isNullableString(value.new_value) &&
    typeof value.actor === "string" &&
    typeof value.timestamp === "string"
  );
}

/**
 * Structural check for a canonical issue record
 */
export function isIssue(value: unknown): value is Issue {
  return (
    isObject(value) &&
    typeof value.key === "string" &&
    typeof value.type === "string" &&
    typeof value.title === "string" &&
    typeof value.status === "string" &&
    isNullableString(value.resolution) &&
    typeof value.points === "number" &&
    typeof value.description === "string" &&
    isStringList(value.acceptance_criteria) &&
    isNullableString(value.parent_key) &&
    isNullableString(value.assignee) &&
    isNullableString(value.priority) &&
    isNullableString(value.team) &&
    isStringList(value.fix_versions) &&
    isStringList(value.components) &&
    isStringList(value.labels) &&
    Array.isArray(value.links) &&
    value.links.every(isLinkRef) &&
    Array.isArray(value.activities) &&
    value.activities.every(isFieldChange) &&
    isNullableString(value.created_at) &&
    isNullableString(value.resolved_at) &&
    isNullableString(value.closed_at) &&
    isNullableString(value.target_start) &&
    isNullableString(value.target_end)
  );
}

export function encodeIssue(issue: Issue): string {
  return JSON.stringify(issue, null, 2);
}

/**
 * Parse a stored payload
 *
 * @throws DecodeError when the payload is not a canonical issue for `key`
 */
export function decodeIssue(data: string, key: string): Issue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new DecodeError(
      `Cached record for ${key} is not valid JSON`,
      key,
      error instanceof Error ? error : undefined
    );
  }

  if (!isIssue(parsed)) {
    throw new DecodeError(`Cached record for ${key} is not a valid issue`, key);
  }
  if (parsed.key !== key) {
    throw new DecodeError(
      `Cached record for ${key} holds issue ${parsed.key}`,
      key
    );
  }
  return parsed;
}

/**
 * Whole epoch seconds, the precision shared by both backends
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Keys become file names, so they must not contain path syntax
 */
export function isStorableKey(key: string): boolean {
  return /^[A-Za-z0-9][A-Za-z0-9_.-]*$/.test(key) && !key.includes("..");
}
