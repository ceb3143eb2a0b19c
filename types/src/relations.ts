/**
 * Relation kinds between issues and the hierarchy presets built from them
 */

import { ValidationError } from "./errors.js";

export const RELATION_KINDS = [
  "child",
  "realized_by",
  "issue_in_epic",
  "sub_task",
] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

export function isRelationKind(value: unknown): value is RelationKind {
  return RELATION_KINDS.some((kind) => kind === value);
}

/**
 * Parse a relation kind, rejecting anything outside the closed set
 */
export function parseRelationKind(value: unknown): RelationKind {
  if (!isRelationKind(value)) {
    throw new ValidationError(
      `Unknown relation kind: ${String(value)} (expected one of: ${RELATION_KINDS.join(", ")})`
    );
  }
  return value;
}

/**
 * Portfolio-level issue types whose children are found via "Parent Link"
 */
export const PARENT_LINK_TYPES = [
  "Business Initiative",
  "Business Epic",
  "Portfolio Epic",
  "Initiative",
];

const PORTFOLIO_RELATIONS: RelationKind[] = ["realized_by", "child"];

/**
 * Built-in hierarchy views
 */
export const HIERARCHY_PRESETS: Record<
  "management" | "full",
  Record<string, RelationKind[]>
> = {
  management: Object.fromEntries(
    PARENT_LINK_TYPES.map((type) => [type, [...PORTFOLIO_RELATIONS]])
  ),
  full: {
    ...Object.fromEntries(
      PARENT_LINK_TYPES.map((type) => [type, [...PORTFOLIO_RELATIONS]])
    ),
    Epic: ["issue_in_epic"],
  },
};

/**
 * Validate an explicit type -> relation kinds map
 */
export function parseHierarchy(
  raw: Record<string, unknown>
): Record<string, RelationKind[]> {
  const hierarchy: Record<string, RelationKind[]> = {};
  for (const [type, kinds] of Object.entries(raw)) {
    if (!Array.isArray(kinds)) {
      throw new ValidationError(
        `Relation kinds for issue type "${type}" must be a list`
      );
    }
    hierarchy[type] = kinds.map(parseRelationKind);
  }
  return hierarchy;
}
