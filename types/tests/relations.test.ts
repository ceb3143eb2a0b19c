/**
 * Unit tests for relation kinds and hierarchy presets
 */

import { describe, it, expect } from "vitest";
import {
  RELATION_KINDS,
  HIERARCHY_PRESETS,
  isRelationKind,
  parseRelationKind,
  parseHierarchy,
} from "../src/relations.js";
import { ValidationError } from "../src/errors.js";

describe("Relation kinds", () => {
  it("should expose the closed set of kinds", () => {
    expect(RELATION_KINDS).toEqual([
      "child",
      "realized_by",
      "issue_in_epic",
      "sub_task",
    ]);
  });

  it("should recognize known kinds", () => {
    expect(isRelationKind("child")).toBe(true);
    expect(isRelationKind("sub_task")).toBe(true);
  });

  it("should reject unknown kinds and non-strings", () => {
    expect(isRelationKind("blocks")).toBe(false);
    expect(isRelationKind(42)).toBe(false);
    expect(isRelationKind(undefined)).toBe(false);
  });

  it("should throw ValidationError when parsing an unknown kind", () => {
    expect(() => parseRelationKind("relates_to")).toThrow(ValidationError);
    expect(() => parseRelationKind("relates_to")).toThrow(
      "Unknown relation kind: relates_to"
    );
  });
});

describe("parseHierarchy", () => {
  it("should accept a valid map", () => {
    const hierarchy = parseHierarchy({
      Epic: ["issue_in_epic"],
      Initiative: ["child", "realized_by"],
    });

    expect(hierarchy).toEqual({
      Epic: ["issue_in_epic"],
      Initiative: ["child", "realized_by"],
    });
  });

  it("should reject unknown relation kinds at the boundary", () => {
    expect(() => parseHierarchy({ Epic: ["issue_in_epic", "clones"] })).toThrow(
      ValidationError
    );
  });

  it("should reject non-list values", () => {
    expect(() => parseHierarchy({ Epic: "child" })).toThrow(
      'Relation kinds for issue type "Epic" must be a list'
    );
  });
});

describe("Hierarchy presets", () => {
  it("should not allow Epic as a root in the management view", () => {
    expect(HIERARCHY_PRESETS.management.Epic).toBeUndefined();
    expect(HIERARCHY_PRESETS.management["Business Epic"]).toEqual([
      "realized_by",
      "child",
    ]);
  });

  it("should follow issue_in_epic from Epics in the full view", () => {
    expect(HIERARCHY_PRESETS.full.Epic).toEqual(["issue_in_epic"]);
    expect(Object.keys(HIERARCHY_PRESETS.full)).toHaveLength(5);
  });
});
