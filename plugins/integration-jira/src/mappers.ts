/**
 * Jira -> treecrawl data mappers
 *
 * Pure functions mapping raw /issue responses onto the canonical Issue.
 * Field lookups go through the record's `names` map first (display names
 * such as "Story Points"), then fall back to the raw field id.
 */

import type {
  ChildRef,
  FieldChange,
  Issue,
  LinkRef,
  RawRecord,
  RecordTransformer,
} from "@treecrawl/types";
import {
  asArray,
  asString,
  displayNameOf,
  isRecord,
  nameOf,
  summaryOf,
} from "./guards.js";

/**
 * Changelog fields kept as activities
 */
export const ACTIVITY_FIELDS: readonly string[] = [
  "Program Increment",
  "status",
  "Fix Version",
  "Version",
  "Target end",
  "Target start",
  "Business Scope",
  "Component",
  "Acceptance Criteria",
  "description",
  "summary",
  "resolution",
  "Epic Child",
  "Sprint",
  "Story Points",
  "Attachment",
];

const ACTIVITY_DISPLAY_NAMES: Record<string, string> = {
  Version: "Affects Version",
};

const REALIZES = "realizes";

type Fields = Record<string, unknown>;

/**
 * Re-key the raw fields by display name
 */
export function normalizeFields(raw: RawRecord): Fields {
  const names = raw.names ?? {};
  const fields: Fields = {};
  for (const [id, value] of Object.entries(raw.fields)) {
    fields[names[id] ?? id] = value;
  }
  return fields;
}

function pick(fields: Fields, displayName: string, rawId: string): unknown {
  return displayName in fields ? fields[displayName] : fields[rawId];
}

function namesOf(value: unknown): string[] {
  return asArray(value).flatMap((entry) => {
    const name = nameOf(entry);
    return name ? [name] : [];
  });
}

/**
 * Combine "Business Scope" and "Description" into one text
 */
export function combineDescription(fields: Fields): string {
  const scope = asString(pick(fields, "Business Scope", "businessScope"))?.trim();
  let description = asString(pick(fields, "Description", "description"))?.trim();
  const parts: string[] = [];

  if (scope) {
    parts.push(`*Business Scope*\r\n${scope}`);
  }
  if (description) {
    if (description.startsWith("Description\n")) {
      description = description.slice("Description\n".length).trim();
    }
    parts.push(`*Description*\r\n${description}`);
  }

  return parts.join("\n\n");
}

/**
 * Split a multi-line acceptance criteria field into items, dropping bullets
 */
export function parseAcceptanceCriteria(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  if (typeof value !== "string") {
    return [];
  }
  return value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) =>
      line.startsWith("* ") || line.startsWith("- ") ? line.slice(2) : line
    );
}

/**
 * Keep only changelog items for tracked fields
 */
export function extractActivities(raw: RawRecord): FieldChange[] {
  const activities: FieldChange[] = [];

  for (const history of raw.changelog?.histories ?? []) {
    const actor = history.author?.displayName ?? "Unknown";
    const timestamp = history.created ?? "";

    for (const item of history.items) {
      if (!ACTIVITY_FIELDS.includes(item.field)) {
        continue;
      }
      const isDescription = item.field === "description";
      activities.push({
        field_name: ACTIVITY_DISPLAY_NAMES[item.field] ?? item.field,
        old_value: isDescription ? "old description value not saved" : item.from,
        new_value: isDescription ? "new description value not saved" : item.to,
        actor,
        timestamp,
      });
    }
  }

  return activities;
}

function issueLinks(fields: Fields): Record<string, unknown>[] {
  return asArray(pick(fields, "Linked Issues", "issuelinks")).filter(isRecord);
}

/**
 * Issues this one is realized by. The relation name is read from the
 * opposite side of the link type.
 */
export function extractRealizedBy(fields: Fields): LinkRef[] {
  const links: LinkRef[] = [];

  for (const link of issueLinks(fields)) {
    const type = isRecord(link.type) ? link.type : {};
    let relation: string | null = null;
    let target: unknown = null;

    if ("outwardIssue" in link) {
      relation = asString(type.inward);
      target = link.outwardIssue;
    } else if ("inwardIssue" in link) {
      relation = asString(type.outward);
      target = link.inwardIssue;
    }

    if (relation !== REALIZES || !isRecord(target)) {
      continue;
    }
    const key = asString(target.key);
    if (key) {
      links.push({ key, relation: "realized_by", title: summaryOf(target) });
    }
  }

  return links;
}

export function extractSubTasks(fields: Fields): LinkRef[] {
  return asArray(pick(fields, "Sub-Tasks", "subtasks"))
    .filter(isRecord)
    .flatMap((task) => {
      const key = asString(task.key);
      return key ? [{ key, relation: "sub_task" as const, title: summaryOf(task) }] : [];
    });
}

/**
 * Hierarchical parent: Parent Link, then Epic Link, then an outward
 * "realizes" link
 */
export function findParentKey(fields: Fields): string | null {
  const parentLink = pick(fields, "Parent Link", "parentLink");
  if (isRecord(parentLink)) {
    return asString(parentLink.key);
  }
  if (typeof parentLink === "string") {
    return parentLink;
  }

  const epicLink = asString(pick(fields, "Epic Link", "epicLink"));
  if (epicLink) {
    return epicLink;
  }

  for (const link of issueLinks(fields)) {
    if (
      isRecord(link.outwardIssue) &&
      isRecord(link.type) &&
      link.type.outward === REALIZES
    ) {
      return asString(link.outwardIssue.key);
    }
  }
  return null;
}

function teamName(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (isRecord(value)) {
    return asString(value.name) ?? asString(value.value);
  }
  return null;
}

function storyPoints(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Issue type name, e.g. "Epic"
 */
export function issueType(raw: RawRecord): string {
  return nameOf(pick(normalizeFields(raw), "Issue Type", "issuetype")) ?? "";
}

/**
 * Map a raw record and its children to the canonical issue
 */
export function transform(raw: RawRecord, children: ChildRef[]): Issue {
  const fields = normalizeFields(raw);

  const links: LinkRef[] = [
    ...extractRealizedBy(fields),
    ...children.map(({ key, relation, title }) => ({ key, relation, title })),
    ...extractSubTasks(fields),
  ];

  return {
    key: raw.key,
    type: nameOf(pick(fields, "Issue Type", "issuetype")) ?? "",
    title: asString(pick(fields, "Summary", "summary")) ?? "",
    status: nameOf(pick(fields, "Status", "status")) ?? "",
    resolution: nameOf(pick(fields, "Resolution", "resolution")),
    points: storyPoints(fields["Story Points"]),
    description: combineDescription(fields),
    acceptance_criteria: parseAcceptanceCriteria(fields["Acceptance Criteria"]),
    parent_key: findParentKey(fields),
    assignee: displayNameOf(pick(fields, "Assignee", "assignee")),
    priority: nameOf(pick(fields, "Priority", "priority")),
    team: teamName(fields["Team"]),
    fix_versions: namesOf(pick(fields, "Fix Version/s", "fixVersions")),
    components: namesOf(pick(fields, "Component/s", "components")),
    labels: asArray(pick(fields, "Labels", "labels")).filter(
      (label): label is string => typeof label === "string"
    ),
    links,
    activities: extractActivities(raw),
    created_at: asString(pick(fields, "Created", "created")),
    resolved_at: asString(pick(fields, "Resolved", "resolutiondate")),
    closed_at: asString(fields["Closed Date"]),
    target_start: asString(fields["Target start"]),
    target_end: asString(fields["Target end"]),
  };
}

export const jiraTransformer: RecordTransformer = { issueType, transform };
