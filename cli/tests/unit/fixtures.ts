/**
 * Shared test data: issue builders and an in-memory remote
 */

import type {
  ChildRef,
  Issue,
  LinkRef,
  RawRecord,
  RecordTransformer,
  RemoteRecordClient,
  RequestOptions,
} from "@treecrawl/types";
import { RemoteError } from "../../src/errors.js";

export function makeIssue(key: string, overrides: Partial<Issue> = {}): Issue {
  return {
    key,
    type: "Story",
    title: `Title of ${key}`,
    status: "Open",
    resolution: null,
    points: 0,
    description: "",
    acceptance_criteria: [],
    parent_key: null,
    assignee: null,
    priority: null,
    team: null,
    fix_versions: [],
    components: [],
    labels: [],
    links: [],
    activities: [],
    created_at: null,
    resolved_at: null,
    closed_at: null,
    target_start: null,
    target_end: null,
    ...overrides,
  };
}

export function link(key: string, relation: LinkRef["relation"] = "child"): LinkRef {
  return { key, relation, title: `Title of ${key}` };
}

/**
 * In-memory remote. Issues are served as raw records whose key is the only
 * payload; {@link FakeTransformer} turns them back into the stored issue.
 */
export class FakeRemote implements RemoteRecordClient {
  readonly issues = new Map<string, Issue>();
  readonly updated = new Map<string, Date>();
  readonly children = new Map<string, ChildRef[]>();
  /** Number of RemoteErrors to throw for a key before it succeeds */
  readonly failures = new Map<string, number>();
  readonly fetchCalls: string[] = [];
  readonly timestampCalls: string[][] = [];
  timestampsFail = false;
  /** Called before each fetch resolves */
  beforeFetch: (key: string) => void | Promise<void> = () => {};

  add(issue: Issue, updated: Date = new Date("2024-01-01T00:00:00Z")): this {
    this.issues.set(issue.key, issue);
    this.updated.set(issue.key, updated);
    return this;
  }

  async fetchIssue(key: string, _options?: RequestOptions): Promise<RawRecord> {
    this.fetchCalls.push(key);
    await this.beforeFetch(key);

    const remaining = this.failures.get(key) ?? 0;
    if (remaining > 0) {
      this.failures.set(key, remaining - 1);
      throw new RemoteError(`HTTP 503 fetching ${key}`, "fetchIssue", 503);
    }
    if (!this.issues.has(key)) {
      throw new RemoteError(`HTTP 404 fetching ${key}`, "fetchIssue", 404);
    }
    return { key, fields: {} };
  }

  async findChildren(parentKey: string): Promise<ChildRef[]> {
    return this.children.get(parentKey) ?? [];
  }

  async fetchUpdatedTimestamps(keys: string[]): Promise<Map<string, Date>> {
    this.timestampCalls.push([...keys]);
    if (this.timestampsFail) {
      throw new RemoteError("HTTP 500 searching", "fetchUpdatedTimestamps", 500);
    }
    const result = new Map<string, Date>();
    for (const key of keys) {
      const updated = this.updated.get(key);
      if (updated) {
        result.set(key, updated);
      }
    }
    return result;
  }

  fetchCount(key: string): number {
    return this.fetchCalls.filter((call) => call === key).length;
  }
}

export class FakeTransformer implements RecordTransformer {
  constructor(private readonly remote: FakeRemote) {}

  private lookup(raw: RawRecord): Issue {
    const issue = this.remote.issues.get(raw.key);
    if (!issue) {
      throw new Error(`No fake issue ${raw.key}`);
    }
    return issue;
  }

  issueType(raw: RawRecord): string {
    return this.lookup(raw).type;
  }

  transform(raw: RawRecord, children: ChildRef[]): Issue {
    const issue = this.lookup(raw);
    return {
      ...issue,
      links: [
        ...issue.links,
        ...children.map((child) => ({
          key: child.key,
          relation: child.relation,
          title: child.title,
        })),
      ],
    };
  }
}
