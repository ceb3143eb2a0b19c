/**
 * Jira REST API client
 *
 * Thin, stateless wrapper over three endpoints of the Jira REST API v2:
 * single issue with changelog, child search, and bulk "updated" timestamps.
 * Uses the global fetch with a bearer token.
 */

import {
  PARENT_LINK_TYPES,
  RemoteError,
  type ChildRef,
  type RawChangelog,
  type RawHistory,
  type RawRecord,
  type RemoteRecordClient,
  type RequestOptions,
} from "@treecrawl/types";
import {
  buildChildQuery,
  buildKeysQuery,
  chunkKeys,
  parseJiraTimestamp,
  JQL_CHUNK_SIZE,
} from "./jql.js";
import { asArray, asString, isRecord, summaryOf } from "./guards.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const SEARCH_PAGE_SIZE = 100;

/**
 * Timing of a single API request
 */
export interface ApiTiming {
  operation: string;
  durationMs: number;
  /** HTTP status, or null when no response was received */
  status: number | null;
}

export interface JiraClientOptions {
  /** Server URL, e.g. https://jira.example.com */
  baseUrl: string;
  /** Personal access token */
  token: string;
  /** Per-request timeout (default: 60s) */
  requestTimeoutMs?: number;
  /** Issue types whose children are found via "Parent Link" */
  parentLinkTypes?: string[];
  /** Keys per bulk timestamp query (default: 200) */
  chunkSize?: number;
  /** Called after every request, successful or not */
  onRequest?: (timing: ApiTiming) => void;
}

type QueryParams = Record<string, string | number>;

export class JiraClient implements RemoteRecordClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly parentLinkTypes: string[];
  private readonly chunkSize: number;
  private readonly onRequest?: (timing: ApiTiming) => void;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.parentLinkTypes = options.parentLinkTypes ?? PARENT_LINK_TYPES;
    this.chunkSize = options.chunkSize ?? JQL_CHUNK_SIZE;
    this.onRequest = options.onRequest;
  }

  /**
   * Fetch one issue with its field-name map and full changelog
   */
  async fetchIssue(key: string, options?: RequestOptions): Promise<RawRecord> {
    const data = await this.request(
      "fetch_issue",
      `/issue/${encodeURIComponent(key)}`,
      { expand: "names,changelog" },
      options
    );
    return parseRawRecord(data, key);
  }

  /**
   * Find the direct hierarchical children of an issue.
   * Types that cannot hold children return an empty list without a request.
   */
  async findChildren(
    parentKey: string,
    parentType: string,
    options?: RequestOptions
  ): Promise<ChildRef[]> {
    const query = buildChildQuery(parentKey, parentType, this.parentLinkTypes);
    if (!query) {
      return [];
    }

    const children: ChildRef[] = [];
    let startAt = 0;
    let total = Infinity;

    while (startAt < total) {
      const data = await this.request(
        "find_children",
        "/search",
        {
          jql: query.jql,
          fields: "summary,status,issuetype",
          startAt,
          maxResults: SEARCH_PAGE_SIZE,
        },
        options
      );
      const issues = searchIssues(data);
      for (const issue of issues) {
        const key = asString(issue.key);
        if (key) {
          children.push({ key, title: summaryOf(issue), relation: query.relation });
        }
      }

      total = isRecord(data) && typeof data.total === "number" ? data.total : 0;
      if (issues.length === 0) {
        break;
      }
      startAt += issues.length;
    }

    return children;
  }

  /**
   * Fetch only the "updated" timestamp of each key, in chunks.
   * Keys the server no longer resolves are absent from the result.
   */
  async fetchUpdatedTimestamps(
    keys: string[],
    options?: RequestOptions
  ): Promise<Map<string, Date>> {
    const timestamps = new Map<string, Date>();

    for (const chunk of chunkKeys(keys, this.chunkSize)) {
      const data = await this.request(
        "fetch_updated_timestamps",
        "/search",
        { jql: buildKeysQuery(chunk), fields: "updated", maxResults: chunk.length },
        options
      );
      for (const issue of searchIssues(data)) {
        const key = asString(issue.key);
        const updated = isRecord(issue.fields)
          ? parseJiraTimestamp(issue.fields.updated)
          : null;
        if (key && updated) {
          timestamps.set(key, updated);
        }
      }
    }

    return timestamps;
  }

  private async request(
    operation: string,
    path: string,
    params: QueryParams,
    options?: RequestOptions
  ): Promise<unknown> {
    const signal = options?.signal;
    signal?.throwIfAborted();

    const url = new URL(`${this.baseUrl}/rest/api/2${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, String(value));
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const started = Date.now();
    let status: number | null = null;

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
        },
        signal: controller.signal,
      });
      status = response.status;

      if (!response.ok) {
        throw new RemoteError(
          `${operation} failed: HTTP ${response.status} ${response.statusText}`.trim(),
          operation,
          response.status
        );
      }

      return await response.json();
    } catch (error) {
      if (error instanceof RemoteError) {
        throw error;
      }
      // Caller cancellation is not a remote failure
      if (signal?.aborted) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      const message = controller.signal.aborted
        ? `${operation} timed out after ${this.timeoutMs} ms`
        : `${operation} failed: ${cause.message}`;
      throw new RemoteError(message, operation, undefined, cause);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
      this.onRequest?.({ operation, durationMs: Date.now() - started, status });
    }
  }
}

function searchIssues(data: unknown): Record<string, unknown>[] {
  if (!isRecord(data)) {
    return [];
  }
  return asArray(data.issues).filter(isRecord);
}

/**
 * Validate the /issue response and drop empty custom fields
 */
export function parseRawRecord(data: unknown, requestedKey: string): RawRecord {
  if (!isRecord(data) || !isRecord(data.fields)) {
    throw new RemoteError(
      `fetch_issue returned an unexpected payload for ${requestedKey}`,
      "fetch_issue"
    );
  }

  const fields: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(data.fields)) {
    if (name.startsWith("customfield_") && value === null) {
      continue;
    }
    fields[name] = value;
  }

  const names: Record<string, string> = {};
  if (isRecord(data.names)) {
    for (const [id, name] of Object.entries(data.names)) {
      if (typeof name === "string") {
        names[id] = name;
      }
    }
  }

  return {
    key: asString(data.key) ?? requestedKey,
    names,
    fields,
    changelog: parseChangelog(data.changelog),
  };
}

function parseChangelog(value: unknown): RawChangelog {
  if (!isRecord(value)) {
    return { histories: [] };
  }

  const histories: RawHistory[] = asArray(value.histories)
    .filter(isRecord)
    .map((entry) => ({
      author: isRecord(entry.author)
        ? { displayName: asString(entry.author.displayName) ?? undefined }
        : undefined,
      created: asString(entry.created) ?? undefined,
      items: asArray(entry.items)
        .filter(isRecord)
        .flatMap((item) => {
          const field = asString(item.field);
          return field
            ? [
                {
                  field,
                  from: asString(item.fromString),
                  to: asString(item.toString),
                },
              ]
            : [];
        }),
    }));

  return { histories };
}
