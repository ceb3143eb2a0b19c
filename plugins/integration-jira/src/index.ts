/**
 * Jira integration for treecrawl
 *
 * Provides the remote record client (Jira REST API v2, bearer token) and
 * the pure record transformer used by the crawler.
 */

export {
  JiraClient,
  parseRawRecord,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type ApiTiming,
  type JiraClientOptions,
} from "./jira-client.js";

export {
  buildChildQuery,
  buildKeysQuery,
  chunkKeys,
  parseJiraTimestamp,
  JQL_CHUNK_SIZE,
  type ChildQuery,
} from "./jql.js";

export {
  transform,
  issueType,
  jiraTransformer,
  normalizeFields,
  combineDescription,
  parseAcceptanceCriteria,
  extractActivities,
  extractRealizedBy,
  extractSubTasks,
  findParentKey,
  ACTIVITY_FIELDS,
} from "./mappers.js";
