/**
 * Shared setup for command handlers
 */

import chalk from "chalk";
import { JiraClient, jiraTransformer } from "@treecrawl/integration-jira";
import type { RemoteRecordClient } from "@treecrawl/types";
import { loadConfig, requireJiraCredentials, type Env, type ResolvedConfig } from "../config.js";
import { formatErrorMessage } from "../errors.js";
import { FailureLog } from "../failure-log.js";
import { openIssueStore } from "../store/index.js";
import { TimingCollector } from "../timings.js";
import { TreeCrawler } from "../tree.js";
import type { HierarchyConfig, IssueStore } from "../types.js";
import { CrawlerEngine } from "../crawler/engine.js";

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  dataDir: string;
  jsonOutput: boolean;
}

/**
 * Replaceable collaborators, for tests
 */
export interface CommandDeps {
  env?: Env;
  /** Used instead of a JiraClient built from the configuration */
  client?: RemoteRecordClient;
  signal?: AbortSignal;
}

export interface CrawlRuntime {
  config: ResolvedConfig;
  engine: CrawlerEngine;
  store: IssueStore;
  failureLog: FailureLog;
  timings: TimingCollector;
}

function log(jsonOutput: boolean): (message: string) => void {
  return jsonOutput ? () => {} : (message) => console.log(chalk.gray(message));
}

function logError(error: Error): void {
  console.error(chalk.yellow(error.message));
}

/**
 * Print a formatted error and exit
 */
export function fail(ctx: CommandContext, error: unknown): never {
  if (ctx.jsonOutput) {
    console.error(JSON.stringify({ error: formatErrorMessage(error) }));
  } else {
    console.error(chalk.red(formatErrorMessage(error)));
  }
  process.exit(1);
}

/**
 * Build the engine, store and client for a network command
 *
 * @throws ConfigError when configuration or credentials are missing
 */
export function createCrawlRuntime(
  ctx: CommandContext,
  deps: CommandDeps,
  overrides: { concurrency?: number; withFailureLog?: boolean } = {}
): CrawlRuntime {
  const config = loadConfig(ctx.dataDir, deps.env);
  const timings = new TimingCollector();
  const onLog = log(ctx.jsonOutput);

  let client = deps.client;
  if (!client) {
    const { baseUrl, token } = requireJiraCredentials(config);
    client = new JiraClient({
      baseUrl,
      token,
      requestTimeoutMs: config.jira.requestTimeoutMs,
      parentLinkTypes: config.jira.parentLinkTypes,
      onRequest: timings.record,
    });
  }

  const { store } = openIssueStore({ ...config.storage, onLog, onError: logError });
  const failureLog = new FailureLog(config.failureLog);
  const engine = new CrawlerEngine({
    client,
    transformer: jiraTransformer,
    store,
    mode: config.crawl.mode,
    concurrency: overrides.concurrency ?? config.crawl.concurrency,
    failureLog: overrides.withFailureLog === false ? undefined : failureLog,
    maxAgeMs: config.crawl.maxAgeMs,
    onLog,
    onError: logError,
  });

  return { config, engine, store, failureLog, timings };
}

/**
 * Open the cache for a read-only command without creating a database
 */
export function createReadRuntime(
  ctx: CommandContext,
  deps: CommandDeps,
  hierarchy?: HierarchyConfig
): { config: ResolvedConfig; store: IssueStore; tree: TreeCrawler } {
  const config = loadConfig(ctx.dataDir, deps.env);
  const onLog = log(ctx.jsonOutput);
  const { store } = openIssueStore({ ...config.storage, create: false, onLog, onError: logError });
  const tree = new TreeCrawler({
    store,
    hierarchy: hierarchy ?? config.hierarchy,
    failureLog: new FailureLog(config.failureLog),
    onLog,
  });
  return { config, store, tree };
}
