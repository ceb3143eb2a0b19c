/**
 * Cache-only command handlers: tree, show, stats
 */

import chalk from "chalk";
import Table from "cli-table3";
import { HIERARCHY_PRESETS, type HierarchyConfig } from "@treecrawl/types";
import { IssueDataProvider, type ProjectData } from "../data-provider.js";
import { ValidationError } from "../errors.js";
import type { IssueGraph } from "../graph.js";
import type { StoredIssue } from "../types.js";
import { createReadRuntime, fail, type CommandContext, type CommandDeps } from "./context.js";

export interface TreeOptions {
  includeRejected?: boolean;
  preset?: string;
}

function resolvePreset(preset: string | undefined): HierarchyConfig | undefined {
  if (preset === undefined) {
    return undefined;
  }
  if (preset !== "management" && preset !== "full") {
    throw new ValidationError(`--preset must be "management" or "full", got "${preset}"`);
  }
  return HIERARCHY_PRESETS[preset];
}

/**
 * Indented lines for a tree, depth first from the root
 */
export function renderTree(graph: IssueGraph): string[] {
  const lines: string[] = [];
  const printed = new Set<string>();

  const visit = (key: string, depth: number, relation: string | null): void => {
    const issue = graph.getNode(key);
    const indent = "  ".repeat(depth);
    const label = relation ? chalk.yellow(`${relation} `) : "";
    const title = issue ? `${issue.title} ${chalk.gray(`[${issue.type}, ${issue.status}]`)}` : "";
    if (printed.has(key)) {
      lines.push(`${indent}${label}${chalk.cyan(key)} ${chalk.gray("(see above)")}`);
      return;
    }
    printed.add(key);
    lines.push(`${indent}${label}${chalk.cyan(key)} ${title}`.trimEnd());
    for (const edge of graph.children(key)) {
      visit(edge.to, depth + 1, edge.relation);
    }
  };

  visit(graph.root, 0, null);
  return lines;
}

/**
 * Handle: treecrawl tree <key> [--include-rejected] [--preset]
 */
export async function handleTree(
  ctx: CommandContext,
  key: string,
  options: TreeOptions,
  deps: CommandDeps = {}
): Promise<void> {
  let graph: IssueGraph;
  try {
    const { tree, store } = createReadRuntime(ctx, deps, resolvePreset(options.preset));
    try {
      graph = tree.buildIssueTree(key, options.includeRejected ?? false);
    } finally {
      store.close();
    }
  } catch (error) {
    fail(ctx, error);
  }

  if (ctx.jsonOutput) {
    console.log(JSON.stringify(graph.toJSON(), null, 2));
    return;
  }

  for (const line of renderTree(graph)) {
    console.log(line);
  }
  console.log(chalk.gray(`\n${graph.nodeCount} issues, ${graph.edgeCount} links`));
}

/**
 * Handle: treecrawl show <key>
 */
export async function handleShow(
  ctx: CommandContext,
  key: string,
  deps: CommandDeps = {}
): Promise<void> {
  let stored: StoredIssue | null;
  try {
    const { store } = createReadRuntime(ctx, deps);
    try {
      stored = store.get(key);
    } finally {
      store.close();
    }
  } catch (error) {
    fail(ctx, error);
  }

  if (!stored) {
    console.error(chalk.red(`✗ Issue not found: ${key}`));
    process.exit(1);
  }

  const { issue, modifiedAt } = stored;
  if (ctx.jsonOutput) {
    console.log(JSON.stringify({ ...issue, cached_at: modifiedAt.toISOString() }, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold.cyan(issue.key), chalk.bold(issue.title));
  console.log(chalk.gray("─".repeat(60)));
  console.log(chalk.gray("Type:"), issue.type);
  console.log(chalk.gray("Status:"), issue.status);
  if (issue.resolution) {
    console.log(chalk.gray("Resolution:"), issue.resolution);
  }
  console.log(chalk.gray("Points:"), issue.points);
  if (issue.assignee) {
    console.log(chalk.gray("Assignee:"), issue.assignee);
  }
  if (issue.team) {
    console.log(chalk.gray("Team:"), issue.team);
  }
  if (issue.parent_key) {
    console.log(chalk.gray("Parent:"), issue.parent_key);
  }
  if (issue.fix_versions.length > 0) {
    console.log(chalk.gray("Fix versions:"), issue.fix_versions.join(", "));
  }
  console.log(chalk.gray("Cached:"), modifiedAt.toISOString());

  if (issue.description) {
    console.log();
    console.log(chalk.bold("Description:"));
    console.log(issue.description);
  }

  if (issue.acceptance_criteria.length > 0) {
    console.log();
    console.log(chalk.bold("Acceptance criteria:"));
    for (const criterion of issue.acceptance_criteria) {
      console.log(`  - ${criterion}`);
    }
  }

  if (issue.links.length > 0) {
    console.log();
    console.log(chalk.bold("Links:"));
    for (const link of issue.links) {
      console.log(`  ${chalk.yellow(link.relation)} → ${chalk.cyan(link.key)} ${link.title}`.trimEnd());
    }
  }
  console.log();
}

export interface TreeStats {
  rootKey: string;
  issues: number;
  activities: number;
  points: number;
  byStatus: Record<string, number>;
  byType: Record<string, number>;
}

export function summarizeProject(data: ProjectData): TreeStats {
  const byStatus: Record<string, number> = {};
  const byType: Record<string, number> = {};
  let points = 0;
  for (const details of data.details.values()) {
    byStatus[details.status] = (byStatus[details.status] ?? 0) + 1;
    byType[details.type] = (byType[details.type] ?? 0) + 1;
    points += details.points;
  }
  return {
    rootKey: data.rootKey,
    issues: data.details.size,
    activities: data.activities.length,
    points,
    byStatus,
    byType,
  };
}

/**
 * Handle: treecrawl stats <key>
 */
export async function handleStats(
  ctx: CommandContext,
  key: string,
  deps: CommandDeps = {}
): Promise<void> {
  let data: ProjectData | null;
  try {
    const { tree, store } = createReadRuntime(ctx, deps);
    try {
      data = new IssueDataProvider({
        tree,
        onLog: ctx.jsonOutput ? () => {} : (message) => console.log(chalk.gray(message)),
      }).load(key);
    } finally {
      store.close();
    }
  } catch (error) {
    fail(ctx, error);
  }

  if (!data) {
    console.error(chalk.red(`✗ No valid tree for ${key}`));
    process.exit(1);
  }

  const stats = summarizeProject(data);
  if (ctx.jsonOutput) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`Statistics for ${stats.rootKey}`));
  console.log(chalk.gray("Issues:"), stats.issues);
  console.log(chalk.gray("Activities:"), stats.activities);
  console.log(chalk.gray("Story points:"), stats.points);

  const table = new Table({ head: [chalk.cyan("Status"), chalk.cyan("Issues")] });
  for (const [status, count] of Object.entries(stats.byStatus).sort((a, b) => b[1] - a[1])) {
    table.push([status, String(count)]);
  }
  console.log(table.toString());
}
