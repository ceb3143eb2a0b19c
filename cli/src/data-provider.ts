/**
 * Project data hub for downstream analyses
 *
 * Builds the cache-only tree for a root and flattens it into a
 * chronological activity list and a per-issue details map.
 */

import type { FieldChange, Issue } from "@treecrawl/types";
import { isValidationError } from "./errors.js";
import type { IssueGraph } from "./graph.js";
import type { TreeCrawler } from "./tree.js";
import type { LogOptions } from "./types.js";

/**
 * Field change tagged with the issue it belongs to
 */
export interface IssueActivity extends FieldChange {
  issue_key: string;
}

export interface IssueDetails {
  type: string;
  title: string;
  description: string;
  acceptance_criteria: string[];
  status: string;
  resolution: string | null;
  points: number;
  target_start: string | null;
  target_end: string | null;
  fix_versions: string[];
  created: string | null;
  resolved: string | null;
  closed_date: string | null;
}

export interface ProjectData {
  rootKey: string;
  tree: IssueGraph;
  /** Every activity in the tree, oldest first */
  activities: IssueActivity[];
  details: Map<string, IssueDetails>;
}

export interface IssueDataProviderOptions extends LogOptions {
  tree: TreeCrawler;
}

function toDetails(issue: Issue): IssueDetails {
  return {
    type: issue.type,
    title: issue.title,
    description: issue.description,
    acceptance_criteria: issue.acceptance_criteria,
    status: issue.status,
    resolution: issue.resolution,
    points: Math.trunc(issue.points),
    target_start: issue.target_start,
    target_end: issue.target_end,
    fix_versions: issue.fix_versions,
    created: issue.created_at,
    resolved: issue.resolved_at,
    closed_date: issue.closed_at,
  };
}

export class IssueDataProvider {
  private readonly tree: TreeCrawler;
  private readonly onLog: (message: string) => void;

  constructor(options: IssueDataProviderOptions) {
    this.tree = options.tree;
    this.onLog = options.onLog ?? console.log;
  }

  /**
   * Load the data for one root, rejected and withdrawn issues excluded
   *
   * @returns null when no valid tree can be built for the root
   */
  load(rootKey: string): ProjectData | null {
    let tree: IssueGraph;
    try {
      tree = this.tree.buildIssueTree(rootKey, false);
    } catch (error) {
      if (!isValidationError(error)) {
        throw error;
      }
      this.onLog(`[data] No valid tree for ${rootKey}: ${error.message}`);
      return null;
    }

    const activities: IssueActivity[] = [];
    const details = new Map<string, IssueDetails>();

    for (const key of tree.keys()) {
      const issue = tree.getNode(key);
      if (!issue) {
        continue;
      }
      for (const activity of issue.activities) {
        activities.push({ ...activity, issue_key: key });
      }
      details.set(key, toDetails(issue));
    }

    // Stable sort keeps per-issue order for equal timestamps
    activities.sort((a, b) =>
      a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0
    );

    this.onLog(`[data] Loaded ${rootKey}: ${details.size} issues, ${activities.length} activities`);
    return { rootKey, tree, activities, details };
  }
}
