/**
 * Cache-only hierarchy tree builder
 */

import type { HierarchyConfig, Issue } from "@treecrawl/types";
import { ValidationError } from "./errors.js";
import type { FailureLog } from "./failure-log.js";
import { IssueGraph } from "./graph.js";
import type { IssueStore, LogOptions } from "./types.js";

export const EXCLUDED_RESOLUTIONS: readonly string[] = ["Rejected", "Withdrawn"];

export interface TreeCrawlerOptions extends LogOptions {
  store: IssueStore;
  hierarchy: HierarchyConfig;
  /** Children missing from the cache are recorded here */
  failureLog?: FailureLog;
  excludedResolutions?: readonly string[];
}

export class TreeCrawler {
  private readonly store: IssueStore;
  private readonly hierarchy: HierarchyConfig;
  private readonly failureLog?: FailureLog;
  private readonly excluded: readonly string[];
  private readonly onLog: (message: string) => void;

  constructor(options: TreeCrawlerOptions) {
    this.store = options.store;
    this.hierarchy = options.hierarchy;
    this.failureLog = options.failureLog;
    this.excluded = options.excludedResolutions ?? EXCLUDED_RESOLUTIONS;
    this.onLog = options.onLog ?? console.log;
  }

  private isExcluded(issue: Issue): boolean {
    return issue.resolution !== null && this.excluded.includes(issue.resolution);
  }

  /**
   * Build the graph reachable from `rootKey` through the relation kinds
   * allowed for each issue type. Reads the cache only.
   *
   * @throws ValidationError when the root is not cached, not a configured
   *   hierarchy root, or excluded by its resolution
   */
  buildIssueTree(rootKey: string, includeRejected = false): IssueGraph {
    const root = this.store.get(rootKey)?.issue;
    if (!root) {
      throw new ValidationError(`No cached data for root issue ${rootKey}`, rootKey);
    }
    if (!Object.hasOwn(this.hierarchy, root.type)) {
      throw new ValidationError(
        `Root issue ${rootKey} is of type "${root.type}", which is not a hierarchy root (expected one of: ${Object.keys(this.hierarchy).join(", ")})`,
        rootKey
      );
    }
    if (!includeRejected && this.isExcluded(root)) {
      throw new ValidationError(
        `Root issue ${rootKey} has resolution "${root.resolution}" and is excluded`,
        rootKey
      );
    }

    const graph = new IssueGraph(rootKey);
    graph.addNode(root);
    const visited = new Set<string>();
    const missing: string[] = [];

    const addChildren = (parent: Issue): void => {
      if (visited.has(parent.key)) {
        return;
      }
      visited.add(parent.key);

      const allowed = Object.hasOwn(this.hierarchy, parent.type)
        ? this.hierarchy[parent.type]
        : [];
      for (const link of parent.links) {
        if (!allowed.includes(link.relation)) {
          continue;
        }

        const child = graph.getNode(link.key) ?? this.store.get(link.key)?.issue;
        if (!child) {
          this.onLog(`[tree] Skipping child ${link.key}: not in the cache`);
          missing.push(link.key);
          continue;
        }
        if (!includeRejected && this.isExcluded(child)) {
          this.onLog(`[tree] Skipping child ${link.key}: resolution "${child.resolution}"`);
          continue;
        }

        graph.addNode(child);
        graph.addEdge(parent.key, child.key, link.relation);
        addChildren(child);
      }
    };

    addChildren(root);

    if (missing.length > 0 && this.failureLog) {
      const added = this.failureLog.append(missing);
      if (added.length > 0) {
        this.onLog(`[tree] Recorded ${added.length} missing keys in ${this.failureLog.filePath}`);
      }
    }
    if (graph.nodeCount === 1 && root.links.length === 0) {
      this.onLog(`[tree] Root issue ${rootKey} has no links`);
    }
    this.onLog(`[tree] Built tree for ${rootKey}: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);

    return graph;
  }
}
