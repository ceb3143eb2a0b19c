/**
 * Directed issue graph, rebuilt per request and never persisted
 */

import type { Issue, RelationKind } from "@treecrawl/types";

export interface IssueEdge {
  from: string;
  to: string;
  relation: RelationKind;
}

export interface IssueGraphJSON {
  root: string;
  nodes: Issue[];
  edges: IssueEdge[];
}

export class IssueGraph {
  private readonly nodes = new Map<string, Issue>();
  private readonly outgoing = new Map<string, IssueEdge[]>();
  private readonly edgeKeys = new Set<string>();

  constructor(readonly root: string) {}

  addNode(issue: Issue): void {
    this.nodes.set(issue.key, issue);
  }

  /**
   * Add a directed edge. Duplicate (from, to) pairs are ignored.
   *
   * @returns Whether the edge was new
   */
  addEdge(from: string, to: string, relation: RelationKind): boolean {
    const id = `${from}\u0000${to}`;
    if (this.edgeKeys.has(id)) {
      return false;
    }
    this.edgeKeys.add(id);

    const edges = this.outgoing.get(from) ?? [];
    edges.push({ from, to, relation });
    this.outgoing.set(from, edges);
    return true;
  }

  hasNode(key: string): boolean {
    return this.nodes.has(key);
  }

  getNode(key: string): Issue | undefined {
    return this.nodes.get(key);
  }

  /**
   * Node keys in insertion order
   */
  keys(): string[] {
    return [...this.nodes.keys()];
  }

  edges(): IssueEdge[] {
    return [...this.outgoing.values()].flat();
  }

  children(key: string): IssueEdge[] {
    return [...(this.outgoing.get(key) ?? [])];
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edgeKeys.size;
  }

  toJSON(): IssueGraphJSON {
    return { root: this.root, nodes: [...this.nodes.values()], edges: this.edges() };
  }
}
