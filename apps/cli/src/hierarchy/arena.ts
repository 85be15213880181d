/**
 * Arena of hierarchy nodes addressed by key.
 * Edges are flagged `owned` (child created for its parent, deleted with it)
 * or `reference` (linked only, survives the deletion of its parents).
 * A node has at most one owning parent and the graph stays acyclic.
 */

import type { EdgeKind } from '@sqconf/types';
import { HierarchyCycleError, ObjectNotFoundError } from '../platform/errors';

export interface ArenaEdge {
  parent: string;
  child: string;
  kind: EdgeKind;
}

export class HierarchyArena<T> {
  private readonly nodes = new Map<string, T>();
  private readonly owners = new Map<string, string>();
  private readonly edges = new Map<string, Map<string, EdgeKind>>();

  add(key: string, value: T): void {
    this.nodes.set(key, value);
  }

  has(key: string): boolean {
    return this.nodes.has(key);
  }

  get(key: string): T | undefined {
    return this.nodes.get(key);
  }

  keys(): string[] {
    return [...this.nodes.keys()];
  }

  private require(key: string): void {
    if (!this.nodes.has(key)) {
      throw new ObjectNotFoundError(key, `No hierarchy node '${key}'`);
    }
  }

  /**
   * Link `child` under `parent`.
   * @throws HierarchyCycleError when `parent` is `child` or one of its descendants
   */
  link(parent: string, child: string, kind: EdgeKind = 'owned'): void {
    this.require(parent);
    this.require(child);
    const path = this.pathBetween(child, parent);
    if (path) {
      throw new HierarchyCycleError([parent, ...path]);
    }
    if (kind === 'owned') {
      const previous = this.owners.get(child);
      if (previous !== undefined && previous !== parent) {
        this.edges.get(previous)?.delete(child);
      }
      this.owners.set(child, parent);
    }
    let children = this.edges.get(parent);
    if (!children) {
      children = new Map();
      this.edges.set(parent, children);
    }
    children.set(child, kind);
  }

  /**
   * Keys from `from` down to `to` following child edges, if `to` is reachable
   */
  private pathBetween(from: string, to: string): string[] | undefined {
    if (from === to) return [from];
    for (const child of this.edges.get(from)?.keys() ?? []) {
      const rest = this.pathBetween(child, to);
      if (rest) return [from, ...rest];
    }
    return undefined;
  }

  /** Owning parent of a node */
  parentOf(key: string): string | undefined {
    return this.owners.get(key);
  }

  childrenOf(key: string): ArenaEdge[] {
    return [...(this.edges.get(key) ?? new Map<string, EdgeKind>())].map(([child, kind]) => ({
      parent: key,
      child,
      kind,
    }));
  }

  /** Nodes without an owning parent */
  roots(): string[] {
    return this.keys().filter((key) => !this.owners.has(key));
  }

  /**
   * Depth-first walk from `key` through owned edges, parents before children
   */
  ownedSubtree(key: string): string[] {
    const keys = [key];
    for (const edge of this.childrenOf(key)) {
      if (edge.kind === 'owned') keys.push(...this.ownedSubtree(edge.child));
    }
    return keys;
  }

  /**
   * Delete a node with its owned subtree. Referenced nodes are only unlinked.
   * @returns the deleted keys
   */
  remove(key: string): string[] {
    if (!this.nodes.has(key)) return [];
    const removed = this.ownedSubtree(key);
    const owner = this.owners.get(key);
    if (owner !== undefined) this.edges.get(owner)?.delete(key);
    for (const k of removed) {
      this.nodes.delete(k);
      this.owners.delete(k);
      this.edges.delete(k);
    }
    // Drop reference edges still pointing at deleted nodes
    for (const children of this.edges.values()) {
      for (const k of removed) children.delete(k);
    }
    return removed;
  }
}
