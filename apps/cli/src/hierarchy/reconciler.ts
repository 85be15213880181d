/**
 * Hierarchy reconciliation
 * Folds flat parent/child collections into trees and expresses a child's
 * content as a diff against its parent, and back.
 */

import type { RuleActivation, RuleSet } from '@sqconf/types';
import { createLogger, Logger } from '../logger';
import { HierarchyCycleError } from '../platform/errors';
import { HierarchyArena } from './arena';

export interface TreeNode<T> {
  key: string;
  value: T;
  children: TreeNode<T>[];
}

export interface RuleDiff {
  added: RuleSet;
  modified: RuleSet;
  removed: string[];
}

export interface MemberDiff {
  added: string[];
  removed: string[];
}

const defaultLogger = createLogger({ component: 'hierarchy' });

/**
 * Nest a flat collection under parents.
 * An element whose parent is unknown, or whose parent link would close a
 * cycle, is logged and kept as a root.
 */
export function hierarchize<T>(
  flat: readonly T[],
  keyOf: (item: T) => string,
  parentOf: (item: T) => string | undefined,
  log: Logger = defaultLogger
): TreeNode<T>[] {
  const arena = new HierarchyArena<T>();
  for (const item of flat) {
    const key = keyOf(item);
    if (arena.has(key)) {
      log.warn(`Duplicate hierarchy key '${key}', keeping the first occurrence`);
      continue;
    }
    arena.add(key, item);
  }

  for (const key of arena.keys()) {
    const item = arena.get(key);
    const parent = item === undefined ? undefined : parentOf(item);
    if (parent === undefined) continue;
    if (!arena.has(parent)) {
      log.error(`Parent '${parent}' of '${key}' not found, treating it as a root`);
      continue;
    }
    try {
      arena.link(parent, key);
    } catch (error) {
      if (!(error instanceof HierarchyCycleError)) throw error;
      log.error(`${error.message}, treating '${key}' as a root`);
    }
  }

  const build = (key: string): TreeNode<T>[] => {
    const value = arena.get(key);
    if (value === undefined) return [];
    return [{ key, value, children: arena.childrenOf(key).flatMap((edge) => build(edge.child)) }];
  };
  return arena.roots().flatMap(build);
}

/**
 * Inverse of hierarchize: parents first, each element with its parent
 * field restored by `withParent`
 */
export function flatten<T>(
  forest: readonly TreeNode<T>[],
  withParent: (value: T, parentKey: string | undefined) => T
): T[] {
  const flat: T[] = [];
  const visit = (node: TreeNode<T>, parentKey: string | undefined): void => {
    flat.push(withParent(node.value, parentKey));
    for (const child of node.children) visit(child, node.key);
  };
  for (const root of forest) visit(root, undefined);
  return flat;
}

function sameParams(a?: Record<string, string>, b?: Record<string, string>): boolean {
  const left = Object.entries(a ?? {});
  const right = b ?? {};
  return left.length === Object.keys(right).length && left.every(([k, v]) => right[k] === v);
}

export function sameActivation(a: RuleActivation, b: RuleActivation): boolean {
  return a.severity === b.severity && sameParams(a.params, b.params);
}

/**
 * What `child` adds, changes and drops relative to `parent`
 */
export function diffRules(child: RuleSet, parent: RuleSet): RuleDiff {
  const diff: RuleDiff = { added: {}, modified: {}, removed: [] };
  for (const [rule, activation] of Object.entries(child)) {
    const inherited = parent[rule];
    if (!inherited) {
      diff.added[rule] = activation;
    } else if (!sameActivation(activation, inherited)) {
      diff.modified[rule] = activation;
    }
  }
  for (const rule of Object.keys(parent)) {
    if (!(rule in child)) diff.removed.push(rule);
  }
  diff.removed.sort();
  return diff;
}

/**
 * Rebuild a child rule set from its parent and its diff
 */
export function applyRuleDiff(parent: RuleSet, diff: Partial<RuleDiff>): RuleSet {
  const rules: RuleSet = { ...parent };
  for (const rule of diff.removed ?? []) delete rules[rule];
  Object.assign(rules, diff.added ?? {}, diff.modified ?? {});
  return rules;
}

export function isEmptyRuleDiff(diff: RuleDiff): boolean {
  return (
    Object.keys(diff.added).length === 0 &&
    Object.keys(diff.modified).length === 0 &&
    diff.removed.length === 0
  );
}

/**
 * Members `child` has that `parent` lacks, and the reverse
 */
export function diffMembers(child: Iterable<string>, parent: Iterable<string>): MemberDiff {
  const childSet = new Set(child);
  const parentSet = new Set(parent);
  return {
    added: [...childSet].filter((m) => !parentSet.has(m)).sort(),
    removed: [...parentSet].filter((m) => !childSet.has(m)).sort(),
  };
}

export function applyMemberDiff(parent: Iterable<string>, diff: MemberDiff): string[] {
  const members = new Set(parent);
  for (const m of diff.removed) members.delete(m);
  for (const m of diff.added) members.add(m);
  return [...members].sort();
}
