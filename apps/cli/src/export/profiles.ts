/**
 * Quality profile export layout
 * Profiles are nested under their parent per language; a root profile
 * carries its full rule set, a child only its diff against the parent.
 */

import type {
  QualityProfileExport,
  QualityProfileNodeExport,
  QualityProfilesExport,
  RuleSet,
} from '@sqconf/types';
import { applyRuleDiff, diffRules, flatten, hierarchize, TreeNode } from '../hierarchy/reconciler';
import { Logger } from '../logger';

function toNode(node: TreeNode<QualityProfileExport>, parentRules: RuleSet | undefined): QualityProfileNodeExport {
  const profile = node.value;
  const data: QualityProfileNodeExport = {};
  if (profile.isDefault) data.isDefault = true;
  if (profile.isBuiltIn) data.isBuiltIn = true;
  if (profile.exportStatus !== undefined) data.exportStatus = profile.exportStatus;
  if (profile.rules !== undefined) {
    if (parentRules === undefined) {
      data.rules = profile.rules;
    } else {
      const diff = diffRules(profile.rules, parentRules);
      if (Object.keys(diff.added).length > 0) data.addedRules = diff.added;
      if (Object.keys(diff.modified).length > 0) data.modifiedRules = diff.modified;
      if (diff.removed.length > 0) data.removedRules = diff.removed;
    }
  }
  if (node.children.length > 0) {
    // Under a profile whose rules are unknown, children carry their full rule set
    const rules = profile.exportStatus !== undefined ? undefined : profile.rules ?? parentRules;
    data.children = Object.fromEntries(node.children.map((child) => [child.key, toNode(child, rules)]));
  }
  return data;
}

/**
 * Nest flat profiles (of any languages) by language then parent
 */
export function nestQualityProfiles(profiles: readonly QualityProfileExport[], log?: Logger): QualityProfilesExport {
  const byLanguage = new Map<string, QualityProfileExport[]>();
  for (const profile of profiles) {
    const list = byLanguage.get(profile.language) ?? [];
    list.push(profile);
    byLanguage.set(profile.language, list);
  }
  const nested: QualityProfilesExport = {};
  for (const language of [...byLanguage.keys()].sort()) {
    const forest = hierarchize(
      byLanguage.get(language) ?? [],
      (p) => p.name,
      (p) => p.parentName,
      log
    );
    nested[language] = Object.fromEntries(forest.map((root) => [root.key, toNode(root, undefined)]));
  }
  return nested;
}

function hasDiff(node: QualityProfileNodeExport): boolean {
  return node.addedRules !== undefined || node.modifiedRules !== undefined || node.removedRules !== undefined;
}

function toTree(
  language: string,
  name: string,
  node: QualityProfileNodeExport,
  parentRules: RuleSet | undefined
): TreeNode<QualityProfileExport> {
  let rules: RuleSet | undefined;
  if (node.exportStatus !== undefined) {
    rules = undefined;
  } else if (node.rules !== undefined) {
    rules = node.rules;
  } else if (hasDiff(node)) {
    rules = applyRuleDiff(parentRules ?? {}, {
      added: node.addedRules,
      modified: node.modifiedRules,
      removed: node.removedRules,
    });
  } else if (!node.isBuiltIn) {
    rules = parentRules;
  }
  const value: QualityProfileExport = { name, language };
  if (node.isDefault) value.isDefault = true;
  if (node.isBuiltIn) value.isBuiltIn = true;
  if (node.exportStatus !== undefined) value.exportStatus = node.exportStatus;
  if (rules !== undefined) value.rules = rules;
  return {
    key: name,
    value,
    children: Object.entries(node.children ?? {}).map(([child, data]) => toTree(language, child, data, rules)),
  };
}

/**
 * Inverse of nestQualityProfiles: flat profiles, parents first, each with
 * its parent name and its full rule set rebuilt from the diffs
 */
export function unnestQualityProfiles(nested: QualityProfilesExport): QualityProfileExport[] {
  const flat: QualityProfileExport[] = [];
  for (const [language, roots] of Object.entries(nested)) {
    const forest = Object.entries(roots).map(([name, node]) => toTree(language, name, node, undefined));
    flat.push(
      ...flatten(forest, (profile, parentName) =>
        parentName === undefined ? profile : { ...profile, parentName }
      )
    );
  }
  return flat;
}
