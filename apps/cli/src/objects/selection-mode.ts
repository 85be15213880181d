/**
 * Project selection of a portfolio
 * Exactly one mode is active at a time. Every transition is a remote call
 * and the local state is replaced only once that call succeeded; switching
 * modes discards the previous mode's data.
 */

import type { PortfolioShowData, SelectionExport, SelectionMode, SelectionModeName } from '@sqconf/types';
import { diffMembers } from '../hierarchy/reconciler';
import { Platform } from '../platform/platform';

const MODE_NAMES: readonly SelectionModeName[] = ['MANUAL', 'REGEXP', 'TAGS', 'REST', 'NONE'];

export function isSelectionModeName(value: unknown): value is SelectionModeName {
  return MODE_NAMES.some((mode) => mode === value);
}

/**
 * Decode the selection of a views/show payload
 */
export function selectionFromShow(data: PortfolioShowData): SelectionMode {
  const branch = data.branch || undefined;
  switch (data.selectionMode) {
    case 'MANUAL':
      return {
        mode: 'MANUAL',
        projects: new Map(
          (data.selectedProjects ?? []).map((p) => [p.projectKey, new Set(p.selectedBranches ?? [])])
        ),
      };
    case 'REGEXP':
      return { mode: 'REGEXP', regexp: data.regexp ?? '', ...(branch ? { branch } : {}) };
    case 'TAGS':
      return { mode: 'TAGS', tags: new Set(data.tags ?? []), ...(branch ? { branch } : {}) };
    case 'REST':
      return { mode: 'REST', ...(branch ? { branch } : {}) };
    default:
      return { mode: 'NONE' };
  }
}

export function selectionToExport(selection: SelectionMode): SelectionExport {
  switch (selection.mode) {
    case 'MANUAL':
      return {
        mode: 'MANUAL',
        projects: Object.fromEntries(
          [...selection.projects].sort(([a], [b]) => a.localeCompare(b)).map(([key, branches]) => [key, [...branches].sort()])
        ),
      };
    case 'REGEXP':
      return { mode: 'REGEXP', regexp: selection.regexp, ...(selection.branch ? { branch: selection.branch } : {}) };
    case 'TAGS':
      return { mode: 'TAGS', tags: [...selection.tags].sort(), ...(selection.branch ? { branch: selection.branch } : {}) };
    case 'REST':
      return { mode: 'REST', ...(selection.branch ? { branch: selection.branch } : {}) };
    case 'NONE':
      return { mode: 'NONE' };
  }
}

export function selectionFromExport(data: SelectionExport): SelectionMode {
  const branch = data.branch;
  switch (data.mode) {
    case 'MANUAL':
      return {
        mode: 'MANUAL',
        projects: new Map(Object.entries(data.projects ?? {}).map(([key, branches]) => [key, new Set(branches)])),
      };
    case 'REGEXP':
      return { mode: 'REGEXP', regexp: data.regexp ?? '', ...(branch ? { branch } : {}) };
    case 'TAGS':
      return { mode: 'TAGS', tags: new Set(data.tags ?? []), ...(branch ? { branch } : {}) };
    case 'REST':
      return { mode: 'REST', ...(branch ? { branch } : {}) };
    case 'NONE':
      return { mode: 'NONE' };
  }
}

export class SelectionModeEngine {
  private state?: SelectionMode;

  constructor(
    private readonly platform: Platform,
    readonly portfolioKey: string,
    initial?: SelectionMode
  ) {
    this.state = initial;
  }

  /**
   * Current mode, fetched from the server only if never loaded
   */
  async currentMode(signal?: AbortSignal): Promise<SelectionMode> {
    if (!this.state) {
      const data = await this.platform.getJson<PortfolioShowData>('views/show', { key: this.portfolioKey }, signal);
      this.state = selectionFromShow(data);
    }
    return this.state;
  }

  /** Local state as last confirmed, without any remote call */
  peek(): SelectionMode | undefined {
    return this.state;
  }

  async setManual(signal?: AbortSignal): Promise<void> {
    await this.platform.post('views/set_manual_mode', { portfolio: this.portfolioKey }, signal);
    this.state = { mode: 'MANUAL', projects: new Map() };
  }

  async setRegexp(regexp: string, branch?: string, signal?: AbortSignal): Promise<void> {
    await this.platform.post('views/set_regexp_mode', { portfolio: this.portfolioKey, regexp, branch }, signal);
    this.state = { mode: 'REGEXP', regexp, ...(branch ? { branch } : {}) };
  }

  async setTags(tags: Iterable<string>, branch?: string, signal?: AbortSignal): Promise<void> {
    const tagSet = new Set(tags);
    await this.platform.post(
      'views/set_tags_mode',
      { portfolio: this.portfolioKey, tags: [...tagSet].join(','), branch },
      signal
    );
    this.state = { mode: 'TAGS', tags: tagSet, ...(branch ? { branch } : {}) };
  }

  async setRemaining(branch?: string, signal?: AbortSignal): Promise<void> {
    await this.platform.post('views/set_remaining_projects_mode', { portfolio: this.portfolioKey, branch }, signal);
    this.state = { mode: 'REST', ...(branch ? { branch } : {}) };
  }

  async setNone(signal?: AbortSignal): Promise<void> {
    await this.platform.post('views/set_none_mode', { portfolio: this.portfolioKey }, signal);
    this.state = { mode: 'NONE' };
  }

  private async manualProjects(signal?: AbortSignal): Promise<Map<string, Set<string>>> {
    const current = await this.currentMode(signal);
    if (current.mode === 'MANUAL') return current.projects;
    // Manual is the only mode with incremental membership
    await this.setManual(signal);
    const state = this.state;
    if (state?.mode !== 'MANUAL') {
      throw new Error(`Portfolio '${this.portfolioKey}' did not switch to manual selection`);
    }
    return state.projects;
  }

  /**
   * Add a project, and optionally one of its branches, switching to manual
   * selection first when another mode is active
   * @returns whether the selection changed
   */
  async addMember(projectKey: string, branch?: string, signal?: AbortSignal): Promise<boolean> {
    const projects = await this.manualProjects(signal);
    let changed = false;
    let branches = projects.get(projectKey);
    if (!branches) {
      await this.platform.post('views/add_project', { key: this.portfolioKey, project: projectKey }, signal);
      branches = new Set();
      projects.set(projectKey, branches);
      changed = true;
    }
    if (branch && !branches.has(branch)) {
      await this.platform.post(
        'views/add_project_branch',
        { key: this.portfolioKey, project: projectKey, branch },
        signal
      );
      branches.add(branch);
      changed = true;
    }
    return changed;
  }

  async removeMember(projectKey: string, signal?: AbortSignal): Promise<boolean> {
    const projects = await this.manualProjects(signal);
    if (!projects.has(projectKey)) return false;
    await this.platform.post('views/remove_project', { key: this.portfolioKey, project: projectKey }, signal);
    projects.delete(projectKey);
    return true;
  }

  async removeBranch(projectKey: string, branch: string, signal?: AbortSignal): Promise<boolean> {
    const branches = (await this.manualProjects(signal)).get(projectKey);
    if (!branches?.has(branch)) return false;
    await this.platform.post(
      'views/remove_project_branch',
      { key: this.portfolioKey, project: projectKey, branch },
      signal
    );
    branches.delete(branch);
    return true;
  }

  /**
   * Move to `target`, issuing only the calls needed from the current state
   * @returns whether any call was issued
   */
  async apply(target: SelectionMode, signal?: AbortSignal): Promise<boolean> {
    const current = await this.currentMode(signal);
    switch (target.mode) {
      case 'MANUAL': {
        let changed = current.mode !== 'MANUAL';
        const projects = await this.manualProjects(signal);
        for (const project of diffMembers(target.projects.keys(), projects.keys()).removed) {
          changed = (await this.removeMember(project, signal)) || changed;
        }
        for (const [project, branches] of target.projects) {
          if (branches.size === 0) {
            changed = (await this.addMember(project, undefined, signal)) || changed;
          }
          for (const branch of branches) {
            changed = (await this.addMember(project, branch, signal)) || changed;
          }
          for (const branch of diffMembers(branches, projects.get(project) ?? []).removed) {
            changed = (await this.removeBranch(project, branch, signal)) || changed;
          }
        }
        return changed;
      }
      case 'REGEXP':
        if (current.mode !== 'REGEXP' || current.regexp !== target.regexp || current.branch !== target.branch) {
          await this.setRegexp(target.regexp, target.branch, signal);
          return true;
        }
        return false;
      case 'TAGS': {
        const sameTags =
          current.mode === 'TAGS' &&
          current.tags.size === target.tags.size &&
          [...target.tags].every((tag) => current.tags.has(tag)) &&
          current.branch === target.branch;
        if (!sameTags) await this.setTags(target.tags, target.branch, signal);
        return !sameTags;
      }
      case 'REST':
        if (current.mode !== 'REST' || current.branch !== target.branch) {
          await this.setRemaining(target.branch, signal);
          return true;
        }
        return false;
      case 'NONE':
        if (current.mode !== 'NONE') {
          await this.setNone(signal);
          return true;
        }
        return false;
    }
  }
}
