/**
 * Configuration import
 * Objects are created when missing then updated to match the document.
 * Quality profiles and portfolios, which reference each other by name or
 * key, are imported in two passes: pass 1 creates every object with its
 * own attributes only, pass 2 applies parents, rules, selections and
 * references once every referent exists.
 */

import type {
  ApplicationExport,
  ConfigExport,
  Edition,
  ExportSection,
  FailedExport,
  GroupExport,
  ImportSummary,
  PortfolioExport,
  ProjectExport,
  QualityGateExport,
  QualityProfileExport,
} from '@sqconf/types';
import { HierarchyArena } from '../hierarchy/arena';
import { createLogger, Logger } from '../logger';
import { HierarchyCycleError, UnsupportedOperationError, errorMessage } from '../platform/errors';
import { APPLICATION_EDITIONS, Platform, PORTFOLIO_EDITIONS } from '../platform/platform';
import { createApplication, getApplication } from '../objects/application';
import { createGroup, getGroup } from '../objects/group';
import { setPermissions } from '../objects/permissions';
import { createPortfolio, getPortfolio, Portfolio } from '../objects/portfolio';
import { createProject, getProject } from '../objects/project';
import { createQualityGate, getQualityGate } from '../objects/quality-gate';
import { createQualityProfile, getQualityProfile, QualityProfile } from '../objects/quality-profile';
import { getOrCreateRemote } from '../objects/remote';
import { selectionFromExport } from '../objects/selection-mode';
import { TaskRunner } from '../runner/task-runner';
import { isFailedExport } from './document';
import { unnestQualityProfiles } from './profiles';

/** Dependencies first: gates before the projects selecting them, projects before portfolios */
export const IMPORT_ORDER: readonly ExportSection[] = [
  'groups',
  'qualityGates',
  'qualityProfiles',
  'projects',
  'portfolios',
  'applications',
];

export interface ImportRunOptions {
  sections: readonly ExportSection[];
  /** Sections named by the user: an unsupported one is fatal, not skipped */
  explicit: boolean;
  keyRegexp?: RegExp;
}

type Entries<E> = Record<string, E | FailedExport> | undefined;

function emptySummary(section: string): ImportSummary {
  return { section, created: 0, updated: 0, failed: 0, skipped: 0 };
}

function selectEntries<E>(
  entries: Entries<E>,
  summary: ImportSummary,
  keyRegexp?: RegExp
): Array<[string, E]> {
  const selected: Array<[string, E]> = [];
  for (const [key, value] of Object.entries(entries ?? {})) {
    if (keyRegexp && !keyRegexp.test(key)) continue;
    if (isFailedExport(value)) {
      summary.skipped++;
      continue;
    }
    selected.push([key, value]);
  }
  return selected;
}

/**
 * Portfolio document as an arena: standard sub-portfolios are owned nodes,
 * portfolios included by reference are reference edges. A reference to a
 * portfolio absent from the document gets a placeholder node, never created.
 */
export function portfolioArena(
  entries: ReadonlyArray<[string, PortfolioExport]>,
  log: Logger
): HierarchyArena<PortfolioExport> {
  const arena = new HierarchyArena<PortfolioExport>();
  const references: Array<[string, string]> = [];

  const visit = (key: string, data: PortfolioExport, parent?: string): void => {
    if (arena.has(key)) {
      if (parent !== undefined && arena.ownedSubtree(key).includes(parent)) {
        log.error(`Portfolio '${key}' cannot be a sub-portfolio of '${parent}'`);
        return;
      }
      log.warn(`Portfolio '${key}' is defined more than once, keeping the last definition`);
      // Sub-portfolios of the earlier definition go with it, referenced ones stay
      arena.remove(key);
    }
    arena.add(key, data);
    if (parent !== undefined) {
      try {
        arena.link(parent, key, 'owned');
      } catch (error) {
        if (!(error instanceof HierarchyCycleError)) throw error;
        log.error(`Portfolio '${key}' cannot be a sub-portfolio of '${parent}'`, { error: error.message });
      }
    }
    for (const [subKey, sub] of Object.entries(data.subPortfolios ?? {})) {
      if (sub.byReference) {
        references.push([key, subKey]);
      } else {
        visit(subKey, sub, key);
      }
    }
  };
  for (const [key, data] of entries) visit(key, data);

  for (const [parent, child] of references) {
    if (!arena.has(child)) {
      arena.add(child, { byReference: true });
    }
    try {
      arena.link(parent, child, 'reference');
    } catch (error) {
      if (!(error instanceof HierarchyCycleError)) throw error;
      log.error(`Reference from portfolio '${parent}' to '${child}' ignored`, { error: error.message });
    }
  }
  return arena;
}

export class ConfigImporter {
  private readonly log: Logger;

  constructor(
    private readonly platform: Platform,
    private readonly runner: TaskRunner,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ component: 'import' });
  }

  async run(doc: ConfigExport, options: ImportRunOptions): Promise<ImportSummary[]> {
    const summaries: ImportSummary[] = [];
    const { keyRegexp } = options;

    if (options.sections.includes('users') && doc.users) {
      const summary = emptySummary('users');
      summary.skipped = Object.keys(doc.users).length;
      this.log.warn('Users cannot be imported, skipping');
      summaries.push(summary);
    }

    for (const section of IMPORT_ORDER.filter((s) => options.sections.includes(s))) {
      switch (section) {
        case 'groups':
          if (doc.groups) summaries.push(await this.importGroups(doc.groups, keyRegexp));
          break;
        case 'qualityGates':
          if (doc.qualityGates) summaries.push(await this.importQualityGates(doc.qualityGates, keyRegexp));
          break;
        case 'qualityProfiles':
          if (doc.qualityProfiles) {
            summaries.push(await this.importQualityProfiles(unnestQualityProfiles(doc.qualityProfiles), keyRegexp));
          }
          break;
        case 'projects':
          if (doc.projects) summaries.push(await this.importProjects(doc.projects, keyRegexp));
          break;
        case 'portfolios':
          if (doc.portfolios && (await this.available('Portfolios', PORTFOLIO_EDITIONS, options.explicit))) {
            summaries.push(await this.importPortfolios(doc.portfolios, keyRegexp));
          }
          break;
        case 'applications':
          if (doc.applications && (await this.available('Applications', APPLICATION_EDITIONS, options.explicit))) {
            summaries.push(await this.importApplications(doc.applications, keyRegexp));
          }
          break;
        case 'users':
          break;
      }
    }
    return summaries;
  }

  private async available(feature: string, editions: readonly Edition[], explicit: boolean): Promise<boolean> {
    try {
      await this.platform.requireEdition(feature, editions);
      return true;
    } catch (error) {
      if (error instanceof UnsupportedOperationError && !explicit) {
        this.log.warn(`${error.message}, skipping`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Run one create-or-update operation per entry and count the outcomes
   */
  private async importEach<E>(
    section: string,
    entries: Entries<E>,
    keyRegexp: RegExp | undefined,
    operation: (key: string, data: E, signal: AbortSignal) => Promise<boolean>
  ): Promise<ImportSummary> {
    const summary = emptySummary(section);
    const selected = selectEntries(entries, summary, keyRegexp);
    this.log.info(`--- Importing ${selected.length} ${section} ---`);
    const result = await this.runner
      .withLabel(`Importing ${section}`)
      .run(selected, ([key, data], signal) => operation(key, data, signal), ([key]) => `${section} '${key}'`);
    for (const { outcome } of result.results) {
      if (outcome.status === 'failure') {
        summary.failed++;
      } else if (outcome.value) {
        summary.created++;
      } else {
        summary.updated++;
      }
    }
    return summary;
  }

  private importGroups(entries: Entries<GroupExport>, keyRegexp?: RegExp): Promise<ImportSummary> {
    const platform = this.platform;
    return this.importEach('groups', entries, keyRegexp, async (name, data, signal) => {
      const { object: group, created } = await getOrCreateRemote(
        () => getGroup(platform, name, signal),
        () => createGroup(platform, name, data.description, signal)
      );
      if (!created) await group.setDescription(data.description, signal);
      return created;
    });
  }

  private importQualityGates(entries: Entries<QualityGateExport>, keyRegexp?: RegExp): Promise<ImportSummary> {
    const platform = this.platform;
    return this.importEach('qualityGates', entries, keyRegexp, async (name, data, signal) => {
      // Built-in gates exist on every server and cannot be created
      const { object: gate, created } = data.isBuiltIn
        ? { object: await getQualityGate(platform, name, signal), created: false }
        : await getOrCreateRemote(
            () => getQualityGate(platform, name, signal),
            () => createQualityGate(platform, name, signal)
          );
      if (!data.isBuiltIn) await gate.setConditions(data.conditions ?? [], signal);
      if (data.isDefault && !gate.isDefault) await gate.setAsDefault(signal);
      return created;
    });
  }

  private importProjects(entries: Entries<ProjectExport>, keyRegexp?: RegExp): Promise<ImportSummary> {
    const platform = this.platform;
    return this.importEach('projects', entries, keyRegexp, async (key, data, signal) => {
      const { object: project, created } = await getOrCreateRemote(
        () => getProject(platform, key, signal),
        () => createProject(platform, key, data.name ?? key, data.visibility, signal)
      );
      if (data.visibility) await project.setVisibility(data.visibility, signal);
      if (data.qualityGate && (await project.qualityGateName(signal)).name !== data.qualityGate) {
        await project.setQualityGate(data.qualityGate, signal);
      }
      if (data.mainBranch) await project.renameMainBranch(data.mainBranch, signal);
      if (data.permissions) await setPermissions(platform, key, data.permissions, signal);
      return created;
    });
  }

  private importApplications(entries: Entries<ApplicationExport>, keyRegexp?: RegExp): Promise<ImportSummary> {
    const platform = this.platform;
    return this.importEach('applications', entries, keyRegexp, async (key, data, signal) => {
      const { object: app, created } = await getOrCreateRemote(
        () => getApplication(platform, key, signal),
        () =>
          createApplication(
            platform,
            key,
            data.name ?? key,
            { description: data.description, visibility: data.visibility },
            signal
          )
      );
      if (!created) {
        await app.update({ name: data.name ?? key, description: data.description, visibility: data.visibility }, signal);
      }
      if (data.projects) await app.setProjects(data.projects, signal);
      if (data.permissions) await setPermissions(platform, key, data.permissions, signal);
      return created;
    });
  }

  /**
   * Pass 1 creates missing profiles parents first, pass 2 sets parents,
   * rules and default flags
   */
  private async importQualityProfiles(
    profiles: readonly QualityProfileExport[],
    keyRegexp?: RegExp
  ): Promise<ImportSummary> {
    const summary = emptySummary('qualityProfiles');
    const selected: QualityProfileExport[] = [];
    for (const profile of profiles) {
      if (keyRegexp && !keyRegexp.test(profile.name)) continue;
      if (profile.exportStatus !== undefined) {
        summary.skipped++;
        continue;
      }
      selected.push(profile);
    }
    this.log.info(`--- Importing ${selected.length} qualityProfiles ---`);

    const resolved: Array<[QualityProfileExport, QualityProfile]> = [];
    const createdProfiles = new Set<QualityProfile>();
    for (const data of selected) {
      const label = `quality profile '${data.name}' of language '${data.language}'`;
      try {
        const { object, created } = data.isBuiltIn
          ? { object: await getQualityProfile(this.platform, data.language, data.name), created: false }
          : await getOrCreateRemote(
              () => getQualityProfile(this.platform, data.language, data.name),
              () => createQualityProfile(this.platform, data.language, data.name)
            );
        if (created) createdProfiles.add(object);
        resolved.push([data, object]);
      } catch (error) {
        summary.failed++;
        this.log.warn(`Cannot create ${label}`, { error: errorMessage(error) });
      }
    }

    const result = await this.runner.withLabel('Importing qualityProfiles').run(
      resolved,
      async ([data, profile], signal) => {
        if (data.isBuiltIn) return;
        await profile.setParent(data.parentName, signal);
        if (data.rules) {
          const changes = await profile.applyRules(data.rules, signal);
          if (changes.failed > 0) {
            this.log.warn(`${changes.failed} rule changes failed in ${profile}`);
          }
        }
        if (data.isDefault && !profile.isDefault) await profile.setAsDefault(signal);
      },
      ([, profile]) => String(profile)
    );
    for (const { item, outcome } of result.results) {
      if (outcome.status === 'failure') summary.failed++;
      else if (createdProfiles.has(item[1])) summary.created++;
      else summary.updated++;
    }
    return summary;
  }

  private async importPortfolios(entries: Entries<PortfolioExport>, keyRegexp?: RegExp): Promise<ImportSummary> {
    const summary = emptySummary('portfolios');
    const arena = portfolioArena(selectEntries(entries, summary, keyRegexp), this.log);
    const isReal = (key: string): boolean => arena.get(key)?.byReference !== true;
    const topLevel = arena.roots().filter(isReal);
    this.log.info(`--- Importing ${arena.keys().filter(isReal).length} portfolios ---`);

    // Pass 1: owned trees, parents before children, scalar attributes only
    const portfolios = new Map<string, Portfolio>();
    const failed = new Set<string>();
    const createdKeys = new Set<string>();
    for (const root of topLevel) {
      for (const key of arena.ownedSubtree(root)) {
        const data = arena.get(key) ?? {};
        const parentKey = arena.parentOf(key);
        if (parentKey !== undefined && failed.has(parentKey)) {
          failed.add(key);
          continue;
        }
        try {
          const { object, created } = await getOrCreateRemote(
            () => getPortfolio(this.platform, key),
            () =>
              createPortfolio(this.platform, key, {
                name: data.name ?? key,
                description: data.description,
                visibility: data.visibility,
                parentKey,
              })
          );
          if (created) createdKeys.add(key);
          portfolios.set(key, object);
        } catch (error) {
          failed.add(key);
          this.log.warn(`Cannot create portfolio '${key}'`, { error: errorMessage(error) });
        }
      }
    }
    summary.failed += failed.size;

    // Pass 2: composition
    const changedKeys = new Set<string>();
    const result = await this.runner.withLabel('Importing portfolios').run(
      [...portfolios],
      async ([key, portfolio], signal) => {
        const data = arena.get(key) ?? {};
        let changed = await portfolio.update(data.name ?? key, data.description, signal);
        if (data.selection) {
          changed = (await portfolio.selection.apply(selectionFromExport(data.selection), signal)) || changed;
        }
        for (const edge of arena.childrenOf(key)) {
          if (edge.kind === 'reference') changed = (await portfolio.addReference(edge.child, signal)) || changed;
        }
        if (data.permissions) {
          changed = (await setPermissions(this.platform, key, data.permissions, signal)) > 0 || changed;
        }
        if (changed) changedKeys.add(key);
      },
      ([key]) => `portfolio '${key}'`
    );
    for (const { item, outcome } of result.results) {
      if (outcome.status === 'failure') summary.failed++;
      else if (createdKeys.has(item[0])) summary.created++;
      else summary.updated++;
    }

    // Only top level portfolios are recomputed, once for their whole tree
    for (const key of topLevel) {
      const portfolio = portfolios.get(key);
      const touched = arena.ownedSubtree(key).some((k) => createdKeys.has(k) || changedKeys.has(k));
      if (!portfolio || !touched) continue;
      try {
        await portfolio.recompute();
      } catch (error) {
        this.log.warn(`Cannot recompute ${portfolio}`, { error: errorMessage(error) });
      }
    }
    return summary;
  }
}
