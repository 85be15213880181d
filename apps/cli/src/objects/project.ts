/**
 * Projects
 * Besides their own configuration, projects give access to their branches
 * and, for migration exports, to their background task history.
 */

import type {
  AuditProblem,
  BackgroundTaskExport,
  CeActivityResponse,
  CeTaskResponse,
  PermissionsExport,
  ProjectData,
  ProjectExport,
  ProjectSearchResponse,
  QualityGateByProjectResponse,
  Visibility,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext, ageInDays } from '../audit/settings';
import { createLogger } from '../logger';
import { ObjectNotFoundError } from '../platform/errors';
import { Platform, PULL_REQUEST_EDITIONS } from '../platform/platform';
import { auditPullRequests, Branch, listBranches, listPullRequests, renameBranch } from './branch';
import { auditProjectPermissions, getPermissions, hasPermissions } from './permissions';
import { createRemote, onLiveObject } from './remote';
import { RemoteObject } from './types';

const log = createLogger({ component: 'project' });

// Scanner properties never carried into an export
const SECRET_PROPERTY = /token|password|secret|login|credential/i;

/**
 * Extract `key=value` scanner properties from a background task's scanner
 * context text
 */
export function parseScannerContext(text: string): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*-\s*([^=\s]+)=(.*)$/.exec(line);
    if (!match) continue;
    const [, key, value] = match;
    if (SECRET_PROPERTY.test(key)) continue;
    properties[key] = value.trim();
  }
  return properties;
}

export function isVisibility(value: string | undefined): value is Visibility {
  return value === 'public' || value === 'private';
}

export interface ProjectExportOptions {
  /** Adds branches, last analysis and last background task */
  migration?: boolean;
  signal?: AbortSignal;
}

export class Project implements RemoteObject<ProjectData> {
  readonly kind = 'project' as const;
  private branchList?: Branch[];

  constructor(readonly platform: Platform, public payload: ProjectData) {}

  get key(): string {
    return this.payload.key;
  }

  get name(): string {
    return this.payload.name;
  }

  get visibility(): Visibility | undefined {
    return isVisibility(this.payload.visibility) ? this.payload.visibility : undefined;
  }

  get lastAnalysisDate(): string | undefined {
    return this.payload.lastAnalysisDate;
  }

  cacheFields(): string[] {
    return [this.key];
  }

  url(): string {
    return this.platform.pageUrl(`dashboard?id=${encodeURIComponent(this.key)}`);
  }

  toString(): string {
    return `project '${this.key}'`;
  }

  async branches(signal?: AbortSignal): Promise<Branch[]> {
    if (!this.branchList) {
      this.branchList = await onLiveObject(this, () => listBranches(this.platform, this.key, signal));
    }
    return this.branchList;
  }

  async mainBranch(signal?: AbortSignal): Promise<Branch | undefined> {
    return (await this.branches(signal)).find((branch) => branch.isMain);
  }

  /** Name of the gate explicitly associated with the project or inherited as default */
  async qualityGateName(signal?: AbortSignal): Promise<{ name: string; isDefault: boolean }> {
    const data = await onLiveObject(this, () =>
      this.platform.getJson<QualityGateByProjectResponse>('qualitygates/get_by_project', { project: this.key }, signal)
    );
    return { name: data.qualityGate.name, isDefault: data.qualityGate.default ?? false };
  }

  async setQualityGate(gateName: string, signal?: AbortSignal): Promise<void> {
    await this.platform.post('qualitygates/select', { gateName, projectKey: this.key }, signal);
  }

  async setVisibility(visibility: Visibility, signal?: AbortSignal): Promise<void> {
    if (visibility === this.visibility) return;
    await this.platform.post('projects/update_visibility', { project: this.key, visibility }, signal);
    this.payload = { ...this.payload, visibility };
  }

  async renameMainBranch(name: string, signal?: AbortSignal): Promise<void> {
    const main = await this.mainBranch(signal);
    if (!main || main.name === name) return;
    await renameBranch(main, name, signal);
    this.branchList = undefined;
  }

  /**
   * Last background task of the project with its scanner context
   */
  async lastBackgroundTask(signal?: AbortSignal): Promise<BackgroundTaskExport> {
    const activity = await this.platform.getJson<CeActivityResponse>(
      'ce/activity',
      { component: this.key, type: 'REPORT', ps: 1 },
      signal
    );
    const [last] = activity.tasks;
    if (!last) return {};
    const data: BackgroundTaskExport = { lastTaskStatus: last.status };
    const date = last.executedAt ?? last.submittedAt;
    if (date) data.lastTaskDate = date;
    const details = await this.platform.getJson<CeTaskResponse>(
      'ce/task',
      { id: last.id, additionalFields: 'scannerContext' },
      signal
    );
    if (details.task.scannerContext) {
      data.scannerContext = parseScannerContext(details.task.scannerContext);
    }
    return data;
  }

  private async auditLastAnalysis(context: AuditContext): Promise<AuditProblem[]> {
    const { settings, now } = context;
    const age = ageInDays(this.lastAnalysisDate, now);
    if (age === undefined) {
      return settings.boolean('audit.projects.neverAnalyzed') ? [createProblem('PROJ_NOT_ANALYZED', this)] : [];
    }
    const maxAge = settings.number('audit.projects.maxLastAnalysisAge');
    if (maxAge > 0 && age > maxAge) {
      // Abandoned for more than a year
      return [createProblem('PROJ_LAST_ANALYSIS', this, [age], age > 365 ? { severity: 'HIGH' } : {})];
    }
    return [];
  }

  async audit(context: AuditContext): Promise<AuditProblem[]> {
    const { settings, signal } = context;
    const problems = await this.auditLastAnalysis(context);
    if (settings.boolean('audit.projects.visibility') && this.visibility === 'public') {
      problems.push(createProblem('PROJ_VISIBILITY', this, ['public']));
    }
    if (settings.boolean('audit.projects.branches')) {
      for (const branch of await this.branches(signal)) {
        problems.push(...branch.audit(context));
      }
      if (await this.platform.supports(PULL_REQUEST_EDITIONS)) {
        const pullRequests = await onLiveObject(this, () => listPullRequests(this.platform, this.key, signal));
        problems.push(...auditPullRequests(this.platform, this, pullRequests, context));
      }
    }
    if (settings.boolean('audit.projects.permissions')) {
      problems.push(...auditProjectPermissions(this, await this.permissions(signal), settings));
    }
    return problems;
  }

  permissions(signal?: AbortSignal): Promise<PermissionsExport> {
    return getPermissions(this.platform, this.key, signal);
  }

  async toExport(options: ProjectExportOptions = {}): Promise<ProjectExport> {
    const { signal } = options;
    const data: ProjectExport = { name: this.name };
    if (this.visibility) data.visibility = this.visibility;
    const gate = await this.qualityGateName(signal);
    if (!gate.isDefault) data.qualityGate = gate.name;
    const branches = await this.branches(signal);
    const main = branches.find((branch) => branch.isMain);
    if (main) data.mainBranch = main.name;
    const permissions = await this.permissions(signal);
    if (hasPermissions(permissions)) data.permissions = permissions;
    if (options.migration) {
      data.migration = {
        branches: Object.fromEntries(branches.map((branch) => [branch.name, branch.toMigration()])),
        backgroundTasks: await this.lastBackgroundTask(signal),
      };
      if (this.lastAnalysisDate) data.migration.lastAnalysis = this.lastAnalysisDate;
    }
    return data;
  }
}

function cacheProject(platform: Platform, data: ProjectData): Project {
  return platform.cache.upsert(
    'project',
    [data.key],
    () => new Project(platform, data),
    (project) => {
      project.payload = data;
    }
  );
}

export async function listProjects(platform: Platform, signal?: AbortSignal): Promise<Project[]> {
  const components = await platform.searchAll<ProjectSearchResponse, ProjectData>(
    'projects/search',
    { qualifiers: 'TRK' },
    (page) => ({ items: page.components, paging: page.paging }),
    signal
  );
  log.debug(`Found ${components.length} projects`);
  return components.map((data) => cacheProject(platform, data));
}

export async function getProject(platform: Platform, key: string, signal?: AbortSignal): Promise<Project> {
  return platform.cache.getOrCreate('project', [key], async (buildSignal) => {
    const data = await platform.getJson<ProjectSearchResponse>('projects/search', { projects: key }, buildSignal);
    const project = data.components.find((component) => component.key === key);
    if (!project) {
      throw new ObjectNotFoundError(key, `Project '${key}' not found`);
    }
    return new Project(platform, project);
  }, signal);
}

export async function createProject(
  platform: Platform,
  key: string,
  name: string,
  visibility?: Visibility,
  signal?: AbortSignal
): Promise<Project> {
  await createRemote(key, () => platform.post('projects/create', { project: key, name, visibility }, signal));
  return getProject(platform, key, signal);
}
