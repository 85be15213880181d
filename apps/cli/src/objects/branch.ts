import type {
  AuditProblem,
  BranchData,
  BranchListResponse,
  BranchMigrationExport,
  PullRequestData,
  PullRequestListResponse,
  RemoteObjectRef,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext, ageInDays } from '../audit/settings';
import { Platform } from '../platform/platform';
import { onLiveObject } from './remote';
import { RemoteObject } from './types';

export class Branch implements RemoteObject<BranchData> {
  readonly kind = 'branch' as const;

  constructor(readonly platform: Platform, readonly projectKey: string, public payload: BranchData) {}

  get key(): string {
    return this.payload.name;
  }

  get name(): string {
    return this.payload.name;
  }

  get isMain(): boolean {
    return this.payload.isMain;
  }

  cacheFields(): string[] {
    return [this.projectKey, this.name];
  }

  url(): string {
    return this.platform.pageUrl(
      `dashboard?id=${encodeURIComponent(this.projectKey)}&branch=${encodeURIComponent(this.name)}`
    );
  }

  toString(): string {
    return `branch '${this.name}' of project '${this.projectKey}'`;
  }

  audit(context: AuditContext): AuditProblem[] {
    // The main branch is covered by the project's own last analysis check
    if (this.isMain) return [];
    const maxAge = context.settings.number('audit.projects.branches.maxLastAnalysisAge');
    const age = ageInDays(this.payload.analysisDate, context.now);
    if (maxAge > 0 && age !== undefined && age > maxAge) {
      return [createProblem('BRANCH_LAST_ANALYSIS', this, [age])];
    }
    return [];
  }

  toMigration(): BranchMigrationExport {
    const data: BranchMigrationExport = { isMain: this.isMain };
    if (this.payload.analysisDate) data.lastAnalysis = this.payload.analysisDate;
    return data;
  }
}

export async function listBranches(platform: Platform, projectKey: string, signal?: AbortSignal): Promise<Branch[]> {
  const data = await platform.getJson<BranchListResponse>('project_branches/list', { project: projectKey }, signal);
  return data.branches.map((branch) =>
    platform.cache.upsert(
      'branch',
      [projectKey, branch.name],
      () => new Branch(platform, projectKey, branch),
      (existing) => {
        existing.payload = branch;
      }
    )
  );
}

export async function renameBranch(branch: Branch, name: string, signal?: AbortSignal): Promise<void> {
  await onLiveObject(branch, () =>
    branch.platform.post('project_branches/rename', { project: branch.projectKey, name }, signal)
  );
  branch.platform.cache.invalidate(branch);
}

export async function listPullRequests(
  platform: Platform,
  projectKey: string,
  signal?: AbortSignal
): Promise<PullRequestData[]> {
  const data = await platform.getJson<PullRequestListResponse>('project_pull_requests/list', { project: projectKey }, signal);
  return data.pullRequests;
}

/**
 * Pull requests are reported against their project, linking to the pull
 * request itself
 */
export function auditPullRequests(
  platform: Platform,
  project: RemoteObjectRef,
  pullRequests: readonly PullRequestData[],
  context: AuditContext
): AuditProblem[] {
  const maxAge = context.settings.number('audit.projects.pullRequests.maxLastAnalysisAge');
  if (maxAge <= 0) return [];
  return pullRequests.flatMap((pr) => {
    const age = ageInDays(pr.analysisDate, context.now);
    if (age === undefined || age <= maxAge) return [];
    const url = platform.pageUrl(`dashboard?id=${encodeURIComponent(project.key)}&pullRequest=${encodeURIComponent(pr.key)}`);
    return [createProblem('PULL_REQUEST_LAST_ANALYSIS', project, [pr.key, age], { url })];
  });
}
