import type {
  ApplicationExport,
  ApplicationShowResponse,
  AuditProblem,
  ComponentSearchResponse,
  PermissionsExport,
  Visibility,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext } from '../audit/settings';
import { applyMemberDiff, diffMembers } from '../hierarchy/reconciler';
import { APPLICATION_EDITIONS, Platform } from '../platform/platform';
import { auditAdminPermission, getPermissions, hasPermissions } from './permissions';
import { isVisibility } from './project';
import { createRemote, onLiveObject } from './remote';
import { RemoteObject } from './types';

type ApplicationData = ApplicationShowResponse['application'];

export class Application implements RemoteObject<ApplicationData> {
  readonly kind = 'application' as const;
  private loaded = false;

  constructor(readonly platform: Platform, public payload: ApplicationData) {}

  get key(): string {
    return this.payload.key;
  }

  get name(): string {
    return this.payload.name;
  }

  cacheFields(): string[] {
    return [this.key];
  }

  url(): string {
    return this.platform.pageUrl(`dashboard?id=${encodeURIComponent(this.key)}`);
  }

  toString(): string {
    return `application '${this.key}'`;
  }

  async show(signal?: AbortSignal): Promise<ApplicationData> {
    if (!this.loaded) {
      const data = await onLiveObject(this, () =>
        this.platform.getJson<ApplicationShowResponse>('applications/show', { application: this.key }, signal)
      );
      this.payload = data.application;
      this.loaded = true;
    }
    return this.payload;
  }

  async projectKeys(signal?: AbortSignal): Promise<string[]> {
    const data = await this.show(signal);
    return (data.projects ?? []).map((p) => p.key).sort();
  }

  async audit(context: AuditContext): Promise<AuditProblem[]> {
    const { settings, signal } = context;
    const problems = auditAdminPermission(this, await this.permissions(signal), settings);
    const count = (await this.projectKeys(signal)).length;
    if (count === 0 && settings.boolean('audit.applications.empty')) {
      problems.push(createProblem('APPLICATION_EMPTY', this));
    } else if (count === 1 && settings.boolean('audit.applications.singleton')) {
      problems.push(createProblem('APPLICATION_SINGLETON', this));
    }
    return problems;
  }

  permissions(signal?: AbortSignal): Promise<PermissionsExport> {
    return getPermissions(this.platform, this.key, signal);
  }

  async toExport(signal?: AbortSignal): Promise<ApplicationExport> {
    const data = await this.show(signal);
    const exported: ApplicationExport = { name: data.name };
    if (data.description) exported.description = data.description;
    if (isVisibility(data.visibility)) exported.visibility = data.visibility;
    exported.projects = await this.projectKeys(signal);
    const permissions = await this.permissions(signal);
    if (hasPermissions(permissions)) exported.permissions = permissions;
    return exported;
  }

  /**
   * Bring name, description and visibility to the given values, calling the
   * server only for what differs
   */
  async update(
    attributes: { name: string; description?: string; visibility?: Visibility },
    signal?: AbortSignal
  ): Promise<void> {
    const data = await this.show(signal);
    const description = attributes.description ?? '';
    if (attributes.name !== data.name || description !== (data.description ?? '')) {
      await this.platform.post(
        'applications/update',
        { application: this.key, name: attributes.name, description },
        signal
      );
      this.payload = { ...this.payload, name: attributes.name, description: attributes.description };
    }
    if (attributes.visibility !== undefined && attributes.visibility !== data.visibility) {
      await this.platform.post('projects/update_visibility', { project: this.key, visibility: attributes.visibility }, signal);
      this.payload = { ...this.payload, visibility: attributes.visibility };
    }
  }

  /**
   * Make the application aggregate exactly `projects`
   */
  async setProjects(projects: readonly string[], signal?: AbortSignal): Promise<void> {
    const current = await this.projectKeys(signal);
    const diff = diffMembers(projects, current);
    for (const project of diff.added) {
      await this.platform.post('applications/add_project', { application: this.key, project }, signal);
    }
    for (const project of diff.removed) {
      await this.platform.post('applications/remove_project', { application: this.key, project }, signal);
    }
    this.payload = { ...this.payload, projects: applyMemberDiff(current, diff).map((key) => ({ key })) };
  }
}

/**
 * @throws UnsupportedOperationError on editions without applications
 */
export async function listApplications(platform: Platform, signal?: AbortSignal): Promise<Application[]> {
  await platform.requireEdition('Applications', APPLICATION_EDITIONS);
  const components = await platform.searchAll<ComponentSearchResponse, ComponentSearchResponse['components'][number]>(
    'components/search',
    { qualifiers: 'APP' },
    (page) => ({ items: page.components, paging: page.paging }),
    signal
  );
  return components.map((component) =>
    platform.cache.upsert(
      'application',
      [component.key],
      () => new Application(platform, component),
      (app) => {
        app.payload = { ...app.payload, ...component };
      }
    )
  );
}

export async function getApplication(platform: Platform, key: string, signal?: AbortSignal): Promise<Application> {
  return platform.cache.getOrCreate('application', [key], async (buildSignal) => {
    const app = new Application(platform, { key, name: key });
    await app.show(buildSignal);
    return app;
  }, signal);
}

export async function createApplication(
  platform: Platform,
  key: string,
  name: string,
  options: { description?: string; visibility?: Visibility } = {},
  signal?: AbortSignal
): Promise<Application> {
  await createRemote(key, () =>
    platform.post(
      'applications/create',
      { key, name, description: options.description, visibility: options.visibility },
      signal
    )
  );
  return getApplication(platform, key, signal);
}
