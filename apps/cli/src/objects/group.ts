import type { AuditProblem, GroupData, GroupExport, GroupSearchResponse } from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext } from '../audit/settings';
import { ObjectNotFoundError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { createRemote } from './remote';
import { RemoteObject } from './types';

const GROUP_FIELDS = 'name,description,membersCount,default';

export class Group implements RemoteObject<GroupData> {
  readonly kind = 'group' as const;

  constructor(readonly platform: Platform, public payload: GroupData) {}

  get key(): string {
    return this.payload.name;
  }

  get name(): string {
    return this.payload.name;
  }

  get isDefault(): boolean {
    return this.payload.default ?? false;
  }

  cacheFields(): string[] {
    return [this.name];
  }

  url(): string {
    return this.platform.pageUrl('admin/groups');
  }

  toString(): string {
    return `group '${this.name}'`;
  }

  audit(context: AuditContext): AuditProblem[] {
    if (context.settings.boolean('audit.groups.empty') && this.payload.membersCount === 0) {
      return [createProblem('GROUP_EMPTY', this)];
    }
    return [];
  }

  toExport(): GroupExport {
    const data: GroupExport = {};
    if (this.payload.description) data.description = this.payload.description;
    if (this.isDefault) data.default = true;
    return data;
  }

  async setDescription(description: string | undefined, signal?: AbortSignal): Promise<boolean> {
    if ((description ?? '') === (this.payload.description ?? '')) return false;
    await this.platform.post('user_groups/update', { currentName: this.name, description: description ?? '' }, signal);
    this.payload = { ...this.payload, description };
    return true;
  }
}

function cacheGroup(platform: Platform, data: GroupData): Group {
  return platform.cache.upsert(
    'group',
    [data.name],
    () => new Group(platform, data),
    (group) => {
      group.payload = data;
    }
  );
}

export async function listGroups(platform: Platform, signal?: AbortSignal): Promise<Group[]> {
  const groups = await platform.searchAll<GroupSearchResponse, GroupData>(
    'user_groups/search',
    { f: GROUP_FIELDS },
    (page) => ({ items: page.groups, paging: page.paging }),
    signal
  );
  return groups.map((data) => cacheGroup(platform, data));
}

export async function getGroup(platform: Platform, name: string, signal?: AbortSignal): Promise<Group> {
  return platform.cache.getOrCreate('group', [name], async (buildSignal) => {
    const data = await platform.getJson<GroupSearchResponse>('user_groups/search', { q: name, f: GROUP_FIELDS }, buildSignal);
    const group = data.groups.find((g) => g.name === name);
    if (!group) {
      throw new ObjectNotFoundError(name, `Group '${name}' not found`);
    }
    return new Group(platform, group);
  }, signal);
}

export async function createGroup(
  platform: Platform,
  name: string,
  description?: string,
  signal?: AbortSignal
): Promise<Group> {
  await createRemote(name, () => platform.post('user_groups/create', { name, description }, signal));
  return getGroup(platform, name, signal);
}
