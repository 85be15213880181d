/**
 * Component permissions (projects, portfolios, applications)
 */

import type {
  AuditProblem,
  PermissionGroupsResponse,
  PermissionUsersResponse,
  PermissionsExport,
  RemoteObjectRef,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditSettings } from '../audit/settings';
import { diffMembers } from '../hierarchy/reconciler';
import { Platform } from '../platform/platform';

function toGrantMap(entries: Array<{ id: string; permissions: string[] }>): Record<string, string[]> | undefined {
  const granted = entries
    .filter((entry) => entry.permissions.length > 0)
    .sort((a, b) => a.id.localeCompare(b.id))
    .map((entry): [string, string[]] => [entry.id, [...entry.permissions].sort()]);
  return granted.length > 0 ? Object.fromEntries(granted) : undefined;
}

export async function getPermissions(
  platform: Platform,
  componentKey: string,
  signal?: AbortSignal
): Promise<PermissionsExport> {
  const users = await platform.searchAll<PermissionUsersResponse, PermissionUsersResponse['users'][number]>(
    'permissions/users',
    { projectKey: componentKey },
    (page) => ({ items: page.users, paging: page.paging }),
    signal
  );
  const groups = await platform.searchAll<PermissionGroupsResponse, PermissionGroupsResponse['groups'][number]>(
    'permissions/groups',
    { projectKey: componentKey },
    (page) => ({ items: page.groups, paging: page.paging }),
    signal
  );
  const result: PermissionsExport = {};
  const userGrants = toGrantMap(users.map((u) => ({ id: u.login, permissions: u.permissions })));
  const groupGrants = toGrantMap(groups.map((g) => ({ id: g.name, permissions: g.permissions })));
  if (userGrants) result.users = userGrants;
  if (groupGrants) result.groups = groupGrants;
  return result;
}

export function hasPermissions(permissions: PermissionsExport | undefined): permissions is PermissionsExport {
  return (
    permissions !== undefined &&
    (Object.keys(permissions.users ?? {}).length > 0 || Object.keys(permissions.groups ?? {}).length > 0)
  );
}

/**
 * Grant and revoke so that the listed users and groups hold exactly the
 * listed permissions. Users and groups not listed are left alone.
 */
export async function setPermissions(
  platform: Platform,
  componentKey: string,
  target: PermissionsExport,
  signal?: AbortSignal
): Promise<number> {
  const current = await getPermissions(platform, componentKey, signal);
  let changes = 0;
  for (const [login, permissions] of Object.entries(target.users ?? {})) {
    const diff = diffMembers(permissions, current.users?.[login] ?? []);
    for (const permission of diff.added) {
      await platform.post('permissions/add_user', { projectKey: componentKey, login, permission }, signal);
    }
    for (const permission of diff.removed) {
      await platform.post('permissions/remove_user', { projectKey: componentKey, login, permission }, signal);
    }
    changes += diff.added.length + diff.removed.length;
  }
  for (const [groupName, permissions] of Object.entries(target.groups ?? {})) {
    const diff = diffMembers(permissions, current.groups?.[groupName] ?? []);
    for (const permission of diff.added) {
      await platform.post('permissions/add_group', { projectKey: componentKey, groupName, permission }, signal);
    }
    for (const permission of diff.removed) {
      await platform.post('permissions/remove_group', { projectKey: componentKey, groupName, permission }, signal);
    }
    changes += diff.added.length + diff.removed.length;
  }
  return changes;
}

// Permissions beyond browsing that no one should get anonymously
const ELEVATED_PERMISSIONS = ['admin', 'issueadmin', 'securityhotspotadmin', 'scan'];

function holders(grants: Record<string, string[]> | undefined, permission?: string): string[] {
  return Object.entries(grants ?? {})
    .filter(([, permissions]) => permission === undefined || permissions.includes(permission))
    .map(([id]) => id);
}

/**
 * Components nobody administers can no longer be reconfigured but by a
 * global administrator
 */
export function auditAdminPermission(
  subject: RemoteObjectRef,
  permissions: PermissionsExport,
  settings: AuditSettings
): AuditProblem[] {
  if (!settings.boolean('audit.permissions.adminRequired')) return [];
  const admins = holders(permissions.users, 'admin').length + holders(permissions.groups, 'admin').length;
  return admins === 0 ? [createProblem('OBJECT_WITH_NO_ADMIN_PERMISSION', subject)] : [];
}

export function auditProjectPermissions(
  subject: RemoteObjectRef,
  permissions: PermissionsExport,
  settings: AuditSettings
): AuditProblem[] {
  const problems = auditAdminPermission(subject, permissions, settings);

  const maxUsers = settings.number('audit.projects.permissions.maxUsers');
  const users = holders(permissions.users).length;
  if (users > maxUsers) {
    problems.push(createProblem('PROJ_PERM_MAX_USERS', subject, [users, maxUsers]));
  }
  const maxAdmins = settings.number('audit.projects.permissions.maxAdminUsers');
  const admins = holders(permissions.users, 'admin').length;
  if (admins > maxAdmins) {
    problems.push(createProblem('PROJ_PERM_MAX_ADM_USERS', subject, [admins, maxAdmins]));
  }
  const maxGroups = settings.number('audit.projects.permissions.maxGroups');
  const groups = holders(permissions.groups).length;
  if (groups > maxGroups) {
    problems.push(createProblem('PROJ_PERM_MAX_GROUPS', subject, [groups, maxGroups]));
  }
  const anyone = (permissions.groups?.Anyone ?? []).filter((p) => ELEVATED_PERMISSIONS.includes(p));
  if (anyone.length > 0) {
    problems.push(createProblem('PROJ_PERM_ANYONE', subject, [anyone.join(', ')]));
  }
  return problems;
}
