/**
 * Sections of the configuration: the object types an audit, export or
 * import can be restricted to
 */

import type { ExportSection } from '@sqconf/types';
import { ConfigError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { listApplications } from './application';
import { listGroups } from './group';
import { listPortfolios } from './portfolio';
import { listProjects } from './project';
import { listQualityGates } from './quality-gate';
import { listQualityProfiles } from './quality-profile';
import { AnyRemoteObject } from './types';
import { listUsers } from './user';

export const SECTIONS: readonly ExportSection[] = [
  'groups',
  'users',
  'qualityGates',
  'qualityProfiles',
  'projects',
  'portfolios',
  'applications',
];

const ALIASES: Readonly<Record<string, ExportSection>> = {
  gates: 'qualityGates',
  qualitygates: 'qualityGates',
  profiles: 'qualityProfiles',
  qualityprofiles: 'qualityProfiles',
  groups: 'groups',
  users: 'users',
  projects: 'projects',
  portfolios: 'portfolios',
  apps: 'applications',
  applications: 'applications',
};

export interface SectionSelection {
  sections: ExportSection[];
  /** True when the user named the sections rather than taking them all */
  explicit: boolean;
}

/**
 * Parse a comma separated list of sections; none means all of them
 */
export function parseSections(what?: string): SectionSelection {
  if (!what || what.trim() === '') {
    return { sections: [...SECTIONS], explicit: false };
  }
  const requested = new Set<ExportSection>();
  for (const name of what.split(',').map((s) => s.trim()).filter((s) => s.length > 0)) {
    const section = ALIASES[name.toLowerCase()];
    if (!section) {
      throw new ConfigError(`Unknown object type '${name}', expected one of: ${SECTIONS.join(', ')}`);
    }
    requested.add(section);
  }
  return { sections: SECTIONS.filter((s) => requested.has(s)), explicit: true };
}

export async function listSection(
  platform: Platform,
  section: ExportSection,
  signal?: AbortSignal
): Promise<AnyRemoteObject[]> {
  switch (section) {
    case 'qualityGates':
      return listQualityGates(platform, signal);
    case 'qualityProfiles':
      return listQualityProfiles(platform, undefined, signal);
    case 'projects':
      return listProjects(platform, signal);
    case 'portfolios':
      return listPortfolios(platform, signal);
    case 'applications':
      return listApplications(platform, signal);
    case 'groups':
      return listGroups(platform, signal);
    case 'users':
      return listUsers(platform, signal);
  }
}

/**
 * Key filter: an object is kept when its key or its name matches
 */
export function matchesKey(obj: AnyRemoteObject, keyRegexp?: RegExp): boolean {
  if (!keyRegexp) return true;
  return keyRegexp.test(obj.key) || (obj.name !== undefined && keyRegexp.test(obj.name));
}
