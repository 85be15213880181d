// Export / import payload layout

import type { Edition, SelectionModeName, Visibility } from './models';

export type ExportType = 'config' | 'migration';

export interface PlatformExport {
  url: string;
  version: string;
  edition: Edition;
  serverId: string;
  exportType: ExportType;
  exportedAt: string;
}

/** Status string written for objects whose export failed, e.g. `FAILED/TIMEOUT` */
export type FailedExportStatus = `FAILED/${string}`;

export interface FailedExport {
  exportStatus: FailedExportStatus;
}

/** Permissions granted on a component, by login or group name */
export interface PermissionsExport {
  users?: Record<string, string[]>;
  groups?: Record<string, string[]>;
}

export interface QualityGateExport {
  isDefault?: boolean;
  isBuiltIn?: boolean;
  conditions?: string[];
}

export interface RuleActivation {
  severity: string;
  params?: Record<string, string>;
}

export type RuleSet = Record<string, RuleActivation>;

/** Flat form of a quality profile, before hierarchization */
export interface QualityProfileExport {
  name: string;
  language: string;
  parentName?: string;
  isDefault?: boolean;
  isBuiltIn?: boolean;
  rules?: RuleSet;
  /** Set, without rules, when the profile could not be exported */
  exportStatus?: FailedExportStatus;
}

/** Nested form of a quality profile under its parent */
export interface QualityProfileNodeExport {
  isDefault?: boolean;
  isBuiltIn?: boolean;
  rules?: RuleSet;
  addedRules?: RuleSet;
  modifiedRules?: RuleSet;
  removedRules?: string[];
  exportStatus?: FailedExportStatus;
  children?: Record<string, QualityProfileNodeExport>;
}

export type QualityProfilesExport = Record<string, Record<string, QualityProfileNodeExport>>;

export interface SelectionExport {
  mode: SelectionModeName;
  projects?: Record<string, string[]>;
  regexp?: string;
  tags?: string[];
  branch?: string;
}

export interface PortfolioExport {
  name?: string;
  description?: string;
  visibility?: Visibility;
  byReference?: boolean;
  selection?: SelectionExport;
  permissions?: PermissionsExport;
  subPortfolios?: Record<string, PortfolioExport>;
}

export interface BranchMigrationExport {
  isMain: boolean;
  lastAnalysis?: string;
}

export interface BackgroundTaskExport {
  lastTaskDate?: string;
  lastTaskStatus?: string;
  scannerContext?: Record<string, string>;
}

export interface ProjectExport {
  name?: string;
  visibility?: Visibility;
  qualityGate?: string;
  mainBranch?: string;
  permissions?: PermissionsExport;
  /** Present in migration exports only */
  migration?: {
    lastAnalysis?: string;
    branches: Record<string, BranchMigrationExport>;
    backgroundTasks: BackgroundTaskExport;
  };
}

export interface ApplicationExport {
  name?: string;
  description?: string;
  visibility?: Visibility;
  projects?: string[];
  permissions?: PermissionsExport;
}

export interface GroupExport {
  description?: string;
  default?: boolean;
}

export interface UserExport {
  name?: string;
  email?: string;
  local?: boolean;
  groups?: string[];
}

type EntryOf<E> = E | FailedExport;

export interface ConfigExport {
  platform: PlatformExport;
  qualityGates?: Record<string, EntryOf<QualityGateExport>>;
  qualityProfiles?: QualityProfilesExport;
  projects?: Record<string, EntryOf<ProjectExport>>;
  portfolios?: Record<string, EntryOf<PortfolioExport>>;
  applications?: Record<string, EntryOf<ApplicationExport>>;
  groups?: Record<string, EntryOf<GroupExport>>;
  users?: Record<string, EntryOf<UserExport>>;
}

export type ExportSection = Exclude<keyof ConfigExport, 'platform'>;
