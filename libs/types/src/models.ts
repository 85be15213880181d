// Core domain model shared by the engine and the CLI

export type ObjectKind =
  | 'project'
  | 'branch'
  | 'qualityGate'
  | 'qualityProfile'
  | 'portfolio'
  | 'application'
  | 'group'
  | 'user';

export type Edition = 'community' | 'developer' | 'enterprise' | 'datacenter';

export type Visibility = 'public' | 'private';

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export type ProblemType =
  | 'SECURITY'
  | 'GOVERNANCE'
  | 'CONFIGURATION'
  | 'PERFORMANCE'
  | 'BAD_PRACTICE'
  | 'OPERATIONS';

export type RuleId =
  | 'QG_NO_COND'
  | 'QG_TOO_MANY_COND'
  | 'QG_NOT_USED'
  | 'QG_TOO_MANY_GATES'
  | 'QG_WRONG_METRIC'
  | 'QG_WRONG_THRESHOLD'
  | 'QP_TOO_MANY_QP'
  | 'QP_LAST_USED_DATE'
  | 'QP_LAST_CHANGE_DATE'
  | 'QP_TOO_FEW_RULES'
  | 'QP_NOT_USED'
  | 'QP_USE_DEPRECATED_RULES'
  | 'PROJ_LAST_ANALYSIS'
  | 'PROJ_NOT_ANALYZED'
  | 'PROJ_VISIBILITY'
  | 'BRANCH_LAST_ANALYSIS'
  | 'PORTFOLIO_EMPTY'
  | 'PORTFOLIO_SINGLETON'
  | 'APPLICATION_EMPTY'
  | 'APPLICATION_SINGLETON'
  | 'PROJ_PERM_MAX_USERS'
  | 'PROJ_PERM_MAX_ADM_USERS'
  | 'PROJ_PERM_MAX_GROUPS'
  | 'PROJ_PERM_ANYONE'
  | 'PROJ_DUPLICATE'
  | 'PULL_REQUEST_LAST_ANALYSIS'
  | 'OBJECT_WITH_NO_ADMIN_PERMISSION'
  | 'USER_UNUSED'
  | 'TOKEN_TOO_OLD'
  | 'TOKEN_UNUSED'
  | 'TOKEN_NEVER_USED'
  | 'GROUP_EMPTY';

/**
 * Minimal capability set every mirrored remote object exposes.
 * Concrete variants are discriminated by `kind`.
 */
export interface RemoteObjectRef {
  readonly kind: ObjectKind;
  readonly key: string;
  name?: string;
  url(): string;
  toString(): string;
}

export interface AuditProblem {
  readonly ruleId: RuleId;
  readonly severity: Severity;
  readonly type: ProblemType;
  readonly subject: RemoteObjectRef | string;
  readonly message: string;
  readonly url?: string;
}

// Plain key/value settings consulted by audits and exports
export type SettingValue = string | number | boolean;
export type Settings = Readonly<Record<string, SettingValue>>;

// Project selection of a portfolio
export type SelectionModeName = 'MANUAL' | 'REGEXP' | 'TAGS' | 'REST' | 'NONE';

export interface ManualSelection {
  mode: 'MANUAL';
  projects: Map<string, Set<string>>;
}

export interface RegexpSelection {
  mode: 'REGEXP';
  regexp: string;
  branch?: string;
}

export interface TagsSelection {
  mode: 'TAGS';
  tags: Set<string>;
  branch?: string;
}

export interface RestSelection {
  mode: 'REST';
  branch?: string;
}

export interface NoneSelection {
  mode: 'NONE';
}

export type SelectionMode =
  | ManualSelection
  | RegexpSelection
  | TagsSelection
  | RestSelection
  | NoneSelection;

// Hierarchy edges: owned children are created for their parent,
// reference children are merely linked and survive parent deletion
export type EdgeKind = 'owned' | 'reference';
