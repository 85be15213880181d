/**
 * Audit rule catalog
 * Severity, type and message template of every rule, read from rules.json
 * and validated once on first use.
 */

import type { AuditProblem, ProblemType, RemoteObjectRef, RuleId, Severity } from '@sqconf/types';
import { RuleConfigError } from '../platform/errors';
import rulesJson from './rules.json';

export const RULE_IDS: readonly RuleId[] = [
  'QG_NO_COND',
  'QG_TOO_MANY_COND',
  'QG_NOT_USED',
  'QG_TOO_MANY_GATES',
  'QG_WRONG_METRIC',
  'QG_WRONG_THRESHOLD',
  'QP_TOO_MANY_QP',
  'QP_LAST_USED_DATE',
  'QP_LAST_CHANGE_DATE',
  'QP_TOO_FEW_RULES',
  'QP_NOT_USED',
  'QP_USE_DEPRECATED_RULES',
  'PROJ_LAST_ANALYSIS',
  'PROJ_NOT_ANALYZED',
  'PROJ_VISIBILITY',
  'BRANCH_LAST_ANALYSIS',
  'PORTFOLIO_EMPTY',
  'PORTFOLIO_SINGLETON',
  'APPLICATION_EMPTY',
  'APPLICATION_SINGLETON',
  'PROJ_PERM_MAX_USERS',
  'PROJ_PERM_MAX_ADM_USERS',
  'PROJ_PERM_MAX_GROUPS',
  'PROJ_PERM_ANYONE',
  'PROJ_DUPLICATE',
  'PULL_REQUEST_LAST_ANALYSIS',
  'OBJECT_WITH_NO_ADMIN_PERMISSION',
  'USER_UNUSED',
  'TOKEN_TOO_OLD',
  'TOKEN_UNUSED',
  'TOKEN_NEVER_USED',
  'GROUP_EMPTY',
];

export const SEVERITIES: readonly Severity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

export const PROBLEM_TYPES: readonly ProblemType[] = [
  'SECURITY',
  'GOVERNANCE',
  'CONFIGURATION',
  'PERFORMANCE',
  'BAD_PRACTICE',
  'OPERATIONS',
];

export interface RuleDefinition {
  id: RuleId;
  severity: Severity;
  type: ProblemType;
  message: string;
}

export type RuleCatalog = ReadonlyMap<RuleId, RuleDefinition>;

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export function isProblemType(value: unknown): value is ProblemType {
  return PROBLEM_TYPES.some((t) => t === value);
}

function isRuleId(value: string): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw catalog
 * @throws RuleConfigError on unknown ids, invalid fields or missing rules
 */
export function parseRuleCatalog(raw: unknown): RuleCatalog {
  if (!isRecord(raw)) {
    throw new RuleConfigError('Rule catalog must be a JSON object');
  }
  const catalog = new Map<RuleId, RuleDefinition>();
  for (const [id, entry] of Object.entries(raw)) {
    if (!isRuleId(id)) {
      throw new RuleConfigError(`Unknown rule id '${id}'`);
    }
    if (!isRecord(entry)) {
      throw new RuleConfigError(`Rule ${id} must be an object`);
    }
    const { severity, type, message } = entry;
    if (!isSeverity(severity)) {
      throw new RuleConfigError(`Rule ${id} has invalid severity '${String(severity)}'`);
    }
    if (!isProblemType(type)) {
      throw new RuleConfigError(`Rule ${id} has invalid type '${String(type)}'`);
    }
    if (typeof message !== 'string' || message.length === 0) {
      throw new RuleConfigError(`Rule ${id} has no message`);
    }
    catalog.set(id, { id, severity, type, message });
  }
  const missing = RULE_IDS.filter((id) => !catalog.has(id));
  if (missing.length > 0) {
    throw new RuleConfigError(`Rules missing from catalog: ${missing.join(', ')}`);
  }
  return catalog;
}

let loadedCatalog: RuleCatalog | undefined;

export function getRuleCatalog(): RuleCatalog {
  if (!loadedCatalog) {
    loadedCatalog = parseRuleCatalog(rulesJson);
  }
  return loadedCatalog;
}

export function getRule(id: RuleId): RuleDefinition {
  const rule = getRuleCatalog().get(id);
  if (!rule) {
    throw new RuleConfigError(`Rule ${id} is not defined`);
  }
  return rule;
}

/**
 * Substitute `{0}`, `{1}`... placeholders
 */
export function formatMessage(template: string, args: ReadonlyArray<string | number>): string {
  return template.replace(/\{(\d+)\}/g, (match, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? match : String(value);
  });
}

export interface ProblemOptions {
  /** Overrides the rule's default severity */
  severity?: Severity;
  url?: string;
}

/**
 * Build a problem for `rule`, the subject's display name is the first
 * message argument
 */
export function createProblem(
  id: RuleId,
  subject: RemoteObjectRef | string,
  args: ReadonlyArray<string | number> = [],
  options: ProblemOptions = {}
): AuditProblem {
  const rule = getRule(id);
  const url = options.url ?? (typeof subject === 'string' ? undefined : subject.url());
  return Object.freeze({
    ruleId: id,
    severity: options.severity ?? rule.severity,
    type: rule.type,
    subject,
    message: formatMessage(rule.message, [String(subject), ...args]),
    ...(url !== undefined ? { url } : {}),
  });
}
