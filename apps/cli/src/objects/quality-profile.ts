/**
 * Quality profiles
 * Identified by language and name. Rules are fetched lazily; inheritance is
 * expressed on export as a rule diff against the parent profile.
 */

import type {
  AuditProblem,
  QualityProfileData,
  QualityProfileExport,
  QualityProfileSearchResponse,
  RuleActivation,
  RuleSearchResponse,
  RuleSet,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext, ageInDays } from '../audit/settings';
import { applyRuleDiff, diffRules, isEmptyRuleDiff, RuleDiff } from '../hierarchy/reconciler';
import { createLogger } from '../logger';
import { ObjectNotFoundError, errorMessage } from '../platform/errors';
import { DEFAULT_PAGE_SIZE, Platform } from '../platform/platform';
import { createRemote, onLiveObject } from './remote';
import { RemoteObject } from './types';

const log = createLogger({ component: 'qualityProfile' });

const ruleCounts = new WeakMap<Platform, Map<string, Promise<number>>>();

/**
 * Number of rules available for a language, fetched once per platform
 */
export function countLanguageRules(platform: Platform, language: string, signal?: AbortSignal): Promise<number> {
  let counts = ruleCounts.get(platform);
  if (!counts) {
    counts = new Map();
    ruleCounts.set(platform, counts);
  }
  let count = counts.get(language);
  if (!count) {
    const known = counts;
    count = platform.getJson<RuleSearchResponse>('rules/search', { languages: language, ps: 1 }, signal).then(
      (data) => data.total,
      (error: unknown) => {
        // A failed count is not remembered
        known.delete(language);
        throw error;
      }
    );
    counts.set(language, count);
  }
  return count;
}

/** `k1=v1;k2=v2`, the activation API form of rule parameters */
export function encodeRuleParams(params?: Record<string, string>): string | undefined {
  if (!params || Object.keys(params).length === 0) return undefined;
  return Object.entries(params)
    .map(([k, v]) => `${k}=${v}`)
    .join(';');
}

export interface RuleChanges {
  activated: number;
  deactivated: number;
  failed: number;
}

export class QualityProfile implements RemoteObject<QualityProfileData> {
  readonly kind = 'qualityProfile' as const;
  private ruleSet?: RuleSet;

  constructor(readonly platform: Platform, public payload: QualityProfileData) {}

  /** Server side profile key */
  get key(): string {
    return this.payload.key;
  }

  get name(): string {
    return this.payload.name;
  }

  get language(): string {
    return this.payload.language;
  }

  get parentName(): string | undefined {
    return this.payload.parentName;
  }

  get isDefault(): boolean {
    return this.payload.isDefault ?? false;
  }

  get isBuiltIn(): boolean {
    return this.payload.isBuiltIn ?? false;
  }

  cacheFields(): string[] {
    return [this.language, this.name];
  }

  url(): string {
    return this.platform.pageUrl(
      `profiles/show?language=${encodeURIComponent(this.language)}&name=${encodeURIComponent(this.name)}`
    );
  }

  toString(): string {
    return `quality profile '${this.name}' of language '${this.language}'`;
  }

  /**
   * Active rules with their severity and parameters
   */
  async rules(signal?: AbortSignal): Promise<RuleSet> {
    if (this.ruleSet) return this.ruleSet;
    const rules: RuleSet = {};
    let page = 1;
    for (;;) {
      const data = await onLiveObject(this, () =>
        this.platform.getJson<RuleSearchResponse>(
          'rules/search',
          { qprofile: this.key, activation: true, f: 'actives', p: page, ps: DEFAULT_PAGE_SIZE },
          signal
        )
      );
      for (const rule of data.rules) {
        const active = data.actives?.[rule.key]?.find((a) => a.qProfile === this.key);
        if (!active) continue;
        const activation: RuleActivation = { severity: active.severity };
        if (active.params && active.params.length > 0) {
          activation.params = Object.fromEntries(active.params.map((p) => [p.key, p.value]));
        }
        rules[rule.key] = activation;
      }
      if (data.rules.length === 0 || page * data.ps >= data.total) break;
      page++;
    }
    this.ruleSet = rules;
    return rules;
  }

  async toExport(signal?: AbortSignal): Promise<QualityProfileExport> {
    const data: QualityProfileExport = { name: this.name, language: this.language };
    if (this.parentName) data.parentName = this.parentName;
    if (this.isDefault) data.isDefault = true;
    if (this.isBuiltIn) {
      data.isBuiltIn = true;
    } else {
      data.rules = await this.rules(signal);
    }
    return data;
  }

  async setParent(parentName: string | undefined, signal?: AbortSignal): Promise<void> {
    if (parentName === this.parentName) return;
    await this.platform.post(
      'qualityprofiles/change_parent',
      { language: this.language, qualityProfile: this.name, parentQualityProfile: parentName ?? '' },
      signal
    );
    this.payload = { ...this.payload, parentName, isInherited: parentName !== undefined };
    this.ruleSet = undefined;
  }

  async setAsDefault(signal?: AbortSignal): Promise<void> {
    await this.platform.post('qualityprofiles/set_default', { language: this.language, qualityProfile: this.name }, signal);
    this.payload = { ...this.payload, isDefault: true };
  }

  async activateRule(rule: string, activation: RuleActivation, signal?: AbortSignal): Promise<void> {
    await this.platform.post(
      'qualityprofiles/activate_rule',
      { key: this.key, rule, severity: activation.severity, params: encodeRuleParams(activation.params) },
      signal
    );
  }

  async deactivateRule(rule: string, signal?: AbortSignal): Promise<void> {
    await this.platform.post('qualityprofiles/deactivate_rule', { key: this.key, rule }, signal);
  }

  /**
   * Bring the active rules to `target`. A rule the server refuses is logged
   * and counted, the others still apply.
   */
  async applyRules(target: RuleSet, signal?: AbortSignal): Promise<RuleChanges> {
    if (this.isBuiltIn) {
      return { activated: 0, deactivated: 0, failed: 0 };
    }
    const diff: RuleDiff = diffRules(target, await this.rules(signal));
    const changes: RuleChanges = { activated: 0, deactivated: 0, failed: 0 };
    if (isEmptyRuleDiff(diff)) return changes;
    for (const [rule, activation] of Object.entries({ ...diff.added, ...diff.modified })) {
      try {
        await this.activateRule(rule, activation, signal);
        changes.activated++;
      } catch (error) {
        changes.failed++;
        log.warn(`Cannot activate rule ${rule} in ${this}`, { error: errorMessage(error) });
      }
    }
    for (const rule of diff.removed) {
      try {
        await this.deactivateRule(rule, signal);
        changes.deactivated++;
      } catch (error) {
        changes.failed++;
        log.warn(`Cannot deactivate rule ${rule} in ${this}`, { error: errorMessage(error) });
      }
    }
    this.ruleSet = applyRuleDiff(this.ruleSet ?? {}, diff);
    return changes;
  }

  /**
   * First built-in profile up the parent chain
   */
  async builtInAncestor(signal?: AbortSignal): Promise<QualityProfile | undefined> {
    let parentName = this.parentName;
    const seen = new Set<string>([this.name]);
    while (parentName !== undefined && !seen.has(parentName)) {
      seen.add(parentName);
      const parent = await getQualityProfile(this.platform, this.language, parentName, signal);
      if (parent.isBuiltIn) return parent;
      parentName = parent.parentName;
    }
    return undefined;
  }

  async audit(context: AuditContext): Promise<AuditProblem[]> {
    if (this.isBuiltIn) {
      log.debug(`${this} is built-in, skipping audit`);
      return [];
    }
    const { settings, now, signal } = context;
    const problems: AuditProblem[] = [];

    const changeAge = ageInDays(this.payload.rulesUpdatedAt, now);
    if (changeAge !== undefined && changeAge > settings.number('audit.qualityProfiles.maxLastChangeAge')) {
      problems.push(createProblem('QP_LAST_CHANGE_DATE', this, [changeAge]));
    }

    const total = await countLanguageRules(this.platform, this.language, signal);
    const active = this.payload.activeRuleCount ?? 0;
    if (active < Math.floor(total * settings.number('audit.qualityProfiles.minNumberOfRules'))) {
      problems.push(createProblem('QP_TOO_FEW_RULES', this, [active, total]));
    }

    const useAge = ageInDays(this.payload.lastUsed, now);
    if (!this.isDefault && ((this.payload.projectCount ?? 0) === 0 || useAge === undefined)) {
      problems.push(createProblem('QP_NOT_USED', this));
    } else if (useAge !== undefined && useAge > settings.number('audit.qualityProfiles.maxUnusedAge')) {
      problems.push(createProblem('QP_LAST_USED_DATE', this, [useAge]));
    }

    if (settings.boolean('audit.qualityProfiles.checkDeprecatedRules')) {
      const ancestor = await this.builtInAncestor(signal);
      const allowed = ancestor?.payload.activeDeprecatedRuleCount ?? 0;
      const deprecated = this.payload.activeDeprecatedRuleCount ?? 0;
      if (deprecated > allowed) {
        problems.push(createProblem('QP_USE_DEPRECATED_RULES', this, [deprecated]));
      }
    }
    return problems;
  }
}

function cacheProfile(platform: Platform, data: QualityProfileData): QualityProfile {
  return platform.cache.upsert(
    'qualityProfile',
    [data.language, data.name],
    () => new QualityProfile(platform, data),
    (profile) => {
      profile.payload = data;
    }
  );
}

export async function listQualityProfiles(
  platform: Platform,
  language?: string,
  signal?: AbortSignal
): Promise<QualityProfile[]> {
  const data = await platform.getJson<QualityProfileSearchResponse>('qualityprofiles/search', { language }, signal);
  return data.profiles.map((profile) => cacheProfile(platform, profile));
}

export async function getQualityProfile(
  platform: Platform,
  language: string,
  name: string,
  signal?: AbortSignal
): Promise<QualityProfile> {
  return platform.cache.getOrCreate('qualityProfile', [language, name], async (buildSignal) => {
    const data = await platform.getJson<QualityProfileSearchResponse>(
      'qualityprofiles/search',
      { language, qualityProfile: name },
      buildSignal
    );
    const profile = data.profiles.find((p) => p.name === name && p.language === language);
    if (!profile) {
      throw new ObjectNotFoundError(name, `Quality profile '${name}' of language '${language}' not found`);
    }
    return new QualityProfile(platform, profile);
  }, signal);
}

export async function createQualityProfile(
  platform: Platform,
  language: string,
  name: string,
  signal?: AbortSignal
): Promise<QualityProfile> {
  await createRemote(`${language}:${name}`, () =>
    platform.post('qualityprofiles/create', { language, name }, signal)
  );
  return getQualityProfile(platform, language, name, signal);
}
