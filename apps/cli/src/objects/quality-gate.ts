/**
 * Quality gates
 */

import type {
  AuditProblem,
  QualityGateCondition,
  QualityGateData,
  QualityGateExport,
  QualityGateListResponse,
  QualityGateProjectsResponse,
  QualityGateShowResponse,
} from '@sqconf/types';
import gateConditions from '../audit/gate-conditions.json';
import { createProblem } from '../audit/rules';
import { AuditContext } from '../audit/settings';
import { createLogger } from '../logger';
import { ObjectNotFoundError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { decodeCondition, encodeCondition } from './gate-conditions';
import { createRemote, onLiveObject } from './remote';
import { RemoteObject } from './types';

interface RecommendedRange {
  min: number;
  max: number;
  reason: string;
}

const RECOMMENDED_CONDITIONS: Readonly<Record<string, RecommendedRange>> = gateConditions;

const log = createLogger({ component: 'qualityGate' });

export class QualityGate implements RemoteObject<QualityGateData> {
  readonly kind = 'qualityGate' as const;
  private conditionList?: QualityGateCondition[];

  constructor(readonly platform: Platform, public payload: QualityGateData) {}

  get key(): string {
    return this.payload.name;
  }

  get name(): string {
    return this.payload.name;
  }

  get isDefault(): boolean {
    return this.payload.isDefault ?? false;
  }

  get isBuiltIn(): boolean {
    return this.payload.isBuiltIn ?? false;
  }

  cacheFields(): string[] {
    return [this.payload.name];
  }

  url(): string {
    return this.platform.pageUrl(`quality_gates/show/${encodeURIComponent(this.name)}`);
  }

  toString(): string {
    return `quality gate '${this.name}'`;
  }

  async conditions(signal?: AbortSignal): Promise<QualityGateCondition[]> {
    if (!this.conditionList) {
      const data = await onLiveObject(this, () =>
        this.platform.getJson<QualityGateShowResponse>('qualitygates/show', { name: this.name }, signal)
      );
      this.conditionList = data.conditions ?? [];
    }
    return this.conditionList;
  }

  async encodedConditions(signal?: AbortSignal): Promise<string[]> {
    return (await this.conditions(signal)).map(encodeCondition).sort();
  }

  /** Number of projects explicitly associated with the gate */
  async projectCount(signal?: AbortSignal): Promise<number> {
    const data = await this.platform.getJson<QualityGateProjectsResponse>(
      'qualitygates/search',
      { gateName: this.name, selected: 'selected', ps: 1 },
      signal
    );
    return data.paging.total;
  }

  /**
   * Replace all conditions. Built-in gates are left untouched.
   */
  async setConditions(encoded: readonly string[], signal?: AbortSignal): Promise<void> {
    if (this.isBuiltIn) {
      log.debug(`Not changing conditions of built-in ${this}`);
      return;
    }
    const current = await this.encodedConditions(signal);
    const target = [...encoded].sort();
    if (current.length === target.length && current.every((c, i) => c === target[i])) {
      return;
    }
    for (const condition of await this.conditions(signal)) {
      await this.platform.post('qualitygates/delete_condition', { id: condition.id }, signal);
    }
    for (const text of target) {
      const { metric, op, error } = decodeCondition(text);
      await this.platform.post('qualitygates/create_condition', { gateName: this.name, metric, op, error }, signal);
    }
    this.conditionList = undefined;
  }

  async setAsDefault(signal?: AbortSignal): Promise<void> {
    await this.platform.post('qualitygates/set_as_default', { name: this.name }, signal);
    this.payload = { ...this.payload, isDefault: true };
  }

  private auditConditions(conditions: readonly QualityGateCondition[]): AuditProblem[] {
    const problems: AuditProblem[] = [];
    for (const condition of conditions) {
      const range = RECOMMENDED_CONDITIONS[condition.metric];
      if (!range) {
        problems.push(createProblem('QG_WRONG_METRIC', this, [condition.metric]));
        continue;
      }
      const threshold = Number(condition.error);
      if (threshold < range.min || threshold > range.max) {
        problems.push(createProblem('QG_WRONG_THRESHOLD', this, [condition.metric, range.reason]));
      }
    }
    return problems;
  }

  async audit(context: AuditContext): Promise<AuditProblem[]> {
    if (this.isBuiltIn) return [];
    const { settings, signal } = context;
    const problems: AuditProblem[] = [];
    const conditions = await this.conditions(signal);
    const maxConditions = settings.number('audit.qualityGates.maxConditions');
    if (conditions.length === 0) {
      problems.push(createProblem('QG_NO_COND', this));
    } else if (conditions.length > maxConditions) {
      problems.push(createProblem('QG_TOO_MANY_COND', this, [conditions.length, maxConditions]));
    }
    problems.push(...this.auditConditions(conditions));
    if (!this.isDefault && (await this.projectCount(signal)) === 0) {
      problems.push(createProblem('QG_NOT_USED', this));
    }
    return problems;
  }

  async toExport(signal?: AbortSignal): Promise<QualityGateExport> {
    const data: QualityGateExport = {};
    if (this.isDefault) data.isDefault = true;
    if (this.isBuiltIn) {
      data.isBuiltIn = true;
      return data;
    }
    data.conditions = await this.encodedConditions(signal);
    return data;
  }
}

function cacheGate(platform: Platform, data: QualityGateData): QualityGate {
  return platform.cache.upsert(
    'qualityGate',
    [data.name],
    () => new QualityGate(platform, data),
    (gate) => {
      gate.payload = data;
    }
  );
}

export async function listQualityGates(platform: Platform, signal?: AbortSignal): Promise<QualityGate[]> {
  const data = await platform.getJson<QualityGateListResponse>('qualitygates/list', {}, signal);
  return data.qualitygates.map((gate) => cacheGate(platform, gate));
}

export async function getQualityGate(platform: Platform, name: string, signal?: AbortSignal): Promise<QualityGate> {
  return platform.cache.getOrCreate('qualityGate', [name], async (buildSignal) => {
    const gates = await platform.getJson<QualityGateListResponse>('qualitygates/list', {}, buildSignal);
    const data = gates.qualitygates.find((gate) => gate.name === name);
    if (!data) {
      throw new ObjectNotFoundError(name, `Quality gate '${name}' not found`);
    }
    return new QualityGate(platform, data);
  }, signal);
}

export async function createQualityGate(platform: Platform, name: string, signal?: AbortSignal): Promise<QualityGate> {
  await createRemote(name, () => platform.post('qualitygates/create', { name }, signal));
  return getQualityGate(platform, name, signal);
}
