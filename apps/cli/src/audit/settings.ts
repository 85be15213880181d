/**
 * Audit settings
 * Thresholds and switches of the audit rules: defaults from
 * audit-defaults.json, then configuration file overrides, then command line
 * `key=value` overrides, later sources winning.
 */

import type { SettingValue, Settings } from '@sqconf/types';
import { ConfigError } from '../platform/errors';
import auditDefaults from './audit-defaults.json';

export const DEFAULT_AUDIT_SETTINGS: Settings = auditDefaults;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Convert a textual value: booleans and numbers are recognized
 */
export function parseSettingValue(raw: string): SettingValue {
  const value = raw.trim();
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value !== '' && !Number.isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * Parse `key=value` pairs given on the command line
 */
export function parseSettingOverrides(pairs: readonly string[]): Record<string, SettingValue> {
  const overrides: Record<string, SettingValue> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ConfigError(`Invalid setting '${pair}', expected key=value`);
    }
    overrides[pair.slice(0, separator).trim()] = parseSettingValue(pair.slice(separator + 1));
  }
  return overrides;
}

export class AuditSettings {
  private readonly values: Settings;

  constructor(...layers: Array<Settings | undefined>) {
    this.values = layers.reduce<Settings>((merged, layer) => ({ ...merged, ...layer }), DEFAULT_AUDIT_SETTINGS);
  }

  get(key: string): SettingValue | undefined {
    return this.values[key];
  }

  private require(key: string): SettingValue {
    const value = this.values[key];
    if (value === undefined) {
      throw new ConfigError(`Unknown audit setting '${key}'`);
    }
    return value;
  }

  number(key: string): number {
    const value = this.require(key);
    const parsed = typeof value === 'string' ? parseSettingValue(value) : value;
    if (typeof parsed !== 'number') {
      throw new ConfigError(`Audit setting '${key}' must be a number, got '${String(value)}'`);
    }
    return parsed;
  }

  boolean(key: string): boolean {
    const value = this.require(key);
    const parsed = typeof value === 'string' ? parseSettingValue(value) : value;
    if (typeof parsed !== 'boolean') {
      throw new ConfigError(`Audit setting '${key}' must be true or false, got '${String(value)}'`);
    }
    return parsed;
  }

  /** Comma separated values, blanks dropped */
  list(key: string): string[] {
    return String(this.require(key))
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  toJSON(): Settings {
    return { ...this.values };
  }
}

/**
 * What every object audit receives
 */
export interface AuditContext {
  settings: AuditSettings;
  /** Reference date for every age computation of the run */
  now: Date;
  signal?: AbortSignal;
}

export function createAuditContext(settings = new AuditSettings(), now = new Date()): AuditContext {
  return { settings, now };
}

/**
 * Whole days elapsed since `date`, undefined for a missing or invalid date
 */
export function ageInDays(date: string | undefined, now: Date): number | undefined {
  if (!date) return undefined;
  const time = Date.parse(date);
  if (Number.isNaN(time)) return undefined;
  return Math.floor((now.getTime() - time) / MS_PER_DAY);
}
