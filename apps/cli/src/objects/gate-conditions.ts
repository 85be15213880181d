/**
 * Quality gate conditions in their exported text form:
 * `"<metric> <op> <threshold>"`, e.g. `new_coverage <= 80` or
 * `new_security_rating >= A`
 */

import type { QualityGateCondition } from '@sqconf/types';
import { ConfigError } from '../platform/errors';

export interface DecodedCondition {
  metric: string;
  op: 'GT' | 'LT';
  error: string;
}

const RATING_LETTERS = ['A', 'B', 'C', 'D', 'E'];

function isRatingMetric(metric: string): boolean {
  return metric.endsWith('rating');
}

export function ratingLetter(value: string): string {
  const index = Number(value) - 1;
  return RATING_LETTERS[index] ?? value;
}

export function ratingValue(letter: string): string {
  const index = RATING_LETTERS.indexOf(letter.toUpperCase());
  return index >= 0 ? String(index + 1) : letter;
}

export function encodeCondition(condition: Pick<QualityGateCondition, 'metric' | 'op' | 'error'>): string {
  const op = condition.op === 'GT' ? '>=' : condition.op === 'LT' ? '<=' : condition.op;
  const threshold = isRatingMetric(condition.metric) ? ratingLetter(condition.error) : condition.error;
  return `${condition.metric} ${op} ${threshold}`;
}

export function decodeCondition(text: string): DecodedCondition {
  const parts = text.trim().split(/\s+/);
  if (parts.length !== 3) {
    throw new ConfigError(`Invalid quality gate condition '${text}'`);
  }
  const [metric, symbol, threshold] = parts;
  let op: DecodedCondition['op'];
  if (symbol === '>=' || symbol === '>' || symbol === 'GT') {
    op = 'GT';
  } else if (symbol === '<=' || symbol === '<' || symbol === 'LT') {
    op = 'LT';
  } else {
    throw new ConfigError(`Invalid operator '${symbol}' in quality gate condition '${text}'`);
  }
  return { metric, op, error: isRatingMetric(metric) ? ratingValue(threshold) : threshold };
}
