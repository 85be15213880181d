/**
 * Audit problem output: CSV or JSON encoding and the filtering policy
 * applied by the writer just before serialization.
 */

import type { AuditProblem, ProblemType, Severity } from '@sqconf/types';
import { csvEncoder, CsvColumn, jsonArrayEncoder, OutputFormat, RecordEncoder } from '../writer/encoders';

export interface ProblemOutputOptions {
  format: OutputFormat;
  withUrl?: boolean;
  /** Adds a server id column or field */
  serverId?: string;
  separator?: string;
}

export interface ProblemFilter {
  severities?: readonly Severity[];
  types?: readonly ProblemType[];
  /** Matched against the rule id */
  problems?: RegExp;
}

export interface ProblemJson {
  serverId?: string;
  problem: string;
  type: string;
  severity: string;
  message: string;
  url?: string;
}

export function problemUrl(problem: AuditProblem): string {
  if (problem.url !== undefined) return problem.url;
  return typeof problem.subject === 'string' ? '' : problem.subject.url();
}

export function problemToJson(problem: AuditProblem, options: Omit<ProblemOutputOptions, 'format'> = {}): ProblemJson {
  const json: ProblemJson = {
    problem: problem.ruleId,
    type: problem.type,
    severity: problem.severity,
    message: problem.message,
  };
  if (options.withUrl) json.url = problemUrl(problem);
  return options.serverId !== undefined ? { serverId: options.serverId, ...json } : json;
}

export function problemEncoder(options: ProblemOutputOptions): RecordEncoder<AuditProblem> {
  if (options.format === 'json') {
    return jsonArrayEncoder((problem) => problemToJson(problem, options));
  }
  const columns: CsvColumn<AuditProblem>[] = [];
  const { serverId } = options;
  if (serverId !== undefined) {
    columns.push({ title: 'Server Id', value: () => serverId });
  }
  columns.push(
    { title: 'Problem', value: (p) => p.ruleId },
    { title: 'Type', value: (p) => p.type },
    { title: 'Severity', value: (p) => p.severity },
    { title: 'Message', value: (p) => p.message }
  );
  if (options.withUrl) {
    columns.push({ title: 'URL', value: problemUrl });
  }
  return csvEncoder(columns, options.separator);
}

export function problemFilter(filter: ProblemFilter): (problem: AuditProblem) => boolean {
  return (problem) =>
    (!filter.severities || filter.severities.includes(problem.severity)) &&
    (!filter.types || filter.types.includes(problem.type)) &&
    (!filter.problems || filter.problems.test(problem.ruleId));
}
