import { Command } from 'commander';
import type { Writable } from 'stream';
import type { AuditProblem, ProblemType, Severity } from '@sqconf/types';
import { Auditor, AuditRunOptions } from '../audit/auditor';
import { problemEncoder, problemFilter, ProblemFilter } from '../audit/problem';
import { isProblemType, isSeverity } from '../audit/rules';
import { AuditSettings, createAuditContext, parseSettingOverrides } from '../audit/settings';
import { AuditTotals } from '../formatters';
import { Logger } from '../logger';
import { ConfigError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { TaskRunner } from '../runner/task-runner';
import { OutputFormat } from '../writer/encoders';
import { END_OF_STREAM, ResultWriter } from '../writer/result-writer';
import { createContext, openSink, parseRegexp, parseSelection, runCommand } from './shared';

interface AuditOptions {
  what?: string;
  key?: string;
  threads?: string;
  severities?: string;
  types?: string;
  problems?: string;
  file?: string;
  format?: string;
  csvSeparator?: string;
  withUrl?: boolean;
  setting: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

export function parseSeverities(value: string | undefined): Severity[] | undefined {
  if (value === undefined) return undefined;
  return splitList(value).map((s) => {
    if (!isSeverity(s)) throw new ConfigError(`Unknown severity '${s}'`);
    return s;
  });
}

export function parseProblemTypes(value: string | undefined): ProblemType[] | undefined {
  if (value === undefined) return undefined;
  return splitList(value).map((t) => {
    if (!isProblemType(t)) throw new ConfigError(`Unknown problem type '${t}'`);
    return t;
  });
}

/**
 * Explicit format first, then the output file extension, then configuration
 */
export function resolveFormat(format: string | undefined, file: string | undefined, fallback: OutputFormat): OutputFormat {
  const chosen = format ?? (file?.toLowerCase().endsWith('.json') ? 'json' : file?.toLowerCase().endsWith('.csv') ? 'csv' : undefined);
  if (chosen === undefined) return fallback;
  if (chosen !== 'csv' && chosen !== 'json') {
    throw new ConfigError(`Unknown output format '${chosen}', expected csv or json`);
  }
  return chosen;
}

export interface AuditReportOptions extends AuditRunOptions {
  filter: ProblemFilter;
  format: OutputFormat;
  withUrl: boolean;
  separator: string;
}

/**
 * Audit the platform and write every reported problem to `sink`, each
 * record carrying the id of the audited server
 */
export async function writeAuditReport(
  platform: Platform,
  runner: TaskRunner,
  sink: Writable,
  options: AuditReportOptions,
  log?: Logger
): Promise<AuditTotals> {
  const bySeverity: Partial<Record<Severity, number>> = {};
  const accepts = problemFilter(options.filter);
  const writer = new ResultWriter<AuditProblem>();
  writer.start(sink, {
    encoder: problemEncoder({
      format: options.format,
      withUrl: options.withUrl,
      serverId: await platform.serverId(),
      separator: options.separator,
    }),
    filter: (problem) => {
      if (!accepts(problem)) return false;
      bySeverity[problem.severity] = (bySeverity[problem.severity] ?? 0) + 1;
      return true;
    },
    logger: log,
  });

  const summary = await new Auditor(platform, runner, log)
    .run(writer, options)
    .finally(() => writer.submit(END_OF_STREAM));
  const problems = await writer.finished();
  return { problems, bySeverity, skippedSections: summary.skippedSections };
}

export const auditCommand = new Command('audit')
  .description('Audit the server configuration and report problems')
  .option('-w, --what <sections>', 'Object types to audit, comma separated (default: all)')
  .option('-k, --key <regexp>', 'Only audit objects whose key matches')
  .option('--severities <list>', 'Only report these severities, comma separated')
  .option('--types <list>', 'Only report these problem types, comma separated')
  .option('--problems <regexp>', 'Only report problems whose rule id matches')
  .option('-f, --file <path>', 'Write the report to a file instead of standard output')
  .option('--format <format>', 'Report format: csv or json')
  .option('--csv-separator <char>', 'CSV field separator')
  .option('--with-url', 'Add the URL of each problem subject')
  .option('--setting <key=value>', 'Override an audit setting (repeatable)', collect, [])
  .option('--threads <n>', 'Number of concurrent workers')
  .action(async (options: AuditOptions) => {
    await runCommand(auditCommand, async () => {
      const selection = parseSelection(options);
      const filter: ProblemFilter = {
        severities: parseSeverities(options.severities),
        types: parseProblemTypes(options.types),
        problems: parseRegexp(options.problems, '--problems'),
      };
      const { config, platform, runner, formatter, log } = await createContext(auditCommand, options);
      const settings = new AuditSettings(config.audit, parseSettingOverrides(options.setting));
      const format = resolveFormat(options.format, options.file, config.outputFormat);

      const report = await writeAuditReport(
        platform,
        runner,
        openSink(options.file, log),
        {
          ...selection,
          context: createAuditContext(settings),
          filter,
          format,
          withUrl: options.withUrl ?? config.withUrl,
          separator: options.csvSeparator ?? config.csvSeparator,
        },
        log
      );
      process.stderr.write(`${formatter.formatAuditSummary(report)}\n`);
    });
  });
