/**
 * Terminal Output Formatter
 * Run summaries and errors, printed on stderr beside the log
 */

import chalk from 'chalk';
import type { ExportSection, ImportSummary, Severity } from '@sqconf/types';
import { ResolvedConfig } from '../config/types';
import { SqconfError, errorMessage } from '../platform/errors';

/**
 * Severity color mapping
 */
const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  CRITICAL: chalk.bgRed.white.bold,
  HIGH: chalk.red.bold,
  MEDIUM: chalk.yellow,
  LOW: chalk.green,
};

const SEVERITY_ORDER: readonly Severity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

/**
 * Hints shown under an error, by error code
 */
const ERROR_HINTS: Record<string, string> = {
  AUTHENTICATION: 'Check the token given with --token, the config file or SQCONF_TOKEN',
  PERMISSION_DENIED: 'The token user lacks the permission this operation needs',
  TOKEN_MISSING: 'Run `sqconf config init` or pass --token',
  UNSUPPORTED_OPERATION: 'Restrict the run with --what to the object types the server supports',
};

export interface TerminalFormatterOptions {
  verbose?: boolean;
}

export interface AuditTotals {
  problems: number;
  bySeverity: Partial<Record<Severity, number>>;
  skippedSections: readonly ExportSection[];
}

export interface ExportTotals {
  exported: number;
  total: number;
  skippedSections: readonly ExportSection[];
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Terminal formatter for CLI output
 */
export class TerminalFormatter {
  private options: Required<TerminalFormatterOptions>;

  constructor(options: TerminalFormatterOptions = {}) {
    this.options = {
      verbose: options.verbose ?? false,
    };
  }

  formatAuditSummary(totals: AuditTotals): string {
    const lines: string[] = [];
    const headline = `${plural(totals.problems, 'problem')} found`;
    lines.push(totals.problems === 0 ? chalk.green(headline) : chalk.bold(headline));

    const breakdown = SEVERITY_ORDER.filter((severity) => (totals.bySeverity[severity] ?? 0) > 0).map(
      (severity) => `${SEVERITY_COLORS[severity](severity)} ${totals.bySeverity[severity] ?? 0}`
    );
    if (breakdown.length > 0) {
      lines.push(`  ${breakdown.join('  ')}`);
    }
    lines.push(...this.formatSkipped(totals.skippedSections));
    return lines.join('\n');
  }

  formatExportSummary(totals: ExportTotals): string {
    const headline = `${totals.exported}/${totals.total} objects exported successfully`;
    const lines = [totals.exported === totals.total ? chalk.green(headline) : chalk.yellow(headline)];
    lines.push(...this.formatSkipped(totals.skippedSections));
    return lines.join('\n');
  }

  /**
   * One line per imported object type
   */
  formatImportSummary(summaries: readonly ImportSummary[]): string {
    if (summaries.length === 0) {
      return chalk.dim('Nothing to import');
    }
    const width = Math.max(...summaries.map((s) => s.section.length));
    return summaries
      .map((s) => {
        const counts = `created ${s.created}, updated ${s.updated}, failed ${s.failed}`;
        const skipped = s.skipped > 0 ? `, skipped ${s.skipped}` : '';
        const line = `${s.section.padEnd(width)}  ${counts}${skipped}`;
        return s.failed > 0 ? chalk.yellow(line) : line;
      })
      .join('\n');
  }

  private formatSkipped(sections: readonly ExportSection[]): string[] {
    return sections.length > 0 ? [chalk.dim(`Skipped: ${sections.join(', ')}`)] : [];
  }

  /**
   * Effective configuration, token masked
   */
  formatConfig(config: ResolvedConfig, source: string | null): string {
    const shown = { ...config, token: config.token ? '********' : undefined };
    const lines = [chalk.bold(source ? `Configuration from ${source}` : 'No configuration file, defaults apply')];
    for (const [key, value] of Object.entries(shown)) {
      if (value === undefined) continue;
      lines.push(`  ${chalk.cyan(key)}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
    }
    return lines.join('\n');
  }

  /**
   * Format error message
   */
  formatError(error: unknown): string {
    const lines = [chalk.red(`Error: ${errorMessage(error)}`)];
    if (error instanceof SqconfError) {
      const hint = ERROR_HINTS[error.code];
      if (hint) lines.push(chalk.dim(`  ${hint}`));
    }
    if (this.options.verbose && error instanceof Error && error.stack) {
      lines.push(chalk.dim(error.stack));
    }
    return lines.join('\n');
  }

  /**
   * Format success message
   */
  formatSuccess(message: string): string {
    return chalk.green(message);
  }
}

