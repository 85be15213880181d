/**
 * Formatters Module
 * Exports all output formatters for CLI
 */

export {
  TerminalFormatter,
  TerminalFormatterOptions,
  AuditTotals,
  ExportTotals,
} from './terminal.formatter';

export { ExitCodeHandler } from './exit-codes';
