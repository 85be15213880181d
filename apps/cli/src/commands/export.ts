import { Command } from 'commander';
import type { ExportType } from '@sqconf/types';
import { ConfigExporter } from '../export/exporter';
import { createContext, openSink, parseSelection, runCommand, SelectionOptions } from './shared';

export interface ExportOptions extends SelectionOptions {
  file?: string;
}

/**
 * Body shared by `export` and `migrate`, which differ only by export type
 */
export function exportAction(command: Command, exportType: ExportType) {
  return async (options: ExportOptions): Promise<void> => {
    await runCommand(command, async () => {
      const selection = parseSelection(options);
      const { platform, runner, formatter, log } = await createContext(command, options);
      const exporter = new ConfigExporter(platform, runner, log);
      const summary = await exporter.run(openSink(options.file, log), { ...selection, exportType });
      process.stderr.write(`${formatter.formatExportSummary(summary)}\n`);
    });
  };
}

export const exportCommand = new Command('export')
  .description('Export the server configuration as JSON')
  .option('-w, --what <sections>', 'Object types to export, comma separated (default: all)')
  .option('-k, --key <regexp>', 'Only export objects whose key matches')
  .option('-f, --file <path>', 'Write the export to a file instead of standard output')
  .option('--threads <n>', 'Number of concurrent workers');

exportCommand.action(exportAction(exportCommand, 'config'));
