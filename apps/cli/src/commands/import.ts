import { Command } from 'commander';
import { readExportFile } from '../export/document';
import { ConfigImporter } from '../export/importer';
import { createContext, parseSelection, runCommand, SelectionOptions } from './shared';

interface ImportOptions extends SelectionOptions {
  file: string;
}

export const importCommand = new Command('import')
  .description('Create or update server objects from an export file')
  .requiredOption('-f, --file <path>', 'Export file to import')
  .option('-w, --what <sections>', 'Object types to import, comma separated (default: all)')
  .option('-k, --key <regexp>', 'Only import objects whose key matches')
  .option('--threads <n>', 'Number of concurrent workers')
  .action(async (options: ImportOptions) => {
    await runCommand(importCommand, async () => {
      const selection = parseSelection(options);
      // Read before connecting: a bad file fails fast
      const doc = await readExportFile(options.file);
      const { platform, runner, formatter, log } = await createContext(importCommand, options);
      const importer = new ConfigImporter(platform, runner, log);
      const summaries = await importer.run(doc, selection);
      process.stderr.write(`${formatter.formatImportSummary(summaries)}\n`);
      if (summaries.some((s) => s.failed > 0)) {
        log.warn('Some objects could not be imported, see the messages above');
      }
    });
  });
