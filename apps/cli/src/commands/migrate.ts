import { Command } from 'commander';
import { exportAction } from './export';

/**
 * Export enriched with what a migration to another server needs: project
 * branches, last analysis dates and background task status. Such an
 * export cannot be imported back.
 */
export const migrateCommand = new Command('migrate')
  .description('Export the configuration with migration data (not importable)')
  .option('-w, --what <sections>', 'Object types to export, comma separated (default: all)')
  .option('-k, --key <regexp>', 'Only export objects whose key matches')
  .option('-f, --file <path>', 'Write the export to a file instead of standard output')
  .option('--threads <n>', 'Number of concurrent workers');

migrateCommand.action(exportAction(migrateCommand, 'migration'));
