#!/usr/bin/env node
import { Command } from 'commander';
import { auditCommand } from './commands/audit';
import { configCommand } from './commands/config';
import { exportCommand } from './commands/export';
import { importCommand } from './commands/import';
import { migrateCommand } from './commands/migrate';
import { VERSION } from './commands/shared';

const program = new Command();

program
  .name('sqconf')
  .description('Audit, export, import and migrate the configuration of a code quality server')
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--url <url>', 'Server URL (default: url config key or SQCONF_URL)')
  .option('--token <token>', 'Authentication token (default: token config key or SQCONF_TOKEN)')
  .option('--config <path>', 'Path to configuration file')
  .option('--verbose', 'Log debug messages', false)
  .option('--quiet', 'Only log warnings and errors', false);

program.addCommand(auditCommand);
program.addCommand(exportCommand);
program.addCommand(importCommand);
program.addCommand(migrateCommand);
program.addCommand(configCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exitCode = 1;
});
