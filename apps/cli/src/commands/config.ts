import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import prompts from 'prompts';
import { configLoader, validateConfig } from '../config/loader';
import { SqconfConfig, DEFAULT_CONFIG } from '../config/types';
import { TerminalFormatter } from '../formatters';
import { ConfigError, OutputError, errorMessage } from '../platform/errors';
import { applyLogLevel, globalOptions, runCommand } from './shared';

export const CONFIG_FILENAME = '.sqconf.json';

export const configCommand = new Command('config')
  .description('Manage sqconf configuration');

export interface InitAnswers {
  url?: unknown;
  token?: unknown;
  threads?: unknown;
}

/**
 * Configuration written by `config init`. Blank answers are left out so
 * that the environment can still provide them.
 */
export function buildInitConfig(answers: InitAnswers): SqconfConfig {
  const config: SqconfConfig = {
    threads: DEFAULT_CONFIG.threads,
    outputFormat: DEFAULT_CONFIG.outputFormat,
  };
  if (typeof answers.url === 'string' && answers.url.trim() !== '') {
    config.url = answers.url.trim();
  }
  if (typeof answers.token === 'string' && answers.token.trim() !== '') {
    config.token = answers.token.trim();
  }
  if (typeof answers.threads === 'number' && Number.isInteger(answers.threads) && answers.threads > 0) {
    config.threads = answers.threads;
  }
  validateConfig(config);
  return config;
}

configCommand
  .command('init')
  .description('Initialize a new configuration file')
  .option('--force', 'Overwrite existing configuration file')
  .option('--non-interactive', 'Use default values without prompts')
  .action(async (options: { force?: boolean; nonInteractive?: boolean }) => {
    await runCommand(configCommand, async () => {
      const global = globalOptions(configCommand);
      applyLogLevel(global);
      const configPath = path.resolve(process.cwd(), CONFIG_FILENAME);

      if (fs.existsSync(configPath) && !options.force) {
        throw new ConfigError(`Configuration file already exists: ${configPath}, use --force to overwrite`);
      }

      let answers: InitAnswers = { url: global.url, token: global.token };
      if (!options.nonInteractive) {
        let cancelled = false;
        answers = await prompts(
          [
            {
              type: 'text',
              name: 'url',
              message: 'Server URL',
              initial: global.url ?? 'http://localhost:9000',
              validate: (value: string) => /^https?:\/\//.test(value) || 'Must start with http:// or https://',
            },
            {
              type: 'password',
              name: 'token',
              message: 'Token (leave empty to use SQCONF_TOKEN)',
            },
            {
              type: 'number',
              name: 'threads',
              message: 'Number of concurrent workers',
              initial: DEFAULT_CONFIG.threads,
              min: 1,
            },
          ],
          {
            onCancel: () => {
              cancelled = true;
              return false;
            },
          }
        );
        if (cancelled) {
          process.stderr.write(chalk.yellow('\nConfiguration cancelled.\n'));
          return;
        }
      }

      const config = buildInitConfig(answers);
      try {
        fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n');
      } catch (error) {
        throw new OutputError(`Failed to write configuration file: ${errorMessage(error)}`, { cause: error });
      }
      process.stderr.write(`${new TerminalFormatter(global).formatSuccess(`✓ Configuration file created: ${configPath}`)}\n`);
      process.stderr.write(`${chalk.gray('Run `sqconf config show` to view the effective configuration.')}\n`);
    });
  });

configCommand
  .command('show')
  .description('Display current effective configuration')
  .action(async () => {
    await runCommand(configCommand, async () => {
      const global = globalOptions(configCommand);
      const configPath = await configLoader.getConfigPath(global.config);
      const config = await configLoader.load(global.config);
      const effective = {
        ...config,
        url: global.url ?? config.url,
        token: global.token ?? config.token,
      };
      console.log(new TerminalFormatter(global).formatConfig(effective, configPath));
    });
  });
