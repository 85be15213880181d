/**
 * Plumbing shared by the server commands: global options, the platform
 * and worker pool built from configuration, output sinks and the top level
 * error handler.
 */

import { Command } from 'commander';
import * as fs from 'fs';
import { PassThrough, Writable } from 'stream';
import { configLoader } from '../config';
import { ResolvedConfig } from '../config/types';
import { ExitCodeHandler, TerminalFormatter } from '../formatters';
import { createLogger, Logger, LogLevel, setLogLevel } from '../logger';
import { parseSections, SectionSelection } from '../objects/sections';
import { ConfigError, TokenMissingError, errorMessage } from '../platform/errors';
import { Platform } from '../platform/platform';
import { HttpTransport } from '../platform/transport';
import { TaskRunner } from '../runner/task-runner';

export const VERSION = '0.1.0';

export interface GlobalOptions {
  url?: string;
  token?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface SelectionOptions {
  what?: string;
  key?: string;
  threads?: string;
}

export interface RunContext {
  config: ResolvedConfig;
  platform: Platform;
  runner: TaskRunner;
  formatter: TerminalFormatter;
  log: Logger;
}

export function globalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  const text = (name: string): string | undefined => {
    const value = opts[name];
    return typeof value === 'string' ? value : undefined;
  };
  return {
    url: text('url'),
    token: text('token'),
    config: text('config'),
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  };
}

export function applyLogLevel(options: GlobalOptions): void {
  if (options.verbose) {
    setLogLevel(LogLevel.Debug);
  } else if (options.quiet) {
    setLogLevel(LogLevel.Warn);
  }
}

export function parsePositiveInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function parseRegexp(pattern: string | undefined, name: string): RegExp | undefined {
  if (pattern === undefined) return undefined;
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`${name} is not a valid regular expression: ${errorMessage(error)}`);
  }
}

export function parseSelection(options: SelectionOptions): SectionSelection & { keyRegexp?: RegExp } {
  return { ...parseSections(options.what), keyRegexp: parseRegexp(options.key, '--key') };
}

/**
 * Configuration, platform and worker pool for one command run.
 * Command line options win over the configuration file, which wins over
 * the environment.
 */
export async function createContext(command: Command, options: SelectionOptions = {}): Promise<RunContext> {
  const global = globalOptions(command);
  applyLogLevel(global);
  const config = await configLoader.load(global.config);
  const url = global.url ?? config.url;
  if (!url) {
    throw new ConfigError('No server URL: use --url, the url config key or SQCONF_URL');
  }
  const token = global.token ?? config.token;
  if (!token) {
    throw new TokenMissingError();
  }
  const log = createLogger({ component: 'cli' });
  const platform = new Platform({
    url,
    transport: new HttpTransport({ url, token, userAgent: `sqconf/${VERSION}` }),
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
  });
  const runner = new TaskRunner({
    concurrency: parsePositiveInteger(options.threads, '--threads') ?? config.threads,
    taskTimeoutMs: config.taskTimeoutMs,
  });
  return { config: { ...config, url, token }, platform, runner, formatter: new TerminalFormatter(global), log };
}

/**
 * File or standard output. Standard output is never ended, only the
 * pass-through in front of it.
 */
export function openSink(file: string | undefined, log: Logger): Writable {
  const sink: Writable = file ? fs.createWriteStream(file, { encoding: 'utf-8' }) : new PassThrough();
  if (sink instanceof PassThrough) {
    sink.pipe(process.stdout, { end: false });
  }
  // Write errors also reach the pending write callbacks, which report them
  sink.on('error', (error) => log.debug('Output stream error', { error: error.message }));
  return sink;
}

/**
 * Run a command body, printing any error and setting the exit code
 */
export async function runCommand(command: Command, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    const { verbose } = globalOptions(command);
    const handler = new ExitCodeHandler();
    const exitCode = handler.getExitCode(error);
    process.stderr.write(`${new TerminalFormatter({ verbose }).formatError(error)}\n`);
    if (verbose) {
      process.stderr.write(`Exiting with code ${exitCode}: ${handler.getExitCodeDescription(exitCode)}\n`);
    }
    process.exitCode = exitCode;
  }
}
