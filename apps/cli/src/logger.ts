/**
 * Level-based logger with context fields.
 * The default handler prints one coloured line per entry on stderr so that
 * stdout stays free for exported data. Tests swap it with setLogHandler().
 */

import chalk from 'chalk';

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.Debug]: chalk.gray,
  [LogLevel.Info]: chalk.cyan,
  [LogLevel.Warn]: chalk.yellow,
  [LogLevel.Error]: chalk.red.bold,
};

function formatContext(context: Record<string, unknown>): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${chalk.dim(parts.join(' '))}` : '';
}

const defaultLogHandler: LogHandler = (entry: LogEntry) => {
  const level = LEVEL_COLORS[entry.level](entry.level.toUpperCase().padEnd(5));
  process.stderr.write(
    `${chalk.dim(entry.timestamp)} ${level} ${entry.message}${formatContext(entry.context)}\n`
  );
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the log handler (tests, alternative sinks) */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Restore the stderr handler */
export function resetLogHandler(): void {
  currentHandler = defaultLogHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Create a logger whose entries all carry the given context fields */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}
