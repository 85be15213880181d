/**
 * CLI Configuration Types
 * Supports .sqconf.json or .sqconf.yaml config files
 */

import type { SettingValue } from '@sqconf/types';
import type { OutputFormat } from '../writer/encoders';

export interface SqconfConfig {
  /**
   * Server base URL
   */
  url?: string;

  /**
   * User token, sent as basic auth user with an empty password
   */
  token?: string;

  /**
   * Number of concurrent workers
   * @default 8
   */
  threads?: number;

  /**
   * Timeout of one object's audit, export or import, in milliseconds
   * @default 30000
   */
  taskTimeoutMs?: number;

  /**
   * Retries of a request failing on transport or rate limiting
   * @default 2
   */
  maxRetries?: number;

  /**
   * @default 500
   */
  retryBaseDelayMs?: number;

  /**
   * Audit report format when the output file extension does not tell
   * @default 'csv'
   */
  outputFormat?: OutputFormat;

  /**
   * @default ','
   */
  csvSeparator?: string;

  /**
   * Add the URL of the audited object to each problem
   * @default false
   */
  withUrl?: boolean;

  /**
   * Audit setting overrides, e.g. `{"audit.projects.maxLastAnalysisAge": 90}`
   */
  audit?: Record<string, SettingValue>;
}

type DefaultedKey = 'threads' | 'taskTimeoutMs' | 'maxRetries' | 'retryBaseDelayMs' | 'outputFormat' | 'csvSeparator' | 'withUrl';

export type ResolvedConfig = SqconfConfig & Required<Pick<SqconfConfig, DefaultedKey>>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Required<Pick<SqconfConfig, DefaultedKey>> = {
  threads: 8,
  taskTimeoutMs: 30_000,
  maxRetries: 2,
  retryBaseDelayMs: 500,
  outputFormat: 'csv',
  csvSeparator: ',',
  withUrl: false,
};
