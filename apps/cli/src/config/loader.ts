import { cosmiconfig } from 'cosmiconfig';
import * as path from 'path';
import * as fs from 'fs';
import { ConfigError } from '../platform/errors';
import { DEFAULT_CONFIG, ResolvedConfig, SqconfConfig } from './types';

const MODULE_NAME = 'sqconf';

const OUTPUT_FORMATS = ['csv', 'json'];

const POSITIVE_INTEGERS = ['threads', 'taskTimeoutMs'] as const;
const NON_NEGATIVE_INTEGERS = ['maxRetries', 'retryBaseDelayMs'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown, min: number): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= min;
}

/**
 * Check a raw configuration object
 * @throws ConfigError naming the first invalid key
 */
export function validateConfig(config: unknown): asserts config is SqconfConfig {
  if (!isRecord(config)) {
    throw new ConfigError('Configuration must be an object');
  }
  for (const key of ['url', 'token', 'csvSeparator'] as const) {
    if (config[key] !== undefined && typeof config[key] !== 'string') {
      throw new ConfigError(`${key} must be a string`);
    }
  }
  if (typeof config.url === 'string' && !/^https?:\/\//.test(config.url)) {
    throw new ConfigError('url must start with http:// or https://');
  }
  for (const key of POSITIVE_INTEGERS) {
    if (config[key] !== undefined && !isInteger(config[key], 1)) {
      throw new ConfigError(`${key} must be a positive integer`);
    }
  }
  for (const key of NON_NEGATIVE_INTEGERS) {
    if (config[key] !== undefined && !isInteger(config[key], 0)) {
      throw new ConfigError(`${key} must be a non-negative integer`);
    }
  }
  if (config.outputFormat !== undefined && !OUTPUT_FORMATS.includes(String(config.outputFormat))) {
    throw new ConfigError(`outputFormat must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  if (typeof config.csvSeparator === 'string' && config.csvSeparator.length !== 1) {
    throw new ConfigError('csvSeparator must be a single character');
  }
  if (config.withUrl !== undefined && typeof config.withUrl !== 'boolean') {
    throw new ConfigError('withUrl must be a boolean');
  }
  if (config.audit !== undefined) {
    if (!isRecord(config.audit)) {
      throw new ConfigError('audit must be an object of setting values');
    }
    for (const [key, value] of Object.entries(config.audit)) {
      if (!['string', 'number', 'boolean'].includes(typeof value)) {
        throw new ConfigError(`audit setting ${key} must be a string, a number or a boolean`);
      }
    }
  }
}

/**
 * Configuration loader using cosmiconfig
 * Searches for configuration in the following order:
 * 1. --config CLI option path
 * 2. "sqconf" key in package.json
 * 3. .sqconf.json, .sqconf.yaml or .sqconf.yml in current directory
 * 4. sqconf.config.js or sqconf.config.cjs in current directory
 * 5. Same search in parent directories up to the nearest package.json
 * SQCONF_URL and SQCONF_TOKEN fill url and token when the file leaves them out.
 */
export class ConfigLoader {
  private explorer = cosmiconfig(MODULE_NAME, {
    searchStrategy: 'project',
    searchPlaces: [
      'package.json',
      `.${MODULE_NAME}.json`,
      `.${MODULE_NAME}.yaml`,
      `.${MODULE_NAME}.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load configuration from file or search for it
   * @param configPath Optional explicit path to config file
   * @returns Merged configuration with defaults
   */
  async load(configPath?: string): Promise<ResolvedConfig> {
    let result;

    if (configPath) {
      const absolutePath = path.resolve(configPath);
      if (!fs.existsSync(absolutePath)) {
        throw new ConfigError(`Configuration file not found: ${absolutePath}`);
      }
      result = await this.explorer.load(absolutePath);
    } else {
      result = await this.explorer.search();
    }

    const userConfig: unknown = result?.config ?? {};
    validateConfig(userConfig);
    return this.mergeWithDefaults(userConfig);
  }

  /**
   * Get the path where config was found
   * @returns Path to config file or null if not found
   */
  async getConfigPath(configPath?: string): Promise<string | null> {
    if (configPath) {
      const absolutePath = path.resolve(configPath);
      return fs.existsSync(absolutePath) ? absolutePath : null;
    }

    const result = await this.explorer.search();
    return result?.filepath ?? null;
  }

  private mergeWithDefaults(userConfig: SqconfConfig): ResolvedConfig {
    return {
      ...DEFAULT_CONFIG,
      ...userConfig,
      url: userConfig.url ?? this.env.SQCONF_URL,
      token: userConfig.token ?? this.env.SQCONF_TOKEN,
    };
  }

  /**
   * Validate configuration values
   * @throws ConfigError if configuration is invalid
   */
  validate(config: unknown): asserts config is SqconfConfig {
    validateConfig(config);
  }
}

/**
 * Singleton instance for convenience
 */
export const configLoader = new ConfigLoader();
