import { promises as fs } from 'fs';
import type { ConfigExport, FailedExport } from '@sqconf/types';
import { ConfigError, OutputError, UnsupportedOperationError, errorMessage } from '../platform/errors';
import { SECTIONS } from '../objects/sections';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Entry written for an object whose export failed
 */
export function isFailedExport(value: unknown): value is FailedExport {
  return isRecord(value) && typeof value.exportStatus === 'string' && value.exportStatus.startsWith('FAILED/');
}

/**
 * Validate an export document before import.
 * Migration exports carry time-sensitive data and are never imported.
 */
export function parseExportDocument(text: string, source = 'input'): ConfigExport {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${errorMessage(error)}`);
  }
  if (!isRecord(parsed) || !isRecord(parsed.platform)) {
    throw new ConfigError(`${source} is not an export document: "platform" is missing`);
  }
  const { exportType } = parsed.platform;
  if (exportType === 'migration') {
    throw new UnsupportedOperationError(`${source} is a migration export, which cannot be imported`);
  }
  if (exportType !== undefined && exportType !== 'config') {
    throw new ConfigError(`${source} has unknown export type '${String(exportType)}'`);
  }
  for (const section of SECTIONS) {
    const content = parsed[section];
    if (content !== undefined && !isRecord(content)) {
      throw new ConfigError(`${source}: "${section}" must be an object`);
    }
  }
  return parsed as unknown as ConfigExport;
}

export async function readExportFile(path: string): Promise<ConfigExport> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new OutputError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parseExportDocument(text, path);
}
