/**
 * Configuration export
 * Writes one JSON document section by section. Objects are exported
 * concurrently and streamed into the document as they complete; an object
 * whose export failed is still listed, with a FAILED status.
 */

import type { Writable } from 'stream';
import type {
  ExportSection,
  ExportType,
  FailedExport,
  PlatformExport,
  QualityProfileExport,
  TaskFailure,
} from '@sqconf/types';
import { createLogger, Logger } from '../logger';
import { UnsupportedOperationError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { QualityProfile } from '../objects/quality-profile';
import { listSection, matchesKey } from '../objects/sections';
import { AnyRemoteObject } from '../objects/types';
import { TaskRunner } from '../runner/task-runner';
import { indentContinuation, jsonObjectEncoder, KeyedEntry } from '../writer/encoders';
import { END_OF_STREAM, endSink, ResultWriter, writeChunk } from '../writer/result-writer';
import { nestQualityProfiles } from './profiles';

export interface ExportRunOptions {
  sections: readonly ExportSection[];
  /** Sections named by the user: an unsupported one is fatal, not skipped */
  explicit: boolean;
  keyRegexp?: RegExp;
  exportType: ExportType;
}

export interface ExportSummary {
  exported: number;
  total: number;
  skippedSections: ExportSection[];
}

export function failedExport(failure: TaskFailure): FailedExport {
  return { exportStatus: `FAILED/${failure.kind === 'DOMAIN_ERROR' ? failure.code : failure.kind}` };
}

/**
 * Export payload of one object
 */
export async function exportObject(obj: AnyRemoteObject, migration: boolean, signal?: AbortSignal): Promise<unknown> {
  switch (obj.kind) {
    case 'project':
      return obj.toExport({ migration, signal });
    case 'qualityGate':
    case 'qualityProfile':
    case 'portfolio':
    case 'application':
      return obj.toExport(signal);
    case 'group':
    case 'user':
      return obj.toExport();
    case 'branch':
      return obj.toMigration();
  }
}

function pretty(value: unknown, indent: string): string {
  return indentContinuation(JSON.stringify(value, null, 2), indent);
}

export class ConfigExporter {
  private readonly log: Logger;

  constructor(
    private readonly platform: Platform,
    private readonly runner: TaskRunner,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ component: 'export' });
  }

  async platformInfo(exportType: ExportType): Promise<PlatformExport> {
    return {
      url: this.platform.url,
      version: await this.platform.version(),
      edition: await this.platform.edition(),
      serverId: await this.platform.serverId(),
      exportType,
      exportedAt: new Date().toISOString(),
    };
  }

  /**
   * Write the export document to `sink` and end it
   */
  async run(sink: Writable, options: ExportRunOptions): Promise<ExportSummary> {
    const summary: ExportSummary = { exported: 0, total: 0, skippedSections: [] };
    const info = await this.platformInfo(options.exportType);
    await writeChunk(sink, `{\n  "platform": ${pretty(info, '  ')}`);

    for (const section of options.sections) {
      let objects: AnyRemoteObject[];
      try {
        objects = await listSection(this.platform, section);
      } catch (error) {
        if (error instanceof UnsupportedOperationError && !options.explicit) {
          this.log.warn(`${error.message}, skipping ${section}`);
          summary.skippedSections.push(section);
          continue;
        }
        throw error;
      }
      const selected = objects.filter((obj) => matchesKey(obj, options.keyRegexp));
      this.log.info(`--- Exporting ${selected.length} ${section} ---`);
      summary.total += selected.length;
      await writeChunk(sink, `,\n  ${JSON.stringify(section)}: `);
      summary.exported +=
        section === 'qualityProfiles'
          ? await this.exportProfiles(sink, selected)
          : await this.exportSection(sink, section, selected, options.exportType === 'migration');
    }

    await writeChunk(sink, '\n}\n');
    await endSink(sink);
    this.log.info(`${summary.exported}/${summary.total} objects exported`);
    return summary;
  }

  private async exportSection(
    sink: Writable,
    section: ExportSection,
    objects: readonly AnyRemoteObject[],
    migration: boolean
  ): Promise<number> {
    const writer = new ResultWriter<KeyedEntry>();
    writer.start(sink, { encoder: jsonObjectEncoder(1), closeSink: false, logger: this.log });
    let exported = 0;
    const stream = this.runner
      .withLabel(`Exporting ${section}`)
      .stream(objects, (obj, signal) => exportObject(obj, migration, signal), String);
    for await (const result of stream) {
      if (result.outcome.status === 'success') {
        exported++;
        await writer.submit([{ key: result.item.key, value: result.outcome.value }]);
      } else {
        await writer.submit([{ key: result.item.key, value: failedExport(result.outcome.failure) }]);
      }
    }
    await writer.submit(END_OF_STREAM);
    await writer.finished();
    return exported;
  }

  /**
   * Profiles are nested by parent, so the whole section is gathered before
   * it is written. A profile that failed stays in the tree, with its FAILED
   * status instead of rules, so that its children keep their parent.
   */
  private async exportProfiles(sink: Writable, objects: readonly AnyRemoteObject[]): Promise<number> {
    const profiles = objects.filter((obj): obj is QualityProfile => obj instanceof QualityProfile);
    const flat: QualityProfileExport[] = [];
    let exported = 0;
    const stream = this.runner
      .withLabel('Exporting qualityProfiles')
      .stream(profiles, (profile, signal) => profile.toExport(signal), String);
    for await (const { item, outcome } of stream) {
      if (outcome.status === 'success') {
        exported++;
        flat.push(outcome.value);
      } else {
        const placeholder: QualityProfileExport = { name: item.name, language: item.language, ...failedExport(outcome.failure) };
        if (item.parentName !== undefined) placeholder.parentName = item.parentName;
        flat.push(placeholder);
      }
    }
    const nested = nestQualityProfiles(flat, this.log);
    const writer = new ResultWriter<KeyedEntry>();
    writer.start(sink, { encoder: jsonObjectEncoder(1), closeSink: false, logger: this.log });
    await writer.submit(Object.entries(nested).map(([key, value]) => ({ key, value })));
    await writer.submit(END_OF_STREAM);
    await writer.finished();
    return exported;
  }
}
