/**
 * Audit orchestration
 * Lists each requested section, fans object audits out over the task runner
 * and streams every object's problems into the result writer.
 */

import type { AuditProblem, ExportSection } from '@sqconf/types';
import { createLogger, Logger } from '../logger';
import { UnsupportedOperationError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { Project } from '../objects/project';
import { QualityGate } from '../objects/quality-gate';
import { QualityProfile } from '../objects/quality-profile';
import { listSection, matchesKey } from '../objects/sections';
import { AnyRemoteObject } from '../objects/types';
import { TaskRunner } from '../runner/task-runner';
import { ResultWriter } from '../writer/result-writer';
import { createProblem } from './rules';
import { AuditContext } from './settings';

export interface AuditRunOptions {
  sections: readonly ExportSection[];
  /** Sections named by the user: an unsupported one is fatal, not skipped */
  explicit: boolean;
  keyRegexp?: RegExp;
  context: AuditContext;
}

export interface AuditSummary {
  audited: number;
  failed: number;
  skippedSections: ExportSection[];
}

/**
 * Checks spanning a whole section rather than one object
 */
export function auditSection(
  platform: Platform,
  section: ExportSection,
  objects: readonly AnyRemoteObject[],
  context: AuditContext
): AuditProblem[] {
  const { settings } = context;
  if (section === 'qualityGates') {
    const max = settings.number('audit.qualityGates.maxNumber');
    const count = objects.filter((obj) => obj instanceof QualityGate).length;
    if (count > max) {
      return [createProblem('QG_TOO_MANY_GATES', platform.pageUrl('quality_gates'), [count, max])];
    }
  }
  if (section === 'qualityProfiles') {
    const max = settings.number('audit.qualityProfiles.maxNumberPerLanguage');
    const perLanguage = new Map<string, number>();
    for (const obj of objects) {
      if (obj instanceof QualityProfile) {
        perLanguage.set(obj.language, (perLanguage.get(obj.language) ?? 0) + 1);
      }
    }
    return [...perLanguage]
      .filter(([, count]) => count > max)
      .map(([language, count]) =>
        createProblem('QP_TOO_MANY_QP', platform.pageUrl(`profiles?language=${encodeURIComponent(language)}`), [
          count,
          language,
          max,
        ])
      );
  }
  if (section === 'projects' && settings.boolean('audit.projects.duplicates')) {
    return duplicateProjects(objects.filter((obj): obj is Project => obj instanceof Project));
  }
  return [];
}

/**
 * A project whose key extends another project's key is likely the same code
 * analyzed twice
 */
function duplicateProjects(projects: readonly Project[]): AuditProblem[] {
  return projects.flatMap((project) =>
    projects
      .filter((other) => other !== project && project.key.startsWith(other.key))
      .map((other) => createProblem('PROJ_DUPLICATE', project, [other.key]))
  );
}

export async function auditObject(obj: AnyRemoteObject, context: AuditContext): Promise<AuditProblem[]> {
  return obj.audit(context);
}

export class Auditor {
  private readonly log: Logger;

  constructor(
    private readonly platform: Platform,
    private readonly runner: TaskRunner,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ component: 'audit' });
  }

  /**
   * Audit the requested sections. The caller owns the writer and submits
   * END_OF_STREAM once this resolves.
   */
  async run(writer: ResultWriter<AuditProblem>, options: AuditRunOptions): Promise<AuditSummary> {
    const summary: AuditSummary = { audited: 0, failed: 0, skippedSections: [] };
    for (const section of options.sections) {
      if (options.context.settings.get(`audit.${section}`) === false) {
        this.log.info(`Auditing of ${section} is disabled, skipping`);
        summary.skippedSections.push(section);
        continue;
      }
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
      this.log.info(`--- Auditing ${section} ---`);
      await writer.submit(auditSection(this.platform, section, objects, options.context));

      const selected = objects.filter((obj) => matchesKey(obj, options.keyRegexp));
      const stream = this.runner
        .withLabel(`Auditing ${section}`)
        .stream(selected, (obj, signal) => auditObject(obj, { ...options.context, signal }), String);
      for await (const result of stream) {
        if (result.outcome.status === 'success') {
          summary.audited++;
          await writer.submit(result.outcome.value);
        } else {
          summary.failed++;
        }
      }
    }
    return summary;
  }
}
