import type { AuditProblem, ExportSection } from '@sqconf/types';
import { resetLogHandler, setLogHandler } from '../logger';
import { UnsupportedOperationError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { TaskRunner } from '../runner/task-runner';
import { FakeTransport, withServerFacts } from '../testing/fake-transport';
import { MemorySink } from '../testing/memory-sink';
import { jsonArrayEncoder } from '../writer/encoders';
import { END_OF_STREAM, ResultWriter } from '../writer/result-writer';
import { Project } from '../objects/project';
import { Auditor, AuditRunOptions, auditSection, AuditSummary } from './auditor';
import { problemToJson, ProblemJson } from './problem';
import { AuditSettings, createAuditContext } from './settings';

function setup(edition = 'enterprise') {
  const transport = withServerFacts(new FakeTransport(), edition)
    .get('user_groups/search', () => ({
      paging: { pageIndex: 1, pageSize: 500, total: 2 },
      groups: [
        { name: 'devs', membersCount: 0 },
        { name: 'ops', membersCount: 3 },
      ],
    }))
    .get('qualitygates/list', () => ({
      qualitygates: [
        { name: 'Built', isBuiltIn: true, isDefault: true },
        { name: 'Empty' },
        { name: 'Loose' },
      ],
    }))
    .get('qualitygates/show', (params) => ({
      name: params.name,
      conditions: params.name === 'Loose' ? [{ id: 1, metric: 'new_coverage', op: 'LT', error: '10' }] : [],
    }))
    .get('qualitygates/search', (params) => ({
      paging: { pageIndex: 1, pageSize: 1, total: params.gateName === 'Loose' ? 2 : 0 },
      results: [],
    }));
  const platform = new Platform({ url: 'http://localhost:9000', transport, maxRetries: 0 });
  const auditor = new Auditor(platform, new TaskRunner({ concurrency: 2 }));
  return { transport, auditor };
}

async function audit(
  auditor: Auditor,
  sections: ExportSection[],
  options: Partial<AuditRunOptions> = {}
): Promise<{ problems: ProblemJson[]; summary: AuditSummary }> {
  const sink = new MemorySink();
  const writer = new ResultWriter<AuditProblem>();
  writer.start(sink, { encoder: jsonArrayEncoder((p: AuditProblem) => problemToJson(p)) });
  const summary = await auditor
    .run(writer, { sections, explicit: false, context: createAuditContext(), ...options })
    .finally(() => writer.submit(END_OF_STREAM));
  await writer.finished();
  const problems: ProblemJson[] = JSON.parse(sink.text);
  return { problems: problems.sort((a, b) => a.message.localeCompare(b.message)), summary };
}

describe('Auditor', () => {
  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  it('should report empty groups', async () => {
    const { auditor } = setup();

    const { problems, summary } = await audit(auditor, ['groups']);

    expect(problems).toEqual([
      { problem: 'GROUP_EMPTY', type: 'GOVERNANCE', severity: 'LOW', message: "group 'devs' has no members" },
    ]);
    expect(summary).toEqual({ audited: 2, failed: 0, skippedSections: [] });
  });

  it('should audit quality gate conditions and usage', async () => {
    const { auditor } = setup();

    const { problems } = await audit(auditor, ['qualityGates']);

    expect(problems.map((p) => [p.problem, p.message])).toEqual([
      ['QG_NO_COND', "quality gate 'Empty' has no conditions"],
      ['QG_NOT_USED', "quality gate 'Empty' is not the default and is used by no project"],
      [
        'QG_WRONG_THRESHOLD',
        "quality gate 'Loose' condition on metric 'new_coverage': Coverage below 20% is too low a bar, above 90% is overkill",
      ],
    ]);
  });

  it('should report too many quality gates', async () => {
    const { auditor } = setup();
    const context = createAuditContext(new AuditSettings({ 'audit.qualityGates.maxNumber': 2 }));

    const { problems } = await audit(auditor, ['qualityGates'], { context });

    expect(problems.filter((p) => p.problem === 'QG_TOO_MANY_GATES').map((p) => p.message)).toEqual([
      'There are 3 quality gates, more than the 2 recommended',
    ]);
  });

  it('should only audit objects matching the key filter', async () => {
    const { transport, auditor } = setup();

    const { summary } = await audit(auditor, ['qualityGates'], { keyRegexp: /^Loose$/ });

    expect(summary.audited).toBe(1);
    expect(transport.callsTo('qualitygates/show').map((c) => c.params.name)).toEqual(['Loose']);
  });

  it('should skip disabled sections', async () => {
    const { transport, auditor } = setup();
    const context = createAuditContext(new AuditSettings({ 'audit.groups': false }));

    const { problems, summary } = await audit(auditor, ['groups'], { context });

    expect(problems).toEqual([]);
    expect(summary.skippedSections).toEqual(['groups']);
    expect(transport.callsTo('user_groups/search')).toEqual([]);
  });

  it('should skip sections the edition lacks unless requested', async () => {
    const { auditor } = setup('community');

    const { summary } = await audit(auditor, ['portfolios', 'groups']);

    expect(summary.skippedSections).toEqual(['portfolios']);
    expect(summary.audited).toBe(2);
  });

  it('should fail on a requested section the edition lacks', async () => {
    const { auditor } = setup('community');

    await expect(audit(auditor, ['portfolios'], { explicit: true })).rejects.toThrow(UnsupportedOperationError);
  });
});

describe('auditSection', () => {
  const platform = new Platform({ url: 'http://localhost:9000', transport: new FakeTransport(), maxRetries: 0 });
  const projects = ['shop', 'shop-legacy', 'billing'].map((key) => new Project(platform, { key, name: key }));

  it('should report projects whose key extends another project key', () => {
    const problems = auditSection(platform, 'projects', projects, createAuditContext());

    expect(problems.map((p) => [p.ruleId, p.message, p.url])).toEqual([
      ['PROJ_DUPLICATE', "project 'shop-legacy' may be a duplicate of project 'shop'", 'http://localhost:9000/dashboard?id=shop-legacy'],
    ]);
  });

  it('should not look for duplicates when disabled', () => {
    const context = createAuditContext(new AuditSettings({ 'audit.projects.duplicates': false }));

    expect(auditSection(platform, 'projects', projects, context)).toEqual([]);
  });
});
