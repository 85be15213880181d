import { Command } from 'commander';
import { createAuditContext } from '../audit/settings';
import { resetLogHandler, setLogHandler } from '../logger';
import { ConfigError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { TaskRunner } from '../runner/task-runner';
import { FakeTransport, withServerFacts } from '../testing/fake-transport';
import { MemorySink } from '../testing/memory-sink';
import { AuditReportOptions, parseProblemTypes, parseSeverities, resolveFormat, writeAuditReport } from './audit';
import { buildInitConfig } from './config';
import { globalOptions, parsePositiveInteger, parseSelection } from './shared';

describe('audit options', () => {
  it('should parse severities case insensitively', () => {
    expect(parseSeverities('high, low')).toEqual(['HIGH', 'LOW']);
    expect(parseSeverities(undefined)).toBeUndefined();
    expect(() => parseSeverities('urgent')).toThrow("Unknown severity 'URGENT'");
  });

  it('should parse problem types', () => {
    expect(parseProblemTypes('governance,bad_practice')).toEqual(['GOVERNANCE', 'BAD_PRACTICE']);
    expect(() => parseProblemTypes('style')).toThrow(ConfigError);
  });

  it('should pick the format from the option, then the file extension', () => {
    expect(resolveFormat('json', 'report.csv', 'csv')).toBe('json');
    expect(resolveFormat(undefined, 'report.JSON', 'csv')).toBe('json');
    expect(resolveFormat(undefined, 'report.csv', 'json')).toBe('csv');
    expect(resolveFormat(undefined, 'report.txt', 'json')).toBe('json');
    expect(resolveFormat(undefined, undefined, 'csv')).toBe('csv');
    expect(() => resolveFormat('xml', undefined, 'csv')).toThrow("Unknown output format 'xml', expected csv or json");
  });
});

describe('writeAuditReport', () => {
  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  function platform(): Platform {
    const transport = withServerFacts(new FakeTransport()).get('user_groups/search', () => ({
      paging: { pageIndex: 1, pageSize: 500, total: 2 },
      groups: [
        { name: 'devs', membersCount: 0 },
        { name: 'ops', membersCount: 2 },
      ],
    }));
    return new Platform({ url: 'http://localhost:9000', transport, maxRetries: 0 });
  }

  const options = (overrides: Partial<AuditReportOptions> = {}): AuditReportOptions => ({
    sections: ['groups'],
    explicit: true,
    context: createAuditContext(),
    filter: {},
    format: 'csv',
    withUrl: false,
    separator: ',',
    ...overrides,
  });

  it('should lead every CSV row with the server id', async () => {
    const sink = new MemorySink();

    const report = await writeAuditReport(platform(), new TaskRunner({ concurrency: 1 }), sink, options());

    expect(sink.text).toBe(
      "Server Id,Problem,Type,Severity,Message\ntest-server-id,GROUP_EMPTY,GOVERNANCE,LOW,group 'devs' has no members\n"
    );
    expect(report).toEqual({ problems: 1, bySeverity: { LOW: 1 }, skippedSections: [] });
  });

  it('should put the server id in every JSON record', async () => {
    const sink = new MemorySink();

    await writeAuditReport(platform(), new TaskRunner({ concurrency: 1 }), sink, options({ format: 'json' }));

    expect(JSON.parse(sink.text)).toEqual([
      {
        serverId: 'test-server-id',
        problem: 'GROUP_EMPTY',
        type: 'GOVERNANCE',
        severity: 'LOW',
        message: "group 'devs' has no members",
      },
    ]);
  });

  it('should count only the problems passing the filter', async () => {
    const sink = new MemorySink();

    const report = await writeAuditReport(
      platform(),
      new TaskRunner({ concurrency: 1 }),
      sink,
      options({ filter: { severities: ['HIGH'] } })
    );

    expect(report.problems).toBe(0);
    expect(sink.text).toBe('Server Id,Problem,Type,Severity,Message\n');
  });
});

describe('shared options', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInteger('4', '--threads')).toBe(4);
    expect(parsePositiveInteger(undefined, '--threads')).toBeUndefined();
    expect(() => parsePositiveInteger('0', '--threads')).toThrow("--threads must be a positive integer, got '0'");
    expect(() => parsePositiveInteger('2.5', '--threads')).toThrow(ConfigError);
  });

  it('should parse the section selection and key filter', () => {
    const selection = parseSelection({ what: 'groups,gates', key: '^dev' });

    expect(selection.sections).toEqual(['groups', 'qualityGates']);
    expect(selection.explicit).toBe(true);
    expect(selection.keyRegexp?.test('devs')).toBe(true);
    expect(() => parseSelection({ key: '(' })).toThrow(/^--key is not a valid regular expression: /);
  });

  it('should read global options through a subcommand', () => {
    const program = new Command().option('--url <url>').option('--verbose');
    const sub = program.command('run').action(() => undefined);

    program.parse(['node', 'sqconf', '--url', 'http://localhost:9000', '--verbose', 'run']);

    expect(globalOptions(sub)).toEqual({
      url: 'http://localhost:9000',
      token: undefined,
      config: undefined,
      verbose: true,
      quiet: false,
    });
  });
});

describe('buildInitConfig', () => {
  it('should keep the given answers', () => {
    expect(buildInitConfig({ url: ' http://localhost:9000 ', token: 'test-secret', threads: 4 })).toEqual({
      url: 'http://localhost:9000',
      token: 'test-secret',
      threads: 4,
      outputFormat: 'csv',
    });
  });

  it('should leave blank answers out', () => {
    expect(buildInitConfig({ url: '', token: '   ', threads: undefined })).toEqual({ threads: 8, outputFormat: 'csv' });
  });

  it('should reject an invalid url', () => {
    expect(() => buildInitConfig({ url: 'localhost:9000' })).toThrow('url must start with http:// or https://');
  });
});
