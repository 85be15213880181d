import type { RequestParams } from '@sqconf/types';
import { AuditSettings, createAuditContext } from '../audit/settings';
import { setLogHandler, resetLogHandler } from '../logger';
import { ApiError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { FakeTransport } from '../testing/fake-transport';
import { encodeRuleParams, QualityProfile } from './quality-profile';

const NOW = new Date('2026-06-01T00:00:00Z');

function rulesPage(params: RequestParams) {
  if (params.qprofile === undefined) {
    return { total: 100, p: 1, ps: 1, rules: [] };
  }
  const page = Number(params.p);
  const rules = page === 1 ? [{ key: 'java:S1' }, { key: 'java:S2' }] : [{ key: 'java:S3' }];
  return {
    total: 3,
    p: page,
    ps: 2,
    rules,
    actives: {
      'java:S1': [{ qProfile: 'qp-1', severity: 'MAJOR', params: [] }],
      'java:S2': [{ qProfile: 'qp-1', severity: 'MINOR', params: [{ key: 'max', value: '10' }] }],
      'java:S3': [{ qProfile: 'other', severity: 'INFO' }],
    },
  };
}

describe('QualityProfile', () => {
  let transport: FakeTransport;
  let platform: Platform;

  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  beforeEach(() => {
    transport = new FakeTransport().get('rules/search', rulesPage);
    platform = new Platform({ url: 'http://localhost:9000', transport, maxRetries: 0 });
  });

  const profile = (extra: Partial<ConstructorParameters<typeof QualityProfile>[1]> = {}) =>
    new QualityProfile(platform, { key: 'qp-1', name: 'Strict', language: 'java', ...extra });

  it('should collect its active rules across pages, once', async () => {
    const qp = profile();

    const rules = await qp.rules();
    await qp.rules();

    expect(rules).toEqual({
      'java:S1': { severity: 'MAJOR' },
      'java:S2': { severity: 'MINOR', params: { max: '10' } },
    });
    expect(transport.callsTo('rules/search')).toHaveLength(2);
  });

  it('should export built-in profiles without their rules', async () => {
    await expect(profile({ isBuiltIn: true, isDefault: true }).toExport()).resolves.toEqual({
      name: 'Strict',
      language: 'java',
      isDefault: true,
      isBuiltIn: true,
    });
    expect(transport.calls).toEqual([]);
  });

  it('should export the parent name and the full rule set', async () => {
    const exported = await profile({ parentName: 'Base' }).toExport();
    expect(exported.parentName).toBe('Base');
    expect(Object.keys(exported.rules ?? {})).toEqual(['java:S1', 'java:S2']);
  });

  it('should activate, update and deactivate rules to reach a target', async () => {
    transport.post('qualityprofiles/activate_rule').post('qualityprofiles/deactivate_rule');
    const qp = profile();

    const changes = await qp.applyRules({
      'java:S2': { severity: 'MAJOR', params: { max: '10' } },
      'java:S9': { severity: 'BLOCKER' },
    });

    expect(changes).toEqual({ activated: 2, deactivated: 1, failed: 0 });
    expect(transport.callsTo('qualityprofiles/activate_rule').map((c) => c.params)).toEqual([
      { key: 'qp-1', rule: 'java:S9', severity: 'BLOCKER', params: undefined },
      { key: 'qp-1', rule: 'java:S2', severity: 'MAJOR', params: 'max=10' },
    ]);
    expect(transport.callsTo('qualityprofiles/deactivate_rule').map((c) => c.params)).toEqual([
      { key: 'qp-1', rule: 'java:S1' },
    ]);
    await expect(qp.rules()).resolves.toEqual({
      'java:S2': { severity: 'MAJOR', params: { max: '10' } },
      'java:S9': { severity: 'BLOCKER' },
    });
  });

  it('should make no call when the rules already match', async () => {
    const changes = await profile().applyRules({
      'java:S1': { severity: 'MAJOR' },
      'java:S2': { severity: 'MINOR', params: { max: '10' } },
    });

    expect(changes).toEqual({ activated: 0, deactivated: 0, failed: 0 });
    expect(transport.calls.filter((c) => c.method === 'POST')).toEqual([]);
  });

  it('should count refused rules and apply the others', async () => {
    transport
      .post('qualityprofiles/activate_rule', (params) => {
        if (params.rule === 'java:S8') throw new ApiError(400, 'Rule java:S8 is not available');
        return {};
      })
      .post('qualityprofiles/deactivate_rule');

    const changes = await profile().applyRules({
      'java:S1': { severity: 'MAJOR' },
      'java:S2': { severity: 'MINOR', params: { max: '10' } },
      'java:S8': { severity: 'MAJOR' },
      'java:S9': { severity: 'MAJOR' },
    });

    expect(changes).toEqual({ activated: 1, deactivated: 0, failed: 1 });
  });

  it('should change its parent and forget its cached rules', async () => {
    transport.post('qualityprofiles/change_parent');
    const qp = profile();
    await qp.rules();

    await qp.setParent('Base');
    await qp.setParent('Base');

    expect(transport.callsTo('qualityprofiles/change_parent')).toHaveLength(1);
    expect(qp.parentName).toBe('Base');
    await qp.rules();
    expect(transport.callsTo('rules/search')).toHaveLength(4);
  });

  describe('audit', () => {
    it('should report too few rules and no use', async () => {
      const qp = profile({ activeRuleCount: 20, projectCount: 0, rulesUpdatedAt: '2026-05-01T00:00:00Z' });

      const problems = await qp.audit(createAuditContext(new AuditSettings(), NOW));

      expect(problems.map((p) => p.ruleId)).toEqual(['QP_TOO_FEW_RULES', 'QP_NOT_USED']);
      expect(problems[0].message).toBe("quality profile 'Strict' of language 'java' has 20 active rules out of 100 available for its language");
    });

    it('should report old changes and last use against the settings', async () => {
      const qp = profile({
        activeRuleCount: 80,
        projectCount: 3,
        rulesUpdatedAt: '2025-01-01T00:00:00Z',
        lastUsed: '2026-01-01T00:00:00Z',
      });
      const settings = new AuditSettings({ 'audit.qualityProfiles.checkDeprecatedRules': false });

      const problems = await qp.audit(createAuditContext(settings, NOW));

      expect(problems.map((p) => [p.ruleId, p.message])).toEqual([
        ['QP_LAST_CHANGE_DATE', "quality profile 'Strict' of language 'java' has not been updated for 516 days"],
        ['QP_LAST_USED_DATE', "quality profile 'Strict' of language 'java' has not been used for 151 days"],
      ]);
    });

    it('should skip built-in profiles', async () => {
      await expect(profile({ isBuiltIn: true }).audit(createAuditContext())).resolves.toEqual([]);
    });
  });
});

describe('encodeRuleParams', () => {
  it('should join parameters and omit empty ones', () => {
    expect(encodeRuleParams({ max: '10', format: '^[a-z]+$' })).toBe('max=10;format=^[a-z]+$');
    expect(encodeRuleParams({})).toBeUndefined();
    expect(encodeRuleParams()).toBeUndefined();
  });
});
