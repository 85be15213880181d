import { AuditSettings, createAuditContext } from '../audit/settings';
import { UnsupportedOperationError } from '../platform/errors';
import { Platform } from '../platform/platform';
import { FakeTransport, withServerFacts } from '../testing/fake-transport';
import { getApplication, listApplications } from './application';

function setup(projects: string[], edition = 'enterprise', devsPermissions = ['admin', 'user']) {
  const transport = withServerFacts(new FakeTransport(), edition)
    .get('components/search', () => ({
      paging: { pageIndex: 1, pageSize: 500, total: 1 },
      components: [{ key: 'APP', name: 'Shop' }],
    }))
    .get('applications/show', () => ({
      application: {
        key: 'APP',
        name: 'Shop',
        description: 'Online shop',
        visibility: 'private',
        projects: projects.map((key) => ({ key })),
      },
    }))
    .get('permissions/users', () => ({ paging: { pageIndex: 1, pageSize: 500, total: 0 }, users: [] }))
    .get('permissions/groups', () => ({
      paging: { pageIndex: 1, pageSize: 500, total: 1 },
      groups: [{ name: 'devs', permissions: devsPermissions }],
    }))
    .post('applications/add_project')
    .post('applications/remove_project');
  return { transport, platform: new Platform({ url: 'http://localhost:9000', transport, maxRetries: 0 }) };
}

describe('Application', () => {
  it('should not be listed on editions without applications', async () => {
    const { platform } = setup([], 'community');

    await expect(listApplications(platform)).rejects.toThrow(UnsupportedOperationError);
  });

  it('should report empty and single project applications', async () => {
    const context = createAuditContext(new AuditSettings());

    const [empty] = await listApplications(setup([]).platform);
    const [single] = await listApplications(setup(['p1']).platform);
    const [full] = await listApplications(setup(['p1', 'p2']).platform);

    expect((await empty.audit(context)).map((p) => p.message)).toEqual(["application 'APP' contains no project"]);
    expect((await single.audit(context)).map((p) => p.ruleId)).toEqual(['APPLICATION_SINGLETON']);
    await expect(full.audit(context)).resolves.toEqual([]);
  });

  it('should report applications nobody administers', async () => {
    const [app] = await listApplications(setup(['p1', 'p2'], 'enterprise', ['user']).platform);

    const problems = await app.audit(createAuditContext(new AuditSettings()));

    expect(problems.map((p) => [p.ruleId, p.message])).toEqual([
      ['OBJECT_WITH_NO_ADMIN_PERMISSION', "application 'APP' has no user or group with admin permission"],
    ]);
  });

  it('should export its projects sorted and its permissions', async () => {
    const { platform } = setup(['p2', 'p1']);

    const app = await getApplication(platform, 'APP');

    await expect(app.toExport()).resolves.toEqual({
      name: 'Shop',
      description: 'Online shop',
      visibility: 'private',
      projects: ['p1', 'p2'],
      permissions: { groups: { devs: ['admin', 'user'] } },
    });
  });

  it('should add and remove projects to match', async () => {
    const { transport, platform } = setup(['p1', 'p2']);
    const app = await getApplication(platform, 'APP');

    await app.setProjects(['p2', 'p3']);

    expect(transport.calls.filter((c) => c.method === 'POST').map((c) => [c.path, c.params.project])).toEqual([
      ['applications/add_project', 'p3'],
      ['applications/remove_project', 'p1'],
    ]);
    await expect(app.projectKeys()).resolves.toEqual(['p2', 'p3']);
    expect(transport.callsTo('applications/show')).toHaveLength(1);
  });
});
