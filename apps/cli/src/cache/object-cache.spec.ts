import { Group } from '../objects/group';
import { Platform } from '../platform/platform';
import { FakeTransport } from '../testing/fake-transport';
import { TransportError } from '../platform/errors';
import { ObjectCache } from './object-cache';

describe('ObjectCache', () => {
  let platform: Platform;
  let cache: ObjectCache;

  beforeEach(() => {
    cache = new ObjectCache('http://localhost:9000');
    platform = new Platform({ url: 'http://localhost:9000', transport: new FakeTransport(), cache });
  });

  const group = (name: string, description?: string) => new Group(platform, { name, description });

  it('should build an object once and return the same instance afterwards', async () => {
    const factory = jest.fn(async () => group('devs'));

    const first = await cache.getOrCreate('group', ['devs'], factory);
    const second = await cache.getOrCreate('group', ['devs'], factory);

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it('should share one construction between concurrent resolutions', async () => {
    const factory = jest.fn(async () => group('devs'));

    const resolved = await Promise.all([
      cache.getOrCreate('group', ['devs'], factory),
      cache.getOrCreate('group', ['devs'], factory),
      cache.getOrCreate('group', ['devs'], factory),
    ]);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(resolved[1]).toBe(resolved[0]);
    expect(resolved[2]).toBe(resolved[0]);
  });

  it('should leave nothing behind when a construction fails', async () => {
    await expect(
      cache.getOrCreate('group', ['devs'], async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(cache.size).toBe(0);

    const obj = await cache.getOrCreate('group', ['devs'], async () => group('devs'));
    expect(obj.name).toBe('devs');
  });

  it('should keep objects of different kinds apart', async () => {
    await cache.getOrCreate('group', ['devs'], async () => group('devs'));

    expect(cache.get('group', ['devs'])).toBeDefined();
    expect(cache.get('user', ['devs'])).toBeUndefined();
  });

  it('should refresh the payload of an existing instance on upsert', () => {
    const original = cache.upsert('group', ['devs'], () => group('devs', 'old'), () => undefined);
    const refreshed = cache.upsert(
      'group',
      ['devs'],
      () => group('devs', 'new'),
      (existing) => {
        existing.payload = { name: 'devs', description: 'new' };
      }
    );

    expect(refreshed).toBe(original);
    expect(original.payload.description).toBe('new');
  });

  it('should drop invalidated objects only', () => {
    const devs = cache.upsert('group', ['devs'], () => group('devs'), () => undefined);
    cache.upsert('group', ['ops'], () => group('ops'), () => undefined);

    expect(cache.invalidate(devs)).toBe(true);
    expect(cache.invalidate(devs)).toBe(false);
    expect(cache.get('group', ['devs'])).toBeUndefined();
    expect(cache.get('group', ['ops'])).toBeDefined();
  });

  it('should keep a shared construction going for the callers still waiting', async () => {
    let finish: (obj: Group) => void = () => undefined;
    let buildSignal: AbortSignal | undefined;
    const factory = (signal: AbortSignal) => {
      buildSignal = signal;
      return new Promise<Group>((resolve) => {
        finish = resolve;
      });
    };
    const impatient = new AbortController();

    const first = cache.getOrCreate('group', ['devs'], factory, impatient.signal);
    const second = cache.getOrCreate('group', ['devs'], factory);
    impatient.abort();

    await expect(first).rejects.toBeInstanceOf(TransportError);
    expect(buildSignal?.aborted).toBe(false);
    finish(group('devs'));
    expect((await second).name).toBe('devs');
    expect(cache.size).toBe(1);
  });

  it('should abort the construction once every caller gave up', async () => {
    let buildSignal: AbortSignal | undefined;
    const controller = new AbortController();

    const pending = cache.getOrCreate(
      'group',
      ['devs'],
      (signal) => {
        buildSignal = signal;
        return new Promise<Group>((_, reject) => {
          signal.addEventListener('abort', () => reject(new TransportError('aborted')));
        });
      },
      controller.signal
    );
    await Promise.resolve();
    await Promise.resolve();
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    expect(buildSignal?.aborted).toBe(true);
    expect(cache.size).toBe(0);
  });

  it('should not store a construction that completes after clear', async () => {
    let finish: (obj: Group) => void = () => undefined;
    const pending = cache.getOrCreate(
      'group',
      ['devs'],
      () =>
        new Promise<Group>((resolve) => {
          finish = resolve;
        })
    );
    await Promise.resolve();
    await Promise.resolve();

    cache.clear();
    finish(group('devs'));

    expect((await pending).name).toBe('devs');
    expect(cache.size).toBe(0);
    expect(cache.get('group', ['devs'])).toBeUndefined();
  });

  it('should empty on clear', () => {
    cache.upsert('group', ['devs'], () => group('devs'), () => undefined);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
