/**
 * Identity cache of remote objects.
 * At most one live instance exists per (endpoint, kind, hash fields);
 * concurrent resolutions of a missing key share one construction.
 */

import type { ObjectKind } from '@sqconf/types';
import { AnyRemoteObject, isOfKind, ObjectOfKind } from '../objects/types';
import { TransportError } from '../platform/errors';

/** Builds an object; `signal` aborts once every waiter has given up */
export type ObjectFactory<O> = (signal: AbortSignal) => Promise<O>;

interface Construction {
  promise: Promise<AnyRemoteObject>;
  controller: AbortController;
  waiters: number;
}

export class ObjectCache {
  private readonly entries = new Map<string, AnyRemoteObject>();
  private readonly pending = new Map<string, Construction>();
  private generation = 0;

  constructor(readonly endpoint: string) {}

  private keyOf(kind: ObjectKind, fields: readonly string[]): string {
    return JSON.stringify([this.endpoint, kind, ...fields]);
  }

  get size(): number {
    return this.entries.size;
  }

  get<K extends ObjectKind>(kind: K, fields: readonly string[]): ObjectOfKind<K> | undefined {
    const obj = this.entries.get(this.keyOf(kind, fields));
    return obj && isOfKind(obj, kind) ? obj : undefined;
  }

  /**
   * Return the cached instance or build it with `factory`.
   * A failed construction leaves nothing behind, the next call retries.
   * `signal` only releases this caller: the shared construction goes on
   * while another caller still waits for it.
   */
  async getOrCreate<K extends ObjectKind>(
    kind: K,
    fields: readonly string[],
    factory: ObjectFactory<ObjectOfKind<K>>,
    signal?: AbortSignal
  ): Promise<ObjectOfKind<K>> {
    const cached = this.get(kind, fields);
    if (cached) return cached;

    const key = this.keyOf(kind, fields);
    let construction = this.pending.get(key);
    if (!construction || construction.controller.signal.aborted) {
      construction = this.construct(key, factory);
      this.pending.set(key, construction);
    }
    const obj = await this.wait(construction, key, signal);
    if (!isOfKind(obj, kind)) {
      throw new Error(`Cache entry ${key} is a ${obj.kind}, not a ${kind}`);
    }
    return obj;
  }

  private construct(key: string, factory: ObjectFactory<AnyRemoteObject>): Construction {
    const controller = new AbortController();
    const generation = this.generation;
    const build = async (): Promise<AnyRemoteObject> => {
      try {
        // Deferred so that a synchronous throw still runs after registration
        const obj = await Promise.resolve().then(() => factory(controller.signal));
        // Constructions started before a clear() are not stored
        if (generation !== this.generation) return obj;
        // A bulk listing may have stored the object meanwhile, it wins
        const existing = this.entries.get(key);
        if (existing) return existing;
        this.entries.set(key, obj);
        return obj;
      } finally {
        if (this.pending.get(key)?.controller === controller) this.pending.delete(key);
      }
    };
    return { promise: build(), controller, waiters: 0 };
  }

  private async wait(construction: Construction, key: string, signal?: AbortSignal): Promise<AnyRemoteObject> {
    if (!signal) {
      construction.waiters++;
      try {
        return await construction.promise;
      } finally {
        construction.waiters--;
      }
    }
    if (signal.aborted) {
      throw new TransportError(`Resolution of ${key} aborted`);
    }
    construction.waiters++;
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(new TransportError(`Resolution of ${key} aborted`));
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([construction.promise, aborted]);
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
      construction.waiters--;
      if (construction.waiters === 0 && signal.aborted) {
        construction.controller.abort();
      }
    }
  }

  /**
   * Store a freshly listed object, or refresh the payload of the instance
   * already cached under the same key
   */
  upsert<K extends ObjectKind>(
    kind: K,
    fields: readonly string[],
    create: () => ObjectOfKind<K>,
    refresh: (existing: ObjectOfKind<K>) => void
  ): ObjectOfKind<K> {
    const existing = this.get(kind, fields);
    if (existing) {
      refresh(existing);
      return existing;
    }
    const obj = create();
    this.entries.set(this.keyOf(kind, fields), obj);
    return obj;
  }

  /** Drop an object confirmed gone on the server */
  invalidate(obj: AnyRemoteObject): boolean {
    return this.entries.delete(this.keyOf(obj.kind, obj.cacheFields()));
  }

  /** Empty the cache; constructions still running are not stored */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.pending.clear();
  }
}
