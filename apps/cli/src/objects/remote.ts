/**
 * Helpers shared by the object modules for create races and vanished objects
 */

import { ApiError, ObjectAlreadyExistsError, ObjectNotFoundError } from '../platform/errors';
import type { AnyRemoteObject } from './types';

const ALREADY_EXISTS = /already exists|already been taken|already used/i;

/**
 * Run a creation call, reporting a duplicate as ObjectAlreadyExistsError
 */
export async function createRemote<T>(key: string, create: () => Promise<T>): Promise<T> {
  try {
    return await create();
  } catch (error) {
    if (error instanceof ApiError && error.status === 400 && ALREADY_EXISTS.test(error.message)) {
      throw new ObjectAlreadyExistsError(key, error.message);
    }
    throw error;
  }
}

export interface Resolved<T> {
  object: T;
  created: boolean;
}

/**
 * Fetch an object, creating it when missing. Losing a creation race falls
 * back to fetching the winner.
 */
export async function getOrCreateRemote<T>(
  get: () => Promise<T>,
  create: () => Promise<T>
): Promise<Resolved<T>> {
  try {
    return { object: await get(), created: false };
  } catch (error) {
    if (!(error instanceof ObjectNotFoundError)) throw error;
  }
  try {
    return { object: await create(), created: true };
  } catch (error) {
    if (!(error instanceof ObjectAlreadyExistsError)) throw error;
    return { object: await get(), created: false };
  }
}

/**
 * Run `fn` against a cached object; a 404 evicts the object before the
 * error goes on to the caller
 */
export async function onLiveObject<T>(obj: AnyRemoteObject, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ObjectNotFoundError) {
      obj.platform.cache.invalidate(obj);
    }
    throw error;
  }
}
