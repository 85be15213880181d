import type { ObjectKind, RemoteObjectRef } from '@sqconf/types';
import type { Platform } from '../platform/platform';
import type { Application } from './application';
import type { Branch } from './branch';
import type { Group } from './group';
import type { Portfolio } from './portfolio';
import type { Project } from './project';
import type { QualityGate } from './quality-gate';
import type { QualityProfile } from './quality-profile';
import type { User } from './user';

/**
 * Capability set of a mirrored remote object.
 * `payload` holds the latest fetched remote state and is refreshed in place,
 * so every holder of the instance sees the same data.
 */
export interface RemoteObject<P> extends RemoteObjectRef {
  readonly platform: Platform;
  payload: P;
  /** Hash fields identifying the object within its kind */
  cacheFields(): string[];
}

export type AnyRemoteObject =
  | Project
  | Branch
  | QualityGate
  | QualityProfile
  | Portfolio
  | Application
  | Group
  | User;

export type ObjectOfKind<K extends ObjectKind> = Extract<AnyRemoteObject, { kind: K }>;

export function isOfKind<K extends ObjectKind>(obj: AnyRemoteObject, kind: K): obj is ObjectOfKind<K> {
  return obj.kind === kind;
}
