import type { IServiceProvider } from './types.js';
import type { ServiceKey } from './service-key.js';
import { describeKey } from './service-key.js';

/**
 * A one-shot constructor. Receives the provider so it can resolve its own
 * dependencies; throwing marks the construction as failed.
 *
 * @example
 * ```typescript
 * const carFactory: Factory<Car> = (p) => new Car(p.resolve(Engine));
 * ```
 */
export type Factory<T = unknown> = (provider: IServiceProvider) => T;

/**
 * A constructed value paired with the key it was registered under.
 * Shared by the registry and every caller that resolved it.
 */
export class ServiceInstance {
  readonly typeName: string;

  constructor(
    readonly key: ServiceKey,
    readonly value: unknown,
  ) {
    this.typeName = describeKey(key);
  }
}

export interface PendingEntry {
  readonly state: 'pending';
  readonly factory: Factory;
  readonly typeName: string;
}

export interface InProgressEntry {
  readonly state: 'in-progress';
}

export interface ResolvedEntry {
  readonly state: 'resolved';
  readonly instance: ServiceInstance;
}

/** One registry slot. */
export type ServiceEntry = PendingEntry | InProgressEntry | ResolvedEntry;

export type EntryState = ServiceEntry['state'];

/** Sentinel left in a slot while its factory runs. */
export const IN_PROGRESS: InProgressEntry = Object.freeze({ state: 'in-progress' });

export function pendingEntry(key: ServiceKey, factory: Factory): PendingEntry {
  return { state: 'pending', factory, typeName: describeKey(key) };
}

export function resolvedEntry(instance: ServiceInstance): ResolvedEntry {
  return { state: 'resolved', instance };
}
