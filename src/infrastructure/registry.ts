import createDebug from 'debug';
import type { Factory, ServiceEntry } from '../domain/service-entry.js';
import {
  IN_PROGRESS,
  ServiceInstance,
  pendingEntry,
  resolvedEntry,
} from '../domain/service-entry.js';
import type { ServiceKey } from '../domain/service-key.js';
import { describeKey } from '../domain/service-key.js';
import type { IRegistry, ServiceInfo } from '../domain/types.js';

const debug = createDebug('lazywire:registry');

/**
 * Key → entry mapping. One slot per key; every state change goes through here.
 *
 * `takeForResolution` swaps the in-progress sentinel into the slot in the same
 * step that reads it, so a re-entrant request for the same key sees the
 * sentinel instead of running the factory again.
 */
export class Registry implements IRegistry {
  private readonly entries = new Map<ServiceKey, ServiceEntry>();
  /** Keys whose factories ran, in the order they completed. */
  private readonly constructedOrder: ServiceKey[] = [];

  insertFactory(key: ServiceKey, factory: Factory): void {
    if (this.entries.has(key)) debug('override %s (factory)', describeKey(key));
    else debug('insert %s (factory)', describeKey(key));
    this.forgetConstructed(key);
    this.entries.set(key, pendingEntry(key, factory));
  }

  insertInstance(key: ServiceKey, value: unknown): void {
    if (this.entries.has(key)) debug('override %s (instance)', describeKey(key));
    else debug('insert %s (instance)', describeKey(key));
    this.forgetConstructed(key);
    this.entries.set(key, resolvedEntry(new ServiceInstance(key, value)));
  }

  takeForResolution(key: ServiceKey): ServiceEntry | undefined {
    const previous = this.entries.get(key);
    if (previous === undefined) return undefined;
    this.entries.set(key, IN_PROGRESS);
    return previous;
  }

  storeResolved(key: ServiceKey, instance: ServiceInstance): void {
    this.entries.set(key, resolvedEntry(instance));
    this.constructedOrder.push(key);
  }

  restore(key: ServiceKey, entry: ServiceEntry): void {
    this.entries.set(key, entry);
  }

  has(key: ServiceKey): boolean {
    return this.entries.has(key);
  }

  typeNames(): string[] {
    return [...this.entries.keys()].map(describeKey);
  }

  snapshot(): ServiceInfo[] {
    return [...this.entries].map(([key, entry]) => ({
      name: describeKey(key),
      state: entry.state,
    }));
  }

  constructedInstances(): ServiceInstance[] {
    const instances: ServiceInstance[] = [];
    for (const key of this.constructedOrder) {
      const entry = this.entries.get(key);
      if (entry?.state === 'resolved') instances.push(entry.instance);
    }
    return instances;
  }

  private forgetConstructed(key: ServiceKey): void {
    const index = this.constructedOrder.indexOf(key);
    if (index !== -1) this.constructedOrder.splice(index, 1);
  }
}
