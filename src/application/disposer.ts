import createDebug from 'debug';
import { hasOnDestroy } from '../domain/lifecycle.js';
import type { IRegistry } from '../domain/types.js';

const debug = createDebug('lazywire:provider');

/**
 * Use Case: tear down the instances the container constructed, in reverse construction order.
 * Calls onDestroy() on each and collects errors instead of stopping at the first.
 * Values registered with `addInstance()` belong to the caller and are left alone.
 */
export class Disposer {
  constructor(private readonly registry: IRegistry) {}

  async dispose(): Promise<void> {
    const instances = this.registry.constructedInstances().reverse();
    const errors: unknown[] = [];
    debug('dispose: %d constructed services', instances.length);

    for (const instance of instances) {
      if (hasOnDestroy(instance.value)) {
        try {
          debug('onDestroy %s', instance.typeName);
          await instance.value.onDestroy();
        } catch (error) {
          errors.push(error);
        }
      }
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `dispose() encountered ${errors.length} errors`);
    }
  }
}
