import createDebug from 'debug';
import {
  ProviderDisposedError,
  ResolveError,
  TypeMismatchError,
} from '../domain/errors.js';
import type { ServiceKey } from '../domain/service-key.js';
import { describeKey, matchesKey } from '../domain/service-key.js';
import type {
  ContainerGraph,
  IResolver,
  IServiceProvider,
  ResolveResult,
} from '../domain/types.js';
import { Disposer } from './disposer.js';
import { Introspection } from './introspection.js';

const debug = createDebug('lazywire:provider');

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    if (typeof ctor === 'function' && ctor.name !== '') return ctor.name;
  }
  return typeof value;
}

/**
 * Public facade over the resolution engine. Hides the registry and the
 * erased storage; hands out typed singletons.
 *
 * @example
 * ```typescript
 * const provider = container()
 *   .addFactory(Engine, () => new Engine('E1'))
 *   .addFactory(Car, (p) => new Car(p.resolve(Engine)))
 *   .build();
 *
 * provider.resolve(Car).engine.name; // 'E1'
 * ```
 */
export class ServiceProvider implements IServiceProvider {
  private readonly introspection: Introspection;
  private readonly disposer: Disposer;
  private disposed = false;

  constructor(private readonly resolver: IResolver) {
    this.introspection = new Introspection(resolver);
    this.disposer = new Disposer(resolver.getRegistry());
  }

  resolve<T>(key: ServiceKey<T>): T {
    if (this.disposed) {
      throw new ProviderDisposedError(describeKey(key));
    }

    const instance = this.resolver.resolve(key, this);
    const value = instance.value;
    if (instance.key !== key || !matchesKey(key, value)) {
      throw new TypeMismatchError(describeKey(key), describeValue(value));
    }
    return value;
  }

  tryResolve<T>(key: ServiceKey<T>): ResolveResult<T> {
    try {
      return { ok: true, value: this.resolve(key) };
    } catch (error) {
      if (error instanceof ResolveError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  has(key: ServiceKey): boolean {
    return this.resolver.getRegistry().has(key);
  }

  /** Current state of every registered service. */
  inspect(): ContainerGraph {
    return this.introspection.inspect();
  }

  toString(): string {
    return this.introspection.toString();
  }

  /**
   * Calls `onDestroy()` on every service the container constructed from a factory,
   * most recently constructed first. That includes a value that was rejected with
   * `TypeMismatchError`: the container built it and no caller ever received it.
   * Values registered with `addInstance()` are owned by the caller and are not touched.
   *
   * Continues past failing hooks and rethrows their errors at the end.
   * The provider refuses further resolution afterwards.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    debug('dispose %s', this.resolver.getName() ?? 'container');
    await this.disposer.dispose();
  }
}
