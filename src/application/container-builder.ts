import createDebug from 'debug';
import type { Factory } from '../domain/service-entry.js';
import type { ServiceKey } from '../domain/service-key.js';
import { describeKey } from '../domain/service-key.js';
import type { ProviderOptions } from '../domain/types.js';
import { Validator } from '../domain/validation.js';
import { Registry } from '../infrastructure/registry.js';
import { Resolver } from '../infrastructure/resolver.js';
import { ServiceProvider } from './service-provider.js';

const debug = createDebug('lazywire:builder');
const validator = new Validator();

type Registration =
  | { readonly kind: 'factory'; readonly factory: Factory }
  | { readonly kind: 'instance'; readonly value: unknown };

/**
 * Fluent builder that collects registrations and freezes them into a provider.
 *
 * Registering the same key twice keeps the last registration.
 */
export class ContainerBuilder {
  private readonly registrations = new Map<ServiceKey, Registration>();

  /**
   * Registers a lazy singleton. The factory runs on first `resolve(key)`, at most once.
   */
  addFactory<T>(key: ServiceKey<T>, factory: Factory<T>): this {
    validator.validateRegistration(key, 'factory', factory);
    debug('addFactory %s', describeKey(key));
    this.registrations.set(key, { kind: 'factory', factory });
    return this;
  }

  /**
   * Registers an already-constructed singleton. No factory is ever run for `key`.
   */
  addInstance<T>(key: ServiceKey<T>, value: T): this {
    validator.validateRegistration(key, 'instance', value);
    debug('addInstance %s', describeKey(key));
    this.registrations.set(key, { kind: 'instance', value });
    return this;
  }

  /**
   * Applies a module — a function that chains registrations on this builder.
   * A module may also return a different builder; its registrations are copied
   * into this one, overriding earlier registrations for the same keys.
   *
   * @example
   * ```typescript
   * const persistence = (b: ContainerBuilder) => b
   *   .addInstance(DB_URL, 'postgres://localhost/test')
   *   .addFactory(Database, (p) => new Database(p.resolve(DB_URL)));
   *
   * container().addModule(persistence).build();
   * ```
   */
  addModule(module: (builder: this) => ContainerBuilder): this {
    const result = module(this);
    if (result !== this) {
      debug('addModule: merging %d registrations', result.registrations.size);
      for (const [key, registration] of result.registrations) {
        this.registrations.set(key, registration);
      }
    }
    return this;
  }

  /**
   * Builds the provider. Later changes to this builder do not affect it.
   */
  build(options: ProviderOptions = {}): ServiceProvider {
    validator.validateOptions(options);
    const registry = new Registry();
    for (const [key, registration] of this.registrations) {
      if (registration.kind === 'factory') {
        registry.insertFactory(key, registration.factory);
      } else {
        registry.insertInstance(key, registration.value);
      }
    }
    debug('build: %d services', this.registrations.size);

    const resolver = new Resolver({
      registry,
      name: options.name,
      onFactoryError: options.onFactoryError,
      validator,
    });
    return new ServiceProvider(resolver);
  }
}

/**
 * Creates a new container builder.
 *
 * @example
 * ```typescript
 * class Engine { constructor(readonly name: string) {} }
 * class Car { constructor(readonly engine: Engine) {} }
 *
 * const provider = container()
 *   .addFactory(Engine, () => new Engine('E1'))
 *   .addFactory(Car, (p) => new Car(p.resolve(Engine)))
 *   .build();
 * ```
 */
export function container(): ContainerBuilder {
  return new ContainerBuilder();
}
