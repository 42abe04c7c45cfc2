import type { ResolveError } from './errors.js';
import type { EntryState, ServiceEntry, ServiceInstance, Factory } from './service-entry.js';
import type { ServiceKey } from './service-key.js';

/**
 * What happens to an entry whose factory threw.
 * - `poison`: the entry stays in progress; later requests report a circular reference.
 * - `retry`: the entry goes back to pending; the next request runs the factory again.
 */
export type FactoryErrorPolicy = 'poison' | 'retry';

export const FACTORY_ERROR_POLICIES: readonly FactoryErrorPolicy[] = ['poison', 'retry'];

/**
 * Options accepted by `ContainerBuilder.build()`.
 */
export interface ProviderOptions {
  /**
   * Optional name for the container, shown by `String(provider)`
   * as `Container(name) { ... }`.
   */
  name?: string;
  /** Defaults to `'poison'`. */
  onFactoryError?: FactoryErrorPolicy;
}

/** Outcome of `tryResolve()`. */
export type ResolveResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ResolveError };

/**
 * The consumer-facing API. Factories receive this and may call it
 * re-entrantly for their own dependencies.
 *
 * @example
 * ```typescript
 * const car = provider.resolve(Car);
 * car.engine === provider.resolve(Engine); // true
 * ```
 */
export interface IServiceProvider {
  /**
   * Returns the singleton registered under `key`, constructing it
   * (and its dependencies, depth-first) on first request.
   *
   * @throws {ServiceNotFoundError} nothing is registered under `key`
   * @throws {CircularReferenceError} `key` is already being constructed
   * @throws {FactoryError} the factory threw
   * @throws {TypeMismatchError} the stored value does not satisfy `key`
   * @throws {ProviderDisposedError} the provider has been disposed
   */
  resolve<T>(key: ServiceKey<T>): T;

  /**
   * Like `resolve()`, but reports `ResolveError`s as a value.
   * Other errors, such as `ProviderDisposedError`, are still thrown.
   */
  tryResolve<T>(key: ServiceKey<T>): ResolveResult<T>;

  /** Whether `key` has a registration. Does not construct anything. */
  has(key: ServiceKey): boolean;
}

/**
 * State of every registered service, as returned by `inspect()`.
 */
export interface ContainerGraph {
  name?: string;
  services: ServiceInfo[];
}

export interface ServiceInfo {
  /** Diagnostic type name of the key. */
  name: string;
  state: EntryState;
}

/**
 * Owner of the key → entry mapping and the only mutator of entry state.
 */
export interface IRegistry {
  insertFactory(key: ServiceKey, factory: Factory): void;
  insertInstance(key: ServiceKey, value: unknown): void;
  /** Reads the slot and leaves the in-progress sentinel in its place. */
  takeForResolution(key: ServiceKey): ServiceEntry | undefined;
  storeResolved(key: ServiceKey, instance: ServiceInstance): void;
  restore(key: ServiceKey, entry: ServiceEntry): void;
  has(key: ServiceKey): boolean;
  typeNames(): string[];
  snapshot(): ServiceInfo[];
  /** Instances built by a factory (not supplied with `insertInstance`), in construction order. */
  constructedInstances(): ServiceInstance[];
}

/**
 * Resolution engine contract — drives one key to a resolved instance.
 */
export interface IResolver {
  resolve(key: ServiceKey, provider: IServiceProvider): ServiceInstance;
  getRegistry(): IRegistry;
  getName(): string | undefined;
}

/**
 * Interface for registration and options validation.
 */
export interface IValidator {
  validateRegistration(key: unknown, kind: 'factory' | 'instance', value: unknown): void;
  validateOptions(options: ProviderOptions): void;
  suggestName(name: string, registered: string[]): string | undefined;
}
