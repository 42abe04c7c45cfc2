/**
 * lazywire — a minimal inversion-of-control container.
 * Services are keyed by class or token, constructed lazily on first request,
 * kept as singletons, and circular construction is reported instead of overflowing the stack.
 *
 * @example
 * ```typescript
 * import { container, token } from 'lazywire';
 *
 * const DB_URL = token<string>('DbUrl');
 *
 * const provider = container()
 *   .addInstance(DB_URL, 'postgres://localhost/app')
 *   .addFactory(Database, (p) => new Database(p.resolve(DB_URL)))
 *   .addFactory(UserService, (p) => new UserService(p.resolve(Database)))
 *   .build();
 *
 * provider.resolve(UserService); // lazy, singleton, typed
 * ```
 *
 * @packageDocumentation
 */

// Core API
export { container, ContainerBuilder } from './application/container-builder.js';
export { ServiceProvider } from './application/service-provider.js';
export { token, ServiceToken } from './domain/service-key.js';

// Types
export type { Constructor, ServiceKey, TypeGuard } from './domain/service-key.js';
export type { EntryState, Factory } from './domain/service-entry.js';
export type {
  ContainerGraph,
  FactoryErrorPolicy,
  IServiceProvider,
  ProviderOptions,
  ResolveResult,
  ServiceInfo,
} from './domain/types.js';

// Lifecycle interfaces
export type { OnDestroy } from './domain/lifecycle.js';

// Errors (classes, so exported as values)
export {
  ContainerError,
  ContainerConfigError,
  ResolveError,
  ServiceNotFoundError,
  CircularReferenceError,
  FactoryError,
  TypeMismatchError,
  ProviderDisposedError,
} from './domain/errors.js';
export type { ResolveErrorKind } from './domain/errors.js';
