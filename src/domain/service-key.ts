/**
 * A class (concrete or abstract) used as its own identity.
 * The resolved value must be an `instanceof` the class.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/** Optional runtime check attached to a token, used when a resolved value is handed out. */
export type TypeGuard<T> = (value: unknown) => value is T;

/**
 * Opaque identity for a contract that has no class of its own
 * (interfaces, primitives, configuration objects).
 *
 * Identity is the token object itself: create it once, export it, and
 * use the same reference for registration and resolution.
 *
 * @example
 * ```typescript
 * interface Clock { now(): Date }
 * export const CLOCK = token<Clock>('Clock');
 * ```
 */
export class ServiceToken<T> {
  /** Phantom field carrying `T`; never set at runtime. */
  declare readonly __type?: T;

  constructor(
    readonly name: string,
    readonly guard?: TypeGuard<T>,
  ) {}

  toString(): string {
    return `ServiceToken(${this.name})`;
  }
}

/** Anything that identifies a service in the registry. */
export type ServiceKey<T = unknown> = ServiceToken<T> | Constructor<T>;

/**
 * Creates a new, unique service token.
 * Two calls with the same name produce two distinct identities.
 */
export function token<T>(name: string, guard?: TypeGuard<T>): ServiceToken<T> {
  return new ServiceToken<T>(name, guard);
}

/** Human-readable label for a key, used in logs and error messages. */
export function describeKey(key: ServiceKey): string {
  return key.name === '' ? '<anonymous>' : key.name;
}

/**
 * Checked downcast: does `value` satisfy the contract behind `key`?
 * Tokens without a guard accept any value; their identity is the proof.
 */
export function matchesKey<T>(key: ServiceKey<T>, value: unknown): value is T {
  if (key instanceof ServiceToken) {
    return key.guard ? key.guard(value) : true;
  }
  return value instanceof key;
}

export function isServiceKey(value: unknown): value is ServiceKey {
  return value instanceof ServiceToken || typeof value === 'function';
}
