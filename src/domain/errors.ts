/**
 * Base class for all container errors.
 * Every error includes a human-readable `hint` and structured `details`.
 *
 * @example
 * ```typescript
 * try { provider.resolve(UserService); }
 * catch (e) {
 *   if (e instanceof ContainerError) {
 *     console.log(e.hint);    // how to fix it
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type ResolveErrorKind =
  | 'not_found'
  | 'circular_reference'
  | 'error_while_resolving'
  | 'type_mismatch';

/**
 * Any failure surfaced by `resolve()`. `typeName` is the type that was requested.
 */
export abstract class ResolveError extends ContainerError {
  abstract readonly kind: ResolveErrorKind;

  constructor(
    readonly typeName: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

function formatChain(chain: string[], last: string): string {
  return chain.length > 0 ? `\n\nResolution chain: ${[...chain, last].join(' -> ')}` : '';
}

/**
 * Thrown when a registration or option is invalid.
 *
 * @example
 * ```typescript
 * container().addFactory(Engine, new Engine('E1'));
 * // ContainerConfigError: Factory for 'Engine' must be a function, got object.
 * ```
 */
export class ContainerConfigError extends ContainerError {
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(message: string, hint: string, details: Record<string, unknown>) {
    super(message);
    this.hint = hint;
    this.details = details;
  }
}

/**
 * Thrown when nothing is registered for the requested type.
 * Includes a fuzzy suggestion if a similarly named type exists.
 *
 * @example
 * ```typescript
 * // ServiceNotFoundError: Cannot resolve 'Car': no service registered for 'Egnine'.
 * // hint: "Did you mean 'Engine'?"
 * ```
 */
export class ServiceNotFoundError extends ResolveError {
  readonly kind = 'not_found' as const;
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(typeName: string, chain: string[], registered: string[], suggestion?: string) {
    const chainStr = formatChain(chain, `${typeName} (not found)`);
    const registeredStr = `\nRegistered types: [${registered.join(', ')}]`;
    const suggestionStr = suggestion ? `\n\nDid you mean '${suggestion}'?` : '';

    super(
      typeName,
      `Cannot resolve '${chain[0] ?? typeName}': no service registered for '${typeName}'.${chainStr}${registeredStr}${suggestionStr}`,
    );

    const register = `Register it before build():\n  container().addFactory(${typeName}, (p) => /* construct */)`;
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Service keys compare by identity, so make sure the same class or token is used. Or:\n${register}`
      : register;
    this.details = { typeName, chain, registered, suggestion };
  }
}

/**
 * Thrown when a type is requested while it is still being constructed.
 *
 * @example
 * ```typescript
 * // CircularReferenceError: Circular reference detected while resolving 'A'.
 * // Cycle: A -> B -> A
 * ```
 */
export class CircularReferenceError extends ResolveError {
  readonly kind = 'circular_reference' as const;
  readonly hint: string;
  readonly details: Record<string, unknown>;

  /**
   * @param onStack - whether the type is being constructed further up this
   * call stack. When it is not, an earlier construction failed and left it
   * marked in progress.
   */
  constructor(typeName: string, chain: string[], onStack: boolean) {
    const cycle = [...chain, typeName].join(' -> ');
    super(
      typeName,
      `Circular reference detected while resolving '${chain[0] ?? typeName}'.\n\nCycle: ${cycle}`,
    );
    this.hint = onStack
      ? [
          'To fix:',
          '  1. Extract shared logic into a new service both can use',
          "  2. Restructure so one doesn't depend on the other",
          '  3. Resolve the dependency lazily, after construction',
        ].join('\n')
      : `'${typeName}' is not being constructed on this call path. An earlier attempt to construct it failed and left it in progress. Build the container with { onFactoryError: 'retry' } to allow another attempt.`;
    this.details = { typeName, chain, cycle, onStack };
  }
}

/**
 * Thrown when a factory throws during resolution.
 * The original error is kept as `cause`.
 *
 * @example
 * ```typescript
 * // FactoryError: Factory for 'Database' threw an error: "Connection refused"
 * ```
 */
export class FactoryError extends ResolveError {
  readonly kind = 'error_while_resolving' as const;
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(typeName: string, chain: string[], cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    const chainStr =
      chain.length > 1
        ? `\n\nResolution chain: ${[...chain.slice(0, -1), `${typeName} (factory threw)`].join(' -> ')}`
        : '';
    super(typeName, `Factory for '${typeName}' threw an error: "${causeMessage}"${chainStr}`, {
      cause,
    });
    this.hint = `Check the factory registered for '${typeName}'. The error occurred during construction.`;
    this.details = { typeName, chain, cause: causeMessage };
  }
}

/**
 * Thrown when the stored value does not satisfy the requested key
 * (not an instance of the class, or rejected by the token's guard).
 */
export class TypeMismatchError extends ResolveError {
  readonly kind = 'type_mismatch' as const;
  readonly hint: string;
  readonly details: Record<string, unknown>;

  constructor(typeName: string, actualType: string) {
    super(typeName, `Service registered for '${typeName}' holds a value of type ${actualType}.`);
    this.hint = `Return an instance of '${typeName}' from its factory, or register it under a token whose guard accepts ${actualType}.`;
    this.details = { typeName, actualType };
  }
}

/**
 * Thrown by `resolve()` after the provider has been disposed.
 */
export class ProviderDisposedError extends ContainerError {
  readonly hint = 'Build a new container; a disposed one cannot hand out services.';
  readonly details: Record<string, unknown>;

  constructor(typeName: string) {
    super(`Cannot resolve '${typeName}': the container has been disposed.`);
    this.details = { typeName };
  }
}
