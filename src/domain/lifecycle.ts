/**
 * Implement this interface (or just add an `onDestroy` method) to run
 * cleanup logic when `provider.dispose()` is called.
 *
 * @example
 * ```typescript
 * class Database implements OnDestroy {
 *   async onDestroy() { await this.disconnect(); }
 * }
 * ```
 */
export interface OnDestroy {
  onDestroy(): void | Promise<void>;
}

/** Duck-type check: does the value have an `onDestroy` method? */
export function hasOnDestroy(value: unknown): value is OnDestroy {
  return (
    value !== null &&
    typeof value === 'object' &&
    'onDestroy' in value &&
    typeof value.onDestroy === 'function'
  );
}
