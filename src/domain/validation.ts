import type { IValidator, ProviderOptions } from './types.js';
import { FACTORY_ERROR_POLICIES } from './types.js';
import { ContainerConfigError } from './errors.js';
import { describeKey, isServiceKey } from './service-key.js';

/**
 * Validates registrations and provider options, and provides fuzzy name matching.
 *
 * @example
 * ```typescript
 * const validator = new Validator();
 * validator.validateRegistration(Engine, 'factory', 'not a function');
 * // throws ContainerConfigError
 * ```
 */
export class Validator implements IValidator {
  validateRegistration(key: unknown, kind: 'factory' | 'instance', value: unknown): void {
    if (!isServiceKey(key)) {
      throw new ContainerConfigError(
        `Service key must be a class or a token, got ${typeof key}.`,
        "Use a class, or create a token: const CLOCK = token<Clock>('Clock').",
        { actualType: typeof key },
      );
    }
    const name = describeKey(key);
    if (kind === 'factory' && typeof value !== 'function') {
      throw new ContainerConfigError(
        `Factory for '${name}' must be a function, got ${typeof value}.`,
        `Wrap it: addFactory(${name}, () => value), or register the value directly with addInstance().`,
        { typeName: name, actualType: typeof value },
      );
    }
    if (kind === 'instance' && value === undefined) {
      throw new ContainerConfigError(
        `Instance for '${name}' is undefined.`,
        'Pass the constructed value, or register a factory with addFactory().',
        { typeName: name },
      );
    }
  }

  validateOptions(options: ProviderOptions): void {
    const policy = options.onFactoryError;
    if (policy !== undefined && !FACTORY_ERROR_POLICIES.includes(policy)) {
      throw new ContainerConfigError(
        `Unknown onFactoryError policy '${String(policy)}'.`,
        `Use one of: ${FACTORY_ERROR_POLICIES.join(', ')}.`,
        { onFactoryError: policy, allowed: [...FACTORY_ERROR_POLICIES] },
      );
    }
    if (options.name !== undefined && typeof options.name !== 'string') {
      throw new ContainerConfigError(
        `Container name must be a string, got ${typeof options.name}.`,
        "Pass a label such as { name: 'app' }.",
        { actualType: typeof options.name },
      );
    }
  }

  /**
   * Finds the closest registered type name using Levenshtein distance.
   * Returns `undefined` unless the match is at least 50% similar.
   * An identical name is suggested too: it means a different key with the same name.
   *
   * @example
   * ```typescript
   * validator.suggestName('Egnine', ['Engine', 'Car']);
   * // 'Engine'
   * ```
   */
  suggestName(name: string, registered: string[]): string | undefined {
    let bestMatch: string | undefined;
    let bestDistance = Infinity;

    for (const candidate of registered) {
      const distance = levenshtein(name, candidate);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestMatch = candidate;
      }
    }

    if (!bestMatch) return undefined;
    const maxLen = Math.max(name.length, bestMatch.length);
    if (maxLen === 0) return undefined;
    const similarity = 1 - bestDistance / maxLen;
    return similarity >= 0.5 ? bestMatch : undefined;
  }
}

/**
 * Levenshtein distance between two strings.
 */
export function levenshtein(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  // single-row optimization
  let prev: number[] = Array.from({ length: lb + 1 }, (_, j) => j);
  let curr: number[] = new Array<number>(lb + 1).fill(0);

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        prev[j] + 1, // deletion
        curr[j - 1] + 1, // insertion
        prev[j - 1] + cost, // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}
