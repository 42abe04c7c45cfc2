import type { ContainerGraph, IResolver } from '../domain/types.js';

/**
 * Builds diagnostic views of the registry behind a resolver.
 * Provides `inspect()` and `toString()`.
 */
export class Introspection {
  constructor(private readonly resolver: IResolver) {}

  /**
   * Returns the current state of every registered service as a serializable object.
   */
  inspect(): ContainerGraph {
    const services = this.resolver.getRegistry().snapshot();
    const name = this.resolver.getName();
    return name ? { name, services } : { services };
  }

  /**
   * Returns a human-readable representation of the container.
   */
  toString(): string {
    const parts = this.resolver
      .getRegistry()
      .snapshot()
      .map((s) => `${s.name} (${s.state})`);
    const name = this.resolver.getName();
    const label = name ? `Container(${name})` : 'Container';
    return parts.length > 0 ? `${label} { ${parts.join(', ')} }` : `${label} {}`;
  }
}
