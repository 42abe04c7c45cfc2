import { describe, it, expect } from 'vitest';
import { CircularReferenceError, container, token } from '../src/index.js';

describe('circular reference detection', () => {
  it('detects a self-reference', () => {
    const A = token<string>('A');
    const provider = container()
      .addFactory(A, (p) => p.resolve(A))
      .build();

    expect(() => provider.resolve(A)).toThrow(CircularReferenceError);
  });

  it('detects a mutual cycle (A -> B -> A)', () => {
    const A = token<string>('A');
    const B = token<string>('B');
    const provider = container()
      .addFactory(A, (p) => `a(${p.resolve(B)})`)
      .addFactory(B, (p) => `b(${p.resolve(A)})`)
      .build();

    expect(() => provider.resolve(A)).toThrow(CircularReferenceError);
  });

  it('detects an indirect cycle (A -> B -> C -> A)', () => {
    const A = token<string>('A');
    const B = token<string>('B');
    const C = token<string>('C');
    const provider = container()
      .addFactory(A, (p) => p.resolve(B))
      .addFactory(B, (p) => p.resolve(C))
      .addFactory(C, (p) => p.resolve(A))
      .build();

    expect(() => provider.resolve(A)).toThrow(CircularReferenceError);
  });

  it('detects long cycles without overflowing the stack', () => {
    const keys = Array.from({ length: 200 }, (_, i) => token<number>(`S${i}`));
    const builder = container();
    keys.forEach((key, i) => {
      const next = keys[(i + 1) % keys.length];
      builder.addFactory(key, (p) => p.resolve(next) + 1);
    });
    const provider = builder.build();

    expect(() => provider.resolve(keys[0])).toThrow(CircularReferenceError);
  });

  it('reports the full cycle in the message and details', () => {
    const Auth = token<string>('Auth');
    const User = token<string>('User');
    const provider = container()
      .addFactory(Auth, (p) => p.resolve(User))
      .addFactory(User, (p) => p.resolve(Auth))
      .build();

    try {
      provider.resolve(Auth);
      expect.fail('should have thrown');
    } catch (e) {
      expect(e).toBeInstanceOf(CircularReferenceError);
      const err = e as CircularReferenceError;
      expect(err.message).toBe(
        "Circular reference detected while resolving 'Auth'.\n\nCycle: Auth -> User -> Auth",
      );
      expect(err.kind).toBe('circular_reference');
      expect(err.typeName).toBe('Auth');
      expect(err.details.chain).toEqual(['Auth', 'User']);
      expect(err.details.onStack).toBe(true);
      expect(err.hint).toContain('To fix');
    }
  });

  it('reaches the outermost caller unwrapped', () => {
    const A = token<string>('A');
    const B = token<string>('B');
    const Root = token<string>('Root');
    const provider = container()
      .addFactory(Root, (p) => p.resolve(A))
      .addFactory(A, (p) => p.resolve(B))
      .addFactory(B, (p) => p.resolve(A))
      .build();

    const result = provider.tryResolve(Root);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CircularReferenceError);
      expect(result.error.details.cycle).toBe('Root -> A -> B -> A');
    }
  });

  it('diamond dependencies are OK (not circular)', () => {
    const A = token<string>('A');
    const B = token<string>('B');
    const C = token<string>('C');
    const D = token<string>('D');
    const provider = container()
      .addFactory(D, () => 'base')
      .addFactory(B, (p) => `b(${p.resolve(D)})`)
      .addFactory(C, (p) => `c(${p.resolve(D)})`)
      .addFactory(A, (p) => `a(${p.resolve(B)}, ${p.resolve(C)})`)
      .build();

    expect(provider.resolve(A)).toBe('a(b(base), c(base))');
  });

  it('diamond shares the singleton', () => {
    let dCount = 0;
    const D = token<{ id: number }>('D');
    const B = token<{ id: number }>('B');
    const C = token<{ id: number }>('C');
    const provider = container()
      .addFactory(D, () => ({ id: ++dCount }))
      .addFactory(B, (p) => p.resolve(D))
      .addFactory(C, (p) => p.resolve(D))
      .build();

    expect(provider.resolve(B)).toBe(provider.resolve(C));
    expect(dCount).toBe(1);
  });

  it('a cycle does not disturb services resolved before it', () => {
    const Stable = token<{ ok: boolean }>('Stable');
    const A = token<string>('A');
    const B = token<string>('B');
    const provider = container()
      .addFactory(Stable, () => ({ ok: true }))
      .addFactory(A, (p) => p.resolve(B))
      .addFactory(B, (p) => p.resolve(A))
      .build();

    const stable = provider.resolve(Stable);
    expect(() => provider.resolve(A)).toThrow(CircularReferenceError);
    expect(provider.resolve(Stable)).toBe(stable);
  });
});
