import { describe, it, expect } from 'vitest';
import { CircularReferenceError, FactoryError, container, token } from '../src/index.js';

function flakyBuilder() {
  const Db = token<{ attempt: number }>('Db');
  let attempts = 0;
  const builder = container().addFactory(Db, () => {
    attempts++;
    if (attempts === 1) throw new Error('Connection refused');
    return { attempt: attempts };
  });
  return { Db, builder, attempts: () => attempts };
}

describe('factory failure policy', () => {
  describe("'poison' (default)", () => {
    it('leaves the entry in progress after a failure', () => {
      const { Db, builder } = flakyBuilder();
      const provider = builder.build();

      expect(() => provider.resolve(Db)).toThrow(FactoryError);
      expect(provider.inspect().services).toEqual([{ name: 'Db', state: 'in-progress' }]);
    });

    it('reports later requests as a circular reference and never reruns the factory', () => {
      const { Db, builder, attempts } = flakyBuilder();
      const provider = builder.build();

      expect(() => provider.resolve(Db)).toThrow(FactoryError);

      try {
        provider.resolve(Db);
        expect.fail('should throw');
      } catch (e) {
        expect(e).toBeInstanceOf(CircularReferenceError);
        const err = e as CircularReferenceError;
        expect(err.details.onStack).toBe(false);
        expect(err.hint).toContain("onFactoryError: 'retry'");
      }
      expect(attempts()).toBe(1);
    });

    it('poisons every entry on the failing chain', () => {
      const Repo = token<string>('Repo');
      const Db = token<string>('Db');
      const provider = container()
        .addFactory(Db, () => {
          throw new Error('down');
        })
        .addFactory(Repo, (p) => `repo(${p.resolve(Db)})`)
        .build({ onFactoryError: 'poison' });

      expect(() => provider.resolve(Repo)).toThrow(FactoryError);
      expect(provider.inspect().services).toEqual([
        { name: 'Db', state: 'in-progress' },
        { name: 'Repo', state: 'in-progress' },
      ]);
    });
  });

  describe("'retry'", () => {
    it('restores the entry to pending so the next request runs the factory again', () => {
      const { Db, builder, attempts } = flakyBuilder();
      const provider = builder.build({ onFactoryError: 'retry' });

      expect(() => provider.resolve(Db)).toThrow(FactoryError);
      expect(provider.inspect().services).toEqual([{ name: 'Db', state: 'pending' }]);

      const db = provider.resolve(Db);
      expect(db.attempt).toBe(2);
      expect(provider.resolve(Db)).toBe(db);
      expect(attempts()).toBe(2);
    });

    it('restores every entry of a failed cycle', () => {
      const A = token<string>('A');
      const B = token<string>('B');
      const provider = container()
        .addFactory(A, (p) => p.resolve(B))
        .addFactory(B, (p) => p.resolve(A))
        .build({ onFactoryError: 'retry' });

      expect(() => provider.resolve(A)).toThrow(CircularReferenceError);
      expect(provider.inspect().services).toEqual([
        { name: 'A', state: 'pending' },
        { name: 'B', state: 'pending' },
      ]);
      expect(() => provider.resolve(B)).toThrow(CircularReferenceError);
    });
  });
});
