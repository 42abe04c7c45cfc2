import { describe, it, expect } from 'vitest';
import { ContainerConfigError } from '../src/domain/errors.js';
import { token } from '../src/domain/service-key.js';
import { Validator, levenshtein } from '../src/domain/validation.js';

class Engine {}

describe('Validator', () => {
  const validator = new Validator();

  describe('suggestName', () => {
    it('suggests the closest registered name', () => {
      expect(validator.suggestName('Egnine', ['Engine', 'Car'])).toBe('Engine');
    });

    it('returns undefined when nothing is close enough', () => {
      expect(validator.suggestName('Database', ['Car', 'Engine'])).toBeUndefined();
    });

    it('returns undefined when nothing is registered', () => {
      expect(validator.suggestName('Engine', [])).toBeUndefined();
    });

    it('suggests an identical name', () => {
      expect(validator.suggestName('Config', ['Config'])).toBe('Config');
    });
  });

  describe('validateRegistration', () => {
    it('accepts a class key with a factory', () => {
      expect(() => validator.validateRegistration(Engine, 'factory', () => new Engine())).not.toThrow();
    });

    it('accepts a token key with an instance', () => {
      expect(() => validator.validateRegistration(token('Port'), 'instance', 0)).not.toThrow();
    });

    it('rejects a non-function factory', () => {
      expect(() => validator.validateRegistration(Engine, 'factory', 42)).toThrow(
        "Factory for 'Engine' must be a function, got number.",
      );
    });

    it('accepts null as an instance but not undefined', () => {
      expect(() => validator.validateRegistration(token('Maybe'), 'instance', null)).not.toThrow();
      expect(() => validator.validateRegistration(token('Maybe'), 'instance', undefined)).toThrow(
        ContainerConfigError,
      );
    });

    it('rejects keys that are not classes or tokens', () => {
      expect(() => validator.validateRegistration({}, 'instance', 1)).toThrow(
        'Service key must be a class or a token, got object.',
      );
    });
  });

  describe('validateOptions', () => {
    it('accepts the known policies', () => {
      expect(() => validator.validateOptions({})).not.toThrow();
      expect(() => validator.validateOptions({ onFactoryError: 'poison' })).not.toThrow();
      expect(() => validator.validateOptions({ onFactoryError: 'retry', name: 'app' })).not.toThrow();
    });
  });
});

describe('levenshtein', () => {
  it('computes edit distance', () => {
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('abc', '')).toBe(3);
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('Engine', 'Egnine')).toBe(2);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});
