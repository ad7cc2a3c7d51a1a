import { describe, it, expect } from 'vitest';
import { RuleRegistry, createBuiltinRegistry } from '../registry.js';
import {
  DuplicateRuleIdError,
  InvalidRuleIdError,
  RegistryClosedError,
} from '../../errors.js';
import { testRule } from '../../__tests__/helpers/trees.js';

describe('RuleRegistry', () => {
  it('looks up registered rules by id', () => {
    const registry = new RuleRegistry();
    registry.register(testRule({ id: 'alpha', kinds: ['Block'] }));

    expect(registry.lookup('alpha')?.id).toBe('alpha');
    expect(registry.lookup('beta')).toBeUndefined();
  });

  it('lists rules in registration order', () => {
    const registry = new RuleRegistry();
    registry.registerAll([
      testRule({ id: 'zeta', kinds: ['Block'] }),
      testRule({ id: 'alpha', kinds: ['Block'] }),
    ]);

    expect(registry.ids()).toEqual(['zeta', 'alpha']);
    expect(registry.all().map((rule) => rule.id)).toEqual(['zeta', 'alpha']);
  });

  it('rejects duplicate ids', () => {
    const registry = new RuleRegistry();
    registry.register(testRule({ id: 'alpha', kinds: ['Block'] }));

    expect(() => registry.register(testRule({ id: 'alpha', kinds: ['Identifier'] }))).toThrow(
      DuplicateRuleIdError
    );
    expect(() => registry.register(testRule({ id: 'alpha', kinds: ['Block'] }))).toThrow(
      "Rule 'alpha' is already registered"
    );
    expect(registry.lookup('alpha')?.nodeInterest).toEqual(['Block']);
  });

  it('rejects registration once sealed', () => {
    const registry = new RuleRegistry().seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register(testRule({ id: 'late', kinds: ['Block'] }))).toThrow(
      RegistryClosedError
    );
    expect(registry.ids()).toEqual([]);
  });

  it('rejects malformed ids', () => {
    const registry = new RuleRegistry();

    for (const id of ['', 'Upper', 'has space', '-leading', 'trailing-', 'double--dash']) {
      expect(() => registry.register(testRule({ id, kinds: ['Block'] }))).toThrow(
        InvalidRuleIdError
      );
    }
    registry.register(testRule({ id: 'style/no-empty-block', kinds: ['Block'] }));
    expect(registry.ids()).toEqual(['style/no-empty-block']);
  });

  it('stores frozen descriptors', () => {
    const registry = new RuleRegistry();
    registry.register(testRule({ id: 'alpha', kinds: ['Block'] }));

    expect(Object.isFrozen(registry.lookup('alpha'))).toBe(true);
  });

  describe('createBuiltinRegistry', () => {
    it('returns a sealed registry with the bundled rules', () => {
      const registry = createBuiltinRegistry();

      expect(registry.isSealed).toBe(true);
      expect(registry.ids()).toEqual([
        'no-empty-block',
        'single-method-object-literal',
        'function-keyword-spacing',
      ]);
    });

    it('appends extra rules before sealing', () => {
      const registry = createBuiltinRegistry([testRule({ id: 'custom', kinds: ['Block'] })]);

      expect(registry.lookup('custom')).toBeDefined();
      expect(registry.ids()).toHaveLength(4);
    });

    it('fails when an extra rule reuses a bundled id', () => {
      expect(() =>
        createBuiltinRegistry([testRule({ id: 'no-empty-block', kinds: ['Block'] })])
      ).toThrow(DuplicateRuleIdError);
    });
  });
});
