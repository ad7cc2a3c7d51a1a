import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  childSegments,
  computeFingerprint,
  entitySignature,
  normalizeSnippet,
} from '../fingerprint.js';
import { buildTree, n } from '../../__tests__/helpers/trees.js';

describe('fingerprint', () => {
  it('hashes rule id, signature and whitespace-free snippet', () => {
    const expected = createHash('sha256')
      .update('no-empty-block\0a.ts#SourceFile/Block#0\0{}')
      .digest('hex');

    expect(
      computeFingerprint({
        ruleId: 'no-empty-block',
        entitySignature: 'a.ts#SourceFile/Block#0',
        snippet: '{\n  }',
      })
    ).toBe(expected);
  });

  it('ignores whitespace changes in the snippet', () => {
    const base = { ruleId: 'r', entitySignature: 'a.ts#SourceFile' };

    expect(computeFingerprint({ ...base, snippet: 'function  f() {}' })).toBe(
      computeFingerprint({ ...base, snippet: 'function f(){\n}' })
    );
  });

  it('changes with the rule or the signature', () => {
    const base = { ruleId: 'r', entitySignature: 'a.ts#SourceFile', snippet: 'x' };
    const fingerprint = computeFingerprint(base);

    expect(computeFingerprint({ ...base, ruleId: 's' })).not.toBe(fingerprint);
    expect(computeFingerprint({ ...base, entitySignature: 'b.ts#SourceFile' })).not.toBe(
      fingerprint
    );
  });

  it('strips every kind of whitespace', () => {
    expect(normalizeSnippet(' a\tb\r\nc ')).toBe('abc');
  });

  describe('childSegments', () => {
    it('names named children by name and counts unnamed ones per kind', () => {
      const tree = buildTree(
        'a.ts',
        n(
          'SourceFile',
          {},
          n('FunctionDeclaration', { name: 'load' }),
          n('ExpressionStatement'),
          n('FunctionDeclaration', { name: 'save' }),
          n('ExpressionStatement'),
          n('FunctionDeclaration', { name: 'load' })
        )
      );

      expect(childSegments(tree.root.children)).toEqual([
        'FunctionDeclaration:load',
        'ExpressionStatement#0',
        'FunctionDeclaration:save',
        'ExpressionStatement#1',
        'FunctionDeclaration:load#1',
      ]);
    });

    it('keeps existing segments when a different sibling is inserted', () => {
      const before = buildTree(
        'a.ts',
        n('SourceFile', {}, n('ClassDeclaration', { name: 'A' }), n('IfStatement'))
      );
      const after = buildTree(
        'a.ts',
        n(
          'SourceFile',
          {},
          n('FunctionDeclaration', { name: 'helper' }),
          n('ExpressionStatement'),
          n('ClassDeclaration', { name: 'A' }),
          n('IfStatement')
        )
      );

      expect(childSegments(after.root.children).slice(2)).toEqual(
        childSegments(before.root.children)
      );
    });
  });

  it('builds file-qualified signatures', () => {
    expect(entitySignature('src/a.ts', ['SourceFile', 'ClassDeclaration:A', 'Block#0'])).toBe(
      'src/a.ts#SourceFile/ClassDeclaration:A/Block#0'
    );
  });
});
