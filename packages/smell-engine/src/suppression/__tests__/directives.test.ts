import { describe, it, expect } from 'vitest';
import { isSuppressed, parseDirectives } from '../directives.js';
import { buildTree, n } from '../../__tests__/helpers/trees.js';

function withComments(...comments: string[]) {
  return buildTree('a.ts', n('FunctionDeclaration', { name: 'f', comments })).root;
}

describe('parseDirectives', () => {
  it('returns nothing for ordinary comments', () => {
    expect(parseDirectives(withComments('// just a note', '/* another */'))).toEqual([]);
  });

  it('parses a node directive with comma separated ids', () => {
    const node = withComments('// @smell-ignore no-empty-block,function-keyword-spacing ,  long-method');
    const [directive] = parseDirectives(node);

    expect(directive?.scope).toBe('node');
    expect(directive?.ruleIds).toEqual(
      new Set(['no-empty-block', 'function-keyword-spacing', 'long-method'])
    );
  });

  it('treats words after the id list as the reason', () => {
    const [directive] = parseDirectives(
      withComments('// @smell-ignore no-empty-block, long-method because legacy')
    );

    expect(directive?.ruleIds).toEqual(new Set(['no-empty-block', 'long-method']));
  });

  it('does not read ids from the following lines', () => {
    const [directive] = parseDirectives(
      withComments('/* @smell-ignore no-empty-block\n * long-method\n */')
    );

    expect(directive?.ruleIds).toEqual(new Set(['no-empty-block']));
  });

  it('parses file directives from block comments', () => {
    const [directive] = parseDirectives(withComments('/* @smell-ignore-file no-empty-block */'));

    expect(directive).toEqual({ scope: 'file', ruleIds: new Set(['no-empty-block']) });
  });

  it('recognises all and lowercases ids', () => {
    const directives = parseDirectives(withComments('// @SMELL-IGNORE No-Empty-Block', '// @smell-ignore ALL'));

    expect(directives.map((directive) => directive.ruleIds)).toEqual([
      new Set(['no-empty-block']),
      'all',
    ]);
  });

  it('stops reading ids at punctuation outside the id alphabet', () => {
    const [directive] = parseDirectives(withComments('// @smell-ignore no-empty-block: generated'));

    expect(directive?.ruleIds).toEqual(new Set(['no-empty-block']));
  });

  it('keeps the carrying node on node directives', () => {
    const node = withComments('// @smell-ignore all');
    const [directive] = parseDirectives(node);

    expect(directive?.scope === 'node' ? directive.node : undefined).toBe(node);
  });
});

describe('isSuppressed', () => {
  const directives = parseDirectives(
    withComments('// @smell-ignore no-empty-block', '// @smell-ignore long-method')
  );

  it('suppresses when any directive names the rule', () => {
    expect(isSuppressed({ ruleId: 'no-empty-block' }, directives)).toBe(true);
    expect(isSuppressed({ ruleId: 'long-method' }, directives)).toBe(true);
  });

  it('leaves other rules alone', () => {
    expect(isSuppressed({ ruleId: 'function-keyword-spacing' }, directives)).toBe(false);
    expect(isSuppressed({ ruleId: 'no-empty-block' }, [])).toBe(false);
  });

  it('suppresses every rule under all', () => {
    const all = parseDirectives(withComments('// @smell-ignore all'));

    expect(isSuppressed({ ruleId: 'anything/at-all' }, all)).toBe(true);
  });
});
