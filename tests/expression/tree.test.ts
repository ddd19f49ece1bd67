import { describe, it, expect } from 'vitest';
import {
  literal,
  variable,
  unary,
  binary,
  isLeaf,
  nodeLabel,
  formatTree,
} from '../../src/expression/tree.js';
import { parse } from '../../src/expression/parser.js';
import { Operator } from '../../src/expression/types.js';

describe('tree constructors', () => {
  it('should build leaves', () => {
    expect(literal(false)).toEqual({ type: 'Literal', value: false });
    expect(variable('p')).toEqual({ type: 'Variable', name: 'p' });
  });

  it('should store a negated operand on the left', () => {
    expect(unary(literal(true))).toEqual({
      type: 'Operator',
      operator: 'Not',
      left: { type: 'Literal', value: true },
      right: null,
    });
  });

  it('should build binary nodes', () => {
    expect(binary(Operator.OR, variable('p'), literal(true))).toEqual({
      type: 'Operator',
      operator: 'Or',
      left: { type: 'Variable', name: 'p' },
      right: { type: 'Literal', value: true },
    });
  });
});

describe('isLeaf', () => {
  it('should distinguish leaves from operators', () => {
    expect(isLeaf(literal(true))).toBe(true);
    expect(isLeaf(variable('p'))).toBe(true);
    expect(isLeaf(unary(variable('p')))).toBe(false);
  });
});

describe('nodeLabel', () => {
  it('should label each node kind', () => {
    expect(nodeLabel(literal(true))).toBe('true');
    expect(nodeLabel(literal(false))).toBe('false');
    expect(nodeLabel(variable('q'))).toBe('q');
    expect(nodeLabel(unary(literal(true)))).toBe('Not');
    expect(nodeLabel(binary(Operator.EQUIVALENCE, literal(true), literal(true)))).toBe('Equivalence');
  });
});

describe('formatTree', () => {
  it('should parenthesise every binary operator', () => {
    expect(formatTree(parse('1 ^ 0 v 1').tree)).toBe('((1 ^ 0) v 1)');
    expect(formatTree(parse('1 ^ (0 v 1)').tree)).toBe('(1 ^ (0 v 1))');
  });

  it('should print negation without parentheses', () => {
    expect(formatTree(parse('~1 v ~0 <=> 0').tree)).toBe('((~1 v ~0) <=> 0)');
    expect(formatTree(parse('~~p').tree)).toBe('~~p');
  });

  it('should print implication', () => {
    expect(formatTree(parse('p => q').tree)).toBe('(p => q)');
  });

  it('should print deeply nested trees', () => {
    const source = '~'.repeat(20000) + 'p';

    expect(formatTree(parse(source).tree)).toBe(source);
  });

  it('should mark absent children', () => {
    expect(formatTree(null)).toBe('?');
    expect(
      formatTree({ type: 'Operator', operator: Operator.AND, left: literal(true), right: null })
    ).toBe('(1 ^ ?)');
  });
});
