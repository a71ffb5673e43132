import { describe, it, expect } from 'vitest';
import { atom, bin, block, call, clause, float, int, kw, list, remote, v } from '@fennec/ast';
import { ann, isGuardOp, literalToErl, returnsBoolean } from './utils';

describe('ann', () => {
  it('carries the line and the generated flag', () => {
    expect(ann({ line: 3 })).toEqual({ line: 3 });
    expect(ann({ line: 3, generated: true })).toEqual({ line: 3, generated: true });
    expect(ann({})).toEqual({ line: 0 });
  });
});

describe('literalToErl', () => {
  it('lowers literals at line 0', () => {
    expect(literalToErl(atom('ok'))).toEqual({ type: 'atom', anno: { line: 0 }, value: 'ok' });
    expect(literalToErl(float(1.5))).toEqual({ type: 'float', anno: { line: 0 }, value: 1.5 });
    expect(literalToErl(bin('hi'))).toEqual({
      type: 'bin',
      anno: { line: 0 },
      elements: [{ type: 'bin_element', anno: { line: 0 }, value: { type: 'string', anno: { line: 0 }, value: 'hi' }, size: 'default', typeSpec: 'default' }],
    });
  });

  it('lowers negative numbers as negation', () => {
    expect(literalToErl(int(-3))).toEqual({ type: 'op', anno: { line: 0 }, op: '-', operands: [{ type: 'integer', anno: { line: 0 }, value: 3 }] });
  });
});

describe('isGuardOp', () => {
  it('knows operator arities', () => {
    expect(isGuardOp('+', 2)).toBe(true);
    expect(isGuardOp('-', 1)).toBe(true);
    expect(isGuardOp('not', 1)).toBe(true);
    expect(isGuardOp('not', 2)).toBe(false);
    expect(isGuardOp('=:=', 2)).toBe(true);
    expect(isGuardOp('andalso', 2)).toBe(true);
    expect(isGuardOp('element', 2)).toBe(false);
  });
});

describe('returnsBoolean', () => {
  it('recognises boolean runtime calls', () => {
    expect(returnsBoolean(atom('true'))).toBe(true);
    expect(returnsBoolean(remote('erlang', 'is_atom', [v('x')]))).toBe(true);
    expect(returnsBoolean(remote('erlang', '<', [v('x'), int(1)]))).toBe(true);
    expect(returnsBoolean(remote('erlang', '+', [v('x'), int(1)]))).toBe(false);
    expect(returnsBoolean(remote('erlang', 'is_function', [v('f'), int(1)]))).toBe(true);
    expect(returnsBoolean(remote('lists', 'member', [v('x'), v('y')]))).toBe(false);
  });

  it('follows the right side of short-circuit operators', () => {
    expect(returnsBoolean(remote('erlang', 'andalso', [v('x'), remote('erlang', 'is_list', [v('y')])]))).toBe(true);
    expect(returnsBoolean(remote('erlang', 'orelse', [v('x'), v('y')]))).toBe(false);
  });

  it('looks into case clauses and blocks', () => {
    const allBool = call('case', [v('x'), kw({ do: list([clause([int(1)], atom('true')), clause([v('_')], atom('false'))]) })]);
    const mixed = call('case', [v('x'), kw({ do: list([clause([int(1)], atom('true')), clause([v('_')], int(0))]) })]);
    expect(returnsBoolean(allBool)).toBe(true);
    expect(returnsBoolean(mixed)).toBe(false);
    expect(returnsBoolean(block([v('x'), atom('false')]))).toBe(true);
  });
});
