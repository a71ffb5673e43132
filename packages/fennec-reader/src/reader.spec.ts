import { describe, it, expect } from 'vitest';
import { atom, bin, call, float, int, list, pair, v } from '@fennec/ast';
import { readQuoted, ReadError } from './index';

describe('readQuoted', () => {
  it('reads local calls with metadata', () => {
    expect(readQuoted('{:foo, [line: 3], [1, 2.5, "hi"]}')).toEqual(call('foo', [int(1), float(2.5), bin('hi')], { line: 3 }));
  });

  it('reads variables with a counter or a context', () => {
    expect(readQuoted('{:x, [counter: 4], nil}')).toEqual(v('x', { counter: 4 }, null));
    expect(readQuoted('{:x, [], Elixir}')).toEqual(v('x', {}, 'Elixir'));
    expect(readQuoted('{:x, [], :my_ctx}')).toEqual(v('x', {}, 'my_ctx'));
  });

  it('reads remote calls with operator atoms', () => {
    expect(readQuoted('{{:., [], [:erlang, :+]}, [line: 1], [1, 2]}')).toEqual(
      call(call('.', [atom('erlang'), atom('+')]), [int(1), int(2)], { line: 1 }),
    );
  });

  it('reads keyword lists, pairs, aliases and quoted atoms', () => {
    expect(readQuoted('[do: :ok, else: nil]')).toEqual(list([pair(atom('do'), atom('ok')), pair(atom('else'), atom('nil'))]));
    expect(readQuoted('{1, true}')).toEqual(pair(int(1), atom('true')));
    expect(readQuoted('Foo.Bar')).toEqual(atom('Elixir.Foo.Bar'));
    expect(readQuoted(':"hello world"')).toEqual(atom('hello world'));
  });

  it('reads numbers with separators and signs', () => {
    expect(readQuoted('1_000')).toEqual(int(1000));
    expect(readQuoted('-3')).toEqual(int(-3));
    expect(readQuoted('-0.5')).toEqual(float(-0.5));
  });

  it('rejects integers that would lose precision', () => {
    expect(readQuoted('9007199254740991')).toEqual(int(9007199254740991));
    expect(() => readQuoted('9007199254740993')).toThrow(
      'integer literal 9007199254740993 is outside the exactly representable range (line 1, column 1)',
    );
  });

  it('skips comments', () => {
    expect(readQuoted('# leading note\n:ok')).toEqual(atom('ok'));
  });

  it('reads import hints', () => {
    const q = readQuoted('{:&, [line: 2, import_fa: {Kernel, :function}], [1]}');
    expect(q).toEqual(call('&', [int(1)], { line: 2, importFa: { receiver: 'Elixir.Kernel', context: 'function' } }));
  });

  it('rejects tuples of other sizes', () => {
    expect(() => readQuoted('{1, 2, 3, 4}')).toThrow(
      'only 2- and 3-element tuples are valid quoted expressions, got 4 elements (line 1, column 1)',
    );
  });

  it('rejects malformed metadata', () => {
    expect(() => readQuoted('{:x, 1, nil}')).toThrow('the second element of a 3-tuple must be a keyword list (line 1, column 1)');
    expect(() => readQuoted('{:x, [line: :one], nil}')).toThrow('meta line must be an integer (line 1, column 1)');
  });

  it('reports empty, trailing and unknown input', () => {
    expect(() => readQuoted('')).toThrow('empty input (line 1, column 1)');
    expect(() => readQuoted(':a :b')).toThrow('unexpected trailing input (line 1, column 4)');
    expect(() => readQuoted('foo')).toThrow('unexpected identifier foo, atoms are written as :foo (line 1, column 1)');
    expect(() => readQuoted('{:x, $}')).toThrow(ReadError);
  });

  it('logs progress in debug mode', () => {
    const logs: string[] = [];
    readQuoted('{:x, [file: "a"], nil}', { debug: true, logger: (m) => logs.push(m) });
    expect(logs).toEqual(['lex start (len=22)', 'lex done (tokens=10)', 'ignored meta keys: file', 'read done (Var)']);
  });
});
