import { describe, it, expect } from 'vitest';
import type { Quoted } from '@fennec/ast';
import { atom, block, call, clause, dot, int, list, placeholder, v } from '@fennec/ast';
import { CompileError, type CompileErrorKind } from '@fennec/shared';
import { createCounter, createEnv, type Env } from './env';
import { capture, captureToQuoted, expandCaptures, expandFn, fnArity, isSequentialAndNotEmpty } from './fn';
import { toSource } from './printer';

const alias = (name: string) => call('__aliases__', [atom(name)]);
const amp = (expr: Quoted) => call('&', [expr], { line: 4 });
const ref = (target: Quoted, arity: Quoted) => amp(call('/', [target, arity]));

function env(): Env {
  return createEnv({
    file: 'lib/demo.ex',
    counter: createCounter(1),
    functions: { 'Elixir.Enum': ['map/2'], 'Elixir.Kernel': ['length/1'] },
    macros: ['if/2'],
  });
}

function expand(q: Quoted): string {
  return toSource(expandCaptures(q, env()));
}

function errorOf(fn: () => unknown): CompileError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error('expected a CompileError');
}

function expectError(q: Quoted, kind: CompileErrorKind, message: string) {
  const err = errorOf(() => expandCaptures(q, env()));
  expect(err.kind).toBe(kind);
  expect(err.message).toBe(message);
  expect(err.line).toBe(4);
}

describe('fnArity', () => {
  it('counts params, excluding a trailing guard', () => {
    expect(fnArity([v('a'), v('b')])).toBe(2);
    expect(fnArity([call('when', [v('a'), v('b'), atom('true')])])).toBe(2);
    expect(fnArity([])).toBe(0);
  });
});

describe('isSequentialAndNotEmpty', () => {
  it('accepts &1..&K in order only', () => {
    expect(isSequentialAndNotEmpty([placeholder(1), placeholder(2)])).toBe(true);
    expect(isSequentialAndNotEmpty([placeholder(2), placeholder(1)])).toBe(false);
    expect(isSequentialAndNotEmpty([placeholder(1), int(2)])).toBe(false);
    expect(isSequentialAndNotEmpty([])).toBe(false);
  });
});

describe('expandFn', () => {
  it('keeps clauses of equal arity', () => {
    const clauses = [clause([v('x')], v('x')), clause([call('when', [v('y'), atom('true')])], v('y'))];
    const [fn] = expandFn({ line: 2 }, clauses, env());
    expect(toSource(fn)).toBe('fn x -> x; y when true -> y end');
  });

  it('rejects clauses with different arities', () => {
    const err = errorOf(() => expandFn({ line: 2 }, [clause([v('x')], v('x')), clause([v('x'), v('y')], v('y'))], env()));
    expect(err.kind).toBe('ArityMismatch');
    expect(err.format()).toBe('lib/demo.ex:2: cannot mix clauses with different arities in anonymous functions');
  });

  it('rejects anything but -> clauses', () => {
    const err = errorOf(() => expandFn({ line: 2 }, [int(1)], env()));
    expect(err.kind).toBe('InvalidForm');
    expect(err.message).toBe('expected -> clauses for fn, got: 1');
  });
});

describe('capture', () => {
  it('resolves a known remote function to a reference', () => {
    const res = capture({}, call('/', [call(dot(alias('Enum'), 'map'), []), int(2)]), env());
    expect(res).toMatchObject({ kind: 'remote', receiver: atom('Elixir.Enum'), name: 'map', arity: 2 });
  });

  it('resolves a local function to a reference', () => {
    const res = capture({}, call('/', [v('foo'), int(1)]), env());
    expect(res).toMatchObject({ kind: 'local', name: 'foo', arity: 1 });
  });

  it('uses the import hint recorded on the capture', () => {
    const meta = { importFa: { receiver: 'Elixir.Kernel', context: 'function' } };
    const res = capture(meta, call('/', [v('length'), int(1)]), env());
    expect(res).toMatchObject({ kind: 'remote', receiver: atom('Elixir.Kernel'), name: 'length', arity: 1 });
  });

  it('builds a closure with hygienic capture variables', () => {
    const res = capture({ line: 4 }, call('+', [placeholder(1), int(1)]), env());
    expect(res.kind).toBe('expand');
    if (res.kind !== 'expand') return;
    expect(res.fn).toEqual(
      call('fn', [clause([v('x1', { counter: 1 }, 'fennec_fn')], call('+', [v('x1', { counter: 1 }, 'fennec_fn'), int(1)]), { line: 4 })], {
        line: 4,
      }),
    );
  });
});

describe('captureToQuoted', () => {
  it('renders references as function-value nodes', () => {
    const e = env();
    expect(toSource(captureToQuoted({}, { kind: 'remote', receiver: atom('Elixir.Enum'), name: 'map', arity: 2, env: e }))).toBe(
      '&Enum.map/2',
    );
    expect(toSource(captureToQuoted({}, { kind: 'local', name: 'foo', arity: 0, env: e }))).toBe('&foo/0');
  });
});

describe('expandCaptures', () => {
  it('keeps function references', () => {
    expect(expand(ref(call(dot(alias('Enum'), 'map'), []), int(2)))).toBe('&Enum.map/2');
    expect(expand(ref(v('foo'), int(1)))).toBe('&foo/1');
    expect(expand(ref(call(dot(v('mod'), 'run'), []), int(1)))).toBe('&mod.run/1');
  });

  it('keeps remote calls on sequential placeholders as references', () => {
    expect(expand(amp(call(dot(alias('Enum'), 'map'), [placeholder(1), placeholder(2)])))).toBe('&Enum.map/2');
    expect(expand(amp(call(dot(alias('Enum'), 'map'), [placeholder(2), placeholder(1)])))).toBe('fn x1, x2 -> Enum.map(x2, x1) end');
  });

  it('accepts arities from 0 to 255', () => {
    expect(expand(ref(v('foo'), int(0)))).toBe('&foo/0');
    expect(expand(ref(v('foo'), int(255)))).toBe('&foo/255');
  });

  it('is unchanged by a second expansion', () => {
    const source = list([
      amp(call('+', [placeholder(1), int(1)])),
      ref(call(dot(alias('Enum'), 'map'), []), int(2)),
      call('fn', [clause([v('x')], amp(call(dot(alias('Foo'), 'bar'), [placeholder(1), v('x')])))]),
    ]);
    const once = expandCaptures(source, env());
    expect(expandCaptures(once, env())).toEqual(once);
  });

  it('turns unresolved references into closures', () => {
    expect(expand(ref(call(dot(alias('Foo'), 'bar'), []), int(1)))).toBe('fn x1 -> Foo.bar(x1) end');
    expect(expand(ref(v('if'), int(2)))).toBe('fn x1, x2 -> if(x1, x2) end');
  });

  it('orders closure params by placeholder position', () => {
    expect(expand(amp({ type: 'Pair', left: placeholder(2), right: placeholder(1) }))).toBe('fn x1, x2 -> {x2, x1} end');
    expect(expand(amp(list([placeholder(1), placeholder(2)])))).toBe('fn x1, x2 -> [x1, x2] end');
    expect(expand(amp(call('+', [placeholder(1), placeholder(1)])))).toBe('fn x1 -> x1 + x1 end');
  });

  it('escapes placeholders in a remote receiver', () => {
    expect(expand(amp(call(dot(placeholder(1), 'size'), [placeholder(2)])))).toBe('fn x1, x2 -> x1.size(x2) end');
  });

  it('expands an identity capture', () => {
    expect(expand(amp(placeholder(1)))).toBe('fn x1 -> x1 end');
  });

  it('draws a fresh counter for every capture', () => {
    const out = expandCaptures(list([amp(call('+', [placeholder(1), int(1)])), amp(call('-', [placeholder(1), int(1)]))]), env());
    expect(out.type === 'List' && out.items.map((i) => (i.type === 'Call' ? i.args[0] : null))).toEqual([
      clause([v('x1', { counter: 1 }, 'fennec_fn')], call('+', [v('x1', { counter: 1 }, 'fennec_fn'), int(1)]), { line: 4 }),
      clause([v('x1', { counter: 2 }, 'fennec_fn')], call('-', [v('x1', { counter: 2 }, 'fennec_fn'), int(1)]), { line: 4 }),
    ]);
  });

  it('expands aliases and fn bodies', () => {
    expect(expand(call('fn', [clause([v('x')], call(dot(alias('Enum'), 'map'), [v('x'), amp(call('+', [placeholder(1), int(1)]))]))]))).toBe(
      'fn x -> Enum.map(x, fn x1 -> x1 + 1 end) end',
    );
  });

  it('rejects placeholders outside a capture body', () => {
    expectError(amp(int(0)), 'BareCaptureDigit', 'unhandled &0 outside of a capture');
    expectError(amp(int(2)), 'BareCaptureDigit', 'unhandled &2 outside of a capture');
  });

  it('rejects non-positive and missing placeholders', () => {
    const zero = call('&', [int(0)], { line: 4 });
    expectError(amp(call('+', [zero, int(1)])), 'NonPositivePlaceholder', 'capture &0 is not allowed');
    expectError(amp(int(-1)), 'NonPositivePlaceholder', 'capture &-1 is not allowed');
    expectError(amp(call('+', [placeholder(1), placeholder(3)])), 'GapInPlaceholders', 'capture &3 cannot be defined without &2');
  });

  it('rejects nested captures', () => {
    expectError(amp(amp(placeholder(1))), 'NestedCapture', 'nested captures via & are not allowed: &&1');
  });

  it('rejects out of range arities', () => {
    expectError(ref(v('foo'), int(-1)), 'InvalidCaptureArity', 'invalid arity for &, expected a number between 0 and 255, got: -1');
    expectError(ref(v('foo'), int(256)), 'InvalidCaptureArity', 'invalid arity for &, expected a number between 0 and 255, got: 256');
    expectError(ref(v('foo'), { type: 'Float', value: 1.5 }), 'InvalidCaptureArity', 'invalid arity for &, expected a number between 0 and 255, got: 1.5');
  });

  it('rejects captures without placeholders', () => {
    const shape = 'invalid args for &, expected an expression in the format of &Mod.fun/arity, &local/arity or a capture containing at least one argument as &1, got: ';
    expectError(amp(atom('ok')), 'InvalidCaptureShape', `${shape}:ok`);
    expectError(amp(call('foo', [])), 'InvalidCaptureShape', `${shape}foo()`);
    expectError(amp(list([])), 'InvalidCaptureShape', `${shape}[]`);
  });

  it('rejects blocks', () => {
    expectError(amp(block([v('a'), v('b')])), 'BlockInCapture', 'invalid args for &, block expressions are not allowed, got: (a; b)');
    expect(expand(amp(block([call('+', [placeholder(1), int(2)])])))).toBe('fn x1 -> x1 + 2 end');
  });
});
