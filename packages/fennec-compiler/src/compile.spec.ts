import { describe, it, expect } from 'vitest';
import { call, formatErl, int, v } from '@fennec/ast';
import { ReadError } from '@fennec/reader';
import { CompileError } from '@fennec/shared';
import { compile } from './compile';
import { toSource } from './printer';

describe('compile', () => {
  it('reads and lowers source text', () => {
    const res = compile('{:=, [line: 1], [{:x, [line: 1], nil}, 1]}');
    expect(formatErl(res.form)).toBe('x@1 = 1');
    expect(res.form.anno).toEqual({ line: 1 });
    expect(res.scope.vars.get('x:nil')?.name).toBe('x@1');
    expect(res.warnings).toEqual([]);
  });

  it('expands captures before lowering', () => {
    const res = compile('{:&, [line: 2], [{{:., [line: 2], [:erlang, :+]}, [line: 2], [{:&, [line: 2], [1]}, 1]}]}');
    expect(toSource(res.expanded)).toBe('fn x1 -> :erlang.+(x1, 1) end');
    expect(formatErl(res.form)).toBe('fun (x1@1) -> x1@1 + 1 end');
  });

  it('keeps captures of known functions as references', () => {
    const res = compile(
      '{:&, [line: 1], [{:/, [line: 1], [{{:., [line: 1], [{:__aliases__, [line: 1], [:Enum]}, :map]}, [line: 1], []}, 2]}]}',
      { env: { functions: { 'Elixir.Enum': ['map/2'] } } },
    );
    expect(toSource(res.expanded)).toBe('&Enum.map/2');
    expect(formatErl(res.form)).toBe("fun 'Elixir.Enum':map/2");
  });

  it('accepts quoted input and pre-bound variables', () => {
    const res = compile(call('foo', [v('y'), int(1)]), { bindings: ['y'] });
    expect(formatErl(res.form)).toBe('foo(y@1, 1)');
  });

  it('collects warnings', () => {
    const res = compile(call('=', [call('^', [v('_x', { line: 5 })]), int(1)]), { bindings: ['_x'], file: 'lib/w.ex' });
    expect(res.warnings.map((w) => [w.kind, w.file, w.line])).toEqual([['UnderscoredPin', 'lib/w.ex', 5]]);
  });

  it('reports errors against the file', () => {
    let caught: unknown;
    try {
      compile(v('nope'), { file: 'lib/e.ex' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CompileError);
    expect(caught instanceof CompileError && caught.format()).toBe('lib/e.ex:0: undefined variable "nope"');
  });

  it('passes read errors through', () => {
    expect(() => compile('{1, 2, 3, 4}')).toThrow(ReadError);
  });

  it('logs every stage in debug mode', () => {
    const logs: string[] = [];
    compile(':ok', { debug: true, logger: (m) => logs.push(m) });
    expect(logs).toEqual(['lex start (len=3)', 'lex done (tokens=1)', 'read done (Atom)', 'expanded :ok', 'lowering :ok', 'lowered to ok']);
  });
});
