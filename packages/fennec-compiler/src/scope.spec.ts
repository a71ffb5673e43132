import { describe, it, expect } from 'vitest';
import { CompileError } from '@fennec/shared';
import {
  buildVar,
  createScope,
  exposeUnsafe,
  mergeCounters,
  mergeVarMaps,
  mergeVars,
  translateVar,
  varKey,
  varKind,
  withBindings,
  type Scope,
  type VarEntry,
} from './scope';

const entry = (name: string, counter: number, safe = true): VarEntry => ({ name, counter, safe });

function inMatch(s: Scope): Scope {
  return { ...s, context: 'match', matchVars: new Map() };
}

describe('variable keys', () => {
  it('prefers the counter over the context', () => {
    expect(varKind({ counter: 3 }, 'Elixir')).toBe(3);
    expect(varKind({}, 'Elixir')).toBe('Elixir');
    expect(varKey('x', 3)).toBe('x#3');
    expect(varKey('x', null)).toBe('x:nil');
    expect(varKey('x', 'Elixir')).toBe('x:Elixir');
  });

  it('numbers internal names per variable', () => {
    const [a, , s1] = buildVar('x', createScope());
    const [b, n, s2] = buildVar('x', s1);
    const [c] = buildVar('y', s2);
    expect([a, b, c, n]).toEqual(['x@1', 'x@2', 'y@1', 2]);
  });
});

describe('translateVar', () => {
  it('binds fresh names in match context and reuses them within the match', () => {
    const [first, s1] = translateVar({ line: 2 }, 'x', null, inMatch(createScope()));
    const [again, s2] = translateVar({ line: 2 }, 'x', null, s1);
    expect(first).toEqual({ type: 'var', anno: { line: 2 }, name: 'x@1' });
    expect(again.name).toBe('x@1');
    expect(s2.vars.get('x:nil')).toEqual(entry('x@1', 1));
  });

  it('records bindings as exported when exports are tracked', () => {
    const [, s] = translateVar({}, 'x', null, { ...inMatch(createScope()), exportVars: new Map() });
    expect(s.exportVars?.get('x:nil')).toEqual(entry('x@1', 1));
  });

  it('rebinding in a new match picks a new name', () => {
    const [, s1] = translateVar({}, 'x', null, inMatch(createScope()));
    const [rebound] = translateVar({}, 'x', null, inMatch(s1));
    expect(rebound.name).toBe('x@2');
  });

  it('resolves references and rejects unknown variables', () => {
    const [, s1] = translateVar({}, 'x', null, inMatch(createScope()));
    const [ref] = translateVar({ line: 5 }, 'x', null, { ...s1, context: null });
    expect(ref).toEqual({ type: 'var', anno: { line: 5 }, name: 'x@1' });
    expect(() => translateVar({ line: 5 }, 'y', null, createScope('a.ex'))).toThrow(CompileError);
    expect(() => translateVar({ line: 5 }, 'y', null, createScope('a.ex'))).toThrow('undefined variable "y"');
  });

  it('keeps hygiene contexts apart', () => {
    const [, s1] = translateVar({}, 'x', 'Elixir', inMatch(createScope()));
    expect(() => translateVar({}, 'x', null, { ...s1, context: null })).toThrow('undefined variable "x"');
  });
});

describe('merging', () => {
  it('keeps the most recent binding and the unsafe mark', () => {
    const a = new Map([['x:nil', entry('x@1', 1)], ['y:nil', entry('y@2', 2)]]);
    const b = new Map([['x:nil', entry('x@2', 2)], ['y:nil', entry('y@2', 2, false)]]);
    expect(mergeVarMaps(a, b)).toEqual(new Map([['x:nil', entry('x@2', 2)], ['y:nil', entry('y@2', 2, false)]]));
    expect(mergeVarMaps(b, a).get('x:nil')).toEqual(entry('x@2', 2));
  });

  it('mergeVars unions variables onto the second scope', () => {
    const a: Scope = { ...createScope(), vars: new Map([['x:nil', entry('x@1', 1)]]) };
    const b: Scope = { ...createScope(), context: 'guard', vars: new Map([['y:nil', entry('y@1', 1)]]) };
    const merged = mergeVars(a, b);
    expect(merged.context).toBe('guard');
    expect([...merged.vars.keys()]).toEqual(['x:nil', 'y:nil']);
  });

  it('mergeCounters keeps variables of the first scope', () => {
    const base = createScope();
    const [, , counted] = buildVar('x', base);
    const moved: Scope = { ...counted, vars: new Map([['x:nil', entry('x@1', 1)]]), caller: true };
    const merged = mergeCounters(base, moved);
    expect(merged.vars.size).toBe(0);
    expect(merged.counter.get('x')).toBe(1);
    expect(merged.caller).toBe(true);
  });

  it('withBindings takes the mode of the first scope and the bindings of the second', () => {
    const mode: Scope = { ...createScope(), context: 'guard' };
    const acc: Scope = { ...createScope(), vars: new Map([['x:nil', entry('x@1', 1)]]) };
    const s = withBindings(mode, acc);
    expect(s.context).toBe('guard');
    expect(s.vars.get('x:nil')?.name).toBe('x@1');
  });

  it('exposeUnsafe marks bindings the base does not share', () => {
    const base: Scope = { ...createScope(), vars: new Map([['x:nil', entry('x@1', 1)]]) };
    const from = new Map([['x:nil', entry('x@1', 1)], ['y:nil', entry('y@1', 1)]]);
    const s = exposeUnsafe(base, from);
    expect(s.vars.get('x:nil')).toEqual(entry('x@1', 1));
    expect(s.vars.get('y:nil')).toEqual(entry('y@1', 1, false));
  });
});
