/**
 * Scope state threaded through lowering.
 * Immutable: every update returns a new record, and branches are recombined
 * with explicit merges.
 */
import type { ErlExpr, ErlVar, Meta } from '@fennec/ast';
import { compileError } from '@fennec/shared';
import { ann } from './utils';

export type VarKind = string | number | null; // hygiene context, or the expander's counter

export type VarEntry = {
  name: string; // internal name, e.g. `x@1`
  counter: number;
  safe: boolean;
};

export type Vars = ReadonlyMap<string, VarEntry>;

export type ScopeContext = 'match' | 'guard' | null;
export type ScopeExtra = 'pin_guard' | 'map_key' | null;

export type Scope = {
  readonly context: ScopeContext;
  readonly extra: ScopeExtra;
  readonly caller: boolean;
  readonly vars: Vars;
  readonly backupVars: Vars | null;
  readonly matchVars: Vars | null;
  readonly exportVars: Vars | null;
  readonly extraGuards: readonly ErlExpr[];
  readonly counter: ReadonlyMap<string, number>;
  readonly file: string;
};

export function createScope(file = 'nofile'): Scope {
  return {
    context: null,
    extra: null,
    caller: false,
    vars: new Map(),
    backupVars: null,
    matchVars: null,
    exportVars: null,
    extraGuards: [],
    counter: new Map(),
    file,
  };
}

export function varKey(name: string, kind: VarKind): string {
  if (typeof kind === 'number') return `${name}#${kind}`;
  return `${name}:${kind ?? 'nil'}`;
}

/** Variable kind: the expander's counter when present, the hygiene context otherwise. */
export function varKind(meta: Meta, context: string | null): VarKind {
  return meta.counter ?? context;
}

/** Fresh internal name `key@N`, counting per key. */
export function buildVar(key: string, s: Scope): [string, number, Scope] {
  const n = (s.counter.get(key) ?? 0) + 1;
  const counter = new Map(s.counter);
  counter.set(key, n);
  return [`${key}@${n}`, n, { ...s, counter }];
}

function put(vars: Vars, key: string, entry: VarEntry): Vars {
  const next = new Map(vars);
  next.set(key, entry);
  return next;
}

/**
 * Union of two variable maps. On conflict the most recent binding (highest
 * counter) wins; for the same binding an unsafe mark wins.
 */
export function mergeVarMaps(a: Vars, b: Vars): Vars {
  if (a === b) return a;
  const out = new Map(a);
  for (const [k, entry] of b) {
    const prev = out.get(k);
    if (!prev || entry.counter > prev.counter || (entry.counter === prev.counter && !entry.safe)) {
      out.set(k, entry);
    }
  }
  return out;
}

export function mergeOptVars(a: Vars | null, b: Vars | null): Vars | null {
  if (a === null) return b;
  if (b === null) return a;
  return mergeVarMaps(a, b);
}

/** `b` with the variables of both scopes. */
export function mergeVars(a: Scope, b: Scope): Scope {
  return {
    ...b,
    vars: mergeVarMaps(a.vars, b.vars),
    exportVars: mergeOptVars(a.exportVars, b.exportVars),
  };
}

/** `a` with counters, accumulated guards and the caller flag of `b`. */
export function mergeCounters(a: Scope, b: Scope): Scope {
  return {
    ...a,
    counter: b.counter,
    extraGuards: b.extraGuards,
    caller: b.caller,
  };
}

/** `mode` with the bindings accumulated in `acc`, so later siblings see earlier bindings. */
export function withBindings(mode: Scope, acc: Scope): Scope {
  return { ...mergeCounters(mode, acc), vars: acc.vars, exportVars: acc.exportVars };
}

export function lookupVar(s: Scope, name: string, kind: VarKind): VarEntry | undefined {
  return s.vars.get(varKey(name, kind));
}

/**
 * Lowers a variable reference. In match context an unseen variable gets a
 * fresh internal name; a variable repeated within the same match reuses it.
 */
export function translateVar(meta: Meta, name: string, kind: VarKind, s: Scope): [ErlVar, Scope] {
  const key = varKey(name, kind);
  const anno = ann(meta);

  if (s.context === 'match') {
    const existing = s.matchVars?.get(key);
    if (existing) return [{ type: 'var', anno, name: existing.name }, s];
    const [internal, counter, ns] = buildVar(name, s);
    const entry: VarEntry = { name: internal, counter, safe: true };
    return [
      { type: 'var', anno, name: internal },
      {
        ...ns,
        vars: put(ns.vars, key, entry),
        matchVars: put(ns.matchVars ?? new Map(), key, entry),
        exportVars: ns.exportVars === null ? null : put(ns.exportVars, key, entry),
      },
    ];
  }

  const found = s.vars.get(key);
  if (!found) return compileError('UndefinedVariable', meta, s.file, `undefined variable "${name}"`);
  return [{ type: 'var', anno, name: found.name }, s];
}

/**
 * `s` with the bindings of `from` that it does not share, marked unsafe.
 * Used where a section may run after another section aborted part way.
 */
export function exposeUnsafe(s: Scope, from: Vars): Scope {
  const vars = new Map(s.vars);
  for (const [k, entry] of from) {
    if (s.vars.get(k)?.name !== entry.name) vars.set(k, { ...entry, safe: false });
  }
  return { ...s, vars };
}
