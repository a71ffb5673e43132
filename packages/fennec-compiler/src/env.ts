/**
 * Compile-time environment for the expander.
 * Read-only from the expander's perspective apart from drawing fresh counters.
 */
import type { Meta, Quoted } from '@fennec/ast';
import { atom } from '@fennec/ast';
import { expandCaptures } from './fn';

export interface CounterSource {
  next(): number;
}

export function createCounter(start = 1): CounterSource {
  let n = start;
  return { next: () => n++ };
}

export type ClauseExpander = (clause: Quoted, env: Env) => [Quoted, Env];

export interface Env {
  readonly file: string;
  readonly counter: CounterSource;
  /** module -> set of `name/arity` */
  readonly functions: ReadonlyMap<string, ReadonlySet<string>>;
  /** local `name/arity` pairs that are macros and so never resolve to a function value */
  readonly macros: ReadonlySet<string>;
  expandClause: ClauseExpander;
  expand(ast: Quoted, env: Env): [Quoted, Env];
  resolveImport(meta: Meta, name: string, arity: number, env: Env): boolean;
  resolveRequire(meta: Meta, module: string, name: string, arity: number, env: Env): boolean;
}

export type EnvOptions = {
  file?: string;
  counter?: CounterSource;
  functions?: Record<string, string[]>;
  macros?: string[];
  expandClause?: ClauseExpander;
  expand?: Env['expand'];
  resolveImport?: Env['resolveImport'];
  resolveRequire?: Env['resolveRequire'];
};

// `Foo.Bar` as written -> `Elixir.Foo.Bar`
function expandAliases(ast: Quoted, env: Env): [Quoted, Env] {
  if (ast.type === 'Call' && ast.head === '__aliases__' && ast.args.length > 0) {
    const parts: string[] = [];
    for (const a of ast.args) {
      if (a.type !== 'Atom') return [ast, env];
      parts.push(a.value);
    }
    return [atom(`Elixir.${parts.join('.')}`), env];
  }
  return [ast, env];
}

// Forms the translator handles itself; never importable functions
const SPECIAL_FORMS = new Set([
  '&', '.', '=', '^', '->', '::', '%', '%{}', '{}', '<<>>', '__block__', '__aliases__', '__CALLER__',
  'fn', 'case', 'cond', 'try', 'receive', 'for', 'with', 'quote', 'unquote', 'super',
]);

function hasFunction(env: Env, module: string, name: string, arity: number): boolean {
  return env.functions.get(module)?.has(`${name}/${arity}`) ?? false;
}

export function createEnv(options: EnvOptions = {}): Env {
  const functions = new Map<string, ReadonlySet<string>>();
  for (const [mod, fas] of Object.entries(options.functions ?? {})) functions.set(mod, new Set(fas));
  return {
    file: options.file ?? 'nofile',
    counter: options.counter ?? createCounter(),
    functions,
    macros: new Set(options.macros ?? []),
    expandClause: options.expandClause ?? ((clause, env) => [expandCaptures(clause, env), env]),
    expand: options.expand ?? expandAliases,
    resolveImport:
      options.resolveImport ??
      ((meta, name, arity, env) => {
        if (SPECIAL_FORMS.has(name)) return false;
        return meta.import !== undefined ? hasFunction(env, meta.import, name, arity) : !env.macros.has(`${name}/${arity}`);
      }),
    resolveRequire: options.resolveRequire ?? ((_meta, module, name, arity, env) => hasFunction(env, module, name, arity)),
  };
}
