/**
 * Lowerings the translator delegates: bitstrings, try handlers, comprehensions
 * and `with`. Each can be replaced through `TranslatorOptions.collaborators`.
 */
import type { ErlBinElement, ErlClause, ErlExpr, Meta, Quoted } from '@fennec/ast';
import { atom, call, isCallTo, v } from '@fennec/ast';
import { compileError } from '@fennec/shared';
import { clause, extractSplatGuards, type ClausePair } from './clauses';
import type { Lowerer } from './lowerer';
import { mergeCounters, type Scope } from './scope';
import { toSource } from './printer';
import { ann } from './utils';

export type TryHandlers = {
  catch: ClausePair[];
  rescue: ClausePair[];
};

export interface Collaborators {
  bitstring(t: Lowerer, meta: Meta, args: Quoted[], s: Scope): [ErlExpr, Scope];
  tryClauses(t: Lowerer, meta: Meta, handlers: TryHandlers, s: Scope): [ErlClause[], Scope];
  comprehension(t: Lowerer, meta: Meta, args: Quoted[], returnValue: boolean, s: Scope): [ErlExpr, Scope];
  with(t: Lowerer, meta: Meta, args: Quoted[], s: Scope): [ErlExpr, Scope];
}

// Bitstrings

function specParts(q: Quoted): Quoted[] {
  if (isCallTo(q, '-') && q.args.length === 2) {
    const [a, b] = q.args;
    if (a && b) return [...specParts(a), ...specParts(b)];
  }
  return [q];
}

function bitstring(t: Lowerer, meta: Meta, args: Quoted[], s: Scope): [ErlExpr, Scope] {
  const anno = ann(meta);
  const elements: ErlBinElement[] = [];
  let acc = s;

  for (const arg of args) {
    const [value, spec] = isCallTo(arg, '::') && arg.args.length === 2 ? arg.args : [arg, undefined];
    if (!value) continue;

    let tValue: ErlExpr;
    if (value.type === 'Binary') {
      tValue = { type: 'string', anno, value: value.value };
    } else if (s.context === 'match') {
      [tValue, acc] = t.translate(value, acc);
    } else {
      [tValue, acc] = t.translateArg(value, acc, s);
    }

    let size: ErlExpr | 'default' = 'default';
    const types: string[] = [];
    for (const part of spec ? specParts(spec) : []) {
      const [only] = part.type === 'Call' ? part.args : [];
      if (part.type === 'Integer') {
        size = { type: 'integer', anno, value: part.value };
      } else if (isCallTo(part, 'size') && only) {
        // sizes refer to variables bound earlier, never bind new ones
        size = t.translate(only, { ...acc, context: null, extra: null })[0];
      } else if (isCallTo(part, 'unit') && only && only.type === 'Integer') {
        types.push(`unit:${only.value}`);
      } else if (part.type === 'Var') {
        types.push(part.name);
      } else if (part.type === 'Call' && typeof part.head === 'string' && part.args.length === 0) {
        types.push(part.head);
      } else {
        compileError('UnsupportedConstruct', meta, s.file, `unsupported bitstring specifier: ${toSource(part)}`);
      }
    }

    elements.push({ type: 'bin_element', anno, value: tValue, size, typeSpec: types.length ? types : 'default' });
  }

  return [{ type: 'bin', anno, elements }, acc];
}

// try handlers

/** `{kind, reason, stacktrace}`; the stacktrace is never bound. */
function exceptionPattern(kind: Quoted, reason: Quoted): Quoted {
  return call('{}', [kind, reason, v('_')]);
}

function handlerPattern(section: 'catch' | 'rescue', pair: ClausePair, file: string): [Quoted, Quoted[]] {
  const [args, guards] = extractSplatGuards(pair.left);
  const [first, second] = args;
  if (section === 'catch') {
    if (args.length === 1 && first) return [exceptionPattern(atom('throw'), first), guards];
    if (args.length === 2 && first && second) return [exceptionPattern(first, second), guards];
    return compileError('InvalidForm', pair.meta, file, `expected one or two patterns in catch, got ${args.length}`);
  }
  if (args.length === 1 && first && first.type === 'Var') return [exceptionPattern(atom('error'), first), guards];
  return compileError(
    'UnsupportedConstruct',
    pair.meta,
    file,
    `rescue only binds a variable here, got: ${args.map(toSource).join(', ')}`,
  );
}

function tryClauses(t: Lowerer, _meta: Meta, handlers: TryHandlers, s: Scope): [ErlClause[], Scope] {
  const out: ErlClause[] = [];
  let acc = s;
  const sections = [
    ...handlers.rescue.map((p) => ['rescue', p] as const),
    ...handlers.catch.map((p) => ['catch', p] as const),
  ];
  for (const [section, pair] of sections) {
    const [pattern, guards] = handlerPattern(section, pair, s.file);
    const [tc, ts] = clause(t, pair.meta, (a, sc) => t.translateArgs(a, sc), [pattern], pair.right, guards, acc);
    out.push(tc);
    acc = mergeCounters(s, ts);
  }
  return [out, acc];
}

function comprehension(_t: Lowerer, meta: Meta, _args: Quoted[], _returnValue: boolean, s: Scope): never {
  return compileError('UnsupportedConstruct', meta, s.file, 'for comprehensions need a lowering; pass one in collaborators');
}

function withLowering(_t: Lowerer, meta: Meta, _args: Quoted[], s: Scope): never {
  return compileError('UnsupportedConstruct', meta, s.file, 'with needs a lowering; pass one in collaborators');
}

export const defaultCollaborators: Collaborators = {
  bitstring,
  tryClauses,
  comprehension,
  with: withLowering,
};
