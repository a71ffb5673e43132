/**
 * Helpers shared by every multi-clause construct: match mode, single clauses,
 * clause lists with variable export between branches, and guard extraction.
 */
import type { ErlClause, ErlExpr, Meta, Quoted } from '@fennec/ast';
import { isCallTo, keywordGet, isAtomValue } from '@fennec/ast';
import { compileError } from '@fennec/shared';
import type { Lowerer } from './lowerer';
import { buildVar, mergeCounters, mergeOptVars, mergeVarMaps, type Scope, type VarEntry, type Vars } from './scope';
import { ann, eAtom, eTuple, eVar, splitLast, unblock } from './utils';

export type PairKind = 'match' | 'expr';

export type ClausePair = {
  kind: PairKind;
  meta: Meta;
  left: Quoted[];
  right: Quoted;
};

export type ArgsLowering = (args: Quoted[], s: Scope) => [ErlExpr[], Scope];

/** `->` clauses stored under `key` in a keyword list. */
export function getPairs(key: string, kv: Quoted, kind: PairKind, file: string, allowNil = false): ClausePair[] {
  const value = keywordGet(kv, key);
  if (value === undefined) return [];
  if (allowNil && isAtomValue(value, 'nil')) return [];
  if (value.type !== 'List') return compileError('InvalidForm', {}, file, `expected a list of -> clauses for ${key}`);
  const pairs: ClausePair[] = [];
  for (const item of value.items) {
    if (!isCallTo(item, '->') || item.args.length !== 2) continue;
    const [left, right] = item.args;
    if (!left || !right || left.type !== 'List') continue;
    pairs.push({ kind, meta: item.meta, left: left.items, right });
  }
  return pairs;
}

function extractOrGuards(q: Quoted): Quoted[] {
  if (isCallTo(q, 'when') && q.args.length === 2) {
    const [left, right] = q.args;
    if (left && right) return [left, ...extractOrGuards(right)];
  }
  return [q];
}

/** `pattern when guard` -> [pattern, guards] */
export function extractGuards(q: Quoted): [Quoted, Quoted[]] {
  if (isCallTo(q, 'when') && q.args.length === 2) {
    const [left, right] = q.args;
    if (left && right) return [left, extractOrGuards(right)];
  }
  return [q, []];
}

/** Function heads: `[when(a, b, guard)]` -> [[a, b], guards] */
export function extractSplatGuards(args: Quoted[]): [Quoted[], Quoted[]] {
  const [only] = args;
  if (args.length === 1 && only && isCallTo(only, 'when') && only.args.length >= 2) {
    const split = splitLast(only.args);
    if (split) return [split[0], extractOrGuards(split[1])];
  }
  return [args, []];
}

/**
 * Runs `fun` in match context. Pins see `backupVars`, the bindings as they
 * stood before the match began.
 */
export function match<T, R>(fun: (args: T, s: Scope) => [R, Scope], args: T, s: Scope): [R, Scope] {
  if (s.context === 'match') return fun(args, s);
  const [result, ns] = fun(args, { ...s, context: 'match', matchVars: new Map(), backupVars: s.vars });
  return [result, { ...ns, context: s.context, matchVars: s.matchVars, backupVars: s.backupVars }];
}

function translateGuards(t: Lowerer, guards: Quoted[], extra: readonly ErlExpr[], s: Scope): ErlExpr[][] {
  const sg: Scope = { ...s, context: 'guard', extraGuards: [] };
  if (guards.length === 0) return extra.length ? [[...extra]] : [];
  return guards.map((g) => [t.translate(g, sg)[0], ...extra]);
}

export function clause(
  t: Lowerer,
  meta: Meta,
  fun: ArgsLowering,
  args: Quoted[],
  expr: Quoted,
  guards: Quoted[],
  s: Scope,
): [ErlClause, Scope] {
  const [tArgs, sa] = match(fun, args, { ...s, extraGuards: [] });
  const [tExpr, se] = t.translate(expr, { ...sa, extraGuards: [] });
  const tGuards = translateGuards(t, guards, sa.extraGuards, sa);
  return [{ type: 'clause', anno: ann(meta), patterns: tArgs, guards: tGuards, body: unblock(tExpr) }, se];
}

function eachClause(t: Lowerer, pair: ClausePair, s: Scope): [ErlClause, Scope] {
  const [condition] = pair.left;
  if (pair.left.length !== 1 || !condition) {
    return compileError('InvalidForm', pair.meta, s.file, `expected a single pattern per clause, got ${pair.left.length}`);
  }
  if (pair.kind === 'match') {
    const [arg, guards] = extractGuards(condition);
    return clause(t, pair.meta, (a, sc) => t.translateArgs(a, sc), [arg], pair.right, guards, s);
  }
  const [tCondition, sc] = t.translate(condition, s);
  const [tExpr, sb] = t.translate(pair.right, sc);
  return [{ type: 'clause', anno: ann(pair.meta), patterns: [tCondition], guards: [], body: unblock(tExpr) }, sb];
}

type FinalVar = { key: string; entry: VarEntry; fallback: ErlExpr };

function hasMatchTuple(e: ErlExpr): boolean {
  switch (e.type) {
    case 'match':
    case 'case':
    case 'receive':
      return true;
    case 'fun':
    case 'fun_local':
    case 'fun_remote':
    case 'atom':
    case 'integer':
    case 'float':
    case 'string':
    case 'var':
    case 'nil':
      return false;
    case 'cons':
      return hasMatchTuple(e.head) || hasMatchTuple(e.tail);
    case 'tuple':
      return e.elements.some(hasMatchTuple);
    case 'map':
      return (e.base !== null && hasMatchTuple(e.base)) || e.fields.some((f) => hasMatchTuple(f.key) || hasMatchTuple(f.value));
    case 'block':
      return e.body.some(hasMatchTuple);
    case 'op':
      return e.operands.some(hasMatchTuple);
    case 'call':
      return (e.callee.type !== 'remote' && hasMatchTuple(e.callee)) || e.args.some(hasMatchTuple);
    case 'try':
      return true;
    case 'bin':
      return e.elements.some((el) => hasMatchTuple(el.value));
  }
}

/** Appends a match so that every branch leaves exported variables under one internal name. */
function unifyClause(c: ErlClause, clauseVars: Vars, finals: FinalVar[], s: Scope): [ErlClause, Scope] {
  const left: ErlExpr[] = [];
  const right: ErlExpr[] = [];
  const zero = { line: 0 };
  for (const { key, entry, fallback } of finals) {
    const mine = clauseVars.get(key);
    if (mine && mine.name === entry.name) continue;
    left.push(eVar(zero, entry.name));
    right.push(mine ? eVar(zero, mine.name) : fallback);
  }
  const [l0] = left;
  const [r0] = right;
  if (!l0 || !r0) return [c, s];

  const anno = c.anno;
  const matchExpr: ErlExpr =
    left.length === 1 ? { type: 'match', anno, left: l0, right: r0 } : { type: 'match', anno, left: eTuple(anno, left), right: eTuple(anno, right) };
  const split = splitLast(c.body);
  if (!split) return [{ ...c, body: [matchExpr, eAtom(anno, 'nil')] }, s];
  const [raw, last] = split;

  if (!hasMatchTuple(last)) return [{ ...c, body: [...raw, matchExpr, last] }, s];
  if (last.type === 'match' && last.left.type === 'var' && last.left.name !== '_') {
    return [{ ...c, body: [...raw, last, matchExpr, last.left] }, s];
  }
  const [storage, , ss] = buildVar('_', s);
  const storageVar = eVar(anno, storage);
  return [{ ...c, body: [...raw, { type: 'match', anno, left: storageVar, right: last }, matchExpr, storageVar] }, ss];
}

function doClauses(t: Lowerer, pairs: ClausePair[], s: Scope): [ErlClause[], Scope] {
  if (pairs.length === 0) return [[], s];

  const tClauses: ErlClause[] = [];
  const clauseVars: Vars[] = [];
  let acc = s;
  for (const p of pairs) {
    const [tc, ts] = eachClause(t, p, acc);
    tClauses.push(tc);
    clauseVars.push(ts.exportVars ?? new Map());
    acc = mergeCounters(s, ts);
  }

  const allVars = clauseVars.reduce<Vars>((a, b) => mergeVarMaps(a, b), new Map());
  const finals: FinalVar[] = [];
  const vars = new Map(acc.vars);
  const exportVars = new Map(acc.exportVars ?? []);
  for (const [key, entry] of allVars) {
    const inAll = clauseVars.every((cv) => cv.has(key));
    const safe = inAll && clauseVars.every((cv) => cv.get(key)?.safe !== false);
    const previous = s.vars.get(key);
    const fallback = previous ? eVar({ line: 0 }, previous.name) : eAtom({ line: 0 }, 'nil');
    const normalized: VarEntry = { ...entry, safe };
    vars.set(key, normalized);
    exportVars.set(key, normalized);
    finals.push({ key, entry: normalized, fallback });
  }

  let fs: Scope = { ...acc, vars, exportVars };
  const out: ErlClause[] = [];
  tClauses.forEach((c, i) => {
    const [uc, us] = unifyClause(c, clauseVars[i] ?? new Map(), finals, fs);
    out.push(uc);
    fs = us;
  });
  return [out, fs];
}

/**
 * Lowers a list of clauses. Variables bound in any clause are exported; those
 * not bound in every clause are marked unsafe.
 */
export function clauses(t: Lowerer, pairs: ClausePair[], s: Scope): [ErlClause[], Scope] {
  const outer = s.exportVars;
  const [tc, ts] = doClauses(t, pairs, { ...s, exportVars: new Map() });
  return [tc, { ...ts, exportVars: mergeOptVars(outer, ts.exportVars) }];
}
