/**
 * Expansion of anonymous functions (`fn`) and the capture operator (`&`).
 */
import type { CallNode, Meta, Quoted, VarNode } from '@fennec/ast';
import { atom, call, clause, dot, int, isCallTo, isRemoteCall, isAnonymousCall, list, placeholder, v } from '@fennec/ast';
import { compileError } from '@fennec/shared';
import type { Env } from './env';
import { toSource } from './printer';

export const CAPTURE_CONTEXT = 'fennec_fn';
export const MAX_CAPTURE_ARITY = 255;

export type CaptureResult =
  | { kind: 'expand'; fn: CallNode; env: Env }
  | { kind: 'remote'; receiver: Quoted; name: string; arity: number; env: Env }
  | { kind: 'local'; name: string; arity: number; env: Env };

type Reference = { kind: 'remote'; receiver: Quoted } | { kind: 'local' };

// fn

/** Arity of a clause head; a single `when` node carries the guard as its last argument. */
export function fnArity(args: Quoted[]): number {
  const [only] = args;
  if (args.length === 1 && only && isCallTo(only, 'when')) return only.args.length - 1;
  return args.length;
}

function clauseArgs(c: Quoted): Quoted[] | null {
  if (!isCallTo(c, '->') || c.args.length !== 2) return null;
  const [params] = c.args;
  return params && params.type === 'List' ? params.items : null;
}

export function expandFn(meta: Meta, clauses: Quoted[], env: Env): [CallNode, Env] {
  const expanded = clauses.map((c) => env.expandClause(c, env)[0]);
  const arities = new Set<number>();
  for (const c of expanded) {
    const params = clauseArgs(c);
    if (!params) compileError('InvalidForm', meta, env.file, `expected -> clauses for fn, got: ${toSource(c)}`);
    arities.add(fnArity(params));
  }
  if (arities.size > 1) {
    compileError('ArityMismatch', meta, env.file, 'cannot mix clauses with different arities in anonymous functions');
  }
  return [call('fn', expanded, meta), env];
}

// Capture

function argsFromArity(meta: Meta, arity: Quoted, env: Env): Quoted[] {
  if (arity.type === 'Integer' && arity.value >= 0 && arity.value <= MAX_CAPTURE_ARITY) {
    return Array.from({ length: arity.value }, (_, i) => placeholder(i + 1));
  }
  return compileError(
    'InvalidCaptureArity',
    meta,
    env.file,
    `invalid arity for &, expected a number between 0 and ${MAX_CAPTURE_ARITY}, got: ${toSource(arity)}`,
  );
}

/** `&1, &2, ..., &K` with K >= 1 */
export function isSequentialAndNotEmpty(args: Quoted[]): boolean {
  if (args.length === 0) return false;
  return args.every((a, i) => {
    if (!isCallTo(a, '&') || a.args.length !== 1) return false;
    const [pos] = a.args;
    return !!pos && pos.type === 'Integer' && pos.value === i + 1;
  });
}

const isArityLiteral = (q: Quoted | undefined): q is Quoted => !!q && (q.type === 'Integer' || q.type === 'Float');

export function capture(meta: Meta, expr: Quoted, env: Env): CaptureResult {
  switch (expr.type) {
    case 'Integer':
      if (expr.value < 0) return compileError('NonPositivePlaceholder', meta, env.file, `capture &${expr.value} is not allowed`);
      return compileError('BareCaptureDigit', meta, env.file, `unhandled &${expr.value} outside of a capture`);
    case 'Pair':
      return capture(meta, call('{}', [expr.left, expr.right], meta), env);
    case 'List':
      return captureExpr(meta, expr, env, isSequentialAndNotEmpty(expr.items));
    case 'Call':
      return captureCall(meta, expr, env);
    default:
      return invalidCapture(meta, expr, env);
  }
}

function captureCall(meta: Meta, expr: CallNode, env: Env): CaptureResult {
  const [target, arity] = expr.args;

  // &Mod.fun/arity
  if (expr.head === '/' && expr.args.length === 2 && target && isRemoteCall(target) && target.args.length === 0 && isArityLiteral(arity)) {
    const args = argsFromArity(meta, arity, env);
    return captureRequire(meta, call(target.head, args, target.meta), env, true);
  }

  // &fun/arity
  if (expr.head === '/' && expr.args.length === 2 && target && target.type === 'Var' && isArityLiteral(arity)) {
    const args = argsFromArity(meta, arity, env);
    const importMeta: Meta = meta.importFa
      ? { ...target.meta, import: meta.importFa.receiver, context: meta.importFa.context }
      : target.meta;
    return captureImport(meta, target.name, importMeta, args, env, true);
  }

  if (isRemoteCall(expr)) return captureRequire(meta, expr, env, isSequentialAndNotEmpty(expr.args));
  if (isAnonymousCall(expr)) return captureExpr(meta, expr, env, false);

  if (expr.head === '__block__') {
    const [only] = expr.args;
    if (expr.args.length === 1 && only) return capture(meta, only, env);
    return compileError(
      'BlockInCapture',
      meta,
      env.file,
      `invalid args for &, block expressions are not allowed, got: ${toSource(expr)}`,
    );
  }

  const head = expr.head;
  if (typeof head === 'string') return captureImport(meta, head, expr.meta, expr.args, env, isSequentialAndNotEmpty(expr.args));
  return invalidCapture(meta, expr, env);
}

function captureImport(
  meta: Meta,
  name: string,
  importMeta: Meta,
  args: Quoted[],
  env: Env,
  sequential: boolean,
): CaptureResult {
  const arity = args.length;
  if (sequential && env.resolveImport(importMeta, name, arity, env)) {
    const ref: Reference = importMeta.import !== undefined ? { kind: 'remote', receiver: atom(importMeta.import) } : { kind: 'local' };
    return reference(ref, name, arity, env);
  }
  return captureExpr(meta, call(name, args, importMeta), env, sequential);
}

function captureRequire(meta: Meta, expr: CallNode, env: Env, sequential: boolean): CaptureResult {
  const head = expr.head;
  if (typeof head === 'string' || head.type !== 'Call') return invalidCapture(meta, expr, env);
  const [left, right] = head.args;
  if (!left || !right || right.type !== 'Atom') return invalidCapture(meta, expr, env);

  const counter = env.counter.next();
  const escaped = new Map<number, VarNode>();
  const escLeft = escape(left, counter, env, escaped);

  if (escaped.size > 0) {
    const rebuilt = call(dot(escLeft, right.value, head.meta), expr.args, expr.meta);
    return buildClosure(meta, rebuilt, counter, env, escaped, sequential);
  }

  const [eLeft, ee] = env.expand(escLeft, env);
  const arity = expr.args.length;
  let ref: Reference | null = null;
  if (sequential) {
    if (eLeft.type === 'Var') ref = { kind: 'remote', receiver: eLeft };
    else if (eLeft.type === 'Atom' && ee.resolveRequire(expr.meta, eLeft.value, right.value, arity, ee)) {
      ref = { kind: 'remote', receiver: eLeft };
    }
  }
  if (ref) return reference(ref, right.value, arity, ee);
  return captureExpr(meta, call(dot(eLeft, right.value, head.meta), expr.args, expr.meta), ee, sequential);
}

function reference(ref: Reference, name: string, arity: number, env: Env): CaptureResult {
  return ref.kind === 'remote'
    ? { kind: 'remote', receiver: ref.receiver, name, arity, env }
    : { kind: 'local', name, arity, env };
}

function captureExpr(meta: Meta, expr: Quoted, env: Env, sequential: boolean): CaptureResult {
  return buildClosure(meta, expr, env.counter.next(), env, new Map(), sequential);
}

function buildClosure(
  meta: Meta,
  expr: Quoted,
  counter: number,
  env: Env,
  dict: Map<number, VarNode>,
  sequential: boolean,
): CaptureResult {
  const body = escape(expr, counter, env, dict);
  if (dict.size === 0 && !sequential) return invalidCapture(meta, expr, env);
  const vars = validate(meta, dict, env);
  return { kind: 'expand', fn: call('fn', [clause(vars, body, meta)], meta), env };
}

function invalidCapture(meta: Meta, expr: Quoted, env: Env): never {
  return compileError(
    'InvalidCaptureShape',
    meta,
    env.file,
    'invalid args for &, expected an expression in the format of &Mod.fun/arity, &local/arity ' +
      `or a capture containing at least one argument as &1, got: ${toSource(expr)}`,
  );
}

/** Placeholders must form 1..K; reports the first gap. */
function validate(meta: Meta, dict: Map<number, VarNode>, env: Env): VarNode[] {
  const positions = [...dict.keys()].sort((a, b) => a - b);
  const vars: VarNode[] = [];
  positions.forEach((pos, i) => {
    const expected = i + 1;
    if (pos !== expected) {
      compileError('GapInPlaceholders', meta, env.file, `capture &${pos} cannot be defined without &${expected}`);
    }
    const found = dict.get(pos);
    if (found) vars.push(found);
  });
  return vars;
}

/** Replaces every `&N` with a capture variable, recording it in `dict`. */
function escape(ast: Quoted, counter: number, env: Env, dict: Map<number, VarNode>): Quoted {
  switch (ast.type) {
    case 'Call': {
      if (ast.head === '&') {
        const [pos] = ast.args;
        if (ast.args.length === 1 && pos && pos.type === 'Integer') {
          if (pos.value <= 0) compileError('NonPositivePlaceholder', ast.meta, env.file, `capture &${pos.value} is not allowed`);
          const found = dict.get(pos.value);
          if (found) return found;
          const fresh = v(`x${pos.value}`, { counter }, CAPTURE_CONTEXT);
          dict.set(pos.value, fresh);
          return fresh;
        }
        return compileError('NestedCapture', ast.meta, env.file, `nested captures via & are not allowed: ${toSource(ast)}`);
      }
      const head = typeof ast.head === 'string' ? ast.head : escape(ast.head, counter, env, dict);
      return call(head, ast.args.map((a) => escape(a, counter, env, dict)), ast.meta);
    }
    case 'Pair':
      return { type: 'Pair', left: escape(ast.left, counter, env, dict), right: escape(ast.right, counter, env, dict) };
    case 'List':
      return list(ast.items.map((i) => escape(i, counter, env, dict)));
    default:
      return ast;
  }
}

/** Function-value node for a resolved capture: `&Mod.fun/N` or `&fun/N`. */
export function captureToQuoted(meta: Meta, result: Exclude<CaptureResult, { kind: 'expand' }>): CallNode {
  const target =
    result.kind === 'remote'
      ? call(dot(result.receiver, result.name), [])
      : v(result.name);
  return call('&', [call('/', [target, int(result.arity)])], meta);
}

/**
 * Expands every `fn`, `&` and alias in a tree. Captures that produce a new `fn` are
 * expanded again; resolved function references are final.
 */
export function expandCaptures(ast: Quoted, env: Env): Quoted {
  switch (ast.type) {
    case 'Call': {
      if (ast.head === 'fn') return expandFn(ast.meta, ast.args, env)[0];
      if (ast.head === '__aliases__') return env.expand(ast, env)[0];
      const [only] = ast.args;
      if (ast.head === '&' && ast.args.length === 1 && only) {
        const res = capture(ast.meta, only, env);
        if (res.kind === 'expand') return expandFn(res.fn.meta, res.fn.args, res.env)[0];
        return captureToQuoted(ast.meta, res);
      }
      const head = typeof ast.head === 'string' ? ast.head : expandCaptures(ast.head, env);
      return call(head, ast.args.map((a) => expandCaptures(a, env)), ast.meta);
    }
    case 'Pair':
      return { type: 'Pair', left: expandCaptures(ast.left, env), right: expandCaptures(ast.right, env) };
    case 'List':
      return list(ast.items.map((i) => expandCaptures(i, env)));
    default:
      return ast;
  }
}
