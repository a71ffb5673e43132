/**
 * Lowers expanded quoted expressions into the abstract form consumed by code
 * generation, threading a `Scope` through every step.
 */
import type { CallNode, ErlClause, ErlExpr, ErlMapField, Meta, Quoted, RemoteCall, VarNode } from '@fennec/ast';
import {
  atom,
  call,
  clause as clauseNode,
  dot,
  formatErl,
  isAnonymousCall,
  isAtomValue,
  isCallTo,
  isLiteral,
  isRemoteCall,
  keywordGet,
  kw,
  list,
  pair,
  remote,
  v,
} from '@fennec/ast';
import { compileError, defaultLogger, warningSink, type Logger, type Warning } from '@fennec/shared';
import { clause, clauses, extractSplatGuards, getPairs, match } from './clauses';
import { defaultCollaborators, type Collaborators } from './collaborators';
import type { Lowerer } from './lowerer';
import { toSource } from './printer';
import {
  buildVar,
  createScope,
  exposeUnsafe,
  mergeCounters,
  mergeVars,
  translateVar,
  varKey,
  varKind,
  withBindings,
  type Scope,
} from './scope';
import { ann, eAtom, erlCall, eTuple, eVar, generated, isGuardOp, literalToErl, returnsBoolean, splitLast, unblock } from './utils';

export type TranslatorOptions = {
  /** Overrides for the delegated lowerings */
  collaborators?: Partial<Collaborators>;
  onWarning?: (w: Warning) => void;
  debug?: boolean;
  logger?: Logger;
};

type Step = (x: Quoted, acc: Scope) => [ErlExpr, Scope];

type CondClause = { meta: Meta; condition: Quoted; body: Quoted };

const GENERATED_ZERO = { line: 0, generated: true };
const ZERO = { line: 0 };

export class Translator implements Lowerer {
  private readonly collaborators: Collaborators;
  private readonly onWarning: (w: Warning) => void;
  private readonly debug: boolean;
  private readonly log: Logger;

  constructor(opts: TranslatorOptions = {}) {
    this.collaborators = { ...defaultCollaborators, ...opts.collaborators };
    this.log = opts.logger ?? defaultLogger('translator');
    this.onWarning = opts.onWarning ?? warningSink(this.log);
    this.debug = opts.debug ?? false;
  }

  /** Entry point for a whole expression. */
  lower(ast: Quoted, s: Scope = createScope()): [ErlExpr, Scope] {
    if (this.debug) this.log(`lowering ${toSource(ast)}`);
    const result = this.translate(ast, s);
    if (this.debug) this.log(`lowered to ${formatErl(result[0])}`);
    return result;
  }

  translate(ast: Quoted, s: Scope): [ErlExpr, Scope] {
    switch (ast.type) {
      case 'Atom':
      case 'Integer':
      case 'Float':
      case 'Binary':
        return [literalToErl(ast), s];
      case 'List':
        return this.translateList(ast.items, s);
      case 'Pair': {
        const [elements, ts] = this.translateArgs([ast.left, ast.right], s);
        return [eTuple(ZERO, elements), ts];
      }
      case 'Var':
        return this.translateVariable(ast, s);
      case 'Call':
        return this.translateCall(ast, s);
    }
  }

  translateArg(arg: Quoted, acc: Scope, s: Scope): [ErlExpr, Scope] {
    if (isLiteral(arg)) return [this.translate(arg, s)[0], acc];
    const [tArg, ts] = this.translate(arg, withBindings(s, acc));
    return [tArg, mergeVars(acc, ts)];
  }

  translateArgs(args: Quoted[], s: Scope): [ErlExpr[], Scope] {
    const step = this.stepFor(s);
    const out: ErlExpr[] = [];
    let acc = s;
    for (const a of args) {
      const [t, next] = step(a, acc);
      out.push(t);
      acc = next;
    }
    return [out, acc];
  }

  /** Nested blocks are spliced; a comprehension whose value is discarded is lowered as such. */
  translateBlock(args: Quoted[], s: Scope): [ErlExpr[], Scope] {
    const queue = [...args];
    const out: ErlExpr[] = [];
    let acc = s;
    for (let h = queue.shift(); h !== undefined; h = queue.shift()) {
      if (isCallTo(h, '__block__')) {
        queue.unshift(...h.args);
        continue;
      }
      const discarded = queue.length > 0 ? this.discardedComprehension(h) : null;
      const [t, next] = discarded
        ? this.collaborators.comprehension(this, discarded.meta, discarded.args, false, acc)
        : this.translate(h, acc);
      out.push(t);
      acc = next;
    }
    return [out, acc];
  }

  private discardedComprehension(q: Quoted): CallNode | null {
    if (isCallTo(q, 'for') && q.args.length > 0) return q;
    if (isCallTo(q, '=') && q.args.length === 2) {
      const [left, right] = q.args;
      if (left && right && left.type === 'Var' && left.name === '_') return this.discardedComprehension(right);
    }
    return null;
  }

  // Positional args see the bindings of earlier siblings; patterns thread the scope directly.
  private stepFor(s: Scope): Step {
    if (s.context === 'match') return (x, acc) => this.translate(x, acc);
    return (x, acc) => this.translateArg(x, acc, s);
  }

  private translateList(items: Quoted[], s: Scope): [ErlExpr, Scope] {
    const step = this.stepFor(s);
    const heads: ErlExpr[] = [];
    let tail: ErlExpr = { type: 'nil', anno: ZERO };
    let acc = s;
    items.forEach((item, i) => {
      const last = i === items.length - 1;
      const [h, t] = isCallTo(item, '|') && item.args.length === 2 ? item.args : [];
      if (last && h && t) {
        const [th, a1] = step(h, acc);
        const [tt, a2] = step(t, a1);
        heads.push(th);
        tail = tt;
        acc = a2;
        return;
      }
      const [ti, next] = step(item, acc);
      heads.push(ti);
      acc = next;
    });
    const built = heads.reduceRight<ErlExpr>((rest, head) => ({ type: 'cons', anno: ZERO, head, tail: rest }), tail);
    return [built, acc];
  }

  private translateVariable(node: VarNode, s: Scope): [ErlExpr, Scope] {
    const anno = ann(node.meta);
    if (node.name === '__CALLER__') return [eVar(anno, '__CALLER__'), { ...s, caller: true }];
    if (node.name === '_') {
      if (s.context === 'match') return [eVar(anno, '_'), s];
      return compileError('InvalidForm', node.meta, s.file, 'invalid use of _ outside of a match');
    }
    return translateVar(node.meta, node.name, varKind(node.meta, node.context), s);
  }

  private translateCall(c: CallNode, s: Scope): [ErlExpr, Scope] {
    const { head, meta, args } = c;
    if (typeof head !== 'string') {
      if (isRemoteCall(c)) return this.translateRemote(c, s);
      if (isAnonymousCall(c)) return this.translateAnonymous(c, s);
      return compileError('InvalidForm', meta, s.file, `invalid call: ${toSource(c)}`);
    }

    const [a, b] = args;
    const one = args.length === 1 ? a : undefined;
    const two = args.length === 2 && a && b ? ([a, b] as const) : undefined;
    switch (head) {
      case '=':
        if (two) return this.translateMatch(meta, two[0], two[1], s);
        break;
      case '{}': {
        const [elements, ts] = this.translateArgs(args, s);
        return [eTuple(ann(meta), elements), ts];
      }
      case '%{}':
        return this.translateMap(meta, args, s);
      case '%':
        if (two) return this.translateStruct(meta, two[0], two[1], s);
        break;
      case '<<>>':
        return this.collaborators.bitstring(this, meta, args, s);
      case '__block__': {
        const [body, bs] = this.translateBlock(args, s);
        return [{ type: 'block', anno: ann(meta), body }, bs];
      }
      case '&':
        if (one) return this.translateFunRef(meta, one, s);
        break;
      case 'fn':
        return this.translateFn(meta, args, s);
      case 'cond':
        if (one) return this.translateCond(meta, one, s);
        break;
      case 'case':
        if (two) return this.translateCase(meta, two[0], two[1], s);
        break;
      case 'try':
        if (one) return this.translateTry(meta, one, s);
        break;
      case 'receive':
        if (one) return this.translateReceive(meta, one, s);
        break;
      case 'for':
        if (args.length > 0) return this.collaborators.comprehension(this, meta, args, true, s);
        break;
      case 'with':
        return this.collaborators.with(this, meta, args, s);
      case '^':
        if (one && one.type === 'Var' && s.context === 'match') return this.translatePin(meta, one, s);
        return compileError('InvalidForm', meta, s.file, `cannot use ${toSource(c)} outside of match clauses`);
    }
    return this.translateLocal(meta, head, args, s);
  }

  // Match

  private translateMatch(meta: Meta, left: Quoted, right: Quoted, s: Scope): [ErlExpr, Scope] {
    const [tRight, sr] = this.translate(right, s);
    if (left.type === 'Var' && left.name === '_') {
      return [{ type: 'match', anno: ann(meta), left: eVar(ann(left.meta), '_'), right: tRight }, sr];
    }
    const [tLeft, sl] = match((l: Quoted, sc: Scope) => this.translate(l, sc), left, sr);
    return [{ type: 'match', anno: ann(meta), left: tLeft, right: tRight }, sl];
  }

  private translatePin(meta: Meta, node: VarNode, s: Scope): [ErlExpr, Scope] {
    const kind = varKind(node.meta, node.context);
    const found = s.backupVars?.get(varKey(node.name, kind));
    if (!found) return compileError('UndefinedVariable', node.meta, s.file, `undefined variable ^${node.name}`);

    const line = node.meta.line ?? meta.line ?? 0;
    if (node.name.startsWith('_')) {
      this.onWarning({
        kind: 'UnderscoredPin',
        file: s.file,
        line,
        message: `the underscored variable "${node.name}" is pinned; a leading underscore marks a value that is not meant to be used`,
      });
    }
    if (!found.safe) {
      this.onWarning({
        kind: 'UnsafePin',
        file: s.file,
        line,
        message:
          `the variable "${node.name}" is unsafe as it has been set in only some branches of a previous conditional; ` +
          'return its value from the conditional instead',
      });
    }

    const pinned = eVar(ann(meta), found.name);
    if (s.extra === 'pin_guard') {
      const [tVar, ts] = translateVar(node.meta, node.name, kind, s);
      const guard: ErlExpr = { type: 'op', anno: ann(meta), op: '=:=', operands: [pinned, tVar] };
      return [tVar, { ...ts, extraGuards: [guard, ...ts.extraGuards] }];
    }
    return [pinned, s];
  }

  // Maps and structs

  private translateMap(meta: Meta, args: Quoted[], s: Scope): [ErlExpr, Scope] {
    const [only] = args;
    if (args.length === 1 && only && isCallTo(only, '|') && only.args.length === 2) {
      const [update, assocs] = only.args;
      if (!update || !assocs || assocs.type !== 'List') {
        return compileError('InvalidForm', meta, s.file, `expected key-value pairs in a map update, got: ${toSource(only)}`);
      }
      const [tUpdate, us] = this.translateArg(update, s, s);
      return this.translateMapWith(meta, assocs.items, tUpdate, us);
    }
    return this.translateMapWith(meta, args, null, s);
  }

  private mapSteps(tUpdate: ErlExpr | null, s: Scope): [ErlMapField['type'], Step, Step] {
    if (s.extra === 'map_key' || s.context === 'match') {
      return [
        s.extra === 'map_key' ? 'map_field_assoc' : 'map_field_exact',
        (x, acc) => this.translate(x, { ...acc, extra: 'map_key' }),
        (x, acc) => this.translate(x, acc),
      ];
    }
    const ks: Scope = { ...s, extra: 'map_key' };
    return [
      tUpdate === null ? 'map_field_assoc' : 'map_field_exact',
      (x, acc) => this.translateArg(x, acc, ks),
      (x, acc) => this.translateArg(x, acc, s),
    ];
  }

  private translateMapWith(meta: Meta, assocs: Quoted[], tUpdate: ErlExpr | null, s: Scope): [ErlExpr, Scope] {
    const anno = ann(meta);
    const [op, keyStep, valueStep] = this.mapSteps(tUpdate, s);
    const fields: ErlMapField[] = [];
    let acc = s;
    for (const assoc of assocs) {
      if (assoc.type !== 'Pair') {
        return compileError('InvalidForm', meta, s.file, `expected key-value pairs in a map, got: ${toSource(assoc)}`);
      }
      const [key, ak] = keyStep(assoc.left, acc);
      const [value, av] = valueStep(assoc.right, { ...ak, extra: s.extra });
      fields.push({ type: op, anno, key, value });
      acc = av;
    }
    return [{ type: 'map', anno, base: tUpdate, fields }, acc];
  }

  private translateStruct(meta: Meta, name: Quoted, right: Quoted, s: Scope): [ErlExpr, Scope] {
    if (name.type !== 'Atom') {
      return compileError('InvalidForm', meta, s.file, `expected struct name to be a compile time atom, got: ${toSource(name)}`);
    }
    if (!isCallTo(right, '%{}')) {
      return compileError('InvalidForm', meta, s.file, `expected struct fields as a map, got: ${toSource(right)}`);
    }

    const [only] = right.args;
    if (right.args.length === 1 && only && isCallTo(only, '|') && only.args.length === 2) {
      const [update, assocs] = only.args;
      if (!update || !assocs || assocs.type !== 'List') {
        return compileError('InvalidForm', meta, s.file, `expected key-value pairs in a struct update, got: ${toSource(only)}`);
      }
      const anno = ann(meta);
      const gen = generated(meta);
      const [varName, , vs] = buildVar('_', s);
      const tVar = eVar(anno, varName);
      const structField: ErlMapField = {
        type: 'map_field_exact',
        anno,
        key: eAtom(anno, '__struct__'),
        value: eAtom(anno, name.value),
      };
      const pattern: ErlExpr = { type: 'match', anno, left: tVar, right: { type: 'map', anno, base: null, fields: [structField] } };
      const error = eTuple(anno, [eAtom(anno, 'badstruct'), eAtom(anno, name.value), tVar]);

      const [tUpdate, us] = this.translateArg(update, vs, vs);
      const [tAssocs, ts] = this.translateMapWith(meta, assocs.items, tVar, us);
      const caseClauses: ErlClause[] = [
        { type: 'clause', anno, patterns: [pattern], guards: [], body: [tAssocs] },
        { type: 'clause', anno: gen, patterns: [tVar], guards: [], body: [erlCall(anno, 'erlang', 'error', [error])] },
      ];
      return [{ type: 'case', anno: gen, expr: tUpdate, clauses: caseClauses }, ts];
    }

    return this.translateMapWith(meta, [...right.args, pair(atom('__struct__'), name)], null, s);
  }

  // Calls

  private translateLocal(meta: Meta, name: string, args: Quoted[], s: Scope): [ErlExpr, Scope] {
    const anno = ann(meta);
    const [tArgs, ts] = this.translateArgs(args, s);
    return [{ type: 'call', anno, callee: eAtom(anno, name), args: tArgs }, ts];
  }

  private translateRemote(c: RemoteCall, s: Scope): [ErlExpr, Scope] {
    const [left, right] = c.head.args;
    if (!left || !right || right.type !== 'Atom') return compileError('InvalidForm', c.meta, s.file, `invalid call: ${toSource(c)}`);
    const anno = ann(c.meta);
    const tupleLike = left.type === 'Var' || left.type === 'Call' || left.type === 'Pair';

    if (tupleLike && c.args.length === 0) return this.translateFieldAccess(c.meta, left, right.value, s);
    if (!tupleLike && left.type !== 'Atom') {
      return compileError('InvalidForm', c.meta, s.file, `invalid remote call target: ${toSource(left)}`);
    }

    const [tLeft, sl] = this.translate(left, s);
    const [tArgs, sa] = this.translateArgs(c.args, withBindings(s, sl));
    const out = mergeVars(sl, sa);

    if (isAtomValue(left, 'erlang') && isGuardOp(right.value, tArgs.length)) {
      const [x, y] = tArgs;
      if (x && y) return [{ type: 'op', anno, op: right.value, operands: [x, y] }, out];
      if (x) return [{ type: 'op', anno, op: right.value, operands: [x] }, out];
    }
    return [
      { type: 'call', anno, callee: { type: 'remote', anno, module: tLeft, name: eAtom(anno, right.value) }, args: tArgs },
      out,
    ];
  }

  /** `expr.field`: map lookup, raising `{badkey, field, value}` on a map without it, else a zero-arity call. */
  private translateFieldAccess(meta: Meta, left: Quoted, field: string, s: Scope): [ErlExpr, Scope] {
    const anno = ann(meta);
    const gen = generated(meta);
    const [tLeft, sl] = this.translate(left, s);
    const [varName, , sv] = buildVar('_', sl);
    const tRight = eAtom(anno, field);
    const tVar = eVar(anno, varName);
    const error = eTuple(anno, [eAtom(anno, 'badkey'), tRight, tVar]);

    const caseClauses: ErlClause[] = [
      {
        type: 'clause',
        anno: gen,
        patterns: [{ type: 'map', anno, base: null, fields: [{ type: 'map_field_exact', anno, key: tRight, value: tVar }] }],
        guards: [],
        body: [tVar],
      },
      {
        type: 'clause',
        anno: GENERATED_ZERO,
        patterns: [tVar],
        guards: [[erlCall(GENERATED_ZERO, 'erlang', 'is_map', [tVar])]],
        body: [erlCall(anno, 'erlang', 'error', [error])],
      },
      {
        type: 'clause',
        anno: gen,
        patterns: [tVar],
        guards: [],
        body: [{ type: 'call', anno: gen, callee: { type: 'remote', anno: gen, module: tVar, name: tRight }, args: [] }],
      },
    ];
    return [{ type: 'case', anno: gen, expr: tLeft, clauses: caseClauses }, sv];
  }

  private translateAnonymous(c: RemoteCall, s: Scope): [ErlExpr, Scope] {
    const [expr] = c.head.args;
    if (!expr) return compileError('InvalidForm', c.meta, s.file, `invalid call: ${toSource(c)}`);
    const [tExpr, se] = this.translate(expr, s);
    const [tArgs, sa] = this.translateArgs(c.args, withBindings(s, se));
    return [{ type: 'call', anno: ann(c.meta), callee: tExpr, args: tArgs }, mergeVars(se, sa)];
  }

  private translateFunRef(meta: Meta, ref: Quoted, s: Scope): [ErlExpr, Scope] {
    const anno = ann(meta);
    const [target, arity] = isCallTo(ref, '/') && ref.args.length === 2 ? ref.args : [];
    if (target && arity && arity.type === 'Integer') {
      if (isRemoteCall(target) && target.args.length === 0) {
        const [mod, fun] = target.head.args;
        if (mod && fun && fun.type === 'Atom') {
          const [tMod, sm] = this.translate(mod, s);
          return [
            { type: 'fun_remote', anno, module: tMod, name: eAtom(anno, fun.value), arity: { type: 'integer', anno, value: arity.value } },
            sm,
          ];
        }
      }
      if (target.type === 'Var') return [{ type: 'fun_local', anno, name: target.name, arity: arity.value }, s];
    }
    return compileError('InvalidForm', meta, s.file, `expected a function reference after &, got: ${toSource(ref)}`);
  }

  // Functions

  private translateFn(meta: Meta, fnClauses: Quoted[], s: Scope): [ErlExpr, Scope] {
    const out: ErlClause[] = [];
    let acc = s;
    for (const c of fnClauses) {
      const [params, body] = isCallTo(c, '->') && c.args.length === 2 ? c.args : [];
      if (!params || !body || params.type !== 'List' || c.type !== 'Call') {
        return compileError('InvalidForm', meta, s.file, `expected -> clauses for fn, got: ${toSource(c)}`);
      }
      const [args, guards] = extractSplatGuards(params.items);
      const [tc, ts] = clause(this, c.meta, (a, sc) => this.translateFnMatch(a, sc), args, body, guards, acc);
      out.push(tc);
      acc = mergeCounters(s, ts);
    }
    return [{ type: 'fun', anno: ann(meta), clauses: out }, acc];
  }

  // Pins in function heads become guards, as the head cannot compare against an outer variable.
  private translateFnMatch(args: Quoted[], s: Scope): [ErlExpr[], Scope] {
    const [tArgs, ts] = this.translateArgs(args, { ...s, extra: 'pin_guard' });
    return [tArgs, { ...ts, extra: s.extra }];
  }

  // cond

  private translateCond(meta: Meta, kv: Quoted, s: Scope): [ErlExpr, Scope] {
    const doClauses = keywordGet(kv, 'do');
    if (!doClauses || doClauses.type !== 'List' || doClauses.items.length === 0) {
      return compileError('InvalidForm', meta, s.file, 'expected -> clauses for do in cond');
    }
    const parsed = doClauses.items.map((c) => this.condClause(meta, c, s));
    const reversed = [...parsed].reverse();
    const [last, ...rest] = reversed;
    if (!last) return compileError('InvalidForm', meta, s.file, 'expected -> clauses for do in cond');

    // the innermost fallthrough is positioned at the last clause
    const fallback = last.condition.type === 'Atom' && last.condition.value !== 'false' && last.condition.value !== 'nil';
    const lowered = fallback
      ? buildCondClauses(rest, last.body, { ...last.meta, generated: true })
      : buildCondClauses(reversed, call(dot(atom('erlang'), 'error', last.meta), [atom('cond_clause')]), last.meta);
    return this.translate(isCallTo(lowered, 'case') ? { ...lowered, meta } : lowered, s);
  }

  private condClause(meta: Meta, c: Quoted, s: Scope): CondClause {
    const [params, body] = isCallTo(c, '->') && c.args.length === 2 ? c.args : [];
    const [condition] = params && params.type === 'List' && params.items.length === 1 ? params.items : [];
    if (!condition || !body || c.type !== 'Call') {
      return compileError('InvalidForm', meta, s.file, `expected one condition per cond clause, got: ${toSource(c)}`);
    }
    return { meta: c.meta, condition, body };
  }

  // case, try, receive

  private translateCase(meta: Meta, expr: Quoted, kv: Quoted, s: Scope): [ErlExpr, Scope] {
    const pairs = getPairs('do', kv, 'match', s.file);
    const [tExpr, ns] = this.translate(expr, s);
    const [tClauses, ts] = clauses(this, pairs, { ...ns, extra: null });
    return [{ type: 'case', anno: ann(meta), expr: tExpr, clauses: tClauses }, { ...ts, extra: ns.extra }];
  }

  private translateTry(meta: Meta, kv: Quoted, s: Scope): [ErlExpr, Scope] {
    const sn: Scope = { ...s, extra: null };
    const [tDo, sb] = this.translate(keywordGet(kv, 'do') ?? atom('nil'), sn);

    const handlers = { catch: getPairs('catch', kv, 'match', s.file), rescue: getPairs('rescue', kv, 'match', s.file) };
    const [tCatch, sc] = this.collaborators.tryClauses(this, meta, handlers, exposeUnsafe(mergeCounters(sn, sb), sb.vars));

    const afterExpr = keywordGet(kv, 'after');
    let tAfter: ErlExpr[] = [];
    let sa = sc;
    if (afterExpr !== undefined) {
      const [t, sx] = this.translate(afterExpr, exposeUnsafe(mergeCounters(sn, sc), sb.vars));
      tAfter = unblock(t);
      sa = sx;
    }

    const elsePairs = getPairs('else', kv, 'match', s.file);
    const [tElse, se] = clauses(this, elsePairs, exposeUnsafe(mergeCounters(sn, sa), sb.vars));
    return [
      { type: 'try', anno: ann(meta), body: unblock(tDo), elseClauses: tElse, catchClauses: tCatch, after: tAfter },
      mergeCounters(s, se),
    ];
  }

  private translateReceive(meta: Meta, kv: Quoted, s: Scope): [ErlExpr, Scope] {
    const anno = ann(meta);
    const doPairs = getPairs('do', kv, 'match', s.file, true);
    if (keywordGet(kv, 'after') === undefined) {
      const [tClauses, sc] = clauses(this, doPairs, s);
      return [{ type: 'receive', anno, clauses: tClauses, after: null }, sc];
    }

    const afterPairs = getPairs('after', kv, 'expr', s.file);
    if (afterPairs.length !== 1) {
      return compileError('InvalidForm', meta, s.file, `expected a single -> clause for after in receive, got ${afterPairs.length}`);
    }
    const [tClauses, sc] = clauses(this, [...doPairs, ...afterPairs], s);
    const split = splitLast(tClauses);
    const timeout = split?.[1].patterns[0];
    if (!split || !timeout) return compileError('InvalidForm', meta, s.file, 'expected a timeout for after in receive');
    const [fClauses, tAfter] = split;
    return [{ type: 'receive', anno, clauses: fClauses, after: { timeout, body: tAfter.body } }, sc];
  }
}

// cond lowering

/** `erlang.andalso(erlang./=(v, nil), erlang./=(v, false))` */
function truthyGuard(x: Quoted): Quoted {
  return remote('erlang', 'andalso', [remote('erlang', '/=', [x, atom('nil')]), remote('erlang', '/=', [x, atom('false')])]);
}

/** A condition that already yields a boolean can be matched against `true` directly. */
function booleanCondition(condition: Quoted, body: Quoted): [Quoted, Quoted] | null {
  if (isCallTo(condition, '=') && condition.args.length === 2 && body.type === 'Var') {
    const [left, value] = condition.args;
    if (left && value && left.type === 'Var' && left.name === body.name && left.context === body.context) {
      return returnsBoolean(value) ? [value, atom('true')] : null;
    }
  }
  return returnsBoolean(condition) ? [condition, body] : null;
}

function buildTruthyClause(meta: Meta, condition: Quoted, body: Quoted): [Quoted, CallNode, Quoted] {
  const boolean = booleanCondition(condition, body);
  if (boolean) return [boolean[0], clauseNode([atom('true')], boolean[1], meta), atom('false')];
  const x = v('cond', {}, 'Elixir');
  return [condition, clauseNode([call('when', [x, truthyGuard(x)])], body, meta), v('_')];
}

/** Nested two-clause cases, innermost first; `clauses` runs from the last cond clause backwards. */
function buildCondClauses(condClauses: CondClause[], fallback: Quoted, meta: Meta): Quoted {
  let acc = fallback;
  let oldMeta = meta;
  for (const { meta: newMeta, condition, body } of condClauses) {
    const [newCondition, truthy, other] = buildTruthyClause(newMeta, condition, body);
    const falsy = clauseNode([other], acc, oldMeta);
    acc = call('case', [newCondition, kw({ do: list([truthy, falsy]) })], newMeta);
    oldMeta = newMeta;
  }
  return acc;
}
