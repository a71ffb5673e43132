import type { Anno, ErlCall, ErlExpr, Literal, Meta, Quoted } from '@fennec/ast';
import { isAtomValue, isCallTo, keywordGet } from '@fennec/ast';

export const ann = (meta: Meta): Anno => (meta.generated ? { line: meta.line ?? 0, generated: true } : { line: meta.line ?? 0 });
export const generated = (meta: Meta): Anno => ({ line: meta.line ?? 0, generated: true });

export const eAtom = (anno: Anno, value: string): ErlExpr => ({ type: 'atom', anno, value });
export const eVar = (anno: Anno, name: string): ErlExpr => ({ type: 'var', anno, name });
export const eTuple = (anno: Anno, elements: ErlExpr[]): ErlExpr => ({ type: 'tuple', anno, elements });

/** `Module:Fun(Args)` */
export function erlCall(anno: Anno, module: string, fun: string, args: ErlExpr[]): ErlCall {
  return {
    type: 'call',
    anno,
    callee: { type: 'remote', anno, module: eAtom(anno, module), name: eAtom(anno, fun) },
    args,
  };
}

export function unblock(e: ErlExpr): ErlExpr[] {
  return e.type === 'block' ? e.body : [e];
}

export function splitLast<T>(items: readonly T[]): [T[], T] | null {
  const last = items[items.length - 1];
  if (items.length === 0 || last === undefined) return null;
  return [items.slice(0, -1), last];
}

const LITERAL_ANNO: Anno = { line: 0 };

/** Literals carry no position of their own. */
export function literalToErl(q: Literal): ErlExpr {
  const anno = LITERAL_ANNO;
  switch (q.type) {
    case 'Atom':
      return eAtom(anno, q.value);
    case 'Integer':
    case 'Float': {
      const value = Math.abs(q.value);
      const abs: ErlExpr = q.type === 'Integer' ? { type: 'integer', anno, value } : { type: 'float', anno, value };
      return q.value < 0 ? { type: 'op', anno, op: '-', operands: [abs] } : abs;
    }
    case 'Binary':
      return {
        type: 'bin',
        anno,
        elements: [{ type: 'bin_element', anno, value: { type: 'string', anno, value: q.value }, size: 'default', typeSpec: 'default' }],
      };
  }
}

const COMPARISON = new Set(['==', '/=', '=<', '<', '>=', '>', '=:=', '=/=']);
const ARITH2 = new Set(['+', '-', '*', '/', 'div', 'rem', 'band', 'bor', 'bxor', 'bsl', 'bsr']);
const ARITH1 = new Set(['+', '-', 'bnot']);
const BOOL2 = new Set(['and', 'or', 'xor', 'andalso', 'orelse']);

/** Runtime-module functions that lower to primitive operators (usable in guards and patterns). */
export function isGuardOp(name: string, arity: number): boolean {
  if (arity === 1) return ARITH1.has(name) || name === 'not';
  if (arity === 2) return COMPARISON.has(name) || ARITH2.has(name) || BOOL2.has(name);
  return false;
}

const TYPE_CHECKS_1 = new Set([
  'is_atom', 'is_binary', 'is_bitstring', 'is_boolean', 'is_float', 'is_function', 'is_integer',
  'is_list', 'is_map', 'is_number', 'is_pid', 'is_port', 'is_reference', 'is_tuple',
]);
const BOOLEAN_OPS_2 = new Set(['and', 'or', 'xor', ...COMPARISON]);

function erlangCall(q: Quoted): { fun: string; args: Quoted[] } | null {
  if (q.type !== 'Call' || typeof q.head === 'string') return null;
  const h = q.head;
  if (h.type !== 'Call' || h.head !== '.' || h.args.length !== 2) return null;
  const [mod, fun] = h.args;
  if (!mod || !fun || !isAtomValue(mod, 'erlang') || fun.type !== 'Atom') return null;
  return { fun: fun.value, args: q.args };
}

function clausesReturnBoolean(kv: Quoted | undefined): boolean {
  const doClauses = kv ? keywordGet(kv, 'do') : undefined;
  if (!doClauses || doClauses.type !== 'List') return false;
  return doClauses.items.every((c) => {
    const body = isCallTo(c, '->') ? c.args[1] : undefined;
    return body !== undefined && returnsBoolean(body);
  });
}

/** Statically known to evaluate to `true` or `false`. */
export function returnsBoolean(q: Quoted): boolean {
  if (isAtomValue(q, 'true') || isAtomValue(q, 'false')) return true;
  const ec = erlangCall(q);
  if (ec) {
    const { fun, args } = ec;
    if (args.length === 1) return fun === 'not' || TYPE_CHECKS_1.has(fun);
    if (args.length === 2) {
      if (fun === 'andalso' || fun === 'orelse') {
        const right = args[1];
        return right !== undefined && returnsBoolean(right);
      }
      return BOOLEAN_OPS_2.has(fun) || fun === 'is_function';
    }
    if (args.length === 3) return fun === 'function_exported';
    return false;
  }
  if (isCallTo(q, 'case')) return clausesReturnBoolean(q.args[1]);
  if (isCallTo(q, 'cond')) return clausesReturnBoolean(q.args[0]);
  if (isCallTo(q, '__block__') && q.args.length > 0) {
    const last = q.args[q.args.length - 1];
    return last !== undefined && returnsBoolean(last);
  }
  return false;
}
