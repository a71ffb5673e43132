import type {
  AtomNode,
  BinaryNode,
  CallNode,
  FloatNode,
  IntegerNode,
  ListNode,
  Meta,
  PairNode,
  Quoted,
  VarNode,
} from './index';

// Small constructors used by the compiler for synthesised nodes and by fixtures.

export const atom = (value: string): AtomNode => ({ type: 'Atom', value });
export const int = (value: number): IntegerNode => ({ type: 'Integer', value });
export const float = (value: number): FloatNode => ({ type: 'Float', value });
export const bin = (value: string): BinaryNode => ({ type: 'Binary', value });
export const nil = (): AtomNode => atom('nil');

export const list = (items: Quoted[]): ListNode => ({ type: 'List', items });
export const pair = (left: Quoted, right: Quoted): PairNode => ({ type: 'Pair', left, right });

export const v = (name: string, meta: Meta = {}, context: string | null = null): VarNode => ({
  type: 'Var',
  name,
  meta,
  context,
});

export const call = (head: string | Quoted, args: Quoted[], meta: Meta = {}): CallNode => ({
  type: 'Call',
  head,
  meta,
  args,
});

/** `left.right` head, used as the head of remote calls. */
export const dot = (left: Quoted, right: string, meta: Meta = {}): CallNode => call('.', [left, atom(right)], meta);

/** `left.right(args)` */
export const remote = (left: Quoted | string, right: string, args: Quoted[], meta: Meta = {}): CallNode =>
  call(dot(typeof left === 'string' ? atom(left) : left, right), args, meta);

/** `&N` */
export const placeholder = (index: number, meta: Meta = {}): CallNode => call('&', [int(index)], meta);

export const block = (exprs: Quoted[], meta: Meta = {}): CallNode => call('__block__', exprs, meta);

/** `args -> body` */
export const clause = (args: Quoted[], body: Quoted, meta: Meta = {}): CallNode => call('->', [list(args), body], meta);

export const fn = (clauses: CallNode[], meta: Meta = {}): CallNode => call('fn', clauses, meta);

/** Keyword list with atom keys, preserving insertion order. */
export const kw = (entries: Record<string, Quoted>): ListNode =>
  list(Object.entries(entries).map(([k, val]) => pair(atom(k), val)));
