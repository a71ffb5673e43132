import type {
  AtomNode,
  BinaryNode,
  CallNode,
  FloatNode,
  IntegerNode,
  ListNode,
  PairNode,
  Quoted,
  VarNode,
} from './index';

// Literals
export const isAtom = (n: Quoted): n is AtomNode => n.type === 'Atom';
export const isInteger = (n: Quoted): n is IntegerNode => n.type === 'Integer';
export const isFloat = (n: Quoted): n is FloatNode => n.type === 'Float';
export const isBinary = (n: Quoted): n is BinaryNode => n.type === 'Binary';
export const isAtomValue = (n: Quoted, value: string): n is AtomNode => n.type === 'Atom' && n.value === value;

// Containers
export const isList = (n: Quoted): n is ListNode => n.type === 'List';
export const isPair = (n: Quoted): n is PairNode => n.type === 'Pair';

// Forms
export const isVar = (n: Quoted): n is VarNode => n.type === 'Var';
export const isCall = (n: Quoted): n is CallNode => n.type === 'Call';
export const isCallTo = (n: Quoted, head: string): n is CallNode => n.type === 'Call' && n.head === head;

export type DotHead = CallNode & { head: '.' };
export type RemoteCall = CallNode & { head: DotHead };

/** `left.right(args)`: head is a two-argument `.` node whose right side is an atom. */
export function isRemoteCall(n: Quoted): n is RemoteCall {
  if (n.type !== 'Call' || typeof n.head === 'string') return false;
  const h = n.head;
  return h.type === 'Call' && h.head === '.' && h.args.length === 2 && h.args[1]?.type === 'Atom';
}

/** `expr.(args)`: head is a one-argument `.` node. */
export function isAnonymousCall(n: Quoted): n is RemoteCall {
  if (n.type !== 'Call' || typeof n.head === 'string') return false;
  const h = n.head;
  return h.type === 'Call' && h.head === '.' && h.args.length === 1;
}

/** Numbers, atoms and binaries cannot introduce bindings. */
export const isLiteral = (n: Quoted): boolean =>
  n.type === 'Atom' || n.type === 'Integer' || n.type === 'Float' || n.type === 'Binary';

/** Keyword list lookup: `[do: x, else: y]`. */
export function keywordGet(n: Quoted, key: string): Quoted | undefined {
  if (n.type !== 'List') return undefined;
  for (const item of n.items) {
    if (item.type === 'Pair' && isAtomValue(item.left, key)) return item.right;
  }
  return undefined;
}
