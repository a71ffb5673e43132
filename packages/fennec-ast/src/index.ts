/**
 * Typed quoted AST for Fennec.
 * Input of the expander and the translator; mirrors the shape the reader produces.
 */

export type ImportHint = {
  receiver: string;
  context: string;
};

export type Meta = {
  line?: number;
  column?: number;
  counter?: number;     // hygiene counter assigned by the expander
  generated?: boolean;
  import?: string;      // module a local call resolves to
  context?: string;
  importFa?: ImportHint; // recorded by a previous expansion on `&fun/arity`
};

export type AtomNode = {
  type: 'Atom';
  value: string;
};

export type IntegerNode = {
  type: 'Integer';
  value: number;
};

export type FloatNode = {
  type: 'Float';
  value: number;
};

export type BinaryNode = {
  type: 'Binary';
  value: string;
};

export type ListNode = {
  type: 'List';
  items: Quoted[];
};

// Literal two-element tuple; other tuples are `{}` calls
export type PairNode = {
  type: 'Pair';
  left: Quoted;
  right: Quoted;
};

export type VarNode = {
  type: 'Var';
  name: string;
  meta: Meta;
  context: string | null;
};

export type CallNode = {
  type: 'Call';
  head: string | Quoted;
  meta: Meta;
  args: Quoted[];
};

export type Literal = AtomNode | IntegerNode | FloatNode | BinaryNode;

export type Quoted = Literal | ListNode | PairNode | VarNode | CallNode;

export type QuotedType = Quoted['type'];

export * from './erl';
export * from './guards';
export * from './build';
export * from './print';
