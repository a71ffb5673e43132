/**
 * Lowered abstract form. Erlang-style abstract syntax consumed by code generation.
 */

export type Anno = {
  line: number;
  generated?: boolean;
};

type Base<T extends string> = {
  type: T;
  anno: Anno;
};

export type ErlAtom = Base<'atom'> & { value: string };
export type ErlInteger = Base<'integer'> & { value: number };
export type ErlFloat = Base<'float'> & { value: number };
export type ErlString = Base<'string'> & { value: string };
export type ErlVar = Base<'var'> & { name: string };
export type ErlNil = Base<'nil'>;

export type ErlCons = Base<'cons'> & {
  head: ErlExpr;
  tail: ErlExpr;
};

export type ErlTuple = Base<'tuple'> & { elements: ErlExpr[] };

export type ErlMapField = Base<'map_field_assoc' | 'map_field_exact'> & {
  key: ErlExpr;
  value: ErlExpr;
};

export type ErlMap = Base<'map'> & {
  base: ErlExpr | null; // update target, null for construction
  fields: ErlMapField[];
};

export type ErlMatch = Base<'match'> & {
  left: ErlExpr;
  right: ErlExpr;
};

export type ErlBlock = Base<'block'> & { body: ErlExpr[] };

export type ErlOp = Base<'op'> & {
  op: string;
  operands: [ErlExpr] | [ErlExpr, ErlExpr];
};

export type ErlRemote = Base<'remote'> & {
  module: ErlExpr;
  name: ErlExpr;
};

export type ErlCall = Base<'call'> & {
  callee: ErlExpr | ErlRemote;
  args: ErlExpr[];
};

export type ErlFunLocal = Base<'fun_local'> & {
  name: string;
  arity: number;
};

export type ErlFunRemote = Base<'fun_remote'> & {
  module: ErlExpr;
  name: ErlExpr;
  arity: ErlExpr;
};

export type ErlClause = Base<'clause'> & {
  patterns: ErlExpr[];
  guards: ErlExpr[][]; // disjunction of conjunctions
  body: ErlExpr[];
};

export type ErlFun = Base<'fun'> & { clauses: ErlClause[] };

export type ErlCase = Base<'case'> & {
  expr: ErlExpr;
  clauses: ErlClause[];
};

export type ErlTry = Base<'try'> & {
  body: ErlExpr[];
  elseClauses: ErlClause[];
  catchClauses: ErlClause[];
  after: ErlExpr[];
};

export type ErlReceiveAfter = {
  timeout: ErlExpr;
  body: ErlExpr[];
};

export type ErlReceive = Base<'receive'> & {
  clauses: ErlClause[];
  after: ErlReceiveAfter | null;
};

export type ErlBinElement = Base<'bin_element'> & {
  value: ErlExpr;
  size: ErlExpr | 'default';
  typeSpec: string[] | 'default';
};

export type ErlBin = Base<'bin'> & { elements: ErlBinElement[] };

export type ErlExpr =
  | ErlAtom
  | ErlInteger
  | ErlFloat
  | ErlString
  | ErlVar
  | ErlNil
  | ErlCons
  | ErlTuple
  | ErlMap
  | ErlMatch
  | ErlBlock
  | ErlOp
  | ErlCall
  | ErlFunLocal
  | ErlFunRemote
  | ErlFun
  | ErlCase
  | ErlTry
  | ErlReceive
  | ErlBin;

export type ErlType = ErlExpr['type'];
