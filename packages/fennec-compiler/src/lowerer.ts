import type { ErlExpr, Quoted } from '@fennec/ast';
import type { Scope } from './scope';

/** The lowering entry points clause helpers and collaborators call back into. */
export interface Lowerer {
  translate(ast: Quoted, s: Scope): [ErlExpr, Scope];
  /** Lowers `arg` in the mode of `s`, seeing the bindings accumulated in `acc`. */
  translateArg(arg: Quoted, acc: Scope, s: Scope): [ErlExpr, Scope];
  translateArgs(args: Quoted[], s: Scope): [ErlExpr[], Scope];
  translateBlock(args: Quoted[], s: Scope): [ErlExpr[], Scope];
}
