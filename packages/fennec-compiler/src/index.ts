export { compile, bindVars, type CompileOptions, type CompileResult } from './compile';
export { Translator, type TranslatorOptions } from './translator';
export type { Lowerer } from './lowerer';
export { defaultCollaborators, type Collaborators, type TryHandlers } from './collaborators';
export { clause, clauses, extractGuards, extractSplatGuards, getPairs, match, type ClausePair, type PairKind } from './clauses';
export {
  capture,
  captureToQuoted,
  expandCaptures,
  expandFn,
  fnArity,
  isSequentialAndNotEmpty,
  CAPTURE_CONTEXT,
  MAX_CAPTURE_ARITY,
  type CaptureResult,
} from './fn';
export { createCounter, createEnv, type ClauseExpander, type CounterSource, type Env, type EnvOptions } from './env';
export * from './scope';
export { toSource } from './printer';
export { ann, isGuardOp, literalToErl, returnsBoolean } from './utils';
