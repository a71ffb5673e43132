import type { ErlExpr, Quoted } from '@fennec/ast';
import { readQuoted } from '@fennec/reader';
import { defaultLogger, type Logger, type Warning } from '@fennec/shared';
import type { Collaborators } from './collaborators';
import { createEnv, type EnvOptions } from './env';
import { expandCaptures } from './fn';
import { toSource } from './printer';
import { createScope, translateVar, type Scope } from './scope';
import { Translator } from './translator';

export type CompileResult = {
  expanded: Quoted;
  form: ErlExpr;
  scope: Scope;
  warnings: Warning[];
};

export type CompileOptions = {
  file?: string;
  env?: Omit<EnvOptions, 'file'>;
  /** Variables already bound when the expression runs */
  bindings?: string[];
  collaborators?: Partial<Collaborators>;
  debug?: boolean;
  logger?: (msg: string) => void;
};

/** Binds each name as if matched before the expression: `x` becomes `x@1`. */
export function bindVars(s: Scope, names: string[]): Scope {
  let acc: Scope = { ...s, context: 'match', matchVars: new Map() };
  for (const name of names) acc = translateVar({}, name, null, acc)[1];
  return { ...acc, context: s.context, matchVars: s.matchVars, exportVars: s.exportVars };
}

/** Reads (when given source), expands and lowers one expression. */
export function compile(input: string | Quoted, opts: CompileOptions = {}): CompileResult {
  const debug = !!opts.debug;
  const log: Logger = opts.logger ?? defaultLogger('compiler');
  const file = opts.file ?? 'nofile';

  const quoted = typeof input === 'string' ? readQuoted(input, { debug, logger: opts.logger }) : input;
  const expanded = expandCaptures(quoted, createEnv({ ...opts.env, file }));
  if (debug) log(`expanded ${toSource(expanded)}`);

  const warnings: Warning[] = [];
  const translator = new Translator({
    collaborators: opts.collaborators,
    onWarning: (w) => warnings.push(w),
    debug,
    logger: opts.logger,
  });
  const [form, scope] = translator.lower(expanded, bindVars(createScope(file), opts.bindings ?? []));
  return { expanded, form, scope, warnings };
}
