import type { Quoted } from '@fennec/ast';
import { defaultLogger, type Logger } from '@fennec/shared';
import { TermLexer } from './chevrotain/tokens';
import { Reader, ReadError, errorAt } from './chevrotain/reader';
import { readTerm } from './terms';

export { ReadError } from './chevrotain/reader';

export type ReadOptions = {
  debug?: boolean;
  logger?: Logger;
};

/** Reads one quoted expression written in term notation, e.g. `{:foo, [line: 1], [1, 2]}`. */
export function readQuoted(source: string, opts: ReadOptions = {}): Quoted {
  const debug = !!opts.debug;
  const log = opts.logger ?? defaultLogger('reader');
  if (debug) log(`lex start (len=${source.length})`);
  const lex = TermLexer.tokenize(source);
  const lexErr = lex.errors[0];
  if (lexErr) {
    throw new ReadError(`lexer error: ${lexErr.message}`, lexErr.line ?? 1, lexErr.column ?? 1);
  }
  if (debug) log(`lex done (tokens=${lex.tokens.length})`);
  const r = new Reader(lex.tokens, lex.groups['comments'] ?? []);
  if (r.eof()) throw new ReadError('empty input', 1, 1);
  const term = readTerm(r, debug ? log : null);
  if (!r.eof()) throw errorAt(r.peek(), 'unexpected trailing input');
  if (debug) log(`read done (${term.type})`);
  return term;
}
