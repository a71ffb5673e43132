import type { IToken } from 'chevrotain';

export type Tok = IToken;

export class ReadError extends Error {
  constructor(message: string, public readonly line: number, public readonly column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'ReadError';
  }
}

export function errorAt(tok: Tok | undefined, message: string): ReadError {
  return new ReadError(message, tok?.startLine ?? 1, tok?.startColumn ?? 1);
}

export class Reader {
  constructor(public tokens: Tok[], public comments: Tok[] = []) {}
  i = 0;
  eof(): boolean { return this.i >= this.tokens.length; }
  peek(): Tok | undefined { return this.tokens[this.i]; }
  next(): Tok {
    const tok = this.tokens[this.i];
    if (!tok) throw errorAt(this.tokens[this.tokens.length - 1], 'unexpected end of input');
    this.i++;
    return tok;
  }
  is(t: Tok | undefined, name: string): boolean { return (t?.tokenType.name ?? '') === name; }
  match(name: string): boolean { return this.is(this.peek(), name); }
  expect(name: string): Tok {
    const tok = this.next();
    if (!this.is(tok, name)) throw errorAt(tok, `expected ${name} but got ${tok.tokenType.name} "${tok.image}"`);
    return tok;
  }
}
