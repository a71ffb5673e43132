import type { Quoted } from '@fennec/ast';
import { atom, bin, call, float, int, list, pair, v } from '@fennec/ast';
import type { Logger } from '@fennec/shared';
import { Reader, errorAt, type Tok } from './chevrotain/reader';
import { toMeta, type MetaEntry } from './meta';

function unquote(tok: Tok, image: string): string {
  try {
    const value: unknown = JSON.parse(image);
    if (typeof value === 'string') return value;
  } catch (e) {
    throw errorAt(tok, `invalid string literal ${image}: ${e instanceof Error ? e.message : String(e)}`);
  }
  throw errorAt(tok, `invalid string literal ${image}`);
}

function readAtom(tok: Tok): Quoted {
  const body = tok.image.slice(1);
  return atom(body.startsWith('"') ? unquote(tok, body) : body);
}

function readSequence(r: Reader, close: string, log: Logger | null): Quoted[] {
  const items: Quoted[] = [];
  if (r.match(close)) {
    r.next();
    return items;
  }
  for (;;) {
    if (r.match('KeywordKey')) {
      const key = r.next().image.slice(0, -1);
      items.push(pair(atom(key), readTerm(r, log)));
    } else {
      items.push(readTerm(r, log));
    }
    const sep = r.next();
    if (r.is(sep, close)) return items;
    if (!r.is(sep, 'Comma')) throw errorAt(sep, `expected , or closing bracket but got "${sep.image}"`);
  }
}

// `{head, meta, args}` is a call, `{name, meta, context}` a variable
function readTriple(start: Tok, [head, metaList, third]: [Quoted, Quoted, Quoted], log: Logger | null): Quoted {
  if (metaList.type !== 'List') throw errorAt(start, 'the second element of a 3-tuple must be a keyword list');
  const entries: MetaEntry[] = [];
  for (const item of metaList.items) {
    if (item.type !== 'Pair' || item.left.type !== 'Atom') throw errorAt(start, 'metadata must be a keyword list');
    entries.push({ key: item.left.value, value: item.right });
  }
  const res = toMeta(entries);
  if (!res.ok) throw errorAt(start, res.reason);
  if (log && res.ignored.length) log(`ignored meta keys: ${res.ignored.join(', ')}`);

  if (third.type === 'Atom') {
    if (head.type !== 'Atom') throw errorAt(start, 'a variable name must be an atom');
    return v(head.value, res.meta, third.value === 'nil' ? null : third.value);
  }
  if (third.type === 'List') {
    return call(head.type === 'Atom' ? head.value : head, third.items, res.meta);
  }
  throw errorAt(start, 'the third element of a 3-tuple must be a list of arguments or a context atom');
}

function readNumber(tok: Tok): string {
  return tok.image.replace(/_/g, '');
}

function readInteger(tok: Tok): number {
  const value = Number.parseInt(readNumber(tok), 10);
  if (!Number.isSafeInteger(value)) throw errorAt(tok, `integer literal ${tok.image} is outside the exactly representable range`);
  return value;
}

export function readTerm(r: Reader, log: Logger | null): Quoted {
  const tok = r.next();
  switch (tok.tokenType.name) {
    case 'LBrace': {
      const elems = readSequence(r, 'RBrace', log);
      const [a, b, c] = elems;
      if (elems.length === 2 && a && b) return pair(a, b);
      if (elems.length === 3 && a && b && c) return readTriple(tok, [a, b, c], log);
      throw errorAt(tok, `only 2- and 3-element tuples are valid quoted expressions, got ${elems.length} elements`);
    }
    case 'LBracket':
      return list(readSequence(r, 'RBracket', log));
    case 'AtomLiteral':
      return readAtom(tok);
    case 'Alias':
      return atom(tok.image === 'Elixir' || tok.image.startsWith('Elixir.') ? tok.image : `Elixir.${tok.image}`);
    case 'Identifier':
      if (tok.image === 'true' || tok.image === 'false' || tok.image === 'nil') return atom(tok.image);
      throw errorAt(tok, `unexpected identifier ${tok.image}, atoms are written as :${tok.image}`);
    case 'IntegerLiteral':
      return int(readInteger(tok));
    case 'FloatLiteral':
      return float(Number.parseFloat(readNumber(tok)));
    case 'StringLiteral':
      return bin(unquote(tok, tok.image));
    default:
      throw errorAt(tok, `unexpected token "${tok.image}"`);
  }
}
