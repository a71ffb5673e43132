import type { ErlClause, ErlExpr, ErlMapField } from './erl';

// Single-line Erlang-like rendering of the lowered form, for debug output and assertions.

const BARE_ATOM = /^[a-z][A-Za-z0-9_@]*$/;
const RESERVED = new Set([
  'after', 'and', 'andalso', 'band', 'begin', 'bnot', 'bor', 'bsl', 'bsr', 'bxor', 'case', 'catch',
  'cond', 'div', 'end', 'fun', 'if', 'let', 'not', 'of', 'or', 'orelse', 'receive', 'rem', 'try',
  'when', 'xor',
]);

export function formatAtom(value: string): string {
  if (BARE_ATOM.test(value) && !RESERVED.has(value)) return value;
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function operand(e: ErlExpr): string {
  const s = formatErl(e);
  return e.type === 'op' || e.type === 'match' ? `(${s})` : s;
}

function body(exprs: ErlExpr[]): string {
  return exprs.map(formatErl).join(', ');
}

function guards(gs: ErlExpr[][]): string {
  if (gs.length === 0) return '';
  return ` when ${gs.map((g) => g.map(formatErl).join(', ')).join('; ')}`;
}

function field(f: ErlMapField): string {
  const op = f.type === 'map_field_exact' ? ':=' : '=>';
  return `${formatErl(f.key)} ${op} ${formatErl(f.value)}`;
}

/** `P when G -> B` for case-like constructs, `(P1, P2) -> B` for funs. */
export function formatClause(c: ErlClause, parens = false): string {
  const pats = c.patterns.map(formatErl).join(', ');
  const head = parens ? `(${pats})` : pats;
  return `${head}${guards(c.guards)} -> ${body(c.body)}`;
}

function clauses(cs: ErlClause[], parens = false): string {
  return cs.map((c) => formatClause(c, parens)).join('; ');
}

function consList(e: ErlExpr): string {
  const items: string[] = [];
  let cur = e;
  while (cur.type === 'cons') {
    items.push(formatErl(cur.head));
    cur = cur.tail;
  }
  if (cur.type === 'nil') return `[${items.join(', ')}]`;
  return `[${items.join(', ')} | ${formatErl(cur)}]`;
}

export function formatErl(e: ErlExpr): string {
  switch (e.type) {
    case 'atom':
      return formatAtom(e.value);
    case 'integer':
      return String(e.value);
    case 'float':
      return Number.isInteger(e.value) ? `${e.value}.0` : String(e.value);
    case 'string':
      return JSON.stringify(e.value);
    case 'var':
      return e.name;
    case 'nil':
      return '[]';
    case 'cons':
      return consList(e);
    case 'tuple':
      return `{${body(e.elements)}}`;
    case 'map': {
      const fields = `#{${e.fields.map(field).join(', ')}}`;
      return e.base ? `${formatErl(e.base)}${fields}` : fields;
    }
    case 'match':
      return `${formatErl(e.left)} = ${formatErl(e.right)}`;
    case 'block':
      return `begin ${body(e.body)} end`;
    case 'op': {
      if (e.operands.length === 1) {
        const sep = /^[a-z]/.test(e.op) ? ' ' : '';
        return `${e.op}${sep}${operand(e.operands[0])}`;
      }
      return `${operand(e.operands[0])} ${e.op} ${operand(e.operands[1])}`;
    }
    case 'call': {
      const args = body(e.args);
      const c = e.callee;
      if (c.type === 'remote') return `${formatErl(c.module)}:${formatErl(c.name)}(${args})`;
      if (c.type === 'atom' || c.type === 'var') return `${formatErl(c)}(${args})`;
      return `(${formatErl(c)})(${args})`;
    }
    case 'fun_local':
      return `fun ${formatAtom(e.name)}/${e.arity}`;
    case 'fun_remote':
      return `fun ${formatErl(e.module)}:${formatErl(e.name)}/${formatErl(e.arity)}`;
    case 'fun':
      return `fun ${clauses(e.clauses, true)} end`;
    case 'case':
      return `case ${formatErl(e.expr)} of ${clauses(e.clauses)} end`;
    case 'try': {
      let s = `try ${body(e.body)}`;
      if (e.elseClauses.length) s += ` of ${clauses(e.elseClauses)}`;
      if (e.catchClauses.length) s += ` catch ${clauses(e.catchClauses)}`;
      if (e.after.length) s += ` after ${body(e.after)}`;
      return `${s} end`;
    }
    case 'receive': {
      let s = 'receive';
      if (e.clauses.length) s += ` ${clauses(e.clauses)}`;
      if (e.after) s += ` after ${formatErl(e.after.timeout)} -> ${body(e.after.body)}`;
      return `${s} end`;
    }
    case 'bin': {
      const parts = e.elements.map((el) => {
        let s = formatErl(el.value);
        if (el.size !== 'default') s += `:${formatErl(el.size)}`;
        if (el.typeSpec !== 'default') s += `/${el.typeSpec.join('-')}`;
        return s;
      });
      return `<<${parts.join(', ')}>>`;
    }
  }
}
