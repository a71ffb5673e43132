import type { CallNode, Quoted } from '@fennec/ast';

// Source-like rendering of quoted fragments for diagnostics.

const BINARY_OPS = new Set([
  '=', '+', '-', '*', '/', '==', '!=', '===', '!==', '<', '>', '<=', '>=', '&&', '||', 'and', 'or',
  '++', '--', '<>', '|', '::', '|>', 'when', 'in', '..', '=~', '\\\\',
]);
const UNARY_OPS = new Set(['-', '+', '!', '^', 'not', '@']);
const IDENT = /^[a-z_][A-Za-z0-9_]*[?!]?$/;

function atomSource(value: string): string {
  if (value === 'true' || value === 'false' || value === 'nil') return value;
  if (value.startsWith('Elixir.')) return value.slice('Elixir.'.length);
  if (IDENT.test(value)) return `:${value}`;
  return `:${JSON.stringify(value)}`;
}

function isOperatorCall(q: Quoted): boolean {
  if (q.type !== 'Call' || typeof q.head !== 'string') return false;
  return (q.args.length === 2 && BINARY_OPS.has(q.head)) || q.head === '__block__';
}

function operand(q: Quoted): string {
  return isOperatorCall(q) ? `(${toSource(q)})` : toSource(q);
}

function args(items: Quoted[]): string {
  return items.map(toSource).join(', ');
}

function isKeywordList(items: Quoted[]): boolean {
  return items.length > 0 && items.every((i) => i.type === 'Pair' && i.left.type === 'Atom');
}

function keyword(items: Quoted[]): string {
  return items
    .map((i) => (i.type === 'Pair' && i.left.type === 'Atom' ? `${i.left.value}: ${toSource(i.right)}` : toSource(i)))
    .join(', ');
}

function mapBody(items: Quoted[]): string {
  return items.map((i) => (i.type === 'Pair' ? `${toSource(i.left)} => ${toSource(i.right)}` : toSource(i))).join(', ');
}

function clauseSource(c: Quoted): string {
  if (c.type === 'Call' && c.head === '->' && c.args.length === 2) {
    const [params, body] = c.args;
    const head = params && params.type === 'List' ? args(params.items) : '';
    return `${head ? `${head} ` : ''}-> ${body ? toSource(body) : ''}`;
  }
  return toSource(c);
}

// `fun/2`, `Mod.fun/2`
function functionRef(q: Quoted): string | null {
  if (q.type !== 'Call' || q.head !== '/' || q.args.length !== 2) return null;
  const [target, arity] = q.args;
  if (!target || !arity) return null;
  if (target.type === 'Var') return `${target.name}/${toSource(arity)}`;
  if (target.type === 'Call' && target.args.length === 0 && typeof target.head !== 'string') {
    const h = target.head;
    const [left, right] = h.type === 'Call' && h.head === '.' ? h.args : [];
    if (left && right && right.type === 'Atom') return `${operand(left)}.${right.value}/${toSource(arity)}`;
  }
  return null;
}

function callSource(c: CallNode): string {
  const head = c.head;
  if (typeof head !== 'string') {
    if (head.type === 'Call' && head.head === '.') {
      const [left, right] = head.args;
      if (left && right && right.type === 'Atom') return `${operand(left)}.${right.value}(${args(c.args)})`;
      if (left && !right) return `${operand(left)}.(${args(c.args)})`;
    }
    return `${operand(head)}(${args(c.args)})`;
  }
  const [a, b] = c.args;
  switch (head) {
    case '&':
      if (a && c.args.length === 1) {
        if (a.type === 'Integer') return `&${a.value}`;
        const ref = functionRef(a);
        if (ref) return `&${ref}`;
        return isOperatorCall(a) ? `&(${toSource(a)})` : `&${toSource(a)}`;
      }
      break;
    case '__aliases__':
      return c.args.map((p) => (p.type === 'Atom' ? p.value : toSource(p))).join('.');
    case '{}':
      return `{${args(c.args)}}`;
    case '%{}':
      return `%{${mapBody(c.args)}}`;
    case '%':
      if (a && b && b.type === 'Call' && b.head === '%{}') return `%${toSource(a)}{${mapBody(b.args)}}`;
      break;
    case '<<>>':
      return `<<${args(c.args)}>>`;
    case '__block__':
      return c.args.length === 1 && a ? toSource(a) : `(${c.args.map(toSource).join('; ')})`;
    case 'fn':
      return `fn ${c.args.map(clauseSource).join('; ')} end`;
    case '->':
      return clauseSource(c);
  }
  if (a && b && c.args.length === 2 && BINARY_OPS.has(head)) return `${operand(a)} ${head} ${operand(b)}`;
  if (a && c.args.length === 1 && UNARY_OPS.has(head)) {
    return /^[a-z]/.test(head) ? `${head} ${operand(a)}` : `${head}${operand(a)}`;
  }
  return `${head}(${args(c.args)})`;
}

export function toSource(q: Quoted): string {
  switch (q.type) {
    case 'Atom':
      return atomSource(q.value);
    case 'Integer':
      return String(q.value);
    case 'Float':
      return Number.isInteger(q.value) ? `${q.value}.0` : String(q.value);
    case 'Binary':
      return JSON.stringify(q.value);
    case 'List':
      return isKeywordList(q.items) ? `[${keyword(q.items)}]` : `[${args(q.items)}]`;
    case 'Pair':
      return `{${toSource(q.left)}, ${toSource(q.right)}}`;
    case 'Var':
      return q.name;
    case 'Call':
      return callSource(q);
  }
}
