import type { Meta, Quoted } from '@fennec/ast';

export type MetaEntry = { key: string; value: Quoted };

/** Reasons are returned rather than thrown so the caller can attach a token location. */
export type MetaResult = { ok: true; meta: Meta; ignored: string[] } | { ok: false; reason: string };

function atomValue(q: Quoted): string | null {
  return q.type === 'Atom' ? q.value : null;
}

export function toMeta(entries: MetaEntry[]): MetaResult {
  const meta: Meta = {};
  const ignored: string[] = [];
  for (const { key, value } of entries) {
    switch (key) {
      case 'line':
      case 'column':
      case 'counter':
        if (value.type !== 'Integer') return { ok: false, reason: `meta ${key} must be an integer` };
        meta[key] = value.value;
        break;
      case 'generated': {
        const a = atomValue(value);
        if (a !== 'true' && a !== 'false') return { ok: false, reason: 'meta generated must be a boolean' };
        meta.generated = a === 'true';
        break;
      }
      case 'import':
      case 'context': {
        const a = atomValue(value);
        if (a === null) return { ok: false, reason: `meta ${key} must be an atom` };
        meta[key] = a;
        break;
      }
      case 'import_fa': {
        const receiver = value.type === 'Pair' ? atomValue(value.left) : null;
        const context = value.type === 'Pair' ? atomValue(value.right) : null;
        if (receiver === null || context === null) {
          return { ok: false, reason: 'meta import_fa must be a {receiver, context} pair of atoms' };
        }
        meta.importFa = { receiver, context };
        break;
      }
      default:
        ignored.push(key);
    }
  }
  return { ok: true, meta, ignored };
}
