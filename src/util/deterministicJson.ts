/**
 * Deterministic JSON stringify: object keys sorted recursively, array order preserved.
 * Used for debug dumps so two runs with the same settings print the same text.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(sortKeysDeep(value), null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== 'object') return v;

  const out: Record<string, unknown> = {};
  const entries = new Map(Object.entries(v));
  for (const k of [...entries.keys()].sort()) {
    out[k] = sortKeysDeep(entries.get(k));
  }
  return out;
}
