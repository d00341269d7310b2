/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order
 * - Drops `undefined` members, like JSON.stringify
 *
 * Keeps CLI output stable for tests and diffs.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== 'object') return v;

  const out: Record<string, unknown> = {};
  for (const [k, inner] of Object.entries(v).sort(([a], [b]) => a.localeCompare(b))) {
    out[k] = sortKeysDeep(inner);
  }
  return out;
}
