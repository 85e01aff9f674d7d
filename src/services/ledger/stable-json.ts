// =============================================================================
// SEALED RATINGS — Canonical JSON
//
// Sorted keys, bigint as a decimal string, dates as ISO 8601. PostgreSQL
// JSONB does not preserve key order, so event hashes must not depend on it.
//
// Type checks go through the built-in tag rather than prototypes: values
// copied with structuredClone may come from another realm.
// =============================================================================

function tagOf(value: unknown): string {
  return Object.prototype.toString.call(value);
}

function isDate(value: unknown): value is Date {
  return tagOf(value) === '[object Date]';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || tagOf(value) !== '[object Object]') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  // a literal's prototype is its realm's Object.prototype
  return proto === null || (typeof proto === 'object' && Object.getPrototypeOf(proto) === null);
}

function normalize(value: unknown): unknown {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error('Cannot stable-stringify non-finite numbers');
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  if (isDate(value)) return value.toISOString();
  if (Array.isArray(value)) return value.map(normalize);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) out[key] = normalize(value[key]);
    return out;
  }
  throw new Error(`Cannot stable-stringify type: ${tagOf(value)}`);
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}
