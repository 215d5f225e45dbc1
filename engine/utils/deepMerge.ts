type PlainObject = Record<string, unknown>;

/** Safe immutable deep-merge for plain objects.
 *  Arrays and scalars in `override` replace the base (config layers override whole lists).
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return clone(base);

  if (isPlain(base) && isPlain(override)) {
    const out: PlainObject = {};
    const keys = new Set([...Object.keys(base), ...Object.keys(override)]);
    for (const k of keys) {
      const b = base[k];
      const o = override[k];
      if (o === undefined) { out[k] = clone(b); continue; }
      if (b === undefined) { out[k] = clone(o); continue; }

      if (isPlain(b) && isPlain(o)) {
        out[k] = deepMerge(b, o);
      } else {
        out[k] = clone(o); // override arrays / scalars / type changes / explicit null
      }
    }
    return out;
  }

  // Fallback: override replaces base
  return clone(override);
}

export function isPlain(x: unknown): x is PlainObject {
  return !!x && typeof x === "object" && !Array.isArray(x) && Object.getPrototypeOf(x) === Object.prototype;
}

function clone(x: unknown): unknown {
  if (Array.isArray(x)) return x.map(clone);
  if (isPlain(x)) { const out: PlainObject = {}; for (const k of Object.keys(x)) out[k] = clone(x[k]); return out; }
  return x;
}
export default deepMerge;
