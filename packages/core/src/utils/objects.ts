// packages/core/src/utils/objects.ts — Small helpers for plain-data values

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Recursively freeze plain objects and arrays. Returns the same reference. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * JSON with object keys sorted at every level, so equal values always
 * produce equal strings. Unserializable values fall back to String() and
 * repeated ancestors print as "[Circular]".
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value, new Set()));
}

function normalize(value: unknown, ancestors: Set<object>): unknown {
  if (value === undefined) return null;
  if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (value === null || typeof value !== 'object') return value;
  if (ancestors.has(value)) return CIRCULAR;

  ancestors.add(value);
  let out: unknown;
  if (Array.isArray(value)) {
    out = value.map((item: unknown) => normalize(item, ancestors));
  } else {
    const record: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      record[key] = normalize(child, ancestors);
    }
    out = record;
  }
  ancestors.delete(value);
  return out;
}

/**
 * Deep copy restricted to plain data. Arrays and plain objects are copied,
 * other objects become "[ClassName]" and cycles become "[Circular]". The
 * result shares no reference with the input.
 */
export function toPlainData(value: unknown): unknown {
  return copyPlain(value, new Set());
}

function copyPlain(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (value === null || typeof value !== 'object') return value;
  if (ancestors.has(value)) return CIRCULAR;
  if (!Array.isArray(value) && !isPlainObject(value)) return `[${constructorName(value)}]`;

  ancestors.add(value);
  let out: unknown;
  if (Array.isArray(value)) {
    out = value.map((item: unknown) => copyPlain(item, ancestors));
  } else {
    const record: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      record[key] = copyPlain(child, ancestors);
    }
    out = record;
  }
  ancestors.delete(value);
  return out;
}

function constructorName(value: object): string {
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

const CIRCULAR = '[Circular]';
