/**
 * Lookup backends used by guarded bindings to read one name segment from a
 * scope value. A backend answers `has` first; `read` is only called on a
 * target for which `has` returned true.
 */
export interface LookupBackend {
  readonly kind: string;
  has(target: unknown, key: string): boolean;
  read(target: unknown, key: string): unknown;
}

/** Objects to read properties from; primitives are boxed, nullish are not. */
function toObject(target: unknown): object | null {
  if (target === null || target === undefined) return null;
  if (typeof target === "object" || typeof target === "function") return target;
  return Object(target);
}

/** `Map` entries, keyed by the segment string. */
export const mapLookup: LookupBackend = {
  kind: "map",
  has(target, key) {
    return target instanceof Map && target.has(key);
  },
  read(target, key) {
    return target instanceof Map ? target.get(key) : undefined;
  },
};

/** Zero-argument methods, called with the owning object as `this`. */
export const accessorLookup: LookupBackend = {
  kind: "accessor",
  has(target, key) {
    const obj = toObject(target);
    if (obj === null || !(key in obj)) return false;
    const member: unknown = Reflect.get(obj, key);
    return typeof member === "function";
  },
  read(target, key) {
    const obj = toObject(target);
    if (obj === null) return undefined;
    const member: unknown = Reflect.get(obj, key);
    return typeof member === "function" ? member.call(target) : undefined;
  },
};

/** Own or inherited properties, including getters. */
export const propertyLookup: LookupBackend = {
  kind: "property",
  has(target, key) {
    const obj = toObject(target);
    return obj !== null && key in obj;
  },
  read(target, key) {
    const obj = toObject(target);
    return obj === null ? undefined : Reflect.get(obj, key);
  },
};

export const DEFAULT_BACKENDS: readonly LookupBackend[] = [mapLookup, accessorLookup, propertyLookup];

/** First backend exposing `key` on `target`, or `null`. */
export function findBackend(
  backends: readonly LookupBackend[],
  target: unknown,
  key: string,
): LookupBackend | null {
  for (const backend of backends) {
    if (backend.has(target, key)) return backend;
  }
  return null;
}
