/**
 * Field access helpers for opaque request/response objects.
 *
 * Requests and responses are treated as plain property bags: the engine
 * resolves (possibly dotted) paths for bundle identity, reads and writes the
 * bundled list field, and clones response envelopes with one field replaced.
 */

/**
 * Result of resolving a dotted field path.
 */
export type FieldResolution =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly path: string; readonly segment: string }

/**
 * Resolve a dot-separated path on `obj`, one segment at a time.
 * Inherited properties count as present; a null or primitive holder does not.
 */
export function resolveFieldPath(obj: unknown, path: string): FieldResolution {
  let current: unknown = obj
  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(segment in current)) {
      return { ok: false, path, segment }
    }
    current = Reflect.get(current, segment)
  }
  return { ok: true, value: current }
}

/**
 * Read a list field. Returns null when the field is absent or not an array.
 */
export function readList(obj: object, field: string): readonly unknown[] | null {
  const value: unknown = Reflect.get(obj, field)
  return Array.isArray(value) ? value : null
}

/**
 * Shallow-clone `source`, keeping its prototype, and replace one field.
 *
 * Every other field of the clone references the same value as the source,
 * so fan-out copies share envelope data instead of duplicating it.
 */
export function withField<T extends object>(source: T, field: string, value: unknown): T {
  const copy: T = Object.assign(Object.create(Object.getPrototypeOf(source)), source)
  Reflect.set(copy, field, value)
  return copy
}
