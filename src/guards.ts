/**
 * @module list-ops/guards
 * Absent/empty checks shared by every list operation.
 */

export const EMPTY = '';

/**
 * Returns true for `null`, `undefined`, `""`, zero-length arrays and typed
 * arrays, and zero-size `Set` / `Map` instances.
 */
export function isEmpty(value: unknown): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === 'string' || Array.isArray(value)) return value.length === 0;
    if (ArrayBuffer.isView(value)) return value.byteLength === 0;
    if (value instanceof Set || value instanceof Map) return value.size === 0;
    return false;
}

/** Negation of `isEmpty`. */
export function isNotEmpty(value: unknown): boolean {
    return !isEmpty(value);
}

/** A new, empty array of the requested element type. */
export function emptyList<T>(): T[] {
    return [];
}
