/**
 * @module list-ops
 * Stateless operations on ordered sequences.
 *
 * No function mutates its inputs or throws on absent (`null` / `undefined`)
 * or empty input; those cases return an empty result instead.
 *
 * Set-backed operations (`mergeAll`, `merge`, `intersection`, `fullDifference`)
 * return their elements in an unspecified order: compare results as sets.
 * Element equality follows `ValueSet` (see `./hash`).
 */

import { DEFAULT_DELIMITER } from './constants';
import { EMPTY, emptyList, isEmpty } from './guards';
import { ValueSet } from './hash';

/** An ordered sequence that may be absent. */
type Sequence<T> = ReadonlyArray<T> | null | undefined;

// ============================================================================
// 1. STRING <-> LIST
// ============================================================================

/**
 * Joins the elements in encounter order, separated by `delimiter`.
 * @returns `""` when the sequence or the delimiter is absent/empty.
 */
function join(sequence: Sequence<string>, delimiter: string | null = DEFAULT_DELIMITER): string {
    if (sequence == null || delimiter == null || isEmpty(sequence) || isEmpty(delimiter)) {
        return EMPTY;
    }
    return sequence.join(delimiter);
}

/**
 * Splits `source` on every occurrence of `delimiter`, taken literally.
 * Empty fields are kept: `split('a,,b')` is `['a', '', 'b']`.
 */
function split(source: string | null | undefined, delimiter: string | null = DEFAULT_DELIMITER): string[] {
    if (source == null || delimiter == null || isEmpty(source) || isEmpty(delimiter)) {
        return emptyList();
    }
    return source.split(delimiter);
}

// ============================================================================
// 2. ARRAY <-> LIST
// ============================================================================

/** Copies the source into a new, growable array. */
function toList<T>(source: Sequence<T>): T[] {
    return source == null ? emptyList() : [...source];
}

/**
 * Copies the sequence into a new fixed-size array: elements can be reassigned,
 * but the array is sealed against growing or shrinking.
 */
function toArray<T>(sequence: Sequence<T>): T[] {
    return Object.seal(sequence == null ? emptyList<T>() : [...sequence]);
}

// ============================================================================
// 3. CONCATENATION
// ============================================================================

/**
 * Flattens the sequences in order, skipping absent ones. Duplicates are kept.
 * @example concatAll([1, 2], null, [3, 1]) // [1, 2, 3, 1]
 */
function concatAll<T>(...sequences: Sequence<T>[]): T[] {
    const result: T[] = [];
    for (const sequence of sequences) {
        if (sequence == null) continue;
        for (const item of sequence) result.push(item);
    }
    return result;
}

/**
 * Concatenates two sequences.
 * When one side is empty the other is returned as-is, so the result may be
 * the caller's own array.
 */
function concat<T>(a: Sequence<T>, b: Sequence<T>): ReadonlyArray<T> {
    if (a == null || isEmpty(a)) {
        return b == null || isEmpty(b) ? emptyList<T>() : b;
    }
    if (b == null || isEmpty(b)) {
        return a;
    }
    return [...a, ...b];
}

// ============================================================================
// 4. DEDUP MERGE
// ============================================================================

/**
 * Unique elements of all present sequences, in unspecified order.
 * @example mergeAll([1, 2, 1], [3, 1], null) // some ordering of [1, 2, 3]
 */
function mergeAll<T>(...sequences: Sequence<T>[]): T[] {
    const set = new ValueSet<T>();
    for (const sequence of sequences) {
        if (sequence == null) continue;
        set.ensureCapacity(set.size + sequence.length);
        for (const item of sequence) set.add(item);
    }
    return set.toArray();
}

/**
 * Unique elements of `a` and `b`, in unspecified order.
 * Unlike `mergeAll`, returns `[]` as soon as either input is absent/empty.
 */
function merge<T>(a: Sequence<T>, b: Sequence<T>): T[] {
    if (a == null || b == null || isEmpty(a) || isEmpty(b)) {
        return emptyList();
    }
    return new ValueSet<T>(a).union(b).toArray();
}

// ============================================================================
// 5. SET-LIKE RELATIONS
// ============================================================================

/**
 * Elements present in both sequences, each once, in unspecified order.
 * @example intersection([1, 2, 1, 4, 5], [1, 1, 3, 4, 1]) // {1, 4}
 */
function intersection<T>(a: Sequence<T>, b: Sequence<T>): T[] {
    if (a == null || b == null || isEmpty(a) || isEmpty(b)) {
        return emptyList();
    }
    return new ValueSet<T>(a).intersection(new ValueSet<T>(b)).toArray();
}

/**
 * Elements of `a` that never occur in `b`, keeping the order and repeats of `a`.
 * Returns `[]` if either input is absent/empty, including `difference(a, [])`.
 * @example difference([1, 2, 1, 4, 5], [1, 1, 3, 4, 1]) // [2, 5]
 */
function difference<T>(a: Sequence<T>, b: Sequence<T>): T[] {
    if (a == null || b == null || isEmpty(a) || isEmpty(b)) {
        return emptyList();
    }
    const excluded = new ValueSet<T>(b);
    return a.filter(element => !excluded.has(element));
}

/**
 * The two one-sided differences, combined with `merge`, in unspecified order.
 * Because `merge` drops everything when either side is empty, the result is
 * `[]` unless both `a` and `b` have elements the other lacks.
 * @example fullDifference([1, 2, 1, 4, 5], [1, 1, 3, 4, 1]) // {2, 3, 5}
 * @example fullDifference([1, 2], [1]) // []
 */
function fullDifference<T>(a: Sequence<T>, b: Sequence<T>): T[] {
    if (a == null || b == null || isEmpty(a) || isEmpty(b)) {
        return emptyList();
    }
    const inA = new ValueSet<T>(a);
    const inB = new ValueSet<T>(b);
    return merge(
        a.filter(element => !inB.has(element)),
        b.filter(element => !inA.has(element)),
    );
}

// ============================================================================
// 6. DUPLICATE DETECTION
// ============================================================================

/** True if any element occurs more than once. Stops at the first repeat. */
function hasDuplicates<T>(collection: Iterable<T> | null | undefined): boolean {
    if (collection == null || isEmpty(collection)) return false;

    const seen = new ValueSet<T>();
    for (const item of collection) {
        if (!seen.add(item)) return true;
    }
    return false;
}

export {
    join,
    split,
    toList,
    toArray,
    concatAll,
    concat,
    mergeAll,
    merge,
    intersection,
    difference,
    fullDifference,
    hasDuplicates,
};

export type { Sequence };
