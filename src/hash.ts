/**
 * @module list-ops/hash
 * @description
 * Value hashing and a compact hash set backing the set-like list operations.
 * * Architecture:
 * - Engine: "Compact Layout" Hash Table (Open Addressing, Linear Probing).
 * - Storage: Dense arrays for data (iteration O(N)), Uint32Array for slots.
 * - Contract: `Structural` objects compare by value, everything else by SameValueZero.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Interface for objects that support Value Semantics.
 * Equal objects MUST report equal hash codes, and the hash code must not
 * change while the object is stored in a `ValueSet`.
 */
interface Structural {
    readonly hashCode: number;

    /** Checks deep equality with another object. */
    equals(other: unknown): boolean;
}

function isStructural(val: unknown): val is Structural {
    return typeof val === 'object'
        && val !== null
        && 'hashCode' in val
        && 'equals' in val
        && typeof val.hashCode === 'number'
        && typeof val.equals === 'function';
}

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const HASH_NULL = 0x1f2e3d4c;
const HASH_UNDEFINED = 0x2a3b4c5d;
const HASH_NAN = 0x7ff80000;
const HASH_TRUE = 1231;
const HASH_FALSE = 1237;

function mixInt(val: number): number {
    let h = val | 0;
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    return (h >> 16) ^ h;
}

const floatBuffer = new ArrayBuffer(8);
const floatView = new Float64Array(floatBuffer);
const intView = new Int32Array(floatBuffer);

/**
 * Int32 values take the integer mixer; everything else hashes its IEEE-754 bits.
 * `-0` equals `0` under `|`, so both take the integer path.
 */
function hashNumber(val: number): number {
    if (val === (val | 0)) return mixInt(val);
    if (Number.isNaN(val)) return HASH_NAN;

    floatView[0] = val;
    return mixInt(intView[0] ^ mixInt(intView[1]));
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    for (let i = 0; i < str.length; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h;
}

// Objects without value semantics get a stable per-instance hash.
const identityHashes = new WeakMap<object, number>();
let nextIdentity = 1;

function identityHash(obj: object): number {
    let h = identityHashes.get(obj);
    if (h === undefined) {
        h = mixInt(nextIdentity++);
        identityHashes.set(obj, h);
    }
    return h;
}

/**
 * Computes a 32-bit hash code for any value.
 * - Numbers: Integer bit mixing for int32 values, IEEE-754 bits otherwise.
 * - Strings: FNV-1a.
 * - Structural objects: Delegates to `.hashCode`.
 * - Other objects and functions: identity hash.
 */
function hashValue(val: unknown): number {
    switch (typeof val) {
        case 'number':
            return hashNumber(val);
        case 'string':
            return hashString(val);
        case 'boolean':
            return val ? HASH_TRUE : HASH_FALSE;
        case 'bigint':
            return hashString(val.toString());
        case 'symbol':
            return hashString(val.toString());
        case 'undefined':
            return HASH_UNDEFINED;
        case 'function':
            return identityHash(val);
        case 'object':
            if (val === null) return HASH_NULL;
            return isStructural(val) ? val.hashCode | 0 : identityHash(val);
    }
    return 0;
}

/**
 * SameValueZero, extended with `Structural.equals` for value objects.
 */
function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (isStructural(a)) return a.equals(b);
    return false;
}

function render(val: unknown): string {
    return typeof val === 'string' ? JSON.stringify(val) : String(val);
}

// ============================================================================
// 3. TUPLE (Immutable)
// ============================================================================

/**
 * An immutable, fixed-length sequence of values.
 * Useful for deduplicating composite values (pairs, rows) by content.
 * @template T The type of the tuple elements array.
 */
class Tuple<T extends readonly unknown[]> implements Structural {
    readonly #elements: ReadonlyArray<T[number]>;
    readonly #hashCode: number;

    constructor(...elements: T) {
        this.#elements = Object.freeze([...elements]);

        let h = 1;
        for (const e of this.#elements) {
            h = (Math.imul(h, 31) + hashValue(e)) | 0;
        }
        this.#hashCode = h;
    }

    get length(): number { return this.#elements.length; }
    get raw(): ReadonlyArray<T[number]> { return this.#elements; }
    get hashCode(): number { return this.#hashCode; }

    get(index: number): T[number] | undefined { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        if (this.#hashCode !== other.hashCode) return false;
        if (this.length !== other.length) return false;

        const theirs: ReadonlyArray<unknown> = other.raw;
        for (let i = 0; i < this.#elements.length; i++) {
            if (!areEqual(this.#elements[i], theirs[i])) return false;
        }
        return true;
    }

    toString(): string {
        return `(${this.#elements.map(render).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 4. VALUE SET
// ============================================================================

/**
 * A Hash Set with Value Semantics for `Structural` elements.
 *
 * Architecture:
 * - **Dense Storage**: Elements live in a contiguous array (`_values`) for O(n) iteration.
 * - **Sparse Lookup**: A `Uint32Array` (`_indices`) maps hashes to positions in the dense array.
 * - **Open Addressing**: Linear probing for collision resolution.
 *
 * Iteration currently follows insertion order, but callers of the set-backed
 * list operations must not rely on it.
 *
 * @template T The type of elements in the set.
 */
class ValueSet<T> implements Iterable<T> {

    private _values: T[] = [];
    private _hashes: number[] = [];

    // Slot table: stores index + 1, where 0 means empty
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;

    private readonly LOAD_FACTOR = 0.75;
    private readonly MIN_BUCKETS = 16;

    constructor(initialData?: Iterable<T>) {
        this._bucketCount = this.MIN_BUCKETS;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
        if (initialData === undefined) return;

        if (Array.isArray(initialData)) this.ensureCapacity(initialData.length);
        for (const item of initialData) this.add(item);
    }

    get size(): number { return this._values.length; }
    isEmpty(): boolean { return this._values.length === 0; }

    /**
     * Grows the slot table so that `capacity` elements fit under the load factor.
     * Only the lookup table is rebuilt; dense storage is untouched.
     */
    ensureCapacity(capacity: number): void {
        if (capacity < this._bucketCount * this.LOAD_FACTOR) return;

        let target = this._bucketCount;
        while (target * this.LOAD_FACTOR <= capacity) target <<= 1;

        this._bucketCount = target;
        this._mask = target - 1;
        this._indices = new Uint32Array(target);

        for (let i = 0; i < this._hashes.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    /**
     * Inserts an element unless an equal one is present.
     * @returns `true` if the element was added, `false` if it was already there.
     */
    add(e: T): boolean {
        if (this._values.length + 1 > this._bucketCount * this.LOAD_FACTOR) {
            this.ensureCapacity(this._values.length + 1);
        }

        const h = hashValue(e);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) {
                this._hashes.push(h);
                this._values.push(e);
                this._indices[idx] = this._values.length;
                return true;
            }

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], e)) return false;

            idx = (idx + 1) & this._mask;
        }
    }

    has(element: T): boolean {
        const h = hashValue(element);
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], element)) return true;

            idx = (idx + 1) & this._mask;
        }
    }

    union(other: Iterable<T>): ValueSet<T> {
        const res = new ValueSet<T>(this._values);
        for (const item of other) res.add(item);
        return res;
    }

    /** Elements of this set also in `other`; the instances kept are this set's. */
    intersection(other: ValueSet<T>): ValueSet<T> {
        const res = new ValueSet<T>();
        for (const item of this) { if (other.has(item)) res.add(item); }
        return res;
    }

    /** Copies the elements into a new array. */
    toArray(): T[] { return this._values.slice(); }

    [Symbol.iterator](): Iterator<T> { return this._values[Symbol.iterator](); }

    toString(): string {
        return `{${this._values.map(render).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 5. PUBLIC EXPORTS
// ============================================================================

export {
    ValueSet,
    Tuple,
    hashValue,
    areEqual,
    isStructural,
};

export type { Structural };
