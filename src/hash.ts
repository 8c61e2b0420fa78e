/**
 * @module hash
 * @description
 * Hashing/equality adapter giving arbitrary keys Value Semantics (deep equality).
 * * Contract:
 * - `areEqual(a, b)` implies `hashValue(a) === hashValue(b)`.
 * - Hashes are unsigned 32-bit integers (FNV-1a based).
 * - No cycles: self-referential arrays overflow the stack when hashed.
 * - Values must not be mutated after they were used as a key.
 */

import { UnhashableValueError } from './errors';

// ============================================================================
// 1. CAPABILITIES
// ============================================================================

/**
 * Interface for objects that support Value Semantics.
 * Any object implementing it can be used as a key in a HashTrieMap or an element of a HashTrieSet.
 */
export interface Hashable {
    /** Deterministic hash, consistent with `equals`. */
    readonly hashCode: number;

    /** Checks deep equality with another object. */
    equals(other: unknown): boolean;
}

/**
 * The hash/equality pair the trie is generic over.
 * The default combines `hashValue` and `areEqual`; tests substitute adversarial hashers.
 */
export interface Hasher<K> {
    /**
     * Should return an unsigned 32-bit integer. Other numbers are reduced with `>>> 0`,
     * so only their low 32 bits count (`1.5` hashes like `1`, `-1` like `4294967295`).
     */
    hash(key: K): number;
    equals(a: K, b: K): boolean;
}

export function isHashable(value: unknown): value is Hashable {
    return typeof value === 'object' && value !== null
        && 'hashCode' in value
        && 'equals' in value && typeof value.equals === 'function';
}

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const TRUE_HASH = 0x27d4eb2d;
const FALSE_HASH = 0x165667b1;
const NULL_HASH = 0x9747b28c;
const UNDEFINED_HASH = 0x5bd1e995;
const NAN_HASH = 0x7ff80000;
const BIGINT_SALT = 0x3c6ef372;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

/**
 * Integers hash to themselves; other numbers go through FNV over the IEEE-754 words.
 * `-0` takes the integer path and hashes like `0`.
 */
function hashNumber(val: number): number {
    if ((val | 0) === val) return val >>> 0;
    if (val !== val) return NAN_HASH;
    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Order-sensitive fold over element hashes. Shared by arrays, Tuples, Lists and Stacks.
 */
export function hashSequence(values: Iterable<unknown>): number {
    let h = FNV_OFFSET;
    for (const v of values) {
        h ^= hashValue(v);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Computes a deterministic hash code for any hashable value.
 * Delegates to `.hashCode` for Hashable objects and recurses into arrays.
 * @throws UnhashableValueError for plain objects, functions, symbols and native containers.
 */
export function hashValue(v: unknown): number {
    switch (typeof v) {
        case 'string': return hashString(v);
        case 'number': return hashNumber(v);
        case 'boolean': return v ? TRUE_HASH : FALSE_HASH;
        case 'bigint': return (hashString(v.toString()) ^ BIGINT_SALT) >>> 0;
        case 'undefined': return UNDEFINED_HASH;
        case 'object':
            if (v === null) return NULL_HASH;
            if (Array.isArray(v)) return hashSequence(v);
            if (isHashable(v)) return v.hashCode >>> 0;
            break;
    }
    throw new UnhashableValueError(v);
}

// ============================================================================
// 3. EQUALITY
// ============================================================================

function sequencesEqual(a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>): boolean {
    const len = a.length;
    if (len !== b.length) return false;
    for (let i = 0; i < len; i++) {
        if (!areEqual(a[i], b[i])) return false;
    }
    return true;
}

/**
 * Determines deep equality between two values.
 * Primitives compare with SameValueZero (`NaN` equals `NaN`, `0` equals `-0`),
 * arrays pairwise, Hashable objects through `equals`, anything else by identity.
 */
export function areEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return a !== a && b !== b;
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

    if (Array.isArray(a)) return Array.isArray(b) && sequencesEqual(a, b);
    if (isHashable(a)) return a.equals(b);
    return false;
}

/** The value-semantic hasher every collection uses unless told otherwise. */
export const defaultHasher: Hasher<unknown> = {
    hash: hashValue,
    equals: areEqual,
};
