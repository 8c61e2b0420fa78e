/**
 * @module hash-trie-set
 * Persistent set over the hash-trie engine; every leaf stores the unit value.
 */

import { KeyNotFoundError } from './errors';
import { defaultHasher, type Hashable, type Hasher } from './hash';
import { formatValue } from './format';
import type { HashTrieOptions } from './hash-trie-map';
import { insert, leaves, lookup, NOT_FOUND, remove, type Trie } from './trie';

type Unit = true;
const UNIT: Unit = true;

/**
 * An immutable hash set with structural sharing.
 * Same semantics as HashTrieMap with the values elided.
 * Set algebra always hashes with the receiver's hasher.
 *
 * @template T Element type; must be hashable by the configured hasher.
 */
export class HashTrieSet<T> implements Hashable, Iterable<T> {
    readonly #root: Trie<T, Unit>;
    readonly #size: number;
    readonly #hasher: Hasher<T>;
    #hashCode: number | null = null;

    private constructor(root: Trie<T, Unit>, size: number, hasher: Hasher<T>) {
        this.#root = root;
        this.#size = size;
        this.#hasher = hasher;
    }

    static empty<T>(options: HashTrieOptions<T> = {}): HashTrieSet<T> {
        return new HashTrieSet<T>(null, 0, options.hasher ?? defaultHasher);
    }

    /** Duplicates (by the hasher's equality) collapse to the first occurrence. */
    static from<T>(iterable: Iterable<T>, options: HashTrieOptions<T> = {}): HashTrieSet<T> {
        return HashTrieSet.empty<T>(options).#insertAll(iterable);
    }

    static of<T>(...items: T[]): HashTrieSet<T> { return HashTrieSet.from(items); }

    #hash(value: T): number {
        return this.#hasher.hash(value) >>> 0;
    }

    #derive(root: Trie<T, Unit>, size: number): HashTrieSet<T> {
        return root === this.#root ? this : new HashTrieSet(root, size, this.#hasher);
    }

    #insertAll(iterable: Iterable<T>): HashTrieSet<T> {
        let root = this.#root;
        let size = this.#size;
        for (const value of iterable) {
            const res = insert(root, 0, this.#hash(value), value, UNIT, this.#hasher);
            root = res.node;
            if (res.added) size++;
        }
        return this.#derive(root, size);
    }

    #sharesHasherWith(other: Iterable<T>): other is HashTrieSet<T> {
        return other instanceof HashTrieSet && other.#hasher === this.#hasher;
    }

    get size(): number { return this.#size; }
    isEmpty(): boolean { return this.#size === 0; }

    has(value: T): boolean {
        return lookup(this.#root, this.#hash(value), value, this.#hasher) !== undefined;
    }

    /** Returns the receiver when `value` is already present. */
    insert(value: T): HashTrieSet<T> {
        const res = insert(this.#root, 0, this.#hash(value), value, UNIT, this.#hasher);
        return this.#derive(res.node, res.added ? this.#size + 1 : this.#size);
    }

    /** @throws KeyNotFoundError if `value` is absent. */
    remove(value: T): HashTrieSet<T> {
        const root = remove(this.#root, 0, this.#hash(value), value, this.#hasher);
        if (root === NOT_FOUND) throw new KeyNotFoundError(value);
        return this.#derive(root, this.#size - 1);
    }

    /** Like `remove`, but returns the receiver when `value` is absent. */
    discard(value: T): HashTrieSet<T> {
        const root = remove(this.#root, 0, this.#hash(value), value, this.#hasher);
        return root === NOT_FOUND ? this : this.#derive(root, this.#size - 1);
    }

    // ------------------------------------------------------------------------
    // Set algebra
    // ------------------------------------------------------------------------

    union(other: Iterable<T>): HashTrieSet<T> {
        // Insert the smaller side into the larger one when both hash alike.
        if (this.#sharesHasherWith(other) && other.#size > this.#size) return other.#insertAll(this);
        return this.#insertAll(other);
    }

    intersection(other: Iterable<T>): HashTrieSet<T> {
        let result = HashTrieSet.empty<T>({ hasher: this.#hasher });
        if (this.#sharesHasherWith(other)) {
            const [small, large] = this.#size <= other.#size ? [this, other] : [other, this];
            for (const value of small) if (large.has(value)) result = result.insert(value);
            return result;
        }
        for (const value of other) if (this.has(value)) result = result.insert(value);
        return result;
    }

    difference(other: Iterable<T>): HashTrieSet<T> {
        let result: HashTrieSet<T> = this;
        for (const value of other) {
            result = result.discard(value);
            if (result.isEmpty()) break;
        }
        return result;
    }

    symmetricDifference(other: Iterable<T>): HashTrieSet<T> {
        let result: HashTrieSet<T> = this;
        for (const value of HashTrieSet.from(other, { hasher: this.#hasher })) {
            result = this.has(value) ? result.discard(value) : result.insert(value);
        }
        return result;
    }

    isSubsetOf(other: HashTrieSet<T>): boolean {
        if (this.#size > other.#size) return false;
        for (const value of this) if (!other.has(value)) return false;
        return true;
    }

    isSupersetOf(other: HashTrieSet<T>): boolean {
        return other.isSubsetOf(this);
    }

    isDisjointFrom(other: Iterable<T>): boolean {
        for (const value of other) if (this.has(value)) return false;
        return true;
    }

    // ------------------------------------------------------------------------
    // Iteration, hashing, equality
    // ------------------------------------------------------------------------

    *values(): IterableIterator<T> {
        for (const leaf of leaves(this.#root)) yield leaf.key;
    }

    [Symbol.iterator](): IterableIterator<T> { return this.values(); }

    forEach(fn: (value: T, set: this) => void): void {
        for (const leaf of leaves(this.#root)) fn(leaf.key, this);
    }

    /** Order-independent XOR of element hashes, cached after the first call. */
    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        let h = 0;
        for (const leaf of leaves(this.#root)) h ^= leaf.hash;
        this.#hashCode = h >>> 0;
        return this.#hashCode;
    }

    /** Non-empty sets over different hashers never compare equal. */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof HashTrieSet)) return false;
        if (this.#size !== other.#size) return false;
        if (this.#root === other.#root) return true;
        if (this.#hasher !== other.#hasher) return false;
        for (const leaf of leaves(this.#root)) {
            if (!other.has(leaf.key)) return false;
        }
        return true;
    }

    toString(): string {
        return `HashTrieSet({${Array.from(this.values(), formatValue).join(', ')}})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
