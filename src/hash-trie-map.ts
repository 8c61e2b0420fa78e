/**
 * @module hash-trie-map
 * Persistent associative container over the hash-trie engine.
 */

import { KeyNotFoundError } from './errors';
import { areEqual, defaultHasher, hashValue, type Hashable, type Hasher } from './hash';
import { formatValue } from './format';
import { insert, leaves, lookup, NOT_FOUND, remove, type Trie } from './trie';

/** Per-instance configuration. Derived versions inherit it. */
export interface HashTrieOptions<K> {
    /** Replaces the value-semantic default (`hashValue` + `areEqual`). */
    readonly hasher?: Hasher<K>;
}

/**
 * An immutable hash map with structural sharing.
 *
 * Every update returns a new map that shares all untouched subtrees with the receiver;
 * updates that change nothing return the receiver itself.
 * Iteration order is unspecified but stable for a given version.
 *
 * @template K Key type; must be hashable by the configured hasher.
 * @template V Value type.
 */
export class HashTrieMap<K, V> implements Hashable, Iterable<[K, V]> {
    readonly #root: Trie<K, V>;
    readonly #size: number;
    readonly #hasher: Hasher<K>;
    #hashCode: number | null = null;

    private constructor(root: Trie<K, V>, size: number, hasher: Hasher<K>) {
        this.#root = root;
        this.#size = size;
        this.#hasher = hasher;
    }

    static empty<K, V>(options: HashTrieOptions<K> = {}): HashTrieMap<K, V> {
        return new HashTrieMap<K, V>(null, 0, options.hasher ?? defaultHasher);
    }

    /**
     * Builds a map by repeated insertion. Later pairs win over earlier ones with an equal key.
     * Accepts arrays of pairs, native Maps and other HashTrieMaps.
     */
    static from<K, V>(entries: Iterable<readonly [K, V]>, options: HashTrieOptions<K> = {}): HashTrieMap<K, V> {
        return HashTrieMap.empty<K, V>(options).update(entries);
    }

    /** Builds a map from the own enumerable string-keyed properties of a plain object. */
    static fromRecord<V>(record: Readonly<Record<string, V>>, options: HashTrieOptions<string> = {}): HashTrieMap<string, V> {
        return HashTrieMap.from(Object.entries(record), options);
    }

    /** Maps every key to the same value. */
    static fromKeys<K, V>(keys: Iterable<K>, value: V, options: HashTrieOptions<K> = {}): HashTrieMap<K, V> {
        let map = HashTrieMap.empty<K, V>(options);
        for (const key of keys) map = map.insert(key, value);
        return map;
    }

    /** The hasher's result as an unsigned 32-bit integer, the only form the trie splits on. */
    #hash(key: K): number {
        return this.#hasher.hash(key) >>> 0;
    }

    #derive(root: Trie<K, V>, size: number): HashTrieMap<K, V> {
        return root === this.#root ? this : new HashTrieMap(root, size, this.#hasher);
    }

    get size(): number { return this.#size; }
    isEmpty(): boolean { return this.#size === 0; }

    has(key: K): boolean {
        return lookup(this.#root, this.#hash(key), key, this.#hasher) !== undefined;
    }

    /** Returns the value for `key`, or `undefined` if absent. */
    get(key: K): V | undefined {
        return lookup(this.#root, this.#hash(key), key, this.#hasher)?.value;
    }

    getOr<F>(key: K, fallback: F): V | F {
        const found = lookup(this.#root, this.#hash(key), key, this.#hasher);
        return found === undefined ? fallback : found.value;
    }

    /** @throws KeyNotFoundError if `key` is absent. */
    getOrThrow(key: K): V {
        const found = lookup(this.#root, this.#hash(key), key, this.#hasher);
        if (found === undefined) throw new KeyNotFoundError(key);
        return found.value;
    }

    /**
     * Associates `value` with `key` in a new map.
     * @complexity O(log32 n) new nodes.
     */
    insert(key: K, value: V): HashTrieMap<K, V> {
        const res = insert(this.#root, 0, this.#hash(key), key, value, this.#hasher);
        return this.#derive(res.node, res.added ? this.#size + 1 : this.#size);
    }

    /** @throws KeyNotFoundError if `key` is absent. */
    remove(key: K): HashTrieMap<K, V> {
        const root = remove(this.#root, 0, this.#hash(key), key, this.#hasher);
        if (root === NOT_FOUND) throw new KeyNotFoundError(key);
        return this.#derive(root, this.#size - 1);
    }

    /** Like `remove`, but returns the receiver when `key` is absent. */
    discard(key: K): HashTrieMap<K, V> {
        const root = remove(this.#root, 0, this.#hash(key), key, this.#hasher);
        return root === NOT_FOUND ? this : this.#derive(root, this.#size - 1);
    }

    /** Inserts every pair in order. */
    update(entries: Iterable<readonly [K, V]>): HashTrieMap<K, V> {
        let root = this.#root;
        let size = this.#size;
        for (const [key, value] of entries) {
            const res = insert(root, 0, this.#hash(key), key, value, this.#hasher);
            root = res.node;
            if (res.added) size++;
        }
        return this.#derive(root, size);
    }

    *entries(): IterableIterator<[K, V]> {
        for (const leaf of leaves(this.#root)) yield [leaf.key, leaf.value];
    }

    *keys(): IterableIterator<K> {
        for (const leaf of leaves(this.#root)) yield leaf.key;
    }

    *values(): IterableIterator<V> {
        for (const leaf of leaves(this.#root)) yield leaf.value;
    }

    [Symbol.iterator](): IterableIterator<[K, V]> { return this.entries(); }

    forEach(fn: (value: V, key: K, map: this) => void): void {
        for (const leaf of leaves(this.#root)) fn(leaf.value, leaf.key, this);
    }

    /**
     * Order-independent combination of entry hashes (XOR), cached after the first call.
     * @throws UnhashableValueError if a value cannot be hashed.
     */
    get hashCode(): number {
        if (this.#hashCode !== null) return this.#hashCode;
        let h = 0;
        for (const leaf of leaves(this.#root)) {
            h ^= Math.imul(leaf.hash, 31) ^ hashValue(leaf.value);
        }
        this.#hashCode = h >>> 0;
        return this.#hashCode;
    }

    /**
     * Two maps are equal iff they hold the same keys with pairwise-equal values,
     * independent of their internal layout. Non-empty maps over different hashers
     * never compare equal: their hash codes come from different key hashes.
     */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof HashTrieMap)) return false;
        if (this.#size !== other.#size) return false;
        if (this.#root === other.#root) return true;
        if (this.#hasher !== other.#hasher) return false;
        for (const leaf of leaves(this.#root)) {
            const theirs = lookup(other.#root, leaf.hash, leaf.key, this.#hasher);
            if (theirs === undefined || !areEqual(leaf.value, theirs.value)) return false;
        }
        return true;
    }

    toString(): string {
        const body = Array.from(this.entries(), ([k, v]) => `${formatValue(k)}: ${formatValue(v)}`);
        return `HashTrieMap({${body.join(', ')}})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
