/**
 * @module trie
 * @description
 * Hash array mapped trie shared by HashTrieMap and HashTrieSet.
 * * Architecture:
 * - Each level consumes 5 bits of a 32-bit hash, so a path is at most 7 branches deep.
 * - Branches store only occupied slots: a 32-bit bitmap plus a dense child array.
 * - Keys whose full hashes coincide live together in a collision bucket.
 * - Updates copy the root-to-change path only; every other subtree is shared.
 * - Removal collapses branches left holding a single leaf or bucket, so the shape
 *   depends on the current key set alone, never on the order of updates.
 */

import type { Hasher } from './hash';

// ============================================================================
// 1. NODE TYPES
// ============================================================================

export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS;
export const MAX_DEPTH = Math.ceil(32 / BITS);
const MASK = BRANCH_FACTOR - 1;

export interface Leaf<K, V> {
    readonly kind: 'leaf';
    readonly hash: number;
    readonly key: K;
    readonly value: V;
}

/** Two or more leaves sharing one full hash. */
export interface Collision<K, V> {
    readonly kind: 'collision';
    readonly hash: number;
    readonly entries: ReadonlyArray<Leaf<K, V>>;
}

export interface Branch<K, V> {
    readonly kind: 'branch';
    readonly bitmap: number;
    readonly children: ReadonlyArray<TrieNode<K, V>>;
}

export type TrieNode<K, V> = Leaf<K, V> | Collision<K, V> | Branch<K, V>;

/** A root or a child slot; `null` is the empty trie. */
export type Trie<K, V> = TrieNode<K, V> | null;

export interface Insertion<K, V> {
    readonly node: TrieNode<K, V>;
    /** False when an existing key was updated (or left untouched). */
    readonly added: boolean;
}

/** Returned by `remove` when the key is absent; nothing is allocated in that case. */
export const NOT_FOUND: unique symbol = Symbol('not-found');

// ============================================================================
// 2. BIT HELPERS
// ============================================================================

/** Hamming weight of a 32-bit integer. */
export function popcount(x: number): number {
    x = x - ((x >>> 1) & 0x55555555);
    x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
    x = (x + (x >>> 4)) & 0x0f0f0f0f;
    return Math.imul(x, 0x01010101) >>> 24;
}

function fragment(hash: number, shift: number): number {
    return (hash >>> shift) & MASK;
}

/** Position of the child for `bit` inside the dense children array. */
function slotIndex(bitmap: number, bit: number): number {
    return popcount(bitmap & (bit - 1));
}

function leaf<K, V>(hash: number, key: K, value: V): Leaf<K, V> {
    return { kind: 'leaf', hash, key, value };
}

function branch<K, V>(bitmap: number, children: ReadonlyArray<TrieNode<K, V>>): Branch<K, V> {
    return { kind: 'branch', bitmap, children };
}

function findEntry<K, V>(bucket: Collision<K, V>, key: K, hasher: Hasher<K>): number {
    const entries = bucket.entries;
    for (let i = 0; i < entries.length; i++) {
        if (hasher.equals(entries[i].key, key)) return i;
    }
    return -1;
}

// ============================================================================
// 3. LOOKUP
// ============================================================================

/**
 * Finds the leaf holding `key`.
 * @complexity O(log32 n); linear in the bucket size on a full-hash collision.
 */
export function lookup<K, V>(root: Trie<K, V>, hash: number, key: K, hasher: Hasher<K>): Leaf<K, V> | undefined {
    let node = root;
    let shift = 0;
    while (node !== null) {
        switch (node.kind) {
            case 'leaf':
                return node.hash === hash && hasher.equals(node.key, key) ? node : undefined;
            case 'collision': {
                if (node.hash !== hash) return undefined;
                const idx = findEntry(node, key, hasher);
                return idx < 0 ? undefined : node.entries[idx];
            }
            case 'branch': {
                const bit = 1 << fragment(hash, shift);
                if ((node.bitmap & bit) === 0) return undefined;
                node = node.children[slotIndex(node.bitmap, bit)];
                shift += BITS;
                break;
            }
        }
    }
    return undefined;
}

// ============================================================================
// 4. INSERT
// ============================================================================

/**
 * Pushes two hash-distinct nodes down until their fragments differ.
 * Produces one single-child branch per level where the fragments coincide.
 * Hashes equal in all 32 bits end up in one bucket.
 */
function merge<K, V>(a: Leaf<K, V> | Collision<K, V>, b: Leaf<K, V>, shift: number): Branch<K, V> | Collision<K, V> {
    if (shift >= 32) {
        const entries = a.kind === 'leaf' ? [a, b] : [...a.entries, b];
        return { kind: 'collision', hash: a.hash, entries };
    }
    const fa = fragment(a.hash, shift);
    const fb = fragment(b.hash, shift);
    if (fa === fb) return branch(1 << fa, [merge(a, b, shift + BITS)]);
    return branch((1 << fa) | (1 << fb), fa < fb ? [a, b] : [b, a]);
}

/**
 * Inserts or replaces `key`. Returns the receiver itself when the key already maps to `value`.
 * `hash` must be an unsigned 32-bit integer; the collections normalize it before calling in.
 * @complexity O(log32 n) new nodes; all other subtrees are shared with `node`.
 */
export function insert<K, V>(
    node: Trie<K, V>,
    shift: number,
    hash: number,
    key: K,
    value: V,
    hasher: Hasher<K>
): Insertion<K, V> {
    if (node === null) return { node: leaf(hash, key, value), added: true };

    switch (node.kind) {
        case 'leaf': {
            if (node.hash === hash && hasher.equals(node.key, key)) {
                if (node.value === value) return { node, added: false };
                return { node: leaf(hash, key, value), added: false };
            }
            if (node.hash === hash) {
                return { node: { kind: 'collision', hash, entries: [node, leaf(hash, key, value)] }, added: true };
            }
            return { node: merge(node, leaf(hash, key, value), shift), added: true };
        }

        case 'collision': {
            if (node.hash !== hash) return { node: merge(node, leaf(hash, key, value), shift), added: true };
            const idx = findEntry(node, key, hasher);
            const entries = node.entries.slice();
            if (idx < 0) {
                entries.push(leaf(hash, key, value));
                return { node: { kind: 'collision', hash, entries }, added: true };
            }
            if (entries[idx].value === value) return { node, added: false };
            entries[idx] = leaf(hash, key, value);
            return { node: { kind: 'collision', hash, entries }, added: false };
        }

        case 'branch': {
            const bit = 1 << fragment(hash, shift);
            const idx = slotIndex(node.bitmap, bit);

            // 1. Free slot -> place the leaf here
            if ((node.bitmap & bit) === 0) {
                const children = node.children.slice();
                children.splice(idx, 0, leaf(hash, key, value));
                return { node: branch(node.bitmap | bit, children), added: true };
            }

            // 2. Occupied slot -> descend and copy this level only if the child changed
            const child = node.children[idx];
            const res = insert(child, shift + BITS, hash, key, value, hasher);
            if (res.node === child) return { node, added: false };
            const children = node.children.slice();
            children[idx] = res.node;
            return { node: branch(node.bitmap, children), added: res.added };
        }
    }
}

// ============================================================================
// 5. REMOVE
// ============================================================================

/**
 * Removes `key`, collapsing any branch left with a single leaf or bucket child.
 * @returns The new subtree (`null` once empty), or `NOT_FOUND` if the key is absent.
 */
export function remove<K, V>(
    node: Trie<K, V>,
    shift: number,
    hash: number,
    key: K,
    hasher: Hasher<K>
): Trie<K, V> | typeof NOT_FOUND {
    if (node === null) return NOT_FOUND;

    switch (node.kind) {
        case 'leaf':
            return node.hash === hash && hasher.equals(node.key, key) ? null : NOT_FOUND;

        case 'collision': {
            if (node.hash !== hash) return NOT_FOUND;
            const idx = findEntry(node, key, hasher);
            if (idx < 0) return NOT_FOUND;
            if (node.entries.length === 2) return node.entries[1 - idx];
            const entries = node.entries.slice();
            entries.splice(idx, 1);
            return { kind: 'collision', hash, entries };
        }

        case 'branch': {
            const bit = 1 << fragment(hash, shift);
            if ((node.bitmap & bit) === 0) return NOT_FOUND;

            const idx = slotIndex(node.bitmap, bit);
            const res = remove(node.children[idx], shift + BITS, hash, key, hasher);
            if (res === NOT_FOUND) return NOT_FOUND;

            if (res === null) {
                if (node.children.length === 1) return null;
                const children = node.children.slice();
                children.splice(idx, 1);
                if (children.length === 1 && children[0].kind !== 'branch') return children[0];
                return branch(node.bitmap ^ bit, children);
            }

            // A lone leaf or bucket has no siblings to be told apart from: pull it up.
            if (node.children.length === 1 && res.kind !== 'branch') return res;
            const children = node.children.slice();
            children[idx] = res;
            return branch(node.bitmap, children);
        }
    }
}

// ============================================================================
// 6. TRAVERSAL
// ============================================================================

/**
 * Lazy depth-first walk over every leaf.
 * The order is unspecified but identical for every walk of the same root.
 */
export function* leaves<K, V>(root: Trie<K, V>): Generator<Leaf<K, V>, void, undefined> {
    if (root === null) return;
    const stack: TrieNode<K, V>[] = [root];
    let node: TrieNode<K, V> | undefined;
    while ((node = stack.pop()) !== undefined) {
        switch (node.kind) {
            case 'leaf':
                yield node;
                break;
            case 'collision':
                yield* node.entries;
                break;
            case 'branch':
                for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
                break;
        }
    }
}

/** Depth of the deepest node; an empty trie has depth 0, a lone leaf depth 1. */
export function depth<K, V>(root: Trie<K, V>): number {
    if (root === null) return 0;
    if (root.kind !== 'branch') return 1;
    let deepest = 0;
    for (const child of root.children) deepest = Math.max(deepest, depth(child));
    return deepest + 1;
}
