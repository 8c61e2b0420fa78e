/**
 * @module list
 * @description
 * Singly-linked persistent list (cons cells).
 * * Architecture:
 * - A `List` object is itself a cell: `rest` hands back the stored tail, no copying or allocation.
 * - Length is stored per cell, so `length` is O(1).
 * - Cells are never mutated after construction; every version shares its tail with its parent.
 */

import { EmptyCollectionError } from './errors';
import { areEqual, hashSequence, type Hashable } from './hash';
import { formatValue } from './format';

interface Cell<T> {
    readonly head: T;
    readonly tail: List<T>;
}

export class List<T> implements Hashable, Iterable<T> {
    readonly #cell: Cell<T> | null;
    readonly #length: number;
    #hashCode: number | null = null;

    private constructor(cell: Cell<T> | null, length: number) {
        this.#cell = cell;
        this.#length = length;
    }

    /** Creates an empty List. */
    static empty<T>(): List<T> { return new List<T>(null, 0); }

    /**
     * Builds a list by folding `pushFront` over the input in reverse, so the order matches the input.
     * @complexity O(n)
     */
    static from<T>(iterable: Iterable<T> = []): List<T> {
        const items = Array.from(iterable);
        let list = List.empty<T>();
        for (let i = items.length - 1; i >= 0; i--) list = list.pushFront(items[i]);
        return list;
    }

    static of<T>(...items: T[]): List<T> { return List.from(items); }

    get length(): number { return this.#length; }
    isEmpty(): boolean { return this.#cell === null; }

    /** @throws EmptyCollectionError on the empty list. */
    get first(): T {
        if (this.#cell === null) throw new EmptyCollectionError('take the first element of', 'List');
        return this.#cell.head;
    }

    /**
     * The tail of the list. Shared, not copied.
     * @throws EmptyCollectionError on the empty list.
     */
    get rest(): List<T> {
        if (this.#cell === null) throw new EmptyCollectionError('take the rest of', 'List');
        return this.#cell.tail;
    }

    /** @complexity O(1). The receiver is unaffected. */
    pushFront(value: T): List<T> {
        return new List<T>({ head: value, tail: this }, this.#length + 1);
    }

    reverse(): List<T> {
        let reversed = List.empty<T>();
        for (const v of this) reversed = reversed.pushFront(v);
        return reversed;
    }

    *[Symbol.iterator](): Iterator<T> {
        let cell = this.#cell;
        while (cell !== null) {
            yield cell.head;
            cell = cell.tail.#cell;
        }
    }

    /** Order-sensitive, cached after the first call. */
    get hashCode(): number {
        if (this.#hashCode === null) this.#hashCode = hashSequence(this);
        return this.#hashCode;
    }

    /**
     * Two lists are equal iff they have the same length and pairwise-equal elements in order.
     * @complexity O(n), O(1) once both walks reach a shared tail.
     */
    equals(other: unknown): boolean {
        if (!(other instanceof List)) return false;
        if (this.#length !== other.#length) return false;
        let a: List<unknown> = this;
        let b: List<unknown> = other;
        while (a !== b && a.#cell !== null && b.#cell !== null) {
            if (!areEqual(a.#cell.head, b.#cell.head)) return false;
            a = a.#cell.tail;
            b = b.#cell.tail;
        }
        return true;
    }

    toString(): string {
        return `List([${Array.from(this, formatValue).join(', ')}])`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
