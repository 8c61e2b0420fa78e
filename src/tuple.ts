import { areEqual, hashSequence, type Hashable } from './hash';
import { formatValue } from './format';

/**
 * An immutable, fixed-length sequence of values.
 * Useful as a composite key in maps or as an element of sets.
 * @template T The type of the tuple elements array.
 */
export class Tuple<T extends readonly unknown[]> implements Hashable, Iterable<T[number]> {
    readonly #elements: T;
    #hashCode: number | null = null;

    /**
     * Freezes the internal store.
     * The hash is computed on first use, so a Tuple of unhashable values can exist but not be hashed.
     */
    constructor(...elements: T) {
        Object.freeze(elements);
        this.#elements = elements;
    }

    get length(): number { return this.#elements.length; }
    get values(): T { return this.#elements; }

    get hashCode(): number {
        if (this.#hashCode === null) this.#hashCode = hashSequence(this.#elements);
        return this.#hashCode;
    }

    /** Returns the element at the specified index. */
    get<I extends number>(index: I): T[I] { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        const theirs: readonly unknown[] = other.values;
        if (this.length !== theirs.length) return false;
        for (let i = 0; i < this.length; i++) {
            if (!areEqual(this.#elements[i], theirs[i])) return false;
        }
        return true;
    }

    *[Symbol.iterator](): Iterator<T[number]> {
        for (let i = 0; i < this.#elements.length; i++) yield this.#elements[i];
    }

    toString(): string {
        return `(${this.#elements.map(formatValue).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
