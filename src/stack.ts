import { EmptyCollectionError } from './errors';
import type { Hashable } from './hash';
import { formatValue } from './format';
import { List } from './list';

/**
 * LIFO view over a persistent List: the top of the stack is the head of the list.
 * `push` and `pop` are O(1) and share everything below the top with the receiver.
 */
export class Stack<T> implements Hashable, Iterable<T> {
    readonly #items: List<T>;

    private constructor(items: List<T>) {
        this.#items = items;
    }

    static empty<T>(): Stack<T> { return new Stack(List.empty<T>()); }

    /** Pushes the items in order; the last one ends up on top. */
    static from<T>(iterable: Iterable<T> = []): Stack<T> {
        let items = List.empty<T>();
        for (const v of iterable) items = items.pushFront(v);
        return new Stack(items);
    }

    static of<T>(...items: T[]): Stack<T> { return Stack.from(items); }

    get size(): number { return this.#items.length; }
    isEmpty(): boolean { return this.#items.isEmpty(); }

    push(value: T): Stack<T> { return new Stack(this.#items.pushFront(value)); }

    /** @throws EmptyCollectionError on the empty stack. */
    peek(): T {
        if (this.#items.isEmpty()) throw new EmptyCollectionError('peek', 'Stack');
        return this.#items.first;
    }

    /** @throws EmptyCollectionError on the empty stack. */
    pop(): Stack<T> {
        if (this.#items.isEmpty()) throw new EmptyCollectionError('pop', 'Stack');
        return new Stack(this.#items.rest);
    }

    /** Top to bottom. */
    [Symbol.iterator](): Iterator<T> { return this.#items[Symbol.iterator](); }

    get hashCode(): number { return this.#items.hashCode; }

    equals(other: unknown): boolean {
        return other instanceof Stack && this.#items.equals(other.#items);
    }

    /** Lists bottom to top, the order the stack was built from. */
    toString(): string {
        return `Stack([${Array.from(this.#items.reverse(), formatValue).join(', ')}])`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
