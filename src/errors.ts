/**
 * @module errors
 * Typed failures raised by the collections. Each class sets `name` so callers
 * can match on it as well as on `instanceof`.
 */

import { formatValue } from './format';

/**
 * Thrown by `remove` and `getOrThrow` when the key is absent.
 */
export class KeyNotFoundError<K = unknown> extends Error {
    readonly key: K;

    constructor(key: K) {
        super(`Key not found: ${formatValue(key)}`);
        this.name = 'KeyNotFoundError';
        this.key = key;
    }
}

/**
 * Thrown when the head or tail of an empty List (or the top of an empty Stack) is read.
 */
export class EmptyCollectionError extends RangeError {
    readonly operation: string;

    constructor(operation: string, collection: string) {
        super(`Cannot ${operation} an empty ${collection}`);
        this.name = 'EmptyCollectionError';
        this.operation = operation;
    }
}

/** Thrown by the hashing adapter for values without a stable hash. */
export class UnhashableValueError extends TypeError {
    readonly value: unknown;

    constructor(value: unknown) {
        super(`Unhashable type: '${describeType(value)}'. Use a primitive, an array, a Tuple or a collection.`);
        this.name = 'UnhashableValueError';
        this.value = value;
    }
}

function describeType(value: unknown): string {
    if (typeof value !== 'object' || value === null) return typeof value;
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}
