import type { Hasher } from '../src/hash';

/**
 * Creates a deterministic pseudo-random number generator (Mulberry32).
 * Keeps the property-style tests reproducible.
 * @returns A function returning a number between 0 and 1.
 */
export function createRNG(seed: number): () => number {
    return function () {
        let t = seed += 0x6D2B79F5;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Fisher-Yates shuffle into a new array. */
export function shuffled<T>(items: readonly T[], random: () => number): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
}

export function range(n: number): number[] {
    return Array.from({ length: n }, (_, i) => i);
}

/** Every key hashes to the same value, forcing the collision-bucket path. */
export const collidingHasher: Hasher<string> = {
    hash: () => 0x2a,
    equals: (a, b) => a === b,
};

/** Hashes strings by their length only: partial collisions across several levels. */
export const lengthHasher: Hasher<string> = {
    hash: (key) => key.length,
    equals: (a, b) => a === b,
};

/** Uses the number itself as its hash, fractions and out-of-range values included. */
export const identityHasher: Hasher<number> = {
    hash: (key) => key,
    equals: (a, b) => a === b,
};
