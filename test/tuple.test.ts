import { describe, it, expect } from 'vitest';
import { Tuple } from '../src/tuple';
import { hashValue } from '../src/hash';
import { UnhashableValueError } from '../src/errors';

describe('Tuple', () => {
    it('exposes its elements', () => {
        const t = new Tuple(0, 'a');
        expect(t.length).toBe(2);
        expect(t.get(0)).toBe(0);
        expect(t.get(1)).toBe('a');
        expect([...t]).toEqual([0, 'a']);
    });

    it('freezes its store', () => {
        expect(Object.isFrozen(new Tuple(1, 2).values)).toBe(true);
    });

    it('has value semantics', () => {
        expect(new Tuple(0, 'a').equals(new Tuple(0, 'a'))).toBe(true);
        expect(new Tuple(0, 'a').equals(new Tuple('a', 0))).toBe(false);
        expect(new Tuple(1).equals(new Tuple(1, 1))).toBe(false);
        expect(new Tuple(1, 2).equals([1, 2])).toBe(false);
        expect(new Tuple(new Tuple(1), [2]).equals(new Tuple(new Tuple(1), [2]))).toBe(true);
    });

    it('hashes like the sequence of its elements', () => {
        expect(new Tuple(1, 2).hashCode).toBe(3983810698);
        expect(hashValue(new Tuple(1, 2))).toBe(hashValue(new Tuple(1, 2)));
    });

    it('defers hashing until asked', () => {
        const t = new Tuple({ mutable: true });
        expect(t.length).toBe(1);
        expect(() => t.hashCode).toThrow(UnhashableValueError);
    });

    it('prints like a parenthesised sequence', () => {
        expect(new Tuple(1, 'a', [2]).toString()).toBe('(1, "a", [2])');
        expect(new Tuple().toString()).toBe('()');
    });
});
