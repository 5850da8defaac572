/**
 * Core Space Module Tests
 * Space factories, membership, sampling and schema hashing
 */

import { describe, it, expect } from 'vitest';
import {
    discrete,
    arrayDiscrete,
    continuous,
    arrayContinuous,
    box,
    getElementType,
    getSize,
    getLow,
    getHigh,
    isBounded,
    getCardinality,
    describeSpace,
    toFlat,
    fromFlat,
    sample,
    contains,
    computeSchemaHash,
    createRng,
    SeededRandom,
    InvalidActionError,
    ValidationError,
} from '../src/core';

// ==================== Space Factories ====================

describe('Space Factories', () => {
    describe('discrete', () => {
        it('should create a frozen discrete space', () => {
            const space = discrete(4, ['up', 'right', 'down', 'left']);
            expect(space.kind).toBe('discrete');
            expect(space.n).toBe(4);
            expect(space.labels).toEqual(['up', 'right', 'down', 'left']);
            expect(Object.isFrozen(space)).toBe(true);
        });

        it('should reject non-positive n and mismatched labels', () => {
            expect(() => discrete(0)).toThrow(ValidationError);
            expect(() => discrete(2.5)).toThrow(ValidationError);
            expect(() => discrete(3, ['a', 'b'])).toThrow(ValidationError);
        });
    });

    describe('arrayDiscrete', () => {
        it('should broadcast scalar bounds', () => {
            const space = arrayDiscrete(3, 0, 2);
            expect(space.low).toEqual([0, 0, 0]);
            expect(space.high).toEqual([2, 2, 2]);
        });

        it('should require finite integer bounds', () => {
            expect(() => arrayDiscrete(2, 0, 1.5)).toThrow(ValidationError);
            expect(() => arrayDiscrete(2, 0, Infinity)).toThrow(ValidationError);
            expect(() => arrayDiscrete(2, [0, 3], [1, 2])).toThrow(ValidationError);
            expect(() => arrayDiscrete(2, [0, 0, 0], 1)).toThrow(ValidationError);
        });
    });

    describe('continuous kinds', () => {
        it('should default to unbounded', () => {
            const space = continuous();
            expect(space.low).toBe(-Infinity);
            expect(space.high).toBe(Infinity);
            expect(isBounded(space)).toBe(false);
        });

        it('should reject NaN and inverted bounds', () => {
            expect(() => continuous(NaN, 1)).toThrow(ValidationError);
            expect(() => arrayContinuous(2, 1, 0)).toThrow(ValidationError);
        });

        it('should flatten box shapes', () => {
            const space = box([2, 3], 0, 1);
            expect(getSize(space)).toBe(6);
            expect(space.low).toHaveLength(6);
            expect(describeSpace(space)).toBe('Box([2,3])');
            expect(() => box([])).toThrow(ValidationError);
            expect(() => box([2, 0])).toThrow(ValidationError);
        });
    });
});

// ==================== Properties ====================

describe('Space Properties', () => {
    it('should report element type, bounds and cardinality', () => {
        const grid = arrayDiscrete(2, [0, 0], [3, 2]);
        expect(getElementType(grid)).toBe('discrete');
        expect(getCardinality(grid)).toEqual([4, 3]);
        expect(getCardinality(discrete(5))).toEqual([5]);
        expect(getCardinality(box([2], -1, 1))).toBeNull();

        expect(getLow(discrete(5))).toEqual([0]);
        expect(getHigh(discrete(5))).toEqual([4]);
        expect(getLow(continuous(-2, 3))).toEqual([-2]);
        expect(getElementType(continuous())).toBe('continuous');
    });

    it('should describe every kind', () => {
        expect(describeSpace(discrete(4))).toBe('Discrete(4)');
        expect(describeSpace(arrayDiscrete(2, 0, 1))).toBe('ArrayDiscrete(2)');
        expect(describeSpace(continuous(0, 1))).toBe('Continuous(0, 1)');
        expect(describeSpace(arrayContinuous(3))).toBe('ArrayContinuous(3)');
    });

    it('should convert between native and flat values', () => {
        expect(toFlat(3)).toEqual([3]);
        expect(toFlat([1, 2])).toEqual([1, 2]);
        expect(fromFlat(discrete(4), [2])).toBe(2);
        expect(fromFlat(arrayDiscrete(2, 0, 3), [1, 2])).toEqual([1, 2]);
    });
});

// ==================== Membership ====================

describe('contains', () => {
    it('should check discrete values', () => {
        const space = discrete(4);
        expect(contains(space, 0)).toBe(true);
        expect(contains(space, 3)).toBe(true);
        expect(contains(space, 4)).toBe(false);
        expect(contains(space, -1)).toBe(false);
        expect(contains(space, 1.5)).toBe(false);
        expect(contains(space, '1')).toBe(false);
    });

    it('should check array values element-wise', () => {
        const space = arrayDiscrete(2, [0, 0], [3, 2]);
        expect(contains(space, [3, 2])).toBe(true);
        expect(contains(space, [3, 3])).toBe(false);
        expect(contains(space, [1])).toBe(false);
        expect(contains(space, 1)).toBe(false);

        const board = box([2, 2], -1, 1);
        expect(contains(board, [0, 0.5, 1, -1])).toBe(true);
        expect(contains(board, [0, 0, 0, NaN])).toBe(false);
        expect(contains(arrayContinuous(1), [1e12])).toBe(true);
    });
});

// ==================== Sampling ====================

describe('sample', () => {
    it('should be deterministic for a seed', () => {
        const space = box([3], -1, 1);
        expect(sample(space, createRng(7))).toEqual(sample(space, createRng(7)));
    });

    it('should always produce contained values', () => {
        const rng = new SeededRandom(3);
        const spaces = [discrete(5), arrayDiscrete(3, [-2, 0, 1], [2, 0, 4]), continuous(0, Infinity), box([2], -1, 1)];
        for (const space of spaces) {
            for (let i = 0; i < 50; i++) {
                expect(contains(space, sample(space, rng))).toBe(true);
            }
        }
    });

    it('should exclude invalid discrete actions', () => {
        const rng = createRng(11);
        for (let i = 0; i < 20; i++) {
            expect(sample(discrete(4), rng, [0, 1, 2])).toBe(3);
        }
        expect(() => sample(discrete(2), rng, [0, 1])).toThrow(InvalidActionError);
    });
});

// ==================== Schema Hash ====================

describe('computeSchemaHash', () => {
    it('should be stable and sensitive to every bound', () => {
        const a = computeSchemaHash(discrete(4), arrayDiscrete(2, 0, 3));
        expect(a).toHaveLength(32);
        expect(computeSchemaHash(discrete(4), arrayDiscrete(2, 0, 3))).toBe(a);
        expect(computeSchemaHash(discrete(5), arrayDiscrete(2, 0, 3))).not.toBe(a);
        expect(computeSchemaHash(discrete(4), arrayDiscrete(2, 0, 4))).not.toBe(a);
    });

    it('should distinguish infinite bounds', () => {
        expect(computeSchemaHash(discrete(2), continuous(0, Infinity)))
            .not.toBe(computeSchemaHash(discrete(2), continuous(0, 1e308)));
    });
});
