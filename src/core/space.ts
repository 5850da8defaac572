/**
 * @module core/space
 * @description Action and observation space definitions
 *
 * Spaces describe the shape, element type and bounds of the values exchanged
 * between environments and algorithms. They are immutable plain descriptors,
 * discriminated by `kind`, built through validating factories.
 * Includes schema hash computation for checkpoint compatibility checks.
 */

import { InvalidActionError, ValidationError } from './errors';
import { canonicalJson, hashString, type SeededRandom } from './repro';

// ==================== Space Types ====================

/**
 * Discrete space - finite set of integers [0, n)
 */
export interface DiscreteSpace {
    readonly kind: 'discrete';
    /** Number of discrete values */
    readonly n: number;
    /** Optional labels for each value */
    readonly labels?: readonly string[];
}

/**
 * ArrayDiscrete space - fixed-length vector of bounded integers
 */
export interface ArrayDiscreteSpace {
    readonly kind: 'arrayDiscrete';
    readonly size: number;
    /** Per-dimension lower bound (inclusive, finite integer) */
    readonly low: readonly number[];
    /** Per-dimension upper bound (inclusive, finite integer) */
    readonly high: readonly number[];
}

/**
 * Continuous space - one real number, bounds may be infinite
 */
export interface ContinuousSpace {
    readonly kind: 'continuous';
    readonly low: number;
    readonly high: number;
}

/**
 * ArrayContinuous space - fixed-length real vector
 */
export interface ArrayContinuousSpace {
    readonly kind: 'arrayContinuous';
    readonly size: number;
    readonly low: readonly number[];
    readonly high: readonly number[];
}

/**
 * Box space - n-dimensional real tensor, stored flat in row-major order
 */
export interface BoxSpace {
    readonly kind: 'box';
    /** Shape of the tensor (e.g. [3, 3] for a board) */
    readonly shape: readonly number[];
    /** Lower bound per flat element */
    readonly low: readonly number[];
    /** Upper bound per flat element */
    readonly high: readonly number[];
}

/**
 * Union type for all spaces
 */
export type Space =
    | DiscreteSpace
    | ArrayDiscreteSpace
    | ContinuousSpace
    | ArrayContinuousSpace
    | BoxSpace;

export type SpaceKind = Space['kind'];

/** Element type tag shared by several kinds */
export type ElementType = 'discrete' | 'continuous';

/**
 * Native value of a space. Scalar kinds hold a number, the rest a flat array.
 */
export type SpaceValue = number | number[];

export type SpaceValueOf<S extends Space> =
    S extends DiscreteSpace | ContinuousSpace ? number : number[];

// ==================== Space Factories ====================

function assertSize(size: number, what: string): void {
    if (!Number.isInteger(size) || size < 1) {
        throw new ValidationError(`${what} must be a positive integer, got ${size}`, { size });
    }
}

function broadcast(bound: number | readonly number[], size: number, what: string): number[] {
    if (typeof bound === 'number') {
        return new Array<number>(size).fill(bound);
    }
    if (bound.length !== size) {
        throw new ValidationError(`${what} has ${bound.length} entries, expected ${size}`, {
            length: bound.length,
            size,
        });
    }
    return [...bound];
}

function checkBounds(low: readonly number[], high: readonly number[], integer: boolean): void {
    for (let i = 0; i < low.length; i++) {
        const lo = low[i];
        const hi = high[i];
        if (Number.isNaN(lo) || Number.isNaN(hi)) {
            throw new ValidationError(`Bound of dimension ${i} is NaN`, { dimension: i });
        }
        if (lo > hi) {
            throw new ValidationError(`low > high at dimension ${i} (${lo} > ${hi})`, {
                dimension: i,
                low: lo,
                high: hi,
            });
        }
        if (integer && !(Number.isInteger(lo) && Number.isInteger(hi))) {
            throw new ValidationError(
                `Discrete bounds must be finite integers at dimension ${i} (${lo}, ${hi})`,
                { dimension: i, low: lo, high: hi }
            );
        }
    }
}

/**
 * Create a discrete space
 */
export function discrete(n: number, labels?: readonly string[]): DiscreteSpace {
    assertSize(n, 'Discrete n');
    if (labels !== undefined && labels.length !== n) {
        throw new ValidationError(`Expected ${n} labels, got ${labels.length}`);
    }
    const space: DiscreteSpace = labels === undefined
        ? { kind: 'discrete', n }
        : { kind: 'discrete', n, labels: Object.freeze([...labels]) };
    return Object.freeze(space);
}

/**
 * Create an array-discrete space. Scalar bounds broadcast to every dimension.
 */
export function arrayDiscrete(
    size: number,
    low: number | readonly number[],
    high: number | readonly number[]
): ArrayDiscreteSpace {
    assertSize(size, 'ArrayDiscrete size');
    const lo = broadcast(low, size, 'low');
    const hi = broadcast(high, size, 'high');
    checkBounds(lo, hi, true);
    return Object.freeze({
        kind: 'arrayDiscrete',
        size,
        low: Object.freeze(lo),
        high: Object.freeze(hi),
    });
}

/**
 * Create a continuous space
 */
export function continuous(low: number = -Infinity, high: number = Infinity): ContinuousSpace {
    checkBounds([low], [high], false);
    return Object.freeze({ kind: 'continuous', low, high });
}

/**
 * Create an array-continuous space
 */
export function arrayContinuous(
    size: number,
    low: number | readonly number[] = -Infinity,
    high: number | readonly number[] = Infinity
): ArrayContinuousSpace {
    assertSize(size, 'ArrayContinuous size');
    const lo = broadcast(low, size, 'low');
    const hi = broadcast(high, size, 'high');
    checkBounds(lo, hi, false);
    return Object.freeze({
        kind: 'arrayContinuous',
        size,
        low: Object.freeze(lo),
        high: Object.freeze(hi),
    });
}

/**
 * Create a box space
 */
export function box(
    shape: readonly number[],
    low: number | readonly number[] = -Infinity,
    high: number | readonly number[] = Infinity
): BoxSpace {
    if (shape.length === 0) {
        throw new ValidationError('Box shape must have at least one dimension');
    }
    shape.forEach((d, i) => assertSize(d, `Box shape[${i}]`));
    const size = shape.reduce((a, b) => a * b, 1);
    const lo = broadcast(low, size, 'low');
    const hi = broadcast(high, size, 'high');
    checkBounds(lo, hi, false);
    return Object.freeze({
        kind: 'box',
        shape: Object.freeze([...shape]),
        low: Object.freeze(lo),
        high: Object.freeze(hi),
    });
}

// ==================== Space Properties ====================

export function getElementType(space: Space): ElementType {
    return space.kind === 'discrete' || space.kind === 'arrayDiscrete' ? 'discrete' : 'continuous';
}

export function isDiscreteSpace(space: Space): space is DiscreteSpace | ArrayDiscreteSpace {
    return getElementType(space) === 'discrete';
}

/**
 * Whether the native value is a scalar number
 */
export function isScalarSpace(space: Space): space is DiscreteSpace | ContinuousSpace {
    return space.kind === 'discrete' || space.kind === 'continuous';
}

/**
 * Number of elements in the flat representation
 */
export function getSize(space: Space): number {
    switch (space.kind) {
        case 'discrete':
        case 'continuous':
            return 1;
        case 'arrayDiscrete':
        case 'arrayContinuous':
            return space.size;
        case 'box':
            return space.low.length;
    }
}

/**
 * Per-dimension lower bounds
 */
export function getLow(space: Space): readonly number[] {
    switch (space.kind) {
        case 'discrete':
            return [0];
        case 'continuous':
            return [space.low];
        default:
            return space.low;
    }
}

/**
 * Per-dimension upper bounds (inclusive)
 */
export function getHigh(space: Space): readonly number[] {
    switch (space.kind) {
        case 'discrete':
            return [space.n - 1];
        case 'continuous':
            return [space.high];
        default:
            return space.high;
    }
}

export function isBounded(space: Space): boolean {
    return getLow(space).every(Number.isFinite) && getHigh(space).every(Number.isFinite);
}

/**
 * Per-dimension value counts of a discrete space, null for continuous kinds
 */
export function getCardinality(space: Space): number[] | null {
    if (!isDiscreteSpace(space)) {
        return null;
    }
    const low = getLow(space);
    const high = getHigh(space);
    return low.map((lo, i) => high[i] - lo + 1);
}

/**
 * Short human readable form, e.g. `Discrete(4)` or `Box([2,3])`
 */
export function describeSpace(space: Space): string {
    switch (space.kind) {
        case 'discrete':
            return `Discrete(${space.n})`;
        case 'arrayDiscrete':
            return `ArrayDiscrete(${space.size})`;
        case 'continuous':
            return `Continuous(${space.low}, ${space.high})`;
        case 'arrayContinuous':
            return `ArrayContinuous(${space.size})`;
        case 'box':
            return `Box([${space.shape.join(',')}])`;
    }
}

// ==================== Flat Representation ====================

/**
 * Flatten a native value to a number array (scalars become [v])
 */
export function toFlat(value: SpaceValue): number[] {
    return typeof value === 'number' ? [value] : [...value];
}

/**
 * Shape a flat array back into the native value of the space
 */
export function fromFlat(space: Space, flat: readonly number[]): SpaceValue {
    return isScalarSpace(space) ? flat[0] : [...flat];
}

// ==================== Space Operations ====================

function sampleDimension(rng: SeededRandom, low: number, high: number): number {
    const loFinite = Number.isFinite(low);
    const hiFinite = Number.isFinite(high);
    if (loFinite && hiFinite) {
        return rng.uniform(low, high);
    }
    if (loFinite) {
        return low + Math.abs(rng.normal());
    }
    if (hiFinite) {
        return high - Math.abs(rng.normal());
    }
    return rng.normal();
}

/**
 * Sample a random value from a space
 *
 * Bounded dimensions are sampled uniformly; unbounded ones from a (half)
 * normal distribution. For Discrete spaces `invalidActions` are excluded.
 */
export function sample(space: Space, rng: SeededRandom, invalidActions: readonly number[] = []): SpaceValue {
    switch (space.kind) {
        case 'discrete': {
            if (invalidActions.length === 0) {
                return rng.randint(0, space.n);
            }
            const invalid = new Set(invalidActions);
            const valid: number[] = [];
            for (let a = 0; a < space.n; a++) {
                if (!invalid.has(a)) valid.push(a);
            }
            if (valid.length === 0) {
                throw new InvalidActionError('Every action is invalid; nothing to sample', -1, {
                    invalidActions: [...invalidActions],
                });
            }
            return rng.choice(valid);
        }

        case 'arrayDiscrete':
            return space.low.map((lo, i) => rng.randint(lo, space.high[i] + 1));

        case 'continuous':
            return sampleDimension(rng, space.low, space.high);

        case 'arrayContinuous':
        case 'box':
            return space.low.map((lo, i) => sampleDimension(rng, lo, space.high[i]));
    }
}

function inBounds(v: unknown, lo: number, hi: number, integer: boolean): boolean {
    return (
        typeof v === 'number' &&
        !Number.isNaN(v) &&
        (!integer || Number.isInteger(v)) &&
        v >= lo &&
        v <= hi
    );
}

/**
 * Check if a value is contained within a space
 */
export function contains(space: Space, value: unknown): value is SpaceValue {
    switch (space.kind) {
        case 'discrete':
            return inBounds(value, 0, space.n - 1, true);

        case 'continuous':
            return inBounds(value, space.low, space.high, false);

        case 'arrayDiscrete':
        case 'arrayContinuous':
        case 'box': {
            if (!Array.isArray(value) || value.length !== space.low.length) return false;
            const integer = space.kind === 'arrayDiscrete';
            return value.every((v: unknown, i) => inBounds(v, space.low[i], space.high[i], integer));
        }
    }
}

// ==================== Schema ====================

/**
 * Serialize a space to a canonical JSON string (for schema hash)
 */
export function serializeSpace(space: Space): string {
    return canonicalJson(space);
}

/**
 * Compute schema hash for action and observation spaces.
 * Used as the compatibility context of environment backups.
 */
export function computeSchemaHash(actionSpace: Space, observationSpace: Space): string {
    return hashString(
        canonicalJson({
            action: serializeSpace(actionSpace),
            observation: serializeSpace(observationSpace),
        })
    );
}
