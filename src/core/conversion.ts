/**
 * @module core/conversion
 * @description Lossless/lossy conversion between discrete and continuous views of a space
 *
 * Discrete spaces convert exactly. Continuous spaces are quantized by bounded
 * linear binning and decoded to bin midpoints, so
 * `fromDiscrete(toDiscrete(v))` lies within half a bin of `v` and
 * `toDiscrete(fromDiscrete(idx))` returns `idx`.
 */

import {
    ShapeMismatchError,
    TypeIncompatibilityError,
    UnboundedConversionError,
    ValidationError,
} from './errors';
import {
    describeSpace,
    fromFlat,
    getCardinality,
    getHigh,
    getLow,
    getSize,
    isDiscreteSpace,
    toFlat,
    type Space,
    type SpaceValue,
} from './space';

/** Bin count used when none is given */
export const DEFAULT_BINS = 10;

/** Number of bins, either shared by all dimensions or per dimension */
export type BinSpec = number | readonly number[];

// ==================== Helpers ====================

function flatOf(space: Space, value: SpaceValue): number[] {
    const flat = toFlat(value);
    const size = getSize(space);
    if (flat.length !== size) {
        throw new ShapeMismatchError(size, flat.length, describeSpace(space));
    }
    return flat;
}

function binsAt(bins: BinSpec, dimension: number, size: number): number {
    if (typeof bins !== 'number' && bins.length !== size) {
        throw new ShapeMismatchError(size, bins.length, 'bins');
    }
    const b = typeof bins === 'number' ? bins : bins[dimension];
    if (!Number.isInteger(b) || b < 1) {
        throw new ValidationError(`Bin count must be a positive integer, got ${b}`, { dimension });
    }
    return b;
}

function clamp(v: number, lo: number, hi: number): number {
    return Math.min(hi, Math.max(lo, v));
}

/**
 * Throw UnboundedConversionError on the first dimension with an infinite bound
 */
export function assertBounded(space: Space): void {
    const low = getLow(space);
    const high = getHigh(space);
    for (let i = 0; i < low.length; i++) {
        if (!Number.isFinite(low[i]) || !Number.isFinite(high[i])) {
            throw new UnboundedConversionError(i, low[i], high[i]);
        }
    }
}

// ==================== Discrete View ====================

/**
 * Per-dimension number of discrete values: cardinality for discrete
 * spaces, bin count for continuous ones
 */
export function discreteCount(space: Space, bins: BinSpec = DEFAULT_BINS): number[] {
    const cardinality = getCardinality(space);
    if (cardinality) {
        return cardinality;
    }
    const size = getSize(space);
    return Array.from({ length: size }, (_, i) => binsAt(bins, i, size));
}

/**
 * Convert a native value to zero-based per-dimension indices
 *
 * @throws {UnboundedConversionError} continuous dimension without finite bounds
 * @throws {ShapeMismatchError} value length differs from the space size
 */
export function toDiscrete(space: Space, value: SpaceValue, bins: BinSpec = DEFAULT_BINS): number[] {
    const flat = flatOf(space, value);
    const low = getLow(space);
    const high = getHigh(space);

    if (isDiscreteSpace(space)) {
        return flat.map((v, i) => {
            if (!Number.isInteger(v) || v < low[i] || v > high[i]) {
                throw new ValidationError(
                    `Value ${v} outside ${describeSpace(space)} at dimension ${i}`,
                    { dimension: i, value: v }
                );
            }
            return v - low[i];
        });
    }

    assertBounded(space);
    const size = flat.length;
    return flat.map((v, i) => {
        const b = binsAt(bins, i, size);
        const range = high[i] - low[i];
        if (range === 0) {
            return 0;
        }
        return clamp(Math.floor(((v - low[i]) / range) * b), 0, b - 1);
    });
}

/**
 * Convert per-dimension indices back to a native value.
 * Continuous dimensions decode to the bin midpoint.
 */
export function fromDiscrete(space: Space, indices: readonly number[], bins: BinSpec = DEFAULT_BINS): SpaceValue {
    const size = getSize(space);
    if (indices.length !== size) {
        throw new ShapeMismatchError(size, indices.length, 'indices');
    }
    const low = getLow(space);
    const high = getHigh(space);
    const counts = discreteCount(space, bins);
    if (!isDiscreteSpace(space)) {
        assertBounded(space);
    }

    const flat = indices.map((idx, i) => {
        if (!Number.isInteger(idx) || idx < 0 || idx >= counts[i]) {
            throw new ValidationError(`Index ${idx} out of range [0, ${counts[i]}) at dimension ${i}`, {
                dimension: i,
                index: idx,
            });
        }
        if (isDiscreteSpace(space)) {
            return low[i] + idx;
        }
        const width = (high[i] - low[i]) / counts[i];
        return low[i] + (idx + 0.5) * width;
    });
    return fromFlat(space, flat);
}

/**
 * Largest distance between a value and its quantized round trip, per dimension
 */
export function quantizationTolerance(space: Space, bins: BinSpec = DEFAULT_BINS): number[] {
    if (isDiscreteSpace(space)) {
        return new Array<number>(getSize(space)).fill(0);
    }
    assertBounded(space);
    const low = getLow(space);
    const high = getHigh(space);
    const counts = discreteCount(space, bins);
    return low.map((lo, i) => (high[i] - lo) / counts[i] / 2);
}

// ==================== Continuous View ====================

/**
 * Flat float view of a value (discrete integers pass through unchanged)
 */
export function toContinuous(space: Space, value: SpaceValue): number[] {
    return flatOf(space, value);
}

/**
 * Map a float vector onto the space: discrete dimensions are rounded and
 * clamped into range, continuous dimensions clipped to their bounds
 */
export function fromContinuous(space: Space, vector: readonly number[]): SpaceValue {
    const size = getSize(space);
    if (vector.length !== size) {
        throw new ShapeMismatchError(size, vector.length, describeSpace(space));
    }
    const low = getLow(space);
    const high = getHigh(space);
    const integer = isDiscreteSpace(space);
    const flat = vector.map((v, i) => clamp(integer ? Math.round(v) : v, low[i], high[i]));
    return fromFlat(space, flat);
}

// ==================== Mixed Radix ====================

/**
 * Pack per-dimension indices into a single integer (first dimension most significant)
 */
export function encodeIndex(indices: readonly number[], radices: readonly number[]): number {
    if (indices.length !== radices.length) {
        throw new ShapeMismatchError(radices.length, indices.length, 'indices');
    }
    let index = 0;
    for (let i = 0; i < radices.length; i++) {
        if (indices[i] < 0 || indices[i] >= radices[i]) {
            throw new ValidationError(`Index ${indices[i]} out of range [0, ${radices[i]}) at dimension ${i}`);
        }
        index = index * radices[i] + indices[i];
    }
    return index;
}

/**
 * Inverse of encodeIndex
 */
export function decodeIndex(index: number, radices: readonly number[]): number[] {
    const total = radices.reduce((a, b) => a * b, 1);
    if (!Number.isInteger(index) || index < 0 || index >= total) {
        throw new ValidationError(`Index ${index} out of range [0, ${total})`);
    }
    const out = new Array<number>(radices.length);
    let rest = index;
    for (let i = radices.length - 1; i >= 0; i--) {
        out[i] = rest % radices[i];
        rest = Math.floor(rest / radices[i]);
    }
    return out;
}

// ==================== Space Converter ====================

/**
 * Element-wise converter between two spaces of equal flat size.
 * Compatibility is checked once at construction.
 */
export class SpaceConverter {
    private readonly targetCounts: number[] | null;

    constructor(readonly source: Space, readonly target: Space) {
        const sourceSize = getSize(source);
        const targetSize = getSize(target);
        if (sourceSize !== targetSize) {
            throw new ShapeMismatchError(targetSize, sourceSize, `${describeSpace(source)} -> ${describeSpace(target)}`);
        }

        this.targetCounts = getCardinality(target);
        if (this.targetCounts) {
            const sourceCounts = getCardinality(source);
            if (sourceCounts) {
                const mismatch = sourceCounts.findIndex((c, i) => c !== this.targetCounts?.[i]);
                if (mismatch >= 0) {
                    throw new TypeIncompatibilityError(
                        `Cardinality mismatch at dimension ${mismatch}: ${describeSpace(source)} -> ${describeSpace(target)}`,
                        { dimension: mismatch, source: sourceCounts[mismatch], target: this.targetCounts[mismatch] }
                    );
                }
            } else {
                assertBounded(source);
            }
        }
    }

    /** Source value → target value */
    forward(value: SpaceValue): SpaceValue {
        return this.convert(this.source, this.target, value, this.targetCounts);
    }

    /** Target value → source value */
    backward(value: SpaceValue): SpaceValue {
        return this.convert(this.target, this.source, value, this.targetCounts);
    }

    private convert(from: Space, to: Space, value: SpaceValue, counts: number[] | null): SpaceValue {
        if (counts === null) {
            return fromContinuous(to, toContinuous(from, value));
        }
        // one side is discrete with `counts` values per dimension
        return fromDiscrete(to, toDiscrete(from, value, counts), counts);
    }
}

export function createConverter(source: Space, target: Space): SpaceConverter {
    return new SpaceConverter(source, target);
}
