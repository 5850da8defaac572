/**
 * SpaceAdapter Tests
 * Environment ↔ algorithm representations for every RL type
 */

import { describe, it, expect } from 'vitest';
import {
    TypeIncompatibilityError,
    UnboundedConversionError,
    arrayContinuous,
    arrayDiscrete,
    box,
    continuous,
    discrete,
    toFlat,
    type Space,
} from '../src/core';
import { EnvObservationTypes, type EnvObservationType, type EnvSpec } from '../src/env';
import { SpaceAdapter, createRLConfig, type RLConfigInput } from '../src/rl';

function spec(
    actionSpace: Space,
    observationSpace: Space,
    observationType: EnvObservationType = EnvObservationTypes.UNKNOWN
): EnvSpec {
    return { name: 'Spec', actionSpace, observationSpace, observationType, playerNum: 1 };
}

function adapter(envSpec: EnvSpec, config: Omit<RLConfigInput, 'name'>): SpaceAdapter {
    return new SpaceAdapter(envSpec, createRLConfig({ name: 'adapter', ...config }));
}

describe('ANY', () => {
    it('should be the identity on Discrete(4)', () => {
        const action = discrete(4);
        const a = adapter(spec(action, discrete(10)), {});
        expect(a.rlActionSpace).toBe(action);
        expect(a.actionCount).toBe(4);
        expect(a.actionToEnv(2)).toBe(2);
        expect(a.actionToRl(3)).toBe(3);
        expect(a.observationToRl(7)).toBe(7);
        expect(a.invalidActionsToRl([1, 3])).toEqual([1, 3]);
    });

    it('should not index array actions', () => {
        const a = adapter(spec(arrayDiscrete(2, 0, 3), discrete(10)), {});
        expect(a.actionCount).toBeNull();
        expect(a.invalidActionsToRl([1])).toEqual([]);
    });
});

describe('DISCRETE actions', () => {
    it('should pass Discrete spaces through', () => {
        const a = adapter(spec(discrete(4), discrete(10)), { actionType: 'DISCRETE' });
        expect(a.actionCount).toBe(4);
        expect(a.actionToEnv(1)).toBe(1);
        expect(a.invalidActionsToRl([2])).toEqual([2]);
    });

    it('should enumerate a bounded box with mixed radix', () => {
        const a = adapter(spec(box([2], 0, 1), discrete(10)), { actionType: 'DISCRETE', actionDivisionNum: 5 });
        expect(a.rlActionSpace).toEqual(discrete(25));
        expect(a.actionCount).toBe(25);

        const env = toFlat(a.actionToEnv(7));
        expect(env[0]).toBeCloseTo(0.3, 10);
        expect(env[1]).toBeCloseTo(0.5, 10);
        expect(a.actionToRl([0.3, 0.5])).toBe(7);
        expect(a.invalidActionsToRl([1])).toEqual([]);
    });

    it('should fail at construction over an unbounded continuous action space', () => {
        expect(() => adapter(spec(continuous(), discrete(10)), { actionType: 'DISCRETE' })).toThrow(
            UnboundedConversionError
        );
    });

    it('should refuse joint action counts above the limit', () => {
        expect(() => adapter(spec(arrayDiscrete(7, 0, 9), discrete(10)), { actionType: 'DISCRETE' })).toThrow(
            TypeIncompatibilityError
        );
    });
});

describe('DISCRETE observations', () => {
    it('should index integer-coded boards carried in a box', () => {
        const a = adapter(spec(discrete(16), box([4], -1, 1), EnvObservationTypes.DISCRETE), {
            observationType: 'DISCRETE',
        });
        expect(a.rlObservationSpace).toEqual(arrayDiscrete(4, 0, 2));
        expect(a.observationToRl([-1, 0, 1, 0])).toEqual([0, 1, 2, 1]);
    });

    it('should bin continuous observations', () => {
        const a = adapter(spec(discrete(2), box([2], 0, 1), EnvObservationTypes.CONTINUOUS), {
            observationType: 'DISCRETE',
        });
        expect(a.rlObservationSpace).toEqual(arrayDiscrete(2, 0, 9));
        expect(a.observationToRl([0.05, 0.95])).toEqual([0, 9]);
    });

    it('should offset discrete observations to zero-based indices', () => {
        const a = adapter(spec(discrete(2), arrayDiscrete(2, [-2, 1], [2, 3])), { observationType: 'DISCRETE' });
        expect(a.rlObservationSpace).toEqual(arrayDiscrete(2, 0, [4, 2]));
        expect(a.observationToRl([0, 3])).toEqual([2, 2]);
    });

    it('should fail at construction over unbounded continuous observations', () => {
        expect(() =>
            adapter(spec(discrete(2), arrayContinuous(3), EnvObservationTypes.DISCRETE), { observationType: 'DISCRETE' })
        ).toThrow(UnboundedConversionError);
    });
});

describe('CONTINUOUS', () => {
    it('should expose discrete actions as rounded floats', () => {
        const a = adapter(spec(discrete(4), discrete(10)), { actionType: 'CONTINUOUS' });
        expect(a.rlActionSpace).toEqual(arrayContinuous(1, 0, 3));
        expect(a.actionCount).toBeNull();
        expect(a.actionToEnv([2.4])).toBe(2);
        expect(a.actionToRl(3)).toEqual([3]);
    });

    it('should expose observations as float vectors', () => {
        const a = adapter(spec(discrete(2), arrayDiscrete(2, 0, 3)), { observationType: 'CONTINUOUS' });
        expect(a.observationToRl([1, 2])).toEqual([1, 2]);
        expect(a.rlObservationSpace).toEqual(arrayContinuous(2, 0, 3));
    });
});
