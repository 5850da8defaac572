/**
 * @module rl/spaceAdapter
 * @description Translates between an environment's spaces and an algorithm's representation
 *
 * The adapter is built once per worker. Every incompatibility (unbounded
 * dimension that would need binning, joint action count too large) is
 * detected here, so nothing fails mid-episode.
 *
 * | RL type    | action (algorithm side)               | observation (algorithm side)      |
 * |------------|---------------------------------------|-----------------------------------|
 * | ANY        | env native value                      | env native value                  |
 * | DISCRETE   | single integer (mixed radix if array) | zero-based index per dimension    |
 * | CONTINUOUS | float vector                          | float vector                      |
 */

import {
    assertBounded,
    decodeIndex,
    discreteCount,
    encodeIndex,
    fromContinuous,
    fromDiscrete,
    toContinuous,
    toDiscrete,
} from '../core/conversion';
import { TypeIncompatibilityError, ValidationError } from '../core/errors';
import {
    arrayContinuous,
    arrayDiscrete,
    discrete,
    getHigh,
    getLow,
    getSize,
    isDiscreteSpace,
    type Space,
    type SpaceValue,
} from '../core/space';
import { EnvObservationTypes, type EnvSpec } from '../env/base';
import { RLTypes, type RLConfig, type RLType } from './config';

/** Upper limit on the joint action count of a DISCRETE view */
export const MAX_DISCRETE_ACTIONS = 1_000_000;

interface ActionMapping {
    space: Space;
    count: number | null;
    toEnv(action: SpaceValue): SpaceValue;
    toRl(action: SpaceValue): SpaceValue;
    identityIndex: boolean;
}

interface ObservationMapping {
    space: Space;
    toRl(state: SpaceValue): SpaceValue;
}

function expectIndex(action: SpaceValue): number {
    if (typeof action !== 'number' || !Number.isInteger(action)) {
        throw new ValidationError(`DISCRETE action must be an integer, got ${JSON.stringify(action)}`);
    }
    return action;
}

function expectVector(action: SpaceValue): number[] {
    if (typeof action === 'number') {
        throw new ValidationError(`CONTINUOUS action must be a vector, got ${action}`);
    }
    return action;
}

// ==================== Mapping Builders ====================

function buildActionMapping(env: Space, type: RLType, divisionNum: number): ActionMapping {
    switch (type) {
        case RLTypes.ANY:
            return {
                space: env,
                count: env.kind === 'discrete' ? env.n : null,
                toEnv: a => a,
                toRl: a => a,
                identityIndex: env.kind === 'discrete',
            };

        case RLTypes.DISCRETE: {
            if (env.kind === 'discrete') {
                return {
                    space: env,
                    count: env.n,
                    toEnv: a => expectIndex(a),
                    toRl: a => a,
                    identityIndex: true,
                };
            }
            if (!isDiscreteSpace(env)) {
                assertBounded(env);
            }
            const radices = discreteCount(env, divisionNum);
            const count = radices.reduce((a, b) => a * b, 1);
            if (count > MAX_DISCRETE_ACTIONS) {
                throw new TypeIncompatibilityError(
                    `DISCRETE action view needs ${count} joint actions (limit ${MAX_DISCRETE_ACTIONS})`,
                    { radices }
                );
            }
            return {
                space: discrete(count),
                count,
                toEnv: a => fromDiscrete(env, decodeIndex(expectIndex(a), radices), divisionNum),
                toRl: a => encodeIndex(toDiscrete(env, a, divisionNum), radices),
                identityIndex: false,
            };
        }

        case RLTypes.CONTINUOUS:
            return {
                space: arrayContinuous(getSize(env), getLow(env), getHigh(env)),
                count: null,
                toEnv: a => fromContinuous(env, expectVector(a)),
                toRl: a => toContinuous(env, a),
                identityIndex: false,
            };
    }
}

function buildObservationMapping(spec: EnvSpec, type: RLType, divisionNum: number): ObservationMapping {
    const env = spec.observationSpace;
    const size = getSize(env);
    switch (type) {
        case RLTypes.ANY:
            return { space: env, toRl: s => s };

        case RLTypes.DISCRETE: {
            if (isDiscreteSpace(env)) {
                const counts = discreteCount(env);
                return {
                    space: arrayDiscrete(size, 0, counts.map(c => c - 1)),
                    toRl: s => toDiscrete(env, s),
                };
            }
            const low = getLow(env);
            const high = getHigh(env);
            const integerGrid = spec.observationType === EnvObservationTypes.DISCRETE &&
                low.every(Number.isInteger) && high.every(Number.isInteger);
            if (integerGrid) {
                // categorical values carried in a continuous space, e.g. board cells in [-1, 1]
                const grid = arrayDiscrete(size, low, high);
                return {
                    space: arrayDiscrete(size, 0, high.map((h, i) => h - low[i])),
                    toRl: s => toDiscrete(grid, fromContinuous(grid, toContinuous(env, s))),
                };
            }
            assertBounded(env);
            return {
                space: arrayDiscrete(size, 0, divisionNum - 1),
                toRl: s => toDiscrete(env, s, divisionNum),
            };
        }

        case RLTypes.CONTINUOUS:
            return {
                space: arrayContinuous(size, getLow(env), getHigh(env)),
                toRl: s => toContinuous(env, s),
            };
    }
}

// ==================== Space Adapter ====================

/**
 * Environment ↔ algorithm representation bridge for one worker
 *
 * @throws {UnboundedConversionError} DISCRETE view requested over an unbounded continuous space
 * @throws {TypeIncompatibilityError} joint DISCRETE action count exceeds MAX_DISCRETE_ACTIONS
 */
export class SpaceAdapter {
    private readonly action: ActionMapping;
    private readonly observation: ObservationMapping;

    constructor(readonly envSpec: EnvSpec, readonly config: RLConfig) {
        this.action = buildActionMapping(envSpec.actionSpace, config.actionType, config.actionDivisionNum);
        this.observation = buildObservationMapping(envSpec, config.observationType, config.observationDivisionNum);
    }

    /** Action space as seen by the algorithm */
    get rlActionSpace(): Space {
        return this.action.space;
    }

    /** Observation space as seen by the algorithm */
    get rlObservationSpace(): Space {
        return this.observation.space;
    }

    /** Number of algorithm-side actions, null when not discrete */
    get actionCount(): number | null {
        return this.action.count;
    }

    observationToRl(state: SpaceValue): SpaceValue {
        return this.observation.toRl(state);
    }

    actionToEnv(action: SpaceValue): SpaceValue {
        return this.action.toEnv(action);
    }

    actionToRl(action: SpaceValue): SpaceValue {
        return this.action.toRl(action);
    }

    /**
     * Environment invalid-action list in algorithm indices. Empty when the
     * algorithm's action view cannot express per-action masks.
     */
    invalidActionsToRl(invalidActions: readonly number[]): number[] {
        return this.action.identityIndex ? [...invalidActions] : [];
    }
}

export function createSpaceAdapter(envSpec: EnvSpec, config: RLConfig): SpaceAdapter {
    return new SpaceAdapter(envSpec, config);
}
