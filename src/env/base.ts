/**
 * @module env/base
 * @description Contract implemented by every environment
 *
 * An environment owns its dynamics and nothing else. Episode bookkeeping
 * (rewards, done flags, step limits, turn order validation) lives in EnvRun.
 * Randomness comes from the SeededRandom handed to reset/step so that EnvRun
 * can capture it in backups.
 */

import type { JsonValue, SeededRandom } from '../core/repro';
import type { Space, SpaceValue } from '../core/space';
import type { Worker } from '../rl/worker';

// ==================== Types ====================

/**
 * Hint about how an observation should be read
 */
export const EnvObservationTypes = {
    UNKNOWN: 'UNKNOWN',
    /** Values are categorical/integer coded even when the space is continuous */
    DISCRETE: 'DISCRETE',
    CONTINUOUS: 'CONTINUOUS',
    /** 2D image without channels */
    SHAPE2: 'SHAPE2',
    /** 3D tensor */
    SHAPE3: 'SHAPE3',
    /** Color image */
    COLOR: 'COLOR',
} as const;

export type EnvObservationType = (typeof EnvObservationTypes)[keyof typeof EnvObservationTypes];

/** Auxiliary data returned by reset/step */
export type EnvInfo = Record<string, JsonValue>;

export interface EnvResetResult<TState extends SpaceValue = SpaceValue> {
    state: TState;
    /** Player to act first (defaults to 0) */
    nextPlayerIndex?: number;
    info?: EnvInfo;
}

export interface EnvStepResult<TState extends SpaceValue = SpaceValue> {
    state: TState;
    /** Reward of every player for this step, length = playerNum */
    rewards: number[];
    done: boolean;
    /** Player to act next; round-robin when omitted */
    nextPlayerIndex?: number;
    info?: EnvInfo;
}

/**
 * RGB image, row-major, 3 bytes per pixel
 */
export interface RgbImage {
    width: number;
    height: number;
    data: Uint8Array;
}

/**
 * Environment implementation
 */
export interface EnvBase<TAction extends SpaceValue = SpaceValue, TState extends SpaceValue = SpaceValue> {
    readonly name: string;
    readonly actionSpace: Space;
    readonly observationSpace: Space;
    readonly observationType: EnvObservationType;
    /** Hard cap on steps per episode */
    readonly maxEpisodeSteps: number;
    readonly playerNum: number;

    reset(rng: SeededRandom): EnvResetResult<TState>;

    /**
     * Apply an action. Only called with actions that EnvRun validated:
     * contained in the action space, by the player whose turn it is,
     * and not listed by getInvalidActions().
     */
    step(action: TAction, playerIndex: number, rng: SeededRandom): EnvStepResult<TState>;

    /** JSON-compatible snapshot of the complete internal state */
    backup(): JsonValue;

    /** Inverse of backup() */
    restore(snapshot: JsonValue): void;

    /** Discrete actions currently unavailable to a player */
    getInvalidActions?(playerIndex: number): number[];

    renderTerminal?(): string;
    renderRgbArray?(): RgbImage;
    actionToString?(action: TAction): string;

    /** Rule-based opponents shipped with the environment (null when unknown) */
    makeWorker?(name: string): Worker | null;

    close?(): void;
}

/**
 * Spaces and flags a worker needs to adapt itself to an environment
 */
export interface EnvSpec {
    name: string;
    actionSpace: Space;
    observationSpace: Space;
    observationType: EnvObservationType;
    playerNum: number;
}

export function getEnvSpec(env: EnvBase): EnvSpec {
    return {
        name: env.name,
        actionSpace: env.actionSpace,
        observationSpace: env.observationSpace,
        observationType: env.observationType,
        playerNum: env.playerNum,
    };
}
