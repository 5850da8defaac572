/**
 * Test utilities shared by the suites
 */

import { SeededRandom } from '../src/core/repro';
import { discrete, type Space } from '../src/core/space';
import { EnvObservationTypes, type EnvBase, type EnvStepResult } from '../src/env/base';
import type { JsonValue } from '../src/core/repro';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Let queued microtasks and timers run
 */
export function flushMicrotasks(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, 0));
}

// ==================== Counter Environment ====================

export interface CounterOptions {
    playerNum?: number;
    maxEpisodeSteps?: number;
    /** Episode ends when the counter reaches this value */
    target?: number;
    /** Actions reported by getInvalidActions() */
    invalidActions?: number[];
    actionSpace?: Space;
    observationSpace?: Space;
}

/**
 * Minimal turn-based environment: each action adds its value to a counter.
 * Every step pays 1 to the acting player and 0 to the others.
 */
export class CounterEnv implements EnvBase<number, number> {
    readonly name = 'Counter';
    readonly actionSpace: Space;
    readonly observationSpace: Space;
    readonly observationType = EnvObservationTypes.DISCRETE;
    readonly playerNum: number;
    readonly maxEpisodeSteps: number;
    readonly target: number;
    invalidActions: number[];
    counter = 0;
    resets = 0;
    /** restore() throws for snapshots with this counter value */
    refuseCounter: number | null = null;

    constructor(options: CounterOptions = {}) {
        this.playerNum = options.playerNum ?? 1;
        this.maxEpisodeSteps = options.maxEpisodeSteps ?? 100;
        this.target = options.target ?? 5;
        this.invalidActions = options.invalidActions ?? [];
        this.actionSpace = options.actionSpace ?? discrete(3);
        this.observationSpace = options.observationSpace ?? discrete(1000);
    }

    reset(_rng: SeededRandom): { state: number } {
        this.counter = 0;
        this.resets++;
        return { state: 0 };
    }

    step(action: number, playerIndex: number, _rng: SeededRandom): EnvStepResult<number> {
        this.counter += action;
        const rewards = new Array<number>(this.playerNum).fill(0);
        rewards[playerIndex] = 1;
        return { state: this.counter, rewards, done: this.counter >= this.target };
    }

    getInvalidActions(_playerIndex: number): number[] {
        return [...this.invalidActions];
    }

    backup(): JsonValue {
        return { counter: this.counter };
    }

    restore(snapshot: JsonValue): void {
        if (typeof snapshot !== 'object' || snapshot === null || Array.isArray(snapshot)) {
            throw new Error('bad snapshot');
        }
        const counter = snapshot['counter'];
        if (typeof counter !== 'number') {
            throw new Error('bad snapshot');
        }
        if (counter === this.refuseCounter) {
            throw new Error(`counter ${counter} refused`);
        }
        this.counter = counter;
    }
}

export function rng(seed = 1): SeededRandom {
    return new SeededRandom(seed);
}
