/**
 * EnvRun Tests
 * Episode bookkeeping, action validation and backup/restore
 */

import { describe, it, expect } from 'vitest';
import {
    EpisodeTerminatedError,
    IncompatibleRestoreError,
    InvalidActionError,
    NotInitializedError,
    ValidationError,
    arrayDiscrete,
    createRng,
    discrete,
    toFlat,
    type JsonValue,
} from '../src/core';
import { EnvObservationTypes, EnvRun, type EnvBase, type EnvStepResult } from '../src/env';
import { Grid, GridActions, Othello, createGrid } from '../src/envs';
import { CounterEnv } from './test-utils';

/**
 * Environment that updates one observation array in place
 */
class TallyEnv implements EnvBase<number, number[]> {
    readonly name = 'Tally';
    readonly actionSpace = discrete(2);
    readonly observationSpace = arrayDiscrete(2, 0, 9);
    readonly observationType = EnvObservationTypes.DISCRETE;
    readonly maxEpisodeSteps = 10;
    readonly playerNum = 1;
    readonly tally = [0, 0];

    reset(): { state: number[] } {
        this.tally.fill(0);
        return { state: this.tally };
    }

    step(action: number): EnvStepResult<number[]> {
        this.tally[action]++;
        return { state: this.tally, rewards: [0], done: false };
    }

    backup(): JsonValue {
        return [...this.tally];
    }

    restore(snapshot: JsonValue): void {
        if (!Array.isArray(snapshot)) throw new Error('bad snapshot');
        snapshot.forEach((v, i) => {
            if (typeof v === 'number') this.tally[i] = v;
        });
    }
}

function trajectory(run: EnvRun, actions: readonly number[]): string[] {
    const out: string[] = [];
    for (const action of actions) {
        if (run.done) break;
        const { state, rewards, done } = run.step(action);
        out.push(`${toFlat(state).join(',')}|${rewards.join(',')}|${done}`);
    }
    return out;
}

describe('EnvRun episode bookkeeping', () => {
    it('should refuse to step before reset', () => {
        const run = new EnvRun(new Grid());
        expect(run.isInitialized).toBe(false);
        expect(() => run.step(GridActions.UP)).toThrow(NotInitializedError);
        expect(() => run.state).toThrow(NotInitializedError);
    });

    it('should track rewards and end on the goal', () => {
        const run = new EnvRun(new Grid());
        expect(run.reset()).toEqual([0, 2]);

        const first = run.step(GridActions.RIGHT);
        expect(first.state).toEqual([1, 2]);
        expect(first.rewards).toEqual([-0.04]);
        expect(first.done).toBe(false);

        run.reset();
        for (const action of [GridActions.UP, GridActions.UP, GridActions.RIGHT, GridActions.RIGHT]) {
            run.step(action);
        }
        expect(run.state).toEqual([2, 0]);
        const last = run.step(GridActions.RIGHT);
        expect(last.done).toBe(true);
        expect(last.rewards).toEqual([1]);
        expect(run.doneReason).toBe('env');
        expect(run.stepNum).toBe(5);
        expect(run.episodeRewards[0]).toBeCloseTo(0.84, 10);
    });

    it('should stop at the step limit and stay done', () => {
        const run = new EnvRun(createGrid({ maxEpisodeSteps: 2 }));
        run.reset();
        run.step(GridActions.LEFT);
        expect(run.done).toBe(false);
        run.step(GridActions.LEFT);
        expect(run.done).toBe(true);
        expect(run.doneReason).toBe('step_max');
        expect(() => run.step(GridActions.LEFT)).toThrow(EpisodeTerminatedError);
        expect(run.done).toBe(true);
        expect(run.stepNum).toBe(2);
    });

    it('should let the run override the environment step limit', () => {
        const run = new EnvRun(new Grid(), { maxEpisodeSteps: 1 });
        run.reset();
        run.step(GridActions.DOWN);
        expect(run.doneReason).toBe('step_max');
        expect(() => new EnvRun(new Grid(), { maxEpisodeSteps: 0 })).toThrow(ValidationError);
    });

    it('should clear rewards on reset', () => {
        const run = new EnvRun(new Grid());
        run.reset();
        run.step(GridActions.RIGHT);
        run.reset();
        expect(run.episodeRewards).toEqual([0]);
        expect(run.stepRewards).toEqual([0]);
        expect(run.stepNum).toBe(0);
        expect(run.doneReason).toBe('none');
    });
});

describe('EnvRun observations', () => {
    it('should not share observation arrays with the environment or callers', () => {
        const env = new TallyEnv();
        const run = new EnvRun(env);
        const first = run.reset();
        const { state } = run.step(1);
        expect(state).toEqual([0, 1]);

        env.tally[0] = 7;
        expect(run.state).toEqual([0, 1]);

        const seen = run.state;
        if (Array.isArray(seen)) seen[1] = 5;
        if (Array.isArray(first)) first[0] = 3;
        expect(run.state).toEqual([0, 1]);
        expect(first).toEqual([3, 0]);
    });
});

describe('EnvRun action validation', () => {
    it('should reject actions outside the space without changing state', () => {
        const run = new EnvRun(new Grid());
        run.reset();
        expect(() => run.step(4)).toThrow(InvalidActionError);
        expect(() => run.step([1])).toThrow(InvalidActionError);
        expect(run.state).toEqual([0, 2]);
        expect(run.stepNum).toBe(0);
    });

    it('should reject currently invalid actions and report valid ones', () => {
        const env = new CounterEnv({ invalidActions: [2] });
        const run = new EnvRun(env);
        run.reset();
        expect(() => run.step(2)).toThrow('Action 2 is currently invalid');
        expect(run.getValidActions()).toEqual([0, 1]);
        expect(() => run.validateAction(1)).not.toThrow();
        expect(env.counter).toBe(0);
    });

    it('should enforce round-robin turn order', () => {
        const run = new EnvRun(new CounterEnv({ playerNum: 2, target: 10 }));
        run.reset();
        expect(run.nextPlayerIndex).toBe(0);
        expect(() => run.step(1, 1)).toThrow(InvalidActionError);
        run.step(1);
        expect(run.nextPlayerIndex).toBe(1);
        expect(run.stepRewards).toEqual([1, 0]);
        run.step(1, 1);
        expect(run.nextPlayerIndex).toBe(0);
        expect(run.episodeRewards).toEqual([1, 1]);
    });

    it('should sample only valid actions', () => {
        const run = new EnvRun(new CounterEnv({ invalidActions: [0, 1] }));
        run.reset();
        const rng = createRng(4);
        for (let i = 0; i < 10; i++) {
            expect(run.sampleAction(rng)).toBe(2);
        }
    });

    it('should reject observations outside the observation space', () => {
        const run = new EnvRun(new CounterEnv({ observationSpace: discrete(3), target: 100 }));
        run.reset();
        run.step(2);
        expect(() => run.step(2)).toThrow(ValidationError);
    });
});

describe('EnvRun backup/restore', () => {
    it('should replay identically after restore, random transitions included', () => {
        const actions = [1, 1, 0, 0, 1, 2, 1, 0, 3, 1];
        const run = new EnvRun(createGrid({ slip: 0.4 }), { seed: 5 });
        run.reset();
        run.step(GridActions.RIGHT);
        const blob = run.backup();

        const first = trajectory(run, actions);
        run.restore(blob);
        expect(run.stepNum).toBe(1);
        expect(trajectory(run, actions)).toEqual(first);

        const other = new EnvRun(createGrid({ slip: 0.4 }), { seed: 99 });
        other.restore(blob);
        expect(trajectory(other, actions)).toEqual(first);
    });

    it('should keep its state when the environment refuses the snapshot', () => {
        const env = new CounterEnv({ target: 100 });
        const run = new EnvRun(env);
        run.reset();
        run.step(1);
        const blob = run.backup();
        run.step(2);

        env.refuseCounter = 1;
        expect(() => run.restore(blob)).toThrow(IncompatibleRestoreError);
        expect(env.counter).toBe(3);
        expect(run.state).toBe(3);
        expect(run.stepNum).toBe(2);

        env.refuseCounter = null;
        run.restore(blob);
        expect(env.counter).toBe(1);
        expect(run.stepNum).toBe(1);
    });

    it('should reject blobs of another environment', () => {
        const grid = new EnvRun(new Grid());
        grid.reset();
        const counter = new EnvRun(new CounterEnv());
        expect(() => counter.restore(grid.backup())).toThrow(IncompatibleRestoreError);

        const small = new EnvRun(new Othello({ W: 6, H: 6 }));
        small.reset();
        expect(() => new EnvRun(new Othello()).restore(small.backup())).toThrow(IncompatibleRestoreError);
    });

    it('should render a header above the environment view', () => {
        const run = new EnvRun(new Grid());
        run.reset();
        expect(run.renderTerminal()).toBe('### step 0, next player 0, rewards [0]\n...G\n.#.H\nP...');
        expect(run.actionToString(GridActions.LEFT)).toBe('left');
        expect(run.renderRgbArray()).toBeNull();
    });
});
