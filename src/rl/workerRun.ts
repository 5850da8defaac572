/**
 * @module rl/workerRun
 * @description Per-player driver enforcing the worker call sequence
 *
 * Phases within an episode:
 *
 * ```
 * idle --onReset--> ready --policy--> acting --onStep--> ready | finished
 *                     ^                  |
 *                     +--rejectAction----+
 * ```
 */

import { SequenceError, ValidationError } from '../core/errors';
import { createRng, type SeededRandom } from '../core/repro';
import type { SpaceValue } from '../core/space';
import type { EnvRun } from '../env/envRun';
import type { Worker, WorkerRunView } from './worker';

export type WorkerPhase = 'idle' | 'ready' | 'acting' | 'finished';

export interface WorkerRunOptions {
    /** Training mode (RL workers explore and record experience) */
    training?: boolean;
    /** Seed of the worker's random generator */
    seed?: number;
}

/**
 * Binds a Worker to one player of an EnvRun
 */
export class WorkerRun implements WorkerRunView {
    readonly training: boolean;
    readonly rng: SeededRandom;

    private _phase: WorkerPhase = 'idle';
    private _reward = 0;
    private _episodeReward = 0;
    private _lastAction: SpaceValue | null = null;

    constructor(
        readonly worker: Worker,
        readonly env: EnvRun,
        readonly playerIndex: number = 0,
        options: WorkerRunOptions = {}
    ) {
        if (!Number.isInteger(playerIndex) || playerIndex < 0 || playerIndex >= env.playerNum) {
            throw new ValidationError(`Player index ${playerIndex} out of range [0, ${env.playerNum})`);
        }
        this.training = options.training ?? false;
        this.rng = createRng(options.seed ?? playerIndex);
    }

    get phase(): WorkerPhase {
        return this._phase;
    }

    get reward(): number {
        return this._reward;
    }

    get episodeReward(): number {
        return this._episodeReward;
    }

    get lastAction(): SpaceValue | null {
        return this._lastAction;
    }

    /** Acted and still waiting for onStep */
    get isPending(): boolean {
        return this._phase === 'acting';
    }

    /**
     * Start of episode. The EnvRun must already be reset.
     */
    onReset(): void {
        if (!this.env.isInitialized || this.env.stepNum !== 0) {
            throw new SequenceError('WorkerRun.onReset() must follow EnvRun.reset()', {
                playerIndex: this.playerIndex,
            });
        }
        this._reward = 0;
        this._episodeReward = 0;
        this._lastAction = null;
        this.worker.onReset(this.env, this);
        this._phase = 'ready';
    }

    /**
     * Ask the worker for an action (environment representation)
     */
    policy(): SpaceValue {
        this.expectPhase('ready', 'policy');
        if (this.env.done) {
            throw new SequenceError('policy() called after the episode ended', { playerIndex: this.playerIndex });
        }
        if (this.env.nextPlayerIndex !== this.playerIndex) {
            throw new SequenceError(
                `policy() called for player ${this.playerIndex} on player ${this.env.nextPlayerIndex}'s turn`,
                { playerIndex: this.playerIndex }
            );
        }
        const action = this.worker.policy(this.env, this);
        this._lastAction = action;
        this._reward = 0;
        this._phase = 'acting';
        return action;
    }

    /**
     * Undo the last policy() after the environment rejected its action
     */
    rejectAction(): void {
        this.expectPhase('acting', 'rejectAction');
        this._lastAction = null;
        this._phase = 'ready';
    }

    /**
     * Collect this player's share of the last step's rewards.
     * Called after every EnvRun.step(), whoever acted.
     */
    observe(): void {
        if (this._phase === 'idle') {
            throw new SequenceError('observe() called before onReset()', { playerIndex: this.playerIndex });
        }
        const r = this.env.stepRewards[this.playerIndex];
        this._reward += r;
        this._episodeReward += r;
    }

    /**
     * Report the outcome of this worker's last action
     */
    onStep(): void {
        this.expectPhase('acting', 'onStep');
        this.worker.onStep(this.env, this);
        this._reward = 0;
        this._phase = this.env.done ? 'finished' : 'ready';
    }

    renderTerminal(): string {
        return this.worker.renderTerminal?.(this.env, this) ?? '';
    }

    private expectPhase(expected: WorkerPhase, call: string): void {
        if (this._phase !== expected) {
            throw new SequenceError(`${call}() not allowed in phase '${this._phase}' (expected '${expected}')`, {
                playerIndex: this.playerIndex,
                phase: this._phase,
            });
        }
    }
}
