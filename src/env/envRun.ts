/**
 * @module env/envRun
 * @description Episode driver around one environment instance
 *
 * EnvRun validates actions and turn order, tracks per-player rewards, the
 * done flag and the step limit, and backs up the environment together with
 * its own bookkeeping and RNG state so a restored run continues identically.
 */

import { z } from 'zod';
import {
    CheckpointableState,
    JsonValueSchema,
    type CheckpointDescriptor,
    type StateBlob,
} from '../core/blob';
import {
    EpisodeTerminatedError,
    IncompatibleRestoreError,
    InvalidActionError,
    NotInitializedError,
    ValidationError,
} from '../core/errors';
import { createRng, type SeededRandom } from '../core/repro';
import {
    computeSchemaHash,
    contains,
    describeSpace,
    sample,
    type Space,
    type SpaceValue,
} from '../core/space';
import type { EnvBase, EnvInfo, EnvObservationType, RgbImage } from './base';

// ==================== Types ====================

/**
 * Why the episode ended
 */
export type DoneReason = 'none' | 'env' | 'step_max';

export interface EnvRunOptions {
    /** Seed of the run's random generator (default 0) */
    seed?: number;
    /** Overrides the environment's own step limit */
    maxEpisodeSteps?: number;
}

export interface EnvRunStepResult {
    state: SpaceValue;
    rewards: number[];
    done: boolean;
}

const ENV_RUN_SCHEMA_VERSION = 1;

function copyValue(value: SpaceValue): SpaceValue {
    return typeof value === 'number' ? value : [...value];
}

const EnvRunSnapshotSchema = z.object({
    env: JsonValueSchema,
    initialized: z.boolean(),
    state: z.union([z.number(), z.array(z.number())]).nullable(),
    stepRewards: z.array(z.number()),
    episodeRewards: z.array(z.number()),
    done: z.boolean(),
    doneReason: z.enum(['none', 'env', 'step_max']),
    stepNum: z.number().int().nonnegative(),
    nextPlayerIndex: z.number().int().nonnegative(),
    info: z.record(JsonValueSchema),
    rngState: z.number().int().nonnegative(),
});

type EnvRunSnapshot = z.infer<typeof EnvRunSnapshotSchema>;

// ==================== EnvRun ====================

/**
 * Stateful wrapper that runs episodes of one environment
 */
export class EnvRun extends CheckpointableState<EnvRunSnapshot> {
    protected readonly snapshotSchema = EnvRunSnapshotSchema;

    readonly maxEpisodeSteps: number;
    private readonly rng: SeededRandom;
    private readonly schemaHash: string;

    private initialized = false;
    private _state: SpaceValue | null = null;
    private _stepRewards: number[];
    private _episodeRewards: number[];
    private _done = false;
    private _doneReason: DoneReason = 'none';
    private _stepNum = 0;
    private _nextPlayerIndex = 0;
    private _info: EnvInfo = {};

    constructor(private readonly env: EnvBase, options: EnvRunOptions = {}) {
        super();
        const maxEpisodeSteps = options.maxEpisodeSteps ?? env.maxEpisodeSteps;
        if (!Number.isInteger(maxEpisodeSteps) || maxEpisodeSteps < 1) {
            throw new ValidationError(`maxEpisodeSteps must be a positive integer, got ${maxEpisodeSteps}`);
        }
        if (!Number.isInteger(env.playerNum) || env.playerNum < 1) {
            throw new ValidationError(`playerNum must be a positive integer, got ${env.playerNum}`);
        }
        this.maxEpisodeSteps = maxEpisodeSteps;
        this.rng = createRng(options.seed ?? 0);
        this.schemaHash = computeSchemaHash(env.actionSpace, env.observationSpace);
        this._stepRewards = new Array<number>(env.playerNum).fill(0);
        this._episodeRewards = new Array<number>(env.playerNum).fill(0);
    }

    // ==================== Properties ====================

    get name(): string {
        return this.env.name;
    }

    get actionSpace(): Space {
        return this.env.actionSpace;
    }

    get observationSpace(): Space {
        return this.env.observationSpace;
    }

    get observationType(): EnvObservationType {
        return this.env.observationType;
    }

    get playerNum(): number {
        return this.env.playerNum;
    }

    get isInitialized(): boolean {
        return this.initialized;
    }

    /** Current observation */
    get state(): SpaceValue {
        if (this._state === null) {
            throw new NotInitializedError();
        }
        return copyValue(this._state);
    }

    /** Rewards of the last step, per player */
    get stepRewards(): readonly number[] {
        return this._stepRewards;
    }

    /** Rewards accumulated since reset, per player */
    get episodeRewards(): readonly number[] {
        return this._episodeRewards;
    }

    get done(): boolean {
        return this._done;
    }

    get doneReason(): DoneReason {
        return this._doneReason;
    }

    get stepNum(): number {
        return this._stepNum;
    }

    get nextPlayerIndex(): number {
        return this._nextPlayerIndex;
    }

    get info(): Readonly<EnvInfo> {
        return this._info;
    }

    /** Schema hash of the action/observation spaces */
    get schema(): string {
        return this.schemaHash;
    }

    getOriginalEnv(): EnvBase {
        return this.env;
    }

    // ==================== Episode ====================

    /**
     * Start a new episode
     */
    reset(): SpaceValue {
        const result = this.env.reset(this.rng);
        this.assertObservation(result.state);
        const first = result.nextPlayerIndex ?? 0;
        this.assertPlayer(first);

        this.initialized = true;
        this._state = copyValue(result.state);
        this._stepRewards = new Array<number>(this.playerNum).fill(0);
        this._episodeRewards = new Array<number>(this.playerNum).fill(0);
        this._done = false;
        this._doneReason = 'none';
        this._stepNum = 0;
        this._nextPlayerIndex = first;
        this._info = result.info ?? {};
        return this.state;
    }

    /**
     * Apply one action for a player (defaults to the player whose turn it is)
     *
     * @throws {NotInitializedError} before reset()
     * @throws {EpisodeTerminatedError} once the episode is done
     * @throws {InvalidActionError} action outside the space, wrong turn, or currently invalid
     */
    step(action: SpaceValue, playerIndex: number = this._nextPlayerIndex): EnvRunStepResult {
        this.validateAction(action, playerIndex);

        const result = this.env.step(action, playerIndex, this.rng);
        if (result.rewards.length !== this.playerNum) {
            throw new ValidationError(
                `Environment ${this.name} returned ${result.rewards.length} rewards for ${this.playerNum} players`
            );
        }
        this.assertObservation(result.state);
        const next = result.nextPlayerIndex ?? (playerIndex + 1) % this.playerNum;
        this.assertPlayer(next);

        this._stepNum++;
        this._state = copyValue(result.state);
        this._stepRewards = [...result.rewards];
        this._episodeRewards = this._episodeRewards.map((r, i) => r + result.rewards[i]);
        this._nextPlayerIndex = next;
        this._info = result.info ?? {};

        if (result.done) {
            this._done = true;
            this._doneReason = 'env';
        } else if (this._stepNum >= this.maxEpisodeSteps) {
            this._done = true;
            this._doneReason = 'step_max';
        }

        return { state: this.state, rewards: [...result.rewards], done: this._done };
    }

    /**
     * Throws exactly what step() would throw for this action, without stepping
     */
    validateAction(action: SpaceValue, playerIndex: number = this._nextPlayerIndex): void {
        if (!this.initialized) {
            throw new NotInitializedError();
        }
        if (this._done) {
            throw new EpisodeTerminatedError();
        }
        if (playerIndex !== this._nextPlayerIndex) {
            throw new InvalidActionError(
                `Player ${playerIndex} acted out of turn (next player is ${this._nextPlayerIndex})`,
                playerIndex,
                { expected: this._nextPlayerIndex }
            );
        }
        if (!contains(this.actionSpace, action)) {
            throw new InvalidActionError(
                `Action ${JSON.stringify(action)} is not in ${describeSpace(this.actionSpace)}`,
                playerIndex,
                { action }
            );
        }
        if (typeof action === 'number' && this.getInvalidActions(playerIndex).includes(action)) {
            throw new InvalidActionError(`Action ${action} is currently invalid`, playerIndex, { action });
        }
    }

    // ==================== Actions ====================

    getInvalidActions(playerIndex: number = this._nextPlayerIndex): number[] {
        return this.env.getInvalidActions?.(playerIndex) ?? [];
    }

    /**
     * Valid actions of a discrete action space
     */
    getValidActions(playerIndex: number = this._nextPlayerIndex): number[] {
        const space = this.actionSpace;
        if (space.kind !== 'discrete') {
            throw new ValidationError(`Valid actions are only enumerable for Discrete spaces, got ${describeSpace(space)}`);
        }
        const invalid = new Set(this.getInvalidActions(playerIndex));
        const valid: number[] = [];
        for (let a = 0; a < space.n; a++) {
            if (!invalid.has(a)) valid.push(a);
        }
        return valid;
    }

    /**
     * Random action that step() accepts. Uses the caller's generator so the
     * environment's random stream is left alone.
     */
    sampleAction(rng: SeededRandom, playerIndex: number = this._nextPlayerIndex): SpaceValue {
        return sample(this.actionSpace, rng, this.getInvalidActions(playerIndex));
    }

    actionToString(action: SpaceValue): string {
        return this.env.actionToString ? this.env.actionToString(action) : JSON.stringify(action);
    }

    // ==================== Rendering ====================

    /**
     * Text view of the current state
     */
    renderTerminal(): string {
        const header = `### step ${this._stepNum}, next player ${this._nextPlayerIndex}, ` +
            `rewards [${this._stepRewards.join(', ')}]` +
            (this._done ? `, done (${this._doneReason})` : '');
        const body = this.env.renderTerminal
            ? this.env.renderTerminal()
            : JSON.stringify(this._state);
        return `${header}\n${body}`;
    }

    /** null when the environment has no image view */
    renderRgbArray(): RgbImage | null {
        return this.env.renderRgbArray ? this.env.renderRgbArray() : null;
    }

    close(): void {
        this.env.close?.();
    }

    // ==================== Checkpoint ====================

    protected describeCheckpoint(): CheckpointDescriptor {
        return {
            type: `env:${this.name}`,
            schemaVersion: ENV_RUN_SCHEMA_VERSION,
            context: this.schemaHash,
        };
    }

    protected snapshot(): EnvRunSnapshot {
        return {
            env: this.env.backup(),
            initialized: this.initialized,
            state: this._state === null ? null : copyValue(this._state),
            stepRewards: [...this._stepRewards],
            episodeRewards: [...this._episodeRewards],
            done: this._done,
            doneReason: this._doneReason,
            stepNum: this._stepNum,
            nextPlayerIndex: this._nextPlayerIndex,
            info: { ...this._info },
            rngState: this.rng.getState(),
        };
    }

    protected applySnapshot(snapshot: EnvRunSnapshot): void {
        this.env.restore(snapshot.env);
        this.initialized = snapshot.initialized;
        this._state = snapshot.state === null ? null : copyValue(snapshot.state);
        this._stepRewards = [...snapshot.stepRewards];
        this._episodeRewards = [...snapshot.episodeRewards];
        this._done = snapshot.done;
        this._doneReason = snapshot.doneReason;
        this._stepNum = snapshot.stepNum;
        this._nextPlayerIndex = snapshot.nextPlayerIndex;
        this._info = { ...snapshot.info };
        this.rng.setState(snapshot.rngState);
    }

    /**
     * Restore a backup. The environment is rolled back if it rejects the snapshot.
     */
    override restore(blob: StateBlob): void {
        const next = this.readSnapshot(blob);
        if (next.stepRewards.length !== this.playerNum || next.episodeRewards.length !== this.playerNum) {
            throw new IncompatibleRestoreError('Reward vectors do not match player count', {
                playerNum: this.playerNum,
            });
        }
        const previous = this.snapshot();
        try {
            this.applySnapshot(next);
        } catch (error) {
            this.applySnapshot(previous);
            throw new IncompatibleRestoreError(`Environment ${this.name} rejected the snapshot`, {
                cause: error instanceof Error ? error.message : String(error),
            });
        }
    }

    // ==================== Internal ====================

    private assertObservation(state: SpaceValue): void {
        if (!contains(this.observationSpace, state)) {
            throw new ValidationError(
                `Environment ${this.name} produced an observation outside ${describeSpace(this.observationSpace)}`,
                { state }
            );
        }
    }

    private assertPlayer(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.playerNum) {
            throw new ValidationError(`Player index ${index} out of range [0, ${this.playerNum})`);
        }
    }
}
