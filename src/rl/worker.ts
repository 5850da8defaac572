/**
 * @module rl/worker
 * @description Worker capability interface and its variants
 *
 * A Worker decides actions for one player. Variants compose rather than
 * inherit from each other:
 *
 * - RLWorker: algorithm hooks behind a SpaceAdapter, sharing parameter/memory with a trainer
 * - RuleBaseWorker: a policy function (random, heuristics, environment-shipped opponents)
 * - ExtendWorker: decorates another worker with extra behavior
 */

import type { SeededRandom } from '../core/repro';
import type { SpaceValue } from '../core/space';
import { getEnvSpec, type EnvSpec } from '../env/base';
import type { EnvRun } from '../env/envRun';
import type { RLConfig } from './config';
import type { RLRemoteMemory } from './memory';
import type { RLParameter } from './parameter';
import { SpaceAdapter } from './spaceAdapter';

// ==================== Types ====================

/**
 * Per-player state a worker sees (implemented by WorkerRun)
 */
export interface WorkerRunView {
    readonly playerIndex: number;
    readonly training: boolean;
    /** Worker-owned random generator */
    readonly rng: SeededRandom;
    /** Reward accumulated since this player's last action */
    readonly reward: number;
    readonly episodeReward: number;
    /** Last action in environment representation */
    readonly lastAction: SpaceValue | null;
}

/**
 * Worker interface
 */
export interface Worker {
    readonly name: string;
    /** Called once per episode, after EnvRun.reset() */
    onReset(env: EnvRun, run: WorkerRunView): void;
    /** Choose an action (environment representation) for the current turn */
    policy(env: EnvRun, run: WorkerRunView): SpaceValue;
    /** Called after the step that followed this worker's action resolved */
    onStep(env: EnvRun, run: WorkerRunView): void;
    renderTerminal?(env: EnvRun, run: WorkerRunView): string;
}

// ==================== Rule-Based Worker ====================

export type RulePolicy = (env: EnvRun, run: WorkerRunView) => SpaceValue;

export interface RuleHooks {
    onReset?(env: EnvRun, run: WorkerRunView): void;
    onStep?(env: EnvRun, run: WorkerRunView): void;
}

/**
 * Worker driven by a policy function
 */
export class RuleBaseWorker implements Worker {
    constructor(
        readonly name: string,
        private readonly rule: RulePolicy,
        private readonly hooks: RuleHooks = {}
    ) {}

    onReset(env: EnvRun, run: WorkerRunView): void {
        this.hooks.onReset?.(env, run);
    }

    policy(env: EnvRun, run: WorkerRunView): SpaceValue {
        return this.rule(env, run);
    }

    onStep(env: EnvRun, run: WorkerRunView): void {
        this.hooks.onStep?.(env, run);
    }
}

/**
 * Uniform random valid action
 */
export function createRandomWorker(): RuleBaseWorker {
    return new RuleBaseWorker('random', (env, run) => env.sampleAction(run.rng, run.playerIndex));
}

/**
 * Always returns the same action (useful in tests and as a placeholder opponent)
 */
export function createConstantWorker(action: SpaceValue): RuleBaseWorker {
    return new RuleBaseWorker('constant', () => action);
}

// ==================== Extend Worker ====================

/**
 * Behavior layered over an inner worker. Each hook receives the inner
 * worker and decides whether to delegate.
 */
export interface WorkerExtension {
    onReset?(env: EnvRun, run: WorkerRunView, inner: Worker): void;
    policy?(env: EnvRun, run: WorkerRunView, inner: Worker): SpaceValue;
    onStep?(env: EnvRun, run: WorkerRunView, inner: Worker): void;
}

/**
 * Decorator around another worker
 */
export class ExtendWorker implements Worker {
    readonly name: string;

    constructor(readonly inner: Worker, private readonly extension: WorkerExtension, name?: string) {
        this.name = name ?? `extend(${inner.name})`;
    }

    onReset(env: EnvRun, run: WorkerRunView): void {
        if (this.extension.onReset) {
            this.extension.onReset(env, run, this.inner);
        } else {
            this.inner.onReset(env, run);
        }
    }

    policy(env: EnvRun, run: WorkerRunView): SpaceValue {
        return this.extension.policy
            ? this.extension.policy(env, run, this.inner)
            : this.inner.policy(env, run);
    }

    onStep(env: EnvRun, run: WorkerRunView): void {
        if (this.extension.onStep) {
            this.extension.onStep(env, run, this.inner);
        } else {
            this.inner.onStep(env, run);
        }
    }

    renderTerminal(env: EnvRun, run: WorkerRunView): string {
        return this.inner.renderTerminal?.(env, run) ?? '';
    }
}

// ==================== RL Worker ====================

/**
 * What algorithm hooks see besides the observation
 */
export interface RLWorkerContext {
    readonly training: boolean;
    readonly playerIndex: number;
    readonly stepNum: number;
    readonly rng: SeededRandom;
    /** Number of algorithm-side actions (null for non-discrete views) */
    readonly actionCount: number | null;
    /** Currently invalid actions, algorithm indices */
    readonly invalidActions: readonly number[];
    /** Reward since this player's last action */
    readonly reward: number;
    readonly done: boolean;
}

/**
 * Algorithm side of an RLWorker. Observations and actions are in the
 * algorithm's representation (see SpaceAdapter).
 */
export interface RLWorkerHooks {
    onReset(observation: SpaceValue, ctx: RLWorkerContext): void;
    policy(observation: SpaceValue, ctx: RLWorkerContext): SpaceValue;
    onStep(observation: SpaceValue, ctx: RLWorkerContext): void;
    renderTerminal?(observation: SpaceValue, ctx: RLWorkerContext): string;
}

/**
 * Factory for algorithm hooks, given the adapter built for the environment
 */
export type RLWorkerHooksFactory = (adapter: SpaceAdapter) => RLWorkerHooks;

/**
 * Learning worker
 *
 * The SpaceAdapter is built in the constructor, so any representation
 * incompatibility surfaces before the first episode.
 */
export class RLWorker implements Worker {
    readonly adapter: SpaceAdapter;
    private readonly hooks: RLWorkerHooks;

    constructor(
        readonly config: RLConfig,
        readonly parameter: RLParameter,
        readonly memory: RLRemoteMemory<unknown> | null,
        env: EnvSpec | EnvRun,
        createHooks: RLWorkerHooksFactory
    ) {
        const spec: EnvSpec = 'getOriginalEnv' in env ? getEnvSpec(env.getOriginalEnv()) : env;
        this.adapter = new SpaceAdapter(spec, config);
        this.hooks = createHooks(this.adapter);
    }

    get name(): string {
        return this.config.name;
    }

    onReset(env: EnvRun, run: WorkerRunView): void {
        this.hooks.onReset(this.adapter.observationToRl(env.state), this.context(env, run));
    }

    policy(env: EnvRun, run: WorkerRunView): SpaceValue {
        const action = this.hooks.policy(this.adapter.observationToRl(env.state), this.context(env, run));
        return this.adapter.actionToEnv(action);
    }

    onStep(env: EnvRun, run: WorkerRunView): void {
        this.hooks.onStep(this.adapter.observationToRl(env.state), this.context(env, run));
    }

    renderTerminal(env: EnvRun, run: WorkerRunView): string {
        return this.hooks.renderTerminal?.(this.adapter.observationToRl(env.state), this.context(env, run)) ?? '';
    }

    private context(env: EnvRun, run: WorkerRunView): RLWorkerContext {
        return {
            training: run.training,
            playerIndex: run.playerIndex,
            stepNum: env.stepNum,
            rng: run.rng,
            actionCount: this.adapter.actionCount,
            invalidActions: env.done ? [] : this.adapter.invalidActionsToRl(env.getInvalidActions(run.playerIndex)),
            reward: run.reward,
            done: env.done,
        };
    }
}
