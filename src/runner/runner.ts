/**
 * @module runner/runner
 * @description Training and evaluation loops over registered components
 *
 * Orchestrates: build env/parameter/memory/trainer → play episodes → report
 */

import { z } from 'zod';
import { ErrorCodes, RegistryError, ValidationError } from '../core/errors';
import { ConsoleLogger, type Logger } from '../core/logging';
import { deriveSeed } from '../core/repro';
import { parseWithSchema } from '../core/validation';
import { JsonValueSchema } from '../core/blob';
import type { EnvRun } from '../env/envRun';
import { EnvConfigSchema, type EnvConfig, type EnvRegistry } from '../env/registry';
import type { RLConfig } from '../rl/config';
import type { RLRemoteMemory } from '../rl/memory';
import type { RLParameter } from '../rl/parameter';
import type { RLRegistry } from '../rl/registry';
import type { RLTrainer } from '../rl/trainer';
import { createRandomWorker, type Worker } from '../rl/worker';
import { WorkerRun } from '../rl/workerRun';
import { DEFAULT_INVALID_ACTION_RETRIES, playEpisode, type EpisodeResult, type PlayOptions } from './play';

// ==================== Configuration ====================

const RLSpecSchema = z.object({
    name: z.string().min(1),
    actionDivisionNum: z.number().int().positive().optional(),
    observationDivisionNum: z.number().int().positive().optional(),
    hyperparams: z.record(JsonValueSchema).optional(),
});

/** Algorithm id with optional overrides of its defaults */
export type RLSpec = z.infer<typeof RLSpecSchema>;

export const RunnerConfigSchema = z.object({
    /** Registered environment id or full EnvConfig */
    env: z
        .union([z.string().min(1), EnvConfigSchema])
        .transform((v): EnvConfig => (typeof v === 'string' ? { name: v, kwargs: {} } : v)),
    /** Registered algorithm id or RLSpec */
    rl: z
        .union([z.string().min(1), RLSpecSchema])
        .transform((v): RLSpec => (typeof v === 'string' ? { name: v } : v)),
    seed: z.number().int().nonnegative().default(0),
    /** Environment steps between trainer calls */
    trainInterval: z.number().int().positive().default(1),
    invalidActionRetries: z.number().int().nonnegative().default(DEFAULT_INVALID_ACTION_RETRIES),
    /** Overrides the algorithm's memory capacity */
    memoryCapacity: z.number().int().positive().optional(),
    logSteps: z.boolean().default(false),
    /** Name used in log entries (default `<env>/<algorithm>`) */
    task: z.string().min(1).optional(),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>;

/**
 * Who plays a seat: the learning worker, a uniform random worker,
 * a worker shipped by the environment (by name), or any Worker
 */
export type PlayerSpec = 'rl' | 'random' | string | Worker;

export interface RunnerDeps {
    envRegistry: EnvRegistry;
    rlRegistry: RLRegistry;
    /** Default: console logger at info level */
    logger?: Logger;
}

export interface RunReport {
    mode: 'train' | 'evaluate';
    totalEpisodes: number;
    totalSteps: number;
    /** Mean episode reward per player */
    avgEpisodeRewards: number[];
    avgEpisodeLength: number;
    trainCount: number;
    episodes: EpisodeResult[];
}

// ==================== Runner Class ====================

export class Runner {
    readonly config: RunnerConfig;
    readonly envConfig: EnvConfig;
    readonly rlConfig: RLConfig;
    readonly env: EnvRun;
    readonly parameter: RLParameter;
    readonly memory: RLRemoteMemory<unknown>;
    readonly trainer: RLTrainer;

    private readonly rlRegistry: RLRegistry;
    private readonly logger: Logger;
    private readonly task: string;
    private episodeCount = 0;

    constructor(config: RunnerConfigInput, deps: RunnerDeps) {
        this.config = parseWithSchema(RunnerConfigSchema, config, 'RunnerConfig');
        this.rlRegistry = deps.rlRegistry;

        this.envConfig = this.config.env;
        const { name: rlName, ...overrides } = this.config.rl;
        this.task = this.config.task ?? `${this.envConfig.name}/${rlName}`;
        this.logger = deps.logger ?? new ConsoleLogger({ task: this.task, seed: this.config.seed });

        this.env = deps.envRegistry.make({
            ...this.envConfig,
            seed: this.envConfig.seed ?? this.config.seed,
        });
        this.rlConfig = this.rlRegistry.createConfig(rlName, overrides);
        this.parameter = this.rlRegistry.makeParameter(this.rlConfig);
        this.memory = this.rlRegistry.makeRemoteMemory(
            this.rlConfig,
            this.config.memoryCapacity === undefined ? {} : { capacity: this.config.memoryCapacity }
        );
        this.trainer = this.rlRegistry.makeTrainer(this.rlConfig, this.parameter, this.memory);
        // fail on representation problems before the first episode
        this.rlRegistry.makeWorker(this.rlConfig, this.env, this.parameter);
    }

    /**
     * Play `episodes` training episodes. Default players: the learner in
     * seat 0, random workers elsewhere.
     */
    train(episodes: number, players?: readonly PlayerSpec[]): RunReport {
        return this.run('train', episodes, players);
    }

    /**
     * Play without exploration, experience or training
     */
    evaluate(episodes: number, players?: readonly PlayerSpec[]): RunReport {
        return this.run('evaluate', episodes, players);
    }

    close(): void {
        this.env.close();
        this.logger.flush();
        this.logger.close();
    }

    // ==================== Internal ====================

    private run(mode: RunReport['mode'], episodes: number, players: readonly PlayerSpec[] = []): RunReport {
        if (!Number.isInteger(episodes) || episodes < 1) {
            throw new ValidationError(`episodes must be a positive integer, got ${episodes}`);
        }
        const training = mode === 'train';
        const runs = this.makeWorkerRuns(players, training);
        const options: PlayOptions = {
            trainer: training ? this.trainer : null,
            trainInterval: this.config.trainInterval,
            invalidActionRetries: this.config.invalidActionRetries,
            logger: this.logger,
            logSteps: this.config.logSteps,
        };

        const results: EpisodeResult[] = [];
        for (let i = 0; i < episodes; i++) {
            results.push(playEpisode(this.env, runs, { ...options, episode: this.episodeCount++ }));
        }

        const totalSteps = results.reduce((sum, r) => sum + r.totalSteps, 0);
        const avgEpisodeRewards = new Array<number>(this.env.playerNum).fill(0).map(
            (_, p) => results.reduce((sum, r) => sum + r.episodeRewards[p], 0) / results.length
        );
        const report: RunReport = {
            mode,
            totalEpisodes: results.length,
            totalSteps,
            avgEpisodeRewards,
            avgEpisodeLength: totalSteps / results.length,
            trainCount: this.trainer.getTrainCount(),
            episodes: results,
        };

        this.logger.logReport({
            mode,
            totalEpisodes: report.totalEpisodes,
            totalSteps: report.totalSteps,
            avgEpisodeRewards: report.avgEpisodeRewards,
            avgEpisodeLength: report.avgEpisodeLength,
            trainCount: report.trainCount,
            config: {
                env: this.envConfig.name,
                rl: this.rlConfig.name,
                seed: this.config.seed,
                hyperparams: this.rlConfig.hyperparams,
            },
        });
        this.logger.flush();
        return report;
    }

    private makeWorkerRuns(players: readonly PlayerSpec[], training: boolean): WorkerRun[] {
        if (players.length > this.env.playerNum) {
            throw new ValidationError(`${this.env.name} has ${this.env.playerNum} players, got ${players.length} specs`);
        }
        const runs: WorkerRun[] = [];
        for (let p = 0; p < this.env.playerNum; p++) {
            const spec = players[p] ?? (p === 0 ? 'rl' : 'random');
            runs.push(new WorkerRun(this.resolveWorker(spec, training), this.env, p, {
                training,
                seed: deriveSeed(this.config.seed, `player:${p}`),
            }));
        }
        return runs;
    }

    private resolveWorker(spec: PlayerSpec, training: boolean): Worker {
        if (typeof spec !== 'string') {
            return spec;
        }
        if (spec === 'rl') {
            return this.rlRegistry.makeWorker(this.rlConfig, this.env, this.parameter, training ? this.memory : null);
        }
        if (spec === 'random') {
            return createRandomWorker();
        }
        const worker = this.env.getOriginalEnv().makeWorker?.(spec) ?? null;
        if (worker === null) {
            throw new RegistryError(ErrorCodes.NOT_REGISTERED, `Worker of ${this.env.name}`, spec);
        }
        return worker;
    }
}
