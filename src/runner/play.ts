/**
 * @module runner/play
 * @description One episode: reset, then policy -> step -> onStep per turn
 *
 * A worker's onStep runs when its turn comes round again (or at episode end),
 * so the reward it sees covers everything that happened in between,
 * including the other players' moves.
 */

import { InvalidActionError, ValidationError } from '../core/errors';
import type { Logger } from '../core/logging';
import type { SpaceValue } from '../core/space';
import type { DoneReason, EnvRun } from '../env/envRun';
import type { RLTrainer } from '../rl/trainer';
import type { WorkerRun } from '../rl/workerRun';

export const DEFAULT_INVALID_ACTION_RETRIES = 3;

export interface PlayOptions {
    /** Episode number used in log entries */
    episode?: number;
    /** Trained after every `trainInterval` environment steps */
    trainer?: RLTrainer | null;
    trainInterval?: number;
    /** Extra policy() calls allowed per turn after an invalid action */
    invalidActionRetries?: number;
    logger?: Logger | null;
    /** Log every step (episode summaries are always logged) */
    logSteps?: boolean;
    /** Called after each environment step */
    onStep?: (env: EnvRun, action: SpaceValue, playerIndex: number) => void;
}

export interface EpisodeResult {
    episode: number;
    totalSteps: number;
    episodeRewards: number[];
    doneReason: DoneReason;
    /** Trainer steps completed during the episode */
    trainSteps: number;
    /** Training attempts skipped for lack of data */
    trainSkipped: number;
    invalidActions: number;
}

interface RejectedAction {
    action: SpaceValue;
    attempt: number;
}

/**
 * Ask the worker for actions until the environment accepts one
 */
function act(
    env: EnvRun,
    run: WorkerRun,
    retries: number,
    onRejected: (rejected: RejectedAction) => void
): SpaceValue {
    for (let attempt = 0; ; attempt++) {
        const action = run.policy();
        try {
            env.step(action, run.playerIndex);
            return action;
        } catch (error) {
            run.rejectAction();
            if (!(error instanceof InvalidActionError) || attempt >= retries) {
                throw error;
            }
            onRejected({ action, attempt });
        }
    }
}

/**
 * Play one episode with one WorkerRun per player (workers[i] plays player i)
 *
 * @throws {InvalidActionError} a worker exceeded its retry budget; the
 *   episode is left at the state before the rejected action
 */
export function playEpisode(env: EnvRun, workers: readonly WorkerRun[], options: PlayOptions = {}): EpisodeResult {
    if (workers.length !== env.playerNum) {
        throw new ValidationError(`${env.name} needs ${env.playerNum} workers, got ${workers.length}`);
    }
    workers.forEach((run, i) => {
        if (run.playerIndex !== i || run.env !== env) {
            throw new ValidationError(`Worker ${i} is bound to player ${run.playerIndex} of another run`);
        }
    });

    const episode = options.episode ?? 0;
    const trainer = options.trainer ?? null;
    const trainInterval = options.trainInterval ?? 1;
    const retries = options.invalidActionRetries ?? DEFAULT_INVALID_ACTION_RETRIES;
    const logger = options.logger ?? null;

    let trainSteps = 0;
    let trainSkipped = 0;
    let invalidActions = 0;

    env.reset();
    for (const run of workers) {
        run.onReset();
    }

    while (!env.done) {
        const playerIndex = env.nextPlayerIndex;
        const run = workers[playerIndex];
        if (run.isPending) {
            run.onStep();
        }

        const action = act(env, run, retries, rejected => {
            invalidActions++;
            logger?.logEvent({
                level: 'warn',
                source: run.worker.name,
                message: `Invalid action ${env.actionToString(rejected.action)} ` +
                    `(attempt ${rejected.attempt + 1} of ${retries + 1})`,
                data: { episode, step: env.stepNum, playerIndex },
            });
        });

        for (const other of workers) {
            other.observe();
        }

        if (options.logSteps) {
            logger?.logStep({
                episode,
                step: env.stepNum,
                playerIndex,
                action,
                rewards: [...env.stepRewards],
                done: env.done,
                info: Object.keys(env.info).length > 0 ? { ...env.info } : undefined,
            });
        }
        options.onStep?.(env, action, playerIndex);

        if (trainer && env.stepNum % trainInterval === 0) {
            const outcome = trainer.tryTrain();
            if (outcome.trained) trainSteps++;
            else trainSkipped++;
        }
    }

    for (const run of workers) {
        if (run.isPending) {
            run.onStep();
        }
    }

    const result: EpisodeResult = {
        episode,
        totalSteps: env.stepNum,
        episodeRewards: [...env.episodeRewards],
        doneReason: env.doneReason,
        trainSteps,
        trainSkipped,
        invalidActions,
    };

    logger?.logEpisode({
        episode,
        totalSteps: result.totalSteps,
        episodeRewards: result.episodeRewards,
        doneReason: result.doneReason,
        trainCount: trainer?.getTrainCount() ?? 0,
    });

    return result;
}
