#!/usr/bin/env npx tsx
/**
 * @module benchmarks/grid-ql/simple-example
 * @description Q-learning on Grid, plus a one-actor learner/actor round trip
 *
 * This example shows how to:
 * 1. Build registries and a Runner
 * 2. Train and evaluate against a random baseline
 * 3. Ship experience and parameters over an in-memory transport
 *
 * Usage:
 *   npx tsx benchmarks/grid-ql/simple-example.ts
 */

import { registerBuiltinAlgorithms } from '../../src/algorithms';
import { ConsoleLogger } from '../../src/core/logging';
import { createEnvRegistry } from '../../src/env/registry';
import { registerBuiltinEnvs } from '../../src/envs';
import { ActorSync, InMemoryTransport, LearnerSync } from '../../src/distributed';
import { createRLRegistry } from '../../src/rl/registry';
import { WorkerRun } from '../../src/rl/workerRun';
import { playEpisode } from '../../src/runner/play';
import { Runner } from '../../src/runner/runner';

// ==========================================
// Configuration
// ==========================================

const SEED = 42;
const TRAIN_EPISODES = 300;
const EVAL_EPISODES = 20;

function flush(): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, 0));
}

// ==========================================
// Single process
// ==========================================

function runLocal(): void {
    const envRegistry = registerBuiltinEnvs(createEnvRegistry());
    const rlRegistry = registerBuiltinAlgorithms(createRLRegistry());
    const logger = new ConsoleLogger({ task: 'Grid/ql', seed: SEED, level: 'warn' });

    const runner = new Runner(
        { env: 'Grid', rl: { name: 'ql', hyperparams: { epsilon: 0.2 } }, seed: SEED },
        { envRegistry, rlRegistry, logger }
    );

    const baseline = runner.evaluate(EVAL_EPISODES, ['random']);
    const trained = runner.train(TRAIN_EPISODES);
    const greedy = runner.evaluate(EVAL_EPISODES);

    console.log('Comparison Table:');
    console.log('='.repeat(56));
    console.log('| Phase           | Avg reward | Avg length | Trains  |');
    console.log('|-----------------|------------|------------|---------|');
    for (const [name, r] of [['random', baseline], ['ql (training)', trained], ['ql (greedy)', greedy]] as const) {
        console.log(
            `| ${name.padEnd(15)} | ${r.avgEpisodeRewards[0].toFixed(3).padStart(10)} | ` +
            `${r.avgEpisodeLength.toFixed(1).padStart(10)} | ${String(r.trainCount).padStart(7)} |`
        );
    }
    console.log('='.repeat(56));
    console.log(runner.parameter.summary());
    runner.close();
}

// ==========================================
// Learner + one actor
// ==========================================

async function runDistributed(): Promise<void> {
    const envRegistry = registerBuiltinEnvs(createEnvRegistry());
    const rlRegistry = registerBuiltinAlgorithms(createRLRegistry());
    const config = rlRegistry.createConfig('ql');

    const learnerParameter = rlRegistry.makeParameter(config);
    const learnerMemory = rlRegistry.makeRemoteMemory(config, { originId: 'learner' });
    const trainer = rlRegistry.makeTrainer(config, learnerParameter, learnerMemory);

    const actorEnv = envRegistry.make({ name: 'Grid', seed: SEED });
    const actorParameter = rlRegistry.makeParameter(config);
    const actorMemory = rlRegistry.makeRemoteMemory(config, { originId: 'actor-0', trackOutgoing: true });
    const worker = rlRegistry.makeWorker(config, actorEnv, actorParameter, actorMemory);
    const run = new WorkerRun(worker, actorEnv, 0, { training: true, seed: SEED });

    const [actorSide, learnerSide] = InMemoryTransport.createPair({ names: ['actor-0', 'learner'] });
    const learner = new LearnerSync(learnerMemory).attach(learnerSide);
    const actor = new ActorSync(actorSide, { actorId: 'actor-0' });
    await actorSide.connect();
    await learnerSide.connect();

    for (let round = 0; round < 20; round++) {
        for (let e = 0; e < 5; e++) {
            playEpisode(actorEnv, [run], { episode: round * 5 + e });
        }
        actor.sendExperience(actorMemory);
        await flush();

        let outcome = trainer.tryTrain();
        while (outcome.trained) {
            outcome = trainer.tryTrain();
        }
        learner.publishParameter(learnerParameter);
        await flush();
        actor.applyLatestParameter(actorParameter);
    }

    const stats = learner.getStats();
    console.log(`\nLearner: trains=${trainer.getTrainCount()}, accepted=${stats.accepted}, duplicates=${stats.duplicates}`);
    console.log(`Actor: latest parameter seq=${actor.latestSeq}`);
    actor.close();
    learner.close();
}

// ==========================================
// Main
// ==========================================

async function main(): Promise<void> {
    console.log('');
    console.log('============================================================');
    console.log('     Grid / Q-learning - Simple Example                     ');
    console.log('============================================================');
    console.log('');

    runLocal();
    await runDistributed();

    console.log('\n[OK] Example completed!');
}

main().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
