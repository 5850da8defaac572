/**
 * @packageDocumentation
 * @module rlbridge
 *
 * rlbridge: reinforcement learning core
 *
 * Environments and algorithms are written against small contracts and
 * connected through adapters that convert between their representations.
 * Parameters, memories and environment runs back up to self-describing
 * blobs, which is also how learners and actors exchange state.
 *
 * ## Modules
 * - `core` - Spaces, conversion, blobs, logging, seeded RNG, errors
 * - `env` - EnvBase contract, EnvRun episode driver, EnvRegistry
 * - `rl` - RLConfig, SpaceAdapter, workers, parameter/memory/trainer bases, RLRegistry
 * - `distributed` - Learner/actor synchronization over transports
 * - `runner` - Episode loop, training and evaluation
 * - `algorithms` - Bundled algorithms (ql)
 * - `envs` - Reference environments (Grid, Othello)
 *
 * ## Usage Example
 * ```typescript
 * import { env, rl, runner, algorithms, envs } from 'rlbridge';
 *
 * const envRegistry = envs.registerBuiltinEnvs(env.createEnvRegistry());
 * const rlRegistry = algorithms.registerBuiltinAlgorithms(rl.createRLRegistry());
 *
 * const run = new runner.Runner({ env: 'Grid', rl: 'ql', seed: 1 }, { envRegistry, rlRegistry });
 * run.train(200);
 * const report = run.evaluate(10);
 * ```
 */

export * as core from './src/core';
export * as env from './src/env';
export * as rl from './src/rl';
export * as distributed from './src/distributed';
export * as runner from './src/runner';
export * as algorithms from './src/algorithms';
export * as envs from './src/envs';

export { CORE_VERSION as VERSION } from './src/core/repro';
