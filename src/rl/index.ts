/**
 * @module rl
 * @description Algorithm-side framework: config, adapters, workers and checkpointable state
 */

// ==================== Config ====================

export type { RLType, RLAction, RLObservation, Hyperparams, RLConfigInput, RLConfig } from './config';

export {
    RLTypes,
    DEFAULT_ACTION_DIVISION_NUM,
    DEFAULT_OBSERVATION_DIVISION_NUM,
    RLConfigSchema,
    createRLConfig,
    withHyperparams,
    serializeRLConfig,
    deserializeRLConfig,
    computeRLConfigHash,
} from './config';

// ==================== Space Adapter ====================

export { MAX_DISCRETE_ACTIONS, SpaceAdapter, createSpaceAdapter } from './spaceAdapter';

// ==================== Workers ====================

export type {
    WorkerRunView,
    Worker,
    RulePolicy,
    RuleHooks,
    WorkerExtension,
    RLWorkerContext,
    RLWorkerHooks,
    RLWorkerHooksFactory,
} from './worker';

export {
    RuleBaseWorker,
    createRandomWorker,
    createConstantWorker,
    ExtendWorker,
    RLWorker,
} from './worker';

export type { WorkerPhase, WorkerRunOptions } from './workerRun';
export { WorkerRun } from './workerRun';

// ==================== State ====================

export { RLParameter } from './parameter';

export type { ExperienceItem, MemoryOptions, MergeResult } from './memory';
export { DEFAULT_MEMORY_CAPACITY, RLRemoteMemory, generateIncarnation } from './memory';

export * from './memories';

export type { TrainInfo, TrainOutcome } from './trainer';
export { RLTrainer } from './trainer';

// ==================== Registry ====================

export type { AlgorithmModule, RLConfigOverrides } from './registry';
export { RLRegistry, createRLRegistry } from './registry';
