/**
 * @module env
 * @description Environment contract, episode driver and registry
 */

export type {
    EnvObservationType,
    EnvInfo,
    EnvResetResult,
    EnvStepResult,
    RgbImage,
    EnvBase,
    EnvSpec,
} from './base';

export { EnvObservationTypes, getEnvSpec } from './base';

export type { DoneReason, EnvRunOptions, EnvRunStepResult } from './envRun';
export { EnvRun } from './envRun';

export type { EnvConfig, EnvConfigInput, EnvKwargs, EnvFactory } from './registry';
export { EnvConfigSchema, createEnvConfig, EnvRegistry, createEnvRegistry } from './registry';
