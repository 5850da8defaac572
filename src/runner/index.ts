/**
 * @module runner
 * @description Episode loop and training/evaluation runner
 */

export type { PlayOptions, EpisodeResult } from './play';
export { DEFAULT_INVALID_ACTION_RETRIES, playEpisode } from './play';

export type { RLSpec, RunnerConfig, RunnerConfigInput, PlayerSpec, RunnerDeps, RunReport } from './runner';
export { RunnerConfigSchema, Runner } from './runner';
