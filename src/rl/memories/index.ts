/**
 * @module rl/memories
 * @description Bundled experience stores
 */

export { SequenceMemory } from './sequence';
export { ReplayMemory } from './replay';
export type { RankBasedMemoryOptions, RankedSample } from './rankBased';
export { RankBasedMemory, rankSum, rankSumInverse } from './rankBased';
