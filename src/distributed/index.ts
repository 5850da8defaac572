/**
 * @module distributed
 * @description Learner/actor synchronization over pluggable transports
 */

export * from './transport';
export * from './memory';
export * from './protocol';
export * from './actor';
export * from './learner';
