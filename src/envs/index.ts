/**
 * @module envs
 * @description Reference environments
 */

import type { EnvRegistry } from '../env/registry';
import { createGrid } from './grid';
import { createOthello } from './othello';

export * from './grid';
export * from './othello';

/**
 * Register Grid, Othello (8x8) and Othello6x6
 */
export function registerBuiltinEnvs(registry: EnvRegistry): EnvRegistry {
    return registry
        .register('Grid', createGrid)
        .register('Othello', createOthello, { W: 8, H: 8 })
        .register('Othello6x6', createOthello, { W: 6, H: 6 });
}
