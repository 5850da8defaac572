/**
 * @module algorithms
 * @description Bundled algorithm modules
 */

import type { RLRegistry } from '../rl/registry';
import { qlModule } from './ql';

export * as ql from './ql';
export { qlModule } from './ql';

/**
 * Register every bundled algorithm
 */
export function registerBuiltinAlgorithms(registry: RLRegistry): RLRegistry {
    return registry.register(qlModule);
}
