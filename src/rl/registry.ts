/**
 * @module rl/registry
 * @description Explicit registry of algorithm modules
 *
 * An algorithm plugs in by registering an AlgorithmModule: its default
 * configuration and factories for parameter, memory, trainer and worker
 * hooks. The registry checks that every component belongs to the algorithm
 * named by the RLConfig.
 */

import { ErrorCodes, RegistryError, TypeIncompatibilityError } from '../core/errors';
import type { EnvSpec } from '../env/base';
import type { EnvRun } from '../env/envRun';
import { createRLConfig, type Hyperparams, type RLConfig, type RLConfigInput, type RLType } from './config';
import type { MemoryOptions, RLRemoteMemory } from './memory';
import type { RLParameter } from './parameter';
import type { SpaceAdapter } from './spaceAdapter';
import type { RLTrainer } from './trainer';
import { RLWorker, type RLWorkerHooks } from './worker';

// ==================== Types ====================

/**
 * Everything the framework needs from an algorithm
 */
export interface AlgorithmModule {
    readonly name: string;
    readonly actionType: RLType;
    readonly observationType: RLType;
    readonly defaultHyperparams: Hyperparams;

    createParameter(config: RLConfig): RLParameter;
    createRemoteMemory(config: RLConfig, options: MemoryOptions): RLRemoteMemory<unknown>;
    createTrainer(config: RLConfig, parameter: RLParameter, memory: RLRemoteMemory<unknown>): RLTrainer;
    /**
     * Algorithm hooks for one worker. `memory` is null when the worker only evaluates.
     */
    createWorkerHooks(
        config: RLConfig,
        parameter: RLParameter,
        memory: RLRemoteMemory<unknown> | null,
        adapter: SpaceAdapter
    ): RLWorkerHooks;
}

/** RLConfig fields a caller may override when building from a module's defaults */
export type RLConfigOverrides = Partial<Omit<RLConfigInput, 'name' | 'actionType' | 'observationType'>>;

// ==================== Registry ====================

/**
 * Registry for algorithm modules
 */
export class RLRegistry {
    private modules: Map<string, AlgorithmModule> = new Map();

    /**
     * Register an algorithm module
     */
    register(module: AlgorithmModule): this {
        if (this.modules.has(module.name)) {
            throw new RegistryError(ErrorCodes.ALREADY_REGISTERED, 'Algorithm', module.name);
        }
        this.modules.set(module.name, module);
        return this;
    }

    has(name: string): boolean {
        return this.modules.has(name);
    }

    /**
     * List all registered algorithm names
     */
    list(): string[] {
        return Array.from(this.modules.keys());
    }

    get(name: string): AlgorithmModule {
        const module = this.modules.get(name);
        if (!module) {
            throw new RegistryError(ErrorCodes.NOT_REGISTERED, 'Algorithm', name);
        }
        return module;
    }

    /**
     * Build a config from the module's defaults; hyperparams are merged
     */
    createConfig(name: string, overrides: RLConfigOverrides = {}): RLConfig {
        const module = this.get(name);
        return createRLConfig({
            ...overrides,
            name,
            actionType: module.actionType,
            observationType: module.observationType,
            hyperparams: { ...module.defaultHyperparams, ...(overrides.hyperparams ?? {}) },
        });
    }

    makeParameter(config: RLConfig): RLParameter {
        return this.moduleFor(config).createParameter(config);
    }

    makeRemoteMemory(config: RLConfig, options: MemoryOptions = {}): RLRemoteMemory<unknown> {
        return this.moduleFor(config).createRemoteMemory(config, options);
    }

    makeTrainer(config: RLConfig, parameter: RLParameter, memory: RLRemoteMemory<unknown>): RLTrainer {
        const module = this.moduleFor(config);
        this.assertSameAlgorithm(config, parameter.config, 'parameter');
        this.assertSameAlgorithm(config, memory.config, 'memory');
        return module.createTrainer(config, parameter, memory);
    }

    /**
     * Build an RLWorker for an environment. Representation problems
     * (e.g. DISCRETE over an unbounded space) are raised here.
     */
    makeWorker(
        config: RLConfig,
        env: EnvSpec | EnvRun,
        parameter: RLParameter,
        memory: RLRemoteMemory<unknown> | null = null
    ): RLWorker {
        const module = this.moduleFor(config);
        this.assertSameAlgorithm(config, parameter.config, 'parameter');
        if (memory) {
            this.assertSameAlgorithm(config, memory.config, 'memory');
        }
        return new RLWorker(config, parameter, memory, env, adapter =>
            module.createWorkerHooks(config, parameter, memory, adapter)
        );
    }

    private moduleFor(config: RLConfig): AlgorithmModule {
        const module = this.get(config.name);
        if (module.actionType !== config.actionType || module.observationType !== config.observationType) {
            throw new TypeIncompatibilityError(
                `Config for '${config.name}' declares ${config.actionType}/${config.observationType}, ` +
                `algorithm expects ${module.actionType}/${module.observationType}`
            );
        }
        return module;
    }

    private assertSameAlgorithm(config: RLConfig, other: RLConfig, what: string): void {
        if (other.name !== config.name) {
            throw new TypeIncompatibilityError(`${what} belongs to '${other.name}', config is '${config.name}'`);
        }
    }
}

/**
 * Create an empty algorithm registry
 */
export function createRLRegistry(): RLRegistry {
    return new RLRegistry();
}
