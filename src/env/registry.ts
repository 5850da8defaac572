/**
 * @module env/registry
 * @description Explicit environment registry and EnvConfig
 *
 * Registries are plain objects passed to whoever needs them; there is no
 * process-wide registration table.
 */

import { z } from 'zod';
import { JsonValueSchema } from '../core/blob';
import { ErrorCodes, RegistryError } from '../core/errors';
import type { JsonValue } from '../core/repro';
import { parseWithSchema } from '../core/validation';
import type { EnvBase } from './base';
import { EnvRun } from './envRun';

// ==================== EnvConfig ====================

export const EnvConfigSchema = z.object({
    /** Registered environment id */
    name: z.string().min(1),
    /** Constructor arguments, merged over the registered defaults */
    kwargs: z.record(JsonValueSchema).default({}),
    /** Overrides the environment's step limit */
    maxEpisodeSteps: z.number().int().positive().optional(),
    /** Seed of the EnvRun random generator */
    seed: z.number().int().nonnegative().optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;
export type EnvConfigInput = z.input<typeof EnvConfigSchema>;

export type EnvKwargs = Record<string, JsonValue>;

/**
 * Validate and normalize an EnvConfig
 */
export function createEnvConfig(input: EnvConfigInput | string): EnvConfig {
    return parseWithSchema(EnvConfigSchema, typeof input === 'string' ? { name: input } : input, 'EnvConfig');
}

// ==================== Registry ====================

export type EnvFactory = (kwargs: EnvKwargs) => EnvBase;

interface EnvEntry {
    factory: EnvFactory;
    defaultKwargs: EnvKwargs;
}

/**
 * Registry for creating environments by id
 */
export class EnvRegistry {
    private entries: Map<string, EnvEntry> = new Map();

    /**
     * Register an environment factory
     */
    register(id: string, factory: EnvFactory, defaultKwargs: EnvKwargs = {}): this {
        if (this.entries.has(id)) {
            throw new RegistryError(ErrorCodes.ALREADY_REGISTERED, 'Environment', id);
        }
        this.entries.set(id, { factory, defaultKwargs: { ...defaultKwargs } });
        return this;
    }

    has(id: string): boolean {
        return this.entries.has(id);
    }

    /**
     * List all registered environment ids
     */
    list(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Instantiate the bare environment
     */
    create(config: EnvConfigInput | string): EnvBase {
        const parsed = createEnvConfig(config);
        const entry = this.entries.get(parsed.name);
        if (!entry) {
            throw new RegistryError(ErrorCodes.NOT_REGISTERED, 'Environment', parsed.name);
        }
        return entry.factory({ ...entry.defaultKwargs, ...parsed.kwargs });
    }

    /**
     * Instantiate the environment wrapped in an EnvRun
     */
    make(config: EnvConfigInput | string): EnvRun {
        const parsed = createEnvConfig(config);
        return new EnvRun(this.create(parsed), {
            seed: parsed.seed,
            maxEpisodeSteps: parsed.maxEpisodeSteps,
        });
    }
}

/**
 * Create an empty environment registry
 */
export function createEnvRegistry(): EnvRegistry {
    return new EnvRegistry();
}
