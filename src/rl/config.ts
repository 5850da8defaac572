/**
 * @module rl/config
 * @description Algorithm configuration shared by workers, parameters, memories and trainers
 *
 * An RLConfig is immutable once built. Changes produce a new config
 * (withHyperparams), and processes exchange configs by value through
 * serializeRLConfig/deserializeRLConfig.
 */

import { z } from 'zod';
import { JsonValueSchema } from '../core/blob';
import { ValidationError } from '../core/errors';
import { canonicalJson, hashString, type JsonValue } from '../core/repro';
import type { SpaceValue } from '../core/space';
import { parseWithSchema } from '../core/validation';

// ==================== RL Types ====================

/**
 * Representation an algorithm expects for actions or observations
 */
export const RLTypes = {
    /** Use the environment's native representation unchanged */
    ANY: 'ANY',
    DISCRETE: 'DISCRETE',
    CONTINUOUS: 'CONTINUOUS',
} as const;

export type RLType = (typeof RLTypes)[keyof typeof RLTypes];

/**
 * Action value in an algorithm's representation
 */
export type RLAction<T extends RLType> =
    T extends 'DISCRETE' ? number :
    T extends 'CONTINUOUS' ? number[] :
    SpaceValue;

/**
 * Observation value in an algorithm's representation
 * (DISCRETE observations are zero-based per-dimension indices)
 */
export type RLObservation<T extends RLType> =
    T extends 'DISCRETE' ? number[] :
    T extends 'CONTINUOUS' ? number[] :
    SpaceValue;

export type Hyperparams = Record<string, JsonValue>;

// ==================== RLConfig ====================

export const DEFAULT_ACTION_DIVISION_NUM = 5;
export const DEFAULT_OBSERVATION_DIVISION_NUM = 10;

const RLTypeSchema = z.enum([RLTypes.ANY, RLTypes.DISCRETE, RLTypes.CONTINUOUS]);

export const RLConfigSchema = z.object({
    /** Algorithm id */
    name: z.string().min(1),
    actionType: RLTypeSchema.default(RLTypes.ANY),
    observationType: RLTypeSchema.default(RLTypes.ANY),
    /** Bins per continuous action dimension when a DISCRETE view is needed */
    actionDivisionNum: z.number().int().positive().default(DEFAULT_ACTION_DIVISION_NUM),
    /** Bins per continuous observation dimension when a DISCRETE view is needed */
    observationDivisionNum: z.number().int().positive().default(DEFAULT_OBSERVATION_DIVISION_NUM),
    /** Algorithm specific settings */
    hyperparams: z.record(JsonValueSchema).default({}),
});

export type RLConfigInput = z.input<typeof RLConfigSchema>;

export interface RLConfig {
    readonly name: string;
    readonly actionType: RLType;
    readonly observationType: RLType;
    readonly actionDivisionNum: number;
    readonly observationDivisionNum: number;
    readonly hyperparams: Readonly<Hyperparams>;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Validate, fill defaults and freeze
 */
export function createRLConfig(input: RLConfigInput): RLConfig {
    const parsed = parseWithSchema(RLConfigSchema, input, 'RLConfig');
    return deepFreeze({
        name: parsed.name,
        actionType: parsed.actionType,
        observationType: parsed.observationType,
        actionDivisionNum: parsed.actionDivisionNum,
        observationDivisionNum: parsed.observationDivisionNum,
        hyperparams: parsed.hyperparams,
    });
}

/**
 * New config with some hyperparameters replaced
 */
export function withHyperparams(config: RLConfig, patch: Hyperparams): RLConfig {
    return createRLConfig({
        ...config,
        hyperparams: { ...config.hyperparams, ...patch },
    });
}

// ==================== Serialization ====================

/**
 * Canonical JSON (sorted keys)
 */
export function serializeRLConfig(config: RLConfig): string {
    return canonicalJson(config);
}

export function deserializeRLConfig(json: string): RLConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new ValidationError('RLConfig is not valid JSON', {
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    return createRLConfig(parseWithSchema(RLConfigSchema.strict(), raw, 'RLConfig'));
}

/**
 * Stable hash of every field; used as the compatibility context of parameter blobs
 */
export function computeRLConfigHash(config: RLConfig): string {
    return hashString(serializeRLConfig(config));
}
