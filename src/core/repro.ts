/**
 * @module core/repro
 * @description Reproducibility primitives
 *
 * Seeded random generation, canonical JSON and stable hashing. Every random
 * decision in the framework draws from a SeededRandom whose state can be
 * captured in a backup, so a restored run replays the same continuation.
 */

/** Library version recorded in blob headers and run metadata */
export const CORE_VERSION = '0.1.0';

// ==================== Types ====================

/**
 * JSON-compatible value. Environment snapshots and blob payloads are built from these.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

// ==================== Hashing ====================

/**
 * djb2 hash of a string, as 8 hex characters
 */
export function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * 32 hex character hash built from several djb2 rounds
 */
export function hashString(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

/**
 * Sort object keys recursively for deterministic serialization
 */
export function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = sortObjectKeys(value);
    }
    return sorted;
}

/**
 * JSON with sorted keys. Non-finite numbers are written as strings
 * so that bounds like Infinity survive hashing.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortObjectKeys(value), (_key, v: unknown) => {
        if (typeof v === 'number' && !Number.isFinite(v)) {
            return String(v);
        }
        return v;
    });
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random integer in [min, max)
     */
    randint(min: number, max: number): number {
        return Math.floor(this.random() * (max - min)) + min;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller; 1 - u keeps the log argument in (0, 1]
        const u1 = 1 - this.random();
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }

    /**
     * Pick one element uniformly. The array must not be empty.
     */
    choice<T>(array: readonly T[]): T {
        return array[this.randint(0, array.length)];
    }

    /**
     * Shuffle an array in place
     */
    shuffle<T>(array: T[]): T[] {
        for (let i = array.length - 1; i > 0; i--) {
            const j = this.randint(0, i + 1);
            [array[i], array[j]] = [array[j], array[i]];
        }
        return array;
    }

    /**
     * Choose n random elements from an array
     */
    sample<T>(array: readonly T[], n: number): T[] {
        const shuffled = [...array];
        this.shuffle(shuffled);
        return shuffled.slice(0, n);
    }

    /**
     * Get the current state (for saving/restoring)
     */
    getState(): number {
        return this.state;
    }

    /**
     * Set the state (for restoring)
     */
    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

/**
 * Derive an independent seed for a sub-component (worker i, actor i, ...)
 */
export function deriveSeed(seed: number, stream: number | string): number {
    return parseInt(simpleHash(`${seed >>> 0}:${stream}`), 16);
}
