/**
 * @module core/repro
 * @description Reproducibility helpers
 *
 * All randomness in the library goes through a SeededRandom instance that the
 * caller can see: game generation and swap-regret sampling both take a seed
 * parameter, and nothing reads Math.random() except resolveSeed().
 */

// Library version - should match package.json
export const LIBRARY_VERSION = '1.0.0';

// ==================== Browser-compatible Hash ====================

/**
 * Simple hash function that works in both browser and Node.js
 * Uses djb2 algorithm for fast, consistent hashing
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    // Convert to hex string
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Hash a string into 32 hex characters
 */
function createHash(data: string): string {
    // Use multiple rounds for better distribution
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

/**
 * Fingerprint a plain configuration object.
 *
 * Keys are sorted recursively, so two configs with the same content hash
 * equally regardless of property order. Functions and class instances (such
 * as loggers) must be stripped by the caller.
 */
export function computeConfigHash(config: Record<string, unknown>): string {
    return createHash(JSON.stringify(sortObjectKeys(config)));
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
     * Draw an index from a discrete distribution.
     *
     * `probabilities` must be non-negative; it need not sum exactly to 1; the
     * last index with positive mass absorbs rounding error.
     */
    categorical(probabilities: ArrayLike<number>): number {
        let total = 0;
        for (let i = 0; i < probabilities.length; i++) {
            total += probabilities[i];
        }
        const target = this.random() * total;

        let cumulative = 0;
        let lastPositive = 0;
        for (let i = 0; i < probabilities.length; i++) {
            if (probabilities[i] <= 0) continue;
            cumulative += probabilities[i];
            lastPositive = i;
            if (target < cumulative) {
                return i;
            }
        }
        return lastPositive;
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
 * Return `seed` unchanged, or draw a fresh unsigned 32-bit seed when it is
 * omitted. Callers report the returned value so an unseeded run can be
 * replayed.
 */
export function resolveSeed(seed?: number): number {
    if (seed !== undefined) {
        return seed >>> 0;
    }
    return Math.floor(Math.random() * 4294967296) >>> 0;
}

// ==================== Utility Functions ====================

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(value: unknown): unknown {
    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
        sorted[key] = sortObjectKeys(inner);
    }
    return sorted;
}
