/**
 * Source of randomness for world setup, forced relocation and opponents.
 */
export interface Random {
    /** A float in [0, 1). */
    next(): number;
}

export function pick<T>(random: Random, values: readonly T[]): T {
    if (values.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
    }
    const index = Math.min(values.length - 1, Math.floor(random.next() * values.length));
    return values[index];
}

/**
 * mulberry32; deterministic for a given seed.
 */
export function createSeededRandom(seed: number): Random {
    let state = seed >>> 0;
    return {
        next(): number {
            state = (state + 0x6d2b79f5) >>> 0;
            let t = state;
            t = Math.imul(t ^ (t >>> 15), t | 1);
            t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
            return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
        }
    };
}

export const mathRandom: Random = {
    next: () => Math.random()
};

export function createRandom(seed?: number): Random {
    return seed === undefined ? mathRandom : createSeededRandom(seed);
}
