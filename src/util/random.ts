/**
 * Seeded randomness for model selection and sequencer values.
 */

export type Rng = () => number

/**
 * Mulberry32 seeded PRNG.
 * Produces deterministic () => number from a seed.
 */
export function createRng(seed: number): Rng {
    let t = seed | 0
    return () => {
        t = (t + 0x6D2B79F5) | 0
        let v = t
        v = Math.imul(v ^ (v >>> 15), v | 1)
        v ^= v + Math.imul(v ^ (v >>> 7), v | 61)
        return ((v ^ (v >>> 14)) >>> 0) / 4294967296
    }
}

/** Seeded when a seed is given, otherwise Math.random */
export function rngFromSeed(seed?: number): Rng {
    return seed === undefined ? Math.random : createRng(seed)
}

/** Uniform value in [min, max) */
export function uniform(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min)
}

/** Uniform pick from a non-empty list */
export function pick<T>(items: readonly T[], rng: Rng): T {
    if (items.length === 0) {
        throw new RangeError('pick() needs at least one item')
    }
    const i = Math.min(Math.floor(rng() * items.length), items.length - 1)
    return items[i]
}
