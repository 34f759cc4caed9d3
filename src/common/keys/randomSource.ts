import { randomFillSync } from 'node:crypto'

export interface RandomSource {
    /** Uniform integer in [0, 2^32). */
    nextUint32: () => number
}

const POOL_WORDS = 64

/**
 * Source backed by the OS entropy pool, refilled in small batches.
 * Each generator owns its own source, so nothing is shared between them.
 */
export const createRandomSource = (): RandomSource => {
    const pool = new Uint32Array(POOL_WORDS)
    let cursor = POOL_WORDS
    return {
        nextUint32: () => {
            if (cursor >= POOL_WORDS) {
                randomFillSync(pool)
                cursor = 0
            }
            return pool[cursor++] ?? 0
        },
    }
}

/**
 * Unbiased integer in [0, bound) by rejection sampling.
 */
export const uniformInt = (source: RandomSource, bound: number): number => {
    if (!Number.isInteger(bound) || bound <= 0 || bound > 0x1_0000_0000) {
        throw new RangeError(`Bound must be an integer in (0, 2^32], got ${bound}`)
    }
    const limit = 0x1_0000_0000 - (0x1_0000_0000 % bound)
    let value = source.nextUint32()
    while (value >= limit) {
        value = source.nextUint32()
    }
    return value % bound
}
