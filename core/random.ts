import { random_seed } from '../config.js';

/** Returns a uniform value in [0, 1). */
export type RandomSource = () => number;

/** Deterministic PRNG for reproducible sampling. */
export function mulberry32(seed: number): RandomSource {
    let t = seed >>> 0;
    return () => {
        t += 0x6D2B79F5;
        let x = t;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    };
}

// process-wide; seeded from RANDOM_SEED when present
export const defaultRandom: RandomSource = random_seed === undefined ? Math.random : mulberry32(random_seed);
