import { Vector3 } from 'three';

/**
 * Source of randomness for scattering and camera sampling.
 *
 * Materials and the camera never call Math.random directly; a renderer owns
 * one source, so a seeded source gives reproducible images and tests can
 * substitute fixed values.
 */
export interface RandomSource {
    /** Uniform in [0, 1). */
    random(): number;
    /** Uniformly distributed on the unit sphere. */
    unitVector(): Vector3;
    /** Uniform inside the unit disk in the XY plane (z = 0). */
    inUnitDisk(): Vector3;
}

export function createRandomSource(next: () => number = Math.random): RandomSource {
    return {
        random: next,

        // Same construction as three's Vector3.randomDirection, fed from `next`
        unitVector(): Vector3 {
            const theta = next() * Math.PI * 2;
            const u = next() * 2 - 1;
            const c = Math.sqrt(1 - u * u);
            return new Vector3(c * Math.cos(theta), u, c * Math.sin(theta));
        },

        inUnitDisk(): Vector3 {
            for (;;) {
                const p = new Vector3(next() * 2 - 1, next() * 2 - 1, 0);
                if (p.lengthSq() < 1) return p;
            }
        }
    };
}

/** Mulberry32 generator (the algorithm behind three's MathUtils.seededRandom), without global state. */
export function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        let t = (state = (state + 0x6D2B79F5) | 0);
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function createSeededRandom(seed: number): RandomSource {
    return createRandomSource(mulberry32(seed));
}
