import { v4 as uuidv4 } from 'uuid';
import type { Ray, HitRecord, ScatterResult } from './types';
import type { RandomSource } from './random';

/**
 * Base class for surface materials.
 *
 * A material is shared read-only by every sphere (and every hit record) that
 * references it, so `scatter` must not mutate the material or its inputs.
 * Returning null means the ray was absorbed.
 */
export abstract class Material {
    id: string;
    name: string;

    constructor(name: string = "Unnamed Material") {
        this.id = uuidv4();
        this.name = name;
    }

    abstract scatter(rayIn: Ray, hit: HitRecord, rng: RandomSource): ScatterResult | null;
}
