import { Color } from 'three';
import { Material } from '../Material';
import type { RandomSource } from '../random';
import { Ray, HitRecord, ScatterResult } from '../types';
import { reflectVector } from '../math_solvers';

/**
 * Specular reflector. `fuzz` (clamped to [0, 1]) jitters the mirror
 * direction by a random vector of that length.
 */
export class Metal extends Material {
    albedo: Color;
    fuzz: number;

    constructor(albedo: Color, fuzz: number = 0, name: string = "Metal") {
        super(name);
        this.albedo = albedo.clone();
        this.fuzz = Math.min(Math.max(fuzz, 0), 1);
    }

    scatter(rayIn: Ray, hit: HitRecord, rng: RandomSource): ScatterResult | null {
        const reflected = reflectVector(rayIn.direction, hit.normal)
            .normalize()
            .add(rng.unitVector().multiplyScalar(this.fuzz));

        // Fuzzed below the surface: absorbed
        if (reflected.dot(hit.normal) <= 0) {
            return null;
        }

        return {
            attenuation: this.albedo.clone(),
            scattered: new Ray(hit.point, reflected)
        };
    }
}
