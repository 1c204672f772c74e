import { Color } from 'three';
import { Material } from '../Material';
import type { RandomSource } from '../random';
import { Ray, HitRecord, ScatterResult } from '../types';
import { nearZero } from '../math_solvers';

/** Ideal diffuse surface. Never absorbs; attenuation is the albedo. */
export class Lambertian extends Material {
    albedo: Color;

    constructor(albedo: Color, name: string = "Lambertian") {
        super(name);
        this.albedo = albedo.clone();
    }

    scatter(_rayIn: Ray, hit: HitRecord, rng: RandomSource): ScatterResult {
        // normal + unit vector gives a cosine-weighted direction
        let direction = hit.normal.clone().add(rng.unitVector());

        // The sample can cancel the normal exactly
        if (nearZero(direction)) {
            direction = hit.normal.clone();
        }

        return {
            attenuation: this.albedo.clone(),
            scattered: new Ray(hit.point, direction)
        };
    }
}
