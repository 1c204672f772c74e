import { Color } from 'three';
import { Material } from '../Material';
import type { RandomSource } from '../random';
import { Ray, HitRecord, ScatterResult } from '../types';
import { reflectVector, refractVector, schlickReflectance } from '../math_solvers';

/**
 * Clear refractive material (glass, water, air bubbles).
 *
 * Each interaction either reflects or refracts, never both: reflection is
 * forced under total internal reflection, otherwise chosen with probability
 * given by Schlick's approximation. Nothing is absorbed.
 *
 * An index below 1 models a less dense medium inside a denser one
 * (e.g. 1/1.5 for an air bubble inside glass).
 */
export class Dielectric extends Material {
    refractionIndex: number;

    constructor(refractionIndex: number, name: string = "Dielectric") {
        super(name);
        if (!(refractionIndex > 0) || !Number.isFinite(refractionIndex)) {
            throw new RangeError(`Dielectric: refractionIndex must be positive and finite, got ${refractionIndex}`);
        }
        this.refractionIndex = refractionIndex;
    }

    scatter(rayIn: Ray, hit: HitRecord, rng: RandomSource): ScatterResult {
        // Entering: n_outside / n_inside with the outside taken as vacuum
        const ri = hit.frontFace ? 1.0 / this.refractionIndex : this.refractionIndex;

        const unitDirection = rayIn.direction.clone().normalize();
        const cosTheta = Math.min(-unitDirection.dot(hit.normal), 1.0);
        const sinTheta = Math.sqrt(1.0 - cosTheta * cosTheta);

        const cannotRefract = ri * sinTheta > 1.0;

        const direction = cannotRefract || schlickReflectance(cosTheta, ri) > rng.random()
            ? reflectVector(unitDirection, hit.normal)
            : refractVector(unitDirection, hit.normal, ri);

        return {
            attenuation: new Color(1.0, 1.0, 1.0),
            scattered: new Ray(hit.point, direction)
        };
    }
}
