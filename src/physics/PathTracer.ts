import { Color } from 'three';
import type { Hittable } from './Component';
import { Interval } from './Interval';
import { createRandomSource, RandomSource } from './random';
import type { Ray } from './types';

/** Minimum hit distance; hides self-intersection ("shadow acne") from round-off at the surface. */
export const SHADOW_ACNE_BIAS = 1e-4;

const WHITE = new Color(1.0, 1.0, 1.0);
const SKY_BLUE = new Color(0.5, 0.7, 1.0);

/** Vertical white-to-sky gradient seen by rays that escape the scene. */
export function backgroundColor(ray: Ray): Color {
    const unitDirection = ray.direction.clone().normalize();
    const a = 0.5 * (unitDirection.y + 1.0);
    return new Color().lerpColors(WHITE, SKY_BLUE, a);
}

/**
 * Recursive shading engine.
 *
 * Each bounce multiplies the material's attenuation into the color carried
 * back from the scattered ray. The recursion ends at a miss (sky), an
 * absorption (black) or when the depth budget runs out (black).
 */
export class PathTracer {
    world: Hittable;
    maxDepth: number;
    rng: RandomSource;

    constructor(world: Hittable, maxDepth: number = 10, rng: RandomSource = createRandomSource()) {
        this.world = world;
        this.maxDepth = maxDepth;
        this.rng = rng;
    }

    rayColor(ray: Ray, depth: number = this.maxDepth): Color {
        if (depth <= 0) {
            return new Color(0, 0, 0);
        }

        const hit = this.world.hit(ray, new Interval(SHADOW_ACNE_BIAS, Infinity));
        if (!hit) {
            return backgroundColor(ray);
        }

        const result = hit.material.scatter(ray, hit, this.rng);
        if (!result) {
            return new Color(0, 0, 0);
        }

        return result.attenuation.clone().multiply(this.rayColor(result.scattered, depth - 1));
    }
}
