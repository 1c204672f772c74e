import { Color, Vector3 } from 'three';
import { DegenerateRayError } from '../errors';
import type { Material } from './Material';

// --- Coordinate System ---
// World space: right-handed, Y-up. The default camera looks down -Z.
// Colors are linear RGB; gamma is applied only when an image is encoded.

/**
 * Parametric ray P(t) = origin + t * direction.
 *
 * Immutable: both vectors are copied in and never mutated afterwards. The
 * direction is NOT normalized; the sphere quadratic divides by its squared
 * length, so a zero-length direction is rejected here.
 */
export class Ray {
    readonly origin: Vector3;
    readonly direction: Vector3;

    constructor(origin: Vector3, direction: Vector3) {
        const lengthSq = direction.lengthSq();
        if (!(lengthSq > 0) || !Number.isFinite(lengthSq)) {
            throw new DegenerateRayError(
                `Ray direction must be finite and non-zero, got (${direction.x}, ${direction.y}, ${direction.z})`
            );
        }
        if (!Number.isFinite(origin.x) || !Number.isFinite(origin.y) || !Number.isFinite(origin.z)) {
            throw new DegenerateRayError(
                `Ray origin must be finite, got (${origin.x}, ${origin.y}, ${origin.z})`
            );
        }
        this.origin = origin.clone();
        this.direction = direction.clone();
    }

    at(t: number): Vector3 {
        return this.origin.clone().addScaledVector(this.direction, t);
    }
}

export interface HitRecord {
    t: number;          // Ray parameter of the hit
    point: Vector3;     // World hit point
    normal: Vector3;    // Unit normal, always facing against the incoming ray
    frontFace: boolean; // True when the ray arrived from the outward-normal side
    material: Material;
}

/** Outcome of a surface interaction that was not absorbed. */
export interface ScatterResult {
    attenuation: Color;
    scattered: Ray;
}

/**
 * Orients a surface normal against the incoming ray.
 * `outwardNormal` must be unit length.
 */
export function faceNormal(ray: Ray, outwardNormal: Vector3): { normal: Vector3; frontFace: boolean } {
    const frontFace = ray.direction.dot(outwardNormal) < 0;
    return {
        frontFace,
        normal: frontFace ? outwardNormal.clone() : outwardNormal.clone().negate()
    };
}
