import { Vector3 } from 'three';

/** Components smaller than this count as zero when checking scatter directions. */
export const NEAR_ZERO_EPSILON = 1e-8;

/**
 * Mirror reflection R = V - 2(V.N)N. The result is NOT normalized;
 * its length equals that of `v`.
 */
export function reflectVector(v: Vector3, normal: Vector3): Vector3 {
    return v.clone().sub(normal.clone().multiplyScalar(2 * v.dot(normal)));
}

/**
 * Vector Snell's law for a unit incident direction.
 * `etaRatio` is n_incident / n_transmitted.
 *
 *   r_perp = η (uv + cosθ n)
 *   r_par  = -sqrt(|1 - |r_perp|²|) n
 *
 * Callers must rule out total internal reflection first.
 */
export function refractVector(uv: Vector3, normal: Vector3, etaRatio: number): Vector3 {
    const cosTheta = Math.min(-uv.dot(normal), 1.0);
    const rOutPerp = uv.clone().add(normal.clone().multiplyScalar(cosTheta)).multiplyScalar(etaRatio);
    const rOutParallel = normal.clone().multiplyScalar(-Math.sqrt(Math.abs(1.0 - rOutPerp.lengthSq())));
    return rOutPerp.add(rOutParallel);
}

/** Schlick's approximation of Fresnel reflectance. */
export function schlickReflectance(cosine: number, etaRatio: number): number {
    let r0 = (1 - etaRatio) / (1 + etaRatio);
    r0 = r0 * r0;
    return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}

export function nearZero(v: Vector3, epsilon: number = NEAR_ZERO_EPSILON): boolean {
    return Math.abs(v.x) < epsilon && Math.abs(v.y) < epsilon && Math.abs(v.z) < epsilon;
}

/**
 * Solves At^2 - 2Ht + C = 0 (half-coefficient form, A > 0).
 * Returns the real roots nearest first, empty when the discriminant is negative.
 */
export function solveHalfQuadratic(a: number, h: number, c: number): number[] {
    const disc = h * h - a * c;
    if (disc < 0) return [];

    const sqrtd = Math.sqrt(disc);
    return [(h - sqrtd) / a, (h + sqrtd) / a];
}
