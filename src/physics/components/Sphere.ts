import { Vector3 } from 'three';
import { SceneObject } from '../Component';
import type { Material } from '../Material';
import type { Interval } from '../Interval';
import { Ray, HitRecord, faceNormal } from '../types';
import { solveHalfQuadratic } from '../math_solvers';

export class Sphere extends SceneObject {
    readonly center: Vector3;
    readonly radius: number;   // clamped to >= 0
    readonly material: Material;

    constructor(center: Vector3, radius: number, material: Material, name: string = "Sphere") {
        super(name);
        this.center = center.clone();
        this.radius = Math.max(0, radius);
        this.material = material;
    }

    hit(ray: Ray, rayT: Interval): HitRecord | null {
        // A point sphere has no surface normal
        if (this.radius === 0) return null;

        // |O + tD - C|^2 = r^2  with  oc = C - O
        const oc = this.center.clone().sub(ray.origin);
        const a = ray.direction.lengthSq();
        const h = ray.direction.dot(oc);
        const c = oc.lengthSq() - this.radius * this.radius;

        // Near root first, then the far one (ray starting inside the sphere)
        const root = solveHalfQuadratic(a, h, c).find(t => rayT.contains(t));
        if (root === undefined) return null;

        const point = ray.at(root);
        const outwardNormal = point.clone().sub(this.center).divideScalar(this.radius);
        const { normal, frontFace } = faceNormal(ray, outwardNormal);

        return {
            t: root,
            point,
            normal,
            frontFace,
            material: this.material
        };
    }
}
