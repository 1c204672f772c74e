import type { Hittable } from './Component';
import { Interval } from './Interval';
import type { Ray, HitRecord } from './types';

/**
 * Aggregate of hittables that reports the closest hit across all members.
 *
 * After each accepted hit the search interval's upper bound shrinks to that
 * hit's t, so later members can only report something nearer. The result
 * therefore does not depend on insertion order.
 */
export class Scene implements Hittable {
    objects: Hittable[] = [];

    constructor(objects: Hittable[] = []) {
        for (const object of objects) this.add(object);
    }

    add(object: Hittable): void {
        this.objects.push(object);
    }

    clear(): void {
        this.objects = [];
    }

    get size(): number {
        return this.objects.length;
    }

    hit(ray: Ray, rayT: Interval): HitRecord | null {
        let closestSoFar = rayT.max;
        let closest: HitRecord | null = null;

        for (const object of this.objects) {
            const hit = object.hit(ray, new Interval(rayT.min, closestSoFar));
            if (hit) {
                closestSoFar = hit.t;
                closest = hit;
            }
        }

        return closest;
    }
}
