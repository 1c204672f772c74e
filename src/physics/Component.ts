import { v4 as uuidv4 } from 'uuid';
import type { Ray, HitRecord } from './types';
import type { Interval } from './Interval';

/**
 * Anything a ray can be tested against. Implementations return the CLOSEST
 * intersection whose parameter lies inside `rayT`, or null.
 */
export interface Hittable {
    hit(ray: Ray, rayT: Interval): HitRecord | null;
}

/**
 * Base class for geometry placed in a scene. Geometry is immutable once the
 * render starts; `id` and `name` exist for scene files and diagnostics.
 */
export abstract class SceneObject implements Hittable {
    id: string;
    name: string;

    constructor(name: string = "Unnamed Object") {
        this.id = uuidv4();
        this.name = name;
    }

    abstract hit(ray: Ray, rayT: Interval): HitRecord | null;
}
