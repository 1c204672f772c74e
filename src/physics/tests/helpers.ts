import { expect } from 'vitest';
import { Color, Vector3 } from 'three';
import type { RandomSource } from '../random';
import type { HitRecord } from '../types';
import { Material } from '../Material';

/** Random source returning fixed values, for deterministic scatter tests. */
export function fixedRandom(values: { random?: number; unitVector?: Vector3; inUnitDisk?: Vector3 } = {}): RandomSource {
    return {
        random: () => values.random ?? 0.5,
        unitVector: () => (values.unitVector ?? new Vector3(1, 0, 0)).clone(),
        inUnitDisk: () => (values.inUnitDisk ?? new Vector3(0, 0, 0)).clone()
    };
}

export function makeHit(material: Material, overrides: Partial<HitRecord> = {}): HitRecord {
    return {
        t: 1,
        point: new Vector3(0, 0, 0),
        normal: new Vector3(0, 0, 1),
        frontFace: true,
        material,
        ...overrides
    };
}

/** Material that absorbs every ray. */
export class Absorber extends Material {
    scatter(): null {
        return null;
    }
}

export function expectVector(v: Vector3, x: number, y: number, z: number, digits: number = 6) {
    expect(v.x).toBeCloseTo(x, digits);
    expect(v.y).toBeCloseTo(y, digits);
    expect(v.z).toBeCloseTo(z, digits);
}

export function expectColor(c: Color, r: number, g: number, b: number, digits: number = 6) {
    expect(c.r).toBeCloseTo(r, digits);
    expect(c.g).toBeCloseTo(g, digits);
    expect(c.b).toBeCloseTo(b, digits);
}
