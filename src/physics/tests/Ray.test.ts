import { describe, expect, test } from 'vitest';
import { Vector3 } from 'three';
import { Ray, faceNormal } from '../types';
import { DegenerateRayError } from '../../errors';
import { expectVector } from './helpers';

describe('Ray', () => {
    test('at(t) walks along the unnormalized direction', () => {
        const ray = new Ray(new Vector3(1, 2, 3), new Vector3(0, 0, -2));
        expectVector(ray.at(0), 1, 2, 3);
        expectVector(ray.at(1.5), 1, 2, 0);
    });

    test('copies its vectors so later mutation of the inputs has no effect', () => {
        const origin = new Vector3(0, 0, 0);
        const direction = new Vector3(0, 1, 0);
        const ray = new Ray(origin, direction);
        origin.set(5, 5, 5);
        direction.set(1, 0, 0);
        expectVector(ray.origin, 0, 0, 0);
        expectVector(ray.direction, 0, 1, 0);
    });

    test('rejects a zero-length direction', () => {
        expect(() => new Ray(new Vector3(), new Vector3(0, 0, 0))).toThrow(DegenerateRayError);
    });

    test('rejects non-finite components', () => {
        expect(() => new Ray(new Vector3(), new Vector3(NaN, 0, 1))).toThrow(DegenerateRayError);
        expect(() => new Ray(new Vector3(Infinity, 0, 0), new Vector3(0, 0, 1))).toThrow(DegenerateRayError);
    });
});

describe('faceNormal', () => {
    const outward = new Vector3(0, 0, 1);

    test('ray from outside keeps the outward normal', () => {
        const ray = new Ray(new Vector3(0, 0, 5), new Vector3(0, 0, -1));
        const { normal, frontFace } = faceNormal(ray, outward);
        expect(frontFace).toBe(true);
        expectVector(normal, 0, 0, 1);
    });

    test('ray from inside gets the flipped normal', () => {
        const ray = new Ray(new Vector3(0, 0, 0), new Vector3(0, 0, 1));
        const { normal, frontFace } = faceNormal(ray, outward);
        expect(frontFace).toBe(false);
        expectVector(normal, 0, 0, -1);
    });

    test('does not mutate the outward normal', () => {
        const ray = new Ray(new Vector3(0, 0, 0), new Vector3(0, 0, 1));
        faceNormal(ray, outward);
        expectVector(outward, 0, 0, 1);
    });
});
