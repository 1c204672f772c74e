import { describe, expect, test, vi } from 'vitest';
import { Vector3 } from 'three';
import { Camera, DEFAULT_CAMERA_SETTINGS } from '../Camera';
import { Scene } from '../Scene';
import { backgroundColor } from '../PathTracer';
import { createSeededRandom } from '../random';
import { createThreeSpheresScene } from '../../presets/threeSpheres';
import { expectVector, fixedRandom } from './helpers';

describe('Camera', () => {
    test('image height follows the aspect ratio and is at least one', () => {
        expect(new Camera().imageHeight).toBe(100);
        expect(new Camera({ imageWidth: 400, aspectRatio: 16 / 9 }).imageHeight).toBe(225);
        expect(new Camera({ imageWidth: 1, aspectRatio: 16 / 9 }).imageHeight).toBe(1);
    });

    test('default settings are not shared between cameras', () => {
        const camera = new Camera();
        camera.settings.lookFrom.set(1, 2, 3);
        expectVector(DEFAULT_CAMERA_SETTINGS.lookFrom, 0, 0, 0);
    });

    test('a single-pixel pinhole camera looks straight down -Z', () => {
        const camera = new Camera({ imageWidth: 1 });
        const ray = camera.getRay(0, 0, fixedRandom({ random: 0.5 }));

        expectVector(ray.origin, 0, 0, 0);
        expectVector(ray.direction, 0, 0, -10);
    });

    test('builds an orthonormal basis from lookFrom, lookAt and vup', () => {
        const camera = new Camera({ lookFrom: new Vector3(0, 0, 5), lookAt: new Vector3(0, 0, 0) });
        expectVector(camera.w, 0, 0, 1);
        expectVector(camera.u, 1, 0, 0);
        expectVector(camera.v, 0, 1, 0);
    });

    test('pixel (0, 0) is the top-left of the viewport', () => {
        // vfov 90, focus 10 → viewport 40 × 20 for a 2 × 1 image
        const camera = new Camera({ imageWidth: 2, aspectRatio: 2 });
        expectVector(camera.pixelDeltaU, 20, 0, 0);
        expectVector(camera.pixelDeltaV, 0, -20, 0);
        expectVector(camera.pixel00Loc, -10, 0, -10);
    });

    test('jitter stays inside the pixel', () => {
        const camera = new Camera({ imageWidth: 2, aspectRatio: 2 });
        const low = camera.getRay(0, 0, fixedRandom({ random: 0 }));
        expectVector(low.direction, -20, 10, -10);
    });

    test('defocus moves the origin onto the lens disk', () => {
        const camera = new Camera({ imageWidth: 1, defocusAngle: 10, focusDist: 10 });
        const ray = camera.getRay(0, 0, fixedRandom({ random: 0.5, inUnitDisk: new Vector3(0.5, 0, 0) }));

        const radius = 10 * Math.tan((5 * Math.PI) / 180);
        expectVector(ray.origin, 0.5 * radius, 0, 0);
        // Still aimed at the same point on the focus plane
        expectVector(ray.origin.clone().add(ray.direction), 0, 0, -10);
    });

    test('rejects settings that cannot produce an image', () => {
        expect(() => new Camera({ imageWidth: 0 })).toThrow(RangeError);
        expect(() => new Camera({ samplesPerPixel: 1.5 })).toThrow(RangeError);
        expect(() => new Camera({ maxDepth: 0 })).toThrow(RangeError);
        expect(() => new Camera({ focusDist: 0 })).toThrow(RangeError);
        expect(() => new Camera({ lookAt: new Vector3(0, 0, 0) })).toThrow(RangeError);
        expect(() => new Camera({ vup: new Vector3(0, 0, 2) })).toThrow(RangeError);
    });

    test('renders the sky gradient for an empty scene', () => {
        const camera = new Camera({ imageWidth: 2, aspectRatio: 2, samplesPerPixel: 1 });
        const onProgress = vi.fn();
        const image = camera.render(new Scene(), { rng: fixedRandom({ random: 0.5 }), onProgress });

        expect(image.width).toBe(2);
        expect(image.height).toBe(1);
        expect(image.pixels.length).toBe(6);
        // Both pixel centers lie on y = 0, so a = 0.5
        for (let p = 0; p < 2; p++) {
            expect(image.pixels[p * 3]).toBeCloseTo(0.75);
            expect(image.pixels[p * 3 + 1]).toBeCloseTo(0.85);
            expect(image.pixels[p * 3 + 2]).toBeCloseTo(1.0);
        }
        expect(onProgress).toHaveBeenCalledTimes(1);
        expect(onProgress).toHaveBeenCalledWith(0);
    });

    test('averages samples instead of summing them', () => {
        const camera = new Camera({ imageWidth: 1, samplesPerPixel: 8 });
        const image = camera.render(new Scene(), { rng: fixedRandom({ random: 0.5 }) });
        // Center pixel looks along -Z: a = 0.5
        expect(image.pixels[0]).toBeCloseTo(0.75);
        expect(image.pixels[2]).toBeCloseTo(1.0);
    });

    test('keeps full precision in the rendered pixels', () => {
        const camera = new Camera({ imageWidth: 1, samplesPerPixel: 1, lookAt: new Vector3(0, 1, -3) });
        const expected = backgroundColor(camera.getRay(0, 0, fixedRandom()));
        const image = camera.render(new Scene(), { rng: fixedRandom() });

        expect(image.pixels).toBeInstanceOf(Float64Array);
        expect(image.pixels[0]).toBe(expected.r);
        expect(image.pixels[1]).toBe(expected.g);
    });

    test('the same seed renders the same image', () => {
        const { scene, camera: settings } = createThreeSpheresScene();
        const small = { ...settings, imageWidth: 8, samplesPerPixel: 2, maxDepth: 5 };

        const a = new Camera(small).render(scene, { rng: createSeededRandom(1234) });
        const b = new Camera(small).render(scene, { rng: createSeededRandom(1234) });

        expect(a.height).toBe(4);
        expect(Array.from(a.pixels)).toEqual(Array.from(b.pixels));
    });
});
