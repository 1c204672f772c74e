import { Color, MathUtils, Vector3 } from 'three';
import type { Hittable } from './Component';
import { PathTracer } from './PathTracer';
import { createRandomSource, RandomSource } from './random';
import { Ray } from './types';

export interface CameraSettings {
    aspectRatio: number;      // image width over height
    imageWidth: number;       // pixels
    samplesPerPixel: number;  // jittered rays averaged per pixel
    maxDepth: number;         // bounce budget handed to the path tracer
    vfov: number;             // vertical field of view [degrees]
    lookFrom: Vector3;
    lookAt: Vector3;
    vup: Vector3;
    defocusAngle: number;     // cone angle of rays through each pixel [degrees], 0 = pinhole
    focusDist: number;        // distance from lookFrom to the plane of perfect focus
}

export const DEFAULT_CAMERA_SETTINGS: Readonly<CameraSettings> = {
    aspectRatio: 1.0,
    imageWidth: 100,
    samplesPerPixel: 10,
    maxDepth: 10,
    vfov: 90,
    lookFrom: new Vector3(0, 0, 0),
    lookAt: new Vector3(0, 0, -1),
    vup: new Vector3(0, 1, 0),
    defocusAngle: 0,
    focusDist: 10
};

/** Linear RGB image, row-major from the top-left pixel, 3 floats per pixel. */
export interface RenderedImage {
    width: number;
    height: number;
    pixels: Float64Array;
}

export interface RenderOptions {
    rng?: RandomSource;
    /** Called after each finished row with the number of rows still to go. */
    onProgress?: (rowsRemaining: number) => void;
}

/**
 * Pinhole / thin-lens camera.
 *
 * Derives the viewport from the settings, generates one jittered ray per
 * sample and averages the path-traced colors of each pixel. Rows do not
 * share any mutable state apart from the random source, so they can be
 * rendered in any order.
 */
export class Camera {
    settings: CameraSettings;

    imageHeight: number = 1;
    pixelSamplesScale: number = 1;
    center: Vector3 = new Vector3();
    pixel00Loc: Vector3 = new Vector3();
    pixelDeltaU: Vector3 = new Vector3();
    pixelDeltaV: Vector3 = new Vector3();
    u: Vector3 = new Vector3();
    v: Vector3 = new Vector3();
    w: Vector3 = new Vector3();
    defocusDiskU: Vector3 = new Vector3();
    defocusDiskV: Vector3 = new Vector3();

    constructor(settings: Partial<CameraSettings> = {}) {
        this.settings = {
            ...DEFAULT_CAMERA_SETTINGS,
            ...settings,
            lookFrom: (settings.lookFrom ?? DEFAULT_CAMERA_SETTINGS.lookFrom).clone(),
            lookAt: (settings.lookAt ?? DEFAULT_CAMERA_SETTINGS.lookAt).clone(),
            vup: (settings.vup ?? DEFAULT_CAMERA_SETTINGS.vup).clone()
        };
        this.initialize();
    }

    get imageWidth(): number {
        return this.settings.imageWidth;
    }

    /** Recomputes the viewport. Throws on settings that cannot produce an image. */
    initialize(): void {
        const s = this.settings;
        validateSettings(s);

        this.imageHeight = Math.max(1, Math.floor(s.imageWidth / s.aspectRatio));
        this.pixelSamplesScale = 1.0 / s.samplesPerPixel;
        this.center = s.lookFrom.clone();

        const theta = MathUtils.degToRad(s.vfov);
        const h = Math.tan(theta / 2);
        const viewportHeight = 2 * h * s.focusDist;
        const viewportWidth = viewportHeight * (s.imageWidth / this.imageHeight);

        // Orthonormal basis: w points backwards, u right, v up
        this.w = s.lookFrom.clone().sub(s.lookAt).normalize();
        this.u = new Vector3().crossVectors(s.vup, this.w).normalize();
        this.v = new Vector3().crossVectors(this.w, this.u);

        const viewportU = this.u.clone().multiplyScalar(viewportWidth);
        const viewportV = this.v.clone().multiplyScalar(-viewportHeight); // rows run downwards

        this.pixelDeltaU = viewportU.clone().divideScalar(s.imageWidth);
        this.pixelDeltaV = viewportV.clone().divideScalar(this.imageHeight);

        const viewportUpperLeft = this.center.clone()
            .sub(this.w.clone().multiplyScalar(s.focusDist))
            .sub(viewportU.clone().multiplyScalar(0.5))
            .sub(viewportV.clone().multiplyScalar(0.5));
        this.pixel00Loc = viewportUpperLeft.add(
            this.pixelDeltaU.clone().add(this.pixelDeltaV).multiplyScalar(0.5)
        );

        const defocusRadius = s.focusDist * Math.tan(MathUtils.degToRad(s.defocusAngle / 2));
        this.defocusDiskU = this.u.clone().multiplyScalar(defocusRadius);
        this.defocusDiskV = this.v.clone().multiplyScalar(defocusRadius);
    }

    /** Ray through a random point of pixel (i, j), from the defocus disk when enabled. */
    getRay(i: number, j: number, rng: RandomSource): Ray {
        const offsetX = rng.random() - 0.5;
        const offsetY = rng.random() - 0.5;

        const pixelSample = this.pixel00Loc.clone()
            .addScaledVector(this.pixelDeltaU, i + offsetX)
            .addScaledVector(this.pixelDeltaV, j + offsetY);

        const origin = this.settings.defocusAngle <= 0 ? this.center.clone() : this.defocusDiskSample(rng);
        return new Ray(origin, pixelSample.sub(origin));
    }

    private defocusDiskSample(rng: RandomSource): Vector3 {
        const p = rng.inUnitDisk();
        return this.center.clone()
            .addScaledVector(this.defocusDiskU, p.x)
            .addScaledVector(this.defocusDiskV, p.y);
    }

    /** Averaged linear colors for row `j` (imageWidth × RGB). */
    renderRow(tracer: PathTracer, j: number): Float64Array {
        const width = this.settings.imageWidth;
        const row = new Float64Array(width * 3);
        const accumulator = new Color();

        for (let i = 0; i < width; i++) {
            accumulator.setRGB(0, 0, 0);
            for (let sample = 0; sample < this.settings.samplesPerPixel; sample++) {
                accumulator.add(tracer.rayColor(this.getRay(i, j, tracer.rng), this.settings.maxDepth));
            }
            accumulator.multiplyScalar(this.pixelSamplesScale);
            row[i * 3] = accumulator.r;
            row[i * 3 + 1] = accumulator.g;
            row[i * 3 + 2] = accumulator.b;
        }

        return row;
    }

    render(world: Hittable, options: RenderOptions = {}): RenderedImage {
        this.initialize();
        const tracer = new PathTracer(world, this.settings.maxDepth, options.rng ?? createRandomSource());
        const width = this.settings.imageWidth;
        const pixels = new Float64Array(width * this.imageHeight * 3);

        for (let j = 0; j < this.imageHeight; j++) {
            pixels.set(this.renderRow(tracer, j), j * width * 3);
            options.onProgress?.(this.imageHeight - j - 1);
        }

        return { width, height: this.imageHeight, pixels };
    }
}

function validateSettings(s: CameraSettings): void {
    const positiveInt = (key: 'imageWidth' | 'samplesPerPixel' | 'maxDepth') => {
        if (!Number.isInteger(s[key]) || s[key] < 1) {
            throw new RangeError(`Camera: ${key} must be a positive integer, got ${s[key]}`);
        }
    };
    positiveInt('imageWidth');
    positiveInt('samplesPerPixel');
    positiveInt('maxDepth');

    if (!(s.aspectRatio > 0)) throw new RangeError(`Camera: aspectRatio must be positive, got ${s.aspectRatio}`);
    if (!(s.focusDist > 0)) throw new RangeError(`Camera: focusDist must be positive, got ${s.focusDist}`);
    if (!(s.vfov > 0 && s.vfov < 180)) throw new RangeError(`Camera: vfov must be in (0, 180), got ${s.vfov}`);
    if (s.lookFrom.equals(s.lookAt)) throw new RangeError('Camera: lookFrom and lookAt must differ');

    const forward = s.lookFrom.clone().sub(s.lookAt);
    if (new Vector3().crossVectors(s.vup, forward).lengthSq() === 0) {
        throw new RangeError('Camera: vup must not be parallel to the view direction');
    }
}
