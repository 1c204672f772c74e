import { writeFileSync } from 'fs';
import { Interval } from '../physics/Interval';
import type { RenderedImage } from '../physics/Camera';

const INTENSITY = new Interval(0.0, 0.999);

/** Gamma 2 transform; non-positive values map to 0. */
export function linearToGamma(linearComponent: number): number {
    return linearComponent > 0 ? Math.sqrt(linearComponent) : 0;
}

/** Linear [0, 1] component → byte in [0, 255]. Values above 1 saturate at 255. */
export function toByte(linearComponent: number): number {
    return Math.floor(256 * INTENSITY.clamp(linearToGamma(linearComponent)));
}

/**
 * Plain-text PPM (P3): header, then one "r g b" line per pixel,
 * rows top to bottom.
 */
export function encodePPM(image: RenderedImage): string {
    const lines: string[] = [`P3`, `${image.width} ${image.height}`, `255`];
    const count = image.width * image.height;

    for (let p = 0; p < count; p++) {
        const r = toByte(image.pixels[p * 3]);
        const g = toByte(image.pixels[p * 3 + 1]);
        const b = toByte(image.pixels[p * 3 + 2]);
        lines.push(`${r} ${g} ${b}`);
    }

    return lines.join('\n') + '\n';
}

/** Writes the image to `path`, or to stdout when `path` is "-". */
export function writePPM(image: RenderedImage, path: string): void {
    const text = encodePPM(image);
    if (path === '-') {
        process.stdout.write(text);
        return;
    }
    writeFileSync(path, text);
}
