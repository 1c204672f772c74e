import { describe, expect, test } from 'vitest';
import { encodePPM, linearToGamma, toByte } from '../ppm';

describe('linearToGamma', () => {
    test('takes the square root of positive values', () => {
        expect(linearToGamma(0.25)).toBe(0.5);
        expect(linearToGamma(1)).toBe(1);
    });

    test('maps zero and negative values to 0', () => {
        expect(linearToGamma(0)).toBe(0);
        expect(linearToGamma(-1)).toBe(0);
    });
});

describe('toByte', () => {
    test('quantizes gamma-corrected components', () => {
        expect(toByte(0)).toBe(0);
        expect(toByte(0.25)).toBe(128);
        expect(toByte(1)).toBe(255);
    });

    test('saturates above one', () => {
        expect(toByte(4)).toBe(255);
    });
});

describe('encodePPM', () => {
    test('writes the P3 header and one line per pixel', () => {
        const image = {
            width: 2,
            height: 1,
            pixels: new Float64Array([0.25, 0, 1, 0, 0.25, 4])
        };
        expect(encodePPM(image)).toBe('P3\n2 1\n255\n128 0 255\n0 128 255\n');
    });

    test('rows are written top to bottom', () => {
        const image = {
            width: 1,
            height: 2,
            pixels: new Float64Array([1, 1, 1, 0, 0, 0])
        };
        expect(encodePPM(image).split('\n').slice(3)).toEqual(['255 255 255', '0 0 0', '']);
    });
});
