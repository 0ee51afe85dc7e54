import { describe, it, expect } from 'vitest';

import {
    clamp01,
    hslBufferToRgb,
    hslToRgb,
    quantizeChannel,
    rgbImageToHsl,
    rgbToHsl,
    wrapHue
} from '../../processors/color-math';

// Deterministic PRNG so failures are reproducible
const mulberry32 = (seed: number) => () => {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
};

describe('rgbToHsl', () => {
    it('should convert primaries', () => {
        expect(rgbToHsl(1, 0, 0)).toEqual([0, 1, 0.5]);
        expect(rgbToHsl(0, 1, 0)).toEqual([120, 1, 0.5]);
        expect(rgbToHsl(0, 0, 1)).toEqual([240, 1, 0.5]);
    });

    it('should use the high-lightness saturation formula above 0.5', () => {
        const [h, s, l] = rgbToHsl(1, 0.5, 0.5);
        expect(h).toBe(0);
        expect(l).toBe(0.75);
        expect(s).toBeCloseTo(1, 10);
    });

    it('should keep hue in [0, 360) for magenta-side reds', () => {
        const [h] = rgbToHsl(1, 0, 0.5);
        expect(h).toBeCloseTo(330, 10);
    });

    it('should fix achromatic pixels at hue 0 and saturation 0', () => {
        for (const gray of [0, 0.25, 0.5, 0.75, 1]) {
            expect(rgbToHsl(gray, gray, gray)).toEqual([0, 0, gray]);
        }
    });
});

describe('hslToRgb', () => {
    it('should return the lightness on every channel when saturation is 0', () => {
        expect(hslToRgb(200, 0, 0.3)).toEqual([0.3, 0.3, 0.3]);
    });

    it('should convert each hue sector', () => {
        const expectRgb = (actual: [number, number, number], expected: [number, number, number]) => {
            actual.forEach((value, index) => expect(value).toBeCloseTo(expected[index], 10));
        };

        expectRgb(hslToRgb(0, 1, 0.5), [1, 0, 0]);
        expectRgb(hslToRgb(60, 1, 0.5), [1, 1, 0]);
        expectRgb(hslToRgb(120, 1, 0.5), [0, 1, 0]);
        expectRgb(hslToRgb(180, 1, 0.5), [0, 1, 1]);
        expectRgb(hslToRgb(240, 1, 0.5), [0, 0, 1]);
        expectRgb(hslToRgb(300, 1, 0.5), [1, 0, 1]);
        expectRgb(hslToRgb(0, 0.2, 0.6), [0.68, 0.52, 0.52]);
    });

    it('should wrap hue before converting', () => {
        const wrapped = hslToRgb(480, 1, 0.5);
        const direct = hslToRgb(120, 1, 0.5);
        wrapped.forEach((value, index) => expect(value).toBeCloseTo(direct[index], 10));
    });

    it('should invert rgbToHsl for random chromatic colors', () => {
        const random = mulberry32(1234);
        let checked = 0;
        while (checked < 1000) {
            const r = random();
            const g = random();
            const b = random();
            if (r === g && g === b) {
                continue;
            }
            const [rOut, gOut, bOut] = hslToRgb(...rgbToHsl(r, g, b));
            expect(Math.abs(rOut - r)).toBeLessThan(1e-3);
            expect(Math.abs(gOut - g)).toBeLessThan(1e-3);
            expect(Math.abs(bOut - b)).toBeLessThan(1e-3);
            checked++;
        }
    });
});

describe('helpers', () => {
    it('should wrap hue into [0, 360)', () => {
        expect(wrapHue(-30)).toBe(330);
        expect(wrapHue(360)).toBe(0);
        expect(wrapHue(720 + 45)).toBe(45);
        expect(wrapHue(-1e-15)).toBe(0);
    });

    it('should clamp to [0, 1]', () => {
        expect(clamp01(-0.2)).toBe(0);
        expect(clamp01(0.4)).toBe(0.4);
        expect(clamp01(1.7)).toBe(1);
    });

    it('should quantize by rounding and clamping', () => {
        expect(quantizeChannel(0.68)).toBe(173);
        expect(quantizeChannel(0.5)).toBe(128);
        expect(quantizeChannel(1.2)).toBe(255);
        expect(quantizeChannel(-0.1)).toBe(0);
    });
});

describe('buffer conversion', () => {
    it('should convert whole images both ways', () => {
        const image = { width: 2, height: 1, data: new Float64Array([1, 0, 0, 0.5, 0.5, 0.5]) };

        const hsl = rgbImageToHsl(image);
        expect(Array.from(hsl.data)).toEqual([0, 1, 0.5, 0, 0, 0.5]);

        const rgb = hslBufferToRgb(hsl);
        expect(rgb.width).toBe(2);
        expect(rgb.height).toBe(1);
        Array.from(rgb.data).forEach((value, index) => expect(value).toBeCloseTo(image.data[index], 10));
    });
});
