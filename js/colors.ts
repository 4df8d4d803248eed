/**
 * @fileoverview Slice Color Assignment
 * Spaces N colors evenly around the hue wheel at fixed saturation and brightness.
 */

import { COLOR_SATURATION, COLOR_VALUE } from './constants.js';
import type { Rgb } from './types.js';

/**
 * Converts an HSV color to 8-bit RGB.
 * Channels are truncated, not rounded, so 229.5 becomes 229.
 *
 * @param hue - Degrees in [0, 360).
 * @param saturation - In [0, 1].
 * @param value - Brightness in [0, 1].
 */
export function hsvToRgb(hue: number, saturation: number, value: number): Rgb {
    const sector = Math.floor(hue / 60);
    const hi = sector % 6;
    const f = hue / 60 - sector;

    const scaled = value * 255;
    const v = Math.trunc(scaled);
    const p = Math.trunc(scaled * (1 - saturation));
    const q = Math.trunc(scaled * (1 - f * saturation));
    const t = Math.trunc(scaled * (1 - (1 - f) * saturation));

    switch (hi) {
        case 0:
            return { r: v, g: t, b: p };
        case 1:
            return { r: q, g: v, b: p };
        case 2:
            return { r: p, g: v, b: t };
        case 3:
            return { r: p, g: q, b: v };
        case 4:
            return { r: t, g: p, b: v };
        default:
            return { r: v, g: p, b: q };
    }
}

/**
 * Produces one color per ranked employee. Color i belongs to row i.
 *
 * @param count - Number of employees; must be a positive integer.
 * @throws RangeError when count is not a positive integer.
 */
export function assignColors(count: number): Rgb[] {
    if (!Number.isInteger(count) || count < 1) {
        throw new RangeError(`Color count must be a positive integer, got ${count}`);
    }

    const hueStep = 360 / count;
    const colors: Rgb[] = [];
    for (let i = 0; i < count; i++) {
        const hue = (i * hueStep) % 360;
        colors.push(hsvToRgb(hue, COLOR_SATURATION, COLOR_VALUE));
    }
    return colors;
}

/**
 * CSS color string for a drawing surface.
 */
export function toCssColor(color: Rgb): string {
    return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };
export const WHITE: Rgb = { r: 255, g: 255, b: 255 };
