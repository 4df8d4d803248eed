/**
 * @fileoverview Canvas Drawing Surface
 * `DrawingSurface` backed by @napi-rs/canvas (Skia). Anti-aliasing is on by default.
 *
 * Negative sweeps (from negative totals) are traced counter-clockwise.
 */

import { createCanvas } from '@napi-rs/canvas';
import { toCssColor } from './colors.js';
import type { DrawingSurface, FontSpec, Point, Rgb, TextPlacement, TextSize } from './types.js';

/** Line height as a multiple of the font size, used for text heights. */
const LINE_HEIGHT = 1.2;

/**
 * The part of a 2D canvas context the surface draws with.
 * Style properties are only ever written.
 */
export interface Canvas2DContext {
    fillStyle: unknown;
    strokeStyle: unknown;
    lineWidth: number;
    font: string;
    textBaseline: unknown;
    beginPath(): void;
    moveTo(x: number, y: number): void;
    arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, anticlockwise?: boolean): void;
    closePath(): void;
    fill(): void;
    stroke(): void;
    fillRect(x: number, y: number, width: number, height: number): void;
    strokeRect(x: number, y: number, width: number, height: number): void;
    fillText(text: string, x: number, y: number): void;
    measureText(text: string): { width: number };
}

function toCssFont(font: FontSpec): string {
    return `${font.bold ? 'bold ' : ''}${font.sizePx}px ${font.family}`;
}

function toRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Creates a raster surface of the given size.
 */
export function createCanvasSurface(width: number, height: number): DrawingSurface {
    const canvas = createCanvas(width, height);
    return createContextSurface(canvas.getContext('2d'), width, height, () => canvas.encode('png'));
}

/**
 * Draws onto an existing 2D context; `encodePng` produces the image bytes.
 */
export function createContextSurface(
    ctx: Canvas2DContext,
    width: number,
    height: number,
    encodePng: () => Promise<Buffer>
): DrawingSurface {
    ctx.textBaseline = 'top';

    const tracePie = (center: Point, radius: number, startAngle: number, sweepAngle: number): void => {
        const start = toRadians(startAngle);
        ctx.beginPath();
        ctx.moveTo(center.x, center.y);
        ctx.arc(center.x, center.y, radius, start, start + toRadians(sweepAngle), sweepAngle < 0);
        ctx.closePath();
    };

    return {
        width,
        height,

        clear(color: Rgb): void {
            ctx.fillStyle = toCssColor(color);
            ctx.fillRect(0, 0, width, height);
        },

        drawFilledArc(center, radius, startAngle, sweepAngle, color): void {
            tracePie(center, radius, startAngle, sweepAngle);
            ctx.fillStyle = toCssColor(color);
            ctx.fill();
        },

        drawArcOutline(center, radius, startAngle, sweepAngle, color): void {
            tracePie(center, radius, startAngle, sweepAngle);
            ctx.strokeStyle = toCssColor(color);
            ctx.lineWidth = 1;
            ctx.stroke();
        },

        drawFilledRect(x, y, rectWidth, rectHeight, color): void {
            ctx.fillStyle = toCssColor(color);
            ctx.fillRect(x, y, rectWidth, rectHeight);
        },

        drawRectOutline(x, y, rectWidth, rectHeight, color): void {
            ctx.strokeStyle = toCssColor(color);
            ctx.lineWidth = 1;
            ctx.strokeRect(x, y, rectWidth, rectHeight);
        },

        drawText(placement: TextPlacement): void {
            ctx.font = toCssFont(placement.font);
            ctx.fillStyle = toCssColor(placement.color);
            ctx.fillText(placement.text, placement.x, placement.y);
        },

        measureText(text: string, font: FontSpec): TextSize {
            ctx.font = toCssFont(font);
            return { width: ctx.measureText(text).width, height: font.sizePx * LINE_HEIGHT };
        },

        encodePng,
    };
}
