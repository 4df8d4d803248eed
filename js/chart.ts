/**
 * @fileoverview Pie Chart Renderer
 *
 * Lays out and draws the "Employee Time Distribution" pie chart.
 *
 * Layout and drawing are separate steps:
 * - `layoutPieChart()` is pure. It computes slice angles, on-slice labels,
 *   legend rows and the title position from the ranked summary.
 * - `drawPieChart()` replays a layout onto any `DrawingSurface`.
 * - `renderPieChart()` composes both on a canvas surface and returns PNG bytes.
 *
 * Slices start at 0 degrees (3 o'clock) and run clockwise in ranked order.
 * Angles accumulate without re-normalization, so the last slice may end a
 * hair away from 360 degrees.
 */

import { sumHours } from './aggregate.js';
import { createCanvasSurface } from './canvas-surface.js';
import { assignColors, BLACK, WHITE } from './colors.js';
import { CHART } from './constants.js';
import { DegenerateAggregateError, RenderError } from './errors.js';
import { formatHoursDecimal, formatPercentage } from './utils.js';
import type {
    DrawingSurface,
    EmployeeSummary,
    FontSpec,
    LegendRow,
    PieChartLayout,
    PieSlice,
    Rgb,
    TextPlacement,
    TextSize,
} from './types.js';

export type TextMeasurer = (text: string, font: FontSpec) => TextSize;

export interface ChartDimensions {
    width: number;
    height: number;
}

export type SurfaceFactory = (width: number, height: number) => DrawingSurface;

const TITLE_FONT: FontSpec = { family: CHART.FONT_FAMILY, sizePx: CHART.TITLE_FONT_SIZE, bold: true };
const LABEL_FONT: FontSpec = { family: CHART.FONT_FAMILY, sizePx: CHART.LABEL_FONT_SIZE, bold: true };
const LEGEND_FONT: FontSpec = { family: CHART.FONT_FAMILY, sizePx: CHART.LEGEND_FONT_SIZE, bold: false };

/**
 * Throws unless the total can be used as a divisor.
 *
 * @returns The total hours.
 * @throws DegenerateAggregateError when the total is zero, negative or not finite.
 */
export function assertDrawableTotal(summary: readonly EmployeeSummary[]): number {
    const total = sumHours(summary);
    if (!Number.isFinite(total) || total <= 0) {
        throw new DegenerateAggregateError(total);
    }
    return total;
}

function placeCentered(text: string, x: number, y: number, font: FontSpec, color: Rgb, measure: TextMeasurer): TextPlacement {
    const size = measure(text, font);
    return { text, x: x - size.width / 2, y: y - size.height / 2, font, color };
}

/**
 * Computes every drawable element of the chart.
 *
 * @param summary - Ranked summary; must be non-empty with a positive total.
 * @param colors - One color per summary row, positionally aligned.
 * @param measure - Text measurement of the surface that will draw the layout.
 * @param dimensions - Canvas size; defaults to 800x600.
 * @throws DegenerateAggregateError when the total cannot be divided by.
 * @throws RangeError when `colors` is shorter than `summary`.
 */
export function layoutPieChart(
    summary: readonly EmployeeSummary[],
    colors: readonly Rgb[],
    measure: TextMeasurer,
    dimensions: ChartDimensions = { width: CHART.WIDTH, height: CHART.HEIGHT }
): PieChartLayout {
    const totalHours = assertDrawableTotal(summary);
    if (colors.length < summary.length) {
        throw new RangeError(`Expected ${summary.length} colors, got ${colors.length}`);
    }

    const { width, height } = dimensions;
    const center = { x: Math.floor(width / 2), y: Math.floor(height / 2) };
    const radius = Math.floor(Math.min(width, height) / 3);

    const titleSize = measure(CHART.TITLE, TITLE_FONT);
    const title: TextPlacement = {
        text: CHART.TITLE,
        x: (width - titleSize.width) / 2,
        y: CHART.TITLE_Y,
        font: TITLE_FONT,
        color: BLACK,
    };

    const slices: PieSlice[] = [];
    const legend: LegendRow[] = [];
    const legendX = center.x + radius + CHART.LEGEND_OFFSET_X;
    let startAngle = 0;
    let legendY: number = CHART.LEGEND_START_Y;

    summary.forEach((employee, i) => {
        const color = colors[i];
        const share = employee.totalHours / totalHours;
        const percentage = share * 100;
        const sweepAngle = share * 360;

        let label: TextPlacement | null = null;
        if (percentage > CHART.LABEL_MIN_PERCENTAGE) {
            const midAngle = ((startAngle + sweepAngle / 2) * Math.PI) / 180;
            const labelX = center.x + Math.cos(midAngle) * radius * CHART.LABEL_RADIUS_RATIO;
            const labelY = center.y + Math.sin(midAngle) * radius * CHART.LABEL_RADIUS_RATIO;
            label = placeCentered(formatPercentage(percentage), labelX, labelY, LABEL_FONT, WHITE, measure);
        }

        slices.push({
            name: employee.name,
            hours: employee.totalHours,
            percentage,
            startAngle,
            sweepAngle,
            color,
            label,
        });

        legend.push({
            swatch: { x: legendX, y: legendY, width: CHART.SWATCH_WIDTH, height: CHART.SWATCH_HEIGHT, color },
            text: {
                text: `${employee.name} (${formatHoursDecimal(employee.totalHours, 1)}h, ${formatPercentage(percentage)})`,
                x: legendX + CHART.LEGEND_TEXT_OFFSET_X,
                y: legendY,
                font: LEGEND_FONT,
                color: BLACK,
            },
        });

        startAngle += sweepAngle;
        legendY += CHART.LEGEND_ROW_SPACING;
    });

    return { width, height, center, radius, totalHours, title, slices, legend };
}

/**
 * Draws a computed layout. Each slice is followed by its label and legend row.
 */
export function drawPieChart(layout: PieChartLayout, surface: DrawingSurface): void {
    surface.clear(WHITE);
    surface.drawText(layout.title);

    layout.slices.forEach((slice, i) => {
        surface.drawFilledArc(layout.center, layout.radius, slice.startAngle, slice.sweepAngle, slice.color);
        surface.drawArcOutline(layout.center, layout.radius, slice.startAngle, slice.sweepAngle, BLACK);

        if (slice.label) {
            surface.drawText(slice.label);
        }

        const row = layout.legend[i];
        const { x, y, width, height, color } = row.swatch;
        surface.drawFilledRect(x, y, width, height, color);
        surface.drawRectOutline(x, y, width, height, BLACK);
        surface.drawText(row.text);
    });
}

/**
 * Renders the ranked summary as an 800x600 PNG.
 *
 * @param summary - Ranked summary; must be non-empty with a positive total.
 * @param createSurface - Surface factory; defaults to the canvas surface.
 * @returns Encoded PNG bytes.
 * @throws DegenerateAggregateError when the total cannot be divided by.
 * @throws RenderError when the image cannot be encoded.
 */
export async function renderPieChart(
    summary: readonly EmployeeSummary[],
    createSurface: SurfaceFactory = createCanvasSurface
): Promise<Buffer> {
    assertDrawableTotal(summary);

    const surface = createSurface(CHART.WIDTH, CHART.HEIGHT);
    const colors = assignColors(summary.length);
    const layout = layoutPieChart(summary, colors, (text, font) => surface.measureText(text, font), {
        width: surface.width,
        height: surface.height,
    });

    drawPieChart(layout, surface);

    try {
        return await surface.encodePng();
    } catch (error) {
        throw new RenderError('Failed to encode the pie chart as PNG', { cause: error });
    }
}
