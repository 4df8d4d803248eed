/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the report pipeline.
 */

import type { ErrorType } from './constants.js';

// ==================== TIME ENTRY TYPES ====================

/**
 * A single worked interval as delivered by the time entries endpoint.
 * Keys follow the endpoint's casing and spelling (`StarTimeUtc` included).
 */
export interface RawTimeEntry {
    EmployeeName?: unknown;
    StarTimeUtc?: unknown;
    EndTimeUtc?: unknown;
    EntryNotes?: unknown;
    DeletedOn?: unknown;
}

/**
 * A validated worked interval.
 */
export interface TimeEntry {
    /** Grouping key */
    employeeName: string;
    startUtc: Date;
    /** Expected to be >= startUtc; not enforced */
    endUtc: Date;
    notes: string;
    /** Set when the entry was soft-deleted */
    deletedOn: Date | null;
}

// ==================== SUMMARY TYPES ====================

/**
 * Total hours worked by one employee. One per distinct employee name.
 */
export interface EmployeeSummary {
    readonly name: string;
    /** Fractional; negative only when the source holds malformed intervals */
    readonly totalHours: number;
}

// ==================== CHART TYPES ====================

/**
 * 8-bit RGB color.
 */
export interface Rgb {
    readonly r: number;
    readonly g: number;
    readonly b: number;
}

/**
 * Font description understood by a drawing surface.
 */
export interface FontSpec {
    family: string;
    sizePx: number;
    bold: boolean;
}

export interface TextSize {
    width: number;
    height: number;
}

export interface Point {
    x: number;
    y: number;
}

/**
 * A positioned piece of text. `x`/`y` is the top-left corner.
 */
export interface TextPlacement {
    text: string;
    x: number;
    y: number;
    font: FontSpec;
    color: Rgb;
}

export interface PieSlice {
    name: string;
    hours: number;
    percentage: number;
    /** Degrees, clockwise on screen from the positive x axis */
    startAngle: number;
    sweepAngle: number;
    color: Rgb;
    /** Present only when the slice is large enough to carry a label */
    label: TextPlacement | null;
}

export interface LegendRow {
    swatch: { x: number; y: number; width: number; height: number; color: Rgb };
    text: TextPlacement;
}

/**
 * Everything needed to draw the pie chart, computed up front.
 */
export interface PieChartLayout {
    width: number;
    height: number;
    center: Point;
    radius: number;
    totalHours: number;
    title: TextPlacement;
    slices: PieSlice[];
    legend: LegendRow[];
}

/**
 * Minimal 2D drawing capability the chart is drawn onto.
 * Angles are in degrees, clockwise on screen from the positive x axis.
 */
export interface DrawingSurface {
    readonly width: number;
    readonly height: number;
    clear(color: Rgb): void;
    drawFilledArc(center: Point, radius: number, startAngle: number, sweepAngle: number, color: Rgb): void;
    drawArcOutline(center: Point, radius: number, startAngle: number, sweepAngle: number, color: Rgb): void;
    drawFilledRect(x: number, y: number, width: number, height: number, color: Rgb): void;
    drawRectOutline(x: number, y: number, width: number, height: number, color: Rgb): void;
    drawText(placement: TextPlacement): void;
    measureText(text: string, font: FontSpec): TextSize;
    encodePng(): Promise<Buffer>;
}

// ==================== API TYPES ====================

/**
 * Result of a single HTTP request.
 */
export interface ApiResponse<T> {
    data: T | null;
    failed: boolean;
    status: number;
    /** Why the request failed, when it did */
    error?: Error;
}

/**
 * Source of time entries. Created once per run and disposed at the end.
 */
export interface TimeEntriesClient {
    fetchEntries(): Promise<TimeEntry[]>;
    dispose(): void;
}

// ==================== CONFIG TYPES ====================

export interface AppConfig {
    apiUrl: string;
    /** Static access token sent as the `code` query parameter */
    accessToken: string;
    outputDir: string;
    htmlFileName: string;
    chartFileName: string;
    requestTimeoutMs: number;
    maxRetries: number;
    debug: boolean;
    sentryDsn: string;
    environment: string;
}

// ==================== ERROR TYPES ====================

/**
 * Structured, user-facing view of an error.
 */
export interface FriendlyError {
    type: ErrorType;
    title: string;
    message: string;
    /** The underlying error's own message */
    detail: string;
    originalError: Error;
    timestamp: string;
    stack?: string;
}
