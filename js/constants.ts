/**
 * @fileoverview Application Constants
 * Contains configuration defaults, rendering constants, and the error
 * taxonomy shared across the application.
 */

import type { FriendlyError } from './types.js';

/**
 * Name and version reported to Sentry as the release.
 */
export const APP_NAME = 'employee-time-report';
export const APP_VERSION = '1.0.0';

// ==================== ERROR TRACKING ====================

/**
 * Sentry DSN used when neither the config file nor the environment sets one.
 * An empty string (or a `__` placeholder) disables error reporting.
 */
export const SENTRY_DSN = '__SENTRY_DSN__';

// ==================== CONFIGURATION ====================

/**
 * Name of the optional JSON config file looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'time-report.config.json';

/**
 * Environment variables that override config file values.
 */
export const ENV_KEYS = {
    API_URL: 'TIME_REPORT_API_URL',
    ACCESS_TOKEN: 'TIME_REPORT_ACCESS_TOKEN',
    OUTPUT_DIR: 'TIME_REPORT_OUTPUT_DIR',
    /** Debug flag ("true" or "1"). */
    DEBUG: 'TIME_REPORT_DEBUG',
    SENTRY_DSN: 'SENTRY_DSN',
} as const;

/**
 * Output artifact names. Each run overwrites them.
 */
export const OUTPUT_FILES = {
    HTML: 'employee_table.html',
    CHART: 'employee_pie_chart.png',
} as const;

/**
 * Request timeout for the entries endpoint in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Retries after a failed fetch. A failed fetch ends the run unless this is raised.
 */
export const DEFAULT_MAX_RETRIES = 0;

/**
 * Hard limit on retries regardless of configuration.
 */
export const HARD_MAX_RETRIES = 5;

// ==================== REPORT CONSTANTS ====================

/**
 * Rows below this many hours get the "low-hours" flag in the HTML table.
 */
export const LOW_HOURS_THRESHOLD = 100;

/**
 * Milliseconds per hour, for converting interval lengths.
 */
export const MS_PER_HOUR = 3_600_000;

// ==================== CHART CONSTANTS ====================

/**
 * Fixed geometry and typography of the pie chart.
 */
export const CHART = {
    WIDTH: 800,
    HEIGHT: 600,
    TITLE: 'Employee Time Distribution',
    TITLE_Y: 20,
    /** Slices at or below this percentage get no on-slice label. */
    LABEL_MIN_PERCENTAGE: 3,
    /** Distance of on-slice labels from the center, as a fraction of the radius. */
    LABEL_RADIUS_RATIO: 0.7,
    LEGEND_OFFSET_X: 50,
    LEGEND_START_Y: 100,
    LEGEND_ROW_SPACING: 25,
    SWATCH_WIDTH: 20,
    SWATCH_HEIGHT: 15,
    /** Gap between the swatch's left edge and the legend text. */
    LEGEND_TEXT_OFFSET_X: 25,
    FONT_FAMILY: 'Arial',
    TITLE_FONT_SIZE: 16,
    LABEL_FONT_SIZE: 10,
    LEGEND_FONT_SIZE: 10,
} as const;

/**
 * Saturation and brightness shared by every generated slice color.
 */
export const COLOR_SATURATION = 0.7;
export const COLOR_VALUE = 0.9;

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    NETWORK: 'NETWORK_ERROR',
    AUTH: 'AUTH_ERROR',
    VALIDATION: 'VALIDATION_ERROR',
    API: 'API_ERROR',
    DEGENERATE_DATA: 'DEGENERATE_DATA_ERROR',
    RENDER: 'RENDER_ERROR',
    CONFIG: 'CONFIG_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
}

/**
 * User-facing messages for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.NETWORK]: {
        title: 'Network Error',
        message: 'Unable to reach the time entries endpoint. Check the connection and the configured URL.',
    },
    [ERROR_TYPES.AUTH]: {
        title: 'Authentication Error',
        message: 'The endpoint rejected the access token.',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'The endpoint returned data that is not a list of time entries.',
    },
    [ERROR_TYPES.API]: {
        title: 'API Error',
        message: 'The time entries endpoint returned an error. The service may be temporarily unavailable.',
    },
    [ERROR_TYPES.DEGENERATE_DATA]: {
        title: 'Degenerate Data',
        message: 'Total hours must be greater than zero to draw the chart.',
    },
    [ERROR_TYPES.RENDER]: {
        title: 'Render Error',
        message: 'An output file could not be produced.',
    },
    [ERROR_TYPES.CONFIG]: {
        title: 'Configuration Error',
        message: 'The configuration is missing or invalid.',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred.',
    },
};

// Re-export types for convenience
export type { FriendlyError };
