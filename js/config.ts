/**
 * @fileoverview Configuration Loading
 *
 * Precedence, lowest first:
 * 1. Defaults from constants.ts
 * 2. `time-report.config.json` in the working directory (optional)
 * 3. Environment variables (`TIME_REPORT_*`, `SENTRY_DSN`)
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
    CONFIG_FILE_NAME,
    DEFAULT_MAX_RETRIES,
    DEFAULT_REQUEST_TIMEOUT_MS,
    ENV_KEYS,
    OUTPUT_FILES,
    SENTRY_DSN,
} from './constants.js';
import { ConfigError } from './errors.js';
import {
    isRecord,
    validateBoolean,
    validateNonNegativeInteger,
    validateNumber,
    validateString,
} from './utils.js';
import type { AppConfig } from './types.js';

export interface LoadConfigOptions {
    /** Directory holding the config file; outputs default here too */
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Explicit config file path, overriding the default lookup */
    file?: string;
}

/**
 * Unvalidated values keyed by AppConfig field name.
 */
type ConfigFileValues = Record<string, unknown>;

/**
 * Defaults before any file or environment override.
 */
export function getDefaultConfig(cwd: string): AppConfig {
    return {
        apiUrl: '',
        accessToken: '',
        outputDir: cwd,
        htmlFileName: OUTPUT_FILES.HTML,
        chartFileName: OUTPUT_FILES.CHART,
        requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
        maxRetries: DEFAULT_MAX_RETRIES,
        debug: false,
        sentryDsn: SENTRY_DSN,
        environment: process.env.NODE_ENV || 'development',
    };
}

async function readConfigFile(filePath: string, required: boolean): Promise<ConfigFileValues> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return {};
        }
        throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
    }
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
    }
    return parsed;
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigFileValues {
    const values: ConfigFileValues = {};
    if (env[ENV_KEYS.API_URL]) values.apiUrl = env[ENV_KEYS.API_URL];
    if (env[ENV_KEYS.ACCESS_TOKEN]) values.accessToken = env[ENV_KEYS.ACCESS_TOKEN];
    if (env[ENV_KEYS.OUTPUT_DIR]) values.outputDir = env[ENV_KEYS.OUTPUT_DIR];
    if (env[ENV_KEYS.DEBUG]) values.debug = env[ENV_KEYS.DEBUG];
    if (env[ENV_KEYS.SENTRY_DSN]) values.sentryDsn = env[ENV_KEYS.SENTRY_DSN];
    return values;
}

/**
 * Validates merged values into a complete config.
 * @throws ConfigError naming the first invalid field.
 */
export function resolveConfig(defaults: AppConfig, ...layers: ConfigFileValues[]): AppConfig {
    const merged: ConfigFileValues = {};
    for (const layer of [Object.entries(defaults), ...layers.map((values) => Object.entries(values))]) {
        for (const [key, value] of layer) {
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }

    try {
        const apiUrl = validateString(merged.apiUrl, `apiUrl (set it in ${CONFIG_FILE_NAME} or ${ENV_KEYS.API_URL})`);
        const requestTimeoutMs = validateNumber(merged.requestTimeoutMs, 'requestTimeoutMs');
        if (requestTimeoutMs <= 0) {
            throw new ConfigError('requestTimeoutMs must be greater than zero');
        }

        return {
            apiUrl,
            accessToken: typeof merged.accessToken === 'string' ? merged.accessToken.trim() : '',
            outputDir: path.resolve(defaults.outputDir, validateString(merged.outputDir, 'outputDir')),
            htmlFileName: validateString(merged.htmlFileName, 'htmlFileName'),
            chartFileName: validateString(merged.chartFileName, 'chartFileName'),
            requestTimeoutMs,
            maxRetries: validateNonNegativeInteger(merged.maxRetries, 'maxRetries'),
            debug: validateBoolean(merged.debug, 'debug'),
            sentryDsn: typeof merged.sentryDsn === 'string' ? merged.sentryDsn.trim() : '',
            environment: validateString(merged.environment, 'environment'),
        };
    } catch (error) {
        if (error instanceof ConfigError) throw error;
        throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
    }
}

/**
 * Loads the configuration for one run.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const filePath = options.file ? path.resolve(cwd, options.file) : path.join(cwd, CONFIG_FILE_NAME);

    const fileValues = await readConfigFile(filePath, options.file !== undefined);
    return resolveConfig(getDefaultConfig(cwd), fileValues, fromEnv(env));
}
