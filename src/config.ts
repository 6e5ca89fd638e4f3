/**
 * Shared Configuration Constants
 *
 * Centralized configuration for promptscope.
 * Values can be overridden via environment variables.
 */

import type { LogLevel } from './logger';

export const VERSION = '0.1.0';

// Truncation of prompt text shown in analysis and search output
export const STATS_PREVIEW_CHARS = 200;
export const SEARCH_PREVIEW_CHARS = 300;

export const DEFAULT_DOCUMENT_TITLE = 'Extracted Prompts';
export const DEFAULT_DOCUMENT_INTRO = 'Extracted prompts organized by category.';

// Keys checked, in order, for the body of an entry object
export const TEXT_KEYS = ['text', 'content', 'prompt'] as const;

export const EXIT_CODES = {
    OK: 0,
    UNEXPECTED: 1,
    INVALID_ARGUMENT: 2,
    FILE_ACCESS: 3,
    DATA_FORMAT: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

export interface RuntimeConfig {
    logLevel: LogLevel;
    logJson: boolean;
    logFile: string;
    fsyncMode: FsyncMode;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function isTruthy(value: string | undefined): boolean {
    return value === '1' || value === 'true';
}

/**
 * Resolve runtime settings from an environment map. The CLI passes
 * `process.env`; tests pass a literal.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const requested = (env.PROMPTSCOPE_LOG_LEVEL || 'warn').toLowerCase();
    const logLevel: LogLevel = isTruthy(env.PROMPTSCOPE_DEBUG)
        ? 'debug'
        : isLogLevel(requested) ? requested : 'warn';

    return {
        logLevel,
        logJson: env.PROMPTSCOPE_LOG_JSON === '1',
        logFile: env.PROMPTSCOPE_LOG_FILE || '',
        fsyncMode: env.PROMPTSCOPE_FSYNC === 'REQUIRED' ? 'REQUIRED' : 'BEST_EFFORT',
    };
}
