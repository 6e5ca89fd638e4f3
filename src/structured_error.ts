/**
 * Structured Error Schema
 *
 * Every failure the tool reports is one of three kinds. Errors are raised at
 * the boundary (load time, argument parsing, write time) and propagate
 * unmodified to the CLI dispatcher, which renders them and picks the exit code.
 */

import { EXIT_CODES, ExitCode } from './config';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorKind = 'file_access' | 'data_format' | 'invalid_argument';

export type ErrorCode =
    // File access
    | 'FILE_NOT_FOUND'
    | 'FILE_UNREADABLE'
    | 'OUTPUT_DIR_MISSING'
    | 'FILE_UNWRITABLE'

    // Data format
    | 'INVALID_JSON'
    | 'UNSUPPORTED_SHAPE'
    | 'INVALID_CATEGORY'
    | 'INVALID_ENTRY'

    // Arguments
    | 'UNKNOWN_COMMAND'
    | 'MISSING_ARGUMENT'
    | 'UNKNOWN_OPTION'
    | 'INVALID_OPTION'
    | 'INVALID_PATTERN';

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export interface StructuredError {
    code: ErrorCode | 'UNEXPECTED';
    kind: ErrorKind | 'unexpected';
    message: string;
    severity: 'FATAL' | 'ERROR';
    context: ErrorContext;
    hint?: string;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export abstract class PromptscopeError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: ErrorContext = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
    }
}

/** Input unreadable or output unwritable. */
export class FileAccessError extends PromptscopeError {
    readonly kind = 'file_access' as const;

    constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
        super(message, code, context, cause);
        this.name = 'FileAccessError';
    }
}

/** Input JSON is invalid or does not match a supported shape. */
export class DataFormatError extends PromptscopeError {
    readonly kind = 'data_format' as const;

    constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
        super(message, code, context, cause);
        this.name = 'DataFormatError';
    }
}

/** Missing, unknown or malformed command-line arguments. */
export class InvalidArgumentError extends PromptscopeError {
    readonly kind = 'invalid_argument' as const;

    constructor(message: string, code: ErrorCode, context: ErrorContext = {}, cause?: unknown) {
        super(message, code, context, cause);
        this.name = 'InvalidArgumentError';
    }
}

/* -------------------------------------------------------------------------- */
/* Conversion                                                                 */
/* -------------------------------------------------------------------------- */

const HINTS: Partial<Record<ErrorCode, string>> = {
    FILE_NOT_FOUND: 'Check the input path.',
    OUTPUT_DIR_MISSING: 'Create the output directory first.',
    INVALID_JSON: 'The input must be a JSON document.',
    UNSUPPORTED_SHAPE: 'Use an object of category -> entries, or an array of entries with a "category" field.',
    INVALID_ENTRY: 'Each entry needs a "text", "content" or "prompt" string.',
    UNKNOWN_COMMAND: 'Run `promptscope help` for usage.',
    UNKNOWN_OPTION: 'Run `promptscope help` for usage.',
};

export function toStructuredError(err: unknown): StructuredError {
    const timestamp = new Date().toISOString();

    if (err instanceof PromptscopeError) {
        return {
            code: err.code,
            kind: err.kind,
            message: err.message,
            severity: 'FATAL',
            context: err.context,
            hint: HINTS[err.code],
            timestamp,
        };
    }

    return {
        code: 'UNEXPECTED',
        kind: 'unexpected',
        message: err instanceof Error ? err.message : String(err),
        severity: 'ERROR',
        context: {},
        timestamp,
    };
}

export function exitCodeFor(err: unknown): ExitCode {
    if (!(err instanceof PromptscopeError)) return EXIT_CODES.UNEXPECTED;
    switch (err.kind) {
        case 'file_access': return EXIT_CODES.FILE_ACCESS;
        case 'data_format': return EXIT_CODES.DATA_FORMAT;
        case 'invalid_argument': return EXIT_CODES.INVALID_ARGUMENT;
    }
}

/** Render for stderr: a headline plus one indented line per context key. */
export function formatStructuredError(se: StructuredError): string {
    const lines = [`Error [${se.code}]: ${se.message}`];
    for (const [key, value] of Object.entries(se.context)) {
        if (value !== undefined) lines.push(`  ${key}: ${value}`);
    }
    if (se.hint) lines.push(`  hint: ${se.hint}`);
    return lines.join('\n');
}

/** Map a Node fs error code onto the file-access taxonomy. */
export function fileErrorFromErrno(
    err: unknown,
    filePath: string,
    operation: 'read' | 'write'
): FileAccessError {
    const errno = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    const detail = err instanceof Error ? err.message : String(err);

    if (operation === 'read') {
        if (errno === 'ENOENT') {
            return new FileAccessError(`Input file not found: ${filePath}`, 'FILE_NOT_FOUND', { path: filePath }, err);
        }
        return new FileAccessError(`Cannot read ${filePath}: ${detail}`, 'FILE_UNREADABLE', { path: filePath, errno }, err);
    }

    if (errno === 'ENOENT') {
        return new FileAccessError(`Output directory does not exist for ${filePath}`, 'OUTPUT_DIR_MISSING', { path: filePath }, err);
    }
    return new FileAccessError(`Cannot write ${filePath}: ${detail}`, 'FILE_UNWRITABLE', { path: filePath, errno }, err);
}
