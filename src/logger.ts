/**
 * Structured Logger for promptscope
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when PROMPTSCOPE_LOG_JSON=1
 * - Optional file output via PROMPTSCOPE_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation ID propagated through all log entries
 *
 * All log lines go to stderr: stdout is reserved for command output.
 */

import * as fs from 'fs';
import { v4 as uuidv4 } from 'uuid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LoggerOptions {
    level?: LogLevel;
    json?: boolean;
    file?: string;
    /** Line sink; defaults to process.stderr */
    write?: (line: string) => void;
}

const defaultWrite = (line: string): void => {
    process.stderr.write(line + '\n');
};

let minLevel: number = LEVEL_ORDER.warn;
let jsonMode = false;
let logFile = '';
let writeLine: (line: string) => void = defaultWrite;
let fileFailureReported = false;

/** Apply runtime logging settings. Unset fields keep their current value. */
export function configureLogger(opts: LoggerOptions): void {
    if (opts.level !== undefined) minLevel = LEVEL_ORDER[opts.level];
    if (opts.json !== undefined) jsonMode = opts.json;
    if (opts.file !== undefined) {
        logFile = opts.file;
        fileFailureReported = false;
    }
    if (opts.write !== undefined) writeLine = opts.write;
}

export function resetLogger(): void {
    minLevel = LEVEL_ORDER.warn;
    jsonMode = false;
    logFile = '';
    writeLine = defaultWrite;
    fileFailureReported = false;
    clearCorrelation();
}

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId = '';
let _command = '';

/** Start a new run context. Called once per CLI invocation. */
export function beginRun(command: string): string {
    _runId = uuidv4();
    _command = command;
    return _runId;
}

export function currentRunId(): string {
    return _runId;
}

export function clearCorrelation(): void {
    _runId = '';
    _command = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < minLevel) return;

    const ts = new Date().toISOString();
    let line: string;

    if (jsonMode) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_command) entry.command = _command;
        if (data) entry.data = data;
        line = JSON.stringify(entry);
    } else {
        const ctx = _runId ? ` [${_runId.slice(0, 8)}${_command ? ':' + _command : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        line = data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
    }

    writeLine(line);
    appendToFile(line);
}

function appendToFile(line: string): void {
    if (!logFile) return;
    try {
        fs.appendFileSync(logFile, line + '\n');
    } catch (err) {
        // Report once per configured file, then keep logging to the sink only
        if (!fileFailureReported) {
            fileFailureReported = true;
            writeLine(`[logger] cannot append to ${logFile}: ${err instanceof Error ? err.message : String(err)}`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
