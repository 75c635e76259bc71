/**
 * Structured Logger for the handoff kernel
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when HANDOFF_LOG_JSON=1
 * - Optional file output via HANDOFF_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation (run_id / pipeline / phase) propagated through all entries
 *
 * Environment:
 *   HANDOFF_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   HANDOFF_LOG_JSON   = 1 (default: text)
 *   HANDOFF_LOG_FILE   = path (optional, appends)
 *   HANDOFF_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

const DEBUG_OVERRIDE = process.env.HANDOFF_DEBUG === '1' || process.env.HANDOFF_DEBUG === 'true';

let effectiveMin: number = DEBUG_OVERRIDE ? 0 : LEVEL_ORDER[parseLevel(process.env.HANDOFF_LOG_LEVEL)];
let jsonMode = process.env.HANDOFF_LOG_JSON === '1';
let logFile = process.env.HANDOFF_LOG_FILE || '';
// The hook command owns stdout/stderr as its protocol; it routes everything to stderr.
let stdoutAllowed = true;

export function configureLogger(opts: { level?: LogLevel; json?: boolean; file?: string; stdout?: boolean }): void {
    if (opts.level !== undefined) effectiveMin = LEVEL_ORDER[opts.level];
    if (opts.json !== undefined) jsonMode = opts.json;
    if (opts.file !== undefined) logFile = opts.file;
    if (opts.stdout !== undefined) stdoutAllowed = opts.stdout;
}

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId = '';
let _pipeline = '';
let _phase = '';

/** Set the active run correlation context. Called by the run manager at phase start. */
export function setCorrelation(opts: { runId?: string; pipeline?: string; phase?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.pipeline !== undefined) _pipeline = opts.pipeline;
    if (opts.phase !== undefined) _phase = opts.phase;
}

/** Clear correlation context. Called at phase end. */
export function clearCorrelation(): void {
    _runId = '';
    _pipeline = '';
    _phase = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < effectiveMin) return;

    const ts = new Date().toISOString();

    if (jsonMode) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_pipeline) entry.pipeline = _pipeline;
        if (_phase) entry.phase = _phase;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _runId ? ` [${_runId}${_pipeline ? ':' + _pipeline : ''}${_phase ? '/' + _phase : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    if (level === 'error' || level === 'warn' || !stdoutAllowed) {
        process.stderr.write(line + '\n');
    } else {
        process.stdout.write(line + '\n');
    }

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (err) {
            process.stderr.write(`[logger] cannot append to ${logFile}: ${String(err)}\n`);
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
