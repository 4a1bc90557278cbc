/**
 * Structured Logger — leveled component logging for enginekit
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when ENGINEKIT_LOG_JSON=1
 * - Optional file output via ENGINEKIT_LOG_FILE
 * - Module context (component name) on every line
 * - Build correlation (build id, step, rank) propagated through all entries
 *
 * Environment:
 *   ENGINEKIT_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   ENGINEKIT_LOG_JSON   = 1 (default: text)
 *   ENGINEKIT_LOG_FILE   = path (optional, appends)
 *   ENGINEKIT_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
    return 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.ENGINEKIT_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.ENGINEKIT_DEBUG === '1' || process.env.ENGINEKIT_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.ENGINEKIT_LOG_JSON === '1';
let logFile = process.env.ENGINEKIT_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Build Correlation Context (process-local singleton)                        */
/* -------------------------------------------------------------------------- */

let _buildId: string = '';
let _step: string = '';
let _rank: number | null = null;

/** Set the active build correlation context. Called by the loaders at build start. */
export function setCorrelation(opts: { buildId?: string; step?: string; rank?: number | null }): void {
    if (opts.buildId !== undefined) _buildId = opts.buildId;
    if (opts.step !== undefined) _step = opts.step;
    if (opts.rank !== undefined) _rank = opts.rank;
}

/** Clear correlation context. Called at build end. */
export function clearCorrelation(): void {
    _buildId = '';
    _step = '';
    _rank = null;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_buildId) entry.build_id = _buildId;
        if (_step) entry.step = _step;
        if (_rank !== null) entry.rank = _rank;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const rank = _rank !== null ? `#${_rank}` : '';
        const ctx = _buildId ? ` [${_buildId.slice(0, 8)}${rank}${_step ? ':' + _step : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error':
        case 'warn':
            process.stderr.write(line + '\n');
            break;
        default:
            process.stdout.write(line + '\n');
            break;
    }

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            // Stop appending after the first failure; console output continues.
            const target = logFile;
            logFile = '';
            process.stderr.write(`[logger] file output disabled for ${target}: ${e instanceof Error ? e.message : String(e)}\n`);
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
