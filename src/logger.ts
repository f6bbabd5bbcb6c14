/**
 * Structured Logger for the migration kernel
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when VPCMIG_LOG_JSON=1
 * - Optional file output via VPCMIG_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation (run id, stage, project) propagated through all log entries,
 *   held per run so concurrent migrations keep separate contexts
 *
 * Environment:
 *   VPCMIG_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   VPCMIG_LOG_JSON   = 1 (default: text)
 *   VPCMIG_LOG_FILE   = path (optional, appends)
 *   VPCMIG_DEBUG      = 1 (sets level to debug)
 */

import { AsyncLocalStorage } from 'async_hooks';
import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.VPCMIG_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.VPCMIG_DEBUG === '1' || process.env.VPCMIG_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.VPCMIG_LOG_JSON === '1';
let logFile = process.env.VPCMIG_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

export interface Correlation {
    runId: string;
    stage: string;
    project: string;
}

function emptyCorrelation(): Correlation {
    return { runId: '', stage: '', project: '' };
}

// Used outside runWithCorrelation (scripts, tests).
const processCorrelation: Correlation = emptyCorrelation();
const runCorrelation = new AsyncLocalStorage<Correlation>();

function activeCorrelation(): Correlation {
    return runCorrelation.getStore() ?? processCorrelation;
}

/**
 * Run `fn` with its own correlation context. Concurrent runs never see each
 * other's run id or stage.
 */
export function runWithCorrelation<T>(fn: () => Promise<T>): Promise<T> {
    return runCorrelation.run(emptyCorrelation(), fn);
}

/** Set fields of the active correlation context. Called by the workflow engine. */
export function setCorrelation(opts: Partial<Correlation>): void {
    const ctx = activeCorrelation();
    if (opts.runId !== undefined) ctx.runId = opts.runId;
    if (opts.stage !== undefined) ctx.stage = opts.stage;
    if (opts.project !== undefined) ctx.project = opts.project;
}

/** Clear the active correlation context. Called at run end. */
export function clearCorrelation(): void {
    Object.assign(activeCorrelation(), emptyCorrelation());
}

export function getCorrelation(): Correlation {
    return { ...activeCorrelation() };
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();
    const { runId, stage, project } = activeCorrelation();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (runId) entry.run_id = runId;
        if (stage) entry.stage = stage;
        if (project) entry.project = project;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = runId ? ` [${runId.slice(0, 8)}${stage ? ':' + stage : ''}${project ? '/' + project : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            // One notice, then console only
            process.stderr.write(`[logger] disabling VPCMIG_LOG_FILE=${logFile}: ${e instanceof Error ? e.message : String(e)}\n`);
            logFile = '';
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
