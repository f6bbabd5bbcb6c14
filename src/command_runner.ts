/**
 * Command Runner - subprocess boundary for the toolchain and the provider CLI
 *
 * Runs one command to completion and reports `{exitCode, stdout, stderr}`.
 * Spawn failures and timeouts are reported as non-zero exits rather than
 * rejections, so callers only ever branch on the exit code.
 */

import { spawn } from 'child_process';
import { createLogger } from './logger';

const log = createLogger('command-runner');

export interface CommandRequest {
    command: string;
    args: string[];
    cwd?: string;
    timeoutMs: number;
    env?: Record<string, string>;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

export interface CommandRunner {
    run(req: CommandRequest): Promise<CommandResult>;
}

export const EXIT_SPAWN_FAILED = -1;
export const EXIT_TIMED_OUT = 124;

export class SpawnCommandRunner implements CommandRunner {
    run(req: CommandRequest): Promise<CommandResult> {
        return new Promise<CommandResult>((resolve) => {
            const started = Date.now();
            const label = [req.command, ...req.args].join(' ');
            log.debug('Spawning', { command: label, cwd: req.cwd });

            const child = spawn(req.command, req.args, {
                cwd: req.cwd,
                env: req.env ? { ...process.env, ...req.env } : process.env,
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            let settled = false;
            let timedOut = false;

            const finish = (exitCode: number, extraStderr = ''): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                const result: CommandResult = {
                    exitCode,
                    stdout: Buffer.concat(stdout).toString('utf8'),
                    stderr: Buffer.concat(stderr).toString('utf8') + extraStderr,
                    timedOut,
                };
                log.debug('Command finished', {
                    command: label,
                    exit_code: exitCode,
                    duration_ms: Date.now() - started,
                    timed_out: timedOut,
                });
                resolve(result);
            };

            const timer = setTimeout(() => {
                timedOut = true;
                log.error(`Command timeout after ${req.timeoutMs}ms`, { command: label });
                child.kill('SIGKILL');
                finish(EXIT_TIMED_OUT, `\n${label} killed after ${req.timeoutMs}ms`);
            }, req.timeoutMs);

            child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
            child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

            child.on('error', (e: Error) => {
                finish(EXIT_SPAWN_FAILED, `${label}: ${e.message}`);
            });

            child.on('close', (code: number | null) => {
                finish(code ?? EXIT_SPAWN_FAILED);
            });
        });
    }
}
