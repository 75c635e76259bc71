/**
 * Phase Executor — runs one phase command as a child process.
 *
 * stdout and stderr are appended to the run log as they arrive. The result
 * settles once, on the child's close or on a spawn failure. The child leads
 * its own process group; on timeout the whole group is SIGKILLed, the result
 * settles on the child's exit, and it is reported like any signal death:
 * 128 + signal.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { Env } from './config';
import { createLogger } from './logger';

const log = createLogger('phase-executor');

const SIGNAL_NUMBERS: Record<string, number> = { ...os.constants.signals };

export interface PhaseExecutionRequest {
    command: readonly string[];
    cwd: string;
    env: Env;
    logPath: string;
    timeoutMs?: number;
    /** Mirror child output to this process's stderr. */
    echo?: boolean;
}

export interface PhaseExecutionResult {
    started: boolean;
    exit_code: number;
    signal: string | null;
    timed_out: boolean;
    duration_ms: number;
    error?: string;
}

const GROUP_KILL = process.platform !== 'win32';

/** Exit status for a process that ended on `signal`. */
export function signalExitCode(signal: string): number {
    return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
}

export function executePhase(req: PhaseExecutionRequest): Promise<PhaseExecutionResult> {
    const [file, ...args] = req.command;
    const startedAt = Date.now();
    fs.mkdirSync(path.dirname(req.logPath), { recursive: true });
    const logFd = fs.openSync(req.logPath, 'a');

    return new Promise<PhaseExecutionResult>((resolve) => {
        let settled = false;
        let started = false;
        let timedOut = false;
        let timer: NodeJS.Timeout | undefined;

        const settle = (result: Omit<PhaseExecutionResult, 'duration_ms'>): void => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            fs.closeSync(logFd);
            resolve({ ...result, duration_ms: Date.now() - startedAt });
        };

        if (!file) {
            settle({ started: false, exit_code: 127, signal: null, timed_out: false, error: 'empty command' });
            return;
        }

        const child = spawn(file, args, {
            cwd: req.cwd,
            env: req.env,
            stdio: ['ignore', 'pipe', 'pipe'],
            detached: GROUP_KILL,
        });

        const killGroup = (): void => {
            const pid = child.pid;
            if (GROUP_KILL && pid !== undefined) {
                try {
                    process.kill(-pid, 'SIGKILL');
                    return;
                } catch (e: unknown) {
                    log.warn('Process group kill failed, killing the phase process only', {
                        pid,
                        error: e instanceof Error ? e.message : String(e),
                    });
                }
            }
            child.kill('SIGKILL');
        };

        const onData = (chunk: Buffer): void => {
            if (settled) return;
            fs.writeSync(logFd, chunk);
            if (req.echo) process.stderr.write(chunk);
        };
        child.stdout.on('data', onData);
        child.stderr.on('data', onData);

        child.on('spawn', () => {
            started = true;
            log.debug('Phase process started', { pid: child.pid, command: file });
            if (req.timeoutMs && req.timeoutMs > 0) {
                const ms = req.timeoutMs;
                timer = setTimeout(() => {
                    timedOut = true;
                    log.error(`Phase timeout after ${ms}ms; sending SIGKILL`, { pid: child.pid });
                    killGroup();
                }, ms);
            }
        });

        child.on('error', (err: Error) => {
            if (started) {
                log.warn('Phase process error', { error: err.message });
                return;
            }
            log.error('Phase command could not start', { command: file, error: err.message });
            settle({ started: false, exit_code: 127, signal: null, timed_out: false, error: err.message });
        });

        // after a timeout kill nothing more is read; do not wait for pipes a stray process may hold
        child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
            if (!timedOut) return;
            child.stdout.destroy();
            child.stderr.destroy();
            const exit = code ?? (signal ? signalExitCode(signal) : 1);
            settle({ started, exit_code: exit, signal, timed_out: true });
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (!started) {
                settle({ started: false, exit_code: 127, signal: null, timed_out: false, error: 'process did not start' });
                return;
            }
            const exit = code ?? (signal ? signalExitCode(signal) : 1);
            log.debug('Phase process closed', { exit_code: exit, signal });
            settle({ started, exit_code: exit, signal, timed_out: timedOut });
        });
    });
}
