/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the handoff kernel.
 * Values can be overridden via environment variables.
 */

import * as fs from 'fs';
import * as path from 'path';

export type Env = Record<string, string | undefined>;

function intFrom(env: Env, names: string[], fallback: number): number {
    for (const name of names) {
        const raw = env[name];
        if (raw === undefined || raw.trim() === '') continue;
        const parsed = parseInt(raw, 10);
        if (Number.isFinite(parsed) && parsed >= 0) return parsed;
    }
    return fallback;
}

// State root: ledger, runs, interop files and kernel.db live under it
export function stateRoot(env: Env = process.env): string {
    return path.resolve(env.HANDOFF_ROOT || '.handoff');
}

// Large-read threshold (bytes). MAX_READ_BYTES is the hook kit's legacy name.
export const DEFAULT_MAX_READ_BYTES = 200000;

export function maxReadBytes(env: Env = process.env): number {
    return intFrom(env, ['HANDOFF_MAX_READ_BYTES', 'MAX_READ_BYTES'], DEFAULT_MAX_READ_BYTES);
}

// Cumulative read budget per run (0 = unlimited)
export const READ_BUDGET_DEFAULTS = {
    MAX_FILES: 0,
    MAX_TOTAL_BYTES: 0,
};

export function readBudgetLimits(env: Env = process.env): { max_files: number; max_total_bytes: number } {
    return {
        max_files: intFrom(env, ['HANDOFF_READ_BUDGET_MAX_FILES', 'READ_BUDGET_MAX_FILES'], READ_BUDGET_DEFAULTS.MAX_FILES),
        max_total_bytes: intFrom(
            env,
            ['HANDOFF_READ_BUDGET_MAX_TOTAL_BYTES', 'READ_BUDGET_MAX_TOTAL_BYTES'],
            READ_BUDGET_DEFAULTS.MAX_TOTAL_BYTES
        ),
    };
}

/** Must-read allowlist: path-delimiter or newline separated. */
export function mustReadAllowlist(env: Env = process.env): string[] {
    const raw = env.HANDOFF_MUST_READ ?? env.MUST_READ_ALLOWLIST ?? '';
    return raw
        .split(new RegExp(`[${path.delimiter}\\n]`))
        .map((p) => p.trim())
        .filter((p) => p.length > 0);
}

// Manifest caps
export const MANIFEST_DEFAULTS = {
    MAX_FILES: 200,
    MAX_TOTAL_BYTES: 50 * 1024 * 1024,
};

export function manifestLimits(env: Env = process.env): { max_files: number; max_total_bytes: number } {
    return {
        max_files: intFrom(env, ['HANDOFF_MANIFEST_MAX_FILES'], MANIFEST_DEFAULTS.MAX_FILES),
        max_total_bytes: intFrom(env, ['HANDOFF_MANIFEST_MAX_TOTAL_BYTES'], MANIFEST_DEFAULTS.MAX_TOTAL_BYTES),
    };
}

// Capsule invariants
export const CAPSULE_LIMITS = {
    MAX_LINES: 30,
    MAX_LINE_CHARS: 240,
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    DELEGATE_HOOK_MS: 30000,
    SQLITE_BUSY_MS: 5000,
};

// 0 = no timeout
export function phaseTimeoutMs(env: Env = process.env): number {
    return intFrom(env, ['HANDOFF_PHASE_TIMEOUT_MS'], 0);
}

// Run id allocation retries before giving up on collisions
export const RUN_ID_MAX_ATTEMPTS = 5;

export function isDebugEnabled(env: Env = process.env): boolean {
    return env.HANDOFF_DEBUG === '1' || env.HANDOFF_DEBUG === 'true';
}

/**
 * Resolve the pipeline configuration file.
 * Order: HANDOFF_PIPELINES, ./handoff.pipelines.json, bundled config/pipelines.json.
 */
export function pipelineConfigPath(env: Env = process.env): string {
    if (env.HANDOFF_PIPELINES) return path.resolve(env.HANDOFF_PIPELINES);

    const local = path.resolve('handoff.pipelines.json');
    if (fs.existsSync(local)) return local;

    // src/ when run from sources, dist/src/ when built
    const candidates = [
        path.resolve(__dirname, '..', 'config', 'pipelines.json'),
        path.resolve(__dirname, '..', '..', 'config', 'pipelines.json'),
    ];
    return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}
