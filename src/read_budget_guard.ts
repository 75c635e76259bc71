/**
 * Read guards. Both checks are pure; the cumulative one is fed by
 * ReadBudgetAuthority, which owns the shared usage state.
 */

import { matchesAny } from './glob';
import type { ReadUsage } from './kernel_store';

export interface GuardDecision {
    allowed: boolean;
    reason?: string;
    allowlisted: boolean;
}

export interface BudgetLimits {
    max_files: number;
    max_total_bytes: number;
}

/**
 * Single-read size limit. A file larger than `maxReadBytes` is blocked unless
 * the path matches the allowlist; must-read inputs are never blocked on size.
 */
export function guardLargeRead(
    filePath: string,
    sizeBytes: number,
    allowlistGlobs: readonly string[],
    maxReadBytes: number
): GuardDecision {
    const allowlisted = matchesAny(filePath, allowlistGlobs);
    if (allowlisted || sizeBytes <= maxReadBytes) {
        return { allowed: true, allowlisted };
    }
    return {
        allowed: false,
        allowlisted,
        reason:
            `BLOCKED: Read of large file ${filePath} (${sizeBytes} bytes > ${maxReadBytes} bytes). ` +
            `Read a slice, or add the path to the must-read allowlist.`,
    };
}

/**
 * Cumulative budget: unique files and total bytes per run. A limit of 0 is
 * unlimited. Re-reading a file already counted costs nothing.
 */
export function checkReadBudget(
    usage: ReadUsage,
    filePath: string,
    sizeBytes: number,
    limits: BudgetLimits
): GuardDecision {
    if (usage.already_counted) return { allowed: true, allowlisted: false };

    const files = usage.unique_files + 1;
    if (limits.max_files > 0 && files > limits.max_files) {
        return {
            allowed: false,
            allowlisted: false,
            reason: `BLOCKED: Read budget exceeded: ${filePath} would be unique file ${files} (max_files ${limits.max_files}).`,
        };
    }

    const total = usage.total_bytes + sizeBytes;
    if (limits.max_total_bytes > 0 && total > limits.max_total_bytes) {
        return {
            allowed: false,
            allowlisted: false,
            reason:
                `BLOCKED: Read budget exceeded: ${filePath} brings total to ${total} bytes ` +
                `(max_total_bytes ${limits.max_total_bytes}).`,
        };
    }

    return { allowed: true, allowlisted: false };
}
