/**
 * ReadBudgetAuthority: the single writer of per-run read usage.
 *
 * INVARIANT: a read is counted only if it was allowed, and the check and the
 * count happen in one IMMEDIATE transaction, so two processes racing on the
 * last slot of a budget cannot both be admitted.
 */

import { createLogger } from './logger';
import type { KernelStore, ReadUsage } from './kernel_store';
import { checkReadBudget } from './read_budget_guard';
import type { BudgetLimits, GuardDecision } from './read_budget_guard';

const log = createLogger('budget');

/** Admitted reads past this fraction of a limit log a warning. */
const WARN_THRESHOLD = 0.8;

export class ReadBudgetAuthority {
    constructor(private readonly store: KernelStore) {}

    authorize(runId: string, filePath: string, sizeBytes: number, limits: BudgetLimits): GuardDecision {
        const decision = this.store.immediate(() => {
            const usage = this.store.readUsage(runId, filePath);
            const d = checkReadBudget(usage, filePath, sizeBytes, limits);
            if (d.allowed && !usage.already_counted) {
                this.store.recordRead(runId, filePath, sizeBytes, new Date().toISOString());
            }
            return d;
        });

        if (!decision.allowed) {
            log.warn('Read budget exhausted', { run_id: runId, path: filePath });
        } else {
            this.warnNearLimit(runId, limits);
        }
        return decision;
    }

    usage(runId: string): ReadUsage {
        return this.store.readUsage(runId);
    }

    private warnNearLimit(runId: string, limits: BudgetLimits): void {
        const u = this.store.readUsage(runId);
        const fileRatio = limits.max_files > 0 ? u.unique_files / limits.max_files : 0;
        const byteRatio = limits.max_total_bytes > 0 ? u.total_bytes / limits.max_total_bytes : 0;
        if (fileRatio >= WARN_THRESHOLD || byteRatio >= WARN_THRESHOLD) {
            log.warn('Read budget nearly used', {
                run_id: runId,
                unique_files: u.unique_files,
                total_bytes: u.total_bytes,
                max_files: limits.max_files,
                max_total_bytes: limits.max_total_bytes,
            });
        }
    }
}
