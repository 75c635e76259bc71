/**
 * HookDispatcher: the gate every privileged operation of a phase passes
 * through.
 *
 * Delegation is one hop at most. The outermost dispatcher (reentry token not
 * active) may forward to a delegate with `{active: true, hops: 1}`; a
 * dispatcher that receives an active token and has a delegate of its own
 * answers `allow` instead of forwarding again. A token with more than one hop
 * means something outside this module re-entered the chain, which is fatal.
 *
 * Exactly one decision per operation is terminal and recorded.
 */

import { spawnSync } from 'child_process';
import * as path from 'path';

import { TIMEOUTS } from './config';
import type { Env } from './config';
import { noopTraceSink } from './debug_logger';
import type { TraceMarker, TraceSink } from './debug_logger';
import type { EventLedger } from './event_ledger';
import { UNSCOPED_RUN_ID } from './event_ledger';
import { absolutizeGlobs, relativePosix, toPosix } from './glob';
import { createLogger } from './logger';
import { toToolCall } from './operation_classifier';
import type { Pipelines } from './pipeline_config';
import type { ReadBudgetAuthority } from './budget_authority';
import { guardLargeRead } from './read_budget_guard';
import type { RuleTable } from './rule_table';
import { ConfigurationError, PolicyViolation, ReentrancyViolation } from './structured_error';
import { OPERATION_CATEGORIES } from './kernel_types';
import type { CallContext, Decision, ReadBudget } from './kernel_types';

const log = createLogger('dispatcher');

export interface DispatchTarget {
    readonly kind: string;
    /** True when the target appends its own hook_decision events. */
    readonly recordsDecisions: boolean;
    evaluate(ctx: CallContext): Decision;
}

export interface HookDispatcherOptions {
    kind?: string;
    rules: RuleTable;
    workspaceRoot: string;
    pipelines?: Pipelines;
    maxReadBytes: number;
    readBudget?: ReadBudget;
    mustRead?: readonly string[];
    budgetAuthority?: ReadBudgetAuthority;
    ledger?: EventLedger;
    trace?: TraceSink;
    delegate?: DispatchTarget;
}

const recordedErrors = new WeakSet<object>();

const NO_BUDGET: ReadBudget = { max_files: 0, max_total_bytes: 0, allowed_paths: [] };

/** Throws ConfigurationError for a context with missing or ill-typed fields. */
export function validateCallContext(ctx: CallContext): void {
    const problems: string[] = [];
    if (typeof ctx.pipeline_kind !== 'string' || ctx.pipeline_kind === '') problems.push('pipeline_kind');
    if (typeof ctx.phase !== 'string' || ctx.phase === '') problems.push('phase');
    if (!OPERATION_CATEGORIES.includes(ctx.category)) problems.push('category');
    if (!Array.isArray(ctx.targets) || !ctx.targets.every((t) => typeof t === 'string')) {
        problems.push('targets');
    } else if (ctx.category !== 'process_exec' && ctx.targets.length === 0) {
        problems.push('targets (empty)');
    }
    if (ctx.category === 'process_exec' && typeof ctx.command !== 'string') problems.push('command');
    if (ctx.size_bytes !== undefined && !(Number.isInteger(ctx.size_bytes) && ctx.size_bytes >= 0)) {
        problems.push('size_bytes');
    }
    const r = ctx.reentry;
    if (typeof r !== 'object' || r === null || typeof r.active !== 'boolean' || !Number.isInteger(r.hops) || r.hops < 0) {
        problems.push('reentry');
    } else if (r.active !== r.hops > 0) {
        problems.push('reentry (active and hops disagree)');
    }
    if (problems.length > 0) {
        throw new ConfigurationError(`Malformed call context: ${problems.join(', ')}`, { problems });
    }
}

export class HookDispatcher implements DispatchTarget {
    readonly kind: string;
    readonly recordsDecisions = true;
    private readonly trace: TraceSink;
    private readonly readBudget: ReadBudget;

    constructor(private readonly opts: HookDispatcherOptions) {
        this.kind = opts.kind ?? 'kernel';
        this.trace = opts.trace ?? noopTraceSink;
        this.readBudget = Object.freeze({
            ...(opts.readBudget ?? NO_BUDGET),
            allowed_paths: [...(opts.readBudget ?? NO_BUDGET).allowed_paths],
        });
    }

    evaluate(ctx: CallContext): Decision {
        try {
            return this.dispatch(ctx);
        } catch (e: unknown) {
            this.recordFailure(ctx, e);
            throw e;
        }
    }

    private dispatch(ctx: CallContext): Decision {
        validateCallContext(ctx);

        if (ctx.reentry.hops > 1) throw new ReentrancyViolation(ctx.reentry.hops);

        if (!ctx.reentry.active) this.mark('entered', ctx);

        const delegate = this.opts.delegate;
        if (delegate && ctx.reentry.active) {
            this.mark('reentry_guard', ctx);
            return this.finalize(ctx, {
                verdict: 'allow',
                reason: 'reentry guard: operation already inside a delegated dispatch',
                terminal: true,
                decided_by: this.kind,
            });
        }

        if (delegate) {
            this.mark('delegated', ctx, delegate.kind);
            const decision = delegate.evaluate({ ...ctx, reentry: { active: true, hops: ctx.reentry.hops + 1 } });
            if (!delegate.recordsDecisions) this.record(ctx, decision);
            return decision;
        }

        return this.finalize(ctx, this.evaluateLocally(ctx));
    }

    /** evaluate(), with a block turned into a thrown PolicyViolation. */
    enforce(ctx: CallContext): Decision {
        const decision = this.evaluate(ctx);
        if (decision.verdict === 'block') {
            throw new PolicyViolation(decision.reason ?? 'blocked', {
                rule: decision.rule,
                targets: ctx.targets,
                decided_by: decision.decided_by,
            });
        }
        return decision;
    }

    /* ---------------------------------------------------------------------- */
    /* Local policy                                                           */
    /* ---------------------------------------------------------------------- */

    private evaluateLocally(ctx: CallContext): Decision {
        const root = this.opts.workspaceRoot;
        const targets = ctx.targets.map((t) => relativePosix(root, t));
        const match = this.opts.rules.match(ctx.pipeline_kind, ctx.phase, ctx.category, {
            targets,
            command: ctx.command,
        });
        if (match) return this.block(match.rule.message, match.rule_id);

        if (ctx.category === 'file_read') {
            const readDecision = this.evaluateRead(ctx);
            if (readDecision) return readDecision;
        }

        return { verdict: 'allow', terminal: true, decided_by: this.kind };
    }

    private evaluateRead(ctx: CallContext): Decision | null {
        const root = this.opts.workspaceRoot;
        const size = ctx.size_bytes ?? 0;
        const safe = this.opts.pipelines?.has(ctx.pipeline_kind)
            ? this.opts.pipelines.get(ctx.pipeline_kind).safe_read_globs ?? []
            : [];
        const allowlist = absolutizeGlobs(
            [...this.readBudget.allowed_paths, ...(this.opts.mustRead ?? []), ...safe],
            root
        );
        const limits = this.readBudget;
        const budgeted = limits.max_files > 0 || limits.max_total_bytes > 0;

        for (const target of ctx.targets) {
            const abs = toPosix(path.resolve(root, target));
            const large = guardLargeRead(abs, size, allowlist, this.opts.maxReadBytes);
            if (!large.allowed) return this.block(large.reason ?? 'BLOCKED: Read of large file', 'read_guard:size');
            if (large.allowlisted || !budgeted || !ctx.run_id || !this.opts.budgetAuthority) continue;

            const spent = this.opts.budgetAuthority.authorize(ctx.run_id, abs, size, limits);
            if (!spent.allowed) return this.block(spent.reason ?? 'BLOCKED: Read budget exceeded', 'read_guard:budget');
        }
        return null;
    }

    private block(reason: string, rule: string): Decision {
        return { verdict: 'block', reason, rule, terminal: true, decided_by: this.kind };
    }

    /* ---------------------------------------------------------------------- */
    /* Recording                                                              */
    /* ---------------------------------------------------------------------- */

    /** Every error but a PolicyViolation goes to the ledger once, however many dispatchers it crosses. */
    private recordFailure(ctx: CallContext, err: unknown): void {
        if (err instanceof PolicyViolation) return;
        if (typeof err === 'object' && err !== null) {
            if (recordedErrors.has(err)) return;
            recordedErrors.add(err);
        }
        if (!this.opts.ledger) {
            log.error(err instanceof Error ? err.message : String(err), { dispatcher: this.kind });
            return;
        }
        // ctx may be the malformed context that caused the error
        this.opts.ledger.recordError(err, {
            run_id: typeof ctx.run_id === 'string' && ctx.run_id !== '' ? ctx.run_id : UNSCOPED_RUN_ID,
            pipeline: typeof ctx.pipeline_kind === 'string' ? ctx.pipeline_kind : undefined,
            phase: typeof ctx.phase === 'string' ? ctx.phase : undefined,
        });
    }

    private finalize(ctx: CallContext, decision: Decision): Decision {
        this.record(ctx, decision);
        return decision;
    }

    private record(ctx: CallContext, decision: Decision): void {
        const data = {
            dispatcher: decision.decided_by,
            category: ctx.category,
            targets: ctx.targets,
            rule: decision.rule,
        };
        if (decision.verdict === 'block') log.info(`Blocked: ${decision.reason ?? ''}`, data);
        else log.debug('Allowed', data);

        if (!this.opts.ledger || !ctx.run_id) return;
        this.opts.ledger.append({
            run_id: ctx.run_id,
            event_kind: 'hook_decision',
            pipeline: ctx.pipeline_kind,
            phase: ctx.phase,
            pointers: ctx.category === 'process_exec' ? [] : [...ctx.targets],
            detail: decision.rule ? `${decision.verdict}:${decision.rule}` : decision.verdict,
        });
    }

    private mark(marker: TraceMarker, ctx: CallContext, target?: string): void {
        this.trace.mark({
            marker,
            dispatcher: this.kind,
            target,
            category: ctx.category,
            pipeline: ctx.pipeline_kind,
            phase: ctx.phase,
            hops: ctx.reentry.hops,
            run_id: ctx.run_id,
        });
    }
}

/* -------------------------------------------------------------------------- */
/* External hook delegate                                                     */
/* -------------------------------------------------------------------------- */

/**
 * Runs an external hook command for one operation. The command sees the
 * operation as HANDOFF_TOOL_NAME / HANDOFF_TOOL_INPUT and HANDOFF_REENTRY set
 * to the hop count. Exit 0 allows, exit 2 blocks with stderr as the reason;
 * anything else is a configuration error.
 */
export class CommandDelegate implements DispatchTarget {
    readonly recordsDecisions = false;
    readonly kind: string;
    private readonly timeoutMs: number;
    private readonly env: Env;

    constructor(
        private readonly command: string,
        opts: { kind?: string; timeoutMs?: number; env?: Env } = {}
    ) {
        this.kind = opts.kind ?? `command:${command}`;
        this.timeoutMs = opts.timeoutMs ?? TIMEOUTS.DELEGATE_HOOK_MS;
        this.env = opts.env ?? process.env;
    }

    evaluate(ctx: CallContext): Decision {
        const call = toToolCall(ctx);
        const env: Env = {
            ...this.env,
            HANDOFF_REENTRY: String(ctx.reentry.hops),
            HANDOFF_TOOL_NAME: call.tool_name,
            HANDOFF_TOOL_INPUT: JSON.stringify(call.tool_input),
            HANDOFF_PIPELINE: ctx.pipeline_kind,
            HANDOFF_PHASE: ctx.phase,
        };
        if (ctx.run_id) env.HANDOFF_RUN_ID = ctx.run_id;

        const res = spawnSync(this.command, {
            shell: true,
            encoding: 'utf8',
            timeout: this.timeoutMs,
            env,
        });

        if (res.error) {
            throw new ConfigurationError(`Delegate hook could not run: ${res.error.message}`, { command: this.command });
        }
        if (res.status === 0) {
            return { verdict: 'allow', terminal: true, decided_by: this.kind };
        }
        if (res.status === 2) {
            const reason = res.stderr.trim() || `Blocked by ${this.kind}`;
            return { verdict: 'block', reason, rule: this.kind, terminal: true, decided_by: this.kind };
        }
        throw new ConfigurationError(`Delegate hook exited with ${res.status ?? res.signal ?? 'unknown status'}`, {
            command: this.command,
            stderr: res.stderr.slice(0, 500),
        });
    }
}
