/**
 * Kernel wiring: one state root, one database, one ledger, and the
 * components built on them. Every CLI command opens a kernel, does its work
 * and closes it.
 */

import * as fs from 'fs';
import * as path from 'path';

import { ReadBudgetAuthority } from './budget_authority';
import {
    isDebugEnabled,
    maxReadBytes,
    mustReadAllowlist,
    pipelineConfigPath,
    readBudgetLimits,
    stateRoot,
} from './config';
import type { Env } from './config';
import { traceSinkFromEnv } from './debug_logger';
import { EventLedger, UNSCOPED_RUN_ID } from './event_ledger';
import { CommandDelegate, HookDispatcher } from './hook_dispatcher';
import { InteropQueue } from './interop_queue';
import { KernelStore } from './kernel_store';
import { classifyToolCall } from './operation_classifier';
import { errnoCode } from './output_writer';
import { Pipelines } from './pipeline_config';
import { RuleTable } from './rule_table';
import { RunManager } from './run_manager';
import type { ManifestCaps } from './manifest_builder';
import { ConfigurationError } from './structured_error';
import { UNSCOPED } from './kernel_types';
import type { CallContext } from './kernel_types';

export interface KernelOptions {
    env?: Env;
    root?: string;
    workspaceRoot?: string;
    pipelines?: Pipelines;
    pipelinesPath?: string;
    consumerId?: string;
    caps?: ManifestCaps;
    timeoutMs?: number;
    echo?: boolean;
}

export interface Kernel {
    env: Env;
    root: string;
    workspaceRoot: string;
    pipelines: Pipelines;
    rules: RuleTable;
    store: KernelStore;
    ledger: EventLedger;
    budget: ReadBudgetAuthority;
    runs: RunManager;
    queue: InteropQueue;
    close(): void;
}

export function openKernel(opts: KernelOptions = {}): Kernel {
    const env = opts.env ?? process.env;
    const root = path.resolve(opts.root ?? stateRoot(env));
    const workspaceRoot = path.resolve(opts.workspaceRoot ?? env.HANDOFF_WORKSPACE ?? process.cwd());
    const pipelines = opts.pipelines ?? Pipelines.fromFile(opts.pipelinesPath ?? pipelineConfigPath(env));

    fs.mkdirSync(root, { recursive: true });
    const store = new KernelStore(path.join(root, 'kernel.db'));
    const ledger = new EventLedger(path.join(root, 'ledger', 'events.jsonl'));
    const runs = new RunManager({
        root,
        workspaceRoot,
        pipelines,
        ledger,
        store,
        env,
        caps: opts.caps,
        timeoutMs: opts.timeoutMs,
        maxReadBytes: maxReadBytes(env),
        debug: isDebugEnabled(env),
        echo: opts.echo,
    });
    const queue = new InteropQueue({ root, store, ledger, pipelines, runs, consumerId: opts.consumerId });

    return {
        env,
        root,
        workspaceRoot,
        pipelines,
        rules: RuleTable.fromPipelines(pipelines),
        store,
        ledger,
        budget: new ReadBudgetAuthority(store),
        runs,
        queue,
        close: () => store.close(),
    };
}

/* -------------------------------------------------------------------------- */
/* Hook entry                                                                 */
/* -------------------------------------------------------------------------- */

/** Dispatcher configured from the phase environment contract. */
export function dispatcherFromEnv(kernel: Kernel, env: Env = kernel.env): HookDispatcher {
    const delegateCommand = env.HANDOFF_DELEGATE_HOOK;
    return new HookDispatcher({
        rules: kernel.rules,
        workspaceRoot: kernel.workspaceRoot,
        pipelines: kernel.pipelines,
        maxReadBytes: maxReadBytes(env),
        readBudget: { ...readBudgetLimits(env), allowed_paths: [] },
        mustRead: mustReadAllowlist(env),
        budgetAuthority: kernel.budget,
        ledger: kernel.ledger,
        trace: traceSinkFromEnv(env, kernel.root),
        delegate: delegateCommand ? new CommandDelegate(delegateCommand, { env }) : undefined,
    });
}

function parseHops(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === '') return 0;
    if (!/^\d+$/.test(raw.trim())) {
        throw new ConfigurationError(`HANDOFF_REENTRY must be a non-negative integer (got "${raw}")`);
    }
    return parseInt(raw, 10);
}

function fileSize(filePath: string): number {
    try {
        return fs.statSync(filePath).size;
    } catch (e: unknown) {
        // missing file: the tool reports it
        if (errnoCode(e) === 'ENOENT') return 0;
        throw e;
    }
}

/**
 * Call context for the tool call described by HANDOFF_TOOL_NAME and
 * HANDOFF_TOOL_INPUT, or null when the tool is not privileged. A bad
 * environment is recorded on the run (or unscoped) before it is thrown.
 */
export function callContextFromEnv(kernel: Kernel, env: Env = kernel.env): CallContext | null {
    try {
        return buildCallContext(kernel, env);
    } catch (e: unknown) {
        kernel.ledger.recordError(e, {
            run_id: env.HANDOFF_RUN_ID || env.RUN_ID || UNSCOPED_RUN_ID,
            pipeline: env.HANDOFF_PIPELINE,
            phase: env.HANDOFF_PHASE,
        });
        throw e;
    }
}

function buildCallContext(kernel: Kernel, env: Env): CallContext | null {
    const toolName = env.HANDOFF_TOOL_NAME;
    if (!toolName) throw new ConfigurationError('HANDOFF_TOOL_NAME is not set');

    let input: unknown;
    try {
        input = JSON.parse(env.HANDOFF_TOOL_INPUT ?? '{}');
    } catch (e: unknown) {
        throw new ConfigurationError('HANDOFF_TOOL_INPUT is not JSON', { error: String(e) });
    }

    const op = classifyToolCall(toolName, input);
    if (!op) return null;

    const active = kernel.pipelines.resolveActivePhase(env);
    const hops = parseHops(env.HANDOFF_REENTRY);
    const ctx: CallContext = {
        pipeline_kind: active?.pipeline_kind ?? UNSCOPED,
        phase: active?.phase ?? UNSCOPED,
        category: op.category,
        targets: op.targets,
        reentry: { active: hops > 0, hops },
    };
    if (op.command !== undefined) ctx.command = op.command;
    if (op.category === 'file_read') {
        ctx.size_bytes = fileSize(path.resolve(kernel.workspaceRoot, op.targets[0]));
    }
    const runId = env.HANDOFF_RUN_ID ?? env.RUN_ID;
    if (runId) ctx.run_id = runId;
    return ctx;
}
