/**
 * RunManager: the lifecycle of one phase run.
 *
 *   start  -> run id + run directory + run.json + phase_started
 *   (phase process runs, see phase_executor)
 *   finish -> phase_finished + capsule + manifest + artifact_indexed events
 *
 * A run is finished exactly once; its capsule and manifest are write-once.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { RUN_ID_MAX_ATTEMPTS, manifestLimits, maxReadBytes, phaseTimeoutMs } from './config';
import type { Env } from './config';
import { extractCapsule, renderCapsule, syntheticCapsule, writeCapsuleFile } from './capsule_extractor';
import { UNSCOPED_RUN_ID } from './event_ledger';
import type { ErrorScope, EventLedger } from './event_ledger';
import type { KernelStore, RunRecord } from './kernel_store';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import { ManifestBuilder, syntheticManifest, writeManifestFile } from './manifest_builder';
import type { FinishedRun, ManifestCaps, ManifestPointers } from './manifest_builder';
import { atomicCreateFileSync, atomicWriteJsonSync, errnoCode, stableStringify } from './output_writer';
import { executePhase } from './phase_executor';
import type { Pipelines } from './pipeline_config';
import { SAFE_ID_PATTERN } from './schemas';
import {
    ConfigurationError,
    ConsistencyError,
    NotFoundError,
    PhaseExecutionFailure,
    StorageError,
} from './structured_error';
import type { Capsule, CapsuleStatus, InteropRequest, Manifest, ReadBudget, Run } from './kernel_types';

const log = createLogger('runs');

/** Exit code of a phase that exited 0 but emitted a capsule that failed validation. */
export const CAPSULE_REJECTED_EXIT_CODE = 65;

const SAFE_ID = new RegExp(SAFE_ID_PATTERN);

/** Variables describing one run; never inherited by a child run from its parent. */
const PER_RUN_ENV = [
    'HANDOFF_RUN_ID',
    'HANDOFF_RUN_ROOT',
    'HANDOFF_PIPELINE',
    'HANDOFF_PHASE',
    'HANDOFF_CONTEXT',
    'HANDOFF_REENTRY',
    'HANDOFF_MUST_READ',
    'HANDOFF_READ_BUDGET_MAX_FILES',
    'HANDOFF_READ_BUDGET_MAX_TOTAL_BYTES',
    'HANDOFF_TOOL_NAME',
    'HANDOFF_TOOL_INPUT',
    'RUN_ID',
    'MUST_READ_ALLOWLIST',
    'READ_BUDGET_MAX_FILES',
    'READ_BUDGET_MAX_TOTAL_BYTES',
];

/* -------------------------------------------------------------------------- */
/* Ids                                                                        */
/* -------------------------------------------------------------------------- */

/** 2026-10-19T07:03:12.345Z -> 20261019T070312345Z */
export function compactTimestamp(d: Date = new Date()): string {
    return d.toISOString().replace(/[-:.]/g, '');
}

/** `<prefix>-<compact timestamp>-<6 hex>`: sorts by creation time. */
export function newId(prefix: string): string {
    return `${prefix}-${compactTimestamp()}-${crypto.randomBytes(3).toString('hex')}`;
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

function monotonicNowIso(prevIso: string): string {
    const prev = Date.parse(prevIso);
    const now = Date.now();
    return new Date(Number.isFinite(prev) ? Math.max(prev, now) : now).toISOString();
}

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface RunPaths {
    dir: string;
    runJson: string;
    capsule: string;
    manifest: string;
    logsDir: string;
    log: string;
    inputsDir: string;
}

/** Bounded context handed to a child run created from an interop request. */
export interface InitialContext {
    request: InteropRequest;
    parentCapsule: string;
    parentManifest: string;
}

export interface StartOptions {
    parentRunId?: string;
    readBudget?: ReadBudget;
    mustRead?: readonly string[];
    context?: InitialContext;
}

export interface RunHandle {
    run: Run;
    paths: RunPaths;
    readBudget: ReadBudget;
    mustRead: string[];
    contextPath?: string;
    finished: boolean;
}

export interface FinishOptions {
    started: boolean;
    timedOut?: boolean;
    signal?: string | null;
}

export interface RunSummary {
    run: FinishedRun;
    status: CapsuleStatus;
    capsule: Capsule;
    manifest: Manifest;
    capsule_path: string;
    manifest_path: string;
    capsule_problems?: string[];
}

export interface RunManagerOptions {
    root: string;
    workspaceRoot: string;
    pipelines: Pipelines;
    ledger: EventLedger;
    store: KernelStore;
    caps?: ManifestCaps;
    timeoutMs?: number;
    maxReadBytes?: number;
    /** Environment children inherit (minus per-run variables). */
    env?: Env;
    debug?: boolean;
    echo?: boolean;
}

/* -------------------------------------------------------------------------- */
/* Run manager                                                                */
/* -------------------------------------------------------------------------- */

export class RunManager {
    private readonly runsDir: string;
    private readonly caps: ManifestCaps;
    private readonly builder: ManifestBuilder;

    constructor(private readonly opts: RunManagerOptions) {
        this.runsDir = path.join(opts.root, 'runs');
        this.caps = opts.caps ?? manifestLimits(opts.env);
        this.builder = new ManifestBuilder(opts.workspaceRoot, { exclude: [opts.root] });
    }

    paths(runId: string): RunPaths {
        if (!SAFE_ID.test(runId)) throw new NotFoundError('Run', runId);
        const dir = path.join(this.runsDir, runId);
        return {
            dir,
            runJson: path.join(dir, 'run.json'),
            capsule: path.join(dir, 'capsule.md'),
            manifest: path.join(dir, 'manifest.json'),
            logsDir: path.join(dir, 'logs'),
            log: path.join(dir, 'logs', 'phase.log'),
            inputsDir: path.join(dir, 'inputs'),
        };
    }

    getRun(runId: string): RunRecord {
        const run = this.opts.store.getRun(runId);
        if (!run) throw new NotFoundError('Run', runId);
        return run;
    }

    listRuns(limit = 50): RunRecord[] {
        return this.opts.store.listRuns(limit);
    }

    /** Command for a phase: the configured argv followed by `args`. */
    commandFor(pipeline: string, phase: string, args: readonly string[]): string[] {
        return [...(this.opts.pipelines.phase(pipeline, phase).command ?? []), ...args];
    }

    start(pipeline: string, phase: string, args: readonly string[], opts: StartOptions = {}): RunHandle {
        const scope = { run_id: opts.parentRunId ?? UNSCOPED_RUN_ID, pipeline, phase };
        try {
            this.opts.pipelines.phase(pipeline, phase);
            if (opts.parentRunId !== undefined) this.getRun(opts.parentRunId);
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, scope);
            throw e;
        }

        const runId = this.allocateRunDir();
        const paths = this.paths(runId);
        fs.mkdirSync(paths.logsDir);
        fs.mkdirSync(paths.inputsDir);

        const run: Run = {
            run_id: runId,
            pipeline_kind: pipeline,
            phase,
            started_at: new Date().toISOString(),
            args: [...args],
        };
        if (opts.parentRunId !== undefined) run.parent_run_id = opts.parentRunId;

        const budget = opts.readBudget ?? { max_files: 0, max_total_bytes: 0, allowed_paths: [] };
        const mustRead = [...(opts.mustRead ?? [])];
        let contextPath: string | undefined;
        if (opts.context) {
            const written = this.writeInitialContext(paths, run, opts.context);
            contextPath = written.contextPath;
            mustRead.push(...written.pointers);
        }

        atomicWriteJsonSync({ filePath: paths.runJson, data: run });
        this.opts.store.insertRun(run, paths.dir);
        this.opts.ledger.append({
            run_id: runId,
            event_kind: 'phase_started',
            pipeline,
            phase,
            pointers: [paths.runJson],
        });
        setCorrelation({ runId, pipeline, phase });
        log.info('Run started', { run_id: runId, parent_run_id: run.parent_run_id });

        return {
            run,
            paths,
            readBudget: Object.freeze({ ...budget, allowed_paths: [...budget.allowed_paths] }),
            mustRead,
            contextPath,
            finished: false,
        };
    }

    /** Environment contract for the phase process. */
    phaseEnv(handle: RunHandle): Env {
        const base = this.opts.env ?? process.env;
        const legacyPhaseVars = this.opts.pipelines
            .kinds()
            .map((k) => this.opts.pipelines.get(k).phase_env)
            .filter((v): v is string => typeof v === 'string');
        const drop = new Set([...PER_RUN_ENV, ...legacyPhaseVars]);

        const env: Env = {};
        for (const [k, v] of Object.entries(base)) {
            if (!drop.has(k)) env[k] = v;
        }

        const { run, paths, readBudget } = handle;
        env.HANDOFF_ROOT = this.opts.root;
        env.HANDOFF_WORKSPACE = this.opts.workspaceRoot;
        env.HANDOFF_RUN_ID = run.run_id;
        env.HANDOFF_RUN_ROOT = paths.dir;
        env.HANDOFF_PIPELINE = run.pipeline_kind;
        env.HANDOFF_PHASE = run.phase;
        env.HANDOFF_MAX_READ_BYTES = String(this.opts.maxReadBytes ?? maxReadBytes(base));
        env.HANDOFF_READ_BUDGET_MAX_FILES = String(readBudget.max_files);
        env.HANDOFF_READ_BUDGET_MAX_TOTAL_BYTES = String(readBudget.max_total_bytes);
        const allow = [...handle.mustRead, ...readBudget.allowed_paths];
        if (allow.length > 0) env.HANDOFF_MUST_READ = allow.join(path.delimiter);
        if (handle.contextPath) env.HANDOFF_CONTEXT = handle.contextPath;
        if (this.opts.debug) env.HANDOFF_DEBUG = '1';

        const phaseVar = this.opts.pipelines.get(run.pipeline_kind).phase_env;
        if (phaseVar) env[phaseVar] = run.phase;
        return env;
    }

    finish(handle: RunHandle, exitCode: number, rawOutput: string, opts: FinishOptions): RunSummary {
        const { run, paths } = handle;
        const scope = { run_id: run.run_id, pipeline: run.pipeline_kind, phase: run.phase };

        const stored = this.opts.store.getRun(run.run_id);
        if (handle.finished || !stored || stored.ended_at !== undefined) {
            const err = new ConsistencyError(`Run ${run.run_id} is already finished`, { run_id: run.run_id });
            this.opts.ledger.recordError(err, scope);
            throw err;
        }
        handle.finished = true;

        const goal = `Complete the ${run.phase} phase of the ${run.pipeline_kind} pipeline`;
        let finalExit = exitCode;
        let capsule: Capsule;
        let capsuleText: string;
        let problems: string[] | undefined;

        const extracted = extractCapsule(rawOutput, { exitCode, goal, logPointer: paths.log });
        if (extracted.ok) {
            capsule = extracted.capsule;
            capsuleText = extracted.text;
        } else {
            this.opts.ledger.recordError(extracted.error, { ...scope, pointers: [paths.log] });
            problems = extracted.error.problems;
            if (finalExit === 0) finalExit = CAPSULE_REJECTED_EXIT_CODE;
            capsule = syntheticCapsule(`Capsule rejected: ${problems[0] ?? 'format error'}`, {
                exitCode: finalExit,
                goal,
                logPointer: paths.log,
            });
            capsuleText = renderCapsule(capsule);
        }

        const finished: FinishedRun = {
            ...run,
            ended_at: monotonicNowIso(run.started_at),
            exit_code: finalExit,
        };

        this.opts.ledger.append({
            ...scope,
            event_kind: 'phase_finished',
            exit_code: finalExit,
            pointers: [paths.log],
            detail: opts.timedOut ? 'timeout' : opts.signal ? `signal:${opts.signal}` : undefined,
        });

        // From here on the run is finalized whatever fails: a failed write is
        // recorded and replaced by its synthetic form.
        try {
            writeCapsuleFile(paths.capsule, capsuleText);
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, { ...scope, pointers: [paths.capsule] });
            capsule = syntheticCapsule(`Capsule could not be written: ${errorMessage(e)}`, { exitCode: finalExit, goal });
            const fallbackText = renderCapsule(capsule);
            this.tryWrite(scope, paths.capsule, () => writeCapsuleFile(paths.capsule, fallbackText));
        }

        const pipelineCfg = this.opts.pipelines.get(run.pipeline_kind);
        const pointers: ManifestPointers = {
            truth_pointers: pipelineCfg.truth_pointers ?? [],
            log_pointers: pipelineCfg.log_pointers ?? [],
        };
        let manifest: Manifest;
        try {
            manifest = opts.started
                ? this.builder.build(finished, this.opts.pipelines.artifactRules(run.pipeline_kind, run.phase), this.caps, pointers)
                : syntheticManifest(finished, this.caps, pointers);
            writeManifestFile(paths.manifest, manifest);
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, { ...scope, pointers: [paths.manifest] });
            const fallback = syntheticManifest(finished, this.caps, pointers);
            manifest = fallback;
            this.tryWrite(scope, paths.manifest, () => writeManifestFile(paths.manifest, fallback));
        }

        this.opts.ledger.append({ ...scope, event_kind: 'artifact_indexed', pointers: [paths.capsule], detail: 'capsule' });
        this.opts.ledger.append({ ...scope, event_kind: 'artifact_indexed', pointers: [paths.manifest], detail: 'manifest' });
        for (const artifact of manifest.artifacts) {
            this.opts.ledger.append({
                ...scope,
                event_kind: 'artifact_indexed',
                pointers: [path.join(this.opts.workspaceRoot, artifact.path)],
                detail: artifact.kind,
            });
        }

        atomicWriteJsonSync({ filePath: paths.runJson, data: finished });
        if (!this.opts.store.finishRun(run.run_id, finished.ended_at, finalExit)) {
            const err = new ConsistencyError(`Run ${run.run_id} was finished concurrently`, { run_id: run.run_id });
            this.opts.ledger.recordError(err, scope);
            throw err;
        }

        if (finalExit !== 0) {
            const reason = !opts.started
                ? 'phase command did not start'
                : opts.timedOut
                  ? 'timed out'
                  : problems
                    ? 'capsule rejected'
                    : opts.signal
                      ? `killed by ${opts.signal}`
                      : 'nonzero exit';
            this.opts.ledger.recordError(new PhaseExecutionFailure(run.run_id, finalExit, reason), {
                ...scope,
                pointers: [paths.log, paths.manifest],
            });
        }

        log.info('Run finished', { run_id: run.run_id, exit_code: finalExit, status: capsule.status });
        clearCorrelation();

        const summary: RunSummary = {
            run: finished,
            status: capsule.status,
            capsule,
            manifest,
            capsule_path: paths.capsule,
            manifest_path: paths.manifest,
        };
        if (problems) summary.capsule_problems = problems;
        return summary;
    }

    /** start -> execute -> finish. */
    async run(pipeline: string, phase: string, args: readonly string[], opts: StartOptions = {}): Promise<RunSummary> {
        let command: string[];
        try {
            command = this.commandFor(pipeline, phase, args);
            if (command.length === 0) {
                throw new ConfigurationError(`No command configured for ${pipeline}/${phase} and none given`);
            }
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, { run_id: opts.parentRunId ?? UNSCOPED_RUN_ID, pipeline, phase });
            throw e;
        }

        const handle = this.start(pipeline, phase, args, opts);
        const exec = await executePhase({
            command,
            cwd: this.opts.workspaceRoot,
            env: this.phaseEnv(handle),
            logPath: handle.paths.log,
            timeoutMs: this.opts.timeoutMs ?? phaseTimeoutMs(this.opts.env),
            echo: this.opts.echo,
        });

        const raw = exec.started
            ? fs.readFileSync(handle.paths.log, 'utf8')
            : `Phase command could not start: ${exec.error ?? 'unknown error'}`;
        return this.finish(handle, exec.exit_code, raw, {
            started: exec.started,
            timedOut: exec.timed_out,
            signal: exec.signal,
        });
    }

    /* ---------------------------------------------------------------------- */
    /* Internals                                                              */
    /* ---------------------------------------------------------------------- */

    private tryWrite(scope: ErrorScope, filePath: string, write: () => void): void {
        try {
            write();
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, { ...scope, pointers: [filePath] });
        }
    }

    /** Non-recursive mkdir: EEXIST means the id is taken. */
    private allocateRunDir(): string {
        fs.mkdirSync(this.runsDir, { recursive: true });
        for (let attempt = 1; attempt <= RUN_ID_MAX_ATTEMPTS; attempt++) {
            const runId = newId('run');
            try {
                fs.mkdirSync(path.join(this.runsDir, runId));
                return runId;
            } catch (e: unknown) {
                if (errnoCode(e) !== 'EEXIST') throw new StorageError(`Cannot create run directory for ${runId}`, e);
                log.warn('Run id collision, regenerating', { run_id: runId, attempt });
            }
        }
        throw new StorageError(`Could not allocate a unique run id after ${RUN_ID_MAX_ATTEMPTS} attempts`);
    }

    private writeInitialContext(
        paths: RunPaths,
        run: Run,
        ctx: InitialContext
    ): { contextPath: string; pointers: string[] } {
        const requestCopy = path.join(paths.inputsDir, 'request.json');
        const contextPath = path.join(paths.inputsDir, 'context.json');
        const { request } = ctx;

        atomicCreateFileSync({ filePath: requestCopy, content: stableStringify(request, 2) + '\n' });
        const context = {
            run_id: run.run_id,
            request_id: request.request_id,
            parent_run_id: request.parent_run_id,
            from_pipeline: request.from_pipeline,
            request_path: requestCopy,
            parent_capsule: ctx.parentCapsule,
            parent_manifest: ctx.parentManifest,
            inputs: request.inputs,
            must_read: request.must_read,
            deliverables_expected: request.deliverables_expected,
            read_budget: request.read_budget,
        };
        atomicCreateFileSync({ filePath: contextPath, content: stableStringify(context, 2) + '\n' });

        return { contextPath, pointers: [requestCopy, contextPath, ctx.parentCapsule, ctx.parentManifest] };
    }
}
