#!/usr/bin/env node
/**
 * CLI entry point for the handoff kernel.
 *
 * Exit codes: 0 success, 1 failure, 2 hook block.
 */

import * as fs from 'fs';
import * as path from 'path';

import { validateCapsuleText } from './capsule_extractor';
import type { Env } from './config';
import { UNSCOPED_RUN_ID } from './event_ledger';
import { callContextFromEnv, dispatcherFromEnv, openKernel } from './kernel';
import type { Kernel } from './kernel';
import { configureLogger } from './logger';
import { validateManifest } from './manifest_builder';
import type { RunSummary } from './run_manager';
import { InteropRequestMalformed, ReentrancyViolation, toStructuredError } from './structured_error';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_HOOK_BLOCK = 2;

export interface CliIO {
    out(line: string): void;
    err(line: string): void;
    readStdin(): string;
}

const processIO: CliIO = {
    out: (line) => process.stdout.write(line + '\n'),
    err: (line) => process.stderr.write(line + '\n'),
    readStdin: () => fs.readFileSync(0, 'utf8'),
};

function summaryJson(s: RunSummary): Record<string, unknown> {
    const out: Record<string, unknown> = {
        run_id: s.run.run_id,
        pipeline_kind: s.run.pipeline_kind,
        phase: s.run.phase,
        exit_code: s.run.exit_code,
        status: s.status,
        capsule_path: s.capsule_path,
        manifest_path: s.manifest_path,
        artifacts: s.manifest.artifacts.length,
        omitted_count: s.manifest.omitted_count,
    };
    if (s.capsule_problems) out.capsule_problems = s.capsule_problems;
    return out;
}

class HandoffKernelCLI {
    constructor(
        private readonly env: Env = process.env,
        private readonly io: CliIO = processIO
    ) {}

    /** `args` excludes the node binary and script path. */
    async run(args: string[]): Promise<number> {
        const command = args[0] || 'help';
        const rest = args.slice(1);

        // stdout carries command output (and nothing at all for the hook)
        configureLogger({ stdout: false });

        try {
            switch (command) {
                case 'start-run':
                    return await this.runStart(rest);
                case 'submit-request':
                    return this.withKernel((k) => this.runSubmit(k, rest));
                case 'process-one-request':
                    return await this.runProcessOne(rest);
                case 'validate-capsule':
                    return this.runValidateCapsule(rest);
                case 'validate-manifest':
                    return this.runValidateManifest(rest);
                case 'hook':
                    return this.withKernel((k) => this.runHook(k));
                case 'status':
                    return this.withKernel((k) => this.runStatus(k, rest));
                case 'requests':
                    return this.withKernel((k) => this.runRequests(k, rest));
                case 'help':
                case '--help':
                case '-h':
                    this.showHelp();
                    return EXIT_OK;
                default:
                    this.io.err(`Unknown command: ${command}`);
                    this.showHelp();
                    return EXIT_FAILURE;
            }
        } catch (e: unknown) {
            this.io.err(JSON.stringify(toStructuredError(e)));
            return EXIT_FAILURE;
        }
    }

    private openKernel(): Kernel {
        return openKernel({ env: this.env });
    }

    private withKernel(fn: (k: Kernel) => number): number {
        const kernel = this.openKernel();
        try {
            return fn(kernel);
        } finally {
            kernel.close();
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Runs                                                                   */
    /* ---------------------------------------------------------------------- */

    private async runStart(args: string[]): Promise<number> {
        const [pipeline, phase, ...tail] = args;
        if (!pipeline || !phase) {
            this.io.err('Usage: handoff start-run <pipeline> <phase> [-- command args...]');
            return EXIT_FAILURE;
        }
        const commandArgs = tail[0] === '--' ? tail.slice(1) : tail;

        const kernel = this.openKernel();
        try {
            const summary = await kernel.runs.run(pipeline, phase, commandArgs);
            this.io.out(JSON.stringify(summaryJson(summary), null, 2));
            return summary.run.exit_code === 0 ? EXIT_OK : EXIT_FAILURE;
        } finally {
            kernel.close();
        }
    }

    private runStatus(kernel: Kernel, args: string[]): number {
        const runId = args[0];
        if (!runId) {
            const runs = kernel.runs.listRuns();
            if (runs.length === 0) {
                this.io.out('No runs recorded.');
                return EXIT_OK;
            }
            for (const r of runs) {
                const exit = r.exit_code === undefined ? 'running' : `exit ${r.exit_code}`;
                this.io.out(`${r.run_id}  ${r.pipeline_kind}/${r.phase}  ${exit}  ${r.started_at}`);
            }
            return EXIT_OK;
        }

        const run = kernel.runs.getRun(runId);
        const events = kernel.ledger.read({ run_id: runId });
        this.io.out(JSON.stringify({ run, events }, null, 2));
        return EXIT_OK;
    }

    /* ---------------------------------------------------------------------- */
    /* Interop                                                                */
    /* ---------------------------------------------------------------------- */

    private runSubmit(kernel: Kernel, args: string[]): number {
        const source = args[0];
        if (!source) {
            this.io.err('Usage: handoff submit-request <file|->');
            return EXIT_FAILURE;
        }
        const text = source === '-' ? this.io.readStdin() : fs.readFileSync(path.resolve(source), 'utf8');

        let submission: unknown;
        try {
            submission = JSON.parse(text);
        } catch (e: unknown) {
            const err = new InteropRequestMalformed([`request is not valid JSON: ${e instanceof Error ? e.message : String(e)}`]);
            kernel.ledger.recordError(err, { run_id: UNSCOPED_RUN_ID });
            throw err;
        }

        const request = kernel.queue.enqueue(submission);
        this.io.out(request.request_id);
        return EXIT_OK;
    }

    private async runProcessOne(args: string[]): Promise<number> {
        const kernel = this.openKernel();
        try {
            const response = await kernel.queue.process(args[0]);
            if (!response) {
                this.io.err('No queued requests.');
                return EXIT_OK;
            }
            this.io.out(JSON.stringify(response, null, 2));
            return response.status === 'ok' ? EXIT_OK : EXIT_FAILURE;
        } finally {
            kernel.close();
        }
    }

    private runRequests(kernel: Kernel, args: string[]): number {
        const requestId = args[0];
        if (requestId) {
            this.io.out(JSON.stringify(kernel.queue.status(requestId), null, 2));
            return EXIT_OK;
        }
        for (const r of kernel.queue.list()) {
            this.io.out(`${r.request_id}  ${r.from_pipeline} -> ${r.to_pipeline}/${r.action}  ${r.state}`);
        }
        return EXIT_OK;
    }

    /* ---------------------------------------------------------------------- */
    /* Validation                                                             */
    /* ---------------------------------------------------------------------- */

    private runValidateCapsule(args: string[]): number {
        const file = args[0];
        if (!file) {
            this.io.err('Usage: handoff validate-capsule <path>');
            return EXIT_FAILURE;
        }
        const result = validateCapsuleText(fs.readFileSync(path.resolve(file), 'utf8'));
        return this.report(file, result.valid, result.problems);
    }

    private runValidateManifest(args: string[]): number {
        const file = args[0];
        if (!file) {
            this.io.err('Usage: handoff validate-manifest <path>');
            return EXIT_FAILURE;
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'));
        } catch (e: unknown) {
            return this.report(file, false, [`not valid JSON: ${e instanceof Error ? e.message : String(e)}`]);
        }
        const result = validateManifest(parsed);
        return this.report(file, result.valid, result.errors);
    }

    private report(file: string, valid: boolean, problems: readonly string[]): number {
        this.io.out(`${valid ? 'PASS' : 'FAIL'}: ${file}`);
        for (const p of problems) this.io.out(`  - ${p}`);
        return valid ? EXIT_OK : EXIT_FAILURE;
    }

    /* ---------------------------------------------------------------------- */
    /* Hook                                                                   */
    /* ---------------------------------------------------------------------- */

    private runHook(kernel: Kernel): number {
        const ctx = callContextFromEnv(kernel, this.env);
        if (!ctx) return EXIT_OK;

        try {
            const decision = dispatcherFromEnv(kernel, this.env).evaluate(ctx);
            if (decision.verdict === 'block') {
                this.io.err(decision.reason ?? 'Blocked');
                return EXIT_HOOK_BLOCK;
            }
            return EXIT_OK;
        } catch (e: unknown) {
            if (e instanceof ReentrancyViolation) {
                this.io.err(e.message);
                return EXIT_HOOK_BLOCK;
            }
            throw e;
        }
    }

    private showHelp(): void {
        this.io.out(`
handoff - bounded handoff kernel

Usage:
  handoff start-run <pipeline> <phase> [-- command args...]   Run one phase, print the run summary
  handoff submit-request <file|->                             Enqueue an interop request, print its id
  handoff process-one-request [request_id]                    Run the child phase for one request
  handoff validate-capsule <path>                             Check a capsule file
  handoff validate-manifest <path>                            Check a manifest file
  handoff hook                                                Evaluate one tool call (exit 2 = block)
  handoff status [run_id]                                     List runs, or one run and its events
  handoff requests [request_id]                               List interop requests, or one request

Environment:
  HANDOFF_ROOT          State root (default ./.handoff)
  HANDOFF_WORKSPACE     Workspace the phases run in (default cwd)
  HANDOFF_PIPELINES     Pipeline configuration file
  HANDOFF_TOOL_NAME     Tool name, for hook
  HANDOFF_TOOL_INPUT    Tool input JSON, for hook
`);
    }
}

if (require.main === module) {
    const cli = new HandoffKernelCLI();
    cli.run(process.argv.slice(2)).then(
        (code) => process.exit(code),
        (err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(EXIT_FAILURE);
        }
    );
}

export { HandoffKernelCLI };
