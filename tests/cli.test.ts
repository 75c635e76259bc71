import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { EXIT_FAILURE, EXIT_HOOK_BLOCK, EXIT_OK, HandoffKernelCLI } from '../src/cli';
import type { CliIO } from '../src/cli';
import type { Env } from '../src/config';
import { EventLedger } from '../src/event_ledger';
import { toPosix } from '../src/glob';

const BUNDLED_PIPELINES = path.resolve(__dirname, '..', 'config', 'pipelines.json');
const FIVE_MB = 5 * 1024 * 1024;

class CapturingIO implements CliIO {
    readonly stdout: string[] = [];
    readonly stderr: string[] = [];
    constructor(private readonly stdin = '') {}
    out(line: string): void {
        this.stdout.push(line);
    }
    err(line: string): void {
        this.stderr.push(line);
    }
    readStdin(): string {
        return this.stdin;
    }
}

interface Dirs {
    ws: string;
    state: string;
    tmp: string;
}

async function withDirs(fn: (d: Dirs) => Promise<void>): Promise<void> {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'handoff-cli-'));
    const ws = path.join(tmp, 'ws');
    const state = path.join(tmp, 'state');
    fs.mkdirSync(ws);
    try {
        await fn({ ws, state, tmp });
    } finally {
        fs.rmSync(tmp, { recursive: true, force: true });
    }
}

async function cli(env: Env, args: string[], stdin = ''): Promise<{ code: number; io: CapturingIO }> {
    const io = new CapturingIO(stdin);
    const code = await new HandoffKernelCLI(env, io).run(args);
    return { code, io };
}

function baseEnv(d: Dirs, extra: Env = {}): Env {
    return {
        PATH: process.env.PATH,
        HANDOFF_ROOT: d.state,
        HANDOFF_WORKSPACE: d.ws,
        HANDOFF_PIPELINES: BUNDLED_PIPELINES,
        ...extra,
    };
}

/* -------------------------------------------------------------------------- */
/* hook                                                                       */
/* -------------------------------------------------------------------------- */

test('hook blocks a test edit during the green phase with exit 2', async () => {
    await withDirs(async (d) => {
        const env = baseEnv(d, {
            TDD_PHASE: 'green',
            HANDOFF_TOOL_NAME: 'Write',
            HANDOFF_TOOL_INPUT: JSON.stringify({ file_path: 'tests/foo_test.py', content: 'x' }),
        });
        const { code, io } = await cli(env, ['hook']);
        assert.equal(code, EXIT_HOOK_BLOCK);
        assert.deepEqual(io.stderr, ['Cannot edit test files during GREEN phase']);
        assert.deepEqual(io.stdout, []);

        const source = await cli(
            { ...env, HANDOFF_TOOL_INPUT: JSON.stringify({ file_path: 'src/app.py', content: 'x' }) },
            ['hook']
        );
        assert.equal(source.code, EXIT_OK);
    });
});

test('hook blocks a 5 MB read unless the file is on the must-read allowlist', async () => {
    await withDirs(async (d) => {
        fs.mkdirSync(path.join(d.ws, 'data'));
        const big = path.join(d.ws, 'data', 'big.bin');
        fs.writeFileSync(big, '');
        fs.truncateSync(big, FIVE_MB);

        const env = baseEnv(d, {
            HANDOFF_TOOL_NAME: 'Read',
            HANDOFF_TOOL_INPUT: JSON.stringify({ file_path: 'data/big.bin' }),
        });
        const blocked = await cli(env, ['hook']);
        assert.equal(blocked.code, EXIT_HOOK_BLOCK);
        assert.deepEqual(blocked.io.stderr, [
            `BLOCKED: Read of large file ${toPosix(big)} (${FIVE_MB} bytes > 200000 bytes). ` +
                'Read a slice, or add the path to the must-read allowlist.',
        ]);

        const allowed = await cli({ ...env, MUST_READ_ALLOWLIST: 'data/big.bin' }, ['hook']);
        assert.equal(allowed.code, EXIT_OK);
        assert.deepEqual(allowed.io.stderr, []);
    });
});

test('hook lets tools that touch nothing privileged through', async () => {
    await withDirs(async (d) => {
        const { code, io } = await cli(
            baseEnv(d, { TDD_PHASE: 'green', HANDOFF_TOOL_NAME: 'Grep', HANDOFF_TOOL_INPUT: '{"pattern":"x"}' }),
            ['hook']
        );
        assert.equal(code, EXIT_OK);
        assert.deepEqual(io.stderr, []);
    });
});

test('hook reports a nested re-entry as a block', async () => {
    await withDirs(async (d) => {
        const { code, io } = await cli(
            baseEnv(d, {
                HANDOFF_TOOL_NAME: 'Write',
                HANDOFF_TOOL_INPUT: '{"file_path":"a.txt","content":""}',
                HANDOFF_REENTRY: '2',
            }),
            ['hook']
        );
        assert.equal(code, EXIT_HOOK_BLOCK);
        assert.equal(io.stderr.length, 1);
    });
});

test('hook input that is not JSON fails and is recorded in the ledger', async () => {
    await withDirs(async (d) => {
        const env = baseEnv(d, { HANDOFF_TOOL_NAME: 'Write', HANDOFF_TOOL_INPUT: '{not json' });
        const unscoped = await cli(env, ['hook']);
        assert.equal(unscoped.code, EXIT_FAILURE);
        assert.match(unscoped.io.stderr[0], /"code":"CONFIGURATION_ERROR"/);

        const scoped = await cli({ ...env, HANDOFF_RUN_ID: 'run-hook', TDD_PHASE: 'green' }, ['hook']);
        assert.equal(scoped.code, EXIT_FAILURE);

        const ledger = new EventLedger(path.join(d.state, 'ledger', 'events.jsonl'));
        assert.deepEqual(
            ledger.read({ event_kind: 'error' }).map((e) => `${e.run_id}:${e.pipeline ?? '-'}:${e.detail ?? ''}`),
            [
                'unscoped:-:CONFIGURATION_ERROR: HANDOFF_TOOL_INPUT is not JSON',
                'run-hook:-:CONFIGURATION_ERROR: HANDOFF_TOOL_INPUT is not JSON',
            ]
        );
    });
});

/* -------------------------------------------------------------------------- */
/* validation                                                                 */
/* -------------------------------------------------------------------------- */

test('validate-capsule prints PASS or FAIL', async () => {
    await withDirs(async (d) => {
        const good = path.join(d.tmp, 'good.txt');
        fs.writeFileSync(
            good,
            [
                'BEGIN_CAPSULE',
                'Goal: Ship the parser',
                'What happened: Tests pass',
                'Current status: ok',
                'Next action requested: Review',
                'Evidence pointers:',
                '- tests/',
                'END_CAPSULE',
                '',
            ].join('\n')
        );
        const pass = await cli(baseEnv(d), ['validate-capsule', good]);
        assert.equal(pass.code, EXIT_OK);
        assert.deepEqual(pass.io.stdout, [`PASS: ${good}`]);

        const bad = path.join(d.tmp, 'bad.txt');
        fs.writeFileSync(bad, 'just some text\n');
        const fail = await cli(baseEnv(d), ['validate-capsule', bad]);
        assert.equal(fail.code, EXIT_FAILURE);
        assert.equal(fail.io.stdout[0], `FAIL: ${bad}`);
        assert.ok(fail.io.stdout.length > 1);
    });
});

test('validate-manifest reports unparseable JSON', async () => {
    await withDirs(async (d) => {
        const file = path.join(d.tmp, 'manifest.json');
        fs.writeFileSync(file, '{ not json');
        const { code, io } = await cli(baseEnv(d), ['validate-manifest', file]);
        assert.equal(code, EXIT_FAILURE);
        assert.equal(io.stdout[0], `FAIL: ${file}`);
        assert.match(io.stdout[1], /^ {2}- not valid JSON: /);
    });
});

/* -------------------------------------------------------------------------- */
/* runs and interop                                                           */
/* -------------------------------------------------------------------------- */

test('start-run, submit-request and process-one-request work end to end', async () => {
    await withDirs(async (d) => {
        const config = path.join(d.tmp, 'pipelines.json');
        fs.writeFileSync(
            config,
            JSON.stringify({
                pipelines: { demo: { phases: { make: { command: [process.execPath, '-e', "console.log('done')"] } } } },
            })
        );
        const env = baseEnv(d, { HANDOFF_PIPELINES: config });

        const started = await cli(env, ['start-run', 'demo', 'make']);
        assert.equal(started.code, EXIT_OK);
        assert.equal(started.io.stdout.length, 1);
        const summary: unknown = JSON.parse(started.io.stdout[0]);
        assert.ok(typeof summary === 'object' && summary !== null);
        const runId: unknown = Reflect.get(summary, 'run_id');
        assert.equal(typeof runId, 'string');
        assert.equal(Reflect.get(summary, 'exit_code'), 0);
        assert.equal(Reflect.get(summary, 'status'), 'ok');

        const listed = await cli(env, ['status']);
        assert.equal(listed.io.stdout.length, 1);
        assert.ok(listed.io.stdout[0].startsWith(`${String(runId)}  demo/make  exit 0  `));

        const submission = JSON.stringify({
            request_id: 'req-cli',
            from_pipeline: 'demo',
            to_pipeline: 'demo',
            action: 'make',
            args: [],
            parent_run_id: runId,
            inputs: [],
            must_read: [],
            read_budget: { max_files: 0, max_total_bytes: 0, allowed_paths: [] },
            deliverables_expected: [],
        });
        const submitted = await cli(env, ['submit-request', '-'], submission);
        assert.equal(submitted.code, EXIT_OK);
        assert.deepEqual(submitted.io.stdout, ['req-cli']);

        const queued = await cli(env, ['requests']);
        assert.deepEqual(queued.io.stdout, ['req-cli  demo -> demo/make  queued']);

        const processed = await cli(env, ['process-one-request']);
        assert.equal(processed.code, EXIT_OK);
        const response: unknown = JSON.parse(processed.io.stdout[0]);
        assert.ok(typeof response === 'object' && response !== null);
        assert.equal(Reflect.get(response, 'request_id'), 'req-cli');
        assert.equal(Reflect.get(response, 'status'), 'ok');

        const idle = await cli(env, ['process-one-request']);
        assert.equal(idle.code, EXIT_OK);
        assert.deepEqual(idle.io.stderr, ['No queued requests.']);
    });
});

test('submit-request rejects input that is not JSON', async () => {
    await withDirs(async (d) => {
        const { code, io } = await cli(baseEnv(d), ['submit-request', '-'], '{ nope');
        assert.equal(code, EXIT_FAILURE);
        const error: unknown = JSON.parse(io.stderr[0]);
        assert.ok(typeof error === 'object' && error !== null);
        assert.equal(Reflect.get(error, 'code'), 'INTEROP_REQUEST_MALFORMED');
    });
});

/* -------------------------------------------------------------------------- */
/* misc                                                                       */
/* -------------------------------------------------------------------------- */

test('status of an unknown run is a structured NOT_FOUND error', async () => {
    await withDirs(async (d) => {
        const { code, io } = await cli(baseEnv(d), ['status', 'run-missing']);
        assert.equal(code, EXIT_FAILURE);
        const error: unknown = JSON.parse(io.stderr[0]);
        assert.ok(typeof error === 'object' && error !== null);
        assert.equal(Reflect.get(error, 'code'), 'NOT_FOUND');
    });
});

test('help and unknown commands', async () => {
    await withDirs(async (d) => {
        const help = await cli(baseEnv(d), ['help']);
        assert.equal(help.code, EXIT_OK);
        assert.match(help.io.stdout[0], /handoff start-run <pipeline> <phase>/);

        const unknown = await cli(baseEnv(d), ['bogus']);
        assert.equal(unknown.code, EXIT_FAILURE);
        assert.equal(unknown.io.stderr[0], 'Unknown command: bogus');
    });
});
