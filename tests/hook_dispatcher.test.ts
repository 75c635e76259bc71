import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ReadBudgetAuthority } from '../src/budget_authority';
import { MemoryTraceSink } from '../src/debug_logger';
import { EventLedger } from '../src/event_ledger';
import { toPosix } from '../src/glob';
import { CommandDelegate, HookDispatcher, validateCallContext } from '../src/hook_dispatcher';
import type { DispatchTarget } from '../src/hook_dispatcher';
import { KernelStore } from '../src/kernel_store';
import { Pipelines } from '../src/pipeline_config';
import { RuleTable } from '../src/rule_table';
import { ConfigurationError, PolicyViolation, ReentrancyViolation } from '../src/structured_error';
import type { CallContext, Decision } from '../src/kernel_types';

const pipelines = Pipelines.fromFile(path.join(__dirname, '..', 'config', 'pipelines.json'));
const rules = RuleTable.fromPipelines(pipelines);
const FIVE_MB = 5 * 1024 * 1024;

function tmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'hook-dispatcher-'));
}

function writeCtx(target: string, extra: Partial<CallContext> = {}): CallContext {
    return {
        pipeline_kind: 'tdd',
        phase: 'green',
        category: 'file_write',
        targets: [target],
        reentry: { active: false, hops: 0 },
        ...extra,
    };
}

function readCtx(target: string, size: number, extra: Partial<CallContext> = {}): CallContext {
    return {
        pipeline_kind: 'tdd',
        phase: 'green',
        category: 'file_read',
        targets: [target],
        size_bytes: size,
        reentry: { active: false, hops: 0 },
        ...extra,
    };
}

test('a test-file write in tdd green is blocked by the phase rule', () => {
    const ws = tmpDir();
    try {
        const d = new HookDispatcher({ rules, workspaceRoot: ws, pipelines, maxReadBytes: 200000 });
        assert.deepEqual(d.evaluate(writeCtx('tests/foo_test.py')), {
            verdict: 'block',
            reason: 'Cannot edit test files during GREEN phase',
            rule: 'tdd/green/file_write#0',
            terminal: true,
            decided_by: 'kernel',
        });
        // absolute targets are matched relative to the workspace
        assert.equal(d.evaluate(writeCtx(path.join(ws, 'tests', 'foo_test.py'))).verdict, 'block');
        assert.deepEqual(d.evaluate(writeCtx('src/app.py')), { verdict: 'allow', terminal: true, decided_by: 'kernel' });
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('a 5 MB read is blocked, and allowed once the path is on the must-read list', () => {
    const ws = tmpDir();
    try {
        const strict = new HookDispatcher({ rules, workspaceRoot: ws, pipelines, maxReadBytes: 200000 });
        const blocked = strict.evaluate(readCtx('data/big.bin', FIVE_MB));
        assert.equal(blocked.verdict, 'block');
        assert.equal(blocked.rule, 'read_guard:size');
        const abs = toPosix(path.resolve(ws, 'data/big.bin'));
        assert.equal(
            blocked.reason,
            `BLOCKED: Read of large file ${abs} (${FIVE_MB} bytes > 200000 bytes). ` +
                'Read a slice, or add the path to the must-read allowlist.'
        );

        const allowing = new HookDispatcher({
            rules,
            workspaceRoot: ws,
            pipelines,
            maxReadBytes: 200000,
            mustRead: ['data/big.bin'],
        });
        assert.equal(allowing.evaluate(readCtx('data/big.bin', FIVE_MB)).verdict, 'allow');
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('pipeline safe_read_globs bypass the size guard', () => {
    const ws = tmpDir();
    try {
        const d = new HookDispatcher({ rules, workspaceRoot: ws, pipelines, maxReadBytes: 200000 });
        assert.equal(d.evaluate(readCtx('docs/guide/intro.md', FIVE_MB)).verdict, 'allow');
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('cumulative read budget: unique-file overflow blocked, allowlisted reads free', () => {
    const ws = tmpDir();
    const store = new KernelStore(path.join(ws, 'kernel.db'));
    try {
        const budget = new ReadBudgetAuthority(store);
        const d = new HookDispatcher({
            rules,
            workspaceRoot: ws,
            pipelines,
            maxReadBytes: 200000,
            readBudget: { max_files: 1, max_total_bytes: 0, allowed_paths: ['notes/**'] },
            budgetAuthority: budget,
        });
        const runId = 'run-budget-1';

        assert.equal(d.evaluate(readCtx('a.txt', 10, { run_id: runId })).verdict, 'allow');
        assert.equal(d.evaluate(readCtx('a.txt', 10, { run_id: runId })).verdict, 'allow');
        const over = d.evaluate(readCtx('b.txt', 10, { run_id: runId }));
        assert.equal(over.verdict, 'block');
        assert.equal(over.rule, 'read_guard:budget');
        assert.equal(d.evaluate(readCtx('notes/x.md', 10, { run_id: runId })).verdict, 'allow');

        assert.deepEqual(budget.usage(runId), { unique_files: 1, total_bytes: 10, already_counted: false });
    } finally {
        store.close();
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('nested dispatchers produce one terminal decision and one entered marker', () => {
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const trace = new MemoryTraceSink();
        const base = { rules, workspaceRoot: ws, pipelines, maxReadBytes: 200000, ledger, trace };
        const inner = new HookDispatcher({ ...base, kind: 'inner' });
        const outer = new HookDispatcher({ ...base, kind: 'outer', delegate: inner });

        const decision = outer.evaluate(writeCtx('tests/foo_test.py', { run_id: 'run-nested' }));
        assert.equal(decision.verdict, 'block');
        assert.equal(decision.decided_by, 'inner');
        assert.equal(trace.count('entered'), 1);
        assert.equal(trace.count('delegated'), 1);
        assert.equal(trace.count('reentry_guard'), 0);

        const decisions = ledger.read({ event_kind: 'hook_decision' });
        assert.equal(decisions.length, 1);
        assert.equal(decisions[0].detail, 'block:tdd/green/file_write#0');
        assert.deepEqual(decisions[0].pointers, ['tests/foo_test.py']);
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('a delegate that would forward again answers through the reentry guard', () => {
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const trace = new MemoryTraceSink();
        const base = { rules, workspaceRoot: ws, pipelines, maxReadBytes: 200000, ledger, trace };
        const third = new HookDispatcher({ ...base, kind: 'third' });
        const inner = new HookDispatcher({ ...base, kind: 'inner', delegate: third });
        const outer = new HookDispatcher({ ...base, kind: 'outer', delegate: inner });

        const decision = outer.evaluate(writeCtx('src/app.py', { run_id: 'run-guard' }));
        assert.equal(decision.verdict, 'allow');
        assert.equal(decision.decided_by, 'inner');
        assert.equal(trace.count('entered'), 1);
        assert.equal(trace.count('delegated'), 1);
        assert.equal(trace.count('reentry_guard'), 1);
        assert.equal(ledger.read({ event_kind: 'hook_decision' }).length, 1);
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('a non-recording delegate has its decision recorded by the forwarder, verbatim', () => {
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const verdict: Decision = { verdict: 'block', reason: 'nope', rule: 'fake', terminal: true, decided_by: 'fake' };
        const seen: CallContext[] = [];
        const fake: DispatchTarget = {
            kind: 'fake',
            recordsDecisions: false,
            evaluate: (ctx) => {
                seen.push(ctx);
                return verdict;
            },
        };
        const outer = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, ledger, delegate: fake });

        assert.deepEqual(outer.evaluate(writeCtx('src/app.py', { run_id: 'run-fake' })), verdict);
        assert.deepEqual(seen[0].reentry, { active: true, hops: 1 });
        const decisions = ledger.read({ event_kind: 'hook_decision' });
        assert.equal(decisions.length, 1);
        assert.equal(decisions[0].detail, 'block:fake');
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('a token past one hop is a reentrancy violation and is recorded', () => {
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const d = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, ledger });
        assert.throws(
            () => d.evaluate(writeCtx('src/app.py', { run_id: 'run-loop', reentry: { active: true, hops: 2 } })),
            ReentrancyViolation
        );
        const errors = ledger.read({ event_kind: 'error' });
        assert.equal(errors.length, 1);
        assert.equal(errors[0].detail, 'REENTRANCY_VIOLATION: Dispatcher delegation depth 2 exceeds one hop');
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('enforce turns a block into a PolicyViolation', () => {
    const d = new HookDispatcher({ rules, workspaceRoot: '/ws', pipelines, maxReadBytes: 200000 });
    assert.throws(() => d.enforce(writeCtx('tests/foo_test.py')), PolicyViolation);
    assert.equal(d.enforce(writeCtx('src/app.py')).verdict, 'allow');
});

test('malformed contexts are configuration errors', () => {
    assert.throws(() => validateCallContext(writeCtx('a', { reentry: { active: true, hops: 0 } })), ConfigurationError);
    assert.throws(() => validateCallContext(writeCtx('a', { targets: [] })), ConfigurationError);
    assert.throws(
        () => validateCallContext({ ...writeCtx('a'), category: 'process_exec', targets: [] }),
        ConfigurationError
    );
    validateCallContext({ ...writeCtx('a'), category: 'process_exec', targets: [], command: 'ls' });
});

test('a command delegate sees the hop count and blocks with its stderr', () => {
    const node = JSON.stringify(process.execPath);
    const ws = tmpDir();
    try {
        const allow = new CommandDelegate(
            `${node} -e "process.exit(process.env.HANDOFF_REENTRY==='1'&&process.env.HANDOFF_TOOL_NAME==='Write'?0:3)"`
        );
        const outer = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, delegate: allow });
        assert.deepEqual(outer.evaluate(writeCtx('src/app.py')), {
            verdict: 'allow',
            terminal: true,
            decided_by: allow.kind,
        });

        const block = new CommandDelegate(`${node} -e "process.stderr.write('no writes here');process.exit(2)"`, {
            kind: 'policy-script',
        });
        const blocked = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, delegate: block });
        assert.deepEqual(blocked.evaluate(writeCtx('src/app.py')), {
            verdict: 'block',
            reason: 'no writes here',
            rule: 'policy-script',
            terminal: true,
            decided_by: 'policy-script',
        });

        const broken = new CommandDelegate(`${node} -e "process.exit(5)"`);
        const failing = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, delegate: broken });
        assert.throws(() => failing.evaluate(writeCtx('src/app.py')), ConfigurationError);
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('configuration errors are recorded against the run before they are thrown', () => {
    const node = JSON.stringify(process.execPath);
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const d = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, ledger });
        assert.throws(() => d.evaluate(writeCtx('a', { targets: [], run_id: 'run-bad-ctx' })), ConfigurationError);

        const broken = new CommandDelegate(`${node} -e "process.exit(5)"`);
        const failing = new HookDispatcher({ rules, workspaceRoot: ws, maxReadBytes: 200000, ledger, delegate: broken });
        assert.throws(() => failing.evaluate(writeCtx('src/app.py', { run_id: 'run-delegate' })), ConfigurationError);
        assert.throws(() => failing.evaluate(writeCtx('src/app.py')), ConfigurationError);

        assert.deepEqual(
            ledger.read({ event_kind: 'error' }).map((e) => `${e.run_id}:${(e.detail ?? '').split(':')[0]}`),
            ['run-bad-ctx:CONFIGURATION_ERROR', 'run-delegate:CONFIGURATION_ERROR', 'unscoped:CONFIGURATION_ERROR']
        );
        assert.equal(
            ledger.read({ run_id: 'run-delegate', event_kind: 'error' })[0].detail,
            'CONFIGURATION_ERROR: Delegate hook exited with 5'
        );
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});

test('an error crossing nested dispatchers is recorded once', () => {
    const ws = tmpDir();
    try {
        const ledger = new EventLedger(path.join(ws, 'events.jsonl'));
        const base = { rules, workspaceRoot: ws, maxReadBytes: 200000, ledger };
        const inner = new HookDispatcher({ ...base, kind: 'inner' });
        const looping: DispatchTarget = {
            kind: 'looping',
            recordsDecisions: true,
            evaluate: (ctx) => inner.evaluate({ ...ctx, reentry: { active: true, hops: ctx.reentry.hops + 1 } }),
        };
        const outer = new HookDispatcher({ ...base, kind: 'outer', delegate: looping });

        assert.throws(() => outer.evaluate(writeCtx('src/app.py', { run_id: 'run-chain' })), ReentrancyViolation);
        assert.deepEqual(
            ledger.read({ event_kind: 'error' }).map((e) => `${e.run_id}:${e.detail ?? ''}`),
            ['run-chain:REENTRANCY_VIOLATION: Dispatcher delegation depth 2 exceeds one hop']
        );
    } finally {
        fs.rmSync(ws, { recursive: true, force: true });
    }
});
