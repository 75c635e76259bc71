import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { EventLedger, isEventRecord } from '../src/event_ledger';
import { ConsistencyError } from '../src/structured_error';
import { runTs } from './helpers/spawn_ts';

function withLedger(fn: (ledger: EventLedger, file: string) => void): void {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-'));
    try {
        const file = path.join(dir, 'ledger', 'events.jsonl');
        fn(new EventLedger(file), file);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

test('appended events read back in order with optional fields omitted', () => {
    withLedger((ledger, file) => {
        const first = ledger.append({
            run_id: 'run-a',
            event_kind: 'phase_started',
            pipeline: 'tdd',
            phase: 'red',
            pointers: ['/state/runs/run-a/run.json'],
            ts: '2026-01-01T00:00:00.000Z',
        });
        assert.deepEqual(first, {
            ts: '2026-01-01T00:00:00.000Z',
            run_id: 'run-a',
            event_kind: 'phase_started',
            pointers: ['/state/runs/run-a/run.json'],
            phase: 'red',
            pipeline: 'tdd',
        });
        ledger.append({ run_id: 'run-a', event_kind: 'phase_finished', exit_code: 0 });
        ledger.append({ run_id: 'run-b', event_kind: 'phase_started' });

        assert.deepEqual(
            ledger.read().map((e) => `${e.run_id}:${e.event_kind}`),
            ['run-a:phase_started', 'run-a:phase_finished', 'run-b:phase_started']
        );
        assert.equal(ledger.read({ run_id: 'run-a' }).length, 2);
        assert.equal(ledger.read({ event_kind: 'phase_started' }).length, 2);
        assert.deepEqual(ledger.read({ run_id: 'run-a', event_kind: 'phase_finished' })[0].pointers, []);

        const lines = fs.readFileSync(file, 'utf8').split('\n');
        assert.equal(lines.length, 4);
        assert.equal(lines[3], '');
    });
});

test('a missing ledger reads as empty', () => {
    withLedger((ledger) => {
        assert.deepEqual(ledger.read(), []);
    });
});

test('a trailing partial line is ignored by readers', () => {
    withLedger((ledger, file) => {
        ledger.append({ run_id: 'run-a', event_kind: 'phase_started' });
        fs.appendFileSync(file, '{"ts":"2026-01-01T00:00:00.000Z","run_id":"run-a"');
        assert.equal(ledger.read().length, 1);
    });
});

test('a corrupt line in the middle is a consistency error', () => {
    withLedger((ledger, file) => {
        ledger.append({ run_id: 'run-a', event_kind: 'phase_started' });
        fs.appendFileSync(file, 'not json\n');
        ledger.append({ run_id: 'run-a', event_kind: 'phase_finished' });
        assert.throws(() => ledger.read(), ConsistencyError);
    });
});

test('recordError appends an error event carrying the code', () => {
    withLedger((ledger) => {
        const structured = ledger.recordError(new ConsistencyError('boom'), {
            run_id: 'run-a',
            phase: 'red',
            pointers: ['/state/runs/run-a/logs/phase.log'],
        });
        assert.equal(structured.code, 'CONSISTENCY_ERROR');

        const plain = ledger.recordError(new Error('disk gone'), { run_id: 'run-a' });
        assert.equal(plain.code, 'STORAGE_ERROR');

        const errors = ledger.read({ event_kind: 'error' });
        assert.deepEqual(
            errors.map((e) => e.detail),
            ['CONSISTENCY_ERROR: boom', 'STORAGE_ERROR: disk gone']
        );
        assert.equal(errors[0].phase, 'red');
        assert.deepEqual(errors[0].pointers, ['/state/runs/run-a/logs/phase.log']);
    });
});

test('many appends all land as whole lines', () => {
    withLedger((ledger) => {
        for (let i = 0; i < 200; i++) {
            ledger.append({ run_id: `run-${i}`, event_kind: 'hook_decision', detail: 'allow' });
        }
        const events = ledger.read();
        assert.equal(events.length, 200);
        assert.equal(events[199].run_id, 'run-199');
        assert.ok(events.every(isEventRecord));
    });
});

test('appends from several processes never interleave', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-'));
    try {
        const file = path.join(dir, 'ledger', 'events.jsonl');
        const writers = ['a', 'b', 'c', 'd'];
        const results = await Promise.all(writers.map((w) => runTs('ledger_writer.ts', [file, w, '50'])));
        assert.deepEqual(
            results.map((r) => r.code),
            [0, 0, 0, 0]
        );

        const lines = fs.readFileSync(file, 'utf8').split('\n');
        assert.equal(lines.pop(), '');
        assert.equal(lines.length, 200);
        for (const line of lines) assert.ok(isEventRecord(JSON.parse(line)));

        const ledger = new EventLedger(file);
        for (const w of writers) {
            const own = ledger.read({ run_id: `run-${w}` });
            assert.deepEqual(
                own.map((e) => (e.detail ?? '').split(':')[0]),
                Array.from({ length: 50 }, (_, i) => String(i))
            );
        }
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
