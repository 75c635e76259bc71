import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { executePhase } from '../src/phase_executor';

const node = process.execPath;

function tmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'phase-executor-'));
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

test('output goes to the log and the exit code is kept', async () => {
    const dir = tmpDir();
    try {
        const logPath = path.join(dir, 'logs', 'phase.log');
        const result = await executePhase({
            command: [node, '-e', "console.log('out');console.error('err');process.exit(4)"],
            cwd: dir,
            env: { PATH: process.env.PATH },
            logPath,
        });
        assert.equal(result.started, true);
        assert.equal(result.exit_code, 4);
        assert.equal(result.timed_out, false);
        const logged = fs.readFileSync(logPath, 'utf8');
        assert.ok(logged.includes('out\n'));
        assert.ok(logged.includes('err\n'));
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a timeout kills background children that still hold the output pipe', async () => {
    const dir = tmpDir();
    try {
        const marker = path.join(dir, 'grandchild-survived');
        const grandchild = `setTimeout(()=>require('fs').writeFileSync(${JSON.stringify(marker)},'x'),1500)`;
        const parent =
            `require('child_process').spawn(process.execPath,['-e',${JSON.stringify(grandchild)}],{stdio:'inherit'});` +
            'setTimeout(()=>{},6000)';

        const result = await executePhase({
            command: [node, '-e', parent],
            cwd: dir,
            env: { PATH: process.env.PATH },
            logPath: path.join(dir, 'phase.log'),
            timeoutMs: 300,
        });
        assert.equal(result.timed_out, true);
        assert.equal(result.exit_code, 137);
        assert.ok(result.duration_ms < 3000, `settled after ${result.duration_ms}ms`);

        await sleep(2000);
        assert.equal(fs.existsSync(marker), false);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a command that cannot start is exit 127', async () => {
    const dir = tmpDir();
    try {
        const result = await executePhase({
            command: [path.join(dir, 'no-such-binary')],
            cwd: dir,
            env: { PATH: process.env.PATH },
            logPath: path.join(dir, 'phase.log'),
        });
        assert.equal(result.started, false);
        assert.equal(result.exit_code, 127);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
