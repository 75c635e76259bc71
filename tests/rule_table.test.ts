import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { Pipelines } from '../src/pipeline_config';
import { RuleTable, commandMatches, commandSegments } from '../src/rule_table';

const pipelines = Pipelines.fromFile(path.join(__dirname, '..', 'config', 'pipelines.json'));
const rules = RuleTable.fromPipelines(pipelines);

test('tdd green blocks test-file edits', () => {
    const m = rules.match('tdd', 'green', 'file_write', { targets: ['tests/foo_test.py'] });
    assert.ok(m);
    assert.equal(m.rule_id, 'tdd/green/file_write#0');
    assert.equal(m.rule.message, 'Cannot edit test files during GREEN phase');
    assert.equal(m.target, 'tests/foo_test.py');

    assert.ok(rules.match('tdd', 'green', 'file_write', { targets: ['pkg/__tests__/a.ts'] }));
    assert.equal(rules.match('tdd', 'green', 'file_write', { targets: ['src/app.py'] }), null);
});

test('tdd red blocks source edits except test files', () => {
    assert.ok(rules.match('tdd', 'red', 'file_write', { targets: ['src/app.ts'] }));
    assert.equal(rules.match('tdd', 'red', 'file_write', { targets: ['src/app.test.ts'] }), null);
    assert.equal(rules.match('tdd', 'red', 'file_write', { targets: ['docs/notes.md'] }), null);
});

test('research synthesize only allows SYNTHESIS.md', () => {
    assert.equal(rules.match('research', 'synthesize', 'file_write', { targets: ['SYNTHESIS.md'] }), null);
    const m = rules.match('research', 'synthesize', 'file_write', { targets: ['notes.md'] });
    assert.ok(m);
    assert.equal(m.rule.message, 'SYNTHESIZE phase: you may only write to SYNTHESIS.md');
});

test('the first denied target is reported', () => {
    const m = rules.match('research', 'synthesize', 'file_write', { targets: ['SYNTHESIS.md', 'results/x.csv'] });
    assert.ok(m);
    assert.equal(m.target, 'results/x.csv');
});

test('math survey is read-only for writes and mutating commands', () => {
    assert.ok(rules.match('math', 'survey', 'file_write', { targets: ['notes/a.md'] }));

    const rm = rules.match('math', 'survey', 'process_exec', { targets: [], command: 'rm -rf build' });
    assert.ok(rm);
    assert.equal(rm.rule_id, 'math/survey/process_exec#0');
    assert.equal(rm.rule.message, 'SURVEY phase is read-only');

    assert.ok(rules.match('math', 'survey', 'process_exec', { targets: [], command: 'FOO=1 git push origin main' }));
    assert.ok(rules.match('math', 'survey', 'process_exec', { targets: [], command: 'echo hi && git commit -m x' }));
    assert.equal(rules.match('math', 'survey', 'process_exec', { targets: [], command: 'ls -la' }), null);
    assert.equal(rules.match('math', 'survey', 'process_exec', { targets: [], command: 'grep rm notes.txt' }), null);
});

test('tdd ship blocks history rewrites only', () => {
    assert.ok(rules.match('tdd', 'ship', 'process_exec', { targets: [], command: 'git push --force origin main' }));
    assert.equal(rules.match('tdd', 'ship', 'process_exec', { targets: [], command: 'git push origin main' }), null);
});

test('phases without rules allow everything', () => {
    assert.deepEqual(rules.rulesFor('research', 'explore', 'file_write'), []);
    assert.equal(rules.match('math', 'prove', 'file_write', { targets: ['proofs/a.lean'] }), null);
    assert.equal(rules.rulesFor('tdd', 'green', 'file_write').length, 1);
});

test('rules added by hand get sequential ids and the first match wins', () => {
    const t = new RuleTable();
    t.add('p', 'x', { category: 'file_write', deny: ['a/**'], message: 'first' });
    t.add('p', 'x', { category: 'file_write', deny: ['**'], message: 'second' });
    const m = t.match('p', 'x', 'file_write', { targets: ['b.txt'] });
    assert.ok(m);
    assert.equal(m.rule_id, 'p/x/file_write#1');
    assert.equal(m.rule.message, 'second');
});

test('commandSegments splits on operators and drops env assignments', () => {
    assert.deepEqual(commandSegments('A=1 B=2 make test | tee out.log; echo done'), [
        ['make', 'test'],
        ['tee', 'out.log'],
        ['echo', 'done'],
    ]);
    assert.equal(commandMatches('cat a || rm b', ['rm']), true);
    assert.equal(commandMatches('git', ['git push']), false);
});
