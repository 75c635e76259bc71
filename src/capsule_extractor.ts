/**
 * CapsuleExtractor
 *
 * A phase ends by printing one block between BEGIN_CAPSULE and END_CAPSULE
 * lines. The block is a pointer-only summary with these fields:
 *
 *   Goal: ...
 *   What happened: ...
 *   Current status: ok | blocked | failed | in_progress [note]
 *   Next action requested: <exactly one action>
 *   Evidence pointers:
 *   - path/to/file
 *   If blocked: ...            (required when status is blocked)
 *
 * Labels may also be written as `**Label:**` or as a `## Label` heading.
 * A block that breaks any rule is rejected whole; output without markers
 * gets a synthetic capsule instead.
 */

import { CAPSULE_LIMITS } from './config';
import { atomicCreateFileSync, errnoCode } from './output_writer';
import { CapsuleFormatError, ConsistencyError } from './structured_error';
import { CAPSULE_STATUSES } from './kernel_types';
import type { Capsule, CapsuleStatus } from './kernel_types';

export const CAPSULE_BEGIN = 'BEGIN_CAPSULE';
export const CAPSULE_END = 'END_CAPSULE';

type FieldKey = 'goal' | 'what_happened' | 'status' | 'next_action' | 'evidence_pointers' | 'blocked_info' | 'synthetic';

const LABELS: ReadonlyArray<[string, FieldKey]> = [
    ['Goal', 'goal'],
    ['What happened', 'what_happened'],
    ['Current status', 'status'],
    ['Next action requested', 'next_action'],
    ['Evidence pointers', 'evidence_pointers'],
    ['If blocked', 'blocked_info'],
    ['Synthetic', 'synthetic'],
];

const REQUIRED: readonly FieldKey[] = ['goal', 'what_happened', 'status', 'next_action', 'evidence_pointers'];

const LABEL_ALT = LABELS.map(([label]) => label).join('|');
const INLINE_FIELD = new RegExp(`^(?:\\*\\*)?(${LABEL_ALT})(?:\\*\\*)?\\s*:\\s*(?:\\*\\*\\s*)?(.*)$`);
const HEADING_FIELD = new RegExp(`^#{1,6}\\s+(${LABEL_ALT})\\s*:?\\s*$`);
const FENCE = /^\s*(```|~~~)/;
const BULLET = /^(?:[-*+]|\d+[.)])\s+/;

export type ExtractResult =
    | { ok: true; capsule: Capsule; text: string }
    | { ok: false; error: CapsuleFormatError };

export interface SyntheticOptions {
    exitCode: number;
    goal?: string;
    logPointer?: string;
}

function labelKey(label: string): FieldKey {
    const found = LABELS.find(([l]) => l === label);
    if (!found) throw new Error(`unknown capsule label ${label}`);
    return found[1];
}

function isCapsuleStatus(v: string): v is CapsuleStatus {
    return CAPSULE_STATUSES.some((s) => s === v);
}

function nonEmpty(lines: readonly string[]): string[] {
    return lines.map((l) => l.trim()).filter((l) => l.length > 0);
}

function clip(text: string, max: number): string {
    return text.length <= max ? text : text.slice(0, Math.max(0, max - 3)) + '...';
}

function stripPointer(token: string): string {
    return token.replace(BULLET, '').trim().replace(/^`(.*)`$/, '$1');
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Parse and validate capsule text (without markers). Every problem found is
 * reported together.
 */
export function parseCapsule(text: string): { capsule?: Capsule; problems: string[] } {
    const problems: string[] = [];
    const lines = text.split(/\r?\n/);
    while (lines.length > 0 && lines[0].trim() === '') lines.shift();
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();

    if (lines.length === 0) return { problems: ['capsule is empty'] };
    if (lines.length > CAPSULE_LIMITS.MAX_LINES) {
        problems.push(`capsule has ${lines.length} lines (max ${CAPSULE_LIMITS.MAX_LINES})`);
    }

    const fields = new Map<FieldKey, string[]>();
    let current: FieldKey | null = null;

    lines.forEach((line, i) => {
        if (FENCE.test(line)) problems.push(`line ${i + 1} opens a fenced code block`);
        if (line.length > CAPSULE_LIMITS.MAX_LINE_CHARS) {
            problems.push(`line ${i + 1} has ${line.length} chars (max ${CAPSULE_LIMITS.MAX_LINE_CHARS})`);
        }

        const trimmed = line.trim();
        const inline = INLINE_FIELD.exec(trimmed);
        const heading = inline ? null : HEADING_FIELD.exec(trimmed);
        const hit = inline ?? heading;
        if (hit) {
            const key = labelKey(hit[1]);
            if (fields.has(key)) problems.push(`field "${hit[1]}" appears more than once`);
            const first = inline ? inline[2].trim() : '';
            fields.set(key, first ? [first] : []);
            current = key;
            return;
        }

        if (current === null) {
            if (trimmed !== '' && !trimmed.startsWith('#')) problems.push(`line ${i + 1} is outside any field`);
            return;
        }
        fields.get(current)?.push(trimmed);
    });

    for (const key of REQUIRED) {
        if (!fields.has(key)) {
            const label = LABELS.find(([, k]) => k === key)?.[0] ?? key;
            problems.push(`missing field "${label}:"`);
        }
    }

    const goal = nonEmpty(fields.get('goal') ?? []).join(' ');
    const whatHappened = nonEmpty(fields.get('what_happened') ?? []).join('\n');
    if (fields.has('goal') && goal === '') problems.push('Goal is empty');
    if (fields.has('what_happened') && whatHappened === '') problems.push('What happened is empty');

    let status: CapsuleStatus = 'in_progress';
    let statusNote: string | undefined;
    if (fields.has('status')) {
        const raw = nonEmpty(fields.get('status') ?? []).join(' ');
        const m = /^([A-Za-z_]+)[\s:;,.-]*(.*)$/.exec(raw);
        const word = m ? m[1].toLowerCase() : '';
        if (isCapsuleStatus(word)) {
            status = word;
            if (m && m[2].trim()) statusNote = m[2].trim();
        } else {
            problems.push(`Current status must start with one of ${CAPSULE_STATUSES.join('|')} (got "${raw}")`);
        }
    }

    const actions = nonEmpty(fields.get('next_action') ?? []).map((a) => a.replace(BULLET, ''));
    if (fields.has('next_action') && actions.length !== 1) {
        problems.push(`Next action requested must name exactly one action (found ${actions.length})`);
    }

    const pointers: string[] = [];
    for (const entry of nonEmpty(fields.get('evidence_pointers') ?? [])) {
        // a bullet is one pointer, spaces included; a bare line may list several
        if (BULLET.test(entry)) {
            const pointer = stripPointer(entry);
            if (pointer) pointers.push(pointer);
            continue;
        }
        for (const token of entry.split(/\s*,\s*/)) {
            const pointer = stripPointer(token);
            if (pointer) pointers.push(pointer);
        }
    }

    const blockedInfo = nonEmpty(fields.get('blocked_info') ?? []).join(' ');
    if (status === 'blocked' && blockedInfo === '') problems.push('status is blocked but "If blocked:" is missing');

    const syntheticRaw = nonEmpty(fields.get('synthetic') ?? []).join(' ').toLowerCase();

    if (problems.length > 0) return { problems };

    const capsule: Capsule = {
        goal,
        what_happened: whatHappened,
        status,
        next_action: actions[0],
        evidence_pointers: pointers,
    };
    if (statusNote) capsule.status_note = statusNote;
    if (blockedInfo) capsule.blocked_info = blockedInfo;
    if (syntheticRaw === 'true') capsule.synthetic = true;
    return { capsule, problems };
}

/** Text between the markers, `null` when there are none. */
export function findCapsuleBlock(raw: string): { text: string } | { problems: string[] } | null {
    const lines = raw.split(/\r?\n/);
    const begins: number[] = [];
    const ends: number[] = [];
    lines.forEach((l, i) => {
        const t = l.trim();
        if (t === CAPSULE_BEGIN) begins.push(i);
        else if (t === CAPSULE_END) ends.push(i);
    });

    if (begins.length === 0 && ends.length === 0) return null;
    if (begins.length !== 1 || ends.length !== 1) {
        return {
            problems: [`expected exactly one ${CAPSULE_BEGIN}/${CAPSULE_END} block (found ${begins.length} begin, ${ends.length} end)`],
        };
    }
    if (ends[0] < begins[0]) return { problems: [`${CAPSULE_END} appears before ${CAPSULE_BEGIN}`] };
    return { text: lines.slice(begins[0] + 1, ends[0]).join('\n') };
}

/**
 * Capsule from raw phase output. A marked block must validate; without
 * markers a synthetic capsule is built from the last output line.
 */
export function extractCapsule(raw: string, opts: SyntheticOptions): ExtractResult {
    const block = findCapsuleBlock(raw);
    if (block === null) {
        const capsule = syntheticCapsule(raw, opts);
        return { ok: true, capsule, text: renderCapsule(capsule) };
    }
    if ('problems' in block) return { ok: false, error: new CapsuleFormatError(block.problems) };

    const parsed = parseCapsule(block.text);
    if (!parsed.capsule) return { ok: false, error: new CapsuleFormatError(parsed.problems) };
    return { ok: true, capsule: parsed.capsule, text: block.text.trim() + '\n' };
}

/* -------------------------------------------------------------------------- */
/* Synthetic capsules & rendering                                             */
/* -------------------------------------------------------------------------- */

export function syntheticCapsule(raw: string, opts: SyntheticOptions): Capsule {
    const last = nonEmpty(raw.split(/\r?\n/)).pop();
    const budget = CAPSULE_LIMITS.MAX_LINE_CHARS - 'What happened: '.length;
    const capsule: Capsule = {
        goal: clip(opts.goal ?? 'Phase did not report a goal', CAPSULE_LIMITS.MAX_LINE_CHARS - 'Goal: '.length),
        what_happened: clip(last ?? `Phase produced no output (exit ${opts.exitCode})`, budget),
        status: opts.exitCode === 0 ? 'ok' : 'failed',
        next_action:
            opts.exitCode === 0
                ? 'Review the manifest artifacts before the next phase'
                : 'Inspect the phase log and rerun the phase',
        evidence_pointers: opts.logPointer ? [opts.logPointer] : [],
        synthetic: true,
    };
    if (opts.exitCode !== 0) capsule.status_note = `exit ${opts.exitCode}`;
    return capsule;
}

export function renderCapsule(c: Capsule): string {
    const out: string[] = [`Goal: ${c.goal}`];
    const [firstHappened, ...restHappened] = c.what_happened.split('\n');
    out.push(`What happened: ${firstHappened}`, ...restHappened);
    out.push(`Current status: ${c.status}${c.status_note ? `: ${c.status_note}` : ''}`);
    out.push(`Next action requested: ${c.next_action}`);
    out.push('Evidence pointers:');
    for (const p of c.evidence_pointers) out.push(`- ${p}`);
    if (c.blocked_info) out.push(`If blocked: ${c.blocked_info}`);
    if (c.synthetic) out.push('Synthetic: true');
    return out.join('\n') + '\n';
}

/** Validate a capsule file or a whole phase output (markers optional). */
export function validateCapsuleText(text: string): { valid: boolean; problems: string[]; capsule?: Capsule } {
    const block = findCapsuleBlock(text);
    if (block !== null && 'problems' in block) return { valid: false, problems: block.problems };
    const parsed = parseCapsule(block === null ? text : block.text);
    return { valid: parsed.capsule !== undefined, problems: parsed.problems, capsule: parsed.capsule };
}

/** Create the capsule file; a capsule is written once per run. */
export function writeCapsuleFile(filePath: string, text: string): void {
    const check = validateCapsuleText(text);
    if (!check.valid) throw new CapsuleFormatError(check.problems);
    try {
        atomicCreateFileSync({ filePath, content: text });
    } catch (e: unknown) {
        if (errnoCode(e) === 'EEXIST') throw new ConsistencyError(`Capsule already written: ${filePath}`);
        throw e;
    }
}

