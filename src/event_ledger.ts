/**
 * Event Ledger: append-only JSONL record of every kernel event.
 *
 * Each record is one line written with a single write(2) on an O_APPEND
 * descriptor, so concurrent appenders never interleave within a line.
 * Readers ignore a trailing segment that has no newline yet.
 */

import * as fs from 'fs';
import * as path from 'path';

import { createLogger } from './logger';
import { ConsistencyError, StorageError, toStructuredError } from './structured_error';
import type { StructuredError } from './structured_error';
import { EVENT_KINDS } from './kernel_types';
import type { EventKind, EventRecord } from './kernel_types';
import { isRecord } from './schema_validator';

const log = createLogger('ledger');

export interface AppendInput {
    run_id: string;
    event_kind: EventKind;
    phase?: string;
    pipeline?: string;
    pointers?: string[];
    exit_code?: number;
    detail?: string;
    ts?: string;
}

export interface LedgerFilter {
    run_id?: string;
    event_kind?: EventKind;
}

export interface ErrorScope {
    run_id: string;
    phase?: string;
    pipeline?: string;
    pointers?: string[];
}

/** Run id used for errors that happen before any run exists. */
export const UNSCOPED_RUN_ID = 'unscoped';

function isEventKind(v: unknown): v is EventKind {
    return EVENT_KINDS.some((k) => k === v);
}

export function isEventRecord(v: unknown): v is EventRecord {
    if (!isRecord(v)) return false;
    if (typeof v.ts !== 'string' || typeof v.run_id !== 'string' || !isEventKind(v.event_kind)) return false;
    if (!Array.isArray(v.pointers) || !v.pointers.every((p) => typeof p === 'string')) return false;
    if (v.phase !== undefined && typeof v.phase !== 'string') return false;
    if (v.pipeline !== undefined && typeof v.pipeline !== 'string') return false;
    if (v.exit_code !== undefined && typeof v.exit_code !== 'number') return false;
    if (v.detail !== undefined && typeof v.detail !== 'string') return false;
    return true;
}

export class EventLedger {
    constructor(public readonly ledgerPath: string) {
        fs.mkdirSync(path.dirname(ledgerPath), { recursive: true });
    }

    append(input: AppendInput): EventRecord {
        const record: EventRecord = {
            ts: input.ts ?? new Date().toISOString(),
            run_id: input.run_id,
            event_kind: input.event_kind,
            pointers: input.pointers ?? [],
        };
        if (input.phase !== undefined) record.phase = input.phase;
        if (input.pipeline !== undefined) record.pipeline = input.pipeline;
        if (input.exit_code !== undefined) record.exit_code = input.exit_code;
        if (input.detail !== undefined) record.detail = input.detail;

        const buf = Buffer.from(JSON.stringify(record) + '\n', 'utf8');
        let fd: number;
        try {
            fd = fs.openSync(this.ledgerPath, 'a');
        } catch (e: unknown) {
            throw new StorageError(`Cannot open ledger ${this.ledgerPath}`, e);
        }
        try {
            const written = fs.writeSync(fd, buf, 0, buf.length);
            if (written !== buf.length) {
                throw new StorageError(`Short ledger write: ${written}/${buf.length} bytes`);
            }
        } finally {
            fs.closeSync(fd);
        }
        return record;
    }

    /** Records `err` as an `error` event and returns its structured form; the caller rethrows. */
    recordError(err: unknown, scope: ErrorScope): StructuredError {
        const structured = toStructuredError(err);
        log.error(structured.message, { code: structured.code, run_id: scope.run_id });
        this.append({
            run_id: scope.run_id,
            event_kind: 'error',
            phase: scope.phase,
            pipeline: scope.pipeline,
            pointers: scope.pointers,
            detail: `${structured.code}: ${structured.message}`,
        });
        return structured;
    }

    read(filter: LedgerFilter = {}): EventRecord[] {
        if (!fs.existsSync(this.ledgerPath)) return [];
        const lines = fs.readFileSync(this.ledgerPath, 'utf8').split('\n');
        lines.pop(); // "" after the final newline, or a line still being written

        const out: EventRecord[] = [];
        lines.forEach((line, idx) => {
            if (line.trim() === '') return;
            let parsed: unknown;
            try {
                parsed = JSON.parse(line);
            } catch (e: unknown) {
                throw new ConsistencyError(`Ledger line ${idx + 1} is not JSON`, { error: String(e) });
            }
            if (!isEventRecord(parsed)) {
                throw new ConsistencyError(`Ledger line ${idx + 1} is not an event record`);
            }
            if (filter.run_id !== undefined && parsed.run_id !== filter.run_id) return;
            if (filter.event_kind !== undefined && parsed.event_kind !== filter.event_kind) return;
            out.push(parsed);
        });
        return out;
    }
}
