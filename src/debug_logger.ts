/**
 * Debug Logger - dispatch trace markers for the hook dispatcher
 *
 * Enable with: HANDOFF_DEBUG=1 (writes <state root>/trace.log) or
 * HANDOFF_TRACE_FILE=<path>.
 */

import * as fs from 'fs';
import * as path from 'path';

import { isDebugEnabled } from './config';
import type { Env } from './config';
import { createLogger } from './logger';
import type { OperationCategory } from './kernel_types';

const log = createLogger('trace');

export type TraceMarker = 'entered' | 'delegated' | 'reentry_guard';

export interface TraceRecord {
    ts: string;
    marker: TraceMarker;
    dispatcher: string;
    target?: string;
    category: OperationCategory;
    pipeline: string;
    phase: string;
    hops: number;
    run_id?: string;
}

export interface TraceSink {
    mark(record: Omit<TraceRecord, 'ts'>): void;
}

export const noopTraceSink: TraceSink = {
    mark: () => undefined,
};

export class FileTraceSink implements TraceSink {
    constructor(private readonly filePath: string) {}

    mark(record: Omit<TraceRecord, 'ts'>): void {
        const line = JSON.stringify({ ts: new Date().toISOString(), ...record });
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            fs.appendFileSync(this.filePath, line + '\n');
        } catch (e: unknown) {
            log.warn('Trace write failed', { file: this.filePath, error: String(e) });
        }
    }
}

export class MemoryTraceSink implements TraceSink {
    readonly records: TraceRecord[] = [];

    mark(record: Omit<TraceRecord, 'ts'>): void {
        this.records.push({ ts: new Date().toISOString(), ...record });
    }

    count(marker: TraceMarker): number {
        return this.records.filter((r) => r.marker === marker).length;
    }
}

export function traceSinkFromEnv(env: Env, root: string): TraceSink {
    if (env.HANDOFF_TRACE_FILE) return new FileTraceSink(path.resolve(env.HANDOFF_TRACE_FILE));
    if (isDebugEnabled(env)) return new FileTraceSink(path.join(root, 'trace.log'));
    return noopTraceSink;
}
