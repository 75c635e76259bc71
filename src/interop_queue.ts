/**
 * InteropQueue: durable request/response pairs between pipelines.
 *
 * State machine per request (kernel.db, compare-and-swap):
 *
 *   queued --claim--> running --complete--> ok | blocked | failed
 *
 * The request file is created once at enqueue, the response file once at
 * completion, in the same transaction as the running -> terminal swap. A
 * request has at most one response.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { EventLedger } from './event_ledger';
import { UNSCOPED_RUN_ID } from './event_ledger';
import { matchesGlob } from './glob';
import type { KernelStore, RequestRecord } from './kernel_store';
import { createLogger } from './logger';
import { atomicCreateFileSync, errnoCode, stableStringify } from './output_writer';
import type { Pipelines } from './pipeline_config';
import type { RunManager, RunSummary } from './run_manager';
import { newId } from './run_manager';
import { formatErrors, isRecord } from './schema_validator';
import { isInteropRequest, isInteropResponse, kernelValidator, SCHEMA_IDS } from './schemas';
import {
    ClaimConflict,
    ConsistencyError,
    InteropRequestMalformed,
    NotFoundError,
} from './structured_error';
import type { InteropRequest, InteropResponse, InteropStatus } from './kernel_types';

const log = createLogger('interop');

/** Bound on claimNext retries when other consumers win the race. */
const CLAIM_NEXT_ATTEMPTS = 16;

export interface InteropQueueOptions {
    root: string;
    store: KernelStore;
    ledger: EventLedger;
    pipelines: Pipelines;
    runs: RunManager;
    consumerId?: string;
}

export interface RequestStatus {
    record: RequestRecord;
    request: InteropRequest;
    response?: InteropResponse;
}

export class InteropQueue {
    private readonly requestsDir: string;
    private readonly responsesDir: string;
    private readonly consumerId: string;

    constructor(private readonly opts: InteropQueueOptions) {
        this.requestsDir = path.join(opts.root, 'interop', 'requests');
        this.responsesDir = path.join(opts.root, 'interop', 'responses');
        this.consumerId = opts.consumerId ?? `${os.hostname()}:${process.pid}`;
        fs.mkdirSync(this.requestsDir, { recursive: true });
        fs.mkdirSync(this.responsesDir, { recursive: true });
    }

    requestPath(requestId: string): string {
        return path.join(this.requestsDir, `${requestId}.json`);
    }

    responsePath(requestId: string): string {
        return path.join(this.responsesDir, `${requestId}.json`);
    }

    /* ---------------------------------------------------------------------- */
    /* Enqueue                                                                */
    /* ---------------------------------------------------------------------- */

    enqueue(submission: unknown): InteropRequest {
        const parentRunId =
            isRecord(submission) && typeof submission.parent_run_id === 'string'
                ? submission.parent_run_id
                : UNSCOPED_RUN_ID;

        let request: InteropRequest;
        try {
            request = this.normalize(submission);
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, { run_id: parentRunId });
            throw e;
        }

        const filePath = this.requestPath(request.request_id);
        try {
            atomicCreateFileSync({ filePath, content: stableStringify(request, 2) + '\n' });
        } catch (e: unknown) {
            const err =
                errnoCode(e) === 'EEXIST'
                    ? new InteropRequestMalformed([`request_id ${request.request_id} was already submitted`])
                    : e;
            this.opts.ledger.recordError(err, { run_id: parentRunId });
            throw err;
        }

        this.opts.store.insertRequest({
            request_id: request.request_id,
            from_pipeline: request.from_pipeline,
            to_pipeline: request.to_pipeline,
            action: request.action,
            parent_run_id: request.parent_run_id,
            enqueued_at: new Date().toISOString(),
            request_path: filePath,
        });
        this.opts.ledger.append({
            run_id: request.parent_run_id,
            event_kind: 'interop_enqueued',
            pipeline: request.from_pipeline,
            pointers: [filePath],
            detail: request.request_id,
        });
        log.info('Request enqueued', { request_id: request.request_id, to: `${request.to_pipeline}/${request.action}` });
        return request;
    }

    /** Schema, id assignment and reference checks. Nothing is persisted here. */
    private normalize(submission: unknown): InteropRequest {
        const result = kernelValidator.validate(submission, SCHEMA_IDS.INTEROP_SUBMISSION);
        if (!result.valid || !isRecord(submission)) throw new InteropRequestMalformed(formatErrors(result));

        const candidate: unknown = {
            ...submission,
            request_id: typeof submission.request_id === 'string' ? submission.request_id : newId('req'),
        };
        if (!isInteropRequest(candidate)) {
            throw new InteropRequestMalformed(
                formatErrors(kernelValidator.validate(candidate, SCHEMA_IDS.INTEROP_REQUEST))
            );
        }

        const errors: string[] = [];
        if (!this.opts.pipelines.has(candidate.to_pipeline, candidate.action)) {
            errors.push(`unknown target ${candidate.to_pipeline}/${candidate.action}`);
        }
        if (!this.opts.store.getRun(candidate.parent_run_id)) {
            errors.push(`parent run ${candidate.parent_run_id} does not exist`);
        }
        if (errors.length > 0) throw new InteropRequestMalformed(errors);

        return {
            request_id: candidate.request_id,
            from_pipeline: candidate.from_pipeline,
            to_pipeline: candidate.to_pipeline,
            action: candidate.action,
            args: [...candidate.args],
            parent_run_id: candidate.parent_run_id,
            inputs: [...candidate.inputs],
            must_read: [...candidate.must_read],
            read_budget: Object.freeze({
                max_files: candidate.read_budget.max_files,
                max_total_bytes: candidate.read_budget.max_total_bytes,
                allowed_paths: [...candidate.read_budget.allowed_paths],
            }),
            deliverables_expected: [...candidate.deliverables_expected],
        };
    }

    /* ---------------------------------------------------------------------- */
    /* Claim                                                                  */
    /* ---------------------------------------------------------------------- */

    claim(requestId: string, consumer: string = this.consumerId): InteropRequest {
        const moved = this.opts.store.transitionRequest(requestId, 'queued', 'running', {
            claimed_by: consumer,
            claimed_at: new Date().toISOString(),
        });
        const record = this.opts.store.getRequest(requestId);
        if (!record) throw new NotFoundError('Interop request', requestId);

        if (!moved) {
            const err = new ClaimConflict(requestId, record.state);
            this.opts.ledger.recordError(err, { run_id: record.parent_run_id });
            throw err;
        }

        this.opts.ledger.append({
            run_id: record.parent_run_id,
            event_kind: 'interop_claimed',
            pipeline: record.from_pipeline,
            pointers: [record.request_path],
            detail: `${requestId} by ${consumer}`,
        });
        log.info('Request claimed', { request_id: requestId, consumer });
        return this.loadRequest(record);
    }

    /** Claim the oldest queued request, or null when none is queued. */
    claimNext(consumer: string = this.consumerId): InteropRequest | null {
        for (let i = 0; i < CLAIM_NEXT_ATTEMPTS; i++) {
            const id = this.opts.store.oldestQueued();
            if (id === undefined) return null;
            try {
                return this.claim(id, consumer);
            } catch (e: unknown) {
                if (!(e instanceof ClaimConflict)) throw e;
                log.debug('Lost claim race, trying the next request', { request_id: id });
            }
        }
        return null;
    }

    /* ---------------------------------------------------------------------- */
    /* Complete                                                               */
    /* ---------------------------------------------------------------------- */

    complete(requestId: string, response: InteropResponse): InteropResponse {
        const record = this.opts.store.getRequest(requestId);
        if (!record) throw new NotFoundError('Interop request', requestId);
        const scope = { run_id: record.parent_run_id, pointers: [record.request_path] };

        const check = kernelValidator.validate(response, SCHEMA_IDS.INTEROP_RESPONSE);
        if (!check.valid || response.request_id !== requestId) {
            const err = new ConsistencyError(`Response for ${requestId} is invalid`, {
                errors: check.valid ? [`request_id ${response.request_id} does not match`] : formatErrors(check),
            });
            this.opts.ledger.recordError(err, scope);
            throw err;
        }

        const filePath = this.responsePath(requestId);
        try {
            this.opts.store.immediate(() => {
                const moved = this.opts.store.transitionRequest(requestId, 'running', response.status, {
                    completed_at: new Date().toISOString(),
                    child_run_id: response.child_run_id || undefined,
                    response_path: filePath,
                });
                if (!moved) {
                    const current = this.opts.store.getRequest(requestId);
                    throw new ConsistencyError(
                        `Request ${requestId} cannot take a response in state ${current?.state ?? 'unknown'}`,
                        { request_id: requestId, state: current?.state }
                    );
                }
                try {
                    atomicCreateFileSync({ filePath, content: stableStringify(response, 2) + '\n' });
                } catch (e: unknown) {
                    if (errnoCode(e) === 'EEXIST') {
                        throw new ConsistencyError(`Response for ${requestId} already exists`, { request_id: requestId });
                    }
                    throw e;
                }
            });
        } catch (e: unknown) {
            this.opts.ledger.recordError(e, scope);
            throw e;
        }

        const pointers = [filePath, response.capsule_path, response.manifest_path].filter((p) => p.length > 0);
        this.opts.ledger.append({
            run_id: record.parent_run_id,
            event_kind: 'interop_completed',
            pipeline: record.from_pipeline,
            pointers,
            detail: `${requestId}:${response.status}`,
        });
        log.info('Request completed', { request_id: requestId, status: response.status });
        return response;
    }

    /* ---------------------------------------------------------------------- */
    /* Process                                                                */
    /* ---------------------------------------------------------------------- */

    /**
     * Claim one request (the given one, or the oldest queued), run the child
     * phase with a bounded initial context and complete the request. Returns
     * null when nothing is queued.
     */
    async process(requestId?: string): Promise<InteropResponse | null> {
        const request = requestId !== undefined ? this.claim(requestId) : this.claimNext();
        if (!request) return null;

        let response: InteropResponse;
        try {
            const parent = this.opts.runs.paths(request.parent_run_id);
            const summary = await this.opts.runs.run(request.to_pipeline, request.action, request.args, {
                parentRunId: request.parent_run_id,
                readBudget: request.read_budget,
                mustRead: request.must_read,
                context: { request, parentCapsule: parent.capsule, parentManifest: parent.manifest },
            });
            response = this.responseFor(request, summary);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            log.error('Child run failed to complete', { request_id: request.request_id, error: message });
            response = {
                request_id: request.request_id,
                status: 'failed',
                child_run_id: '',
                capsule_path: '',
                manifest_path: '',
                deliverables: [],
                notes: `child run did not complete: ${message}`,
            };
        }
        return this.complete(request.request_id, response);
    }

    private responseFor(request: InteropRequest, summary: RunSummary): InteropResponse {
        const status: InteropStatus =
            summary.status === 'blocked' ? 'blocked' : summary.run.exit_code === 0 ? 'ok' : 'failed';

        const produced = summary.manifest.artifacts.map((a) => a.path);
        const delivered = request.deliverables_expected.filter((d) => produced.some((p) => p === d || matchesGlob(p, d)));
        const missing = request.deliverables_expected.filter((d) => !delivered.includes(d));

        const notes = [
            `child exit ${summary.run.exit_code}`,
            `capsule ${summary.status}${summary.capsule.synthetic ? ' (synthetic)' : ''}`,
            `${delivered.length}/${request.deliverables_expected.length} deliverables`,
        ];
        if (missing.length > 0) notes.push(`missing: ${missing.join(', ')}`);
        if (summary.manifest.omitted_count > 0) notes.push(`${summary.manifest.omitted_count} artifacts omitted by caps`);

        return {
            request_id: request.request_id,
            status,
            child_run_id: summary.run.run_id,
            capsule_path: summary.capsule_path,
            manifest_path: summary.manifest_path,
            deliverables: delivered,
            notes: notes.join('; '),
        };
    }

    /* ---------------------------------------------------------------------- */
    /* Queries                                                                */
    /* ---------------------------------------------------------------------- */

    status(requestId: string): RequestStatus {
        const record = this.opts.store.getRequest(requestId);
        if (!record) throw new NotFoundError('Interop request', requestId);
        const out: RequestStatus = { record, request: this.loadRequest(record) };
        if (record.response_path && fs.existsSync(record.response_path)) {
            const parsed: unknown = JSON.parse(fs.readFileSync(record.response_path, 'utf8'));
            if (!isInteropResponse(parsed)) throw new ConsistencyError(`Response file for ${requestId} is invalid`);
            out.response = parsed;
        }
        return out;
    }

    list(): RequestRecord[] {
        return this.opts.store.listRequests();
    }

    private loadRequest(record: RequestRecord): InteropRequest {
        const parsed: unknown = JSON.parse(fs.readFileSync(record.request_path, 'utf8'));
        if (!isInteropRequest(parsed)) {
            throw new ConsistencyError(`Request file for ${record.request_id} is invalid`, { path: record.request_path });
        }
        return parsed;
    }
}
