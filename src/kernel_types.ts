/**
 * Kernel data model: runs, ledger events, capsules, manifests, interop
 * request/response documents and the hook dispatcher's call context.
 */

/* -------------------------------------------------------------------------- */
/* Runs & events                                                              */
/* -------------------------------------------------------------------------- */

export interface Run {
    run_id: string;
    pipeline_kind: string;
    phase: string;
    started_at: string;
    ended_at?: string;
    exit_code?: number;
    parent_run_id?: string;
    args: string[];
}

export type EventKind =
    | 'phase_started'
    | 'phase_finished'
    | 'artifact_indexed'
    | 'hook_decision'
    | 'interop_enqueued'
    | 'interop_claimed'
    | 'interop_completed'
    | 'error';

export const EVENT_KINDS: readonly EventKind[] = [
    'phase_started',
    'phase_finished',
    'artifact_indexed',
    'hook_decision',
    'interop_enqueued',
    'interop_claimed',
    'interop_completed',
    'error',
];

export interface EventRecord {
    ts: string;
    run_id: string;
    event_kind: EventKind;
    phase?: string;
    pipeline?: string;
    pointers: string[];
    exit_code?: number;
    detail?: string;
}

/* -------------------------------------------------------------------------- */
/* Capsule & manifest                                                         */
/* -------------------------------------------------------------------------- */

export type CapsuleStatus = 'ok' | 'blocked' | 'failed' | 'in_progress';

export const CAPSULE_STATUSES: readonly CapsuleStatus[] = ['ok', 'blocked', 'failed', 'in_progress'];

export interface Capsule {
    goal: string;
    what_happened: string;
    status: CapsuleStatus;
    status_note?: string;
    next_action: string;
    evidence_pointers: string[];
    blocked_info?: string;
    synthetic?: boolean;
}

export interface ManifestArtifact {
    path: string;
    kind: string;
    bytes: number;
    sha256: string;
}

export interface Manifest {
    run_id: string;
    pipeline_kind: string;
    phase: string;
    started_at: string;
    ended_at: string;
    exit_code: number;
    max_files: number;
    max_total_bytes: number;
    artifacts: ManifestArtifact[];
    truth_pointers: string[];
    log_pointers: string[];
    omitted_count: number;
    omitted_bytes: number;
    synthetic?: boolean;
}

/* -------------------------------------------------------------------------- */
/* Interop                                                                    */
/* -------------------------------------------------------------------------- */

export interface ReadBudget {
    max_files: number;
    max_total_bytes: number;
    allowed_paths: string[];
}

export interface InteropRequest {
    request_id: string;
    from_pipeline: string;
    to_pipeline: string;
    action: string;
    args: string[];
    parent_run_id: string;
    inputs: string[];
    must_read: string[];
    read_budget: ReadBudget;
    deliverables_expected: string[];
}

export type InteropStatus = 'ok' | 'blocked' | 'failed';

export type RequestState = 'queued' | 'running' | InteropStatus;

export interface InteropResponse {
    request_id: string;
    status: InteropStatus;
    child_run_id: string;
    capsule_path: string;
    manifest_path: string;
    deliverables: string[];
    notes: string;
}

/* -------------------------------------------------------------------------- */
/* Hook dispatch                                                              */
/* -------------------------------------------------------------------------- */

export type OperationCategory = 'file_write' | 'file_read' | 'process_exec';

export const OPERATION_CATEGORIES: readonly OperationCategory[] = ['file_write', 'file_read', 'process_exec'];

/** `hops` counts delegations already taken on the way to the current dispatcher. */
export interface ReentryToken {
    active: boolean;
    hops: number;
}

export interface CallContext {
    pipeline_kind: string;
    phase: string;
    category: OperationCategory;
    targets: string[];
    command?: string;
    size_bytes?: number;
    run_id?: string;
    reentry: ReentryToken;
}

export type Verdict = 'allow' | 'block';

export interface Decision {
    verdict: Verdict;
    reason?: string;
    rule?: string;
    terminal: boolean;
    decided_by: string;
}

/** Pipeline/phase placeholder for hook calls made outside any pipeline phase. */
export const UNSCOPED = 'none';
