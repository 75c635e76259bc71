/**
 * Structured Error Schema
 *
 * One taxonomy for every failure the kernel can surface. Errors are thrown as
 * KernelError subclasses and recorded in the event ledger in their structured
 * form before they propagate.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Recoverable inside the phase
    | 'POLICY_VIOLATION'

    // Handoff artifacts
    | 'CAPSULE_FORMAT_ERROR'
    | 'MANIFEST_OVERFLOW'

    // Interop
    | 'INTEROP_REQUEST_MALFORMED'
    | 'CLAIM_CONFLICT'
    | 'CONSISTENCY_ERROR'

    // Dispatcher / configuration
    | 'REENTRANCY_VIOLATION'
    | 'CONFIGURATION_ERROR'

    // Execution / infrastructure
    | 'PHASE_EXECUTION_FAILURE'
    | 'NOT_FOUND'
    | 'STORAGE_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'retry_with_different_operation'
    | 'fix_capsule_markers'
    | 'resubmit_request'
    | 'fix_configuration'
    | 'inspect_phase_log'
    | 'escalate_to_human'
    | 'abort_phase';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
    side_effects?: string[];
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = recoveryOptionsFor(code)
): StructuredError {
    const severity = getSeverity(code);
    return {
        code,
        message,
        severity,
        context,
        recovery_options: recoveryOptions,
        human_intervention_required: severity === 'FATAL' || recoveryOptions.length === 0,
        timestamp: new Date().toISOString(),
    };
}

export function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'REENTRANCY_VIOLATION',
        'CONFIGURATION_ERROR',
        'CONSISTENCY_ERROR',
        'STORAGE_ERROR',
    ];

    const warningCodes: ErrorCode[] = [
        'POLICY_VIOLATION',
        'MANIFEST_OVERFLOW',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    retryWithDifferentOperation: (): RecoveryOption => ({
        action: 'retry_with_different_operation',
        description: 'Phase retries with an operation the active rules allow',
        risk_level: 'LOW',
    }),

    fixCapsuleMarkers: (): RecoveryOption => ({
        action: 'fix_capsule_markers',
        description: 'Re-emit the capsule within 30 lines, pointers only, no code fences',
        risk_level: 'LOW',
        side_effects: ['Handoff blocked until the phase reruns'],
    }),

    resubmitRequest: (): RecoveryOption => ({
        action: 'resubmit_request',
        description: 'Fix the request document and submit it again',
        risk_level: 'LOW',
    }),

    fixConfiguration: (): RecoveryOption => ({
        action: 'fix_configuration',
        description: 'Correct the pipeline configuration or hook wiring',
        risk_level: 'MEDIUM',
        side_effects: ['Phase cannot proceed until fixed'],
    }),

    inspectPhaseLog: (): RecoveryOption => ({
        action: 'inspect_phase_log',
        description: 'Read the run manifest log pointers to find the failing step',
        risk_level: 'LOW',
    }),

    escalateToHuman: (reason: string): RecoveryOption => ({
        action: 'escalate_to_human',
        description: `Escalate to human: ${reason}`,
        risk_level: 'LOW',
        side_effects: ['Pipeline paused', 'Requires manual intervention'],
    }),

    abortPhase: (reason: string): RecoveryOption => ({
        action: 'abort_phase',
        description: `Abort phase: ${reason}`,
        risk_level: 'HIGH',
        side_effects: ['Phase terminated', 'Synthetic capsule/manifest written'],
    }),
};

export function recoveryOptionsFor(code: ErrorCode): RecoveryOption[] {
    switch (code) {
        case 'POLICY_VIOLATION':
            return [CommonRecoveryOptions.retryWithDifferentOperation()];
        case 'CAPSULE_FORMAT_ERROR':
            return [CommonRecoveryOptions.fixCapsuleMarkers()];
        case 'MANIFEST_OVERFLOW':
            return [];
        case 'INTEROP_REQUEST_MALFORMED':
            return [CommonRecoveryOptions.resubmitRequest()];
        case 'CLAIM_CONFLICT':
            return [];
        case 'CONSISTENCY_ERROR':
            return [CommonRecoveryOptions.escalateToHuman('duplicate write to a write-once record')];
        case 'REENTRANCY_VIOLATION':
            return [CommonRecoveryOptions.fixConfiguration(), CommonRecoveryOptions.abortPhase('delegation loop')];
        case 'CONFIGURATION_ERROR':
            return [CommonRecoveryOptions.fixConfiguration()];
        case 'PHASE_EXECUTION_FAILURE':
            return [CommonRecoveryOptions.inspectPhaseLog(), CommonRecoveryOptions.escalateToHuman('phase failed')];
        case 'NOT_FOUND':
            return [];
        case 'STORAGE_ERROR':
            return [CommonRecoveryOptions.escalateToHuman('kernel storage unavailable')];
    }
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class KernelError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'KernelError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, this.details);
    }
}

export class PolicyViolation extends KernelError {
    constructor(public readonly reason: string, details: Record<string, unknown> = {}) {
        super(reason, 'POLICY_VIOLATION', details);
        this.name = 'PolicyViolation';
    }
}

export class CapsuleFormatError extends KernelError {
    constructor(public readonly problems: string[]) {
        super(`Capsule format invalid: ${problems.join('; ')}`, 'CAPSULE_FORMAT_ERROR', { problems });
        this.name = 'CapsuleFormatError';
    }
}

export class InteropRequestMalformed extends KernelError {
    constructor(public readonly errors: string[]) {
        super(`Interop request malformed: ${errors.join('; ')}`, 'INTEROP_REQUEST_MALFORMED', { errors });
        this.name = 'InteropRequestMalformed';
    }
}

/** Second claim on a request that already left `queued` (AlreadyClaimed). */
export class ClaimConflict extends KernelError {
    constructor(public readonly requestId: string, public readonly state: string) {
        super(`AlreadyClaimed: request ${requestId} is ${state}`, 'CLAIM_CONFLICT', { request_id: requestId, state });
        this.name = 'ClaimConflict';
    }
}

export class ConsistencyError extends KernelError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, 'CONSISTENCY_ERROR', details);
        this.name = 'ConsistencyError';
    }
}

export class ReentrancyViolation extends KernelError {
    constructor(public readonly hops: number) {
        super(`Dispatcher delegation depth ${hops} exceeds one hop`, 'REENTRANCY_VIOLATION', { hops });
        this.name = 'ReentrancyViolation';
    }
}

export class ConfigurationError extends KernelError {
    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

export class PhaseExecutionFailure extends KernelError {
    constructor(public readonly runId: string, public readonly exitCode: number, reason: string) {
        super(`Phase run ${runId} failed (exit ${exitCode}): ${reason}`, 'PHASE_EXECUTION_FAILURE', {
            run_id: runId,
            exit_code: exitCode,
        });
        this.name = 'PhaseExecutionFailure';
    }
}

export class NotFoundError extends KernelError {
    constructor(what: string, id: string) {
        super(`${what} not found: ${id}`, 'NOT_FOUND', { what, id });
        this.name = 'NotFoundError';
    }
}

export class StorageError extends KernelError {
    constructor(message: string, public readonly cause?: unknown) {
        super(message, 'STORAGE_ERROR');
        this.name = 'StorageError';
    }
}

export function isKernelError(err: unknown): err is KernelError {
    return err instanceof KernelError;
}

/** Structured form of any thrown value; non-kernel errors map to STORAGE_ERROR. */
export function toStructuredError(err: unknown): StructuredError {
    if (isKernelError(err)) return err.toStructured();
    const message = err instanceof Error ? err.message : String(err);
    return createStructuredError('STORAGE_ERROR', message);
}
