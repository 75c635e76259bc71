/**
 * Schemas for every document the kernel reads from disk or from a caller,
 * plus type guards backed by them.
 */

import { SchemaValidator } from './schema_validator';
import type { JsonSchema } from './schema_validator';
import type { InteropRequest, InteropResponse, Manifest } from './kernel_types';

/** request_id and run ids become file names. */
export const SAFE_ID_PATTERN = '^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$';

const stringArray: JsonSchema = { type: 'array', items: { type: 'string' } };
const nonEmpty: JsonSchema = { type: 'string', minLength: 1 };

const readBudgetSchema: JsonSchema = {
    type: 'object',
    required: ['max_files', 'max_total_bytes', 'allowed_paths'],
    properties: {
        max_files: { type: 'integer', minimum: 0 },
        max_total_bytes: { type: 'integer', minimum: 0 },
        allowed_paths: stringArray,
    },
    additionalProperties: false,
};

const requestProperties: Record<string, JsonSchema> = {
    request_id: { type: 'string', pattern: SAFE_ID_PATTERN },
    from_pipeline: nonEmpty,
    to_pipeline: nonEmpty,
    action: nonEmpty,
    args: stringArray,
    parent_run_id: { type: 'string', pattern: SAFE_ID_PATTERN },
    inputs: stringArray,
    must_read: stringArray,
    read_budget: readBudgetSchema,
    deliverables_expected: stringArray,
};

const REQUEST_FIELDS = [
    'from_pipeline',
    'to_pipeline',
    'action',
    'args',
    'parent_run_id',
    'inputs',
    'must_read',
    'read_budget',
    'deliverables_expected',
];

/** What a producer submits: request_id is optional and assigned at enqueue. */
export const interopSubmissionSchema: JsonSchema = {
    type: 'object',
    required: REQUEST_FIELDS,
    properties: requestProperties,
    additionalProperties: false,
};

export const interopRequestSchema: JsonSchema = {
    type: 'object',
    required: ['request_id', ...REQUEST_FIELDS],
    properties: requestProperties,
    additionalProperties: false,
};

export const interopResponseSchema: JsonSchema = {
    type: 'object',
    required: ['request_id', 'status', 'child_run_id', 'capsule_path', 'manifest_path', 'deliverables', 'notes'],
    properties: {
        request_id: { type: 'string', pattern: SAFE_ID_PATTERN },
        status: { type: 'string', enum: ['ok', 'blocked', 'failed'] },
        child_run_id: { type: 'string' },
        capsule_path: { type: 'string' },
        manifest_path: { type: 'string' },
        deliverables: stringArray,
        notes: { type: 'string' },
    },
    additionalProperties: false,
};

export const manifestSchema: JsonSchema = {
    type: 'object',
    required: [
        'run_id',
        'pipeline_kind',
        'phase',
        'started_at',
        'ended_at',
        'exit_code',
        'max_files',
        'max_total_bytes',
        'artifacts',
        'truth_pointers',
        'log_pointers',
        'omitted_count',
        'omitted_bytes',
    ],
    properties: {
        run_id: nonEmpty,
        pipeline_kind: nonEmpty,
        phase: nonEmpty,
        started_at: nonEmpty,
        ended_at: nonEmpty,
        exit_code: { type: 'integer' },
        max_files: { type: 'integer', minimum: 0 },
        max_total_bytes: { type: 'integer', minimum: 0 },
        artifacts: {
            type: 'array',
            items: {
                type: 'object',
                required: ['path', 'kind', 'bytes', 'sha256'],
                properties: {
                    path: nonEmpty,
                    kind: nonEmpty,
                    bytes: { type: 'integer', minimum: 0 },
                    sha256: { type: 'string', pattern: '^[0-9a-f]{64}$' },
                },
                additionalProperties: false,
            },
        },
        truth_pointers: stringArray,
        log_pointers: stringArray,
        omitted_count: { type: 'integer', minimum: 0 },
        omitted_bytes: { type: 'integer', minimum: 0 },
        synthetic: { type: 'boolean' },
    },
    additionalProperties: false,
};

const artifactRuleSchema: JsonSchema = {
    type: 'object',
    required: ['glob', 'kind'],
    properties: { glob: nonEmpty, kind: nonEmpty },
    additionalProperties: false,
};

const phaseRuleSchema: JsonSchema = {
    type: 'object',
    required: ['category', 'deny', 'message'],
    properties: {
        category: { type: 'string', enum: ['file_write', 'file_read', 'process_exec'] },
        deny: stringArray,
        except: stringArray,
        message: nonEmpty,
    },
    additionalProperties: false,
};

export const pipelineConfigSchema: JsonSchema = {
    type: 'object',
    required: ['pipelines'],
    properties: {
        pipelines: {
            type: 'object',
            additionalProperties: {
                type: 'object',
                required: ['phases'],
                properties: {
                    description: { type: 'string' },
                    phase_env: { type: 'string', pattern: '^[A-Z][A-Z0-9_]*$' },
                    safe_read_globs: stringArray,
                    truth_pointers: stringArray,
                    log_pointers: stringArray,
                    artifacts: { type: 'array', items: artifactRuleSchema },
                    phases: {
                        type: 'object',
                        additionalProperties: {
                            type: 'object',
                            properties: {
                                description: { type: 'string' },
                                command: stringArray,
                                artifacts: { type: 'array', items: artifactRuleSchema },
                                rules: { type: 'array', items: phaseRuleSchema },
                            },
                            additionalProperties: false,
                        },
                    },
                },
                additionalProperties: false,
            },
        },
    },
    additionalProperties: false,
};

export const SCHEMA_IDS = {
    INTEROP_SUBMISSION: 'interop_submission',
    INTEROP_REQUEST: 'interop_request',
    INTEROP_RESPONSE: 'interop_response',
    MANIFEST: 'manifest',
    PIPELINE_CONFIG: 'pipeline_config',
} as const;

export const kernelValidator = new SchemaValidator();
kernelValidator.registerSchema(SCHEMA_IDS.INTEROP_SUBMISSION, interopSubmissionSchema);
kernelValidator.registerSchema(SCHEMA_IDS.INTEROP_REQUEST, interopRequestSchema);
kernelValidator.registerSchema(SCHEMA_IDS.INTEROP_RESPONSE, interopResponseSchema);
kernelValidator.registerSchema(SCHEMA_IDS.MANIFEST, manifestSchema);
kernelValidator.registerSchema(SCHEMA_IDS.PIPELINE_CONFIG, pipelineConfigSchema);

export function isInteropRequest(value: unknown): value is InteropRequest {
    return kernelValidator.validate(value, SCHEMA_IDS.INTEROP_REQUEST).valid;
}

export function isInteropResponse(value: unknown): value is InteropResponse {
    return kernelValidator.validate(value, SCHEMA_IDS.INTEROP_RESPONSE).valid;
}

/** Shape only; cap and ordering invariants are checked by validateManifest. */
export function isManifestShape(value: unknown): value is Manifest {
    return kernelValidator.validate(value, SCHEMA_IDS.MANIFEST).valid;
}
