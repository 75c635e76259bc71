/**
 * Main entry point - exports all public APIs
 */

export * from './kernel_types';
export * from './structured_error';
export { SchemaValidator, formatErrors, isRecord } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export { kernelValidator, SCHEMA_IDS, isInteropRequest, isInteropResponse } from './schemas';
export { configureLogger, createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { FileTraceSink, MemoryTraceSink, noopTraceSink } from './debug_logger';
export type { TraceSink, TraceRecord, TraceMarker } from './debug_logger';

export { EventLedger, UNSCOPED_RUN_ID } from './event_ledger';
export type { AppendInput, LedgerFilter } from './event_ledger';
export { KernelStore } from './kernel_store';
export type { RunRecord, RequestRecord, ReadUsage } from './kernel_store';
export { Pipelines } from './pipeline_config';
export type { PipelineConfig, PhaseConfig, PhaseRule, ArtifactRule } from './pipeline_config';
export { RuleTable, commandMatches } from './rule_table';
export type { RuleMatch } from './rule_table';
export { classifyToolCall } from './operation_classifier';
export type { ClassifiedOperation } from './operation_classifier';
export { guardLargeRead, checkReadBudget } from './read_budget_guard';
export type { GuardDecision, BudgetLimits } from './read_budget_guard';
export { ReadBudgetAuthority } from './budget_authority';
export { HookDispatcher, CommandDelegate, validateCallContext } from './hook_dispatcher';
export type { HookDispatcherOptions, DispatchTarget } from './hook_dispatcher';
export {
    extractCapsule,
    parseCapsule,
    renderCapsule,
    syntheticCapsule,
    validateCapsuleText,
    CAPSULE_BEGIN,
    CAPSULE_END,
} from './capsule_extractor';
export { ManifestBuilder, serializeManifest, syntheticManifest, validateManifest } from './manifest_builder';
export type { ManifestCaps, ManifestPointers } from './manifest_builder';
export { executePhase } from './phase_executor';
export type { PhaseExecutionResult } from './phase_executor';
export { RunManager, CAPSULE_REJECTED_EXIT_CODE, newId } from './run_manager';
export type { RunHandle, RunSummary, StartOptions } from './run_manager';
export { InteropQueue } from './interop_queue';
export type { RequestStatus } from './interop_queue';
export { openKernel, dispatcherFromEnv, callContextFromEnv } from './kernel';
export type { Kernel, KernelOptions } from './kernel';
export { HandoffKernelCLI } from './cli';
