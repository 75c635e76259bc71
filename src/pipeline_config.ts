/**
 * Static pipeline configuration: phases, their commands, per-phase rules,
 * artifact allowlists and the truth/log pointers copied into manifests.
 */

import * as fs from 'fs';

import type { Env } from './config';
import { createLogger } from './logger';
import { formatErrors } from './schema_validator';
import { kernelValidator, SCHEMA_IDS } from './schemas';
import { ConfigurationError } from './structured_error';
import type { OperationCategory } from './kernel_types';

const log = createLogger('pipelines');

export interface ArtifactRule {
    glob: string;
    kind: string;
}

export interface PhaseRule {
    category: OperationCategory;
    deny: string[];
    except?: string[];
    message: string;
}

export interface PhaseConfig {
    description?: string;
    command?: string[];
    artifacts?: ArtifactRule[];
    rules?: PhaseRule[];
}

export interface PipelineConfig {
    description?: string;
    /** Legacy environment variable naming the active phase (e.g. TDD_PHASE). */
    phase_env?: string;
    safe_read_globs?: string[];
    truth_pointers?: string[];
    log_pointers?: string[];
    artifacts?: ArtifactRule[];
    phases: Record<string, PhaseConfig>;
}

export interface PipelineRegistry {
    pipelines: Record<string, PipelineConfig>;
}

export interface ActivePhase {
    pipeline_kind: string;
    phase: string;
}

function isPipelineRegistry(value: unknown): value is PipelineRegistry {
    return kernelValidator.validate(value, SCHEMA_IDS.PIPELINE_CONFIG).valid;
}

export function parsePipelineRegistry(value: unknown, source = '<inline>'): PipelineRegistry {
    const result = kernelValidator.validate(value, SCHEMA_IDS.PIPELINE_CONFIG);
    if (!result.valid || !isPipelineRegistry(value)) {
        throw new ConfigurationError(`Invalid pipeline configuration in ${source}`, {
            errors: formatErrors(result),
        });
    }
    return value;
}

export function loadPipelineRegistry(filePath: string): PipelineRegistry {
    let raw: string;
    try {
        raw = fs.readFileSync(filePath, 'utf8');
    } catch (e: unknown) {
        throw new ConfigurationError(`Cannot read pipeline configuration ${filePath}`, { error: String(e) });
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e: unknown) {
        throw new ConfigurationError(`Pipeline configuration ${filePath} is not JSON`, { error: String(e) });
    }
    const registry = parsePipelineRegistry(parsed, filePath);
    log.debug('Loaded pipeline configuration', { file: filePath, pipelines: Object.keys(registry.pipelines) });
    return registry;
}

export class Pipelines {
    constructor(private readonly registry: PipelineRegistry) {}

    static fromFile(filePath: string): Pipelines {
        return new Pipelines(loadPipelineRegistry(filePath));
    }

    kinds(): string[] {
        return Object.keys(this.registry.pipelines);
    }

    has(kind: string, phase?: string): boolean {
        if (!Object.hasOwn(this.registry.pipelines, kind)) return false;
        return phase === undefined || Object.hasOwn(this.registry.pipelines[kind].phases, phase);
    }

    get(kind: string): PipelineConfig {
        const p = Object.hasOwn(this.registry.pipelines, kind) ? this.registry.pipelines[kind] : undefined;
        if (!p) throw new ConfigurationError(`Unknown pipeline: ${kind}`, { known: this.kinds() });
        return p;
    }

    phase(kind: string, phase: string): PhaseConfig {
        const p = this.get(kind);
        const cfg = Object.hasOwn(p.phases, phase) ? p.phases[phase] : undefined;
        if (!cfg) {
            throw new ConfigurationError(`Unknown phase ${phase} for pipeline ${kind}`, {
                known: Object.keys(p.phases),
            });
        }
        return cfg;
    }

    /** Artifact allowlist for a phase: pipeline-wide rules then phase rules. */
    artifactRules(kind: string, phase: string): ArtifactRule[] {
        return [...(this.get(kind).artifacts ?? []), ...(this.phase(kind, phase).artifacts ?? [])];
    }

    /**
     * The phase the calling process runs under. HANDOFF_PIPELINE/HANDOFF_PHASE
     * win; otherwise the first pipeline whose phase_env variable is set.
     */
    resolveActivePhase(env: Env): ActivePhase | null {
        const kind = env.HANDOFF_PIPELINE;
        const phase = env.HANDOFF_PHASE;
        if (kind && phase) {
            this.phase(kind, phase);
            return { pipeline_kind: kind, phase };
        }

        for (const [name, cfg] of Object.entries(this.registry.pipelines)) {
            if (!cfg.phase_env) continue;
            const value = env[cfg.phase_env];
            if (!value) continue;
            const normalized = value.trim().toLowerCase();
            this.phase(name, normalized);
            return { pipeline_kind: name, phase: normalized };
        }
        return null;
    }
}
