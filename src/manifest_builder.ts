/**
 * ManifestBuilder
 *
 * INVARIANTS:
 *   - artifacts.length <= max_files and sum(bytes) <= max_total_bytes
 *   - candidates are visited in code-unit order of their relative path; once
 *     one entry would break a cap, it and every later match go to
 *     omitted_count/omitted_bytes and are never hashed
 *   - identical workspace + inputs serialize to identical bytes
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

import { matchesGlob, toPosix } from './glob';
import { createLogger } from './logger';
import { atomicCreateFileSync, errnoCode, stableStringify } from './output_writer';
import type { ArtifactRule } from './pipeline_config';
import { formatErrors } from './schema_validator';
import { isManifestShape, kernelValidator, SCHEMA_IDS } from './schemas';
import { ConsistencyError } from './structured_error';
import type { Manifest, ManifestArtifact, Run } from './kernel_types';

const log = createLogger('manifest');

const HASH_CHUNK = 64 * 1024;

export interface ManifestPointers {
    truth_pointers: readonly string[];
    log_pointers: readonly string[];
}

export interface ManifestCaps {
    max_files: number;
    max_total_bytes: number;
}

/** A finished run: the fields the manifest copies. */
export type FinishedRun = Run & { ended_at: string; exit_code: number };

export interface ManifestBuilderOptions {
    /** Absolute directories never walked (the kernel state root, VCS metadata). */
    exclude?: readonly string[];
}

function compareCodeUnits(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function hashFileSync(filePath: string): { sha256: string; bytes: number } {
    const hash = crypto.createHash('sha256');
    const buf = Buffer.alloc(HASH_CHUNK);
    const fd = fs.openSync(filePath, 'r');
    let bytes = 0;
    try {
        let n: number;
        while ((n = fs.readSync(fd, buf, 0, HASH_CHUNK, null)) > 0) {
            hash.update(buf.subarray(0, n));
            bytes += n;
        }
    } finally {
        fs.closeSync(fd);
    }
    return { sha256: hash.digest('hex'), bytes };
}

export class ManifestBuilder {
    private readonly exclude: Set<string>;

    constructor(private readonly workspaceRoot: string, opts: ManifestBuilderOptions = {}) {
        this.exclude = new Set(
            [path.join(workspaceRoot, '.git'), ...(opts.exclude ?? [])].map((p) => path.resolve(p))
        );
    }

    build(run: FinishedRun, allowlist: readonly ArtifactRule[], caps: ManifestCaps, pointers: ManifestPointers): Manifest {
        const candidates = this.collect(allowlist);

        const artifacts: ManifestArtifact[] = [];
        let total = 0;
        let omittedCount = 0;
        let omittedBytes = 0;
        let capReached = false;

        for (const { rel, kind, size } of candidates) {
            if (!capReached && artifacts.length < caps.max_files && total + size <= caps.max_total_bytes) {
                const { sha256, bytes } = hashFileSync(path.join(this.workspaceRoot, rel));
                if (total + bytes <= caps.max_total_bytes) {
                    artifacts.push({ path: rel, kind, bytes, sha256 });
                    total += bytes;
                    continue;
                }
                // grew between stat and hash
                capReached = true;
                omittedCount++;
                omittedBytes += bytes;
                continue;
            }
            capReached = true;
            omittedCount++;
            omittedBytes += size;
        }

        if (omittedCount > 0) {
            log.info('Manifest caps reached', {
                run_id: run.run_id,
                included: artifacts.length,
                omitted_count: omittedCount,
                omitted_bytes: omittedBytes,
            });
        }

        return {
            run_id: run.run_id,
            pipeline_kind: run.pipeline_kind,
            phase: run.phase,
            started_at: run.started_at,
            ended_at: run.ended_at,
            exit_code: run.exit_code,
            max_files: caps.max_files,
            max_total_bytes: caps.max_total_bytes,
            artifacts,
            truth_pointers: [...pointers.truth_pointers],
            log_pointers: [...pointers.log_pointers],
            omitted_count: omittedCount,
            omitted_bytes: omittedBytes,
        };
    }

    /** Matching regular files, sorted, with the first matching rule's kind. */
    private collect(allowlist: readonly ArtifactRule[]): Array<{ rel: string; kind: string; size: number }> {
        const found: Array<{ rel: string; kind: string; size: number }> = [];
        const walk = (dir: string): void => {
            for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
                const abs = path.join(dir, entry.name);
                if (entry.isSymbolicLink()) continue;
                if (entry.isDirectory()) {
                    if (!this.exclude.has(abs)) walk(abs);
                    continue;
                }
                if (!entry.isFile()) continue;
                const rel = toPosix(path.relative(this.workspaceRoot, abs));
                const rule = allowlist.find((r) => matchesGlob(rel, r.glob));
                if (!rule) continue;
                found.push({ rel, kind: rule.kind, size: fs.statSync(abs).size });
            }
        };
        walk(path.resolve(this.workspaceRoot));
        return found.sort((a, b) => compareCodeUnits(a.rel, b.rel));
    }
}

/** Manifest for a run whose phase never started: no artifacts. */
export function syntheticManifest(run: FinishedRun, caps: ManifestCaps, pointers: ManifestPointers): Manifest {
    return {
        run_id: run.run_id,
        pipeline_kind: run.pipeline_kind,
        phase: run.phase,
        started_at: run.started_at,
        ended_at: run.ended_at,
        exit_code: run.exit_code,
        max_files: caps.max_files,
        max_total_bytes: caps.max_total_bytes,
        artifacts: [],
        truth_pointers: [...pointers.truth_pointers],
        log_pointers: [...pointers.log_pointers],
        omitted_count: 0,
        omitted_bytes: 0,
        synthetic: true,
    };
}

export function serializeManifest(m: Manifest): string {
    return stableStringify(m, 2) + '\n';
}

/** Schema plus cap, ordering and accounting invariants. */
export function validateManifest(value: unknown): { valid: boolean; errors: string[]; manifest?: Manifest } {
    const result = kernelValidator.validate(value, SCHEMA_IDS.MANIFEST);
    if (!result.valid || !isManifestShape(value)) return { valid: false, errors: formatErrors(result) };

    const errors: string[] = [];
    const m = value;
    if (m.artifacts.length > m.max_files) {
        errors.push(`artifacts: ${m.artifacts.length} entries exceed max_files ${m.max_files}`);
    }
    const total = m.artifacts.reduce((sum, a) => sum + a.bytes, 0);
    if (total > m.max_total_bytes) {
        errors.push(`artifacts: ${total} bytes exceed max_total_bytes ${m.max_total_bytes}`);
    }
    for (let i = 1; i < m.artifacts.length; i++) {
        if (compareCodeUnits(m.artifacts[i - 1].path, m.artifacts[i].path) >= 0) {
            errors.push(`artifacts[${i}]: ${m.artifacts[i].path} is not in ascending path order`);
        }
    }
    if (m.omitted_count === 0 && m.omitted_bytes !== 0) {
        errors.push('omitted_bytes must be 0 when omitted_count is 0');
    }
    if (m.synthetic && m.artifacts.length > 0) errors.push('synthetic manifest lists artifacts');

    return errors.length === 0 ? { valid: true, errors, manifest: m } : { valid: false, errors };
}

/** Create the manifest file; a manifest is written once per run. */
export function writeManifestFile(filePath: string, m: Manifest): void {
    try {
        atomicCreateFileSync({ filePath, content: serializeManifest(m) });
    } catch (e: unknown) {
        if (errnoCode(e) === 'EEXIST') throw new ConsistencyError(`Manifest already written: ${filePath}`);
        throw e;
    }
}

export function readManifestFile(filePath: string): Manifest {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const check = validateManifest(parsed);
    if (!check.manifest) throw new ConsistencyError(`Invalid manifest ${filePath}: ${check.errors.join('; ')}`);
    return check.manifest;
}
