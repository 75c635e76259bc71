/**
 * RuleTable: (pipeline, phase, category) -> deny/except rows.
 *
 * File categories match targets (workspace-relative POSIX paths) against
 * globs. process_exec matches command words: a pattern `git push` denies any
 * command segment whose leading words are `git push`, after env assignments.
 */

import { matchesAny, matchesGlob } from './glob';
import type { PhaseRule, Pipelines } from './pipeline_config';
import type { OperationCategory } from './kernel_types';

export interface RuleMatch {
    rule: PhaseRule;
    rule_id: string;
    target: string;
}

export interface MatchInput {
    targets: readonly string[];
    command?: string;
}

interface Row {
    id: string;
    rule: PhaseRule;
}

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

function keyOf(pipeline: string, phase: string, category: OperationCategory): string {
    return `${pipeline}\u0000${phase}\u0000${category}`;
}

/** Split a shell command into segments of words on `;`, `&&`, `||`, `|` and newlines. */
export function commandSegments(command: string): string[][] {
    return command
        .split(/&&|\|\||[;|\n]/)
        .map((seg) =>
            seg
                .trim()
                .split(/\s+/)
                .filter((w) => w.length > 0)
        )
        .map((words) => {
            let i = 0;
            while (i < words.length && ENV_ASSIGNMENT.test(words[i])) i++;
            return words.slice(i);
        })
        .filter((words) => words.length > 0);
}

function segmentMatches(words: readonly string[], pattern: string): boolean {
    const want = pattern.trim().split(/\s+/);
    if (want.length === 0 || want.length > words.length) return false;
    return want.every((w, i) => matchesGlob(words[i], w));
}

export function commandMatches(command: string, patterns: readonly string[]): boolean {
    const segments = commandSegments(command);
    return segments.some((words) => patterns.some((p) => segmentMatches(words, p)));
}

export class RuleTable {
    private readonly rows = new Map<string, Row[]>();

    static fromPipelines(pipelines: Pipelines): RuleTable {
        const table = new RuleTable();
        for (const kind of pipelines.kinds()) {
            for (const [phase, cfg] of Object.entries(pipelines.get(kind).phases)) {
                for (const rule of cfg.rules ?? []) table.add(kind, phase, rule);
            }
        }
        return table;
    }

    add(pipeline: string, phase: string, rule: PhaseRule): void {
        const key = keyOf(pipeline, phase, rule.category);
        const list = this.rows.get(key) ?? [];
        list.push({ id: `${pipeline}/${phase}/${rule.category}#${list.length}`, rule });
        this.rows.set(key, list);
    }

    rulesFor(pipeline: string, phase: string, category: OperationCategory): PhaseRule[] {
        return (this.rows.get(keyOf(pipeline, phase, category)) ?? []).map((r) => r.rule);
    }

    /** First rule that denies the operation, or null when nothing matches. */
    match(pipeline: string, phase: string, category: OperationCategory, op: MatchInput): RuleMatch | null {
        const rows = this.rows.get(keyOf(pipeline, phase, category)) ?? [];
        for (const { id, rule } of rows) {
            const except = rule.except ?? [];
            if (category === 'process_exec') {
                const command = op.command ?? op.targets.join(' ');
                if (commandMatches(command, rule.deny) && !commandMatches(command, except)) {
                    return { rule, rule_id: id, target: command };
                }
                continue;
            }
            for (const target of op.targets) {
                if (matchesAny(target, rule.deny) && !matchesAny(target, except)) {
                    return { rule, rule_id: id, target };
                }
            }
        }
        return null;
    }
}
