/**
 * Maps an agent tool call (tool name + JSON input) onto a privileged
 * operation category, and back.
 */

import { isRecord } from './schema_validator';
import { ConfigurationError } from './structured_error';
import type { CallContext, OperationCategory } from './kernel_types';

export interface ClassifiedOperation {
    category: OperationCategory;
    targets: string[];
    command?: string;
}

export interface ToolCall {
    tool_name: string;
    tool_input: Record<string, unknown>;
}

const WRITE_TOOLS: Record<string, string> = {
    Write: 'file_path',
    Edit: 'file_path',
    MultiEdit: 'file_path',
    NotebookEdit: 'notebook_path',
};

const REDIRECT = /(?:^|[^<>&0-9])(?:[12]?>>?|&>)\s*([^\s;&|<>()]+)/g;
const TEE = /(?:^|[\s;&|])tee\s+((?:-[a-z]+\s+)*)([^\s;&|<>()]+)/g;

function requireString(input: Record<string, unknown>, field: string, tool: string): string {
    const v = input[field];
    if (typeof v !== 'string' || v.length === 0) {
        throw new ConfigurationError(`${tool} call is missing ${field}`, { tool });
    }
    return v;
}

/** Files a shell command writes through `>`, `>>`, `&>` or `tee`. */
export function shellWriteTargets(command: string): string[] {
    const out: string[] = [];
    for (const m of command.matchAll(REDIRECT)) {
        const target = m[1];
        if (target === '/dev/null' || target.startsWith('&')) continue;
        out.push(target);
    }
    for (const m of command.matchAll(TEE)) {
        if (m[2] !== '/dev/null') out.push(m[2]);
    }
    return out;
}

/**
 * Category and targets of a tool call, or null for tools that touch nothing
 * privileged. A known tool with malformed input is a ConfigurationError.
 */
export function classifyToolCall(toolName: string, input: unknown): ClassifiedOperation | null {
    const fields = isRecord(input) ? input : {};

    if (toolName === 'Read') {
        return { category: 'file_read', targets: [requireString(fields, 'file_path', toolName)] };
    }

    const writeField = Object.hasOwn(WRITE_TOOLS, toolName) ? WRITE_TOOLS[toolName] : undefined;
    if (writeField) {
        return { category: 'file_write', targets: [requireString(fields, writeField, toolName)] };
    }

    if (toolName === 'Bash') {
        const command = requireString(fields, 'command', toolName);
        const targets = shellWriteTargets(command);
        if (targets.length > 0) return { category: 'file_write', targets, command };
        return { category: 'process_exec', targets: [], command };
    }

    return null;
}

/** A tool call equivalent to `ctx`, for handing the operation to an external hook. */
export function toToolCall(ctx: CallContext): ToolCall {
    if (ctx.category === 'file_read') {
        return { tool_name: 'Read', tool_input: { file_path: ctx.targets[0] ?? '' } };
    }
    if (ctx.command !== undefined) {
        return { tool_name: 'Bash', tool_input: { command: ctx.command } };
    }
    return { tool_name: 'Write', tool_input: { file_path: ctx.targets[0] ?? '' } };
}
