// src/output_writer/stable_stringify.ts

function canonical(value: unknown): unknown {
    if (value === null) return null;
    const t = typeof value;

    if (t === "number") {
        if (!Number.isFinite(value)) throw new Error("UNSUPPORTED_JSON_TYPE");
        return value;
    }
    if (t === "boolean" || t === "string") return value;

    if (Array.isArray(value)) return value.map(canonical);

    if (typeof value === "object") {
        const out: Record<string, unknown> = {};
        const entries = Object.entries(value).filter(([, v]) => v !== undefined);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)); // UTF-16 code unit order
        for (const [k, v] of entries) out[k] = canonical(v);
        return out;
    }

    // function, symbol, bigint, top-level undefined
    throw new Error("UNSUPPORTED_JSON_TYPE");
}

/**
 * JSON with object keys in code-unit order at every depth. Undefined-valued
 * keys are omitted, as JSON.stringify does.
 */
export function stableStringify(value: unknown, indent = 0): string {
    return JSON.stringify(canonical(value), null, indent);
}
