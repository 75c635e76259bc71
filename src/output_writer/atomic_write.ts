// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { createLogger } from "../logger";

const log = createLogger("output-writer");

export interface AtomicWriteParams {
    filePath: string;
    content: Buffer | string;
}

export function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
    return undefined;
}

function isFatalSyncError(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

/** fsync a file or directory. Only ENOSPC and EIO fail the write; anything else is logged. */
function syncPath(target: string, flags: string): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e: unknown) {
        const code = errnoCode(e);
        if (isFatalSyncError(code)) throw e;
        log.warn("fsync failed", { target, code: code ?? "UNKNOWN" });
    }
}

function removeTmp(tmp: string): void {
    try {
        fs.unlinkSync(tmp);
    } catch (e: unknown) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}

/** Write tmp in the same directory, fsync, then move into place. */
function stageTmp(filePath: string, content: Buffer | string): string {
    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    fs.mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o755 });
    fs.writeFileSync(tmp, content, { mode: 0o644 });
    syncPath(tmp, "r+");
    return tmp;
}

/** Replace `filePath` atomically (tmp + rename). Readers see the old or the new content, never a mix. */
export function atomicWriteFileSync(params: AtomicWriteParams): void {
    const { filePath, content } = params;
    let tmp = "";
    try {
        tmp = stageTmp(filePath, content);
        fs.renameSync(tmp, filePath);
        tmp = "";
        syncPath(path.dirname(filePath), "r");
    } catch (e) {
        if (tmp) removeTmp(tmp);
        throw e;
    }
}

/**
 * Create `filePath` atomically and exclusively (tmp + link). Throws an EEXIST
 * error when the file already exists; the existing content is left untouched.
 */
export function atomicCreateFileSync(params: AtomicWriteParams): void {
    const { filePath, content } = params;
    const tmp = stageTmp(filePath, content);
    try {
        fs.linkSync(tmp, filePath);
    } finally {
        removeTmp(tmp);
    }
    syncPath(path.dirname(filePath), "r");
}

export function atomicWriteJsonSync(params: Omit<AtomicWriteParams, "content"> & { data: unknown }): void {
    const { data, ...rest } = params;
    atomicWriteFileSync({ ...rest, content: JSON.stringify(data, null, 2) + "\n" });
}
