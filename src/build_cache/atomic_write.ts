// src/build_cache/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "../fs_utils";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function fsyncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

/** Write to a temp file beside the target, fsync, rename over the target, fsync the directory. */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        fsyncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        try {
            fs.rmSync(tmp, { force: true });
        } catch (cleanupErr) {
            warnings.push(`TMP_CLEANUP_FAILED(${errnoCode(cleanupErr) || "UNKNOWN"}) on ${tmp}`);
        }
        throw e;
    }
}

export function atomicWriteJsonSync(params: {
    filePath: string;
    data: unknown;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: JSON.stringify(params.data, null, 2),
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}
