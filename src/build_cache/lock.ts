// src/build_cache/lock.ts
//
// Exclusive per-slot lock: a lock file created with O_CREAT | O_EXCL. The file
// holds the owner's pid and start time. A lock whose owner process is gone can
// be broken; a lock with no readable pid is broken once older than the stale
// TTL. A live owner keeps its lock however long it builds.

import * as fs from "fs";
import * as path from "path";
import { TIMEOUTS } from "../config";
import { errnoCode } from "../fs_utils";
import { Logger, createLogger } from "../logger";
import { BuildCacheError } from "../structured_error";

const defaultLog = createLogger("cache-lock");

export interface LockHandle {
    fd: number;
    lockPath: string;
    /** `started_ms` written into the lock file; identifies this acquisition. */
    startedMs: number;
}

export interface LockParams {
    lockPath: string;
    /** Extra fields written into the lock file for debugging. */
    identity?: Record<string, unknown>;
    staleTtlMs?: number;
    log?: Logger;
}

function sleep(ms: number) {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    const v = 50 * Math.pow(2, attempt);
    return Math.min(v, 1000);
}

function pidAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: exists, owned by someone else
        return errnoCode(e) === "EPERM";
    }
}

function readLockData(lockPath: string): { pid: number | null; startedMs: number } | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return null;
        // Half-written or corrupt lock file: only its age can tell.
        const stat = fs.statSync(lockPath, { throwIfNoEntry: false });
        return stat ? { pid: null, startedMs: stat.mtimeMs } : null;
    }
    if (typeof parsed !== "object" || parsed === null) return { pid: null, startedMs: 0 };
    const pid = "pid" in parsed && typeof parsed.pid === "number" ? parsed.pid : null;
    const startedMs = "started_ms" in parsed && typeof parsed.started_ms === "number" ? parsed.started_ms : 0;
    return { pid, startedMs };
}

/** Why an existing lock is stale, or null if it is live. */
function staleReason(lockPath: string, staleTtlMs: number): string | null {
    const data = readLockData(lockPath);
    if (data === null) return "GONE";
    if (data.pid !== null) return pidAlive(data.pid) ? null : `PID_DEAD pid=${data.pid}`;
    const age = Date.now() - data.startedMs;
    if (age > staleTtlMs) return `AGE age=${age}ms`;
    return null;
}

/**
 * One acquisition attempt. Breaks a stale lock and retries once;
 * returns null while a live owner holds it.
 */
export function tryAcquireSlotLock(params: LockParams): LockHandle | null {
    const { lockPath } = params;
    const log = params.log ?? defaultLog;
    const staleTtlMs = params.staleTtlMs ?? TIMEOUTS.CACHE_LOCK_STALE_MS;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    for (let attempt = 0; attempt < 2; attempt++) {
        let fd: number;
        try {
            fd = fs.openSync(lockPath, "wx");
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") {
                throw new BuildCacheError(`Cannot create lock ${lockPath}`, "CACHE_IO_ERROR", { lock_path: lockPath }, e);
            }
            const reason = staleReason(lockPath, staleTtlMs);
            if (reason === null) return null;
            if (reason !== "GONE") {
                log.warn(`Breaking stale cache lock (${reason})`, { lock_path: lockPath });
                fs.rmSync(lockPath, { force: true });
            }
            continue;
        }

        const startedMs = Date.now();
        const lockData = {
            ...params.identity,
            pid: process.pid,
            started_utc: new Date(startedMs).toISOString(),
            started_ms: startedMs,
        };
        fs.writeSync(fd, JSON.stringify(lockData, null, 2));
        return { fd, lockPath, startedMs };
    }
    return null;
}

/** Waits with exponential backoff until the lock is taken or `timeoutMs` passes. */
export async function acquireSlotLock(params: LockParams & { timeoutMs?: number }): Promise<LockHandle> {
    const log = params.log ?? defaultLog;
    const timeoutMs = params.timeoutMs ?? TIMEOUTS.CACHE_LOCK_MS;
    const started = Date.now();
    let attempt = 0;

    while (true) {
        const handle = tryAcquireSlotLock(params);
        if (handle) return handle;

        const elapsed = Date.now() - started;
        if (elapsed >= timeoutMs) {
            throw new BuildCacheError(
                `Cache slot lock ${params.lockPath} still held after ${elapsed}ms`,
                "CACHE_LOCK_HELD",
                { lock_path: params.lockPath, timeout_ms: timeoutMs }
            );
        }

        const wait = backoff(attempt++);
        log.debug(`LOCK_RETRY after ${wait}ms`, { lock_path: params.lockPath });
        await sleep(wait);
    }
}

export function releaseSlotLock(handle: LockHandle, log: Logger = defaultLog): void {
    try {
        fs.closeSync(handle.fd);
    } catch (e) {
        log.warn(`Failed to close lock fd: ${errnoCode(e) ?? String(e)}`, { lock_path: handle.lockPath });
    }
    // Only the file this acquisition wrote is removed; a lock broken and
    // retaken by another owner stays.
    const data = readLockData(handle.lockPath);
    if (data === null) return;
    if (data.pid !== process.pid || data.startedMs !== handle.startedMs) {
        log.warn("Cache lock is no longer ours; leaving it", { lock_path: handle.lockPath, owner_pid: data.pid });
        return;
    }
    fs.rmSync(handle.lockPath, { force: true });
}

/** Whether a live owner holds the lock right now. */
export function isSlotLocked(lockPath: string, staleTtlMs: number = TIMEOUTS.CACHE_LOCK_STALE_MS): boolean {
    if (!fs.existsSync(lockPath)) return false;
    const reason = staleReason(lockPath, staleTtlMs);
    return reason === null;
}
