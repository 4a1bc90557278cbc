/**
 * Build Cache — content-addressed store of built engines.
 *
 * Layout under the cache root:
 *
 *   engines/<fingerprint>/engine/        the artifact
 *   engines/<fingerprint>/manifest.json  key inputs, status "complete"
 *   _staging/<fingerprint>.<uuid>/       in-flight writes
 *   _locks/<fingerprint>.lock            exclusive slot lock
 *   cache_index.sqlite                   record index
 *
 * Any number of processes may share one root. A slot is written by at most
 * one of them at a time (the slot lock) and becomes visible atomically.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { BUILD_CACHE_DEFAULTS, BuildCacheConfig, GB, TIMEOUTS } from '../config';
import { getDirectorySizeBytes } from '../fs_utils';
import { Logger, createLogger } from '../logger';
import { InvalidOptionError } from '../structured_error';
import { CacheIndex, CacheRecord } from './cache_index';
import { CacheStage, MANIFEST_FILE_NAME, SlotManifest, StageHost, readSlotManifest } from './cache_stage';
import { CacheKeyManifest, isCacheKey } from './fingerprint';
import { LockHandle, acquireSlotLock, releaseSlotLock, tryAcquireSlotLock } from './lock';

export interface BuildCacheOptions {
    lockTimeoutMs?: number;
    staleLockMs?: number;
    log?: Logger;
    /** Free bytes on the cache filesystem; defaults to statfs on the root. */
    filesystemFreeBytes?: (root: string) => number;
}

export interface StageRequest {
    key: string;
    manifest: CacheKeyManifest;
    forceRebuild?: boolean;
}

function statfsFreeBytes(root: string): number {
    const s = fs.statfsSync(root);
    return s.bavail * s.bsize;
}

export class BuildCache implements StageHost {
    readonly root: string;
    readonly log: Logger;
    private readonly enginesDir: string;
    private readonly stagingDir: string;
    private readonly locksDir: string;
    private readonly index: CacheIndex;
    private readonly lockTimeoutMs: number;
    private readonly staleLockMs: number;
    private readonly filesystemFreeBytes: (root: string) => number;

    // verified manifests, keyed by fingerprint + manifest mtime
    private readonly manifests = new LRUCache<string, SlotManifest>({ max: 256 });

    constructor(readonly config: BuildCacheConfig, options: BuildCacheOptions = {}) {
        this.root = path.resolve(config.cache_root);
        this.log = options.log ?? createLogger('build-cache');
        this.lockTimeoutMs = options.lockTimeoutMs ?? TIMEOUTS.CACHE_LOCK_MS;
        this.staleLockMs = options.staleLockMs ?? TIMEOUTS.CACHE_LOCK_STALE_MS;
        this.filesystemFreeBytes = options.filesystemFreeBytes ?? statfsFreeBytes;

        this.enginesDir = path.join(this.root, 'engines');
        this.stagingDir = path.join(this.root, '_staging');
        this.locksDir = path.join(this.root, '_locks');
        for (const dir of [this.enginesDir, this.stagingDir, this.locksDir]) {
            fs.mkdirSync(dir, { recursive: true, mode: 0o755 });
        }
        this.index = new CacheIndex(path.join(this.root, BUILD_CACHE_DEFAULTS.INDEX_FILE_NAME));
    }

    getStage(req: StageRequest): CacheStage {
        if (!isCacheKey(req.key) || req.manifest.key !== req.key) {
            throw new InvalidOptionError(`Invalid cache key ${req.key}`, { key: req.key });
        }
        return new CacheStage(req.manifest, this, req.forceRebuild ?? false);
    }

    /* ---------------------------------------------------------------------- */
    /* Paths and locks                                                        */
    /* ---------------------------------------------------------------------- */

    slotDir(fingerprint: string): string {
        return path.join(this.enginesDir, fingerprint);
    }

    lockPath(fingerprint: string): string {
        return path.join(this.locksDir, `${fingerprint}.lock`);
    }

    createStagingDir(fingerprint: string): string {
        const dir = path.join(this.stagingDir, `${fingerprint}.${crypto.randomUUID()}`);
        fs.mkdirSync(dir, { recursive: true });
        return dir;
    }

    acquireLock(fingerprint: string): Promise<LockHandle> {
        return acquireSlotLock({
            lockPath: this.lockPath(fingerprint),
            timeoutMs: this.lockTimeoutMs,
            staleTtlMs: this.staleLockMs,
            identity: { fingerprint },
            log: this.log,
        });
    }

    releaseLock(handle: LockHandle): void {
        releaseSlotLock(handle, this.log);
    }

    private tryLock(fingerprint: string): LockHandle | null {
        return tryAcquireSlotLock({
            lockPath: this.lockPath(fingerprint),
            staleTtlMs: this.staleLockMs,
            identity: { fingerprint },
            log: this.log,
        });
    }

    /* ---------------------------------------------------------------------- */
    /* Records                                                                */
    /* ---------------------------------------------------------------------- */

    readVerifiedManifest(fingerprint: string): SlotManifest | null {
        const manifestPath = path.join(this.slotDir(fingerprint), MANIFEST_FILE_NAME);
        const stat = fs.statSync(manifestPath, { throwIfNoEntry: false });
        if (!stat) return null;

        const memoKey = `${fingerprint}:${stat.mtimeMs}`;
        const memo = this.manifests.get(memoKey);
        if (memo) return memo;

        const manifest = readSlotManifest(manifestPath);
        if (manifest && manifest.key === fingerprint) {
            this.manifests.set(memoKey, manifest);
            return manifest;
        }
        return null;
    }

    markUsed(fingerprint: string): void {
        if (!this.index.touch(fingerprint)) {
            // Slot on disk without a record (index recreated): adopt it.
            this.recordPublished(fingerprint);
        }
    }

    recordPublished(fingerprint: string): void {
        const slot = this.slotDir(fingerprint);
        this.index.upsert(fingerprint, slot, getDirectorySizeBytes(slot));
    }

    records(): CacheRecord[] {
        return this.index.list();
    }

    usedBytes(): number {
        return this.index.totalBytes();
    }

    /* ---------------------------------------------------------------------- */
    /* Storage                                                                */
    /* ---------------------------------------------------------------------- */

    /** Room left for new slots: the smaller of filesystem free space and the configured budget. */
    freeStorageInGb(): number {
        const fsFree = this.filesystemFreeBytes(this.root) / GB;
        const budget = this.config.max_cache_storage_gb - this.usedBytes() / GB;
        return Math.max(0, Math.min(fsFree, budget));
    }

    /**
     * Forget records whose slot vanished, then evict least recently used
     * slots until both the record and storage limits hold. Slots whose lock
     * is held are skipped. Returns the evicted fingerprints.
     */
    prune(): string[] {
        for (const rec of this.index.list()) {
            if (!fs.existsSync(rec.slot_dir)) this.index.remove(rec.fingerprint);
        }

        const records = this.index.list();
        const maxBytes = this.config.max_cache_storage_gb * GB;
        let count = records.length;
        let total = records.reduce((sum, r) => sum + r.size_bytes, 0);
        const evicted: string[] = [];

        for (const rec of records) {
            if (count <= this.config.max_records && total <= maxBytes) break;

            const lock = this.tryLock(rec.fingerprint);
            if (!lock) {
                this.log.debug('Skipping locked slot during prune', { fingerprint: rec.fingerprint });
                continue;
            }
            try {
                fs.rmSync(rec.slot_dir, { recursive: true, force: true });
                this.index.remove(rec.fingerprint);
            } finally {
                this.releaseLock(lock);
            }
            count -= 1;
            total -= rec.size_bytes;
            evicted.push(rec.fingerprint);
        }

        if (evicted.length > 0) {
            this.log.info(`Pruned ${evicted.length} cache slot(s)`, { remaining: count });
        }
        return evicted;
    }

    /**
     * Delete staging directories at least `ttlMs` old whose slot lock is free.
     * Returns the names of the removed directories.
     */
    cleanupStaging(ttlMs: number = TIMEOUTS.STAGING_TTL_MS): string[] {
        const removed: string[] = [];
        const now = Date.now();

        for (const entry of fs.readdirSync(this.stagingDir, { withFileTypes: true })) {
            if (!entry.isDirectory()) continue;
            const dir = path.join(this.stagingDir, entry.name);
            const fingerprint = entry.name.split('.')[0];
            const stat = fs.statSync(dir, { throwIfNoEntry: false });
            if (!stat || now - stat.mtimeMs < ttlMs) continue;

            const lock = isCacheKey(fingerprint) ? this.tryLock(fingerprint) : null;
            if (isCacheKey(fingerprint) && !lock) continue;
            try {
                fs.rmSync(dir, { recursive: true, force: true });
                removed.push(entry.name);
            } finally {
                if (lock) this.releaseLock(lock);
            }
        }

        if (removed.length > 0) {
            this.log.info(`Removed ${removed.length} stale staging dir(s)`);
        }
        return removed;
    }

    close(): void {
        this.index.close();
    }
}
