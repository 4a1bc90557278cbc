// src/build_cache/cache_stage.ts
//
// One cache slot, addressed by fingerprint. The write guard is the only way
// to fill a slot: the body writes into a private staging directory and the
// slot becomes visible by a single rename after the manifest is on disk.

import * as fs from "fs";
import * as path from "path";
import { Logger } from "../logger";
import { BuildCacheError } from "../structured_error";
import { atomicWriteJsonSync } from "./atomic_write";
import { CacheKeyManifest, verifyCacheManifest } from "./fingerprint";
import { LockHandle } from "./lock";

export const ENGINE_DIR_NAME = "engine";
export const MANIFEST_FILE_NAME = "manifest.json";

export interface SlotManifest extends CacheKeyManifest {
    status: "complete";
    created_at: string;
}

export type WriteGuardResult<T> =
    | { status: "cached"; path: string }
    | { status: "published"; path: string; value: T };

/** What a stage needs from the cache that owns it. */
export interface StageHost {
    readonly log: Logger;
    slotDir(fingerprint: string): string;
    createStagingDir(fingerprint: string): string;
    acquireLock(fingerprint: string): Promise<LockHandle>;
    releaseLock(handle: LockHandle): void;
    /** Verified manifest of a slot, or null; memoized by the host. */
    readVerifiedManifest(fingerprint: string): SlotManifest | null;
    markUsed(fingerprint: string): void;
    recordPublished(fingerprint: string): void;
    prune(): string[];
}

/** Parse a manifest file; null when missing, unreadable or not verifiable. */
export function readSlotManifest(manifestPath: string): SlotManifest | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    } catch {
        return null;
    }
    if (!verifyCacheManifest(parsed)) return null;
    if (!("status" in parsed) || parsed.status !== "complete") return null;
    const createdAt = "created_at" in parsed && typeof parsed.created_at === "string" ? parsed.created_at : "";
    return { key: parsed.key, inputs: parsed.inputs, status: "complete", created_at: createdAt };
}

export class CacheStage {
    constructor(
        readonly manifest: CacheKeyManifest,
        private readonly host: StageHost,
        readonly forceRebuild: boolean = false
    ) { }

    get fingerprint(): string {
        return this.manifest.key;
    }

    get slotDir(): string {
        return this.host.slotDir(this.fingerprint);
    }

    /** Where the engine lives once published. May not exist yet. */
    getPath(): string {
        return path.join(this.slotDir, ENGINE_DIR_NAME);
    }

    private isPublished(): boolean {
        const m = this.host.readVerifiedManifest(this.fingerprint);
        return m !== null && m.key === this.fingerprint && fs.existsSync(this.getPath());
    }

    isCached(): boolean {
        if (this.forceRebuild) return false;
        if (!this.isPublished()) return false;
        this.host.markUsed(this.fingerprint);
        return true;
    }

    /**
     * Run `body` under the slot lock and publish what it writes. If another
     * process published the slot while we waited for the lock, the body is
     * skipped. A throwing body leaves the slot untouched.
     */
    async writeGuard<T>(body: (engineDir: string) => T | Promise<T>): Promise<WriteGuardResult<T>> {
        const log = this.host.log;
        const lock = await this.host.acquireLock(this.fingerprint);
        try {
            if (!this.forceRebuild && this.isPublished()) {
                log.info("Cache slot was published concurrently; skipping build", { fingerprint: this.fingerprint });
                this.host.markUsed(this.fingerprint);
                return { status: "cached", path: this.getPath() };
            }

            const staging = this.host.createStagingDir(this.fingerprint);
            const stagedEngine = path.join(staging, ENGINE_DIR_NAME);
            let value: T;
            try {
                fs.mkdirSync(stagedEngine, { recursive: true });
                value = await body(stagedEngine);
                this.publish(staging);
            } catch (e) {
                fs.rmSync(staging, { recursive: true, force: true });
                throw e;
            }

            this.host.recordPublished(this.fingerprint);
            log.info("Published cache slot", { fingerprint: this.fingerprint, slot_dir: this.slotDir });
            this.host.prune();
            return { status: "published", path: this.getPath(), value };
        } finally {
            this.host.releaseLock(lock);
        }
    }

    private publish(staging: string): void {
        const slot = this.slotDir;
        const warnings: string[] = [];
        const manifest: SlotManifest = {
            ...this.manifest,
            status: "complete",
            created_at: new Date().toISOString(),
        };
        try {
            atomicWriteJsonSync({
                filePath: path.join(staging, MANIFEST_FILE_NAME),
                data: manifest,
                mode: 0o644,
                fsyncMode: "BEST_EFFORT",
                warnings,
            });
            // Leftover of an interrupted publish, or the slot a forced rebuild replaces.
            fs.rmSync(slot, { recursive: true, force: true });
            fs.mkdirSync(path.dirname(slot), { recursive: true });
            fs.renameSync(staging, slot);
        } catch (e) {
            throw new BuildCacheError(
                `Failed to publish cache slot ${slot}`,
                "CACHE_IO_ERROR",
                { slot_dir: slot, fingerprint: this.fingerprint },
                e
            );
        }
        for (const w of warnings) this.host.log.warn(w, { slot_dir: slot });
    }
}
