/**
 * Cached Model Loader — top-level build entry.
 *
 * Engine inputs are returned as is. Otherwise the engine is looked up in the
 * build cache by fingerprint, and built (in process or across worker ranks)
 * on a miss. Cached builds go through the slot write guard; when the cache
 * root lacks room the build falls back to the workspace for this attempt.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BuildArgs } from './build_args';
import { BuildCache, BuildCacheOptions, CacheStage, WriteGuardResult, computeCacheFingerprint } from './build_cache';
import { BuildStats, BuildStepInfo } from './build_pipeline';
import { BuildCacheConfig, getBuildCacheConfigFromEnv } from './config';
import { Logger, createLogger, setCorrelation } from './logger';
import { LocalIdentitySource, getDirectorySizeInGb } from './model_format';
import { ModelLoader, NodeBuildPayload, parseBuildFailureDetails } from './model_loader';
import { ModelBackend, ModelHub, ModelIdentitySource } from './model_types';
import {
    BuildCacheError,
    CommonRecoveryOptions,
    InvalidOptionError,
    StructuredError,
    WorkerSessionError,
    createStructuredError,
    describeError,
} from './structured_error';
import { NodeTask, ThreadWorkerSession, WorkerSession } from './worker_session';

const defaultLog = createLogger('cached-loader');

export const STORAGE_FALLBACK_INFO = 'The cache root directory is too small.';
export const LOCK_FALLBACK_INFO = 'The cache slot is being built by another process.';

export interface CachedModelLoaderDeps {
    backend: ModelBackend;
    hub?: ModelHub;
    /** Pretrained descriptor for the fingerprint; LocalIdentitySource by default. */
    identity?: ModelIdentitySource;
    /** Used for multi-rank builds; a ThreadWorkerSession of world_size by default. */
    session?: WorkerSession;
    /** Per-rank build body for multi-rank builds. */
    nodeTask?: NodeTask<NodeBuildPayload, BuildStepInfo[]>;
    /** Scratch directory; a fresh temp dir (removed on dispose) when omitted. */
    workspace?: string;
    cacheOptions?: BuildCacheOptions;
    log?: Logger;
}

export class CachedModelLoader {
    private readonly log: Logger;
    private readonly identity: ModelIdentitySource;
    private workspace: string | null;
    private readonly ownsWorkspace: boolean;
    private engineDir: string | null = null;
    private readonly _diagnostics: StructuredError[] = [];

    constructor(
        private readonly args: BuildArgs,
        readonly stats: BuildStats,
        private readonly deps: CachedModelLoaderDeps
    ) {
        this.log = deps.log ?? defaultLog;
        this.identity = deps.identity ?? new LocalIdentitySource();
        this.workspace = deps.workspace ?? null;
        this.ownsWorkspace = deps.workspace === undefined;
    }

    /** Warnings raised while loading, such as the storage fallback. */
    get diagnostics(): StructuredError[] {
        return [...this._diagnostics];
    }

    get buildCacheEnabled(): boolean {
        const requested = this.args.enable_build_cache !== false || getBuildCacheConfigFromEnv().enabled;
        return requested && this.args.model_format === 'SOURCE_MODEL' && !this.args.parallel.auto_parallel;
    }

    private get cacheConfig(): BuildCacheConfig {
        return this.args.buildCacheConfig ?? getBuildCacheConfigFromEnv().config;
    }

    getEngineDir(): string {
        if (this.engineDir === null) throw new Error('The engine is not loaded yet.');
        return this.engineDir;
    }

    async load(): Promise<string> {
        setCorrelation({ buildId: this.stats.build_id });

        if (this.args.model_format === 'ENGINE') {
            this.engineDir = this.args.modelDir;
            this.stats.engine_dir = this.engineDir;
            return this.engineDir;
        }

        if (!this.buildCacheEnabled) {
            return this.buildUncached();
        }

        const cache = new BuildCache(this.cacheConfig, { log: this.log, ...this.deps.cacheOptions });
        try {
            cache.cleanupStaging();
            return await this.loadWithCache(cache);
        } finally {
            cache.close();
        }
    }

    dispose(): void {
        if (this.ownsWorkspace && this.workspace !== null) {
            fs.rmSync(this.workspace, { recursive: true, force: true });
            this.workspace = null;
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Cache                                                                  */
    /* ---------------------------------------------------------------------- */

    private async loadWithCache(cache: BuildCache): Promise<string> {
        const stage = await this.getCacheStage(cache);

        if (stage.isCached()) {
            this.log.info('Build cache hit', { fingerprint: stage.fingerprint });
            this.stats.cache_hit = true;
            return this.finish(stage.getPath());
        }

        if (!this.hasStorageFor(cache)) {
            this.stats.cache_info = STORAGE_FALLBACK_INFO;
            this._diagnostics.push(createStructuredError(
                'STORAGE_INSUFFICIENT',
                STORAGE_FALLBACK_INFO,
                { cache_root: cache.root },
                [CommonRecoveryOptions.freeDiskSpace(cache.root)]
            ));
            this.log.warn(`${STORAGE_FALLBACK_INFO} Building without the cache.`, { cache_root: cache.root });
            return this.buildUncached();
        }

        let result: WriteGuardResult<void>;
        try {
            result = await stage.writeGuard((stagedDir) => this.build(stagedDir));
        } catch (e) {
            if (!(e instanceof BuildCacheError) || e.code !== 'CACHE_LOCK_HELD') throw e;
            this.stats.cache_info = LOCK_FALLBACK_INFO;
            this._diagnostics.push(e.toStructured());
            this.log.warn(`${LOCK_FALLBACK_INFO} Building without the cache.`, { fingerprint: stage.fingerprint });
            return this.buildUncached();
        }
        if (result.status === 'cached') {
            this.stats.cache_hit = true;
        } else {
            this.stats.cache_populated = true;
        }
        return this.finish(result.path);
    }

    private async getCacheStage(cache: BuildCache): Promise<CacheStage> {
        const args = this.args;
        const modelDir = args.isLocalModel ? args.modelDir : await this.downloadPretrainedConfig();
        const { devices: _devices, ...parallel } = args.parallel.toData();

        const pretrained = this.identity.describe({
            model_dir: modelDir,
            dtype: args.dtype,
            world_size: parallel.world_size,
            tp_size: parallel.tp_size,
            pp_size: parallel.pp_size,
            quant_config: args.quant_config,
        });

        const manifest = computeCacheFingerprint({
            build_config: args.build_config,
            parallel_config: parallel,
            quant_config: args.quant_config,
            pretrained_config: pretrained,
        });
        return cache.getStage({ key: manifest.key, manifest });
    }

    private downloadPretrainedConfig(): Promise<string> {
        const hub = this.deps.hub;
        if (!hub) {
            throw new InvalidOptionError(`A model hub is required to describe ${this.args.model}`);
        }
        return hub.downloadPretrainedConfig(this.args.model, this.args.revision);
    }

    /** Hub models are not measured before download; they are assumed to fit. */
    private hasStorageFor(cache: BuildCache): boolean {
        if (!this.args.isLocalModel) return true;
        try {
            const required = getDirectorySizeInGb(this.args.modelDir);
            const free = cache.freeStorageInGb();
            this.log.debug('Build cache storage check', { required_gb: required, free_gb: free });
            return required <= free;
        } catch (e) {
            this.log.warn(`Build cache storage check failed: ${describeError(e)}`);
            return false;
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Build                                                                  */
    /* ---------------------------------------------------------------------- */

    private ensureWorkspace(): string {
        if (this.workspace === null) {
            this.workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'enginekit-'));
        }
        return this.workspace;
    }

    private async buildUncached(): Promise<string> {
        const engineDir = path.join(this.ensureWorkspace(), 'engine');
        await this.build(engineDir);
        return this.finish(engineDir);
    }

    private finish(engineDir: string): string {
        this.engineDir = engineDir;
        this.stats.engine_dir = engineDir;
        return engineDir;
    }

    private async build(engineDir: string): Promise<void> {
        const parallel = this.args.parallel;
        if (parallel.isMultiGpu && !parallel.auto_parallel) {
            await this.buildOnNodes(engineDir);
            return;
        }

        const loader = new ModelLoader(this.args, this.deps.backend, {
            workspace: this.ensureWorkspace(),
            stats: this.stats,
            hub: this.deps.hub,
            log: this.log,
        });
        try {
            await loader.load(engineDir);
        } finally {
            loader.dispose();
        }
    }

    private async buildOnNodes(engineDir: string): Promise<void> {
        const task = this.deps.nodeTask;
        if (!task) {
            throw new InvalidOptionError('A node task is required for multi-rank builds');
        }
        const worldSize = this.args.parallel.world_size;
        const session = this.deps.session ?? new ThreadWorkerSession(worldSize, { log: this.log });
        if (session.worldSize !== worldSize) {
            throw new InvalidOptionError(
                `Worker session has ${session.worldSize} ranks, but the build needs ${worldSize}`
            );
        }

        const payload: NodeBuildPayload = {
            args: this.args.toNodePayload(),
            workspace: this.ensureWorkspace(),
            engine_dir: engineDir,
        };
        this.log.info(`Building on ${worldSize} ranks`);
        let results: BuildStepInfo[][];
        try {
            results = await session.submitSync(task, payload);
        } catch (e) {
            // Keep what the failing rank had finished.
            const failure = e instanceof WorkerSessionError ? parseBuildFailureDetails(e.details) : null;
            if (failure) {
                this.stats.build_steps_info = failure.build_steps_info;
                this.stats.failed_step = failure.failed_step;
            }
            throw e;
        }
        this.stats.build_steps_info = results[0];
        this.stats.model_from_hub = this.args.isHubModel;
    }
}
