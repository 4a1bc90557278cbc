/**
 * Build Arguments — the option bag a build starts from.
 *
 * setup() settles everything that depends on the environment (local vs hub
 * model, model format, hardware) and then arbitrates the interacting plugin,
 * KV-cache and build options. A set-up BuildArgs travels to worker ranks as a
 * plain payload via toNodePayload()/fromNodePayload().
 */

import * as fs from 'fs';
import * as path from 'path';
import { BUILD_DEFAULTS, BuildCacheConfig, defaultBuildCacheConfig, getBuildCacheConfigFromEnv } from './config';
import { ConfigArbitrator } from './config_arbiter/arbitrator';
import { DroppedClaim, ResolvedConfig } from './config_arbiter/types';
import {
    BuildConfig,
    CalibConfig,
    KvCacheConfig,
    QuantConfig,
    buildConfigWithoutPlugins,
    defaultBuildConfig,
    defaultCalibConfig,
    defaultKvCacheConfig,
    defaultQuantConfig,
} from './engine_config';
import { Logger, createLogger } from './logger';
import { loadCheckpointConfig, loadEngineConfig, inferModelFormat, PretrainedSection } from './model_format';
import { ConvertCheckpointOptions, ModelFormat } from './model_types';
import { InvalidOptionError } from './structured_error';

const defaultLog = createLogger('build-args');

/* -------------------------------------------------------------------------- */
/* Hardware                                                                   */
/* -------------------------------------------------------------------------- */

/** Compute capability of the device the engine is built for. */
export type HardwareInfo = { sm_major: number; sm_minor: number };

export function isPostAmpere(hw: HardwareInfo): boolean {
    return hw.sm_major >= 8;
}

/* -------------------------------------------------------------------------- */
/* Parallel config                                                            */
/* -------------------------------------------------------------------------- */

export type ParallelConfigData = {
    tp_size: number;
    pp_size: number;
    auto_parallel: boolean;
    world_size: number;
    devices: number[] | null;
};

export class ParallelConfig {
    private _worldSize = 1;
    private _devices: number[] | null = null;

    constructor(
        public readonly tp_size: number = 1,
        public readonly pp_size: number = 1,
        public readonly auto_parallel: boolean = false
    ) {
        for (const [name, v] of [['tp_size', tp_size], ['pp_size', pp_size]] as const) {
            if (!Number.isInteger(v) || v < 1) {
                throw new InvalidOptionError(`${name} must be a positive integer, got ${v}`, { option: name });
            }
        }
    }

    get world_size(): number {
        if (this.auto_parallel) {
            if (this.tp_size > 1 || this.pp_size > 1) {
                throw new InvalidOptionError('manually TP and PP are not supported in auto parallel mode.');
            }
            return this._worldSize;
        }
        return this.tp_size * this.pp_size;
    }

    /** Only auto-parallel mode takes an explicit world size; otherwise it must equal tp_size * pp_size. */
    set world_size(worldSize: number) {
        if (this.auto_parallel) {
            this._worldSize = worldSize;
        } else if (worldSize !== this.tp_size * this.pp_size) {
            throw new InvalidOptionError(
                `world_size ${worldSize} should be equal to tp_size * pp_size ${this.tp_size * this.pp_size} ` +
                'in non-auto_parallel mode.',
                { option: 'world_size' }
            );
        }
    }

    get devices(): number[] {
        if (this._devices === null) return Array.from({ length: this.world_size }, (_, i) => i);
        return [...this._devices];
    }

    set devices(devices: number[]) {
        if (devices.length !== this.world_size) {
            throw new InvalidOptionError(
                `devices ${JSON.stringify(devices)} should have the same length as world_size ${this.world_size}`,
                { option: 'devices' }
            );
        }
        this._devices = [...devices];
    }

    get isMultiGpu(): boolean {
        return this.world_size > 1;
    }

    toData(): ParallelConfigData {
        return {
            tp_size: this.tp_size,
            pp_size: this.pp_size,
            auto_parallel: this.auto_parallel,
            world_size: this.world_size,
            devices: this._devices ? [...this._devices] : null,
        };
    }

    static fromData(data: ParallelConfigData): ParallelConfig {
        const p = new ParallelConfig(data.tp_size, data.pp_size, data.auto_parallel);
        if (data.auto_parallel) p.world_size = data.world_size;
        if (data.devices) p.devices = data.devices;
        return p;
    }
}

/* -------------------------------------------------------------------------- */
/* Arguments                                                                  */
/* -------------------------------------------------------------------------- */

export type EmbeddingParallelMode = 'NONE' | 'SHARDING_ALONG_VOCAB' | 'SHARDING_ALONG_HIDDEN';

export type LoadFormat = 'auto' | 'dummy';

export interface BuildArgsInit {
    /** Local model directory or a hub model id. A local directory wins when both could apply. */
    model: string;
    revision?: string | null;
    dtype?: string;
    load_format?: LoadFormat;
    trust_remote_code?: boolean;

    tensor_parallel_size?: number;
    pipeline_parallel_size?: number;
    auto_parallel?: boolean;
    world_size?: number;
    devices?: number[];

    build_config?: BuildConfig | null;
    quant_config?: QuantConfig;
    calib_config?: CalibConfig;
    kv_cache_config?: KvCacheConfig;

    enable_lora?: boolean;
    max_lora_rank?: number | null;
    enable_prompt_adapter?: boolean;
    max_prompt_adapter_token?: number;
    fast_build?: boolean;
    enable_chunked_context?: boolean;
    embedding_parallel_mode?: EmbeddingParallelMode;
    share_embedding_table?: boolean;

    enable_build_cache?: boolean | BuildCacheConfig;
    arbitrate_config?: boolean;
}

/** Everything a worker rank needs to rebuild a set-up BuildArgs. Plain data only. */
export type BuildArgsPayload = {
    model: string;
    revision: string | null;
    dtype: string;
    load_format: LoadFormat;
    trust_remote_code: boolean;
    parallel: ParallelConfigData;
    build_config: BuildConfig;
    quant_config: QuantConfig;
    calib_config: CalibConfig;
    kv_cache_config: KvCacheConfig;
    enable_lora: boolean;
    max_lora_rank: number | null;
    enable_prompt_adapter: boolean;
    max_prompt_adapter_token: number;
    fast_build: boolean;
    enable_chunked_context: boolean;
    embedding_parallel_mode: EmbeddingParallelMode;
    share_embedding_table: boolean;
    enable_build_cache: boolean | BuildCacheConfig;
    arbitrate_config: boolean;
    model_dir: string | null;
    model_format: ModelFormat;
    convert_checkpoint_options: ConvertCheckpointOptions;
};

export class BuildArgs {
    model: string;
    revision: string | null;
    dtype: string;
    load_format: LoadFormat;
    trust_remote_code: boolean;
    parallel: ParallelConfig;

    build_config: BuildConfig;
    quant_config: QuantConfig;
    calib_config: CalibConfig;
    kv_cache_config: KvCacheConfig;

    enable_lora: boolean;
    max_lora_rank: number | null;
    enable_prompt_adapter: boolean;
    max_prompt_adapter_token: number;
    fast_build: boolean;
    enable_chunked_context: boolean;
    embedding_parallel_mode: EmbeddingParallelMode;
    share_embedding_table: boolean;
    enable_build_cache: boolean | BuildCacheConfig;
    arbitrate_config: boolean;

    /* Filled in by setup() */
    model_dir: string | null = null;
    model_format: ModelFormat = 'SOURCE_MODEL';
    convert_checkpoint_options: ConvertCheckpointOptions = {
        use_parallel_embedding: false,
        embedding_sharding_dim: null,
        share_embedding_table: false,
    };
    engine_pretrained_config: PretrainedSection | null = null;
    resolved: ResolvedConfig | null = null;
    dropped_claims: DroppedClaim[] = [];

    private userBuildConfig: boolean;
    private isSetup = false;

    constructor(init: BuildArgsInit, private readonly log: Logger = defaultLog) {
        this.model = init.model;
        this.revision = init.revision ?? null;
        this.dtype = init.dtype ?? 'auto';
        this.load_format = init.load_format ?? 'auto';
        this.trust_remote_code = init.trust_remote_code ?? false;

        this.parallel = new ParallelConfig(
            init.tensor_parallel_size ?? 1,
            init.pipeline_parallel_size ?? 1,
            init.auto_parallel ?? false
        );
        if (this.parallel.auto_parallel) this.parallel.world_size = init.world_size ?? 1;
        if (init.devices) this.parallel.devices = init.devices;

        this.userBuildConfig = init.build_config !== undefined && init.build_config !== null;
        this.build_config = structuredClone(init.build_config ?? defaultBuildConfig());
        this.quant_config = structuredClone(init.quant_config ?? defaultQuantConfig());
        this.calib_config = structuredClone(init.calib_config ?? defaultCalibConfig());
        this.kv_cache_config = structuredClone(init.kv_cache_config ?? defaultKvCacheConfig());

        this.enable_lora = init.enable_lora ?? false;
        this.max_lora_rank = init.max_lora_rank ?? null;
        this.enable_prompt_adapter = init.enable_prompt_adapter ?? false;
        this.max_prompt_adapter_token = init.max_prompt_adapter_token ?? 0;
        this.fast_build = init.fast_build ?? false;
        this.enable_chunked_context = init.enable_chunked_context ?? false;
        this.embedding_parallel_mode = init.embedding_parallel_mode ?? 'SHARDING_ALONG_VOCAB';
        this.share_embedding_table = init.share_embedding_table ?? false;
        this.enable_build_cache = init.enable_build_cache ?? false;
        this.arbitrate_config = init.arbitrate_config ?? true;
    }

    get isLocalModel(): boolean {
        return this.model_dir !== null;
    }

    get isHubModel(): boolean {
        return !this.isLocalModel;
    }

    get modelDir(): string {
        if (this.model_dir === null) {
            throw new InvalidOptionError(`model_dir is only available for local model, ${this.model}.`);
        }
        return this.model_dir;
    }

    get buildConfigMutable(): boolean {
        return this.model_format !== 'ENGINE';
    }

    get buildCacheConfig(): BuildCacheConfig | null {
        if (this.enable_build_cache === false) return null;
        if (this.enable_build_cache === true) return getBuildCacheConfigFromEnv().config;
        return this.enable_build_cache;
    }

    /**
     * Settle the configs right before building: check their consistency and
     * arbitrate conflicts. Runs once per instance.
     */
    setup(hardware: HardwareInfo): this {
        if (this.isSetup) {
            throw new InvalidOptionError('BuildArgs.setup() has already run');
        }

        this.checkModelOrModelDir();
        this.setupEmbeddingParallelMode();
        this.checkBuildCacheConfig();

        if (this.model_dir !== null) {
            this.model_format = inferModelFormat(this.model_dir);
            if (this.model_format === 'ENGINE') {
                if (this.userBuildConfig) {
                    this.log.warn('The build_config is ignored for model format of ENGINE.');
                }
                this.loadConfigFromEngine(this.model_dir);
            } else if (this.model_format === 'CHECKPOINT') {
                this.loadConfigFromCheckpoint(this.model_dir);
            }
        } else {
            this.model_format = 'SOURCE_MODEL';
        }

        if (!isPostAmpere(hardware)) {
            if (this.dtype === 'auto') this.dtype = 'float16';
            if (this.dtype === 'bfloat16') {
                throw new InvalidOptionError('Pre SM 80 GPUs do not support bfloat16', { option: 'dtype' });
            }
        }

        const plugins = this.build_config.plugin_config;
        if (this.fast_build && (this.quant_config.quant_algo === 'FP8' || this.quant_config.quant_algo === null)) {
            plugins.manage_weights = true;
        }

        if (this.parallel.world_size === 1) {
            plugins.nccl_plugin = null;
        }

        if (this.enable_lora) {
            plugins.lora_plugin = 'auto';
            if (this.max_lora_rank !== null) {
                this.build_config.lora_config.max_lora_rank = this.max_lora_rank;
            }
        }

        if (this.enable_prompt_adapter) {
            this.build_config.max_prompt_embedding_table_size =
                this.max_prompt_adapter_token * this.build_config.max_batch_size;
        }

        if (this.arbitrate_config) {
            this.performConfigArbitration(hardware);
        }

        this.isSetup = true;
        return this;
    }

    /* ---------------------------------------------------------------------- */
    /* Arbitration                                                            */
    /* ---------------------------------------------------------------------- */

    private performConfigArbitration(hardware: HardwareInfo): void {
        const arbitrator = new ConfigArbitrator(this.log);
        const postAmpere = isPostAmpere(hardware);

        if (this.buildConfigMutable) {
            if (!this.build_config.max_num_tokens) {
                this.build_config.max_num_tokens = BUILD_DEFAULTS.MAX_NUM_TOKENS;
            }
            if (!postAmpere) {
                arbitrator.setup('pre-ampere not supported', 'plugin', { use_paged_context_fmha: false });
            }

            if (this.enable_chunked_context) {
                arbitrator.claimPerf('chunked_context', 'plugin', { use_paged_context_fmha: true }, () => {
                    this.log.warn('Disabling chunked context due to configuration conflict.');
                    this.enable_chunked_context = false;
                });
            }

            if (this.build_config.plugin_config.streamingllm) {
                this.validateKvCacheConfig();
                arbitrator.claimFunc('streamingllm', 'plugin', { streamingllm: true, use_paged_context_fmha: false });
                arbitrator.claimFunc('streamingllm', 'cache', { enable_block_reuse: false });
            }

            if (this.quant_config.quant_algo === 'FP8') {
                arbitrator.claimFunc('fp8_quant', 'plugin', { use_paged_context_fmha: false });
            }

            if (this.build_config.max_beam_width > 1) {
                arbitrator.claimFunc('beam_search (beam_width > 1)', 'cache', { enable_block_reuse: false });
            }
        } else {
            // An engine's build options are fixed; runtime options must fit them.
            arbitrator.setup('BuildConfig is readonly', 'build', buildConfigWithoutPlugins(this.build_config));
            arbitrator.setup('PluginConfig is readonly', 'plugin', { ...this.build_config.plugin_config });
        }

        if (!postAmpere) {
            arbitrator.setup('pre-ampere not supported', 'cache', { enable_block_reuse: false });
        }
        if (this.kv_cache_config.enable_block_reuse) {
            arbitrator.claimFunc('enable_block_reuse', 'cache', { enable_block_reuse: true });
            arbitrator.claimFunc('enable_block_reuse', 'plugin', { use_paged_context_fmha: true });
        }

        this.resolved = arbitrator.resolve({
            plugin: this.build_config.plugin_config,
            cache: this.kv_cache_config,
            build: this.build_config,
        });
        this.dropped_claims = arbitrator.dropped;
    }

    private validateKvCacheConfig(): void {
        const kv = this.kv_cache_config;
        if (kv.max_attention_window === null) {
            throw new InvalidOptionError('KvCacheConfig.max_attention_window should be set for streaming LLM.');
        }
        if (kv.max_attention_window.some((w) => w <= 0)) {
            throw new InvalidOptionError('Elements in KvCacheConfig.max_attention_window should be greater than 0.');
        }
        if (kv.sink_token_length === null) {
            throw new InvalidOptionError('KvCacheConfig.sink_token_length should be set for streaming LLM.');
        }
        if (kv.sink_token_length <= 0) {
            throw new InvalidOptionError('KvCacheConfig.sink_token_length should be greater than 0.');
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Setup helpers                                                          */
    /* ---------------------------------------------------------------------- */

    private checkModelOrModelDir(): void {
        if (!this.model) {
            throw new InvalidOptionError('model should be provided.');
        }
        if (fs.existsSync(this.model) && fs.statSync(this.model).isDirectory()) {
            this.model_dir = path.resolve(this.model);
        }
    }

    private setupEmbeddingParallelMode(): void {
        const opts = this.convert_checkpoint_options;
        switch (this.embedding_parallel_mode) {
            case 'NONE':
                opts.use_parallel_embedding = false;
                opts.embedding_sharding_dim = null;
                break;
            case 'SHARDING_ALONG_VOCAB':
                opts.use_parallel_embedding = true;
                opts.embedding_sharding_dim = 0;
                break;
            case 'SHARDING_ALONG_HIDDEN':
                opts.use_parallel_embedding = true;
                opts.embedding_sharding_dim = 1;
                break;
            default:
                throw new InvalidOptionError(`Invalid embedding_parallel_mode: ${String(this.embedding_parallel_mode)}`);
        }
        opts.share_embedding_table = this.share_embedding_table;
    }

    private checkBuildCacheConfig(): void {
        if (typeof this.enable_build_cache === 'boolean') return;
        const c = this.enable_build_cache;
        if (typeof c.cache_root !== 'string' || c.cache_root === '') {
            throw new InvalidOptionError('Invalid build cache config: cache_root must be a non-empty path');
        }
        if (!Number.isInteger(c.max_records) || c.max_records < 1) {
            throw new InvalidOptionError(`Invalid build cache config: max_records ${c.max_records}`);
        }
        if (!Number.isFinite(c.max_cache_storage_gb) || c.max_cache_storage_gb < 0) {
            throw new InvalidOptionError(`Invalid build cache config: max_cache_storage_gb ${c.max_cache_storage_gb}`);
        }
        this.enable_build_cache = defaultBuildCacheConfig(c);
    }

    private loadConfigFromEngine(engineDir: string): void {
        const engine = loadEngineConfig(engineDir);
        this.engine_pretrained_config = engine.pretrained_config;
        this.build_config = engine.build_config;

        const mapping = engine.pretrained_config.mapping;
        if (this.parallel.tp_size !== 1 && this.parallel.tp_size !== mapping.tp_size) {
            throw new InvalidOptionError(
                `tp_size ${this.parallel.tp_size} is not consistent with the engine's tp_size ${mapping.tp_size}`
            );
        }
        if (this.parallel.pp_size !== 1 && this.parallel.pp_size !== mapping.pp_size) {
            throw new InvalidOptionError(
                `pp_size ${this.parallel.pp_size} is not consistent with the engine's pp_size ${mapping.pp_size}`
            );
        }
        this.parallel = new ParallelConfig(mapping.tp_size, mapping.pp_size);
    }

    private loadConfigFromCheckpoint(checkpointDir: string): void {
        const { mapping } = loadCheckpointConfig(checkpointDir);

        if (this.parallel.tp_size !== 1 && this.parallel.tp_size !== mapping.tp_size) {
            throw new InvalidOptionError(
                `tp_size ${this.parallel.tp_size} is not consistent with the checkpoint's tp_size ${mapping.tp_size}`
            );
        }
        if (this.parallel.pp_size !== 1 && this.parallel.pp_size !== mapping.pp_size) {
            throw new InvalidOptionError(
                `pp_size ${this.parallel.pp_size} is not consistent with the checkpoint's pp_size ${mapping.pp_size}`
            );
        }
        if (this.parallel.auto_parallel && this.parallel.world_size !== 1 && mapping.world_size !== 1) {
            throw new InvalidOptionError(
                `auto parallel with world_size ${this.parallel.world_size} does not support checkpoint with ` +
                `world_size ${mapping.world_size} > 1`
            );
        }
        if (!this.parallel.auto_parallel) {
            this.parallel = new ParallelConfig(mapping.tp_size, mapping.pp_size);
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Worker transfer                                                        */
    /* ---------------------------------------------------------------------- */

    toNodePayload(): BuildArgsPayload {
        if (!this.isSetup) {
            throw new InvalidOptionError('BuildArgs must be set up before it is sent to workers');
        }
        return structuredClone({
            model: this.model,
            revision: this.revision,
            dtype: this.dtype,
            load_format: this.load_format,
            trust_remote_code: this.trust_remote_code,
            parallel: this.parallel.toData(),
            build_config: this.build_config,
            quant_config: this.quant_config,
            calib_config: this.calib_config,
            kv_cache_config: this.kv_cache_config,
            enable_lora: this.enable_lora,
            max_lora_rank: this.max_lora_rank,
            enable_prompt_adapter: this.enable_prompt_adapter,
            max_prompt_adapter_token: this.max_prompt_adapter_token,
            fast_build: this.fast_build,
            enable_chunked_context: this.enable_chunked_context,
            embedding_parallel_mode: this.embedding_parallel_mode,
            share_embedding_table: this.share_embedding_table,
            enable_build_cache: this.enable_build_cache,
            arbitrate_config: this.arbitrate_config,
            model_dir: this.model_dir,
            model_format: this.model_format,
            convert_checkpoint_options: this.convert_checkpoint_options,
        });
    }

    /** Rebuilds set-up arguments on a worker rank; arbitration is not re-run. */
    static fromNodePayload(payload: BuildArgsPayload, log: Logger = defaultLog): BuildArgs {
        const args = new BuildArgs(
            {
                model: payload.model,
                revision: payload.revision,
                dtype: payload.dtype,
                load_format: payload.load_format,
                trust_remote_code: payload.trust_remote_code,
                build_config: payload.build_config,
                quant_config: payload.quant_config,
                calib_config: payload.calib_config,
                kv_cache_config: payload.kv_cache_config,
                enable_lora: payload.enable_lora,
                max_lora_rank: payload.max_lora_rank,
                enable_prompt_adapter: payload.enable_prompt_adapter,
                max_prompt_adapter_token: payload.max_prompt_adapter_token,
                fast_build: payload.fast_build,
                enable_chunked_context: payload.enable_chunked_context,
                embedding_parallel_mode: payload.embedding_parallel_mode,
                share_embedding_table: payload.share_embedding_table,
                enable_build_cache: payload.enable_build_cache,
                arbitrate_config: payload.arbitrate_config,
            },
            log
        );
        args.parallel = ParallelConfig.fromData(payload.parallel);
        args.model_dir = payload.model_dir;
        args.model_format = payload.model_format;
        args.convert_checkpoint_options = structuredClone(payload.convert_checkpoint_options);
        args.isSetup = true;
        return args;
    }
}
