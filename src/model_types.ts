// src/model_types.ts
//
// Narrow interfaces to everything outside the build core: the model hub, the
// weight loaders and engine compiler, and the source of model identity used
// for cache keys. Callers supply implementations; tests supply fakes.

import { BuildConfig, CalibConfig, QuantConfig } from './engine_config';

export type ModelFormat = 'SOURCE_MODEL' | 'CHECKPOINT' | 'ENGINE';

/** Placement of one rank within the parallel topology. */
export type Mapping = {
    rank: number;
    world_size: number;
    tp_size: number;
    pp_size: number;
};

export type ConvertCheckpointOptions = {
    use_parallel_embedding: boolean;
    embedding_sharding_dim: number | null;
    share_embedding_table: boolean;
};

/** Canonical, format-independent description of a model; part of the cache key. */
export type PretrainedDescriptor = {
    architecture: string;
    dtype: string;
    vocab_size: number | null;
    hidden_size: number | null;
    num_hidden_layers: number | null;
    num_attention_heads: number | null;
    mapping: { world_size: number; tp_size: number; pp_size: number };
    quantization: QuantConfig;
};

/** A model held in memory, ready to be compiled. */
export interface LoadedModel {
    readonly architecture: string;
    readonly dtype: string;
}

export interface Engine {
    save(engineDir: string): void | Promise<void>;
}

export interface SourceLoadRequest {
    model_dir: string;
    dtype: string;
    mapping: Mapping;
    quant_config: QuantConfig;
    trust_remote_code: boolean;
    convert_options: ConvertCheckpointOptions;
    /** Initialize weights with random values instead of reading them. */
    dummy_weights: boolean;
}

export interface CheckpointLoadRequest {
    checkpoint_dir: string;
    mapping: Mapping;
    dummy_weights: boolean;
}

export interface QuantizeRequest {
    model_dir: string;
    output_dir: string;
    dtype: string;
    mapping: Mapping;
    quant_config: QuantConfig;
    calib_config: CalibConfig;
    trust_remote_code: boolean;
}

export interface ModelBackend {
    loadFromSource(req: SourceLoadRequest): Promise<LoadedModel>;
    loadFromCheckpoint(req: CheckpointLoadRequest): Promise<LoadedModel>;
    /** Writes a quantized checkpoint to `req.output_dir`. Required for calibrated quantization. */
    quantize?(req: QuantizeRequest): Promise<void>;
    build(model: LoadedModel, buildConfig: BuildConfig): Promise<Engine>;
}

export interface ModelHub {
    /** Fetches the full model; returns its local directory. Repeated calls reuse the download. */
    downloadModel(modelId: string, revision: string | null): Promise<string>;
    /** Fetches only the model's config.json; returns the directory holding it. */
    downloadPretrainedConfig(modelId: string, revision: string | null): Promise<string>;
}

export interface IdentityRequest {
    model_dir: string;
    dtype: string;
    world_size: number;
    tp_size: number;
    pp_size: number;
    quant_config: QuantConfig;
}

export interface ModelIdentitySource {
    describe(req: IdentityRequest): PretrainedDescriptor;
}
