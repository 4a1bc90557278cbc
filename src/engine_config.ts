/**
 * Engine build configuration shapes and their defaults.
 *
 * These are plain data: every field is always present (absent values are null),
 * so a config object can be handed to the arbitrator as an option map and
 * written back by key.
 */

import { BUILD_DEFAULTS } from './config';
import { InvalidOptionError } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type PluginConfig = {
    gpt_attention_plugin: string | null;
    gemm_plugin: string | null;
    nccl_plugin: string | null;
    lora_plugin: string | null;
    context_fmha: boolean;
    use_paged_context_fmha: boolean;
    paged_kv_cache: boolean;
    remove_input_padding: boolean;
    streamingllm: boolean;
    manage_weights: boolean;
};

export type LoraConfig = {
    max_lora_rank: number;
    lora_target_modules: string[];
};

export type BuildConfig = {
    max_input_len: number;
    max_seq_len: number | null;
    max_batch_size: number;
    max_beam_width: number;
    max_num_tokens: number | null;
    opt_num_tokens: number | null;
    max_prompt_embedding_table_size: number;
    strongly_typed: boolean;
    gather_context_logits: boolean;
    gather_generation_logits: boolean;
    lora_config: LoraConfig;
    plugin_config: PluginConfig;
};

export type KvCacheConfig = {
    enable_block_reuse: boolean;
    max_tokens: number | null;
    max_attention_window: number[] | null;
    sink_token_length: number | null;
    free_gpu_memory_fraction: number | null;
    host_cache_size: number | null;
};

export const QUANT_ALGOS = [
    'FP8',
    'W8A16',
    'W4A16',
    'W4A16_AWQ',
    'W4A8_AWQ',
    'W8A8_SQ_PER_CHANNEL',
    'INT8',
] as const;

export type QuantAlgo = typeof QUANT_ALGOS[number];

export type QuantConfig = {
    quant_algo: QuantAlgo | null;
    kv_cache_quant_algo: QuantAlgo | null;
    group_size: number;
    has_zero_point: boolean;
    exclude_modules: string[] | null;
};

export type CalibConfig = {
    device: 'cuda' | 'cpu';
    calib_dataset: string;
    calib_batches: number;
    calib_batch_size: number;
    calib_max_seq_length: number;
    random_seed: number;
    tokenizer_max_seq_length: number;
};

/* -------------------------------------------------------------------------- */
/* Defaults                                                                   */
/* -------------------------------------------------------------------------- */

export function defaultPluginConfig(overrides: Partial<PluginConfig> = {}): PluginConfig {
    return {
        gpt_attention_plugin: 'auto',
        gemm_plugin: null,
        nccl_plugin: 'auto',
        lora_plugin: null,
        context_fmha: true,
        use_paged_context_fmha: false,
        paged_kv_cache: true,
        remove_input_padding: true,
        streamingllm: false,
        manage_weights: false,
        ...overrides,
    };
}

export function defaultBuildConfig(
    overrides: Partial<Omit<BuildConfig, 'plugin_config' | 'lora_config'>> & {
        plugin_config?: Partial<PluginConfig>;
        lora_config?: Partial<LoraConfig>;
    } = {}
): BuildConfig {
    const { plugin_config, lora_config, ...rest } = overrides;
    return {
        max_input_len: 1024,
        max_seq_len: null,
        max_batch_size: 2048,
        max_beam_width: 1,
        max_num_tokens: BUILD_DEFAULTS.MAX_NUM_TOKENS,
        opt_num_tokens: null,
        max_prompt_embedding_table_size: 0,
        strongly_typed: true,
        gather_context_logits: false,
        gather_generation_logits: false,
        ...rest,
        lora_config: { max_lora_rank: 64, lora_target_modules: [], ...lora_config },
        plugin_config: defaultPluginConfig(plugin_config),
    };
}

export function defaultKvCacheConfig(overrides: Partial<KvCacheConfig> = {}): KvCacheConfig {
    return {
        enable_block_reuse: false,
        max_tokens: null,
        max_attention_window: null,
        sink_token_length: null,
        free_gpu_memory_fraction: null,
        host_cache_size: null,
        ...overrides,
    };
}

export function defaultQuantConfig(overrides: Partial<QuantConfig> = {}): QuantConfig {
    return {
        quant_algo: null,
        kv_cache_quant_algo: null,
        group_size: 128,
        has_zero_point: false,
        exclude_modules: null,
        ...overrides,
    };
}

export function defaultCalibConfig(overrides: Partial<CalibConfig> = {}): CalibConfig {
    return {
        device: 'cuda',
        calib_dataset: 'cnn_dailymail',
        calib_batches: 512,
        calib_batch_size: 1,
        calib_max_seq_length: 512,
        random_seed: 1234,
        tokenizer_max_seq_length: 2048,
        ...overrides,
    };
}

/** Whether the quantization needs a calibration pass before the weights can be loaded. */
export function requiresCalibration(quant: QuantConfig): boolean {
    const calibrated: (QuantAlgo | null)[] = ['FP8', 'W4A16_AWQ', 'W4A8_AWQ', 'W8A8_SQ_PER_CHANNEL'];
    if (calibrated.includes(quant.quant_algo)) return true;
    return quant.kv_cache_quant_algo === 'FP8' || quant.kv_cache_quant_algo === 'INT8';
}

/* -------------------------------------------------------------------------- */
/* Reading from config.json                                                   */
/* -------------------------------------------------------------------------- */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<T>(
    src: Record<string, unknown>,
    key: string,
    guard: (v: unknown) => v is T,
    fallback: T,
    at: string
): T {
    if (!(key in src) || src[key] === undefined) return fallback;
    const v = src[key];
    if (!guard(v)) {
        throw new InvalidOptionError(`Invalid value for '${at}.${key}' in engine config`, { option: `${at}.${key}` });
    }
    return v;
}

const isNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isNullableNumber = (v: unknown): v is number | null => v === null || isNumber(v);
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isNullableString = (v: unknown): v is string | null => v === null || typeof v === 'string';
const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every((s) => typeof s === 'string');

export function pluginConfigFromJson(raw: unknown): PluginConfig {
    const d = defaultPluginConfig();
    if (!isRecord(raw)) return d;
    return {
        gpt_attention_plugin: field(raw, 'gpt_attention_plugin', isNullableString, d.gpt_attention_plugin, 'plugin_config'),
        gemm_plugin: field(raw, 'gemm_plugin', isNullableString, d.gemm_plugin, 'plugin_config'),
        nccl_plugin: field(raw, 'nccl_plugin', isNullableString, d.nccl_plugin, 'plugin_config'),
        lora_plugin: field(raw, 'lora_plugin', isNullableString, d.lora_plugin, 'plugin_config'),
        context_fmha: field(raw, 'context_fmha', isBoolean, d.context_fmha, 'plugin_config'),
        use_paged_context_fmha: field(raw, 'use_paged_context_fmha', isBoolean, d.use_paged_context_fmha, 'plugin_config'),
        paged_kv_cache: field(raw, 'paged_kv_cache', isBoolean, d.paged_kv_cache, 'plugin_config'),
        remove_input_padding: field(raw, 'remove_input_padding', isBoolean, d.remove_input_padding, 'plugin_config'),
        streamingllm: field(raw, 'streamingllm', isBoolean, d.streamingllm, 'plugin_config'),
        manage_weights: field(raw, 'manage_weights', isBoolean, d.manage_weights, 'plugin_config'),
    };
}

/** Engine config.json build section → BuildConfig; unknown keys are ignored. */
export function buildConfigFromJson(raw: unknown): BuildConfig {
    const d = defaultBuildConfig();
    if (!isRecord(raw)) return d;
    const lora = isRecord(raw.lora_config) ? raw.lora_config : {};
    return {
        max_input_len: field(raw, 'max_input_len', isNumber, d.max_input_len, 'build_config'),
        max_seq_len: field(raw, 'max_seq_len', isNullableNumber, d.max_seq_len, 'build_config'),
        max_batch_size: field(raw, 'max_batch_size', isNumber, d.max_batch_size, 'build_config'),
        max_beam_width: field(raw, 'max_beam_width', isNumber, d.max_beam_width, 'build_config'),
        max_num_tokens: field(raw, 'max_num_tokens', isNullableNumber, d.max_num_tokens, 'build_config'),
        opt_num_tokens: field(raw, 'opt_num_tokens', isNullableNumber, d.opt_num_tokens, 'build_config'),
        max_prompt_embedding_table_size: field(
            raw, 'max_prompt_embedding_table_size', isNumber, d.max_prompt_embedding_table_size, 'build_config'
        ),
        strongly_typed: field(raw, 'strongly_typed', isBoolean, d.strongly_typed, 'build_config'),
        gather_context_logits: field(raw, 'gather_context_logits', isBoolean, d.gather_context_logits, 'build_config'),
        gather_generation_logits: field(
            raw, 'gather_generation_logits', isBoolean, d.gather_generation_logits, 'build_config'
        ),
        lora_config: {
            max_lora_rank: field(lora, 'max_lora_rank', isNumber, d.lora_config.max_lora_rank, 'lora_config'),
            lora_target_modules: field(
                lora, 'lora_target_modules', isStringArray, d.lora_config.lora_target_modules, 'lora_config'
            ),
        },
        plugin_config: pluginConfigFromJson(raw.plugin_config),
    };
}

/** Build config without its plugin section, as a flat option map. */
export function buildConfigWithoutPlugins(config: BuildConfig): Omit<BuildConfig, 'plugin_config'> {
    const { plugin_config: _plugins, ...rest } = config;
    return structuredClone(rest);
}
