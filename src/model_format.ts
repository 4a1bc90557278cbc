/**
 * Model Format — classify a model directory by its config.json and read what
 * the build needs from it.
 *
 * config.json with both `pretrained_config` and `build_config` is a built
 * ENGINE; with `architecture` and `dtype` it is a CHECKPOINT; anything else is
 * treated as a SOURCE_MODEL. Each format's document is schema-checked before
 * it is used.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { GB } from './config';
import { BuildConfig, QuantConfig, buildConfigFromJson, isRecord } from './engine_config';
import { getDirectorySizeBytes } from './fs_utils';
import { createLogger } from './logger';
import { IdentityRequest, ModelFormat, ModelIdentitySource, PretrainedDescriptor } from './model_types';
import { JsonSchema, SchemaValidator } from './schema_validator';
import { FormatInferenceError } from './structured_error';
import { stableStringify } from './stable_stringify';

const log = createLogger('model-format');

export const CONFIG_FILE_NAME = 'config.json';

/* -------------------------------------------------------------------------- */
/* Schemas                                                                    */
/* -------------------------------------------------------------------------- */

const MAPPING_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        tp_size: { type: 'number', minimum: 1 },
        pp_size: { type: 'number', minimum: 1 },
        world_size: { type: 'number', minimum: 1 },
    },
};

const PRETRAINED_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['architecture', 'dtype'],
    properties: {
        architecture: { type: 'string' },
        dtype: { type: 'string' },
        mapping: MAPPING_SCHEMA,
        share_embedding_table: { type: 'boolean' },
        use_parallel_embedding: { type: 'boolean' },
    },
};

export const MODEL_CONFIG_SCHEMAS: Record<ModelFormat, JsonSchema> = {
    ENGINE: {
        type: 'object',
        required: ['pretrained_config', 'build_config'],
        properties: {
            version: { type: 'string' },
            pretrained_config: PRETRAINED_SCHEMA,
            build_config: {
                type: 'object',
                properties: {
                    max_batch_size: { type: 'number', minimum: 1 },
                    max_beam_width: { type: 'number', minimum: 1 },
                    max_num_tokens: { type: ['number', 'null'] },
                    plugin_config: { type: 'object' },
                },
            },
        },
    },
    CHECKPOINT: PRETRAINED_SCHEMA,
    SOURCE_MODEL: {
        type: 'object',
        required: ['architectures'],
        properties: {
            architectures: { type: 'array', items: { type: 'string' } },
            torch_dtype: { type: 'string' },
            vocab_size: { type: 'number', minimum: 1 },
            hidden_size: { type: 'number', minimum: 1 },
            num_hidden_layers: { type: 'number', minimum: 1 },
            num_attention_heads: { type: 'number', minimum: 1 },
        },
    },
};

const validator = new SchemaValidator();
for (const [format, schema] of Object.entries(MODEL_CONFIG_SCHEMAS)) {
    validator.registerSchema(format, schema);
}

/* -------------------------------------------------------------------------- */
/* Inference                                                                  */
/* -------------------------------------------------------------------------- */

function readConfigJson(modelDir: string): Record<string, unknown> {
    const configPath = path.join(modelDir, CONFIG_FILE_NAME);
    if (!fs.existsSync(configPath)) {
        throw new FormatInferenceError(
            `Failed to infer model format because no config.json exists in ${modelDir}`,
            configPath
        );
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (e) {
        throw new FormatInferenceError(`Failed to parse ${configPath}`, configPath, e);
    }
    if (!isRecord(parsed)) {
        throw new FormatInferenceError(`${configPath} must hold a JSON object`, configPath);
    }
    return parsed;
}

function classify(config: Record<string, unknown>): ModelFormat {
    if ('pretrained_config' in config && 'build_config' in config) return 'ENGINE';
    if ('architecture' in config && 'dtype' in config) return 'CHECKPOINT';
    return 'SOURCE_MODEL';
}

function loadValidated(modelDir: string): { format: ModelFormat; config: Record<string, unknown> } {
    const config = readConfigJson(modelDir);
    const format = classify(config);
    const result = validator.validate(config, format);
    if (!result.valid) {
        const detail = result.errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('; ');
        throw new FormatInferenceError(
            `Inferred model format ${format}, but failed to load config.json: ${detail}`,
            path.join(modelDir, CONFIG_FILE_NAME)
        );
    }
    return { format, config };
}

export function inferModelFormat(modelDir: string): ModelFormat {
    const { format } = loadValidated(modelDir);
    log.debug('Inferred model format', { model_dir: modelDir, format });
    return format;
}

/* -------------------------------------------------------------------------- */
/* Engine and checkpoint configs                                              */
/* -------------------------------------------------------------------------- */

export type ParallelMapping = { tp_size: number; pp_size: number; world_size: number };

export type PretrainedSection = {
    architecture: string;
    dtype: string;
    mapping: ParallelMapping;
    share_embedding_table: boolean;
    use_parallel_embedding: boolean;
};

export type EngineConfig = {
    version: string | null;
    pretrained_config: PretrainedSection;
    build_config: BuildConfig;
};

function readPositive(src: Record<string, unknown>, key: string, fallback: number): number {
    const v = src[key];
    return typeof v === 'number' && v >= 1 ? v : fallback;
}

function readMapping(raw: unknown): ParallelMapping {
    const src = isRecord(raw) ? raw : {};
    const tp_size = readPositive(src, 'tp_size', 1);
    const pp_size = readPositive(src, 'pp_size', 1);
    return { tp_size, pp_size, world_size: readPositive(src, 'world_size', tp_size * pp_size) };
}

function readPretrained(raw: Record<string, unknown>): PretrainedSection {
    return {
        architecture: String(raw.architecture),
        dtype: String(raw.dtype),
        mapping: readMapping(raw.mapping),
        share_embedding_table: raw.share_embedding_table === true,
        use_parallel_embedding: raw.use_parallel_embedding === true,
    };
}

function expectFormat(modelDir: string, expected: ModelFormat): Record<string, unknown> {
    const { format, config } = loadValidated(modelDir);
    if (format !== expected) {
        throw new FormatInferenceError(
            `Expected a ${expected} directory, found ${format} in ${modelDir}`,
            path.join(modelDir, CONFIG_FILE_NAME)
        );
    }
    return config;
}

export function loadEngineConfig(engineDir: string): EngineConfig {
    const config = expectFormat(engineDir, 'ENGINE');
    const pretrained = isRecord(config.pretrained_config) ? config.pretrained_config : {};
    return {
        version: typeof config.version === 'string' ? config.version : null,
        pretrained_config: readPretrained(pretrained),
        build_config: buildConfigFromJson(config.build_config),
    };
}

export function loadCheckpointConfig(checkpointDir: string): PretrainedSection {
    return readPretrained(expectFormat(checkpointDir, 'CHECKPOINT'));
}

/** Build options of an engine directory other than its plugin config; null if the directory is not an engine. */
export function loadExtraBuildConfigsFromEngine(modelDir: string): Record<string, unknown> | null {
    const { format, config } = loadValidated(modelDir);
    if (format !== 'ENGINE') return null;
    const build = isRecord(config.build_config) ? { ...config.build_config } : {};
    delete build.plugin_config;
    return build;
}

/* -------------------------------------------------------------------------- */
/* Model info                                                                 */
/* -------------------------------------------------------------------------- */

export class ModelInfo {
    constructor(
        public dtype: string | null = null,
        public architecture: string | null = null
    ) { }

    get modelName(): string {
        if (this.architecture === null) {
            throw new Error('The architecture is not set yet.');
        }
        return this.architecture;
    }

    static fromPretrained(config: { dtype: string; architecture: string }): ModelInfo {
        return new ModelInfo(config.dtype, config.architecture);
    }

    static fromEngineConfig(config: EngineConfig): ModelInfo {
        return ModelInfo.fromPretrained(config.pretrained_config);
    }
}

/* -------------------------------------------------------------------------- */
/* Directory size                                                             */
/* -------------------------------------------------------------------------- */

export function getDirectorySizeInGb(dir: string): number {
    return getDirectorySizeBytes(dir) / GB;
}

/* -------------------------------------------------------------------------- */
/* Identity                                                                   */
/* -------------------------------------------------------------------------- */

/** `auto` follows the source dtype; float32 weights are built as float16. */
export function resolveDtype(requested: string, sourceDtype: string | null): string {
    const dtype = requested === 'auto' ? (sourceDtype ?? 'float16') : requested;
    return dtype === 'float32' ? 'float16' : dtype;
}

function optionalNumber(raw: Record<string, unknown>, key: string): number | null {
    const v = raw[key];
    return typeof v === 'number' ? v : null;
}

function firstArchitecture(raw: Record<string, unknown>): string {
    const archs = raw.architectures;
    if (Array.isArray(archs) && typeof archs[0] === 'string') return archs[0];
    return 'unknown';
}

/**
 * Derives the pretrained descriptor from a source model's config.json.
 * Results are memoized per (file, mtime, request).
 */
export class LocalIdentitySource implements ModelIdentitySource {
    private readonly memo: LRUCache<string, PretrainedDescriptor>;

    constructor(opts: { maxEntries?: number } = {}) {
        this.memo = new LRUCache<string, PretrainedDescriptor>({ max: opts.maxEntries ?? 64 });
    }

    describe(req: IdentityRequest): PretrainedDescriptor {
        const configPath = path.join(req.model_dir, CONFIG_FILE_NAME);
        const mtime = fs.existsSync(configPath) ? fs.statSync(configPath).mtimeMs : 0;
        const key = `${configPath}|${mtime}|${stableStringify({ ...req, model_dir: undefined })}`;

        const hit = this.memo.get(key);
        if (hit) return structuredClone(hit);

        const config = expectFormat(req.model_dir, 'SOURCE_MODEL');
        const sourceDtype = typeof config.torch_dtype === 'string' ? config.torch_dtype : null;
        const quantization: QuantConfig = structuredClone(req.quant_config);

        const descriptor: PretrainedDescriptor = {
            architecture: firstArchitecture(config),
            dtype: resolveDtype(req.dtype, sourceDtype),
            vocab_size: optionalNumber(config, 'vocab_size'),
            hidden_size: optionalNumber(config, 'hidden_size'),
            num_hidden_layers: optionalNumber(config, 'num_hidden_layers'),
            num_attention_heads: optionalNumber(config, 'num_attention_heads'),
            mapping: { world_size: req.world_size, tp_size: req.tp_size, pp_size: req.pp_size },
            quantization,
        };
        this.memo.set(key, descriptor);
        return structuredClone(descriptor);
    }
}
