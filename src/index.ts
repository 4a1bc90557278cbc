/**
 * Main entry point - exports all public APIs
 */

export * from './config_arbiter';
export * from './build_cache';
export { BuildArgs, BuildArgsInit, BuildArgsPayload, HardwareInfo, ParallelConfig, isPostAmpere } from './build_args';
export { BuildPipeline, BuildStats, BuildStep, BuildStepInfo, PipelineState, releaseResources } from './build_pipeline';
export { CachedModelLoader, CachedModelLoaderDeps, LOCK_FALLBACK_INFO, STORAGE_FALLBACK_INFO } from './cached_model_loader';
export { ModelLoader, ModelLoaderOptions, NodeBuildPayload, copyTokenizerFiles, parseBuildStepsInfo, runNodeBuild } from './model_loader';
export {
    InProcessWorkerSession,
    NodeTask,
    ThreadWorkerSession,
    WorkerContext,
    WorkerSession,
} from './worker_session';
export {
    BuildConfig,
    CalibConfig,
    KvCacheConfig,
    PluginConfig,
    QuantConfig,
    defaultBuildConfig,
    defaultCalibConfig,
    defaultKvCacheConfig,
    defaultPluginConfig,
    defaultQuantConfig,
} from './engine_config';
export {
    LocalIdentitySource,
    ModelInfo,
    inferModelFormat,
    loadEngineConfig,
    loadExtraBuildConfigsFromEngine,
} from './model_format';
export * from './model_types';
export { BuildCacheConfig, defaultBuildCacheConfig, getBuildCacheConfigFromEnv } from './config';
export { SchemaValidator, ValidationResult, JsonSchema } from './schema_validator';
export * from './structured_error';
export { createLogger, Logger } from './logger';
export { stableStringify } from './stable_stringify';
