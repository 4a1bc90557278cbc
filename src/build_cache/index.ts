export { BuildCache, BuildCacheOptions, StageRequest } from './build_cache';
export { CacheStage, WriteGuardResult, SlotManifest, ENGINE_DIR_NAME, MANIFEST_FILE_NAME } from './cache_stage';
export { CacheIndex, CacheRecord } from './cache_index';
export {
    CacheKeyInputs,
    CacheKeyManifest,
    CanonicalKeyInputs,
    computeCacheFingerprint,
    isCacheKey,
    verifyCacheManifest,
} from './fingerprint';
export { acquireSlotLock, releaseSlotLock, tryAcquireSlotLock, isSlotLocked, LockHandle } from './lock';
