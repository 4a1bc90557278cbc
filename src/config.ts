/**
 * Shared Configuration Constants
 *
 * Centralized defaults for arbitration, the build cache and worker dispatch.
 * Values can be overridden via environment variables.
 */

import * as os from 'os';
import * as path from 'path';

function envFlag(name: string): boolean {
    const v = (process.env[name] || '').toLowerCase();
    return v === '1' || v === 'true' || v === 'on';
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) ? n : fallback;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const n = parseFloat(raw);
    return Number.isFinite(n) ? n : fallback;
}

// Build config defaults applied during arbitration
export const BUILD_DEFAULTS = {
    MAX_NUM_TOKENS: 2048,
};

// Build cache
export const BUILD_CACHE_DEFAULTS = {
    ROOT: path.join(os.tmpdir(), '.cache', 'enginekit', 'build_cache'),
    MAX_RECORDS: 10,
    MAX_CACHE_STORAGE_GB: 256,
    KEY_VERSION: 1,
    INDEX_FILE_NAME: 'cache_index.sqlite',
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    CACHE_LOCK_MS: envInt('ENGINEKIT_CACHE_LOCK_TIMEOUT', 30 * 60 * 1000),   // wait for a concurrent builder
    CACHE_LOCK_STALE_MS: envInt('ENGINEKIT_CACHE_LOCK_STALE', 6 * 60 * 60 * 1000),
    STAGING_TTL_MS: envInt('ENGINEKIT_STAGING_TTL', 24 * 60 * 60 * 1000),
    WORKER_TIMEOUT_MS: envInt('ENGINEKIT_WORKER_TIMEOUT', 60 * 60 * 1000),  // worker hard-kill timeout
};

export const GB = 1024 * 1024 * 1024;

export interface BuildCacheConfig {
    cache_root: string;
    max_records: number;
    max_cache_storage_gb: number;
}

export function defaultBuildCacheConfig(overrides: Partial<BuildCacheConfig> = {}): BuildCacheConfig {
    return {
        cache_root: overrides.cache_root ?? BUILD_CACHE_DEFAULTS.ROOT,
        max_records: overrides.max_records ?? BUILD_CACHE_DEFAULTS.MAX_RECORDS,
        max_cache_storage_gb: overrides.max_cache_storage_gb ?? BUILD_CACHE_DEFAULTS.MAX_CACHE_STORAGE_GB,
    };
}

/**
 * Read the build cache switches from the environment.
 * Returns whether the cache is force-enabled and the config it would use.
 */
export function getBuildCacheConfigFromEnv(): { enabled: boolean; config: BuildCacheConfig } {
    return {
        enabled: envFlag('ENGINEKIT_BUILD_CACHE'),
        config: {
            cache_root: process.env.ENGINEKIT_BUILD_CACHE_ROOT || BUILD_CACHE_DEFAULTS.ROOT,
            max_records: envInt('ENGINEKIT_BUILD_CACHE_MAX_RECORDS', BUILD_CACHE_DEFAULTS.MAX_RECORDS),
            max_cache_storage_gb: envFloat('ENGINEKIT_BUILD_CACHE_MAX_STORAGE_GB', BUILD_CACHE_DEFAULTS.MAX_CACHE_STORAGE_GB),
        },
    };
}
