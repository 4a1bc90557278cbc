// src/build_cache/fingerprint.ts
//
// Cache key = SHA-256 over the canonical serialization of every input that
// changes the built engine. The canonical inputs themselves are kept as the
// slot manifest so a reader can recompute and verify the key.

import * as crypto from "crypto";
import { BUILD_CACHE_DEFAULTS } from "../config";
import { isRecord } from "../engine_config";
import { stableStringify } from "../stable_stringify";

export type JsonObject = Record<string, unknown>;

export interface CacheKeyInputs {
    /** Build options; a nested `plugin_config` is hashed as its own member. */
    build_config: JsonObject;
    parallel_config: JsonObject;
    quant_config: JsonObject;
    pretrained_config: JsonObject;
}

export interface CanonicalKeyInputs {
    version: number;
    build_config: JsonObject;
    plugin_config: JsonObject | null;
    parallel_config: JsonObject;
    quant_config: JsonObject;
    pretrained_config: JsonObject;
}

export interface CacheKeyManifest {
    key: string;
    inputs: CanonicalKeyInputs;
}

const KEY_PATTERN = /^[a-f0-9]{64}$/;

export function isCacheKey(value: string): boolean {
    return KEY_PATTERN.test(value);
}

function canonicalObject(value: unknown): JsonObject {
    const parsed: unknown = JSON.parse(stableStringify(value));
    return isRecord(parsed) ? parsed : {};
}

function hashCanonical(inputs: CanonicalKeyInputs): string {
    return crypto.createHash("sha256").update(stableStringify(inputs), "utf8").digest("hex");
}

export function computeCacheFingerprint(
    inputs: CacheKeyInputs,
    version: number = BUILD_CACHE_DEFAULTS.KEY_VERSION
): CacheKeyManifest {
    const { plugin_config, ...build } = inputs.build_config;

    const canonical: CanonicalKeyInputs = {
        version,
        build_config: canonicalObject(build),
        plugin_config: plugin_config === undefined ? null : canonicalObject(plugin_config),
        parallel_config: canonicalObject(inputs.parallel_config),
        quant_config: canonicalObject(inputs.quant_config),
        pretrained_config: canonicalObject(inputs.pretrained_config),
    };

    return { key: hashCanonical(canonical), inputs: canonical };
}

/** True when `manifest` is well-formed, of the current key version, and its key matches its inputs. */
export function verifyCacheManifest(
    manifest: unknown,
    version: number = BUILD_CACHE_DEFAULTS.KEY_VERSION
): manifest is CacheKeyManifest {
    if (!isRecord(manifest) || typeof manifest.key !== "string" || !isRecord(manifest.inputs)) {
        return false;
    }
    const inputs = manifest.inputs;
    if (inputs.version !== version) return false;

    const objects = ["build_config", "parallel_config", "quant_config", "pretrained_config"] as const;
    for (const name of objects) {
        if (!isRecord(inputs[name])) return false;
    }
    if (inputs.plugin_config !== null && !isRecord(inputs.plugin_config)) return false;

    const canonical: CanonicalKeyInputs = {
        version,
        build_config: canonicalObject(inputs.build_config),
        plugin_config: isRecord(inputs.plugin_config) ? canonicalObject(inputs.plugin_config) : null,
        parallel_config: canonicalObject(inputs.parallel_config),
        quant_config: canonicalObject(inputs.quant_config),
        pretrained_config: canonicalObject(inputs.pretrained_config),
    };
    return hashCanonical(canonical) === manifest.key;
}
