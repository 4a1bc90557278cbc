import test from 'node:test';
import assert from 'node:assert/strict';

import { computeCacheFingerprint, isCacheKey, verifyCacheManifest } from '../src/build_cache';
import { defaultBuildConfig, defaultQuantConfig } from '../src/engine_config';
import { UnsupportedJsonTypeError, stableStringify } from '../src/stable_stringify';

function inputs() {
    return {
        build_config: defaultBuildConfig({ max_batch_size: 8 }),
        parallel_config: { tp_size: 1, pp_size: 1, auto_parallel: false, world_size: 1 },
        quant_config: defaultQuantConfig(),
        pretrained_config: { architecture: 'TinyForCausalLM', dtype: 'float16', vocab_size: 1000 },
    };
}

test('stable stringify sorts keys and drops undefined members', () => {
    assert.equal(stableStringify({ b: 1, a: { d: [3, { y: null, x: 'v' }], c: undefined } }), '{"a":{"d":[3,{"x":"v","y":null}]},"b":1}');
    assert.throws(() => stableStringify({ a: { b: Number.POSITIVE_INFINITY } }), {
        name: 'UnsupportedJsonTypeError',
        message: 'UNSUPPORTED_JSON_TYPE: Infinity at a.b',
    });
    assert.throws(() => stableStringify([() => 1]), UnsupportedJsonTypeError);
});

test('the fingerprint ignores key order', () => {
    const a = computeCacheFingerprint(inputs());

    const shuffled = inputs();
    const { plugin_config, ...restBuildConfig } = shuffled.build_config;
    const reordered = {
        pretrained_config: { vocab_size: 1000, dtype: 'float16', architecture: 'TinyForCausalLM' },
        quant_config: shuffled.quant_config,
        parallel_config: { world_size: 1, auto_parallel: false, pp_size: 1, tp_size: 1 },
        build_config: { plugin_config, ...restBuildConfig },
    };
    const b = computeCacheFingerprint(reordered);

    assert.equal(a.key, b.key);
    assert.equal(isCacheKey(a.key), true);
});

test('any input change changes the fingerprint', () => {
    const base = computeCacheFingerprint(inputs()).key;

    const build = inputs();
    build.build_config.max_batch_size = 16;
    const plugin = inputs();
    plugin.build_config.plugin_config.use_paged_context_fmha = true;
    const quant = inputs();
    quant.quant_config.quant_algo = 'FP8';
    const model = inputs();
    model.pretrained_config.dtype = 'bfloat16';

    const keys = [build, plugin, quant, model].map((i) => computeCacheFingerprint(i).key);
    assert.equal(new Set([base, ...keys]).size, 5);
    assert.notEqual(computeCacheFingerprint(inputs(), 2).key, base);
});

test('the plugin config is hashed as its own member', () => {
    const { inputs: canonical } = computeCacheFingerprint(inputs());
    assert.equal('plugin_config' in canonical.build_config, false);
    assert.equal(canonical.plugin_config?.gpt_attention_plugin, 'auto');
    assert.equal(canonical.version, 1);
});

test('manifests verify only when the key matches the inputs', () => {
    const manifest = computeCacheFingerprint(inputs());
    assert.equal(verifyCacheManifest(JSON.parse(JSON.stringify(manifest))), true);

    const tampered = structuredClone(manifest);
    tampered.inputs.build_config.max_batch_size = 4096;
    assert.equal(verifyCacheManifest(tampered), false);

    assert.equal(verifyCacheManifest(manifest, 2), false);
    assert.equal(verifyCacheManifest({ key: manifest.key }), false);
    assert.equal(verifyCacheManifest(null), false);
});

test('cache keys are 64 lowercase hex characters', () => {
    assert.equal(isCacheKey('a'.repeat(64)), true);
    assert.equal(isCacheKey('A'.repeat(64)), false);
    assert.equal(isCacheKey('a'.repeat(63)), false);
    assert.equal(isCacheKey('../etc'), false);
});
