import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { defaultQuantConfig } from '../src/engine_config';
import {
    LocalIdentitySource,
    ModelInfo,
    inferModelFormat,
    loadCheckpointConfig,
    loadEngineConfig,
    loadExtraBuildConfigsFromEngine,
    resolveDtype,
} from '../src/model_format';
import { FormatInferenceError } from '../src/structured_error';
import { makeCheckpoint, makeEngineDir, makeSourceModel, tmpDir, writeJson } from './helpers';

test('model directories are classified by their config.json', () => {
    const root = tmpDir('model-format');
    try {
        const source = makeSourceModel(path.join(root, 'source'));
        const checkpoint = makeCheckpoint(path.join(root, 'ckpt'));
        const engine = makeEngineDir(path.join(root, 'engine'), { max_batch_size: 8 });

        assert.equal(inferModelFormat(source), 'SOURCE_MODEL');
        assert.equal(inferModelFormat(checkpoint), 'CHECKPOINT');
        assert.equal(inferModelFormat(engine), 'ENGINE');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('format inference fails on missing, unparsable or invalid config.json', () => {
    const root = tmpDir('model-format');
    try {
        const empty = path.join(root, 'empty');
        fs.mkdirSync(empty);
        assert.throws(() => inferModelFormat(empty), {
            name: 'FormatInferenceError',
            message: `Failed to infer model format because no config.json exists in ${empty}`,
        });

        const broken = path.join(root, 'broken');
        fs.mkdirSync(broken);
        fs.writeFileSync(path.join(broken, 'config.json'), '{ not json');
        assert.throws(() => inferModelFormat(broken), {
            message: `Failed to parse ${path.join(broken, 'config.json')}`,
        });

        const badCheckpoint = path.join(root, 'bad-ckpt');
        writeJson(path.join(badCheckpoint, 'config.json'), { architecture: 'Tiny', dtype: 16 });
        assert.throws(
            () => inferModelFormat(badCheckpoint),
            (err: unknown) => err instanceof FormatInferenceError &&
                err.message === 'Inferred model format CHECKPOINT, but failed to load config.json: dtype: Expected type string, got number' &&
                err.toStructured().recovery_options[0].action === 'fix_model_config'
        );

        const noArchitectures = path.join(root, 'no-arch');
        writeJson(path.join(noArchitectures, 'config.json'), { hidden_size: 64 });
        assert.throws(() => inferModelFormat(noArchitectures), {
            message: 'Inferred model format SOURCE_MODEL, but failed to load config.json: architectures: Required field missing',
        });
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('engine configs are read with defaults filled in', () => {
    const root = tmpDir('model-format');
    try {
        const engine = makeEngineDir(root, {
            max_batch_size: 8,
            max_beam_width: 2,
            plugin_config: { gemm_plugin: 'float16' },
        }, { world_size: 2, tp_size: 2, pp_size: 1 });

        const config = loadEngineConfig(engine);
        assert.equal(config.version, '0.4.0');
        assert.equal(config.build_config.max_batch_size, 8);
        assert.equal(config.build_config.max_input_len, 1024);
        assert.equal(config.build_config.plugin_config.gemm_plugin, 'float16');
        assert.equal(config.build_config.plugin_config.context_fmha, true);
        assert.deepEqual(config.pretrained_config.mapping, { tp_size: 2, pp_size: 1, world_size: 2 });
        assert.equal(ModelInfo.fromEngineConfig(config).modelName, 'TinyForCausalLM');

        assert.deepEqual(loadExtraBuildConfigsFromEngine(engine), { max_batch_size: 8, max_beam_width: 2 });
        assert.throws(() => loadCheckpointConfig(engine), {
            message: `Expected a CHECKPOINT directory, found ENGINE in ${engine}`,
        });
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('extra build configs are null for non-engine directories', () => {
    const root = tmpDir('model-format');
    try {
        makeSourceModel(root);
        assert.equal(loadExtraBuildConfigsFromEngine(root), null);
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});

test('model info needs an architecture', () => {
    assert.throws(() => new ModelInfo().modelName, { message: 'The architecture is not set yet.' });
    assert.equal(ModelInfo.fromPretrained({ dtype: 'float16', architecture: 'Tiny' }).dtype, 'float16');
});

test('dtype resolution follows the source model', () => {
    assert.equal(resolveDtype('auto', 'bfloat16'), 'bfloat16');
    assert.equal(resolveDtype('auto', null), 'float16');
    assert.equal(resolveDtype('auto', 'float32'), 'float16');
    assert.equal(resolveDtype('float32', 'bfloat16'), 'float16');
    assert.equal(resolveDtype('bfloat16', 'float16'), 'bfloat16');
});

test('local identity describes the source model and is memoized', () => {
    const root = tmpDir('identity');
    try {
        makeSourceModel(root);
        const identity = new LocalIdentitySource();
        const req = {
            model_dir: root,
            dtype: 'auto',
            world_size: 1,
            tp_size: 1,
            pp_size: 1,
            quant_config: defaultQuantConfig(),
        };

        const first = identity.describe(req);
        assert.deepEqual(first, {
            architecture: 'TinyForCausalLM',
            dtype: 'bfloat16',
            vocab_size: 1000,
            hidden_size: 64,
            num_hidden_layers: 2,
            num_attention_heads: 4,
            mapping: { world_size: 1, tp_size: 1, pp_size: 1 },
            quantization: defaultQuantConfig(),
        });

        first.architecture = 'Mutated';
        assert.equal(identity.describe(req).architecture, 'TinyForCausalLM');
        assert.equal(identity.describe({ ...req, dtype: 'float32' }).dtype, 'float16');
    } finally {
        fs.rmSync(root, { recursive: true, force: true });
    }
});
